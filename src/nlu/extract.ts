import { SLOT_KEYS, applyUpdate, isEmptyUpdate, restrictToSlot, type Criteria, type SlotKey } from "../criteria.js";
import { logger } from "../logger.js";
import type { LookupTables } from "../lookups.js";
import { matchLocations } from "./location.js";
import { containsPhrase, extractAmounts, extractInts, normalizeText, unique } from "./normalize.js";
import { matchPatternRule } from "./patterns.js";
import { detectSection } from "./section.js";

const log = logger.child({ component: "extract" });

export type Extraction =
  | { matched: true; update: Criteria; via: "pattern" | "heuristic" }
  | { matched: false };

export type ExtractOptions = {
  /**
   * Multi-slot browsing mode: numbers only count when their slot keyword is
   * present, bare numbers are left to the numeric fallback.
   */
  opportunistic?: boolean;
};

const NO_MATCH: Extraction = { matched: false };

const MAX_WORD = /(?<!\p{L})(?:до|максимум|макс|не більше|не больше)(?!\p{L})/u;
const MIN_WORD = /(?<!\p{L})(?:від|от|мінімум|минимум|мін|мин|не менше|не меньше)(?!\p{L})/u;
const RANGE_WORD = /(?<!\p{L})(?:від|от|до)(?!\p{L})/u;
const FLOOR_KEYWORD = "(?:поверх(?!ов|ів)|пов(?!ерх)|етаж(?!н)|этаж(?!н))";
const FLOOR_ANY = /етаж|этаж|пов/u;
const FLOORS_TOTAL_KEYWORD = "(?:поверхов|поверхів|этажн|етажн)";
const ROOM_KEYWORD = "(?:кімнат|комнат|кімн|комн|к(?!\\p{L}))";
const ORDINAL_SUFFIX = "(?:й|я|і|ий|ій|ый|ой|ая|яя|є|ої|го|му)";
const AREA_UNIT = "(?:м²|м2|кв|метр|м(?!\\p{L}))";

function num(n: number): string {
  return `(?<!\\d)${n}(?!\\d)`;
}

// A floor keyword is never borrowed across another number or a clause break.
const FLOOR_GAP = "[^\\d,;]{0,20}?";

function near(n: number, keyword: string, gap = ".{0,20}?"): RegExp {
  return new RegExp(`${num(n)}${gap}${keyword}`, "iu");
}

function minMax(values: number[]): { min: number; max: number } {
  return { min: Math.min(...values), max: Math.max(...values) };
}

function extractPrice(lower: string): Criteria {
  const amounts = extractAmounts(lower).filter((n) => n > 1000);
  if (amounts.length === 1) {
    const [value] = amounts;
    if (MAX_WORD.test(lower)) return { price_max: value, price_min: null };
    if (MIN_WORD.test(lower)) return { price_min: value, price_max: null };
    return { price_max: value, price_min: null };
  }
  if (amounts.length > 1) {
    const { min, max } = minMax(amounts);
    return { price_min: min, price_max: max };
  }
  return {};
}

function extractRooms(lower: string, opportunistic: boolean): Criteria {
  const numbers = extractInts(lower).filter((n) => n > 0 && n < 8);
  const withKeyword = numbers.filter(
    (n) =>
      !new RegExp(`${num(n)}-${ORDINAL_SUFFIX}(?!\\p{L})`, "iu").test(lower) && near(n, ROOM_KEYWORD).test(lower)
  );
  if (withKeyword.length > 0) {
    return { rooms_in: unique(withKeyword) };
  }
  if (opportunistic || numbers.length === 0 || FLOOR_ANY.test(lower)) {
    return {};
  }
  if (numbers.length === 2 && RANGE_WORD.test(lower)) {
    const { min, max } = minMax(numbers);
    const range: number[] = [];
    for (let n = min; n <= max; n += 1) range.push(n);
    return { rooms_in: range };
  }
  return { rooms_in: unique(numbers) };
}

function extractArea(lower: string, opportunistic: boolean): Criteria {
  let numbers = extractInts(lower).filter((n) => n >= 15 && n <= 500);
  if (opportunistic && !/площ/u.test(lower)) {
    numbers = numbers.filter((n) => new RegExp(`${num(n)}\\s*${AREA_UNIT}`, "iu").test(lower));
  }
  if (numbers.length === 1) {
    const [value] = numbers;
    const before = (words: string) => new RegExp(`(?<!\\p{L})(?:${words})\\s*${num(value)}`, "u");
    if (before("від|от|мінімум|минимум|мін|мин|не менше|не меньше").test(lower)) {
      return { area_min: value, area_max: null };
    }
    if (before("до|максимум|макс|не більше|не больше").test(lower)) {
      return { area_max: value, area_min: null };
    }
    return { area_min: value, area_max: null };
  }
  if (numbers.length > 1) {
    const { min, max } = minMax(numbers);
    return { area_min: min, area_max: max };
  }
  return {};
}

type Bounds = { lo: number; hi: number };

function openRange(lower: string, value: number, bounds: Bounds): { min: number; max: number } {
  if (MAX_WORD.test(lower)) return { min: bounds.lo, max: value };
  if (MIN_WORD.test(lower)) return { min: value, max: bounds.hi };
  return { min: value, max: value };
}

function extractFloor(lower: string, opportunistic: boolean): Criteria {
  const bounds: Bounds = { lo: 1, hi: 50 };
  const inBounds = (n: number) => n >= bounds.lo && n <= bounds.hi;

  const rangePattern = opportunistic
    ? new RegExp(`(\\d+)\\s*-\\s*(\\d+)${FLOOR_GAP}${FLOOR_KEYWORD}`, "iu")
    : /(\d+)\s*-\s*(\d+)/u;
  const range = rangePattern.exec(lower);
  if (range) {
    const a = Number(range[1]);
    const b = Number(range[2]);
    if (inBounds(a) && inBounds(b)) {
      return { floor_min: Math.min(a, b), floor_max: Math.max(a, b) };
    }
  }

  const numbers = extractInts(lower).filter(inBounds);
  let picked = numbers.filter((n) => near(n, FLOOR_KEYWORD, FLOOR_GAP).test(lower));
  if (picked.length === 0 && !opportunistic && numbers.length === 1) {
    picked = numbers;
  }
  picked = unique(picked);
  if (picked.length === 1) {
    const { min, max } = openRange(lower, picked[0], bounds);
    return { floor_min: min, floor_max: max };
  }
  if (picked.length > 1) {
    const { min, max } = minMax(picked);
    return { floor_min: min, floor_max: max };
  }
  return {};
}

function extractFloorsTotal(lower: string, opportunistic: boolean): Criteria {
  const bounds: Bounds = { lo: 1, hi: 30 };
  let numbers = unique(extractInts(lower).filter((n) => n >= bounds.lo && n <= bounds.hi));
  if (opportunistic) {
    numbers = numbers.filter((n) => near(n, FLOORS_TOTAL_KEYWORD).test(lower));
  }
  if (numbers.length === 1) {
    const { min, max } = openRange(lower, numbers[0], bounds);
    return { floors_total_min: min, floors_total_max: max };
  }
  if (numbers.length > 1) {
    const { min, max } = minMax(numbers);
    return { floors_total_min: min, floors_total_max: max };
  }
  return {};
}

export function matchConditions(text: string, tables: LookupTables): number[] {
  const normalized = normalizeText(text);
  const ids: number[] = [];
  for (const group of tables.conditions) {
    if (group.synonyms.some((syn) => containsPhrase(normalized, syn)) && !ids.includes(group.id)) {
      ids.push(group.id);
    }
  }
  return ids;
}

function extractLocation(text: string, tables: LookupTables): Criteria {
  const match = matchLocations(text, tables);
  if (match.street_id.length > 0) {
    return { street_id: match.street_id, explicit_street: true };
  }
  const update: Criteria = {};
  if (match.microarea_id.length > 0) update.microarea_id = match.microarea_id;
  if (match.district_id.length > 0) update.district_id = match.district_id;
  return update;
}

function heuristics(slot: SlotKey, text: string, tables: LookupTables, opportunistic: boolean): Criteria {
  const lower = text.toLowerCase();
  switch (slot) {
    case "price":
      return extractPrice(lower);
    case "rooms":
      return extractRooms(lower, opportunistic);
    case "area":
      return extractArea(lower, opportunistic);
    case "floor":
      return extractFloor(lower, opportunistic);
    case "floors_total":
      return extractFloorsTotal(lower, opportunistic);
    case "condition": {
      const ids = matchConditions(text, tables);
      return ids.length > 0 ? { condition_in: ids } : {};
    }
    case "section": {
      const section = detectSection(text, tables);
      return section ? { section } : {};
    }
    case "district":
      return extractLocation(text, tables);
  }
}

/**
 * Reads one slot's value out of free text: configured pattern rules first,
 * then the built-in heuristics for the slot. A `skip` rule is a match with
 * an empty update.
 */
export function extractFilters(
  slot: SlotKey,
  text: string,
  tables: LookupTables,
  options: ExtractOptions = {}
): Extraction {
  const hit = matchPatternRule(slot, text, tables.patterns.get(slot) ?? []);
  if (hit) {
    const level = hit.rule.type === "special" ? "info" : "debug";
    log[level]({ slot, type: hit.rule.type, keyword: hit.keyword }, "[EXTRACT] pattern rule matched");
    return { matched: true, update: hit.update, via: "pattern" };
  }

  const update = restrictToSlot(heuristics(slot, text, tables, options.opportunistic ?? false), slot);
  return isEmptyUpdate(update) ? NO_MATCH : { matched: true, update, via: "heuristic" };
}

/** Opportunistic pass over every slot, merged in slot order. */
export function extractAll(text: string, tables: LookupTables): Criteria {
  let merged: Criteria = {};
  for (const slot of SLOT_KEYS) {
    const result = extractFilters(slot, text, tables, { opportunistic: true });
    if (result.matched && !isEmptyUpdate(result.update)) {
      merged = applyUpdate(merged, result.update);
    }
  }
  return merged;
}
