import type { Criteria, SlotKey } from "../criteria.js";
import type { PatternRule } from "../lookups.js";
import { normalizeText, containsPhrase } from "./normalize.js";

export type PatternHit = { rule: PatternRule; keyword: string; update: Criteria };

function ruleKeyword(rule: PatternRule, lower: string, normalized: string): string | undefined {
  if (rule.type === "word") {
    return rule.keywords.find((kw) => containsPhrase(normalized, normalizeText(kw)));
  }
  return rule.keywords.find((kw) => lower.includes(kw));
}

function listNumbers(list: string | undefined): number[] {
  if (!list) {
    return [];
  }
  return list
    .split(/[,;\s]+/)
    .map((part) => Number(part))
    .filter((n) => Number.isInteger(n));
}

function isRoomCount(n: number): boolean {
  return n >= 1 && n <= 7;
}

function updateFromRule(slot: SlotKey, rule: PatternRule): Criteria {
  if (rule.type === "skip") {
    return {};
  }
  const min = rule.min === undefined ? undefined : Math.trunc(rule.min);
  const max = rule.max === undefined ? undefined : Math.trunc(rule.max);

  switch (slot) {
    case "rooms": {
      const listed = listNumbers(rule.list);
      const rooms = (listed.length > 0 ? listed : min !== undefined ? [min] : []).filter(isRoomCount);
      return rooms.length > 0 ? { rooms_in: [...new Set(rooms)] } : {};
    }
    case "floor":
      if (rule.list?.trim().toUpperCase() === "LAST") {
        return { floor_only_last: true };
      }
      return { floor_min: min ?? null, floor_max: max ?? null };
    case "floors_total":
      return { floors_total_min: min ?? null, floors_total_max: max ?? null };
    case "area":
      return { area_min: min ?? null, area_max: max ?? null };
    case "price":
      return { price_min: min ?? null, price_max: max ?? null };
    case "condition": {
      const ids = listNumbers(rule.list);
      return ids.length > 0 ? { condition_in: ids } : {};
    }
    case "section":
      return rule.list ? { section: rule.list } : {};
    case "district": {
      const ids = listNumbers(rule.list);
      return ids.length > 0 ? { district_id: ids } : {};
    }
  }
}

/**
 * First configured rule of the slot whose keyword occurs in the text. A rule
 * whose values fall outside the slot's range yields nothing and is passed over.
 */
export function matchPatternRule(slot: SlotKey, text: string, rules: readonly PatternRule[]): PatternHit | undefined {
  const lower = text.toLowerCase();
  const normalized = normalizeText(text);
  for (const rule of rules) {
    const keyword = ruleKeyword(rule, lower, normalized);
    if (keyword === undefined) {
      continue;
    }
    const update = updateFromRule(slot, rule);
    if (rule.type === "skip" || Object.keys(update).length > 0) {
      return { rule, keyword, update };
    }
  }
  return undefined;
}
