import { resolveSlotKey, type SlotKey } from "./criteria.js";
import type { Logger } from "./logger.js";
import { normalizeText, splitList, stem } from "./nlu/normalize.js";
import { TABLE_NAMES, type ConfigSource, type TableName, type TableRow } from "./sources/types.js";
import { asInt, asNumber, asString } from "./values.js";

export type LocationKind = "street" | "microarea" | "district";
export type PatternType = "word" | "phrase" | "skip" | "special";
export type IntentKind = "new_search" | "more" | "skip" | "viewing" | "continue";

export const INTENT_KINDS: readonly IntentKind[] = ["new_search", "more", "skip", "viewing", "continue"];

export interface LocationEntry {
  synonym: string;
  stem: string;
  id: number;
}

export interface ConditionGroup {
  id: number;
  label: string;
  synonyms: readonly string[];
}

export interface PatternRule {
  slot: SlotKey;
  type: PatternType;
  keywords: readonly string[];
  min?: number;
  max?: number;
  list?: string;
}

export interface Question {
  key: SlotKey | "name";
  text: string;
  order: number;
}

export interface Objection {
  trigger: string;
  response: string;
  slot?: SlotKey;
}

/** Read-only snapshot; replaced as a whole on reload, never mutated. */
export interface LookupTables {
  locations: Readonly<Record<LocationKind, readonly LocationEntry[]>>;
  streetsByName: ReadonlyMap<string, number>;
  locationNames: Readonly<Record<LocationKind, ReadonlyMap<number, string>>>;
  conditions: readonly ConditionGroup[];
  patterns: ReadonlyMap<SlotKey, readonly PatternRule[]>;
  sections: ReadonlyMap<string, string>;
  questions: readonly Question[];
  keywords: Readonly<Record<IntentKind, readonly string[]>>;
  objections: readonly Objection[];
  copy: ReadonlyMap<string, string>;
}

export type TableRows = Record<TableName, TableRow[]>;

const PATTERN_TYPES: readonly PatternType[] = ["word", "phrase", "skip", "special"];

function isLocationKind(value: string): value is LocationKind {
  return value === "street" || value === "microarea" || value === "district";
}

function isPatternType(value: string): value is PatternType {
  return PATTERN_TYPES.some((type) => type === value);
}

function isIntentKind(value: string): value is IntentKind {
  return INTENT_KINDS.some((kind) => kind === value);
}

export function emptyTables(): LookupTables {
  return buildTables({
    districts: [],
    conditions: [],
    filter_patterns: [],
    sections: [],
    questions: [],
    keywords: [],
    objections: [],
    copy: []
  });
}

function buildLocations(rows: TableRow[], skipped: string[]) {
  const locations: Record<LocationKind, LocationEntry[]> = { street: [], microarea: [], district: [] };
  const names: Record<LocationKind, Map<number, string>> = {
    street: new Map(),
    microarea: new Map(),
    district: new Map()
  };
  const streetsByName = new Map<string, number>();

  for (const row of rows) {
    const kind = asString(row.type).toLowerCase();
    const synonym = normalizeText(asString(row.synonym));
    const id = asInt(row.target_id);
    if (!isLocationKind(kind) || synonym === "" || id === undefined) {
      skipped.push(`districts:${asString(row.synonym, "?")}`);
      continue;
    }
    locations[kind].push({ synonym, stem: stem(synonym), id });
    if (!names[kind].has(id)) {
      names[kind].set(id, asString(row.official_name, asString(row.synonym)));
    }
    if (kind === "street") {
      streetsByName.set(synonym, id);
    }
  }
  return { locations, names, streetsByName };
}

function buildConditions(rows: TableRow[], skipped: string[]): ConditionGroup[] {
  const groups: ConditionGroup[] = [];
  for (const row of rows) {
    const id = asInt(row.id);
    const label = asString(row.label);
    if (id === undefined || label === "") {
      skipped.push(`conditions:${label || "?"}`);
      continue;
    }
    const synonyms = [label, ...splitList(asString(row.synonyms), ";")]
      .map(normalizeText)
      .filter((syn) => syn !== "");
    groups.push({ id, label, synonyms: [...new Set(synonyms)] });
  }
  return groups;
}

function buildPatterns(rows: TableRow[], skipped: string[]): Map<SlotKey, PatternRule[]> {
  const patterns = new Map<SlotKey, PatternRule[]>();
  for (const row of rows) {
    const slot = resolveSlotKey(asString(row.filter_key));
    const type = asString(row.pattern_type).toLowerCase();
    const keywords = splitList(asString(row.pattern_text).toLowerCase());
    if (!slot || !isPatternType(type) || keywords.length === 0) {
      skipped.push(`filter_patterns:${asString(row.filter_key, "?")}`);
      continue;
    }
    const rule: PatternRule = {
      slot,
      type,
      keywords,
      min: asNumber(row.value_min),
      max: asNumber(row.value_max),
      list: asString(row.value_list) || undefined
    };
    const list = patterns.get(slot) ?? [];
    list.push(rule);
    patterns.set(slot, list);
  }
  return patterns;
}

function buildSections(rows: TableRow[]): Map<string, string> {
  const sections = new Map<string, string>();
  for (const row of rows) {
    const value = asString(row.section_value);
    if (value === "") {
      continue;
    }
    for (const keyword of splitList(asString(row.keyword))) {
      const key = stem(normalizeText(keyword));
      if (key !== "" && !sections.has(key)) {
        sections.set(key, value);
      }
    }
  }
  return sections;
}

function buildQuestions(rows: TableRow[], skipped: string[]): Question[] {
  const questions: Question[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    const rawKey = asString(row.question_key).toLowerCase();
    const key = rawKey === "name" ? "name" : resolveSlotKey(rawKey);
    const text = asString(row.question_text);
    if (!key || text === "" || seen.has(key)) {
      skipped.push(`questions:${rawKey || "?"}`);
      continue;
    }
    seen.add(key);
    questions.push({ key, text, order: asNumber(row.order) ?? questions.length + 1 });
  }
  return questions.sort((a, b) => a.order - b.order);
}

function buildKeywords(rows: TableRow[], skipped: string[]): Record<IntentKind, string[]> {
  const keywords: Record<IntentKind, string[]> = { new_search: [], more: [], skip: [], viewing: [], continue: [] };
  for (const row of rows) {
    const intent = asString(row.intent).toLowerCase();
    if (!isIntentKind(intent)) {
      skipped.push(`keywords:${intent || "?"}`);
      continue;
    }
    for (const keyword of splitList(asString(row.keywords))) {
      const normalized = normalizeText(keyword);
      if (normalized !== "" && !keywords[intent].includes(normalized)) {
        keywords[intent].push(normalized);
      }
    }
  }
  return keywords;
}

function buildObjections(rows: TableRow[], skipped: string[]): Objection[] {
  const objections: Objection[] = [];
  for (const row of rows) {
    const trigger = normalizeText(asString(row.trigger));
    const response = asString(row.response);
    if (trigger === "" || response === "") {
      skipped.push(`objections:${trigger || "?"}`);
      continue;
    }
    objections.push({ trigger, response, slot: resolveSlotKey(asString(row.slot_key)) });
  }
  return objections;
}

function buildCopy(rows: TableRow[]): Map<string, string> {
  const copy = new Map<string, string>();
  for (const row of rows) {
    const key = asString(row.key);
    const text = asString(row.text);
    if (key !== "" && text !== "") {
      copy.set(key, text.replace(/\\n/g, "\n"));
    }
  }
  return copy;
}

/** Builds a snapshot from raw rows; rows that do not fit are reported in `skipped`. */
export function buildTables(rows: TableRows, skipped: string[] = []): LookupTables {
  const { locations, names, streetsByName } = buildLocations(rows.districts, skipped);
  return {
    locations,
    streetsByName,
    locationNames: names,
    conditions: buildConditions(rows.conditions, skipped),
    patterns: buildPatterns(rows.filter_patterns, skipped),
    sections: buildSections(rows.sections),
    questions: buildQuestions(rows.questions, skipped),
    keywords: buildKeywords(rows.keywords, skipped),
    objections: buildObjections(rows.objections, skipped),
    copy: buildCopy(rows.copy)
  };
}

export type ReloadResult =
  | { ok: true; counts: Record<TableName, number>; skipped: number }
  | { ok: false; error: string };

/** Holds the current lookup snapshot and swaps it atomically on reload. */
export class LookupStore {
  private snapshot: LookupTables = emptyTables();
  private loadedAt?: Date;

  constructor(
    private readonly source: ConfigSource,
    private readonly logger: Logger
  ) {}

  current(): LookupTables {
    return this.snapshot;
  }

  lastLoadedAt(): Date | undefined {
    return this.loadedAt;
  }

  async reload(): Promise<ReloadResult> {
    try {
      const entries = await Promise.all(
        TABLE_NAMES.map(async (table) => [table, await this.source.fetchTable(table, { fresh: true })] as const)
      );
      const rows: TableRows = {
        districts: [],
        conditions: [],
        filter_patterns: [],
        sections: [],
        questions: [],
        keywords: [],
        objections: [],
        copy: []
      };
      const counts: Record<TableName, number> = {
        districts: 0,
        conditions: 0,
        filter_patterns: 0,
        sections: 0,
        questions: 0,
        keywords: 0,
        objections: 0,
        copy: 0
      };
      for (const [table, tableRows] of entries) {
        rows[table] = tableRows;
        counts[table] = tableRows.length;
      }

      const skipped: string[] = [];
      this.snapshot = buildTables(rows, skipped);
      this.loadedAt = new Date();
      if (skipped.length > 0) {
        this.logger.warn({ skipped }, "[LOOKUPS] rows skipped");
      }
      this.logger.info({ source: this.source.name, counts }, "[LOOKUPS] reloaded");
      return { ok: true, counts, skipped: skipped.length };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ source: this.source.name, err_message: message }, "[LOOKUPS] reload failed, keeping previous tables");
      return { ok: false, error: message };
    }
  }
}
