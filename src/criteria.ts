import { z } from "zod";

import { unique } from "./nlu/normalize.js";

const idList = z.array(z.number().int());
const bound = z.number().int().nullable().optional();

export const criteriaSchema = z.object({
  district_id: idList.optional(),
  microarea_id: idList.optional(),
  street_id: idList.optional(),
  explicit_street: z.boolean().optional(),
  rooms_in: z.array(z.number().int().min(1).max(7)).optional(),
  price_min: bound,
  price_max: bound,
  area_min: bound,
  area_max: bound,
  floor_min: bound,
  floor_max: bound,
  floor_only_last: z.boolean().optional(),
  floors_total_min: bound,
  floors_total_max: bound,
  condition_in: idList.optional(),
  section: z.string().optional(),
  sort: z.string().optional()
});

export type Criteria = z.infer<typeof criteriaSchema>;
export type CriteriaKey = keyof Criteria;

export const SLOT_KEYS = [
  "district",
  "price",
  "rooms",
  "area",
  "floor",
  "floors_total",
  "condition",
  "section"
] as const;

export type SlotKey = (typeof SLOT_KEYS)[number];
export const slotKeySchema = z.enum(SLOT_KEYS);

const SLOT_ALIASES: Record<string, SlotKey> = {
  district: "district",
  location: "district",
  microarea: "district",
  street: "district",
  price: "price",
  budget: "price",
  rooms: "rooms",
  area: "area",
  floor: "floor",
  floors_total: "floors_total",
  building_floors: "floors_total",
  condition: "condition",
  state: "condition",
  section: "section"
};

/** Maps a configured key (including legacy aliases) onto a slot. */
export function resolveSlotKey(raw: string): SlotKey | undefined {
  return SLOT_ALIASES[raw.trim().toLowerCase()];
}

export const LOCATION_KEYS = ["street_id", "microarea_id", "district_id"] as const;
type LocationKey = (typeof LOCATION_KEYS)[number];

export const SLOT_FIELDS: Record<SlotKey, readonly CriteriaKey[]> = {
  district: ["district_id", "microarea_id", "street_id"],
  price: ["price_min", "price_max"],
  rooms: ["rooms_in"],
  area: ["area_min", "area_max"],
  floor: ["floor_min", "floor_max", "floor_only_last"],
  floors_total: ["floors_total_min", "floors_total_max"],
  condition: ["condition_in"],
  section: ["section"]
};

// Keys a scoped answer may write; the location slot also sets the street flag.
const SLOT_UPDATE_KEYS: Record<SlotKey, readonly CriteriaKey[]> = {
  ...SLOT_FIELDS,
  district: [...SLOT_FIELDS.district, "explicit_street"]
};

export function isFilled(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null && value !== false && value !== 0 && value !== "";
}

export function isSlotAnswered(criteria: Criteria, slot: SlotKey): boolean {
  return SLOT_FIELDS[slot].some((key) => isFilled(criteria[key]));
}

export function hasAnyCriteria(criteria: Criteria): boolean {
  return SLOT_KEYS.some((slot) => isSlotAnswered(criteria, slot));
}

export function isEmptyUpdate(update: Criteria): boolean {
  return Object.keys(update).length === 0;
}

function pickKeys(source: Criteria, keys: readonly CriteriaKey[]): Criteria {
  const out: Criteria = {};
  for (const key of keys) {
    if (source[key] !== undefined) {
      Object.assign(out, { [key]: source[key] });
    }
  }
  return out;
}

/** Drops everything the given slot is not allowed to write. */
export function restrictToSlot(update: Criteria, slot: SlotKey): Criteria {
  return pickKeys(update, SLOT_UPDATE_KEYS[slot]);
}

function withoutLocation(criteria: Criteria): Criteria {
  const { district_id: _district, microarea_id: _microarea, street_id: _street, explicit_street: _flag, ...rest } =
    criteria;
  return rest;
}

/**
 * Location keys replace each other (most specific wins and the rest are
 * cleared); every other key overwrites.
 */
export function applyUpdate(existing: Criteria, update: Criteria): Criteria {
  const locationKey = LOCATION_KEYS.find((key: LocationKey) => (update[key]?.length ?? 0) > 0);
  if (!locationKey) {
    return { ...existing, ...update };
  }

  const merged: Criteria = { ...withoutLocation(existing), ...withoutLocation(update) };
  merged[locationKey] = unique(update[locationKey] ?? []);
  if (locationKey === "street_id") {
    merged.explicit_street = true;
  }
  return merged;
}
