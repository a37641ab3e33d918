import { readFileSync } from "node:fs";

import type { Logger } from "../logger.js";
import { asInt, asNumber, isRecord } from "../values.js";
import { normalizeListing } from "./client.js";
import type { Listing, ListingsClient, ListingsPayload, ListingsResult } from "./types.js";

function inList(list: readonly number[] | undefined, value: number | undefined): boolean {
  return !list || list.length === 0 || (value !== undefined && list.includes(value));
}

function inRange(value: number | undefined, min: number | null | undefined, max: number | null | undefined): boolean {
  if (!min && !max) {
    return true;
  }
  if (value === undefined) {
    return false;
  }
  return (!min || value >= min) && (!max || value <= max);
}

function matches(listing: Listing, payload: ListingsPayload): boolean {
  const raw = listing.raw;
  return (
    inList(payload.district_id, asInt(raw.district_id)) &&
    inList(payload.microarea_id, asInt(raw.microarea_id)) &&
    inList(payload.street_id, asInt(raw.street_id)) &&
    inList(payload.rooms_in, listing.rooms) &&
    inList(payload.condition_in, asInt(raw.condition_id)) &&
    inRange(listing.price, payload.price_min, payload.price_max) &&
    inRange(listing.area, payload.area_min, payload.area_max) &&
    inRange(listing.floor, payload.floor_min, payload.floor_max) &&
    inRange(listing.floorsTotal, payload.floors_total_min, payload.floors_total_max) &&
    (!payload.section || raw.section === payload.section)
  );
}

function sortKey(listing: Listing): number {
  return asNumber(listing.raw.created_at_ts) ?? listing.id;
}

/** Local JSON catalog with the same paging contract as the HTTP API. */
export class MockListingsClient implements ListingsClient {
  private readonly catalog: Listing[];

  constructor(file: string, mediaBase: string, private readonly logger: Logger) {
    const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
    const rows = Array.isArray(raw) ? raw.filter(isRecord) : [];
    this.catalog = rows
      .map((row) => normalizeListing(row, mediaBase))
      .filter((listing): listing is Listing => listing !== undefined);
  }

  async search(payload: ListingsPayload): Promise<ListingsResult> {
    const found = this.catalog.filter((listing) => matches(listing, payload));
    if (payload.sort === "price_asc") {
      found.sort((a, b) => (a.price ?? 0) - (b.price ?? 0));
    } else {
      found.sort((a, b) => sortKey(b) - sortKey(a));
    }
    const items = found.slice(payload.offset, payload.offset + payload.limit);
    this.logger.debug({ total: found.length, items: items.length, offset: payload.offset }, "[LISTINGS] mock search");
    return { items, total: found.length };
  }
}
