import { fetch, type Dispatcher } from "undici";
import { z } from "zod";

import type { Criteria } from "../criteria.js";
import type { Logger } from "../logger.js";
import { asInt, asNumber, asString, isRecord, pickFirst } from "../values.js";
import { extractPhotos } from "./media.js";
import type { Listing, ListingsClient, ListingsPayload, ListingsResult } from "./types.js";

const DEFAULT_SORT = "newest";

function isBlank(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return value === undefined || value === null || value === "" || value === 0 || value === false;
}

/**
 * Request body for the listings API: criteria without empty values, plus
 * paging. `floor_only_last` is applied client-side and never sent.
 */
export function buildListingsPayload(
  criteria: Criteria,
  page: { limit: number; offset: number }
): ListingsPayload {
  const { floor_only_last: _lastFloor, ...filters } = criteria;
  const payload: ListingsPayload = {
    limit: page.limit,
    offset: page.offset,
    sort: criteria.sort || DEFAULT_SORT
  };
  for (const [key, value] of Object.entries(filters)) {
    if (!isBlank(value)) {
      Object.assign(payload, { [key]: value });
    }
  }
  return payload;
}

const responseSchema = z
  .object({
    items: z.array(z.unknown()).optional(),
    data: z.array(z.unknown()).optional(),
    count: z.union([z.number(), z.string()]).optional(),
    total: z.union([z.number(), z.string()]).optional()
  })
  .passthrough();

function joinAddress(...parts: string[]): string {
  return parts.filter((part) => part !== "").join(", ");
}

export function normalizeListing(item: Record<string, unknown>, mediaBase: string): Listing | undefined {
  const id = asInt(pickFirst(item, ["id", "object_id", "listing_id"]));
  if (id === undefined || id <= 0) {
    return undefined;
  }
  const street = asString(pickFirst(item, ["street", "street_name"]));
  const house = asString(pickFirst(item, ["house", "house_number"]));
  const microarea = asString(pickFirst(item, ["microarea", "microarea_name", "micro_district"]));
  const district = asString(pickFirst(item, ["district", "district_name"]));
  const streetLine = [street, house].filter((part) => part !== "").join(" ");

  return {
    id,
    title: asString(pickFirst(item, ["title", "name"]), "Квартира"),
    price: asNumber(pickFirst(item, ["price", "cost"])),
    currency: asString(pickFirst(item, ["currency", "curr"]), "UAH"),
    street,
    house,
    microarea,
    district,
    address: asString(item.address) || joinAddress(streetLine, microarea, district),
    rooms: asInt(pickFirst(item, ["rooms", "rooms_count"])),
    area: asNumber(pickFirst(item, ["area_total", "area"])),
    floor: asInt(item.floor),
    floorsTotal: asInt(pickFirst(item, ["floors_total", "total_floors", "floors"])),
    url: asString(pickFirst(item, ["url", "link"])) || undefined,
    photos: extractPhotos(item.photos, mediaBase),
    raw: item
  };
}

export function normalizeResponse(raw: unknown, mediaBase: string): ListingsResult {
  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    return { items: [], total: 0, error: "malformed response" };
  }
  const rawItems = parsed.data.items ?? parsed.data.data ?? [];
  const items = rawItems
    .filter(isRecord)
    .map((item) => normalizeListing(item, mediaBase))
    .filter((item): item is Listing => item !== undefined);
  const total = asInt(parsed.data.count) || asInt(parsed.data.total) || rawItems.length;
  return { items, total };
}

export type HttpListingsClientOptions = {
  url: string;
  apiKey?: string;
  timeoutMs: number;
  mediaBase: string;
  logger: Logger;
  dispatcher?: Dispatcher;
};

/** Listings search over HTTP; every failure comes back as an empty result. */
export class HttpListingsClient implements ListingsClient {
  constructor(private readonly options: HttpListingsClientOptions) {}

  async search(payload: ListingsPayload): Promise<ListingsResult> {
    const { logger } = this.options;
    const body: ListingsPayload = this.options.apiKey ? { ...payload, key: this.options.apiKey } : payload;
    const startedAt = Date.now();

    try {
      const response = await fetch(this.options.url, {
        method: "POST",
        headers: { "content-type": "application/json", accept: "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
        dispatcher: this.options.dispatcher
      });
      const ms = Date.now() - startedAt;

      if (!response.ok) {
        logger.warn({ status: response.status, ms }, "[LISTINGS] non-2xx response");
        return { items: [], total: 0, error: `HTTP ${response.status}` };
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch {
        logger.warn({ status: response.status, ms }, "[LISTINGS] body is not JSON");
        return { items: [], total: 0, error: "malformed response" };
      }

      const result = normalizeResponse(json, this.options.mediaBase);
      logger.info({ status: response.status, ms, items: result.items.length, total: result.total }, "[LISTINGS] search");
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ err_message: message, ms: Date.now() - startedAt }, "[LISTINGS] request failed");
      return { items: [], total: 0, error: message };
    }
  }
}
