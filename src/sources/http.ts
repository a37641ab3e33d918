import { fetch, type Dispatcher } from "undici";

import { TtlCache } from "../cache.js";
import { tableRowsSchema, type ConfigSource, type FetchOptions, type TableName, type TableRow } from "./types.js";

export type HttpConfigSourceOptions = {
  baseUrl: string;
  ttlMs: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

/** Sheet-to-JSON endpoint: GET `<base>/<table>` returns an array of rows. */
export class HttpConfigSource implements ConfigSource {
  readonly name = "http";
  private readonly cache: TtlCache<TableRow[]>;

  constructor(private readonly options: HttpConfigSourceOptions) {
    this.cache = new TtlCache(options.ttlMs);
  }

  async fetchTable(table: TableName, fetchOptions: FetchOptions = {}): Promise<TableRow[]> {
    if (fetchOptions.fresh) {
      this.cache.delete(table);
    } else {
      const cached = this.cache.get(table);
      if (cached) {
        return cached;
      }
    }

    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(table)}`;
    const response = await fetch(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
      dispatcher: this.options.dispatcher
    });
    if (!response.ok) {
      throw new Error(`config table ${table}: HTTP ${response.status}`);
    }

    const rows = tableRowsSchema.parse(await response.json());
    this.cache.set(table, rows);
    return rows;
  }
}
