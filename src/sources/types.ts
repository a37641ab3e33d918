import { z } from "zod";

export const TABLE_NAMES = [
  "districts",
  "conditions",
  "filter_patterns",
  "sections",
  "questions",
  "keywords",
  "objections",
  "copy"
] as const;

export type TableName = (typeof TABLE_NAMES)[number];
export type TableRow = Record<string, unknown>;

export const tableRowsSchema = z.array(z.record(z.string(), z.unknown()));

export interface FetchOptions {
  /** Bypass any cache and read the source again. */
  fresh?: boolean;
}

export interface ConfigSource {
  readonly name: string;
  fetchTable(table: TableName, options?: FetchOptions): Promise<TableRow[]>;
}
