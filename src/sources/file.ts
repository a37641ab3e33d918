import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { tableRowsSchema, type ConfigSource, type TableName, type TableRow } from "./types.js";

/** Reads `<dir>/<table>.json` on every fetch; a missing file is an empty table. */
export class FileConfigSource implements ConfigSource {
  readonly name = "file";

  constructor(private readonly dir: string) {}

  async fetchTable(table: TableName): Promise<TableRow[]> {
    const file = path.resolve(this.dir, `${table}.json`);
    if (!existsSync(file)) {
      return [];
    }
    const raw: unknown = JSON.parse(await readFile(file, "utf8"));
    return tableRowsSchema.parse(raw);
  }
}
