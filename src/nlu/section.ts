import type { LookupTables } from "../lookups.js";
import { normalizeText, stem } from "./normalize.js";

/** Section tag of the first word whose stem is a configured keyword stem. */
export function detectSection(text: string, tables: LookupTables): string | undefined {
  if (tables.sections.size === 0) {
    return undefined;
  }
  for (const word of normalizeText(text).split(" ")) {
    const section = tables.sections.get(stem(word));
    if (section !== undefined) {
      return section;
    }
  }
  return undefined;
}
