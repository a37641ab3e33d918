import type { LocationKind, LookupTables } from "../lookups.js";
import { normalizeText, stem, unique } from "./normalize.js";

export type LocationMatch = {
  street_id: number[];
  microarea_id: number[];
  district_id: number[];
};

const ORDINAL_PART = /^\d+-?(?:й|и|ий|ый|і)$/iu;
const WITH_ORDINAL = /^(.+?)\s+\d+-?(?:й|и|ий|ый|і)$/iu;
const PRIORITY: readonly LocationKind[] = ["street", "microarea", "district"];

/**
 * Splits on commas and semicolons; a bare ordinal ("5-й") borrows the base
 * name of the last named part before it.
 */
export function splitLocationParts(text: string): string[] {
  const parts = text
    .split(/[;,]/)
    .map((part) => part.trim())
    .filter((part) => part !== "");

  const out: string[] = [];
  let baseName: string | undefined;
  for (const part of parts) {
    if (ORDINAL_PART.test(part) && baseName) {
      out.push(`${baseName} ${part}`);
      continue;
    }
    baseName = WITH_ORDINAL.exec(part)?.[1] ?? part;
    out.push(part);
  }
  return out;
}

function matchPart(part: string, tables: LookupTables): LocationMatch {
  const normalized = normalizeText(part);
  const exactStreet = tables.streetsByName.get(normalized);
  if (exactStreet !== undefined) {
    return { street_id: [exactStreet], microarea_id: [], district_id: [] };
  }

  const found: Record<LocationKind, number[]> = { street: [], microarea: [], district: [] };
  for (const word of normalized.split(" ")) {
    if (word === "") continue;
    const wordStem = stem(word);
    for (const kind of PRIORITY) {
      const hit = tables.locations[kind].find((entry) => entry.stem === wordStem);
      if (hit && !found[kind].includes(hit.id)) {
        found[kind].push(hit.id);
      }
    }
  }
  return { street_id: found.street, microarea_id: found.microarea, district_id: found.district };
}

/**
 * Resolves location mentions to table ids. Any street hit makes the result
 * street-only.
 */
export function matchLocations(text: string, tables: LookupTables): LocationMatch {
  const combined: LocationMatch = { street_id: [], microarea_id: [], district_id: [] };
  for (const part of splitLocationParts(text)) {
    const match = matchPart(part, tables);
    combined.street_id = unique([...combined.street_id, ...match.street_id]);
    combined.microarea_id = unique([...combined.microarea_id, ...match.microarea_id]);
    combined.district_id = unique([...combined.district_id, ...match.district_id]);
  }

  if (combined.street_id.length > 0) {
    return { street_id: combined.street_id, microarea_id: [], district_id: [] };
  }
  return combined;
}
