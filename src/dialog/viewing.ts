import { extractInts, normalizeText, stem } from "../nlu/normalize.js";
import type { ShownListing } from "./types.js";

const MIN_TOKEN = 3;

function addressTokens(text: string): string[] {
  return normalizeText(text)
    .split(" ")
    .filter((token) => token.length >= MIN_TOKEN || /^\d+$/.test(token));
}

/**
 * Resolves a reply to previously shown listings: display numbers first,
 * otherwise listings whose address shares a word with the reply and holds
 * every number in it.
 */
export function resolveSelection(text: string, shown: readonly ShownListing[]): ShownListing[] {
  const byIndex = new Map(shown.map((item) => [item.displayIndex, item]));
  const numbered = extractInts(text)
    .map((n) => byIndex.get(n))
    .filter((item): item is ShownListing => item !== undefined);
  if (numbered.length > 0) {
    return dedupe(numbered);
  }

  const tokens = addressTokens(text);
  const words = tokens.filter((token) => !/^\d+$/.test(token)).map(stem);
  const numbers = tokens.filter((token) => /^\d+$/.test(token));
  if (words.length === 0) {
    return [];
  }
  const found = shown.filter((item) => {
    const haystack = addressTokens(item.address);
    const stems = haystack.map(stem);
    return (
      words.some((word) => stems.some((candidate) => candidate.startsWith(word))) &&
      numbers.every((n) => haystack.includes(n))
    );
  });
  return dedupe(found);
}

function dedupe(items: ShownListing[]): ShownListing[] {
  const seen = new Set<number>();
  return items.filter((item) => {
    if (seen.has(item.listingId)) return false;
    seen.add(item.listingId);
    return true;
  });
}

export function describeSelection(items: readonly ShownListing[]): string {
  return items.map((item) => `№${item.displayIndex}`).join(", ");
}
