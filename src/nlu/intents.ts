import type { IntentKind, LookupTables, Objection } from "../lookups.js";
import { containsPhrase, normalizeText } from "./normalize.js";

export function hasIntent(text: string, intent: IntentKind, tables: LookupTables): boolean {
  const normalized = normalizeText(text);
  return tables.keywords[intent].some((keyword) => containsPhrase(normalized, keyword));
}

/** First configured objection whose trigger phrase occurs in the text. */
export function matchObjection(text: string, tables: LookupTables): Objection | undefined {
  const normalized = normalizeText(text);
  return tables.objections.find((objection) => normalized.includes(objection.trigger));
}

const PHONE = /(?<!\d)(?:\+?38)?0\d{9}(?!\d)/u;

/** Ukrainian phone number typed as text, returned as +380XXXXXXXXX. */
export function extractPhone(text: string): string | undefined {
  const compact = text.replace(/[\s()-]/g, "");
  const match = PHONE.exec(compact);
  if (!match) {
    return undefined;
  }
  const digits = match[0].replace(/\D/g, "");
  return `+38${digits.slice(-10)}`;
}
