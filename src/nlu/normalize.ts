const LETTER_FOLDS: Record<string, string> = {
  і: "и",
  ї: "и",
  є: "е",
  ґ: "г",
  ё: "е"
};

// Longest first; order inside one length is significant.
const ENDINGS = [
  "ого", "ому", "ими", "ыми", "ой", "ый", "ий", "ас", "яс", "ое", "ее", "ом", "ою",
  "ам", "ами", "ах", "ів", "ов", "ей", "ям", "ями", "ях",
  "а", "у", "ю", "о", "е", "і", "и", "ь", "ї"
].sort((a, b) => b.length - a.length);

const MIN_STEM = 3;

/**
 * Lowercases, folds Ukrainian/Russian look-alike letters and collapses
 * everything that is not a letter, digit or underscore into single spaces.
 * Idempotent.
 */
export function normalizeText(input: string): string {
  return input
    .toLowerCase()
    .replace(/[іїєґё]/g, (ch) => LETTER_FOLDS[ch] ?? ch)
    .replace(/[^\p{L}\p{N}_]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(input: string): string[] {
  const normalized = normalizeText(input);
  return normalized === "" ? [] : normalized.split(" ");
}

/** Strips one inflectional ending, keeping at least three characters. */
export function stem(word: string): string {
  if (word.length <= MIN_STEM) {
    return word;
  }
  for (const ending of ENDINGS) {
    if (word.endsWith(ending) && word.length - ending.length >= MIN_STEM) {
      return word.slice(0, -ending.length);
    }
  }
  return word;
}

/** True when `phrase` occurs in `text` as a whole run of tokens. Both must be normalized. */
export function containsPhrase(text: string, phrase: string): boolean {
  if (phrase === "") {
    return false;
  }
  return ` ${text} `.includes(` ${phrase} `);
}

/** Every run of digits as its own integer, in reading order. */
export function extractInts(text: string): number[] {
  const out: number[] = [];
  for (const match of text.matchAll(/\d+/g)) {
    const value = Number(match[0]);
    if (Number.isSafeInteger(value)) {
      out.push(value);
    }
  }
  return out;
}

const AMOUNT =
  /(?<!\d)(\d{1,3}(?:[ \u00a0\u202f.,]\d{3})+(?!\d)|\d+[.,]\d{1,2}(?!\d)|\d+)(?:\s*(тис\p{L}*|тыс\p{L}*|k|к|млн\p{L}*|мільйон\p{L}*|миллион\p{L}*)(?!\p{L}))?/giu;
const DECIMAL = /^\d+[.,]\d{1,2}$/;
const RANGE_GAP = /^\s*(?:-|–|—|до|по)\s*$/u;

type AmountToken = { raw: number; multiplier?: number; start: number; end: number };

function multiplierOf(suffix: string): number {
  return /^(?:млн|мільйон|миллион)/iu.test(suffix) ? 1_000_000 : 1000;
}

// Thousands apply from ten upwards so that "2к" keeps meaning two rooms.
function scale(raw: number, multiplier: number): number {
  if (multiplier === 1000 && raw < 10 && Number.isInteger(raw)) {
    return raw;
  }
  return Math.round(raw * multiplier);
}

/**
 * Money amounts: grouped thousands ("50 000", "1.500.000"), a thousands or
 * millions suffix ("45 тис", "1,5 млн"), and a suffix shared by both ends
 * of a range ("від 40 до 60 тис").
 */
export function extractAmounts(text: string): number[] {
  const tokens: AmountToken[] = [];
  for (const match of text.matchAll(AMOUNT)) {
    const digits = match[1];
    const raw = DECIMAL.test(digits) ? Number(digits.replace(",", ".")) : Number(digits.replace(/\D/g, ""));
    const start = match.index ?? 0;
    tokens.push({
      raw,
      multiplier: match[2] ? multiplierOf(match[2]) : undefined,
      start,
      end: start + digits.length
    });
  }

  const out: number[] = [];
  tokens.forEach((token, i) => {
    let value = token.multiplier === undefined ? token.raw : scale(token.raw, token.multiplier);
    const next = tokens[i + 1];
    if (
      token.multiplier === undefined &&
      next?.multiplier !== undefined &&
      token.raw <= next.raw &&
      RANGE_GAP.test(text.slice(token.end, next.start))
    ) {
      value = scale(token.raw, next.multiplier);
    }
    if (Number.isSafeInteger(value)) {
      out.push(value);
    }
  });
  return out;
}

export function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

export function splitList(value: string, separator: string | RegExp = ","): string[] {
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part !== "");
}
