export type NameExtraction = { name?: string; rest: string };

const GREETING =
  /^(?:привіт|привет|добрий день|добрый день|доброго дня|вітаю|здравствуйте|доброго ранку|добрий вечір)(?!\p{L})[\s,!.]*/iu;
const INTRO =
  /^(?:мене звати|меня зовут|моє ім['’`ʼ]?я|мое имя|моё имя|звати мене|я)\s+([\p{L}'’ʼ-]+)[\s,.!-]*(.*)$/isu;
const LEADING_NAME = /^([\p{L}'’ʼ-]+(?:\s+[\p{L}'’ʼ-]+)?)\s*(?:,|\s[-–—]\s)\s*(.*)$/su;
const WORD = /^[\p{L}'’ʼ-]+$/u;
const MAX_NAME = 40;

function tidy(raw: string): string | undefined {
  const name = raw.replace(/^[-'’ʼ]+|[-'’ʼ]+$/gu, "").trim();
  if (name === "" || name.length > MAX_NAME || !/\p{L}/u.test(name)) {
    return undefined;
  }
  return name
    .split(/\s+/)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

/**
 * Pulls a display name from the first reply. Drops a leading greeting, then
 * tries "мене звати X" or "я X", "X, ..." and "X - ...", and finally the
 * first word. A bare greeting gives no name.
 */
export function extractName(text: string): NameExtraction {
  const trimmed = text.trim().replace(GREETING, "");

  const intro = INTRO.exec(trimmed);
  if (intro) {
    return { name: tidy(intro[1]), rest: intro[2].trim() };
  }

  const leading = LEADING_NAME.exec(trimmed);
  if (leading) {
    return { name: tidy(leading[1]), rest: leading[2].trim() };
  }

  const [first = "", ...others] = trimmed.split(/\s+/);
  const word = first.replace(/[,.!?;:]+$/u, "");
  if (!WORD.test(word)) {
    return { rest: trimmed };
  }
  return { name: tidy(word), rest: others.join(" ") };
}
