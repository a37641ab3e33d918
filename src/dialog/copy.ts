import type { LookupTables } from "../lookups.js";

export const DEFAULT_COPY = {
  greeting: "Вітаю! Я допоможу підібрати квартиру.",
  ask_name: "Як до вас звертатися?",
  welcome_back: "Радий знову бачити, {name}! Розкажіть, яку квартиру шукаєте.",
  name_saved: "Приємно познайомитися, {name}! Опишіть, яку квартиру шукаєте: район, кількість кімнат, бюджет.",
  name_saved_short: "Приємно познайомитися, {name}!",
  need_parameter: "Вкажіть хоча б один параметр: район, кількість кімнат або бюджет.",
  not_understood: "Не зовсім зрозумів. Уточніть, будь ласка, район, кімнати чи бюджет.",
  clarify_pending: "Не вдалося розпізнати відповідь. Спробуйте сформулювати інакше.",
  new_search: "Добре, починаємо новий пошук. Що шукаєте?",
  searching: "Шукаю за параметрами:\n{summary}",
  summary: "Ваші параметри:\n{summary}",
  summary_empty: "Параметри не задані",
  no_results: "На жаль, за цими параметрами нічого не знайшлося. Спробуйте змінити умови.",
  no_more: "Більше варіантів немає.",
  remaining_none: "Це всі варіанти за вашим запитом.",
  remaining_some: "Є ще {count} варіантів. Напишіть «ще», щоб побачити наступні.",
  viewing_prompt: "Вкажіть номери об'єктів зі списку (наприклад, 1, 3) або адресу.",
  viewing_nothing_shown: "Спочатку підберемо варіанти. Опишіть, що шукаєте.",
  viewing_not_found: "Не знайшов таких об'єктів. Вкажіть номер зі списку або адресу.",
  viewing_all_duplicates: "Заявку на перегляд {list} ви вже залишали.",
  viewing_some_duplicates: "На {list} заявка вже є, додаю решту.",
  contact_request: "Поділіться номером телефону, щоб домовитися про перегляд {list}.",
  contact_button: "📱 Поділитися контактом",
  contact_retry: "Натисніть кнопку нижче або напишіть номер у форматі 0XXXXXXXXX.",
  contact_thanks: "Дякую! Менеджер зв'яжеться з вами найближчим часом.",
  contact_saved: "Дякую, номер збережено.",
  silence: "Ви ще тут? Можу продовжити пошук або показати нові варіанти.",
  error: "Вибачте, сталася помилка. Спробуйте ще раз."
} as const;

export type CopyKey = keyof typeof DEFAULT_COPY;

/** Copy from the config table, falling back to the built-in text; `{var}` placeholders are filled in. */
export function copyText(tables: LookupTables, key: CopyKey, vars: Record<string, string | number> = {}): string {
  const template = tables.copy.get(key) ?? DEFAULT_COPY[key];
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = vars[name];
    return value === undefined ? match : String(value);
  });
}
