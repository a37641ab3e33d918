import { transition } from "../src/dialog/machine.js";
import { createSession, type Session, type ShownListing } from "../src/dialog/types.js";
import { assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { loadTestTables } from "./helpers/harness.js";
import { test } from "./helpers/runner.js";

const tables = await loadTestTables();
const ctx = { tables, pageSize: 3, now: 5_000 };

function session(overrides: Partial<Session> = {}): Session {
  return {
    ...createSession({ chatId: 1, userId: 10, dialogId: 20, displayName: "Олена", now: 1_000 }),
    ...overrides
  };
}

const newcomer = (): Session => session({ displayName: null, state: "collecting_name" });

const SHOWN: ShownListing[] = [
  { displayIndex: 1, listingId: 501, title: "2-кімнатна квартира", address: "вул. Сумська 10, Центральний" },
  { displayIndex: 2, listingId: 507, title: "2-кімнатна квартира", address: "вул. Пушкінська 40, Центральний" }
];

test("start greets and asks a newcomer for a name", () => {
  const result = transition(newcomer(), { type: "start" }, ctx);
  assertEqual(result.session.state, "collecting_name", "state");
  assertDeepEqual(result.effects, [{ type: "send", text: "Привіт від тестового агентства!\nЯк до вас звертатися?" }], "effects");
});

test("start welcomes back a known user", () => {
  const result = transition(session(), { type: "start" }, ctx);
  assertEqual(result.session.state, "browsing", "state");
  assertDeepEqual(
    result.effects,
    [{ type: "send", text: "Привіт від тестового агентства!\nРадий знову бачити, Олена! Розкажіть, яку квартиру шукаєте." }],
    "effects"
  );
});

test("name reply alone is saved and acknowledged", () => {
  const result = transition(newcomer(), { type: "text", text: "Мене звати Олена" }, ctx);
  assertEqual(result.session.state, "browsing", "state");
  assertEqual(result.session.displayName, "Олена", "name on session");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_name", name: "Олена" },
      {
        type: "send",
        text: "Приємно познайомитися, Олена! Опишіть, яку квартиру шукаєте: район, кількість кімнат, бюджет."
      }
    ],
    "effects"
  );
});

test("name with a request continues into the search", () => {
  const result = transition(newcomer(), { type: "text", text: "Олена, шукаю однушку на Сумській" }, ctx);
  assertEqual(result.session.state, "collecting_filters", "asks the first open question");
  assertEqual(result.session.currentQuestion, "price", "budget is the only open slot");
  assertDeepEqual(result.session.criteria, { street_id: [101], explicit_street: true, rooms_in: [1] }, "criteria");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_name", name: "Олена" },
      { type: "send", text: "Приємно познайомитися, Олена!" },
      { type: "save_criteria", completed: false },
      { type: "send", text: "Який бюджет?" }
    ],
    "effects"
  );
});

test("a newcomer's first request is replayed after the name", () => {
  const plain = transition(newcomer(), { type: "text", text: "Олена" }, ctx);
  assertEqual(plain.effects.length, 2, "nothing deferred, nothing searched");

  const replayed = transition(
    session({ displayName: null, state: "collecting_name", deferredRequest: "Шукаю однушку на Сумській" }),
    { type: "text", text: "Олена" },
    ctx
  );
  assertEqual(replayed.session.deferredRequest, null, "request consumed");
  assertEqual(replayed.session.currentQuestion, "price", "budget asked");
  assertDeepEqual(replayed.session.criteria, { street_id: [101], explicit_street: true, rooms_in: [1] }, "criteria");
  assertDeepEqual(
    replayed.effects,
    [
      { type: "save_name", name: "Олена" },
      { type: "send", text: "Приємно познайомитися, Олена!" },
      { type: "save_criteria", completed: false },
      { type: "send", text: "Який бюджет?" }
    ],
    "effects"
  );

  const greetingOnly = transition(
    session({ displayName: null, state: "collecting_name", deferredRequest: "привіт" }),
    { type: "text", text: "Олена" },
    ctx
  );
  assertEqual(greetingOnly.session.deferredRequest, null, "greeting dropped");
  assertEqual(greetingOnly.effects.length, 2, "name saved and acknowledged only");
});

test("unreadable name asks again", () => {
  const result = transition(newcomer(), { type: "text", text: "123" }, ctx);
  assertEqual(result.session.state, "collecting_name", "still collecting");
  assertDeepEqual(result.effects, [{ type: "send", text: "Як до вас звертатися?" }], "effects");
});

test("skip on the last open question starts the search", () => {
  const result = transition(
    session({
      state: "collecting_filters",
      currentQuestion: "price",
      askedQuestions: ["price"],
      criteria: { street_id: [101], explicit_street: true, rooms_in: [1] }
    }),
    { type: "text", text: "пропустити" },
    ctx
  );
  assertEqual(result.session.state, "browsing", "back to browsing");
  assertDeepEqual(result.session.skippedSlots, ["price"], "skipped");
  assertEqual(result.session.currentQuestion, null, "question cleared");
  assertDeepEqual(
    result.effects,
    [
      { type: "send", text: "Шукаю за параметрами:\n• Вулиця: вул. Сумська\n• Кімнат: 1" },
      { type: "fetch_listings" }
    ],
    "effects"
  );
});

test("scoped answer fills the asked slot and moves on", () => {
  const result = transition(
    session({ state: "collecting_filters", currentQuestion: "rooms", askedQuestions: ["rooms"], criteria: { district_id: [2] } }),
    { type: "text", text: "3" },
    ctx
  );
  assertDeepEqual(result.session.criteria, { district_id: [2], rooms_in: [3] }, "criteria");
  assertEqual(result.session.currentQuestion, "price", "next question");
  assertDeepEqual(result.session.askedQuestions, ["rooms", "price"], "asked");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_criteria", completed: false },
      { type: "send", text: "Який бюджет?" }
    ],
    "effects"
  );
});

test("objection during questions pins its slot", () => {
  const result = transition(
    session({ state: "collecting_filters", currentQuestion: "rooms", askedQuestions: ["rooms"], criteria: { district_id: [2] } }),
    { type: "text", text: "дорого" },
    ctx
  );
  assertEqual(result.session.currentQuestion, "price", "question switched");
  assertDeepEqual(result.session.askedQuestions, ["rooms", "price"], "asked");
  assertDeepEqual(result.effects, [{ type: "send", text: "Розумію! Який бюджет для вас комфортний?" }], "effects");
});

test("continue intent searches with what is known", () => {
  const result = transition(
    session({ state: "collecting_filters", currentQuestion: "rooms", askedQuestions: ["rooms"], criteria: { district_id: [2] } }),
    { type: "text", text: "показуй" },
    ctx
  );
  assertEqual(result.session.state, "browsing", "state");
  assertDeepEqual(
    result.effects,
    [{ type: "send", text: "Шукаю за параметрами:\n• Район: Салтівський район" }, { type: "fetch_listings" }],
    "effects"
  );
});

test("more pages forward only when criteria exist", () => {
  const empty = transition(session(), { type: "text", text: "ще" }, ctx);
  assertDeepEqual(
    empty.effects,
    [{ type: "send", text: "Вкажіть хоча б один параметр: район, кількість кімнат або бюджет." }],
    "no criteria"
  );

  const paged = transition(session({ criteria: { rooms_in: [2] }, offset: 0 }), { type: "text", text: "Покажіть ще" }, ctx);
  assertEqual(paged.session.offset, 3, "offset advanced by page size");
  assertDeepEqual(paged.effects, [{ type: "fetch_listings" }], "fetch");
});

test("new search clears everything", () => {
  const result = transition(
    session({ criteria: { rooms_in: [2], price_max: 40000 }, offset: 6, skippedSlots: ["district"] }),
    { type: "text", text: "давайте спочатку" },
    ctx
  );
  assertDeepEqual(result.session.criteria, {}, "criteria cleared");
  assertEqual(result.session.offset, 0, "offset reset");
  assertDeepEqual(result.session.skippedSlots, [], "skips cleared");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_criteria", completed: false },
      { type: "send", text: "Добре, починаємо новий пошук. Що шукаєте?" }
    ],
    "effects"
  );
});

test("new search while answering questions returns to browsing", () => {
  const result = transition(
    session({
      state: "collecting_filters",
      criteria: { rooms_in: [2] },
      currentQuestion: "price",
      askedQuestions: ["district", "price"]
    }),
    { type: "text", text: "давайте спочатку" },
    ctx
  );
  assertEqual(result.session.state, "browsing", "state");
  assertEqual(result.session.currentQuestion, null, "no open question");
  assertDeepEqual(result.session.askedQuestions, [], "asked set reset");
  assertDeepEqual(result.session.criteria, {}, "criteria cleared");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_criteria", completed: false },
      { type: "send", text: "Добре, починаємо новий пошук. Що шукаєте?" }
    ],
    "effects"
  );
});

test("pending slot takes the next answer and searches", () => {
  const result = transition(session({ pendingSlot: "price", criteria: { rooms_in: [2] } }), { type: "text", text: "до 35000" }, ctx);
  assertEqual(result.session.pendingSlot, null, "pending cleared");
  assertDeepEqual(result.session.criteria, { rooms_in: [2], price_max: 35000, price_min: null }, "criteria");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_criteria", completed: false },
      { type: "send", text: "Шукаю за параметрами:\n• Кімнат: 2\n• Бюджет: до 35 000" },
      { type: "fetch_listings" }
    ],
    "effects"
  );

  const unclear = transition(session({ pendingSlot: "price" }), { type: "text", text: "не знаю" }, ctx);
  assertEqual(unclear.session.pendingSlot, null, "pending dropped");
  assertDeepEqual(
    unclear.effects,
    [{ type: "send", text: "Не вдалося розпізнати відповідь. Спробуйте сформулювати інакше." }],
    "clarify"
  );
});

test("browsing replies to objections and unreadable text", () => {
  const objection = transition(session(), { type: "text", text: "подумаю" }, ctx);
  assertEqual(objection.session.pendingSlot, null, "objection without a slot pins nothing");
  assertDeepEqual(objection.effects, [{ type: "send", text: "Звісно, я збережу ваш запит." }], "objection response");

  const known = transition(session({ criteria: { rooms_in: [2] } }), { type: "text", text: "ну таке" }, ctx);
  assertDeepEqual(
    known.effects,
    [{ type: "send", text: "Не зовсім зрозумів. Уточніть, будь ласка, район, кімнати чи бюджет." }],
    "not understood"
  );

  const fresh = transition(session(), { type: "text", text: "ну таке" }, ctx);
  assertDeepEqual(
    fresh.effects,
    [{ type: "send", text: "Вкажіть хоча б один параметр: район, кількість кімнат або бюджет." }],
    "needs a parameter"
  );
});

test("browsing text asks the next question after a partial request", () => {
  const original = session({ silenceNotified: true });
  const result = transition(original, { type: "text", text: "2 кімнати" }, ctx);
  assertDeepEqual(original.criteria, {}, "input session untouched");
  assertEqual(result.session.lastActivity, 5_000, "activity stamped");
  assertEqual(result.session.silenceNotified, false, "silence re-armed");
  assertDeepEqual(result.session.criteria, { rooms_in: [2] }, "criteria");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_criteria", completed: false },
      { type: "send", text: "У якому районі шукаєте?" }
    ],
    "effects"
  );
});

test("viewing needs shown listings first", () => {
  const result = transition(session(), { type: "text", text: "хочу на перегляд" }, ctx);
  assertEqual(result.session.state, "browsing", "stays in browsing");
  assertDeepEqual(result.effects, [{ type: "send", text: "Спочатку підберемо варіанти. Опишіть, що шукаєте." }], "effects");

  const ready = transition(session({ shownListings: SHOWN }), { type: "text", text: "хочу на перегляд" }, ctx);
  assertEqual(ready.session.state, "viewing_selection", "selection state");
});

test("viewing selection skips listings already requested", () => {
  const partial = transition(
    session({ state: "viewing_selection", shownListings: SHOWN, requestedListingIds: [507] }),
    { type: "text", text: "1, 2" },
    ctx
  );
  assertEqual(partial.session.state, "viewing_request", "asks for contact");
  assertDeepEqual(partial.session.selectedListingIds, [501], "only the new listing");
  assertDeepEqual(
    partial.effects,
    [
      { type: "send", text: "На №2 заявка вже є, додаю решту." },
      { type: "send", text: "Поділіться номером телефону, щоб домовитися про перегляд №1.", keyboard: "contact" }
    ],
    "effects"
  );

  const repeated = transition(
    session({ state: "viewing_selection", shownListings: SHOWN, requestedListingIds: [501, 507] }),
    { type: "text", text: "1" },
    ctx
  );
  assertEqual(repeated.session.state, "browsing", "nothing new to request");
  assertDeepEqual(repeated.effects, [{ type: "send", text: "Заявку на перегляд №1 ви вже залишали." }], "duplicate notice");

  const missing = transition(session({ state: "viewing_selection", shownListings: SHOWN }), { type: "text", text: "5" }, ctx);
  assertEqual(missing.session.state, "viewing_selection", "still selecting");
  assertDeepEqual(
    missing.effects,
    [{ type: "send", text: "Не знайшов таких об'єктів. Вкажіть номер зі списку або адресу." }],
    "not found"
  );
});

test("typed phone completes a viewing request", () => {
  const result = transition(
    session({ state: "viewing_request", shownListings: SHOWN, selectedListingIds: [501] }),
    { type: "text", text: "мій номер 0501234567" },
    ctx
  );
  assertEqual(result.session.state, "browsing", "back to browsing");
  assertDeepEqual(result.session.requestedListingIds, [501], "requested");
  assertDeepEqual(result.session.selectedListingIds, [], "selection cleared");
  assertDeepEqual(
    result.effects,
    [
      { type: "save_contact", phone: "+380501234567" },
      { type: "record_viewing_request", listingIds: [501] },
      { type: "send", text: "Дякую! Менеджер зв'яжеться з вами найближчим часом.", keyboard: "remove" }
    ],
    "effects"
  );

  const retry = transition(session({ state: "viewing_request", selectedListingIds: [501] }), { type: "text", text: "не хочу" }, ctx);
  assertEqual(retry.session.state, "viewing_request", "still waiting");
  assertDeepEqual(
    retry.effects,
    [{ type: "send", text: "Натисніть кнопку нижче або напишіть номер у форматі 0XXXXXXXXX.", keyboard: "contact" }],
    "retry"
  );
});

test("shared contact outside a viewing request is just saved", () => {
  const result = transition(session(), { type: "contact", phone: "+380501234567" }, ctx);
  assertDeepEqual(
    result.effects,
    [
      { type: "save_contact", phone: "+380501234567" },
      { type: "send", text: "Дякую, номер збережено.", keyboard: "remove" }
    ],
    "effects"
  );
});

test("summary command shows current criteria", () => {
  const result = transition(session(), { type: "summary" }, ctx);
  assertDeepEqual(result.effects, [{ type: "send", text: "Ваші параметри:\nПараметри не задані" }], "empty summary");
});
