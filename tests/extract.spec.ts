import { extractAll, extractFilters, matchConditions } from "../src/nlu/extract.js";
import { matchLocations, splitLocationParts } from "../src/nlu/location.js";
import { matchPatternRule } from "../src/nlu/patterns.js";
import { detectSection } from "../src/nlu/section.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { loadTestTables } from "./helpers/harness.js";
import { test } from "./helpers/runner.js";

const tables = await loadTestTables();

test("location parts borrow the street name for bare ordinals", () => {
  assertDeepEqual(splitLocationParts("Сумська 5-й, 7-й"), ["Сумська 5-й", "Сумська 7-й"], "ordinal merge");
  assertDeepEqual(splitLocationParts("центр; Салтівка"), ["центр", "Салтівка"], "semicolon split");
});

test("locations resolve by exact street name and by stems", () => {
  assertDeepEqual(
    matchLocations("Героїв Праці", tables),
    { street_id: [103], microarea_id: [], district_id: [] },
    "exact multi-word street"
  );
  assertDeepEqual(
    matchLocations("Олексіївка, Салтівка", tables),
    { street_id: [], microarea_id: [11], district_id: [2] },
    "microarea and district together"
  );
  assertDeepEqual(
    matchLocations("у центрі або на Сумській", tables),
    { street_id: [101], microarea_id: [], district_id: [] },
    "a street makes the result street-only"
  );
});

test("price heuristics read ranges and open bounds", () => {
  assertDeepEqual(
    extractFilters("price", "від 30000 до 45000", tables),
    { matched: true, update: { price_min: 30000, price_max: 45000 }, via: "heuristic" },
    "range"
  );
  assertDeepEqual(
    extractFilters("price", "до 40к", tables),
    { matched: true, update: { price_max: 40000, price_min: null }, via: "heuristic" },
    "upper bound"
  );
  assertDeepEqual(
    extractFilters("price", "від 20 тис", tables),
    { matched: true, update: { price_min: 20000, price_max: null }, via: "heuristic" },
    "lower bound"
  );
  assertDeepEqual(
    extractFilters("price", "дешево", tables),
    { matched: true, update: { price_min: null, price_max: 30000 }, via: "pattern" },
    "configured phrase wins"
  );
});

test("price heuristics share a suffix across a range and read millions", () => {
  assertDeepEqual(
    extractFilters("price", "від 40 до 60 тис", tables),
    { matched: true, update: { price_min: 40000, price_max: 60000 }, via: "heuristic" },
    "suffix on the upper end only"
  );
  assertDeepEqual(
    extractFilters("price", "до 2 млн", tables),
    { matched: true, update: { price_max: 2000000, price_min: null }, via: "heuristic" },
    "millions"
  );
  assertDeepEqual(
    extractFilters("price", "від 1,5 до 2 млн", tables),
    { matched: true, update: { price_min: 1500000, price_max: 2000000 }, via: "heuristic" },
    "fractional millions"
  );
});

test("room heuristics need a keyword in browsing mode", () => {
  assertDeepEqual(extractFilters("rooms", "2-3 кімнати", tables), { matched: true, update: { rooms_in: [2, 3] }, via: "heuristic" }, "range");
  assertDeepEqual(extractFilters("rooms", "однушка", tables), { matched: true, update: { rooms_in: [1] }, via: "pattern" }, "word rule");
  assertDeepEqual(extractFilters("rooms", "3", tables), { matched: true, update: { rooms_in: [3] }, via: "heuristic" }, "bare answer");
  assertDeepEqual(
    extractFilters("rooms", "2к квартира", tables, { opportunistic: true }),
    { matched: true, update: { rooms_in: [2] }, via: "heuristic" },
    "short keyword"
  );
  assertDeepEqual(extractFilters("rooms", "2", tables, { opportunistic: true }), { matched: false }, "bare number in browsing");
  assertDeepEqual(extractFilters("rooms", "на 5-му поверсі", tables), { matched: false }, "ordinal floor is not rooms");
});

test("area heuristics", () => {
  assertDeepEqual(extractFilters("area", "від 50 м²", tables), { matched: true, update: { area_min: 50, area_max: null }, via: "heuristic" }, "min");
  assertDeepEqual(extractFilters("area", "40-60 метрів", tables), { matched: true, update: { area_min: 40, area_max: 60 }, via: "heuristic" }, "range");
  assertDeepEqual(
    extractFilters("area", "велика квартира", tables),
    { matched: true, update: { area_min: 80, area_max: null }, via: "pattern" },
    "special rule"
  );
  assertDeepEqual(extractFilters("area", "квартира 45", tables, { opportunistic: true }), { matched: false }, "no unit in browsing");
});

test("area and floor bounds are inclusive", () => {
  assertDeepEqual(extractFilters("area", "15", tables), { matched: true, update: { area_min: 15, area_max: null }, via: "heuristic" }, "area 15");
  assertDeepEqual(extractFilters("area", "500", tables), { matched: true, update: { area_min: 500, area_max: null }, via: "heuristic" }, "area 500");
  assertDeepEqual(extractFilters("area", "14", tables), { matched: false }, "area 14");
  assertDeepEqual(extractFilters("area", "501", tables), { matched: false }, "area 501");

  assertDeepEqual(extractFilters("floor", "1", tables), { matched: true, update: { floor_min: 1, floor_max: 1 }, via: "heuristic" }, "floor 1");
  assertDeepEqual(extractFilters("floor", "50", tables), { matched: true, update: { floor_min: 50, floor_max: 50 }, via: "heuristic" }, "floor 50");
  assertDeepEqual(extractFilters("floor", "0", tables), { matched: false }, "floor 0");
  assertDeepEqual(extractFilters("floor", "51", tables), { matched: false }, "floor 51");
});

test("floor and building height heuristics", () => {
  assertDeepEqual(extractFilters("floor", "3-5 поверх", tables), { matched: true, update: { floor_min: 3, floor_max: 5 }, via: "heuristic" }, "range");
  assertDeepEqual(extractFilters("floor", "до 7 поверху", tables), { matched: true, update: { floor_min: 1, floor_max: 7 }, via: "heuristic" }, "upper bound");
  assertDeepEqual(extractFilters("floor", "останній", tables), { matched: true, update: { floor_only_last: true }, via: "pattern" }, "last floor");
  assertDeepEqual(extractFilters("floor", "будь-який поверх", tables), { matched: true, update: {}, via: "pattern" }, "skip rule");
  assertDeepEqual(
    extractFilters("floors_total", "у 9-поверховому будинку", tables, { opportunistic: true }),
    { matched: true, update: { floors_total_min: 9, floors_total_max: 9 }, via: "heuristic" },
    "building height"
  );
});

test("floor keyword is not borrowed from a later clause", () => {
  assertDeepEqual(
    extractAll("2-3 кімнати, 5 поверх", tables),
    { rooms_in: [2, 3], floor_min: 5, floor_max: 5 },
    "room range stays rooms"
  );
});

test("room rules outside one to seven rooms are passed over", () => {
  assertEqual(
    matchPatternRule("rooms", "пентхаус", [{ slot: "rooms", type: "word", keywords: ["пентхаус"], min: 9 }]),
    undefined,
    "out of range value"
  );
  const hit = matchPatternRule("rooms", "пентхаус", [
    { slot: "rooms", type: "word", keywords: ["пентхаус"], list: "0, 3, 12" },
    { slot: "rooms", type: "word", keywords: ["пентхаус"], min: 4 }
  ]);
  assert(hit !== undefined, "listed rule matches");
  assertDeepEqual(hit.update, { rooms_in: [3] }, "only valid counts kept");
});

test("conditions and sections come from the tables", () => {
  assertDeepEqual(matchConditions("житловий стан або євро", tables), [1, 2], "two groups in table order");
  assertEqual(detectSection("хочу купити", tables), "sale", "sale");
  assertEqual(detectSection("зняти квартиру", tables), "rent", "rent");
  assertEqual(detectSection("просто дивлюсь", tables), undefined, "no section");
  assertDeepEqual(extractFilters("district", "Салтівка", tables), { matched: true, update: { district_id: [2] }, via: "heuristic" }, "district slot");
});

test("extractAll reads several slots from one message", () => {
  assertDeepEqual(
    extractAll("2 кімнати на Сумській до 40000, 3-5 поверх", tables),
    {
      street_id: [101],
      explicit_street: true,
      price_max: 40000,
      price_min: null,
      rooms_in: [2],
      floor_min: 3,
      floor_max: 5
    },
    "street, price, rooms and floors"
  );
  assertDeepEqual(
    extractAll("Однушка в центрі, євроремонт, останній поверх", tables),
    { district_id: [1], rooms_in: [1], floor_only_last: true, condition_in: [1] },
    "patterns and condition"
  );
  assertDeepEqual(extractAll("добрий день", tables), {}, "nothing to read");
});
