import type { ShownListing } from "../src/dialog/types.js";
import { describeSelection, resolveSelection } from "../src/dialog/viewing.js";
import { assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

const SHOWN: ShownListing[] = [
  { displayIndex: 1, listingId: 501, title: "2-кімнатна квартира", address: "вул. Сумська 10, Центральний" },
  { displayIndex: 2, listingId: 507, title: "2-кімнатна квартира", address: "вул. Пушкінська 40, Центральний" },
  { displayIndex: 3, listingId: 505, title: "2-кімнатна квартира", address: "вул. Сумська 50, Центральний" },
  { displayIndex: 4, listingId: 501, title: "2-кімнатна квартира", address: "вул. Сумська 10, Центральний" }
];

const ids = (items: ShownListing[]) => items.map((item) => item.listingId);

test("display numbers select listings", () => {
  assertDeepEqual(ids(resolveSelection("1 і 3", SHOWN)), [501, 505], "by number");
  assertDeepEqual(ids(resolveSelection("№1 та №4", SHOWN)), [501], "same listing shown twice");
});

test("addresses select listings by street and house", () => {
  assertDeepEqual(ids(resolveSelection("на Сумській 50", SHOWN)), [505], "street and house");
  assertDeepEqual(ids(resolveSelection("Сумська", SHOWN)), [501, 505], "street only");
  assertDeepEqual(ids(resolveSelection("пушкінська", SHOWN)), [507], "lowercase");
  assertDeepEqual(ids(resolveSelection("перегляд 9", SHOWN)), [], "unknown number and word");
  assertDeepEqual(ids(resolveSelection("на", SHOWN)), [], "short words ignored");
});

test("selection description lists display numbers", () => {
  assertEqual(describeSelection([SHOWN[0], SHOWN[2]]), "№1, №3", "description");
});
