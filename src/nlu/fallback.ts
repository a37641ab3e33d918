import { isSlotAnswered, type Criteria } from "../criteria.js";
import { extractInts } from "./normalize.js";

/**
 * Last resort for bare numbers, scanned in ascending order: 1..7 is a room
 * count, 20..500 an area bound, above 500 a price. Each category fills once
 * and only when the criteria do not already hold it. A number that fits two
 * categories goes to the first one in that order.
 */
export function numericFallback(text: string, existing: Criteria): Criteria {
  const values = extractInts(text).sort((a, b) => a - b);
  const update: Criteria = {};
  const roomsOpen = !isSlotAnswered(existing, "rooms");
  const areaOpen = !isSlotAnswered(existing, "area");
  const priceOpen = !isSlotAnswered(existing, "price");
  const areas: number[] = [];
  const prices: number[] = [];

  for (const value of values) {
    if (value >= 1 && value <= 7) {
      if (roomsOpen && !update.rooms_in) update.rooms_in = [value];
    } else if (value >= 20 && value <= 500) {
      if (areaOpen && areas.length < 2) areas.push(value);
    } else if (value > 500) {
      if (priceOpen && prices.length < 2) prices.push(value);
    }
  }

  if (areas.length > 0) update.area_min = areas[0];
  if (areas.length > 1) update.area_max = areas[1];
  if (prices.length === 1) update.price_max = prices[0];
  if (prices.length > 1) {
    update.price_min = prices[0];
    update.price_max = prices[1];
  }
  return update;
}
