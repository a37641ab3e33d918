import type { Criteria } from "../criteria.js";
import type { LocationKind, LookupTables } from "../lookups.js";
import { copyText } from "../dialog/copy.js";
import { escapeHtml, formatPrice } from "./telegram.js";

function names(ids: readonly number[] | undefined, kind: LocationKind, tables: LookupTables): string | undefined {
  if (!ids || ids.length === 0) {
    return undefined;
  }
  return ids.map((id) => tables.locationNames[kind].get(id) ?? `#${id}`).join(", ");
}

function span(min: number | null | undefined, max: number | null | undefined, unit = "", money = false): string | undefined {
  const fmt = (n: number) => (money ? formatPrice(n) : String(n)) + unit;
  const hasMin = typeof min === "number" && min > 0;
  const hasMax = typeof max === "number" && max > 0;
  if (hasMin && hasMax) return min === max ? fmt(min) : `${fmt(min)} – ${fmt(max)}`;
  if (hasMin) return `від ${fmt(min)}`;
  if (hasMax) return `до ${fmt(max)}`;
  return undefined;
}

/** Multi-line human summary of the collected criteria. */
export function summarizeCriteria(criteria: Criteria, tables: LookupTables): string {
  const lines: string[] = [];
  const push = (label: string, value: string | undefined) => {
    if (value) lines.push(`• ${label}: ${escapeHtml(value)}`);
  };

  push("Вулиця", names(criteria.street_id, "street", tables));
  push("Мікрорайон", names(criteria.microarea_id, "microarea", tables));
  push("Район", names(criteria.district_id, "district", tables));
  if (criteria.rooms_in && criteria.rooms_in.length > 0) {
    push("Кімнат", [...criteria.rooms_in].sort((a, b) => a - b).join(", "));
  }
  push("Бюджет", span(criteria.price_min, criteria.price_max, "", true));
  push("Площа", span(criteria.area_min, criteria.area_max, " м²"));
  push("Поверх", criteria.floor_only_last ? "останній" : span(criteria.floor_min, criteria.floor_max));
  push("Поверховість", span(criteria.floors_total_min, criteria.floors_total_max));
  if (criteria.condition_in && criteria.condition_in.length > 0) {
    const labels = criteria.condition_in.map(
      (id) => tables.conditions.find((group) => group.id === id)?.label ?? `#${id}`
    );
    push("Стан", labels.join(", "));
  }
  push("Розділ", criteria.section);

  return lines.length > 0 ? lines.join("\n") : copyText(tables, "summary_empty");
}
