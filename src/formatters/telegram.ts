import type { Listing } from "../listings/types.js";
import { asNumber } from "../values.js";

function truncate(text: string, max = 70): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max - 1).trim()}…`;
}

function formatCurrency(code: string): string {
  const normalized = code.trim().toUpperCase();
  if (normalized === "UAH") {
    return "грн";
  }
  if (normalized === "USD") {
    return "$";
  }
  if (normalized === "EUR") {
    return "€";
  }
  return normalized;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** 45000 -> "45 000" */
export function formatPrice(value: unknown): string {
  const n = asNumber(value);
  if (n === undefined) {
    return "—";
  }
  return String(Math.round(n)).replace(/\B(?=(\d{3})+(?!\d))/g, " ");
}

export function formatListingCard(listing: Listing, displayIndex: number): string {
  const title = escapeHtml(truncate(listing.title || "Квартира"));
  const lines = [`<b>#${displayIndex} ${title}</b>`];

  if (listing.price !== undefined) {
    lines.push(`💸 <b>${formatPrice(listing.price)} ${escapeHtml(formatCurrency(listing.currency))}</b>`);
  }
  if (listing.address) {
    lines.push(`📍 ${escapeHtml(truncate(listing.address, 90))}`);
  }

  const facts: string[] = [];
  if (listing.rooms !== undefined) facts.push(`${listing.rooms} кімн.`);
  if (listing.area !== undefined) facts.push(`${listing.area} м²`);
  if (listing.floor !== undefined) {
    facts.push(listing.floorsTotal !== undefined ? `${listing.floor}/${listing.floorsTotal} пов.` : `${listing.floor} пов.`);
  }
  if (facts.length > 0) {
    lines.push(`🏠 ${facts.join(" • ")}`);
  }

  if (listing.url) {
    lines.push(`<a href="${escapeHtml(listing.url)}">Детальніше</a>`);
  }
  return lines.join("\n");
}
