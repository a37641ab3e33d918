import { isRecord } from "../values.js";

const ZERO_WIDTH = /[\u200B\u200C\u200D\u2060\uFEFF]/g;
export const MAX_PHOTOS = 4;

export function cleanUrl(value: string): string {
  return value.replace(ZERO_WIDTH, "").replace(/[\r\n]/g, "").trim();
}

function parseJsonArray(value: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

function photoEntries(raw: unknown): unknown[] {
  if (typeof raw === "string") {
    return raw.trim().startsWith("[") ? parseJsonArray(raw) : [raw];
  }
  if (Array.isArray(raw)) {
    return raw.flatMap((entry) =>
      typeof entry === "string" && entry.trim().startsWith("[") ? parseJsonArray(entry) : [entry]
    );
  }
  return [];
}

/** Absolute https URL for a stored photo name. */
export function absolutizeMedia(name: string, mediaBase: string): string {
  let url = cleanUrl(name);
  if (url === "") {
    return "";
  }
  if (url.startsWith("http://")) {
    url = `https://${url.slice("http://".length)}`;
  }
  if (url.startsWith("https://") || mediaBase === "") {
    return url;
  }
  return new URL(url.replace(/^\/+/, ""), `${mediaBase.replace(/\/+$/, "")}/`).toString();
}

/**
 * Photo URLs from a listing's `photos` field: a JSON string, a list holding
 * a JSON string, a list of URLs, or a list of `{ name | url }` objects.
 */
export function extractPhotos(photos: unknown, mediaBase: string, limit = MAX_PHOTOS): string[] {
  const urls: string[] = [];
  for (const entry of photoEntries(photos)) {
    let name = "";
    if (typeof entry === "string") {
      name = entry;
    } else if (isRecord(entry)) {
      const value = entry.name ?? entry.url;
      name = typeof value === "string" ? value : "";
    }
    const url = absolutizeMedia(name, mediaBase);
    if (url !== "" && !urls.includes(url)) {
      urls.push(url);
    }
    if (urls.length >= limit) {
      break;
    }
  }
  return urls;
}
