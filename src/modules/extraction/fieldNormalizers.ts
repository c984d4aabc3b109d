import type { FieldDefinition, FieldValue } from "./extraction.types";

const MONTHS: Record<string, number> = {
  january: 1, januar: 1, jan: 1,
  february: 2, februar: 2, feb: 2,
  march: 3, märz: 3, maerz: 3, mar: 3,
  april: 4, apr: 4,
  may: 5, mai: 5,
  june: 6, juni: 6, jun: 6,
  july: 7, juli: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oktober: 10, oct: 10, okt: 10,
  november: 11, nov: 11,
  december: 12, dezember: 12, dec: 12, dez: 12,
};

const DAY_MS = 86_400_000;
const DAYS_PER_MONTH = 30.4375;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/** Accepts ISO, dd.mm.yyyy, mm/yyyy and "June 2023" forms; returns YYYY-MM-DD. */
export function normalizeDate(input: string): string | null {
  const text = input.trim().toLowerCase();

  const iso = text.match(/\b(\d{4})-(\d{2})-(\d{2})\b/);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const european = text.match(/\b(\d{1,2})[./](\d{1,2})[./](\d{4})\b/);
  if (european) {
    return toIsoDate(Number(european[3]), Number(european[2]), Number(european[1]));
  }

  const monthYear = text.match(/\b(\d{1,2})[./](\d{4})\b/);
  if (monthYear) {
    return toIsoDate(Number(monthYear[2]), Number(monthYear[1]), 1);
  }

  const named = text.match(/\b([a-zä]+)\.?\s+(\d{4})\b/);
  if (named) {
    const month = MONTHS[named[1] ?? ""];
    if (month) {
      return toIsoDate(Number(named[2]), month, 1);
    }
  }

  return null;
}

export function findDateTokens(text: string): string[] {
  const tokens = text.match(/\b\d{4}-\d{2}-\d{2}\b|\b\d{1,2}[./]\d{1,2}[./]\d{4}\b/g) ?? [];
  const dates = tokens
    .map((token) => normalizeDate(token))
    .filter((value): value is string => value !== null);
  return Array.from(new Set(dates));
}

export function parseLocaleNumber(input: string): number | null {
  const match = input.match(/-?\d+(?:[.,]\d+)?/);
  if (!match) {
    return null;
  }
  const parsed = Number(match[0].replace(",", "."));
  return Number.isFinite(parsed) ? parsed : null;
}

export function monthsBetween(startIso: string, endIso: string): number | null {
  const start = Date.parse(`${startIso}T00:00:00Z`);
  const end = Date.parse(`${endIso}T00:00:00Z`);
  if (!Number.isFinite(start) || !Number.isFinite(end) || end < start) {
    return null;
  }
  return Math.round((end - start) / DAY_MS / DAYS_PER_MONTH);
}

/** Coerces a raw value into the field's kind; anything unusable becomes null. */
export function coerceFieldValue(field: FieldDefinition, value: unknown): FieldValue {
  if (value === null || value === undefined) {
    return null;
  }
  switch (field.kind) {
    case "number":
      if (typeof value === "number") {
        return Number.isFinite(value) ? value : null;
      }
      return typeof value === "string" ? parseLocaleNumber(value) : null;
    case "date":
      return typeof value === "string" ? normalizeDate(value) : null;
    case "text": {
      if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
      }
      if (typeof value !== "string") {
        return null;
      }
      const trimmed = value.trim();
      return trimmed.length > 0 ? trimmed : null;
    }
  }
}
