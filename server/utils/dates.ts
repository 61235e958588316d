import { format, isValid, parse, parseISO } from "date-fns";

/**
 * Formats tried, in order, for catalog date cells that are not ISO.
 * Numeric dates are read month-first, the way the sheet is kept.
 */
const CATALOG_DATE_FORMATS = [
  "yyyy-MM-dd HH:mm:ss",
  "M/d/yyyy",
  "M/d/yy",
  "yyyy/MM/dd",
  "MMMM d, yyyy",
  "MMM d, yyyy",
  "d MMMM yyyy",
  "d MMM yyyy",
];

const DISPLAY_FORMAT = "yyyy-MM-dd";

/**
 * Strict ISO date (as produced by the intent model). Null when absent or unparsable.
 */
export function parseIsoDate(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  const date = parseISO(value.trim());
  return isValid(date) ? date : null;
}

/**
 * Lenient parse of a catalog date cell. Unparsable cells become null, never an error.
 */
export function parseCatalogDate(value: string | null | undefined): Date | null {
  if (!value || value.trim() === "") return null;
  const text = value.trim();

  const iso = parseISO(text);
  if (isValid(iso)) return iso;

  const reference = new Date(2000, 0, 1);
  for (const pattern of CATALOG_DATE_FORMATS) {
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

export function formatDisplayDate(date: Date | null): string {
  return date && isValid(date) ? format(date, DISPLAY_FORMAT) : "N/A";
}

export function formatIsoDay(date: Date): string {
  return format(date, DISPLAY_FORMAT);
}
