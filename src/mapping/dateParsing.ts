import { format, isValid, parse } from "date-fns";

/**
 * Classification of free-text `date` values.
 *
 * Order: range start, bare year, full calendar date, year anywhere in the
 * text, raw text. Numeric dates are read day-first.
 */

export type DateClassification =
  | { kind: "gYear"; value: string }
  | { kind: "dateTime"; value: string }
  | { kind: "plain"; value: string };

const RANGE_SEPARATOR = /\s*[-–—]\s*/;
const BARE_YEAR = /^\d{4}$/;
const YEAR_ANYWHERE = /\b(1[5-9]\d{2}|20\d{2}|2100)\b/;
const ISO_WITH_TIME = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}/;

const DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "yyyy.MM.dd",
  "d.M.yyyy",
  "d. M. yyyy",
  "d/M/yyyy",
  "d-M-yyyy",
  "d MMMM yyyy",
  "d. MMMM yyyy",
  "d MMM yyyy",
  "MMMM d, yyyy",
  "MMMM d yyyy",
  "MMM d, yyyy",
  "MMM d yyyy",
  "EEEE, MMMM d, yyyy",
];

// Fixed reference so unparsed parts never borrow today's date.
const REFERENCE = new Date(2000, 0, 1);

/** Start of a two-part range such as `1999-2001`; undefined for anything else. */
export function rangeStart(text: string): string | undefined {
  if (!RANGE_SEPARATOR.test(text)) return undefined;
  const parts = text.split(RANGE_SEPARATOR);
  if (parts.length !== 2 || !parts[0] || !parts[1]) return undefined;
  return parts[0];
}

/** Parses a full calendar date and returns its `yyyy-MM-dd` form. */
export function parseCalendarDate(text: string): string | undefined {
  const iso = ISO_WITH_TIME.exec(text);
  const candidate = iso ? iso[1] : text;
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(candidate, pattern, REFERENCE);
    if (isValid(parsed)) return format(parsed, "yyyy-MM-dd");
  }
  return undefined;
}

export function classifyDate(raw: string): DateClassification {
  const text = raw.trim();
  const candidate = rangeStart(text) ?? text;

  if (BARE_YEAR.test(candidate)) return { kind: "gYear", value: candidate };

  const calendar = parseCalendarDate(candidate);
  if (calendar) return { kind: "dateTime", value: calendar };

  const year = YEAR_ANYWHERE.exec(candidate) ?? YEAR_ANYWHERE.exec(text);
  if (year) return { kind: "gYear", value: year[1] };

  return { kind: "plain", value: raw };
}
