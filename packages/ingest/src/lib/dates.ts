import { format, isValid, parse, parseISO, subDays } from "date-fns";
import { normalizeWhitespace } from "./normalize";

const MONTHS =
  "Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?";

/**
 * First date-shaped substring of free text: `May 5, 2024`, `Sept. 12, 2023`,
 * `2024-05-01` or `5 January 2024`.
 */
export const DATE_PATTERN = new RegExp(
  `\\b(?:on\\s+)?((?:${MONTHS})\\.?\\s+\\d{1,2},\\s+\\d{4}|\\d{4}-\\d{2}-\\d{2}|\\d{1,2}\\s+(?:${MONTHS})\\.?\\s+\\d{4})(?!\\d)`,
  "i",
);

const ISO_PREFIX = /^(\d{4}-\d{2}-\d{2})(?=$|[T\s])/;
const RFC_822 = /^[A-Za-z]{3},\s*(\d{1,2}\s+[A-Za-z]+\s+\d{4})(?:\s|$)/;
const MONTH_NAME_FORMATS = ["MMMM d, yyyy", "MMMM d yyyy", "d MMMM yyyy", "d MMMM, yyyy"];
// Slash dates are read month first.
const NUMERIC_FORMATS = ["yyyy/M/d", "M/d/yyyy", "yyyyMMdd"];
const NUMERIC_DATE = /^(?:\d{4}\/\d{1,2}\/\d{1,2}|\d{1,2}\/\d{1,2}\/\d{4}|\d{8})$/;
const REFERENCE_DATE = new Date(2000, 0, 1);

const CALENDAR_FORMAT = "yyyy-MM-dd";

const parseIsoDay = (value: string) => {
  const parsed = parseISO(value);
  return isValid(parsed) ? format(parsed, CALENDAR_FORMAT) : null;
};

const parseWithFormats = (value: string, patterns: string[]) => {
  for (const pattern of patterns) {
    const parsed = parse(value, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, CALENDAR_FORMAT);
    }
  }
  return null;
};

const parseMonthName = (value: string) => {
  const cleaned = normalizeWhitespace(
    value
      .replace(/\bsept\b/gi, "Sep")
      .replace(/([A-Za-z]{3,})\./g, "$1"),
  );
  return parseWithFormats(cleaned, MONTH_NAME_FORMATS);
};

/**
 * Parses a date string into an ISO calendar date (`YYYY-MM-DD`), keeping the
 * calendar day as written. Returns null for empty or unparsable input.
 */
export const parseCalendarDate = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  const iso = trimmed.match(ISO_PREFIX);
  if (iso) {
    return parseIsoDay(iso[1]);
  }

  if (NUMERIC_DATE.test(trimmed)) {
    return parseWithFormats(trimmed, NUMERIC_FORMATS);
  }

  const rfc = trimmed.match(RFC_822);
  if (rfc) {
    return parseMonthName(rfc[1]);
  }

  const direct = parseMonthName(trimmed);
  if (direct) {
    return direct;
  }

  const embedded = trimmed.match(DATE_PATTERN);
  if (embedded && embedded[1] !== trimmed) {
    return parseCalendarDate(embedded[1]);
  }

  return null;
};

export const toCalendarDate = (date: Date) => date.toISOString().slice(0, 10);

export const shiftCalendarDate = (calendarDate: string, days: number) =>
  format(subDays(parseISO(calendarDate), days), CALENDAR_FORMAT);

/** First calendar day (UTC) of a trailing window of `days` days ending today. */
export const windowStart = (now: Date, days: number) =>
  shiftCalendarDate(toCalendarDate(now), days);

export const calendarYear = (calendarDate: string) => Number(calendarDate.slice(0, 4));
