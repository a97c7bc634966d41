import { DateTime } from "luxon";
import { CalendarDate } from "./calendar-date.js";
import type { DateTriple } from "./calendar-date.js";
import { FormatError } from "./errors.js";

export type DateInput = CalendarDate | DateTime | Date | DateTriple | number | string;

// Integers at or above this read as YYYYMMDD, smaller positive ones as spreadsheet serials.
const YMD_INT_THRESHOLD = 10000101;

const DATE_FORMATS: readonly { pattern: RegExp; format: string }[] = [
  { pattern: /^\d{8}$/, format: "yyyyMMdd" },
  { pattern: /^\d{4}-\d{2}-\d{2}$/, format: "yyyy-MM-dd" },
  { pattern: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: "d.M.yyyy" },
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: "M/d/yyyy" },
];

export const DATE_LITERAL_SOURCE = "\\d{8}|\\d{4}-\\d{2}-\\d{2}|\\d{1,2}\\.\\d{1,2}\\.\\d{4}|\\d{1,2}/\\d{1,2}/\\d{4}";

export function isDateLiteral(text: string): boolean {
  const trimmed = text.trim();
  return DATE_FORMATS.some(({ pattern }) => pattern.test(trimmed));
}

// Parse any supported date representation into a CalendarDate
export function parseDate(input: DateInput): CalendarDate {
  if (input instanceof CalendarDate) {
    return input;
  }
  if (input instanceof DateTime) {
    return CalendarDate.fromDateTime(input);
  }
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new FormatError("Invalid Date", input);
    }
    return CalendarDate.of(input.getUTCFullYear(), input.getUTCMonth() + 1, input.getUTCDate());
  }
  if (Array.isArray(input)) {
    if (input.length !== 3) {
      throw new FormatError("date triple must have exactly three entries", input);
    }
    return CalendarDate.fromTriple(input);
  }
  if (typeof input === "number") {
    return parseNumericDate(input);
  }
  if (typeof input === "string") {
    return parseDateString(input);
  }
  throw new FormatError("Unsupported date input", input);
}

function parseNumericDate(value: number): CalendarDate {
  if (!Number.isInteger(value) || value <= 0) {
    throw new FormatError(`Invalid numeric date: ${value}`, value);
  }
  if (value >= YMD_INT_THRESHOLD) {
    return CalendarDate.fromYmdInt(value);
  }
  try {
    return CalendarDate.fromExcel(value);
  } catch (error) {
    throw new FormatError(
      `Invalid numeric date: ${value} (${error instanceof Error ? error.message : "out of range"})`,
      value,
    );
  }
}

function parseDateString(text: string): CalendarDate {
  const trimmed = text.trim();
  const match = DATE_FORMATS.find(({ pattern }) => pattern.test(trimmed));
  if (!match) {
    throw new FormatError(`Unrecognised date literal: ${text}`, text);
  }

  const parsed = DateTime.fromFormat(trimmed, match.format, { zone: "utc" });
  if (!parsed.isValid) {
    throw new FormatError(`Invalid date: ${text}`, text);
  }
  return CalendarDate.of(parsed.year, parsed.month, parsed.day);
}
