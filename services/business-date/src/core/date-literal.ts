import { resolveAdjustmentConvention } from "./adjust.js";
import type { AdjustmentConvention } from "./adjust.js";
import type { CalendarDate } from "./calendar-date.js";
import { DATE_LITERAL_SOURCE, parseDate } from "./date-utils.js";
import { FormatError } from "./errors.js";
import { CLASSICAL_TERMS_SOURCE, parsePeriodFields } from "./period-grammar.js";
import type { PeriodFields } from "./period-grammar.js";

export interface DateLiteral {
  leadingBusinessDays: number | null;
  classical: PeriodFields | null;
  trailingBusinessDays: number | null;
  convention: AdjustmentConvention | null;
  date: CalendarDate | null;
}

const COMBINED_LITERAL = new RegExp(
  "^([+-]?\\d+B)?" +
    `([+-]?${CLASSICAL_TERMS_SOURCE})?` +
    "([+-]?\\d+B)?" +
    "([A-Z][A-Z_-]*)?" +
    `(${DATE_LITERAL_SOURCE})?$`,
);

function businessDayCount(segment: string | undefined): number | null {
  return segment === undefined ? null : Number(segment.slice(0, -1));
}

/**
 * Splits `[<n>B][classical][<n>B][convention][date]`, e.g. `0B3D0BMODFOLLOW20171231`.
 */
export function parseDateLiteral(text: string): DateLiteral {
  const compact = text.toUpperCase().replace(/\s+/g, "");
  const match = COMBINED_LITERAL.exec(compact);
  if (!match || compact === "") {
    throw new FormatError(`Unrecognised date literal: ${text}`, text);
  }

  const [, leading, classical, trailing, convention, date] = match;
  return {
    leadingBusinessDays: businessDayCount(leading),
    classical: classical === undefined ? null : parsePeriodFields(classical),
    trailingBusinessDays: businessDayCount(trailing),
    convention: convention === undefined ? null : resolveAdjustmentConvention(convention),
    date: date === undefined ? null : parseDate(date),
  };
}
