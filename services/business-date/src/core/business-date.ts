import type { DateTime } from "luxon";
import { addBusinessDays, adjust, isBusinessDay, resolveAdjustmentConvention } from "./adjust.js";
import type { AdjustmentConvention } from "./adjust.js";
import { CalendarDate } from "./calendar-date.js";
import { baseDateOf, resolveContext } from "./context.js";
import type { BusinessContext, ContextOptions } from "./context.js";
import { parseDateLiteral } from "./date-literal.js";
import { isDateLiteral, parseDate } from "./date-utils.js";
import type { DateInput } from "./date-utils.js";
import { dayCount, resolveDayCountConvention, yearFraction } from "./day-count.js";
import type { DayCountConvention } from "./day-count.js";
import type { HolidaySet } from "./holidays.js";
import { BusinessPeriod } from "./period.js";
import type { PeriodInput } from "./period.js";

export type BusinessDateInput = BusinessDate | DateInput;

/**
 * Resolves a combined literal against its context.
 *
 * A business-day segment is followed by the convention adjustment: a leading
 * one adjusts before the classical step, a trailing one after it. With no
 * business-day segment the convention only applies when there is no classical
 * segment either; `3DMODFOLLOW` ignores its convention because the adjustment
 * point is ambiguous.
 */
function resolveCombinedLiteral(text: string, context: BusinessContext): CalendarDate {
  const literal = parseDateLiteral(text);
  const { holidays } = context;
  const convention: AdjustmentConvention = literal.convention ?? "no";
  let date = literal.date ?? baseDateOf(context);

  if (literal.leadingBusinessDays !== null) {
    date = adjust(addBusinessDays(date, literal.leadingBusinessDays, holidays), convention, holidays);
  }
  if (literal.classical !== null) {
    date = new BusinessPeriod(literal.classical).addTo(date, holidays);
  }
  if (literal.trailingBusinessDays !== null) {
    date = adjust(addBusinessDays(date, literal.trailingBusinessDays, holidays), convention, holidays);
  }
  if (
    literal.leadingBusinessDays === null &&
    literal.trailingBusinessDays === null &&
    literal.classical === null
  ) {
    date = adjust(date, convention, holidays);
  }
  return date;
}

function resolveText(text: string, context: BusinessContext): CalendarDate {
  if (isDateLiteral(text)) {
    return parseDate(text);
  }
  if (BusinessPeriod.isPeriodLiteral(text)) {
    return BusinessPeriod.parse(text).addTo(baseDateOf(context), context.holidays);
  }
  return resolveCombinedLiteral(text, context);
}

export class BusinessDate {
  readonly date: CalendarDate;
  readonly context: BusinessContext;

  constructor(value?: BusinessDateInput | null, options: ContextOptions = {}) {
    if (value instanceof BusinessDate) {
      this.date = value.date;
      this.context = resolveContext({ context: value.context, ...options });
    } else {
      const context = resolveContext(options);
      this.context = context;
      if (value === undefined || value === null) {
        this.date = baseDateOf(context);
      } else if (typeof value === "string") {
        this.date = resolveText(value, context);
      } else {
        this.date = parseDate(value);
      }
    }
    Object.freeze(this);
  }

  static from(value: BusinessDateInput, options: ContextOptions = {}): BusinessDate {
    return value instanceof BusinessDate ? value : new BusinessDate(value, options);
  }

  static of(year: number, month: number, day: number, options: ContextOptions = {}): BusinessDate {
    return new BusinessDate(CalendarDate.of(year, month, day), options);
  }

  static today(options: ContextOptions = {}): BusinessDate {
    return new BusinessDate(CalendarDate.today(), options);
  }

  get year(): number {
    return this.date.year;
  }

  get month(): number {
    return this.date.month;
  }

  get day(): number {
    return this.date.day;
  }

  get weekday(): number {
    return this.date.weekday;
  }

  get convention(): AdjustmentConvention {
    return this.context.convention;
  }

  get holidays(): HolidaySet {
    return this.context.holidays;
  }

  get dayCountConvention(): DayCountConvention {
    return this.context.dayCount;
  }

  get isLeapYear(): boolean {
    return this.date.isLeapYear;
  }

  get daysInMonth(): number {
    return this.date.daysInMonth;
  }

  withContext(options: ContextOptions): BusinessDate {
    return new BusinessDate(this, options);
  }

  add(period: PeriodInput): BusinessDate {
    return this.withDate(BusinessPeriod.from(period).addTo(this.date, this.context.holidays));
  }

  subtract(other: BusinessDate): BusinessPeriod;
  subtract(period: PeriodInput): BusinessDate;
  subtract(other: BusinessDate | PeriodInput): BusinessDate | BusinessPeriod {
    if (other instanceof BusinessDate) {
      return BusinessPeriod.between(other.date, this.date);
    }
    return this.add(BusinessPeriod.from(other).negate());
  }

  // The period p with this + p == other.
  diff(other: BusinessDateInput): BusinessPeriod {
    return BusinessPeriod.between(this.date, this.coerce(other).date);
  }

  diffInDays(other: BusinessDateInput): number {
    return this.date.daysUntil(this.coerce(other).date);
  }

  adjust(convention?: string, holidays?: HolidaySet): BusinessDate {
    const resolved = convention === undefined ? this.context.convention : resolveAdjustmentConvention(convention);
    return this.withDate(adjust(this.date, resolved, holidays ?? this.context.holidays));
  }

  isBusinessDay(holidays?: HolidaySet): boolean {
    return isBusinessDay(this.date, holidays ?? this.context.holidays);
  }

  addBusinessDays(count: number, holidays?: HolidaySet): BusinessDate {
    return this.withDate(addBusinessDays(this.date, count, holidays ?? this.context.holidays));
  }

  yearFraction(end: BusinessDateInput, convention?: string): number {
    return yearFraction(this.date, this.coerce(end).date, this.resolveDayCount(convention));
  }

  dayCount(end: BusinessDateInput, convention?: string): number {
    return dayCount(this.date, this.coerce(end).date, this.resolveDayCount(convention));
  }

  endOfMonth(): BusinessDate {
    return this.withDate(this.date.endOfMonth());
  }

  compare(other: BusinessDateInput): -1 | 0 | 1 {
    return this.date.compare(this.coerce(other).date);
  }

  equals(other: BusinessDateInput): boolean {
    return this.compare(other) === 0;
  }

  isBefore(other: BusinessDateInput): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: BusinessDateInput): boolean {
    return this.compare(other) > 0;
  }

  toYmdInt(): number {
    return this.date.toYmdInt();
  }

  toOrdinal(): number {
    return this.date.toOrdinal();
  }

  toExcel(): number {
    return this.date.toExcel();
  }

  toISODate(): string {
    return this.date.toISODate();
  }

  toDateTime(): DateTime {
    return this.date.toDateTime();
  }

  toString(): string {
    return this.date.toString();
  }

  toJSON(): string {
    return this.date.toISODate();
  }

  private withDate(date: CalendarDate): BusinessDate {
    return date.equals(this.date) ? this : new BusinessDate(date, { context: this.context });
  }

  private coerce(value: BusinessDateInput): BusinessDate {
    return BusinessDate.from(value, { context: this.context });
  }

  private resolveDayCount(convention: string | undefined): DayCountConvention {
    return convention === undefined ? this.context.dayCount : resolveDayCountConvention(convention);
  }
}
