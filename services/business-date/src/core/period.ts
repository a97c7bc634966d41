import { addBusinessDays } from "./adjust.js";
import { CalendarDate } from "./calendar-date.js";
import { MixedKindError, SignError } from "./errors.js";
import type { HolidaySet } from "./holidays.js";
import { monthSpanBounds } from "./period-bounds.js";
import { formatPeriod, isPeriodLiteral, parsePeriodFields, zeroFields } from "./period-grammar.js";
import type { PeriodFields } from "./period-grammar.js";

export type PeriodInput = BusinessPeriod | string | Partial<PeriodFields>;

// true / false when the order is certain, null when it depends on the calendar.
export type PeriodOrdering = boolean | null;

function signOf(value: number): -1 | 0 | 1 {
  if (value === 0) {
    return 0;
  }
  return value > 0 ? 1 : -1;
}

function normalizeFields(fields: PeriodFields): PeriodFields {
  for (const [name, value] of Object.entries(fields)) {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`${name} must be an integer`);
    }
  }

  const { years, months, days, businessdays } = fields;
  if (businessdays !== 0 && (years !== 0 || months !== 0 || days !== 0)) {
    throw new MixedKindError();
  }

  const signs = new Set([years, months, days].map(signOf).filter((s) => s !== 0));
  if (signs.size > 1) {
    throw new SignError(`inconsistent signs in period: years=${years}, months=${months}, days=${days}`);
  }

  // Truncating division keeps the carry symmetric: -18M becomes -1Y-6M.
  const carry = Math.trunc(months / 12);
  return {
    years: years + carry,
    months: months - 12 * carry || 0,
    days: days || 0,
    businessdays: businessdays || 0,
  };
}

function toFields(value: PeriodInput): PeriodFields {
  if (value instanceof BusinessPeriod) {
    return value.toFields();
  }
  if (typeof value === "string") {
    return parsePeriodFields(value);
  }
  if (typeof value !== "object" || value === null) {
    throw new TypeError("period must be a BusinessPeriod, a string or a fields object");
  }
  return {
    years: value.years ?? 0,
    months: value.months ?? 0,
    days: value.days ?? 0,
    businessdays: value.businessdays ?? 0,
  };
}

/**
 * A date offset: either years/months/days or a count of business days.
 */
export class BusinessPeriod {
  readonly years: number;
  readonly months: number;
  readonly days: number;
  readonly businessdays: number;

  constructor(value: PeriodInput = "") {
    const fields = normalizeFields(toFields(value));
    this.years = fields.years;
    this.months = fields.months;
    this.days = fields.days;
    this.businessdays = fields.businessdays;
    Object.freeze(this);
  }

  static parse(text: string): BusinessPeriod {
    return new BusinessPeriod(text);
  }

  static from(value: PeriodInput): BusinessPeriod {
    return value instanceof BusinessPeriod ? value : new BusinessPeriod(value);
  }

  static zero(): BusinessPeriod {
    return new BusinessPeriod(zeroFields());
  }

  static isPeriodLiteral(text: string): boolean {
    if (!isPeriodLiteral(text)) {
      return false;
    }
    try {
      new BusinessPeriod(text);
      return true;
    } catch (error) {
      if (error instanceof SignError || error instanceof MixedKindError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * The period p with `start + p == end`: the largest whole-month offset from
   * `start` toward `end` that does not pass `end`, then the remaining days.
   * Not the negation of `between(end, start)` in general.
   */
  static between(start: CalendarDate, end: CalendarDate): BusinessPeriod {
    let months = (end.year - start.year) * 12 + (end.month - start.month);
    if (end.isBefore(start)) {
      if (start.day < end.day) {
        months += 1;
      }
    } else if (start.day > end.day) {
      months -= 1;
    }

    const days = start.addMonths(months).daysUntil(end);
    return new BusinessPeriod({ months, days });
  }

  get isBusinessDays(): boolean {
    return this.businessdays !== 0;
  }

  get isClassical(): boolean {
    return this.businessdays === 0;
  }

  get isZero(): boolean {
    return this.years === 0 && this.months === 0 && this.days === 0 && this.businessdays === 0;
  }

  get sign(): -1 | 0 | 1 {
    return signOf(this.businessdays) || signOf(this.years) || signOf(this.months) || signOf(this.days);
  }

  add(other: PeriodInput): BusinessPeriod {
    const that = BusinessPeriod.from(other);
    if (!this.isZero && !that.isZero && this.isBusinessDays !== that.isBusinessDays) {
      throw new MixedKindError(`cannot add ${that.toString()} to ${this.toString()}`);
    }
    return new BusinessPeriod({
      years: this.years + that.years,
      months: this.months + that.months,
      days: this.days + that.days,
      businessdays: this.businessdays + that.businessdays,
    });
  }

  subtract(other: PeriodInput): BusinessPeriod {
    return this.add(BusinessPeriod.from(other).negate());
  }

  negate(): BusinessPeriod {
    return this.multiply(-1);
  }

  multiply(factor: number): BusinessPeriod {
    if (!Number.isInteger(factor)) {
      throw new TypeError("factor must be an integer");
    }
    return new BusinessPeriod({
      years: this.years * factor,
      months: this.months * factor,
      days: this.days * factor,
      businessdays: this.businessdays * factor,
    });
  }

  abs(): BusinessPeriod {
    return this.sign < 0 ? this.negate() : this;
  }

  // Fewest days the period can span, signed like the period.
  minDays(): number {
    return this.spanBounds().min;
  }

  maxDays(): number {
    return this.spanBounds().max;
  }

  addTo(date: CalendarDate, holidays: HolidaySet): CalendarDate {
    const shifted = date.addYearsMonths(this.years, this.months).addDays(this.days);
    return this.businessdays === 0 ? shifted : addBusinessDays(shifted, this.businessdays, holidays);
  }

  equals(other: PeriodInput): boolean {
    const that = BusinessPeriod.from(other);
    return (
      this.years === that.years &&
      this.months === that.months &&
      this.days === that.days &&
      this.businessdays === that.businessdays
    );
  }

  lt(other: PeriodInput): PeriodOrdering {
    const intervals = this.intervals(other);
    if (!intervals) {
      return null;
    }
    const [[low, high], [otherLow, otherHigh]] = intervals;
    if (high < otherLow) return true;
    if (low >= otherHigh) return false;
    return null;
  }

  le(other: PeriodInput): PeriodOrdering {
    const intervals = this.intervals(other);
    if (!intervals) {
      return null;
    }
    const [[low, high], [otherLow, otherHigh]] = intervals;
    if (high <= otherLow) return true;
    if (low > otherHigh) return false;
    return null;
  }

  gt(other: PeriodInput): PeriodOrdering {
    return BusinessPeriod.from(other).lt(this);
  }

  ge(other: PeriodInput): PeriodOrdering {
    return BusinessPeriod.from(other).le(this);
  }

  compare(other: PeriodInput): -1 | 0 | 1 | null {
    if (this.equals(other)) {
      return 0;
    }
    if (this.lt(other) === true) {
      return -1;
    }
    if (this.gt(other) === true) {
      return 1;
    }
    return null;
  }

  toFields(): PeriodFields {
    return {
      years: this.years,
      months: this.months,
      days: this.days,
      businessdays: this.businessdays,
    };
  }

  toString(): string {
    return formatPeriod(this);
  }

  toJSON(): string {
    return this.toString();
  }

  private spanBounds(): { min: number; max: number } {
    if (this.isBusinessDays) {
      return { min: this.businessdays, max: this.businessdays };
    }

    const direction = this.sign < 0 ? -1 : 1;
    const totalMonths = Math.abs(this.years * 12 + this.months);
    const days = Math.abs(this.days);
    const bounds = monthSpanBounds(totalMonths, direction);
    return { min: direction * (bounds.min + days), max: direction * (bounds.max + days) };
  }

  private intervals(
    other: PeriodInput,
  ): [readonly [number, number], readonly [number, number]] | null {
    const that = BusinessPeriod.from(other);
    if (!this.isZero && !that.isZero && this.isBusinessDays !== that.isBusinessDays) {
      return null;
    }
    return [this.interval(), that.interval()];
  }

  private interval(): readonly [number, number] {
    const { min, max } = this.spanBounds();
    return min <= max ? [min, max] : [max, min];
  }
}
