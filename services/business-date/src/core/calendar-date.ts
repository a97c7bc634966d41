import { DateTime } from "luxon";
import { FormatError } from "./errors.js";

const MS_PER_DAY = 86_400_000;

// Spreadsheet serial 0 is 1899-12-30, 25569 days before the Unix epoch.
const EXCEL_EPOCH_OFFSET = 25569;
const EXCEL_FIRST_RELIABLE_SERIAL = 61;

export type DateTriple = readonly [year: number, month: number, day: number];

/**
 * A proleptic Gregorian calendar day with no time-of-day or zone.
 *
 * Backed by a luxon DateTime pinned to UTC midnight, so day arithmetic never
 * crosses a daylight-saving boundary.
 */
export class CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  private readonly dateTime: DateTime<true>;

  private constructor(dateTime: DateTime<true>) {
    this.dateTime = dateTime;
    this.year = dateTime.year;
    this.month = dateTime.month;
    this.day = dateTime.day;
  }

  static of(year: number, month: number, day: number): CalendarDate {
    assertInteger(year, "year");
    assertInteger(month, "month");
    assertInteger(day, "day");

    const dateTime = DateTime.utc(year, month, day);
    if (!dateTime.isValid) {
      throw new FormatError(`Invalid calendar date: ${year}-${month}-${day}`, [year, month, day]);
    }
    return new CalendarDate(dateTime);
  }

  static fromTriple(triple: DateTriple): CalendarDate {
    return CalendarDate.of(triple[0], triple[1], triple[2]);
  }

  static fromDateTime(dateTime: DateTime): CalendarDate {
    if (!(dateTime instanceof DateTime) || !dateTime.isValid) {
      throw new FormatError("dateTime must be a valid DateTime", dateTime);
    }
    return CalendarDate.of(dateTime.year, dateTime.month, dateTime.day);
  }

  static fromYmdInt(value: number): CalendarDate {
    assertInteger(value, "value");
    const year = Math.floor(value / 10000);
    const month = Math.floor(value / 100) % 100;
    return CalendarDate.of(year, month, value % 100);
  }

  // Days since 1970-01-01.
  static fromOrdinal(ordinal: number): CalendarDate {
    assertInteger(ordinal, "ordinal");
    const dateTime = DateTime.fromMillis(ordinal * MS_PER_DAY, { zone: "utc" });
    if (!dateTime.isValid) {
      throw new FormatError(`Invalid ordinal: ${ordinal}`, ordinal);
    }
    return new CalendarDate(dateTime);
  }

  static fromExcel(serial: number): CalendarDate {
    assertInteger(serial, "serial");
    if (serial < EXCEL_FIRST_RELIABLE_SERIAL) {
      throw new RangeError(`serial must be at least ${EXCEL_FIRST_RELIABLE_SERIAL}`);
    }
    return CalendarDate.fromOrdinal(serial - EXCEL_EPOCH_OFFSET);
  }

  static today(): CalendarDate {
    const now = DateTime.local();
    return CalendarDate.of(now.year, now.month, now.day);
  }

  static isLeapYear(year: number): boolean {
    assertInteger(year, "year");
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  }

  static daysInMonth(year: number, month: number): number {
    return CalendarDate.of(year, month, 1).daysInMonth;
  }

  // 1 = Monday ... 7 = Sunday
  get weekday(): number {
    return this.dateTime.weekday;
  }

  get isLeapYear(): boolean {
    return this.dateTime.isInLeapYear;
  }

  get daysInMonth(): number {
    return this.dateTime.daysInMonth;
  }

  get daysInYear(): number {
    return this.dateTime.daysInYear;
  }

  get dayOfYear(): number {
    return this.dateTime.ordinal;
  }

  toOrdinal(): number {
    return Math.round(this.dateTime.toMillis() / MS_PER_DAY);
  }

  toExcel(): number {
    return this.toOrdinal() + EXCEL_EPOCH_OFFSET;
  }

  toYmdInt(): number {
    return this.year * 10000 + this.month * 100 + this.day;
  }

  toTriple(): DateTriple {
    return [this.year, this.month, this.day];
  }

  toISODate(): string {
    return this.dateTime.toISODate();
  }

  toDateTime(): DateTime {
    return this.dateTime;
  }

  toString(): string {
    return this.dateTime.toFormat("yyyyMMdd");
  }

  addDays(days: number): CalendarDate {
    assertInteger(days, "days");
    return days === 0 ? this : new CalendarDate(this.dateTime.plus({ days }));
  }

  addMonths(months: number): CalendarDate {
    return this.addYearsMonths(0, months);
  }

  // One combined step: the day is clamped to the length of the target month.
  addYearsMonths(years: number, months: number): CalendarDate {
    assertInteger(years, "years");
    assertInteger(months, "months");
    if (years === 0 && months === 0) {
      return this;
    }
    return new CalendarDate(this.dateTime.plus({ years, months }));
  }

  startOfMonth(): CalendarDate {
    return CalendarDate.of(this.year, this.month, 1);
  }

  endOfMonth(): CalendarDate {
    return CalendarDate.of(this.year, this.month, this.daysInMonth);
  }

  daysUntil(other: CalendarDate): number {
    return other.toOrdinal() - this.toOrdinal();
  }

  compare(other: CalendarDate): -1 | 0 | 1 {
    const delta = this.toYmdInt() - other.toYmdInt();
    if (delta === 0) {
      return 0;
    }
    return delta > 0 ? 1 : -1;
  }

  equals(other: CalendarDate): boolean {
    return this.compare(other) === 0;
  }

  isBefore(other: CalendarDate): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: CalendarDate): boolean {
    return this.compare(other) > 0;
  }
}

function assertInteger(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer`);
  }
}
