import { holidaysInYear, routeByCalendarCode } from "@bizdate/holiday-calendars";
import type { CalendarEntry } from "@bizdate/holiday-calendars";
import { CalendarDate } from "./calendar-date.js";
import { parseDate } from "./date-utils.js";
import type { DateInput } from "./date-utils.js";
import { UnsupportedConventionError } from "./errors.js";

export interface HolidaySet {
  contains(date: CalendarDate): boolean;
}

/**
 * An explicit, immutable list of holidays.
 */
export class BusinessHolidays implements HolidaySet {
  private readonly keys: ReadonlySet<number>;

  constructor(dates: Iterable<DateInput> = []) {
    const keys = new Set<number>();
    for (const date of dates) {
      keys.add(parseDate(date).toYmdInt());
    }
    this.keys = keys;
  }

  get size(): number {
    return this.keys.size;
  }

  contains(date: CalendarDate): boolean {
    return this.keys.has(date.toYmdInt());
  }

  with(...dates: DateInput[]): BusinessHolidays {
    return new BusinessHolidays([...this.toArray(), ...dates]);
  }

  toArray(): CalendarDate[] {
    return Array.from(this.keys)
      .sort((a, b) => a - b)
      .map((key) => CalendarDate.fromYmdInt(key));
  }
}

/**
 * Holidays generated from a registry calendar's rules, one year at a time.
 */
export class CalendarHolidays implements HolidaySet {
  readonly calendar: CalendarEntry;
  private readonly years = new Map<number, ReadonlySet<number>>();

  constructor(calendar: CalendarEntry) {
    this.calendar = calendar;
  }

  contains(date: CalendarDate): boolean {
    return this.holidayKeys(date.year).has(date.toYmdInt());
  }

  holidaysIn(year: number): CalendarDate[] {
    return Array.from(this.holidayKeys(year)).map((key) => CalendarDate.fromYmdInt(key));
  }

  private holidayKeys(year: number): ReadonlySet<number> {
    const cached = this.years.get(year);
    if (cached) {
      return cached;
    }
    const keys = new Set(
      holidaysInYear(this.calendar, year).map((h) => h.year * 10000 + h.month * 100 + h.day),
    );
    this.years.set(year, keys);
    return keys;
  }
}

export const NO_HOLIDAYS: HolidaySet = new BusinessHolidays();

export function holidaysForCalendar(code: string): CalendarHolidays {
  const { calendar } = routeByCalendarCode(code);
  if (!calendar) {
    throw new UnsupportedConventionError("holiday calendar", code);
  }
  return new CalendarHolidays(calendar);
}

let target: CalendarHolidays | null = null;

export function targetHolidays(): CalendarHolidays {
  if (!target) {
    target = holidaysForCalendar("TARGET");
  }
  return target;
}

export function combineHolidays(...sets: HolidaySet[]): HolidaySet {
  return { contains: (date) => sets.some((set) => set.contains(date)) };
}
