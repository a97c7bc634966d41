import { offsetFromEaster } from "./easter.js";
import type { DayTriple } from "./easter.js";

export type HolidayRule =
  | { kind: "fixed"; name: string; month: number; day: number }
  | { kind: "easter"; name: string; offsetDays: number };

export interface CalendarEntry {
  calendarId: string;
  name: string;
  rules: readonly HolidayRule[];
  version: string;
}

export interface HolidayDate extends DayTriple {
  name: string;
}

export const CALENDAR_REGISTRY: Map<string, CalendarEntry> = new Map([
  [
    "TARGET",
    {
      calendarId: "TARGET",
      name: "TARGET2 settlement calendar",
      rules: [
        { kind: "fixed", name: "New Year's Day", month: 1, day: 1 },
        { kind: "easter", name: "Good Friday", offsetDays: -2 },
        { kind: "easter", name: "Easter Monday", offsetDays: 1 },
        { kind: "fixed", name: "Labour Day", month: 5, day: 1 },
        { kind: "fixed", name: "Christmas Day", month: 12, day: 25 },
        { kind: "fixed", name: "Boxing Day", month: 12, day: 26 },
      ],
      version: "0.1.0",
    },
  ],
  [
    "NONE",
    {
      calendarId: "NONE",
      name: "Weekends only",
      rules: [],
      version: "0.1.0",
    },
  ],
]);

export function getCalendar(calendarId: string): CalendarEntry | undefined {
  return CALENDAR_REGISTRY.get(calendarId);
}

export function listCalendars(): CalendarEntry[] {
  return Array.from(CALENDAR_REGISTRY.values());
}

export function holidaysInYear(calendar: CalendarEntry, year: number): HolidayDate[] {
  if (!Number.isInteger(year)) {
    throw new TypeError("year must be an integer");
  }

  const dates = calendar.rules.map((rule): HolidayDate => {
    if (rule.kind === "fixed") {
      return { year, month: rule.month, day: rule.day, name: rule.name };
    }
    return { ...offsetFromEaster(year, rule.offsetDays), name: rule.name };
  });

  return dates.sort((a, b) => a.month - b.month || a.day - b.day);
}
