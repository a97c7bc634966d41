import type { CalendarEntry } from "./registry.js";
import { getCalendar } from "./registry.js";

export const DEFAULT_CALENDAR_ID = "TARGET";

const CALENDAR_ALIASES: Record<string, string> = {
  TARGET: "TARGET",
  TARGET2: "TARGET",
  TAR: "TARGET",
  ECB: "TARGET",
  NONE: "NONE",
  WEEKEND: "NONE",
  WEEKENDS: "NONE",
};

export function routeByCalendarCode(
  code: string,
): { calendarId: string | null; calendar: CalendarEntry | null } {
  const calendarId = CALENDAR_ALIASES[code.trim().toUpperCase()] ?? null;
  if (calendarId === null) {
    return { calendarId: null, calendar: null };
  }
  return { calendarId, calendar: getCalendar(calendarId) ?? null };
}

export function selectCalendar(inputs: { calendar?: string }): CalendarEntry | null {
  return routeByCalendarCode(inputs.calendar ?? DEFAULT_CALENDAR_ID).calendar;
}
