export { easterSunday, offsetFromEaster } from "./easter.js";
export type { DayTriple } from "./easter.js";
export { CALENDAR_REGISTRY, getCalendar, listCalendars, holidaysInYear } from "./registry.js";
export type { CalendarEntry, HolidayDate, HolidayRule } from "./registry.js";
export { DEFAULT_CALENDAR_ID, routeByCalendarCode, selectCalendar } from "./router.js";
