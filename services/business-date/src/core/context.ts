import { resolveAdjustmentConvention } from "./adjust.js";
import type { AdjustmentConvention } from "./adjust.js";
import { CalendarDate } from "./calendar-date.js";
import { parseDate } from "./date-utils.js";
import type { DateInput } from "./date-utils.js";
import { DEFAULT_DAY_COUNT, resolveDayCountConvention } from "./day-count.js";
import type { DayCountConvention } from "./day-count.js";
import { targetHolidays } from "./holidays.js";
import type { HolidaySet } from "./holidays.js";

/**
 * Everything a date operation needs besides the date itself. Engines take
 * these values as arguments; only the public constructors fall back to the
 * process-wide default.
 */
export interface BusinessContext {
  readonly holidays: HolidaySet;
  readonly convention: AdjustmentConvention;
  readonly dayCount: DayCountConvention;
  // null means "today" at the moment a base date is needed
  readonly baseDate: CalendarDate | null;
}

export interface ContextOptions {
  context?: BusinessContext;
  holidays?: HolidaySet;
  convention?: string;
  dayCount?: string;
  baseDate?: DateInput | null;
}

function initialContext(): BusinessContext {
  return Object.freeze({
    holidays: targetHolidays(),
    convention: "no",
    dayCount: DEFAULT_DAY_COUNT,
    baseDate: null,
  });
}

let defaultContext: BusinessContext = initialContext();

export function getDefaultContext(): BusinessContext {
  return defaultContext;
}

// Replaces the default in one assignment; callers holding the old value keep it.
export function setDefaultContext(options: ContextOptions): BusinessContext {
  defaultContext = resolveContext(options);
  return defaultContext;
}

export function resetDefaultContext(): BusinessContext {
  defaultContext = initialContext();
  return defaultContext;
}

export function resolveContext(options: ContextOptions = {}): BusinessContext {
  const base = options.context ?? defaultContext;
  const baseDate =
    options.baseDate === undefined
      ? base.baseDate
      : options.baseDate === null
        ? null
        : parseDate(options.baseDate);

  return Object.freeze({
    holidays: options.holidays ?? base.holidays,
    convention:
      options.convention === undefined ? base.convention : resolveAdjustmentConvention(options.convention),
    dayCount: options.dayCount === undefined ? base.dayCount : resolveDayCountConvention(options.dayCount),
    baseDate,
  });
}

export function baseDateOf(context: BusinessContext): CalendarDate {
  return context.baseDate ?? CalendarDate.today();
}
