import { DEFAULT_CALENDAR_ID, routeByCalendarCode } from "@bizdate/holiday-calendars";
import { resolveAdjustmentConvention } from "../core/adjust.js";
import type { AdjustmentConvention } from "../core/adjust.js";
import { BusinessDate } from "../core/business-date.js";
import { resolveContext } from "../core/context.js";
import type { BusinessContext } from "../core/context.js";
import { DEFAULT_DAY_COUNT, resolveDayCountConvention } from "../core/day-count.js";
import type { DayCountConvention } from "../core/day-count.js";
import { BusinessDateError, InvalidStepError } from "../core/errors.js";
import { BusinessHolidays, CalendarHolidays, combineHolidays } from "../core/holidays.js";
import type { HolidaySet } from "../core/holidays.js";
import { BusinessPeriod } from "../core/period.js";
import type { ScheduleSpecV0, ScheduleStub } from "./types.js";

export const DEFAULT_REQUEST_CONVENTION: AdjustmentConvention = "mod_follow";

export interface ScheduleSettings {
  start: BusinessDate;
  end: BusinessDate;
  step: BusinessPeriod;
  rolling: BusinessDate | undefined;
  calendarId: string;
  holidays: HolidaySet;
  convention: AdjustmentConvention;
  dayCount: DayCountConvention;
  stub: ScheduleStub;
  paymentLag: number;
}

export interface ResolvedSettings {
  settings: ScheduleSettings | null;
  errors: string[];
}

function attempt<T>(errors: string[], pointer: string, resolve: () => T): T | undefined {
  try {
    return resolve();
  } catch (error) {
    if (!(error instanceof BusinessDateError)) {
      throw error;
    }
    errors.push(`${pointer}: ${error.message}`);
    return undefined;
  }
}

function resolveHolidays(spec: ScheduleSpecV0, errors: string[]): { calendarId: string; holidays: HolidaySet } | undefined {
  const code = spec.calendar ?? DEFAULT_CALENDAR_ID;
  const { calendarId, calendar } = routeByCalendarCode(code);
  if (calendarId === null || calendar === null) {
    errors.push(`/schedule/calendar: unknown holiday calendar ${code}`);
    return undefined;
  }

  const extra = attempt(errors, "/schedule/holidays", () => new BusinessHolidays(spec.holidays ?? []));
  if (!extra) {
    return undefined;
  }
  const base = new CalendarHolidays(calendar);
  return { calendarId, holidays: extra.size > 0 ? combineHolidays(base, extra) : base };
}

/**
 * Turns the request's schedule block into engine inputs. `end` and `rolling`
 * may be period literals; they are then measured from the start date.
 */
export function resolveScheduleSettings(spec: ScheduleSpecV0): ResolvedSettings {
  const errors: string[] = [];

  const convention = attempt(errors, "/schedule/convention", () =>
    resolveAdjustmentConvention(spec.convention ?? DEFAULT_REQUEST_CONVENTION),
  );
  const dayCount = attempt(errors, "/schedule/day_count", () =>
    resolveDayCountConvention(spec.day_count ?? DEFAULT_DAY_COUNT),
  );
  const calendar = resolveHolidays(spec, errors);
  const step = attempt(errors, "/schedule/step", () => {
    const period = BusinessPeriod.parse(spec.step);
    if (period.isZero) {
      throw new InvalidStepError();
    }
    return period;
  });

  if (!calendar) {
    return { settings: null, errors };
  }

  const context: BusinessContext = resolveContext({ holidays: calendar.holidays, convention: "no", baseDate: null });
  const start = attempt(errors, "/schedule/start", () => new BusinessDate(spec.start, { context }));
  const fromStart = start ? resolveContext({ context, baseDate: start.date }) : undefined;
  const end = fromStart && attempt(errors, "/schedule/end", () => new BusinessDate(spec.end, { context: fromStart }));
  const rolling =
    fromStart && spec.rolling !== undefined
      ? attempt(errors, "/schedule/rolling", () => new BusinessDate(spec.rolling, { context: fromStart }))
      : undefined;

  if (start && end && !end.isAfter(start)) {
    errors.push("/schedule/end: must be after start");
  }

  if (errors.length > 0 || !start || !end || !step || !convention || !dayCount) {
    return { settings: null, errors };
  }

  return {
    settings: {
      start,
      end,
      step,
      rolling,
      calendarId: calendar.calendarId,
      holidays: calendar.holidays,
      convention,
      dayCount,
      stub: spec.stub ?? "short",
      paymentLag: spec.payment_lag ?? 0,
    },
    errors,
  };
}
