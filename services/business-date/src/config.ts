import { z } from "zod";
import { routeByCalendarCode } from "@bizdate/holiday-calendars";
import { resolveAdjustmentConvention } from "./core/adjust.js";
import type { AdjustmentConvention } from "./core/adjust.js";
import type { CalendarDate } from "./core/calendar-date.js";
import { setDefaultContext } from "./core/context.js";
import type { BusinessContext } from "./core/context.js";
import { parseDate } from "./core/date-utils.js";
import { DEFAULT_DAY_COUNT, resolveDayCountConvention } from "./core/day-count.js";
import type { DayCountConvention } from "./core/day-count.js";
import { BusinessDateError } from "./core/errors.js";
import { holidaysForCalendar } from "./core/holidays.js";
import { log } from "./runtime/log.js";
import type { LogLevel } from "./runtime/log.js";

export interface BusinessDateConfig {
  baseDate: CalendarDate | null;
  calendar: string;
  convention: AdjustmentConvention;
  dayCount: DayCountConvention;
  logLevel: LogLevel;
}

const envSchema = z.object({
  BUSINESS_DATE_BASE_DATE: z.string().trim().min(1).optional(),
  BUSINESS_DATE_CALENDAR: z.string().trim().min(1).default("TARGET"),
  BUSINESS_DATE_CONVENTION: z.string().trim().default("no"),
  BUSINESS_DATE_DAY_COUNT: z.string().trim().default(DEFAULT_DAY_COUNT),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

type ConfigEnv = Record<string, string | undefined>;

// Runs a keyword resolver and reports its failure as a zod issue.
function checkWith(
  ctx: z.RefinementCtx,
  path: string,
  check: () => unknown,
): void {
  try {
    check();
  } catch (error) {
    if (!(error instanceof BusinessDateError)) {
      throw error;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message: error.message });
  }
}

const configSchema = envSchema.superRefine((env, ctx) => {
  const baseDate = env.BUSINESS_DATE_BASE_DATE;
  if (baseDate !== undefined) {
    checkWith(ctx, "BUSINESS_DATE_BASE_DATE", () => parseDate(baseDate));
  }
  if (routeByCalendarCode(env.BUSINESS_DATE_CALENDAR).calendarId === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["BUSINESS_DATE_CALENDAR"],
      message: `Unknown holiday calendar: ${env.BUSINESS_DATE_CALENDAR}`,
    });
  }
  checkWith(ctx, "BUSINESS_DATE_CONVENTION", () => resolveAdjustmentConvention(env.BUSINESS_DATE_CONVENTION));
  checkWith(ctx, "BUSINESS_DATE_DAY_COUNT", () => resolveDayCountConvention(env.BUSINESS_DATE_DAY_COUNT));
});

export function loadConfig(env: ConfigEnv = process.env): BusinessDateConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    baseDate: values.BUSINESS_DATE_BASE_DATE === undefined ? null : parseDate(values.BUSINESS_DATE_BASE_DATE),
    calendar: routeByCalendarCode(values.BUSINESS_DATE_CALENDAR).calendarId ?? values.BUSINESS_DATE_CALENDAR,
    convention: resolveAdjustmentConvention(values.BUSINESS_DATE_CONVENTION),
    dayCount: resolveDayCountConvention(values.BUSINESS_DATE_DAY_COUNT),
    logLevel: values.LOG_LEVEL,
  };
}

export function contextFromConfig(config: BusinessDateConfig): BusinessContext {
  return Object.freeze({
    holidays: holidaysForCalendar(config.calendar),
    convention: config.convention,
    dayCount: config.dayCount,
    baseDate: config.baseDate,
  });
}

// Installs the configuration as the process-wide default context and log level.
export function applyConfig(config: BusinessDateConfig = loadConfig()): BusinessContext {
  log.setLevel(config.logLevel);
  return setDefaultContext({ context: contextFromConfig(config) });
}
