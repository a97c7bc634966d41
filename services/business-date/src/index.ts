// Core primitives
export { CalendarDate } from "./core/calendar-date.js";
export type { DateTriple } from "./core/calendar-date.js";
export { parseDate, isDateLiteral } from "./core/date-utils.js";
export type { DateInput } from "./core/date-utils.js";
export {
  BusinessHolidays,
  CalendarHolidays,
  NO_HOLIDAYS,
  combineHolidays,
  holidaysForCalendar,
  targetHolidays,
} from "./core/holidays.js";
export type { HolidaySet } from "./core/holidays.js";
export {
  BusinessDateError,
  FormatError,
  MixedKindError,
  SignError,
  InvalidStepError,
  UnsupportedConventionError,
} from "./core/errors.js";

// Periods
export { parsePeriodFields, formatPeriod, isPeriodLiteral } from "./core/period-grammar.js";
export type { PeriodFields } from "./core/period-grammar.js";
export { BusinessPeriod } from "./core/period.js";
export type { PeriodInput, PeriodOrdering } from "./core/period.js";
export { monthSpanBounds } from "./core/period-bounds.js";
export type { SpanBounds } from "./core/period-bounds.js";

// Conventions
export {
  adjust,
  addBusinessDays,
  isBusinessDay,
  isAdjustmentKeyword,
  resolveAdjustmentConvention,
} from "./core/adjust.js";
export type { AdjustmentConvention } from "./core/adjust.js";
export {
  DEFAULT_DAY_COUNT,
  actActIcma,
  dayCount,
  impliedFrequency,
  resolveDayCountConvention,
  yearFraction,
} from "./core/day-count.js";
export type { DayCountConvention, IcmaOptions } from "./core/day-count.js";

// Business dates
export {
  getDefaultContext,
  setDefaultContext,
  resetDefaultContext,
  resolveContext,
} from "./core/context.js";
export type { BusinessContext, ContextOptions } from "./core/context.js";
export { parseDateLiteral } from "./core/date-literal.js";
export type { DateLiteral } from "./core/date-literal.js";
export { BusinessDate } from "./core/business-date.js";
export type { BusinessDateInput } from "./core/business-date.js";
export { gridPoints, rollingGrid } from "./core/range.js";
export { BusinessDateList, BusinessSchedule, generateRange, generateSchedule } from "./core/schedule.js";
export type { RangeSpec } from "./core/schedule.js";

// Configuration and logging
export { loadConfig, contextFromConfig, applyConfig } from "./config.js";
export type { BusinessDateConfig } from "./config.js";
export { createLogger, log, isLogLevel } from "./runtime/log.js";
export type { Logger, LogLevel, LogSink } from "./runtime/log.js";

// Runtime
export { ScheduleEngineRuntime } from "./runtime/schedule-engine.js";
export { ScheduleContext } from "./runtime/context.js";
export { resolveScheduleSettings, DEFAULT_REQUEST_CONVENTION } from "./runtime/settings.js";
export type { ScheduleSettings, ResolvedSettings } from "./runtime/settings.js";
export { DEFAULT_STEPS, stubStep, adjustStep, periodStep, metricsStep } from "./runtime/steps.js";
export type {
  ScheduleRequestV0,
  ScheduleSpecV0,
  ScheduleStub,
  SchedulePeriod,
  ScheduleEngineResult,
  ScheduleEngineValidation,
  ScheduleStep,
} from "./runtime/types.js";
export { validateRequest, isScheduleRequest } from "./validate/validate.js";
export type { ValidationResult } from "./validate/validate.js";

// Formatters
export { formatScheduleAsText, formatScheduleAsJson } from "./formatters/schedule-table.js";
