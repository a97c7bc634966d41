import { normalizeConventionKeyword } from "./adjust.js";
import type { CalendarDate } from "./calendar-date.js";
import { UnsupportedConventionError } from "./errors.js";
import { NO_HOLIDAYS } from "./holidays.js";
import { BusinessPeriod } from "./period.js";
import { gridPoints } from "./range.js";

export type DayCountConvention =
  | "act_act"
  | "act_act_icma"
  | "act_365"
  | "act_360"
  | "act_36525"
  | "30_360"
  | "30e_360"
  | "30e_360_i"
  | "30e_360_isda";

export const DEFAULT_DAY_COUNT: DayCountConvention = "act_36525";

export interface IcmaOptions {
  frequency?: number;
  rolling?: CalendarDate;
}

interface DayCountRule {
  days: (start: CalendarDate, end: CalendarDate) => number;
  fraction: (start: CalendarDate, end: CalendarDate) => number;
}

const ICMA_FREQUENCIES: readonly number[] = [1, 2, 4, 12];

const DAY_COUNT_ALIASES: Readonly<Record<string, DayCountConvention>> = {
  actact: "act_act",
  actactisda: "act_act",
  actacthistorical: "act_act",
  actacthist: "act_act",
  actact365: "act_act",
  actactafb: "act_act",
  actacteuro: "act_act",
  actacticma: "act_act_icma",
  actactisma: "act_act_icma",
  actactbond: "act_act_icma",
  act365: "act_365",
  act365f: "act_365",
  act365fixed: "act_365",
  act360: "act_360",
  act36525: "act_36525",
  "30360": "30_360",
  "30360us": "30_360",
  "30360bond": "30_360",
  "30360nasd": "30_360",
  "30360icma": "30_360",
  "30360isma": "30_360",
  "30u360": "30_360",
  "360360": "30_360",
  simple: "30_360",
  "30360isda": "30e_360_isda",
  "30e360": "30e_360",
  "30e360b": "30e_360",
  "30e360icma": "30e_360",
  "30e360i": "30e_360_i",
  "30e360italian": "30e_360_i",
  "30e360isda": "30e_360_isda",
  "30e360g": "30e_360_isda",
};

export function resolveDayCountConvention(keyword: string | null | undefined): DayCountConvention {
  if (keyword === null || keyword === undefined || keyword.trim() === "") {
    return DEFAULT_DAY_COUNT;
  }
  const convention = DAY_COUNT_ALIASES[normalizeConventionKeyword(keyword)];
  if (!convention) {
    throw new UnsupportedConventionError("day count", keyword);
  }
  return convention;
}

function actualDays(start: CalendarDate, end: CalendarDate): number {
  return start.daysUntil(end);
}

function thirty360Days(
  start: CalendarDate,
  end: CalendarDate,
  startDay: number,
  endDay: number,
): number {
  return 360 * (end.year - start.year) + 30 * (end.month - start.month) + (endDay - startDay);
}

function thirtyRule(dayRule: (start: CalendarDate, end: CalendarDate) => [number, number]): DayCountRule {
  const days = (start: CalendarDate, end: CalendarDate): number => {
    const [startDay, endDay] = dayRule(start, end);
    return thirty360Days(start, end, startDay, endDay);
  };
  return { days, fraction: (start, end) => days(start, end) / 360 };
}

function actualRule(basis: number): DayCountRule {
  return { days: actualDays, fraction: (start, end) => actualDays(start, end) / basis };
}

// Coupon frequency implied by the period length, snapped to 1, 2, 4 or 12.
export function impliedFrequency(start: CalendarDate, end: CalendarDate): number {
  const months = Math.round((12 * Math.abs(start.daysUntil(end))) / 365);
  if (months === 0) {
    return 12;
  }
  const frequency = Math.floor(12 / months);
  if (ICMA_FREQUENCIES.includes(frequency)) {
    return frequency;
  }
  return frequency < 6 ? 4 : 12;
}

function isEndOfFebruary(date: CalendarDate): boolean {
  return date.month === 2 && date.day === date.daysInMonth;
}

// Actual/Actual ISDA: each year's share of the period over that year's length.
function actActIsda(start: CalendarDate, end: CalendarDate): number {
  if (start.year === end.year) {
    return actualDays(start, end) / start.daysInYear;
  }
  const restOfStartYear = start.daysInYear - start.dayOfYear + 1;
  const elapsedInEndYear = end.dayOfYear - 1;
  return (
    end.year - start.year - 1 +
    restOfStartYear / start.daysInYear +
    elapsedInEndYear / end.daysInYear
  );
}

/**
 * Actual/Actual ICMA: reference periods of 12/frequency months rolled from
 * `rolling` (default: end). Without a frequency it is implied by the period. Whole reference periods inside [start, end] count
 * 1/frequency; partial ones count their overlap over the reference length.
 */
export function actActIcma(start: CalendarDate, end: CalendarDate, options: IcmaOptions = {}): number {
  if (end.isBefore(start)) {
    return -actActIcma(end, start, options);
  }
  if (end.equals(start)) {
    return 0;
  }

  const frequency = options.frequency ?? impliedFrequency(start, end);
  if (!ICMA_FREQUENCIES.includes(frequency)) {
    throw new RangeError(`frequency must be one of ${ICMA_FREQUENCIES.join(", ")}`);
  }

  const months = 12 / frequency;
  const step = new BusinessPeriod({ months });
  const points = gridPoints(
    start.addMonths(-months),
    end.addMonths(months),
    step,
    options.rolling ?? end,
    NO_HOLIDAYS,
  );

  let total = 0;
  for (let i = 1; i < points.length; i += 1) {
    const periodStart = points[i - 1];
    const periodEnd = points[i];
    if (!periodStart || !periodEnd) {
      continue;
    }
    if (!periodStart.isBefore(start) && !end.isBefore(periodEnd)) {
      total += 1 / frequency;
      continue;
    }
    const overlapStart = periodStart.isBefore(start) ? start : periodStart;
    const overlapEnd = end.isBefore(periodEnd) ? end : periodEnd;
    const overlap = overlapStart.daysUntil(overlapEnd);
    if (overlap > 0) {
      total += overlap / periodStart.daysUntil(periodEnd) / frequency;
    }
  }
  return total;
}

const DAY_COUNT_RULES: Readonly<Record<DayCountConvention, DayCountRule>> = {
  act_act: { days: actualDays, fraction: actActIsda },
  act_act_icma: { days: actualDays, fraction: (start, end) => actActIcma(start, end) },
  act_365: actualRule(365),
  act_360: actualRule(360),
  act_36525: actualRule(365.25),
  "30_360": thirtyRule((start, end) => {
    const startDay = Math.min(start.day, 30);
    return [startDay, startDay === 30 && end.day === 31 ? 30 : end.day];
  }),
  "30e_360": thirtyRule((start, end) => [Math.min(start.day, 30), Math.min(end.day, 30)]),
  "30e_360_i": thirtyRule((start, end) => {
    const cap = (date: CalendarDate): number =>
      (date.month === 2 && date.day >= 28) || date.day === 31 ? 30 : date.day;
    return [cap(start), cap(end)];
  }),
  "30e_360_isda": thirtyRule((start, end) => {
    const cap = (date: CalendarDate): number =>
      date.day === 31 || isEndOfFebruary(date) ? 30 : date.day;
    return [cap(start), cap(end)];
  }),
};

// Reversed pairs are computed forward and negated.
export function yearFraction(start: CalendarDate, end: CalendarDate, convention: DayCountConvention): number {
  if (end.isBefore(start)) {
    return -DAY_COUNT_RULES[convention].fraction(end, start);
  }
  return DAY_COUNT_RULES[convention].fraction(start, end);
}

export function dayCount(start: CalendarDate, end: CalendarDate, convention: DayCountConvention): number {
  if (end.isBefore(start)) {
    return -DAY_COUNT_RULES[convention].days(end, start);
  }
  return DAY_COUNT_RULES[convention].days(start, end);
}
