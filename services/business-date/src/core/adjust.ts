import { CalendarDate } from "./calendar-date.js";
import { UnsupportedConventionError } from "./errors.js";
import type { HolidaySet } from "./holidays.js";

export type AdjustmentConvention =
  | "no"
  | "previous"
  | "mod_previous"
  | "follow"
  | "mod_follow"
  | "start_of_month"
  | "end_of_month"
  | "imm"
  | "cds_imm";

type AdjustFn = (date: CalendarDate, holidays: HolidaySet) => CalendarDate;

const SATURDAY = 6;
const WEDNESDAY = 3;

const ADJUSTMENT_ALIASES: Readonly<Record<string, AdjustmentConvention>> = {
  no: "no",
  none: "no",
  previous: "previous",
  prev: "previous",
  prv: "previous",
  preceding: "previous",
  modprevious: "mod_previous",
  modprev: "mod_previous",
  modprv: "mod_previous",
  modpreceding: "mod_previous",
  modifiedprevious: "mod_previous",
  modifiedpreceding: "mod_previous",
  follow: "follow",
  following: "follow",
  flw: "follow",
  modfollow: "mod_follow",
  modfollowing: "mod_follow",
  modflw: "mod_follow",
  modifiedfollow: "mod_follow",
  modifiedfollowing: "mod_follow",
  startofmonth: "start_of_month",
  som: "start_of_month",
  endofmonth: "end_of_month",
  eom: "end_of_month",
  imm: "imm",
  cdsimm: "cds_imm",
  cds: "cds_imm",
};

export function normalizeConventionKeyword(keyword: string): string {
  return keyword.toLowerCase().replace(/[\s_\-/.]/g, "");
}

export function resolveAdjustmentConvention(keyword: string | null | undefined): AdjustmentConvention {
  if (keyword === null || keyword === undefined || keyword.trim() === "") {
    return "no";
  }
  const convention = ADJUSTMENT_ALIASES[normalizeConventionKeyword(keyword)];
  if (!convention) {
    throw new UnsupportedConventionError("adjustment", keyword);
  }
  return convention;
}

export function isAdjustmentKeyword(keyword: string): boolean {
  return ADJUSTMENT_ALIASES[normalizeConventionKeyword(keyword)] !== undefined;
}

export function isBusinessDay(date: CalendarDate, holidays: HolidaySet): boolean {
  return date.weekday < SATURDAY && !holidays.contains(date);
}

/**
 * Steps one calendar day at a time and counts business days; a negative count
 * walks backwards. Zero returns the date unchanged even on a holiday.
 */
export function addBusinessDays(date: CalendarDate, count: number, holidays: HolidaySet): CalendarDate {
  if (!Number.isInteger(count)) {
    throw new TypeError("count must be an integer");
  }

  const step = count < 0 ? -1 : 1;
  let remaining = Math.abs(count);
  let current = date;
  while (remaining > 0) {
    current = current.addDays(step);
    if (isBusinessDay(current, holidays)) {
      remaining -= 1;
    }
  }
  return current;
}

function rollUntilBusinessDay(date: CalendarDate, step: 1 | -1, holidays: HolidaySet): CalendarDate {
  let current = date;
  while (!isBusinessDay(current, holidays)) {
    current = current.addDays(step);
  }
  return current;
}

function previous(date: CalendarDate, holidays: HolidaySet): CalendarDate {
  return rollUntilBusinessDay(date, -1, holidays);
}

function follow(date: CalendarDate, holidays: HolidaySet): CalendarDate {
  return rollUntilBusinessDay(date, 1, holidays);
}

function quarterMonth(date: CalendarDate): number {
  return Math.ceil(date.month / 3) * 3;
}

function thirdWednesday(year: number, month: number): CalendarDate {
  const first = CalendarDate.of(year, month, 1);
  const offset = (WEDNESDAY - first.weekday + 7) % 7;
  return CalendarDate.of(year, month, 1 + offset + 14);
}

const ADJUSTMENTS: Readonly<Record<AdjustmentConvention, AdjustFn>> = {
  no: (date) => date,
  previous,
  follow,
  mod_follow: (date, holidays) => {
    const following = follow(date, holidays);
    return following.month === date.month ? following : previous(date, holidays);
  },
  mod_previous: (date, holidays) => {
    const preceding = previous(date, holidays);
    return preceding.month === date.month ? preceding : follow(date, holidays);
  },
  start_of_month: (date, holidays) => follow(date.startOfMonth(), holidays),
  end_of_month: (date, holidays) => previous(date.endOfMonth(), holidays),
  // IMM dates are fixed by rule; the holiday set does not move them.
  imm: (date) => thirdWednesday(date.year, quarterMonth(date)),
  cds_imm: (date, holidays) => follow(CalendarDate.of(date.year, quarterMonth(date), 20), holidays),
};

export function adjust(
  date: CalendarDate,
  convention: AdjustmentConvention,
  holidays: HolidaySet,
): CalendarDate {
  return ADJUSTMENTS[convention](date, holidays);
}
