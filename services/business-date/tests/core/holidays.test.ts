import { describe, expect, it } from "vitest";

import { CalendarDate } from "../../src/core/calendar-date.js";
import { UnsupportedConventionError } from "../../src/core/errors.js";
import {
  BusinessHolidays,
  NO_HOLIDAYS,
  combineHolidays,
  holidaysForCalendar,
  targetHolidays,
} from "../../src/core/holidays.js";

const day = (value: number) => CalendarDate.fromYmdInt(value);

describe("holidays", () => {
  it("BusinessHolidays de-duplicates date inputs of any form", () => {
    const holidays = new BusinessHolidays(["2016-05-05", 20160505, [2016, 1, 6]]);

    expect(holidays.size).toBe(2);
    expect(holidays.contains(day(20160505))).toBe(true);
    expect(holidays.contains(day(20160506))).toBe(false);
    expect(holidays.toArray().map((date) => date.toYmdInt())).toEqual([20160106, 20160505]);
  });

  it("BusinessHolidays.with returns a new set", () => {
    const base = new BusinessHolidays([20160101]);
    const extended = base.with("2016-12-24");

    expect(base.size).toBe(1);
    expect(extended.size).toBe(2);
    expect(extended.contains(day(20161224))).toBe(true);
  });

  it("targetHolidays covers the fixed and Easter-based holidays", () => {
    const target = targetHolidays();

    expect(target.holidaysIn(2016).map((date) => date.toYmdInt())).toEqual([
      20160101, 20160325, 20160328, 20160501, 20161225, 20161226,
    ]);
    expect(target.contains(day(20160325))).toBe(true);
    expect(target.contains(day(20160324))).toBe(false);
    expect(targetHolidays()).toBe(target);
  });

  it("holidaysForCalendar resolves aliases and rejects unknown codes", () => {
    expect(holidaysForCalendar("ecb").calendar.calendarId).toBe("TARGET");
    expect(holidaysForCalendar("weekends").contains(day(20160101))).toBe(false);
    expect(() => holidaysForCalendar("LONDON")).toThrow(UnsupportedConventionError);
  });

  it("combineHolidays is the union of its members", () => {
    const combined = combineHolidays(targetHolidays(), new BusinessHolidays([20160505]));

    expect(combined.contains(day(20160101))).toBe(true);
    expect(combined.contains(day(20160505))).toBe(true);
    expect(combined.contains(day(20160506))).toBe(false);
    expect(NO_HOLIDAYS.contains(day(20160101))).toBe(false);
  });
});
