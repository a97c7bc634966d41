import { afterEach, describe, expect, it } from "vitest";

import { BusinessDate } from "../../src/core/business-date.js";
import { getDefaultContext, resetDefaultContext, setDefaultContext } from "../../src/core/context.js";
import { FormatError } from "../../src/core/errors.js";
import { BusinessHolidays, NO_HOLIDAYS } from "../../src/core/holidays.js";
import { BusinessPeriod } from "../../src/core/period.js";

const BASE = { baseDate: 20171231 };

describe("BusinessDate construction", () => {
  it("accepts every date input form", () => {
    expect(new BusinessDate("20151231").toYmdInt()).toBe(20151231);
    expect(new BusinessDate("12/31/2015").toYmdInt()).toBe(20151231);
    expect(new BusinessDate(42369).toYmdInt()).toBe(20151231);
    expect(BusinessDate.of(2015, 12, 31).toString()).toBe("20151231");
  });

  it("defaults to the base date", () => {
    expect(new BusinessDate(null, BASE).toYmdInt()).toBe(20171231);
    expect(new BusinessDate(undefined, { baseDate: "2016-01-01" }).toISODate()).toBe("2016-01-01");
  });

  it("reads period literals relative to the base date", () => {
    expect(new BusinessDate("1M", { baseDate: 20160131 }).toYmdInt()).toBe(20160229);
    expect(new BusinessDate("-1M", { baseDate: 20160331 }).toYmdInt()).toBe(20160229);
    expect(new BusinessDate("2B", { baseDate: 20151231 }).toYmdInt()).toBe(20160105);
  });

  it.each([
    ["0B3DMODFOLLOW20171231", 20180101],
    ["0B3D0BMODFOLLOW20171231", 20180102],
    ["0B3D0BPREV20171231", 20171229],
    ["3DMODFOLLOW20171231", 20180103],
    ["1W20171231", 20180107],
    ["MODFLW20171231", 20171229],
    ["1B20171231", 20180102],
  ])("resolves the combined literal %s", (text, expected) => {
    expect(new BusinessDate(text).toYmdInt()).toBe(expected);
  });

  it("adjusts the base date with a bare convention", () => {
    expect(new BusinessDate("MODFLW", BASE).toYmdInt()).toBe(20171229);
    expect(new BusinessDate("follow", BASE).toYmdInt()).toBe(20180102);
  });

  it("rejects unparseable text", () => {
    expect(() => new BusinessDate("12ab!")).toThrow(FormatError);
    expect(() => new BusinessDate("2015-02-30")).toThrow(FormatError);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(new BusinessDate(20160101))).toBe(true);
  });
});

describe("BusinessDate arithmetic", () => {
  const a = new BusinessDate(20150612);
  const b = new BusinessDate(20151231);

  it("subtracts dates into periods", () => {
    expect(a.subtract(b).toString()).toBe("-6M18D");
    expect(b.subtract(a).toString()).toBe("6M19D");
  });

  it("restores a date from the difference", () => {
    expect(b.add(a.subtract(b)).toYmdInt()).toBe(20150612);
    expect(a.add(b.subtract(a)).toYmdInt()).toBe(20151231);
  });

  it("diff is the period from this date to the other", () => {
    expect(new BusinessDate(20160229).diff(20170228).toString()).toBe("11M30D");
    expect(a.diffInDays(b)).toBe(202);
  });

  it("adds and subtracts periods", () => {
    expect(b.add("1M").toYmdInt()).toBe(20160131);
    expect(b.add(BusinessPeriod.parse("2B")).toYmdInt()).toBe(20160105);
    expect(b.subtract("1M").toYmdInt()).toBe(20151130);
    expect(b.addBusinessDays(2, NO_HOLIDAYS).toYmdInt()).toBe(20160104);
  });

  it("adjusts with the context convention unless one is given", () => {
    const newYear = new BusinessDate(20160101);

    expect(newYear.adjust().toYmdInt()).toBe(20160101);
    expect(newYear.adjust("follow").toYmdInt()).toBe(20160104);
    expect(newYear.adjust("follow", NO_HOLIDAYS).toYmdInt()).toBe(20160101);
    expect(newYear.withContext({ convention: "previous" }).adjust().toYmdInt()).toBe(20151231);
    expect(newYear.isBusinessDay()).toBe(false);
    expect(newYear.isBusinessDay(new BusinessHolidays())).toBe(true);
  });

  it("computes year fractions and day counts", () => {
    const start = new BusinessDate(20190829);

    expect(start.yearFraction(20191129, "act_360")).toBe(0.25555555555555554);
    expect(start.dayCount("2019-11-29", "act_360")).toBe(92);
    expect(new BusinessDate(20160101).yearFraction(20170101)).toBe(366 / 365.25);
    expect(new BusinessDate(20160101, { dayCount: "30/360" }).yearFraction(20160331)).toBe(0.25);
  });

  it("compares and serialises", () => {
    expect(a.compare(b)).toBe(-1);
    expect(a.isBefore(b)).toBe(true);
    expect(b.isAfter("2015-06-12")).toBe(true);
    expect(a.equals(20150612)).toBe(true);
    expect(b.endOfMonth().toYmdInt()).toBe(20151231);
    expect(JSON.stringify({ date: b })).toBe('{"date":"2015-12-31"}');
    expect(b.toExcel()).toBe(42369);
    expect(b.year).toBe(2015);
    expect(b.weekday).toBe(4);
  });
});

describe("default context", () => {
  afterEach(() => {
    resetDefaultContext();
  });

  it("starts on TARGET with no adjustment", () => {
    const context = getDefaultContext();

    expect(context.convention).toBe("no");
    expect(context.dayCount).toBe("act_36525");
    expect(context.baseDate).toBeNull();
  });

  it("supplies the base date and convention to new dates", () => {
    setDefaultContext({ baseDate: 20160101, convention: "mod_follow" });

    const date = new BusinessDate();
    expect(date.toYmdInt()).toBe(20160101);
    expect(date.convention).toBe("mod_follow");
    expect(date.adjust().toYmdInt()).toBe(20160104);
  });

  it("leaves existing dates on the context they were built with", () => {
    const before = new BusinessDate(20160101);
    setDefaultContext({ holidays: NO_HOLIDAYS });

    expect(before.isBusinessDay()).toBe(false);
    expect(new BusinessDate(20160101).isBusinessDay()).toBe(true);
  });
});
