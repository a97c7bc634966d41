import { describe, expect, it } from "vitest";

import { CalendarDate } from "../../src/core/calendar-date.js";
import { MixedKindError, SignError } from "../../src/core/errors.js";
import { NO_HOLIDAYS, targetHolidays } from "../../src/core/holidays.js";
import { BusinessPeriod } from "../../src/core/period.js";

const day = (value: number) => CalendarDate.fromYmdInt(value);

describe("BusinessPeriod construction", () => {
  it("folds months into years", () => {
    const period = BusinessPeriod.parse("18M");

    expect(period.years).toBe(1);
    expect(period.months).toBe(6);
    expect(period.days).toBe(0);
    expect(new BusinessPeriod({ months: 2, days: 15 }).toString()).toBe("2M15D");
    expect(BusinessPeriod.parse("16m").toString()).toBe("1Y4M");
  });

  it("folds negative months symmetrically", () => {
    const period = new BusinessPeriod({ months: -18 });

    expect(period.years).toBe(-1);
    expect(period.months).toBe(-6);
    expect(period.toString()).toBe("-1Y6M");
    expect(Object.is(new BusinessPeriod({ months: -5 }).years, 0)).toBe(true);
  });

  it("rejects business days mixed with classical fields", () => {
    expect(() => new BusinessPeriod({ businessdays: 1, days: 1 })).toThrow(MixedKindError);
  });

  it("rejects inconsistent signs", () => {
    expect(() => new BusinessPeriod({ years: 1, months: -1 })).toThrow(SignError);
    expect(() => new BusinessPeriod({ months: 13, days: -1 })).toThrow(SignError);
  });

  it("rejects non-integer fields", () => {
    expect(() => new BusinessPeriod({ days: 1.5 })).toThrow(TypeError);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(BusinessPeriod.parse("1Y"))).toBe(true);
  });

  it.each(["1Y6M", "-2Y3M10D", "0D", "5B", "-3B", "11M30D", "14D"])(
    "round-trips %s through its text form",
    (text) => {
      const period = BusinessPeriod.parse(text);
      expect(BusinessPeriod.parse(period.toString()).equals(period)).toBe(true);
      expect(period.toString()).toBe(text);
    },
  );

  it("exposes kind and sign", () => {
    expect(BusinessPeriod.parse("3B").isBusinessDays).toBe(true);
    expect(BusinessPeriod.parse("3D").isClassical).toBe(true);
    expect(BusinessPeriod.zero().isZero).toBe(true);
    expect(BusinessPeriod.parse("-1M").sign).toBe(-1);
    expect(BusinessPeriod.parse("0D").sign).toBe(0);
  });
});

describe("BusinessPeriod arithmetic", () => {
  it("treats the zero period as the additive identity", () => {
    for (const text of ["1Y2M3D", "-5B", "7B", "0D"]) {
      const period = BusinessPeriod.parse(text);
      expect(period.add(BusinessPeriod.zero()).equals(period)).toBe(true);
    }
  });

  it("adds and subtracts field-wise", () => {
    expect(BusinessPeriod.parse("1Y").add("8M").toString()).toBe("1Y8M");
    expect(BusinessPeriod.parse("1Y6M").subtract("6M").toString()).toBe("1Y");
    expect(BusinessPeriod.parse("2B").add("3B").toString()).toBe("5B");
    expect(BusinessPeriod.parse("1M").add("0B").toString()).toBe("1M");
  });

  it("refuses to add business days to a classical period", () => {
    expect(() => BusinessPeriod.parse("1M").add("1B")).toThrow(MixedKindError);
  });

  it("multiplies before folding once", () => {
    const period = BusinessPeriod.parse("7M").multiply(2);

    expect(period.years).toBe(1);
    expect(period.months).toBe(2);
    expect(BusinessPeriod.parse("3B").multiply(-2).toString()).toBe("-6B");
    expect(() => BusinessPeriod.parse("1D").multiply(0.5)).toThrow(TypeError);
  });

  it("negates and takes absolute values", () => {
    expect(BusinessPeriod.parse("1Y2D").negate().toString()).toBe("-1Y2D");
    expect(BusinessPeriod.parse("-1Y2D").abs().toString()).toBe("1Y2D");
  });

  it("compares by normalised fields", () => {
    expect(BusinessPeriod.parse("7D").equals("1W")).toBe(true);
    expect(BusinessPeriod.parse("ON").equals("1B")).toBe(true);
    expect(BusinessPeriod.parse("30D").equals("1M")).toBe(false);
    expect(BusinessPeriod.parse("1D").equals("1B")).toBe(false);
    expect(BusinessPeriod.parse("12M").equals({ years: 1 })).toBe(true);
  });

  it("applies years and months in one clamped step, then days, then business days", () => {
    expect(BusinessPeriod.parse("1Y1M").addTo(day(20160229), NO_HOLIDAYS).toString()).toBe("20170329");
    expect(BusinessPeriod.parse("1M1D").addTo(day(20160131), NO_HOLIDAYS).toString()).toBe("20160301");
    expect(BusinessPeriod.parse("2B").addTo(day(20151231), NO_HOLIDAYS).toString()).toBe("20160104");
    expect(BusinessPeriod.parse("2B").addTo(day(20151231), targetHolidays()).toString()).toBe("20160105");
    expect(BusinessPeriod.parse("-1B").addTo(day(20160104), targetHolidays()).toString()).toBe("20151231");
  });
});

describe("BusinessPeriod day bounds", () => {
  it("tabulates forward and backward month spans", () => {
    expect(BusinessPeriod.parse("3M").minDays()).toBe(89);
    expect(BusinessPeriod.parse("3M").maxDays()).toBe(92);
    expect(BusinessPeriod.parse("-3M").minDays()).toBe(-90);
    expect(BusinessPeriod.parse("-3M").maxDays()).toBe(-92);
    expect(BusinessPeriod.parse("1M").minDays()).toBe(28);
    expect(BusinessPeriod.parse("1M").maxDays()).toBe(31);
    expect(BusinessPeriod.parse("13M").minDays()).toBe(393);
    expect(BusinessPeriod.parse("13M").maxDays()).toBe(397);
  });

  it("adds whole years beyond the table", () => {
    expect(BusinessPeriod.parse("2Y").minDays()).toBe(730);
    expect(BusinessPeriod.parse("2Y").maxDays()).toBe(732);
  });

  it("adds days and reports business days as their count", () => {
    expect(BusinessPeriod.parse("1M2D").minDays()).toBe(30);
    expect(BusinessPeriod.parse("10D").maxDays()).toBe(10);
    expect(BusinessPeriod.parse("5B").minDays()).toBe(5);
    expect(BusinessPeriod.parse("5B").maxDays()).toBe(5);
  });
});

describe("BusinessPeriod ordering", () => {
  it("is decided when the day intervals do not overlap", () => {
    expect(BusinessPeriod.parse("1M").lt("1Y")).toBe(true);
    expect(BusinessPeriod.parse("1Y").lt("1M")).toBe(false);
    expect(BusinessPeriod.parse("13M").lt("400D")).toBe(true);
    expect(BusinessPeriod.parse("13M").gt("392D")).toBe(true);
  });

  it("is unordered when the intervals overlap", () => {
    expect(BusinessPeriod.parse("1M").lt("30D")).toBeNull();
    expect(BusinessPeriod.parse("1M").gt("30D")).toBeNull();
    expect(BusinessPeriod.parse("1M").compare("30D")).toBeNull();
  });

  it("uses the interval edges for strict and non-strict comparisons", () => {
    expect(BusinessPeriod.parse("13M").lt("393D")).toBe(false);
    expect(BusinessPeriod.parse("13M").le("397D")).toBe(true);
    expect(BusinessPeriod.parse("13M").le("396D")).toBeNull();
    expect(BusinessPeriod.parse("13M").ge("393D")).toBe(true);
    expect(BusinessPeriod.parse("398D").le("13M")).toBe(false);
  });

  it("orders business days by count and never against classical periods", () => {
    expect(BusinessPeriod.parse("1B").lt("2B")).toBe(true);
    expect(BusinessPeriod.parse("2B").compare("1B")).toBe(1);
    expect(BusinessPeriod.parse("1B").lt("1M")).toBeNull();
    expect(BusinessPeriod.parse("0D").lt("1B")).toBe(true);
  });

  it("compare returns 0 for equal periods", () => {
    expect(BusinessPeriod.parse("1Y").compare("12M")).toBe(0);
    expect(BusinessPeriod.parse("1D").compare("2D")).toBe(-1);
  });
});

describe("BusinessPeriod.between", () => {
  it("is not antisymmetric", () => {
    expect(BusinessPeriod.between(day(20151231), day(20150612)).toString()).toBe("-6M18D");
    expect(BusinessPeriod.between(day(20150612), day(20151231)).toString()).toBe("6M19D");
  });

  it("never passes the end date with the whole-month step", () => {
    expect(BusinessPeriod.between(day(20160229), day(20170228)).toString()).toBe("11M30D");
    expect(BusinessPeriod.between(day(20160229), day(20170301)).toString()).toBe("1Y1D");
    expect(BusinessPeriod.between(day(20150731), day(20170220)).toString()).toBe("1Y6M20D");
    expect(BusinessPeriod.between(day(20160115), day(20160115)).toString()).toBe("0D");
  });

  it("satisfies start + between(start, end) == end", () => {
    const pairs: [number, number][] = [
      [20151231, 20150612],
      [20150612, 20151231],
      [20160229, 20170228],
      [20160131, 20160301],
      [20170331, 20160229],
    ];
    for (const [start, end] of pairs) {
      const period = BusinessPeriod.between(day(start), day(end));
      expect(period.addTo(day(start), NO_HOLIDAYS).toYmdInt()).toBe(end);
    }
  });
});
