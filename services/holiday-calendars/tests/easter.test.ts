import { describe, expect, it } from "vitest";
import { easterSunday, offsetFromEaster } from "../src/easter.js";

describe("easter", () => {
  it("computes Easter Sunday for known years", () => {
    expect(easterSunday(2015)).toEqual({ year: 2015, month: 4, day: 5 });
    expect(easterSunday(2016)).toEqual({ year: 2016, month: 3, day: 27 });
    expect(easterSunday(2017)).toEqual({ year: 2017, month: 4, day: 16 });
    expect(easterSunday(2018)).toEqual({ year: 2018, month: 4, day: 1 });
    expect(easterSunday(2019)).toEqual({ year: 2019, month: 4, day: 21 });
    expect(easterSunday(2020)).toEqual({ year: 2020, month: 4, day: 12 });
  });

  it("shifts across month boundaries", () => {
    expect(offsetFromEaster(2018, -2)).toEqual({ year: 2018, month: 3, day: 30 });
    expect(offsetFromEaster(2016, 1)).toEqual({ year: 2016, month: 3, day: 28 });
  });

  it("rejects years before the Gregorian computus applies", () => {
    expect(() => easterSunday(1500)).toThrow(RangeError);
    expect(() => offsetFromEaster(2016, 1.5)).toThrow(TypeError);
  });
});
