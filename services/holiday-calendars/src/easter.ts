import { DateTime } from "luxon";

export interface DayTriple {
  year: number;
  month: number;
  day: number;
}

// Anonymous Gregorian computus (Meeus/Jones/Butcher).
export function easterSunday(year: number): DayTriple {
  if (!Number.isInteger(year) || year < 1583) {
    throw new RangeError("year must be an integer no earlier than 1583");
  }

  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const n = h + l - 7 * m + 114;

  return { year, month: Math.floor(n / 31), day: (n % 31) + 1 };
}

export function offsetFromEaster(year: number, offsetDays: number): DayTriple {
  if (!Number.isInteger(offsetDays)) {
    throw new TypeError("offsetDays must be an integer");
  }
  const easter = easterSunday(year);
  const shifted = DateTime.utc(easter.year, easter.month, easter.day).plus({ days: offsetDays });
  return { year: shifted.year, month: shifted.month, day: shifted.day };
}
