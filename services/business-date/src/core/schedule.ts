import { BusinessDate } from "./business-date.js";
import type { BusinessDateInput } from "./business-date.js";
import { resolveContext } from "./context.js";
import type { BusinessContext, ContextOptions } from "./context.js";
import type { HolidaySet } from "./holidays.js";
import { BusinessPeriod } from "./period.js";
import type { PeriodInput } from "./period.js";
import { rollingGrid } from "./range.js";

export interface RangeSpec {
  start: BusinessDateInput;
  // Omitted: the range runs from the base date to `start`.
  end?: BusinessDateInput;
  step?: PeriodInput;
  rolling?: BusinessDateInput;
}

export class BusinessDateList implements Iterable<BusinessDate> {
  readonly dates: readonly BusinessDate[];
  readonly length: number;

  constructor(dates: Iterable<BusinessDate>) {
    const copied = Array.from(dates, (date, index) => {
      if (!(date instanceof BusinessDate)) {
        throw new TypeError(`dates[${index}] must be a BusinessDate`);
      }
      return date;
    });
    this.dates = Object.freeze(copied);
    this.length = copied.length;
  }

  [Symbol.iterator](): Iterator<BusinessDate> {
    return this.dates[Symbol.iterator]();
  }

  get(index: number): BusinessDate {
    if (!Number.isInteger(index)) {
      throw new TypeError("index must be an integer");
    }
    const date = this.dates[index];
    if (index < 0 || date === undefined) {
      throw new RangeError(`index must be between 0 and ${Math.max(0, this.length - 1)}`);
    }
    return date;
  }

  first(): BusinessDate | undefined {
    return this.dates[0];
  }

  last(): BusinessDate | undefined {
    return this.dates[this.length - 1];
  }

  indexOf(value: BusinessDateInput): number {
    const target = BusinessDate.from(value).toYmdInt();
    return this.dates.findIndex((date) => date.toYmdInt() === target);
  }

  includes(value: BusinessDateInput): boolean {
    return this.indexOf(value) >= 0;
  }

  map<T>(fn: (date: BusinessDate, index: number) => T): T[] {
    return this.dates.map(fn);
  }

  // Each element is adjusted on its own; neighbours may coincide afterwards.
  adjust(convention?: string, holidays?: HolidaySet): BusinessDateList {
    return new BusinessDateList(this.dates.map((date) => date.adjust(convention, holidays)));
  }

  periods(): [BusinessDate, BusinessDate][] {
    const pairs: [BusinessDate, BusinessDate][] = [];
    for (let i = 1; i < this.length; i += 1) {
      pairs.push([this.get(i - 1), this.get(i)]);
    }
    return pairs;
  }

  yearFractions(convention?: string): number[] {
    return this.periods().map(([start, end]) => start.yearFraction(end, convention));
  }

  toArray(): BusinessDate[] {
    return Array.from(this.dates);
  }

  toYmdInts(): number[] {
    return this.dates.map((date) => date.toYmdInt());
  }

  toStrings(): string[] {
    return this.dates.map((date) => date.toString());
  }
}

export class BusinessSchedule extends BusinessDateList {
  /**
   * Drops the second date so the first two periods merge into one long stub.
   * Each call removes whatever is second at that point; it is not a fixed point.
   */
  firstStubLong(): BusinessSchedule {
    if (this.length < 3) {
      return this;
    }
    return new BusinessSchedule(this.dates.filter((_, index) => index !== 1));
  }

  lastStubLong(): BusinessSchedule {
    if (this.length < 3) {
      return this;
    }
    return new BusinessSchedule(this.dates.filter((_, index) => index !== this.length - 2));
  }

  override adjust(convention?: string, holidays?: HolidaySet): BusinessSchedule {
    return new BusinessSchedule(this.dates.map((date) => date.adjust(convention, holidays)));
  }
}

interface ResolvedRange {
  context: BusinessContext;
  start: BusinessDate;
  end: BusinessDate;
  step: BusinessPeriod;
}

function resolveRange(spec: RangeSpec, options: ContextOptions): ResolvedRange {
  const context = resolveContext(options);
  const coerce = (value: BusinessDateInput): BusinessDate => BusinessDate.from(value, { context });

  const start = spec.end === undefined ? new BusinessDate(null, { context }) : coerce(spec.start);
  const end = coerce(spec.end ?? spec.start);
  return { context, start, end, step: BusinessPeriod.from(spec.step ?? "1D") };
}

function gridDates(
  { context, start, end, step }: ResolvedRange,
  rolling: BusinessDate,
): BusinessDate[] {
  return rollingGrid(start.date, end.date, step, rolling.date, context.holidays).map(
    (date) => new BusinessDate(date, { context }),
  );
}

/**
 * Dates `rolling + k * step` in [start, end), with start always included.
 * `rolling` defaults to start.
 */
export function generateRange(spec: RangeSpec, options: ContextOptions = {}): BusinessDateList {
  const range = resolveRange(spec, options);
  const rolling =
    spec.rolling === undefined ? range.start : BusinessDate.from(spec.rolling, { context: range.context });
  return new BusinessDateList(gridDates(range, rolling));
}

/**
 * The range rolled from `rolling` (default: end) with both endpoints present.
 */
export function generateSchedule(spec: RangeSpec, options: ContextOptions = {}): BusinessSchedule {
  const range = resolveRange(spec, options);
  const rolling =
    spec.rolling === undefined ? range.end : BusinessDate.from(spec.rolling, { context: range.context });

  const dates = gridDates(range, rolling);
  const first = dates[0];
  if (first === undefined || !first.equals(range.start)) {
    dates.unshift(range.start);
  }
  const last = dates[dates.length - 1];
  if (last === undefined || !last.equals(range.end)) {
    dates.push(range.end);
  }
  return new BusinessSchedule(dates);
}
