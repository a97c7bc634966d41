import { addBusinessDays } from "./adjust.js";
import type { CalendarDate } from "./calendar-date.js";
import { InvalidStepError } from "./errors.js";
import type { HolidaySet } from "./holidays.js";
import type { BusinessPeriod } from "./period.js";

function byOrdinal(a: CalendarDate, b: CalendarDate): number {
  return a.toOrdinal() - b.toOrdinal();
}

// Business-day addition composes, so these points are chained from the anchor.
function businessDayPoints(
  from: CalendarDate,
  to: CalendarDate,
  count: number,
  rolling: CalendarDate,
  holidays: HolidaySet,
): CalendarDate[] {
  const before: CalendarDate[] = [];
  for (let point = addBusinessDays(rolling, -count, holidays); !point.isBefore(from); ) {
    if (point.isBefore(to)) {
      before.push(point);
    }
    point = addBusinessDays(point, -count, holidays);
  }

  const after: CalendarDate[] = [];
  for (let point = rolling; point.isBefore(to); point = addBusinessDays(point, count, holidays)) {
    if (!point.isBefore(from)) {
      after.push(point);
    }
  }
  return [...before.reverse(), ...after];
}

/**
 * Points `rolling + k * step` (k of either sign) with `from <= point < to`,
 * ascending. Classical points are computed from the anchor, never by chaining
 * additions, so month-end anchors keep their phase.
 */
export function gridPoints(
  from: CalendarDate,
  to: CalendarDate,
  step: BusinessPeriod,
  rolling: CalendarDate,
  holidays: HolidaySet,
): CalendarDate[] {
  if (step.isZero) {
    throw new InvalidStepError();
  }
  if (!from.isBefore(to)) {
    return [];
  }

  const forward = step.addTo(rolling, holidays).isBefore(rolling) ? step.negate() : step;
  if (forward.isBusinessDays) {
    return businessDayPoints(from, to, forward.businessdays, rolling, holidays);
  }
  const pointAt = (k: number): CalendarDate => forward.multiply(k).addTo(rolling, holidays);

  let k = 0;
  while (!pointAt(k).isBefore(from)) {
    k -= 1;
  }

  const points: CalendarDate[] = [];
  for (let point = pointAt(k); point.isBefore(to); k += 1, point = pointAt(k)) {
    if (!point.isBefore(from)) {
      points.push(point);
    }
  }
  return points;
}

// The rolling grid between start and end, with start always included and end never.
export function rollingGrid(
  start: CalendarDate,
  end: CalendarDate,
  step: BusinessPeriod,
  rolling: CalendarDate,
  holidays: HolidaySet,
): CalendarDate[] {
  const points = gridPoints(start, end, step, rolling, holidays);
  if (points.length === 0 && !start.isBefore(end)) {
    return [];
  }

  const unique = new Map<number, CalendarDate>([[start.toOrdinal(), start]]);
  for (const point of points) {
    unique.set(point.toOrdinal(), point);
  }
  return Array.from(unique.values()).sort(byOrdinal);
}
