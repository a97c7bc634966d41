import { CalendarDate } from "./calendar-date.js";

export interface SpanBounds {
  min: number;
  max: number;
}

const TABLE_MONTHS = 13;

// Four consecutive years including one leap year cover every month-length pattern.
const WINDOW_START = CalendarDate.of(2000, 1, 1);
const WINDOW_END = CalendarDate.of(2003, 12, 31);

const tables = new Map<1 | -1, readonly SpanBounds[]>();

function buildTable(direction: 1 | -1): readonly SpanBounds[] {
  const bounds: SpanBounds[] = Array.from({ length: TABLE_MONTHS + 1 }, () => ({
    min: Number.POSITIVE_INFINITY,
    max: Number.NEGATIVE_INFINITY,
  }));

  for (let ordinal = WINDOW_START.toOrdinal(); ordinal <= WINDOW_END.toOrdinal(); ordinal += 1) {
    const date = CalendarDate.fromOrdinal(ordinal);
    bounds.forEach((entry, months) => {
      const span = Math.abs(date.daysUntil(date.addMonths(direction * months)));
      entry.min = Math.min(entry.min, span);
      entry.max = Math.max(entry.max, span);
    });
  }

  return Object.freeze(bounds.map((entry) => Object.freeze(entry)));
}

function spanTable(direction: 1 | -1): readonly SpanBounds[] {
  let table = tables.get(direction);
  if (!table) {
    table = buildTable(direction);
    tables.set(direction, table);
  }
  return table;
}

/**
 * Fewest and most calendar days spanned by `months` whole months stepped
 * forward (direction 1) or backward (direction -1) from any start date.
 * Beyond the tabulated range whole years add 365 to the minimum and 366 to
 * the maximum.
 */
export function monthSpanBounds(months: number, direction: 1 | -1): SpanBounds {
  if (!Number.isInteger(months) || months < 0) {
    throw new RangeError("months must be a non-negative integer");
  }

  const table = spanTable(direction);
  const exact = table[months];
  if (exact) {
    return exact;
  }

  const years = Math.floor(months / 12);
  const rest = table[months % 12] ?? { min: 0, max: 0 };
  return { min: 365 * years + rest.min, max: 366 * years + rest.max };
}
