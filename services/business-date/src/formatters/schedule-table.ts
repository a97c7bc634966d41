/**
 * Schedule Formatter
 *
 * Renders a schedule run as a fixed-width text table or a JSON-friendly record.
 */

import type { ScheduleEngineResult, SchedulePeriod } from "../runtime/types.js";

const INDEX_WIDTH = 4;
const DATE_WIDTH = 12;
const DAYS_WIDTH = 6;
const FRACTION_WIDTH = 12;

const COLUMNS: readonly { label: string; width: number }[] = [
  { label: "#", width: INDEX_WIDTH },
  { label: "Start", width: DATE_WIDTH },
  { label: "End", width: DATE_WIDTH },
  { label: "Payment", width: DATE_WIDTH },
  { label: "Days", width: DAYS_WIDTH },
  { label: "Year frac", width: FRACTION_WIDTH },
];

const TABLE_WIDTH = COLUMNS.reduce((sum, column) => sum + column.width, 0);

function formatFraction(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return "-";
  return value.toFixed(6);
}

function formatRow(period: SchedulePeriod): string {
  return (
    String(period.index).padStart(INDEX_WIDTH) +
    period.start.padStart(DATE_WIDTH) +
    period.end.padStart(DATE_WIDTH) +
    period.payment_date.padStart(DATE_WIDTH) +
    String(period.days).padStart(DAYS_WIDTH) +
    formatFraction(period.year_fraction).padStart(FRACTION_WIDTH)
  );
}

export function formatScheduleAsText(result: ScheduleEngineResult): string {
  if (!result.validation.valid) {
    return ["Invalid schedule request:", ...result.validation.errors.map((error) => `  - ${error}`)].join("\n") + "\n";
  }

  let output = COLUMNS.map((column) => column.label.padStart(column.width)).join("") + "\n";
  output += "=".repeat(TABLE_WIDTH) + "\n";

  for (const period of result.periods) {
    output += formatRow(period) + "\n";
  }

  output += "-".repeat(TABLE_WIDTH) + "\n";
  const totalDays = result.metrics.total_days;
  output +=
    "Total".padEnd(INDEX_WIDTH + DATE_WIDTH * 3) +
    (totalDays === undefined ? "-" : String(totalDays)).padStart(DAYS_WIDTH) +
    formatFraction(result.metrics.total_year_fraction).padStart(FRACTION_WIDTH) +
    "\n";

  if (result.warnings.length > 0) {
    output += "\nWarnings:\n";
    output += result.warnings.map((warning) => `  - ${warning}\n`).join("");
  }
  return output;
}

/**
 * Flattens a run into the shape returned to API callers.
 */
export function formatScheduleAsJson(result: ScheduleEngineResult): Record<string, unknown> {
  return {
    valid: result.validation.valid,
    errors: result.validation.errors,
    warnings: result.warnings,
    periods: result.periods.map((period) => ({
      index: period.index,
      unadjustedStart: period.unadjusted_start,
      unadjustedEnd: period.unadjusted_end,
      start: period.start,
      end: period.end,
      paymentDate: period.payment_date,
      days: period.days,
      yearFraction: period.year_fraction,
    })),
    totals: {
      periodCount: result.metrics.period_count ?? 0,
      days: result.metrics.total_days ?? 0,
      yearFraction: result.metrics.total_year_fraction ?? 0,
    },
  };
}
