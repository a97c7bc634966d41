import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { ScheduleEngineRuntime } from "../src/index.js";
import type { SchedulePeriod } from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, "../../../testcases/schedule_v0/fixtures");
const expectedDir = join(__dirname, "../../../testcases/schedule_v0/expected");

interface ExpectedRun {
  warnings: string[];
  periods: SchedulePeriod[];
  metrics: Record<string, number>;
}

function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(join(fixturesDir, name), "utf8"));
}

function loadExpected(name: string): ExpectedRun {
  return JSON.parse(readFileSync(join(expectedDir, name), "utf8"));
}

function expectRunToMatch(fixture: string, expectedFile: string): void {
  const expected = loadExpected(expectedFile);
  const result = new ScheduleEngineRuntime(loadFixture(fixture)).run();

  expect(result.validation).toEqual({ valid: true, errors: [] });
  expect(result.warnings).toEqual(expected.warnings);
  expect(result.periods).toHaveLength(expected.periods.length);

  result.periods.forEach((period, index) => {
    const want = expected.periods[index];
    expect(want).toBeDefined();
    if (!want) return;
    expect(period.index).toBe(want.index);
    expect(period.unadjusted_start).toBe(want.unadjusted_start);
    expect(period.unadjusted_end).toBe(want.unadjusted_end);
    expect(period.start).toBe(want.start);
    expect(period.end).toBe(want.end);
    expect(period.payment_date).toBe(want.payment_date);
    expect(period.days).toBe(want.days);
    expect(period.year_fraction).toBeCloseTo(want.year_fraction, 8);
  });

  expect(result.metrics.period_count).toBe(expected.metrics.period_count);
  expect(result.metrics.total_days).toBe(expected.metrics.total_days);
  expect(result.metrics.total_year_fraction).toBeCloseTo(expected.metrics.total_year_fraction ?? Number.NaN, 8);
}

describe("Schedule V0 Regression Tests", () => {
  it("QUARTERLY_TARGET_MOD_FOLLOW_V1 produces expected periods", () => {
    expectRunToMatch("quarterly_target_mod_follow_v1.json", "quarterly_target_mod_follow_v1.expected.json");
  });

  it("MONTHLY_EOM_30E360_V1 produces expected periods", () => {
    expectRunToMatch("monthly_eom_30e360_v1.json", "monthly_eom_30e360_v1.expected.json");
  });
});
