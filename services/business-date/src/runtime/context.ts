import type { BusinessDateList, BusinessSchedule } from "../core/schedule.js";
import type { ScheduleSettings } from "./settings.js";
import type { SchedulePeriod } from "./types.js";

export class ScheduleContext {
  readonly settings: ScheduleSettings;
  schedule: BusinessSchedule;
  adjusted: BusinessDateList;
  readonly periods: SchedulePeriod[];
  private readonly metrics: Map<string, number>;
  readonly warnings: string[];

  constructor(settings: ScheduleSettings, schedule: BusinessSchedule) {
    this.settings = settings;
    this.schedule = schedule;
    this.adjusted = schedule;
    this.periods = [];
    this.metrics = new Map();
    this.warnings = [];
  }

  getMetric(name: string): number | undefined {
    return this.metrics.get(name);
  }

  setMetric(name: string, value: number): void {
    this.metrics.set(name, value);
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  toMetricsRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const [name, value] of this.metrics.entries()) {
      record[name] = value;
    }
    return record;
  }
}
