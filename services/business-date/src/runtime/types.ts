import type { ScheduleContext } from "./context.js";

export type ScheduleStub = "short" | "first_long" | "last_long" | "both_long";

export interface ScheduleSpecV0 {
  start: string;
  end: string;
  step: string;
  rolling?: string;
  convention?: string;
  day_count?: string;
  calendar?: string;
  holidays?: string[];
  stub?: ScheduleStub;
  payment_lag?: number;
}

export interface ScheduleRequestV0 {
  contract: { contract_version: "SCHEDULE_V0" };
  request_id?: string;
  schedule: ScheduleSpecV0;
}

export interface ScheduleEngineValidation {
  valid: boolean;
  errors: string[];
}

export interface SchedulePeriod {
  index: number;
  unadjusted_start: string;
  unadjusted_end: string;
  start: string;
  end: string;
  payment_date: string;
  days: number;
  year_fraction: number;
}

export interface ScheduleEngineResult {
  validation: ScheduleEngineValidation;
  warnings: string[];
  periods: SchedulePeriod[];
  metrics: Record<string, number>;
}

export interface ScheduleStep {
  name: string;
  run(ctx: ScheduleContext): void;
}
