import { generateSchedule } from "../core/schedule.js";
import { isScheduleRequest, validateRequest } from "../validate/validate.js";
import { ScheduleContext } from "./context.js";
import { log } from "./log.js";
import { resolveScheduleSettings } from "./settings.js";
import type { ScheduleSettings } from "./settings.js";
import { DEFAULT_STEPS } from "./steps.js";
import type { ScheduleEngineResult, ScheduleEngineValidation, ScheduleStep } from "./types.js";

interface CheckedRequest {
  validation: ScheduleEngineValidation;
  settings: ScheduleSettings | null;
}

export class ScheduleEngineRuntime {
  private readonly request: unknown;
  private readonly steps: readonly ScheduleStep[];

  constructor(request: unknown, steps: readonly ScheduleStep[] = DEFAULT_STEPS) {
    this.request = request;
    this.steps = steps;
  }

  validate(): ScheduleEngineValidation {
    return this.check().validation;
  }

  run(): ScheduleEngineResult {
    const { validation, settings } = this.check();
    if (!validation.valid || !settings) {
      log.debug("Schedule request rejected", { errors: validation.errors });
      return {
        validation,
        warnings: [],
        periods: [],
        metrics: {},
      };
    }

    log.debug("Schedule run started", {
      start: settings.start.toISODate(),
      end: settings.end.toISODate(),
      step: settings.step.toString(),
      calendar: settings.calendarId,
    });

    const schedule = generateSchedule(
      { start: settings.start, end: settings.end, step: settings.step, rolling: settings.rolling },
      { holidays: settings.holidays },
    );
    const context = new ScheduleContext(settings, schedule);

    for (const step of this.steps) {
      step.run(context);
    }
    context.warnings.forEach((warning) => log.warn(warning));

    log.debug("Schedule run finished", context.toMetricsRecord());
    return {
      validation,
      warnings: context.warnings,
      periods: context.periods,
      metrics: context.toMetricsRecord(),
    };
  }

  private check(): CheckedRequest {
    const schema = validateRequest(this.request);
    if (!schema.valid || !isScheduleRequest(this.request)) {
      return { validation: schema, settings: null };
    }

    const { settings, errors } = resolveScheduleSettings(this.request.schedule);
    return {
      validation: { valid: errors.length === 0, errors },
      settings,
    };
  }
}
