import { addBusinessDays, adjust } from "../core/adjust.js";
import { dayCount, yearFraction } from "../core/day-count.js";
import type { ScheduleContext } from "./context.js";
import type { ScheduleStep } from "./types.js";

export const stubStep: ScheduleStep = {
  name: "stub",
  run(ctx) {
    const { stub } = ctx.settings;
    if (stub === "first_long" || stub === "both_long") {
      ctx.schedule = ctx.schedule.firstStubLong();
    }
    if (stub === "last_long" || stub === "both_long") {
      ctx.schedule = ctx.schedule.lastStubLong();
    }
  },
};

export const adjustStep: ScheduleStep = {
  name: "adjust",
  run(ctx) {
    const { convention, holidays } = ctx.settings;
    ctx.adjusted = ctx.schedule.adjust(convention, holidays);

    const dates = ctx.adjusted.toArray();
    for (let i = 1; i < dates.length; i += 1) {
      const previous = dates[i - 1];
      const current = dates[i];
      if (previous && current && !current.isAfter(previous)) {
        ctx.addWarning(
          `Adjusted dates ${i - 1} and ${i} collide on ${current.toISODate()} (${convention}).`,
        );
      }
    }
  },
};

export const periodStep: ScheduleStep = {
  name: "periods",
  run(ctx) {
    const { convention, dayCount: basis, holidays, paymentLag } = ctx.settings;
    const unadjusted = ctx.schedule.periods();

    ctx.adjusted.periods().forEach(([start, end], index) => {
      const pair = unadjusted[index];
      if (!pair) {
        return;
      }
      const payment = adjust(addBusinessDays(end.date, paymentLag, holidays), convention, holidays);
      ctx.periods.push({
        index: index + 1,
        unadjusted_start: pair[0].toISODate(),
        unadjusted_end: pair[1].toISODate(),
        start: start.toISODate(),
        end: end.toISODate(),
        payment_date: payment.toISODate(),
        days: dayCount(start.date, end.date, basis),
        year_fraction: yearFraction(start.date, end.date, basis),
      });
    });
  },
};

export const metricsStep: ScheduleStep = {
  name: "metrics",
  run(ctx) {
    ctx.setMetric("period_count", ctx.periods.length);
    ctx.setMetric(
      "total_days",
      ctx.periods.reduce((sum, period) => sum + period.days, 0),
    );
    ctx.setMetric(
      "total_year_fraction",
      ctx.periods.reduce((sum, period) => sum + period.year_fraction, 0),
    );
  },
};

export const DEFAULT_STEPS: readonly ScheduleStep[] = [stubStep, adjustStep, periodStep, metricsStep];
