import { FormatError, SignError } from "./errors.js";

export interface PeriodFields {
  years: number;
  months: number;
  days: number;
  businessdays: number;
}

const UNIT_WORDS: readonly (readonly [RegExp, string])[] = [
  [/BUSINESSDAYS?/g, "B"],
  [/YEARS?/g, "Y"],
  [/QUARTERS?/g, "Q"],
  [/MONTHS?/g, "M"],
  [/WEEKS?/g, "W"],
  [/DAYS?/g, "D"],
];

const SHORTCUTS: Readonly<Record<string, number>> = {
  ON: 1,
  TN: 2,
  DD: 3,
};

export const CLASSICAL_TERMS_SOURCE = "(?:\\d+[YQMWD])+";

export function zeroFields(): PeriodFields {
  return { years: 0, months: 0, days: 0, businessdays: 0 };
}

export function compactPeriodText(text: string): string {
  let compact = text.toUpperCase().replace(/\s+/g, "");
  for (const [pattern, unit] of UNIT_WORDS) {
    compact = compact.replace(pattern, unit);
  }
  return compact;
}

/**
 * Parses the period mini-language into raw, un-normalised fields.
 *
 * `1Y3M4D`, `-2Q`, `10B`, `3 Months`, and the shortcuts `ON`, `TN`, `DD`.
 * Quarters fold into months and weeks into days here; month carry and the
 * kind and sign invariants are enforced by BusinessPeriod.
 */
export function parsePeriodFields(text: string): PeriodFields {
  if (typeof text !== "string") {
    throw new FormatError("period literal must be a string", text);
  }

  const compact = compactPeriodText(text);
  const fields = zeroFields();
  if (compact === "") {
    return fields;
  }

  const shortcut = SHORTCUTS[compact];
  if (shortcut !== undefined) {
    fields.businessdays = shortcut;
    return fields;
  }

  let sign = 1;
  let body = compact;
  if (body.startsWith("-") || body.startsWith("+")) {
    sign = body.startsWith("-") ? -1 : 1;
    body = body.slice(1);
  }
  if (body === "") {
    throw new FormatError(`Unrecognised period literal: ${text}`, text);
  }

  const term = /([+-]?)(\d+)([YQMWDB])/y;
  let hasBusinessDays = false;
  let hasClassical = false;

  while (term.lastIndex < body.length) {
    const match = term.exec(body);
    if (!match) {
      throw new FormatError(`Unrecognised period literal: ${text}`, text);
    }
    if (match[1] === "-") {
      throw new SignError(`a sign is only allowed at the start of a period: ${text}`);
    }

    const count = Number(match[2]);
    if (!Number.isSafeInteger(count)) {
      throw new FormatError(`Period count out of range: ${text}`, text);
    }

    switch (match[3]) {
      case "Y":
        fields.years += count;
        break;
      case "Q":
        fields.months += 3 * count;
        break;
      case "M":
        fields.months += count;
        break;
      case "W":
        fields.days += 7 * count;
        break;
      case "D":
        fields.days += count;
        break;
      default:
        fields.businessdays += count;
        hasBusinessDays = true;
        continue;
    }
    hasClassical = true;
  }

  if (hasBusinessDays && hasClassical) {
    throw new FormatError(`Business days cannot be combined with other units: ${text}`, text);
  }

  const signed = (value: number): number => (value === 0 ? 0 : sign * value);
  return {
    years: signed(fields.years),
    months: signed(fields.months),
    days: signed(fields.days),
    businessdays: signed(fields.businessdays),
  };
}

export function isPeriodLiteral(text: string): boolean {
  try {
    parsePeriodFields(text);
    return true;
  } catch (error) {
    if (error instanceof FormatError || error instanceof SignError) {
      return false;
    }
    throw error;
  }
}

export function formatPeriod(fields: PeriodFields): string {
  if (fields.businessdays !== 0) {
    return `${fields.businessdays}B`;
  }

  const parts: string[] = [];
  if (fields.years !== 0) parts.push(`${Math.abs(fields.years)}Y`);
  if (fields.months !== 0) parts.push(`${Math.abs(fields.months)}M`);
  if (fields.days !== 0) parts.push(`${Math.abs(fields.days)}D`);
  if (parts.length === 0) {
    return "0D";
  }

  const negative = fields.years < 0 || fields.months < 0 || fields.days < 0;
  return `${negative ? "-" : ""}${parts.join("")}`;
}
