export class BusinessDateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BusinessDateError";
  }
}

// Raised when a date, period or combined literal matches no recognised form.
export class FormatError extends BusinessDateError {
  readonly input: unknown;

  constructor(message: string, input?: unknown) {
    super(message);
    this.name = "FormatError";
    this.input = input;
  }
}

export class MixedKindError extends BusinessDateError {
  constructor(message = "a period is either business days or years/months/days, never both") {
    super(message);
    this.name = "MixedKindError";
  }
}

export class SignError extends BusinessDateError {
  constructor(message = "all non-zero period fields must share one sign") {
    super(message);
    this.name = "SignError";
  }
}

export class InvalidStepError extends BusinessDateError {
  constructor(message = "step must be a non-zero period") {
    super(message);
    this.name = "InvalidStepError";
  }
}

export class UnsupportedConventionError extends BusinessDateError {
  readonly keyword: string;

  constructor(kind: string, keyword: string) {
    super(`Unsupported ${kind} convention: ${keyword}`);
    this.name = "UnsupportedConventionError";
    this.keyword = keyword;
  }
}
