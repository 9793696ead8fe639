export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** The source answered, but the body does not map onto a forecast snapshot. */
export class ForecastValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid forecast payload: ${issues.length ? issues.join("; ") : "unknown issue"}`);
    this.name = "ForecastValidationError";
    this.issues = issues;
  }
}

/** Transport-level failure: refused connection, timeout, DNS, non-2xx status. */
export class ForecastRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ForecastRequestError";
    this.status = status;
  }
}

export class RefreshExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Forecast source unavailable after ${attempts} attempts: ${describeError(lastError)}`);
    this.name = "RefreshExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class RefreshCancelledError extends Error {
  constructor() {
    super("Forecast refresh cancelled");
    this.name = "RefreshCancelledError";
  }
}

export type EndpointCheckFailure = "cannot_connect" | "invalid_data";

export class EndpointCheckError extends Error {
  readonly reason: EndpointCheckFailure;

  constructor(reason: EndpointCheckFailure, message: string) {
    super(message);
    this.name = "EndpointCheckError";
    this.reason = reason;
  }
}
