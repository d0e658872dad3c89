/**
 * Errors raised at the advisor and transport boundaries. Data-quality
 * problems in scenes are never errors; they become issues.
 */

/** The text-generation service answered with a non-success status. */
export class AdvisorServiceError extends Error {
  constructor(message: string, public readonly status: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'AdvisorServiceError';
  }
}

/** The service answered, but not with a JSON array of issues. */
export class AdvisorResponseError extends Error {
  constructor(message: string, public readonly responseText: string) {
    super(message);
    this.name = 'AdvisorResponseError';
  }
}

export class AdvisorTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, cause?: unknown) {
    super(`Advisor request timed out after ${timeoutMs}ms`, { cause });
    this.name = 'AdvisorTimeoutError';
  }
}

/** Malformed validation request; answered with 400 before the engine runs. */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
