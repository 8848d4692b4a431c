/**
 * Error taxonomy for the clinical workflow.
 *
 * Only `InvalidInputError` is expected to reach callers as an exception.
 * Collaborator failures are folded into stage outcomes, and the remaining
 * classes signal programming defects.
 */

export type ErrorCode =
  | "invalid_input"
  | "collaborator_failure"
  | "aggregation_error"
  | "workflow_invariant";

export abstract class WorkflowError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends WorkflowError {
  readonly code = "invalid_input";
}

/**
 * Raised by LLM, retrieval and interaction-table collaborators. `retryable`
 * marks transient conditions (timeouts, rate limits, 5xx responses).
 */
export class CollaboratorError extends WorkflowError {
  readonly code = "collaborator_failure";
  readonly collaborator: string;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    collaborator: string,
    message: string,
    options: { retryable: boolean; status?: number; cause?: unknown },
  ) {
    super(`${collaborator}: ${message}`, { cause: options.cause });
    this.collaborator = collaborator;
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

export class AggregationError extends WorkflowError {
  readonly code = "aggregation_error";
}

export class WorkflowInvariantError extends WorkflowError {
  readonly code = "workflow_invariant";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Timeouts from `AbortSignal.timeout` and dropped connections are transient. */
export function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  // undici reports connection failures as TypeError("fetch failed")
  return error instanceof TypeError && /fetch failed/i.test(error.message);
}
