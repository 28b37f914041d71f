/**
 * Machine-readable reason attached to every {@link SchedulingError}.
 */
export type SchedulingErrorCode =
  | "invalid-work-order"
  | "invalid-scheduled-date"
  | "invalid-notes"
  | "invalid-time-slot"
  | "booking-already-completed"
  | "booking-not-found"
  | "worker-inactive"
  | "capacity-exceeded"
  | "invalid-status-transition";

/**
 * Error thrown when an engine invariant is violated.
 *
 * These represent programming or data errors (a malformed work-order number,
 * a slot ending before it starts, completing a booking twice). Business
 * validation failures such as a unit conflict are never thrown; they come back
 * as a `ValidationOutcome` with `isValid: false`.
 *
 * @category Errors
 */
export class SchedulingError extends Error {
  public readonly code: SchedulingErrorCode;
  public readonly details: unknown;

  constructor(code: SchedulingErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "SchedulingError";
    this.code = code;
    this.details = details;
  }
}

export function isSchedulingError(value: unknown): value is SchedulingError {
  return value instanceof SchedulingError;
}
