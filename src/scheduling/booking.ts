import { SchedulingError } from "../errors.js";
import { addDays, daysBetween, formatDateString, isSameDay, startOfDay } from "../datetime.utils.js";

const WORK_ORDER_PATTERN = /^[A-Z0-9-]{3,20}$/;
const MAX_NOTES_LENGTH = 500;
const MAX_COMPLETION_NOTES_LENGTH = 1000;
const MAX_YEARS_AHEAD = 1;

export type BookingStatus = "not-completed" | "completed-successful" | "completed-unsuccessful";

/**
 * Fields accepted by the {@link Booking} constructor. A new booking only needs
 * the work order and date; persisted bookings also pass their assignment and
 * completion state.
 */
export interface BookingInit {
  workOrderNumber: string;
  scheduledDate: Date;
  notes?: string;
  /** Defaults to now. */
  assignedAt?: Date;
  /** Defaults to `"not-completed"`. */
  status?: BookingStatus;
  completedAt?: Date;
  completionNotes?: string;
}

/**
 * Persisted shape of a booking.
 */
export type BookingRecord = Required<
  Pick<BookingInit, "workOrderNumber" | "scheduledDate" | "assignedAt" | "status">
> &
  Pick<BookingInit, "notes" | "completedAt" | "completionNotes">;

/**
 * Trims and upper-cases a work-order number, then checks it is 3–20
 * characters of letters, digits and hyphens.
 *
 * @throws SchedulingError with code `invalid-work-order`
 */
export function normalizeWorkOrderNumber(workOrderNumber: string): string {
  const normalized = workOrderNumber.trim().toUpperCase();
  if (!normalized) {
    throw new SchedulingError("invalid-work-order", "Work order number cannot be empty");
  }
  if (normalized.length < 3) {
    throw new SchedulingError(
      "invalid-work-order",
      "Work order number must be at least 3 characters long",
      { workOrderNumber },
    );
  }
  if (normalized.length > 20) {
    throw new SchedulingError("invalid-work-order", "Work order number cannot exceed 20 characters", {
      workOrderNumber,
    });
  }
  if (!WORK_ORDER_PATTERN.test(normalized)) {
    throw new SchedulingError(
      "invalid-work-order",
      "Work order number format is invalid (alphanumeric with hyphens only)",
      { workOrderNumber },
    );
  }
  return normalized;
}

function validateScheduledDate(scheduledDate: Date, now: Date): Date {
  if (Number.isNaN(scheduledDate.getTime())) {
    throw new SchedulingError("invalid-scheduled-date", "Scheduled date is not a valid date");
  }
  const limit = new Date(now);
  limit.setFullYear(limit.getFullYear() + MAX_YEARS_AHEAD);
  if (scheduledDate > limit) {
    throw new SchedulingError(
      "invalid-scheduled-date",
      "Scheduled date cannot be more than 1 year in the future",
      { scheduledDate: formatDateString(scheduledDate) },
    );
  }
  return new Date(scheduledDate);
}

function normalizeNotes(notes: string | undefined, maxLength: number, label: string): string | undefined {
  const trimmed = notes?.trim();
  if (!trimmed) return undefined;
  if (trimmed.length > maxLength) {
    throw new SchedulingError("invalid-notes", `${label} cannot exceed ${maxLength} characters`);
  }
  return trimmed;
}

/**
 * One worker's commitment to one work order on one day.
 *
 * Bookings are immutable. {@link Booking.complete} is a one-shot transition:
 * it returns the completed booking and retires the instance it was called on,
 * so completing either of them again throws.
 *
 * There is no lower bound on the scheduled date so historical bookings can be
 * loaded; callers creating new bookings are expected to pass a future date
 * (`Worker.assignToWork` enforces this).
 *
 * @example
 * ```typescript
 * const booking = new Booking({ workOrderNumber: "wo-1042", scheduledDate: tomorrow });
 * booking.workOrderNumber; // "WO-1042"
 * const done = booking.complete(true, "Replaced washer");
 * done.status; // "completed-successful"
 * ```
 */
export class Booking {
  readonly workOrderNumber: string;
  readonly scheduledDate: Date;
  readonly assignedAt: Date;
  readonly notes: string | undefined;
  readonly status: BookingStatus;
  readonly completedAt: Date | undefined;
  readonly completionNotes: string | undefined;

  #retired = false;

  constructor(init: BookingInit) {
    const now = new Date();
    this.workOrderNumber = normalizeWorkOrderNumber(init.workOrderNumber);
    this.scheduledDate = validateScheduledDate(init.scheduledDate, now);
    this.notes = normalizeNotes(init.notes, MAX_NOTES_LENGTH, "Notes");
    this.assignedAt = init.assignedAt ? new Date(init.assignedAt) : now;
    this.status = init.status ?? "not-completed";
    this.completedAt =
      this.status === "not-completed" ? undefined : new Date(init.completedAt ?? this.assignedAt);
    this.completionNotes =
      this.status === "not-completed"
        ? undefined
        : normalizeNotes(init.completionNotes, MAX_COMPLETION_NOTES_LENGTH, "Completion notes");
  }

  get isCompleted(): boolean {
    return this.status !== "not-completed";
  }

  get completedSuccessfully(): boolean | undefined {
    if (!this.isCompleted) return undefined;
    return this.status === "completed-successful";
  }

  /**
   * Marks the work done.
   *
   * @throws SchedulingError with code `booking-already-completed` when this
   *   booking, or the instance it was derived from, was already completed
   */
  complete(successful: boolean, completionNotes?: string): Booking {
    if (this.isCompleted || this.#retired) {
      throw new SchedulingError(
        "booking-already-completed",
        `Work order ${this.workOrderNumber} is already completed`,
        { workOrderNumber: this.workOrderNumber },
      );
    }

    const completed = new Booking({
      workOrderNumber: this.workOrderNumber,
      scheduledDate: this.scheduledDate,
      notes: this.notes,
      assignedAt: this.assignedAt,
      status: successful ? "completed-successful" : "completed-unsuccessful",
      completedAt: new Date(),
      completionNotes,
    });
    this.#retired = true;
    return completed;
  }

  /**
   * Day-granular overlap: the booking occupies its whole scheduled day, and
   * the probe interval is `[date, date + durationMs)`.
   */
  overlapsWith(date: Date, durationMs: number): boolean {
    const dayStart = startOfDay(this.scheduledDate);
    const bookingStart = dayStart.getTime();
    const bookingEnd = addDays(dayStart, 1).getTime();
    const probeStart = date.getTime();
    const probeEnd = probeStart + durationMs;
    return probeStart < bookingEnd && probeEnd > bookingStart;
  }

  daysUntilScheduled(now: Date = new Date()): number {
    return daysBetween(now, this.scheduledDate);
  }

  isScheduledForToday(now: Date = new Date()): boolean {
    return isSameDay(this.scheduledDate, now);
  }

  isOverdue(now: Date = new Date()): boolean {
    return !this.isCompleted && this.scheduledDate < now;
  }

  toRecord(): BookingRecord {
    return {
      workOrderNumber: this.workOrderNumber,
      scheduledDate: new Date(this.scheduledDate),
      assignedAt: new Date(this.assignedAt),
      notes: this.notes,
      status: this.status,
      completedAt: this.completedAt ? new Date(this.completedAt) : undefined,
      completionNotes: this.completionNotes,
    };
  }

  toString(): string {
    let state: string;
    if (this.status === "completed-successful") state = "Completed Successfully";
    else if (this.status === "completed-unsuccessful") state = "Completed with Issues";
    else state = this.isOverdue() ? "Overdue" : "Pending";
    return `Work Order ${this.workOrderNumber} scheduled for ${formatDateString(this.scheduledDate)} - ${state}`;
  }
}
