import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "../config.js";
import { SchedulingError } from "../errors.js";
import {
  addDays,
  daysBetween,
  formatDateString,
  generateDays,
  isBeforeToday,
  startOfDay,
} from "../datetime.utils.js";
import {
  assignmentFailure,
  assignmentSuccess,
  type AssignmentValidationResult,
} from "../assignment/validation.types.js";
import {
  isAssignableStatus,
  isEmergency,
  requiredSpecializationFor,
  type MaintenanceRequest,
} from "../requests/request-status.js";
import { Booking, normalizeWorkOrderNumber } from "../scheduling/booking.js";
import {
  canHandleWork,
  isExactMatch,
  specializationDisplayName,
} from "../specialization/specialization.js";
import type { DateRange, Specialization } from "../types.js";
import {
  buildReasoning,
  calculateConfidence,
  calculateScore,
  estimateCompletionMinutes,
  type FitnessContext,
} from "./scoring.js";
import { createAvailabilitySummary, type AvailabilitySummary } from "./availability.js";

/** Day count charged in the availability score when no free day is found. */
const NO_AVAILABILITY_DAYS = 999;

/**
 * Free slots on a day: 2 = no bookings, 1 = partially booked, 0 = full.
 */
export type DayAvailability = 0 | 1 | 2;

export interface WorkerInit {
  id: string;
  email: string;
  name?: string;
  specialization: Specialization;
  /** Defaults to true. */
  isActive?: boolean;
  /**
   * Explicit emergency roster membership. When omitted, capability follows
   * `settings.emergencySpecializations`.
   */
  emergencyCapable?: boolean;
  bookings?: readonly Booking[];
  settings?: EngineSettings;
}

export interface AvailabilityOptions {
  /** Use the emergency day capacity instead of the normal one. */
  emergency?: boolean;
}

export interface AssignToWorkOptions {
  notes?: string;
  /** Allows the booking to use the emergency day capacity. */
  emergency?: boolean;
}

/**
 * A maintenance worker and the bookings they own.
 *
 * Every query first checks {@link Worker.isActive}; an inactive worker scores
 * 0, is never eligible, has no availability and no estimated duration.
 * {@link Worker.assignToWork} and {@link Worker.completeWork} are the only
 * mutating operations and must run after validation, under whatever locking
 * the caller uses for persistence.
 *
 * @example
 * ```typescript
 * const worker = new Worker({
 *   id: "w-1",
 *   email: "pat@example.com",
 *   specialization: "Plumbing",
 * });
 *
 * if (worker.validateAssignment(request, date).isValid) {
 *   worker.assignToWork("WO-1001", date);
 * }
 * ```
 */
export class Worker {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly settings: EngineSettings;

  #specialization: Specialization;
  #isActive: boolean;
  #deactivationReason: string | undefined;
  #emergencyCapable: boolean | undefined;
  #bookings: Booking[];

  constructor(init: WorkerInit) {
    this.id = init.id;
    this.email = init.email.trim().toLowerCase();
    this.name = init.name?.trim() || this.email;
    this.settings = init.settings ?? DEFAULT_ENGINE_SETTINGS;
    this.#specialization = init.specialization;
    this.#isActive = init.isActive ?? true;
    this.#emergencyCapable = init.emergencyCapable;
    this.#bookings = [...(init.bookings ?? [])];
  }

  get specialization(): Specialization {
    return this.#specialization;
  }

  get isActive(): boolean {
    return this.#isActive;
  }

  get bookings(): readonly Booking[] {
    return [...this.#bookings];
  }

  get openBookingCount(): number {
    return this.#bookings.filter((b) => !b.isCompleted).length;
  }

  /** Why the worker was last deactivated; cleared on activation. */
  get deactivationReason(): string | undefined {
    return this.#deactivationReason;
  }

  activate(): void {
    this.#isActive = true;
    this.#deactivationReason = undefined;
  }

  /**
   * Existing bookings are kept; the worker simply stops being matched.
   */
  deactivate(reason?: string): void {
    this.#isActive = false;
    this.#deactivationReason = reason?.trim() || undefined;
  }

  changeSpecialization(specialization: Specialization): void {
    this.#specialization = specialization;
  }

  canHandle(required: Specialization): boolean {
    return canHandleWork(this.#specialization, required);
  }

  /**
   * Emergency capability comes from the explicit flag or, failing that, the
   * specialization. Current bookings play no part.
   */
  isEmergencyResponseCapable(): boolean {
    if (!this.#isActive) return false;
    return this.#emergencyCapable ?? this.settings.emergencySpecializations.includes(this.#specialization);
  }

  // ==========================================================================
  // Per-day availability
  // ==========================================================================

  /**
   * Open (not completed) bookings on the calendar day of `date`.
   */
  openBookingsOn(date: Date): number {
    const day = formatDateString(date);
    return this.#bookings.filter((b) => !b.isCompleted && formatDateString(b.scheduledDate) === day)
      .length;
  }

  availabilityForDate(date: Date, options: AvailabilityOptions = {}): DayAvailability {
    if (!this.#isActive || isBeforeToday(date)) return 0;

    const capacity = options.emergency
      ? this.settings.emergencySlotCapacityPerDay
      : this.settings.slotCapacityPerDay;
    const count = this.openBookingsOn(date);
    if (count >= capacity) return 0;
    return count === 0 ? 2 : 1;
  }

  /**
   * Active, not in the past, and below the day capacity.
   */
  isAvailableForWork(date: Date, options: AvailabilityOptions = {}): boolean {
    return this.availabilityForDate(date, options) > 0;
  }

  isFullyBookedOn(date: Date): boolean {
    return this.openBookingsOn(date) >= this.settings.slotCapacityPerDay;
  }

  /**
   * Open bookings scheduled from `referenceDate` through
   * `referenceDate + horizonDays` (inclusive, by calendar day).
   */
  upcomingWorkloadCount(
    referenceDate: Date = new Date(),
    horizonDays: number = this.settings.workloadHorizonDays,
  ): number {
    const from = formatDateString(referenceDate);
    const to = formatDateString(addDays(referenceDate, horizonDays));
    return this.#bookings.filter((b) => {
      if (b.isCompleted) return false;
      const day = formatDateString(b.scheduledDate);
      return day >= from && day <= to;
    }).length;
  }

  /**
   * Days in `range` holding at least the day capacity of open bookings.
   * With `includeEmergencyOverride` a day only counts as booked once the
   * emergency capacity is used up.
   */
  bookedDates(range: DateRange, options: { includeEmergencyOverride?: boolean } = {}): string[] {
    if (!this.#isActive) return [];
    const limit = options.includeEmergencyOverride
      ? this.settings.emergencySlotCapacityPerDay
      : this.settings.slotCapacityPerDay;
    const counts = this.#openCountsByDay();
    return generateDays(range).filter((day) => (counts.get(day) ?? 0) >= limit);
  }

  /**
   * Days in `range` with exactly one open booking.
   */
  partiallyBookedDates(range: DateRange): string[] {
    if (!this.#isActive) return [];
    const counts = this.#openCountsByDay();
    return generateDays(range).filter((day) => counts.get(day) === 1);
  }

  /**
   * First day with no open bookings, searching from `referenceDate` (or today,
   * whichever is later) for `lookaheadDays` days.
   */
  nextFullyAvailableDate(
    referenceDate: Date = new Date(),
    lookaheadDays: number = this.settings.availabilityLookaheadDays,
  ): Date | undefined {
    if (!this.#isActive) return undefined;

    const today = startOfDay(new Date());
    const searchStart = isBeforeToday(referenceDate) ? today : startOfDay(referenceDate);
    for (let offset = 0; offset <= lookaheadDays; offset++) {
      const date = addDays(searchStart, offset);
      if (this.availabilityForDate(date) === 2) return date;
    }
    return undefined;
  }

  /**
   * `daysUntilNextAvailable * 100 + upcomingWorkload`; lower is better.
   * Inactive workers get `Number.MAX_SAFE_INTEGER` so they always sort last.
   */
  availabilityScore(referenceDate: Date = new Date()): number {
    if (!this.#isActive) return Number.MAX_SAFE_INTEGER;

    const next = this.nextFullyAvailableDate(referenceDate);
    const daysUntilAvailable = next ? daysBetween(referenceDate, next) : NO_AVAILABILITY_DAYS;
    return daysUntilAvailable * 100 + this.upcomingWorkloadCount(referenceDate);
  }

  availabilitySummary(
    range: DateRange,
    referenceDate: Date = new Date(),
    options: { includeEmergencyOverride?: boolean } = {},
  ): AvailabilitySummary {
    return createAvailabilitySummary(this, range, referenceDate, options);
  }

  // ==========================================================================
  // Fitness for a request
  // ==========================================================================

  score(request: MaintenanceRequest): number {
    return calculateScore(this.#fitnessContext(request), this.settings);
  }

  /**
   * Active, able to handle the required trade, and the request is in a
   * status a worker can still be matched against.
   */
  isEligible(request: MaintenanceRequest): boolean {
    return (
      this.#isActive &&
      this.canHandle(requiredSpecializationFor(request)) &&
      isAssignableStatus(request.status)
    );
  }

  recommendationConfidence(request: MaintenanceRequest): number {
    return calculateConfidence(this.#fitnessContext(request), this.settings);
  }

  recommendationReasoning(request: MaintenanceRequest): string {
    return buildReasoning(this.#fitnessContext(request), this.settings);
  }

  /**
   * Estimated time on site in minutes; 0 for an inactive worker.
   */
  estimatedCompletionMinutes(request: MaintenanceRequest): number {
    return estimateCompletionMinutes(this.#fitnessContext(request), this.settings);
  }

  /**
   * Checks the worker-side preconditions for booking `request` on
   * `scheduledDate`. Fails for an inactive worker or a past date; everything
   * else that deserves attention comes back as a warning.
   */
  validateAssignment(request: MaintenanceRequest, scheduledDate: Date): AssignmentValidationResult {
    if (!this.#isActive) {
      return assignmentFailure(`Worker ${this.email} is not active`);
    }
    if (isBeforeToday(scheduledDate)) {
      return assignmentFailure("Scheduled date must be today or in the future");
    }

    const warnings: string[] = [];
    const required = requiredSpecializationFor(request);
    if (!this.canHandle(required)) {
      warnings.push(
        `Worker specialization ${specializationDisplayName(this.#specialization)} does not cover ${specializationDisplayName(required)} work`,
      );
    } else if (!isExactMatch(this.#specialization, required)) {
      warnings.push(
        `General Maintenance worker assigned to ${specializationDisplayName(required)} work`,
      );
    }
    if (!this.isAvailableForWork(scheduledDate, { emergency: isEmergency(request) })) {
      warnings.push(`Worker is fully booked on ${formatDateString(scheduledDate)}`);
    }
    if (!isAssignableStatus(request.status)) {
      warnings.push(`Request is ${request.status} and cannot take a new assignment`);
    }
    return assignmentSuccess(warnings);
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Appends a booking. Call only after validation succeeded.
   *
   * @throws SchedulingError `worker-inactive`, `invalid-scheduled-date` for a
   *   past day, or `capacity-exceeded` when the day is full
   */
  assignToWork(workOrderNumber: string, scheduledDate: Date, options: AssignToWorkOptions = {}): Booking {
    if (!this.#isActive) {
      throw new SchedulingError("worker-inactive", "Cannot assign work to inactive worker", {
        workerEmail: this.email,
      });
    }
    if (isBeforeToday(scheduledDate)) {
      throw new SchedulingError(
        "invalid-scheduled-date",
        "Scheduled date must be today or in the future",
        { scheduledDate: formatDateString(scheduledDate) },
      );
    }

    const capacity = options.emergency
      ? this.settings.emergencySlotCapacityPerDay
      : this.settings.slotCapacityPerDay;
    const existing = this.openBookingsOn(scheduledDate);
    if (existing >= capacity) {
      throw new SchedulingError(
        "capacity-exceeded",
        `Worker already has ${existing} assignments on ${formatDateString(scheduledDate)}. Maximum is ${capacity} per day.`,
        { workerEmail: this.email, scheduledDate: formatDateString(scheduledDate), capacity },
      );
    }

    const booking = new Booking({ workOrderNumber, scheduledDate, notes: options.notes });
    this.#bookings.push(booking);
    return booking;
  }

  /**
   * Completes the booking for `workOrderNumber` and returns the completed copy.
   *
   * @throws SchedulingError `booking-not-found`, or `booking-already-completed`
   */
  completeWork(workOrderNumber: string, successful: boolean, completionNotes?: string): Booking {
    const normalized = normalizeWorkOrderNumber(workOrderNumber);
    const index = this.#bookings.findIndex((b) => b.workOrderNumber === normalized);
    const booking = this.#bookings[index];
    if (!booking) {
      throw new SchedulingError(
        "booking-not-found",
        `Work order '${normalized}' not found for this worker`,
        { workOrderNumber: normalized, workerEmail: this.email },
      );
    }

    const completed = booking.complete(successful, completionNotes);
    this.#bookings[index] = completed;
    return completed;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  #openCountsByDay(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const booking of this.#bookings) {
      if (booking.isCompleted) continue;
      const day = formatDateString(booking.scheduledDate);
      counts.set(day, (counts.get(day) ?? 0) + 1);
    }
    return counts;
  }

  #fitnessContext(request: MaintenanceRequest): FitnessContext {
    const emergency = isEmergency(request);
    const targetDate = request.scheduledDate ?? new Date();
    return {
      isActive: this.#isActive,
      workerSpecialization: this.#specialization,
      requiredSpecialization: requiredSpecializationFor(request),
      isEmergency: emergency,
      emergencyCapable: this.isEmergencyResponseCapable(),
      availableOnTargetDate: this.isAvailableForWork(targetDate, { emergency }),
      upcomingWorkload: this.upcomingWorkloadCount(),
    };
  }
}
