/**
 * Worker assignment and scheduling engine for property maintenance requests.
 *
 * Classifies requests into trades, scores workers against them, and checks
 * proposed bookings for unit conflicts, including the emergency override that
 * displaces normal bookings. The engine is synchronous and performs no I/O:
 * the caller loads workers, requests and a snapshot of other bookings, then
 * persists whatever the engine says should change.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Specialization**: every worker has one trade. General Maintenance can take
 * any work at lower priority ({@link canHandleWork}). A request's trade comes
 * from {@link classifySpecialization} unless set explicitly.
 *
 * **Worker**: owns its {@link Booking}s, at most two per calendar day (three
 * when placing an emergency). {@link Worker.score},
 * {@link Worker.recommendationConfidence} and friends rank it against a
 * request; an inactive worker always gets the ineligible value.
 *
 * **Validation**: {@link validateUnitAssignment} compares a proposed booking
 * with a snapshot of other requests' bookings. A normal request fails on a
 * conflict; an emergency lists the bookings to cancel, which
 * {@link processEmergencyOverride} turns into request ids to fail.
 *
 * **Roster**: free functions over a worker collection for matching,
 * recommendation and workload dashboards.
 *
 * Weights and capacities come from {@link EngineSettings}; see
 * {@link resolveEngineSettings} and {@link settingsFromEnv}.
 *
 * @example Pick a worker and validate the booking
 * ```typescript
 * import {
 *   Worker, findBestMatch, validateUnitAssignment, unitAssignmentFor,
 *   processEmergencyOverride,
 * } from "repair-scheduling-engine";
 *
 * const best = findBestMatch(workers, request);
 * if (best) {
 *   const outcome = validateUnitAssignment(
 *     unitAssignmentFor(request, best, date, snapshot),
 *   );
 *   if (outcome.isValid) {
 *     const { cancelledRequestIds } = processEmergencyOverride(
 *       outcome.assignmentsToCancelForEmergency,
 *     );
 *     best.assignToWork("WO-1001", date, { emergency: request.urgency === "Emergency" });
 *     // persist the worker, the request and every cancelled request id
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core types
// ============================================================================

export type {
  Specialization,
  RequestStatus,
  Urgency,
  TimeOfDay,
  SlotType,
  DateRange,
} from "./types.js";

export {
  SpecializationSchema,
  RequestStatusSchema,
  UrgencySchema,
  SlotTypeSchema,
  SPECIALIZATIONS,
} from "./types.js";

// ============================================================================
// Configuration and logging
// ============================================================================

export {
  EngineSettingsSchema,
  DEFAULT_ENGINE_SETTINGS,
  resolveEngineSettings,
  settingsFromEnv,
} from "./config.js";

export type { EngineSettings, EngineSettingsOverrides } from "./config.js";

export { silentLogger, consoleLogger } from "./logger.js";

export type { Logger } from "./logger.js";

// ============================================================================
// Errors
// ============================================================================

export { SchedulingError, isSchedulingError } from "./errors.js";

export type { SchedulingErrorCode } from "./errors.js";

// ============================================================================
// Date helpers
// ============================================================================

export { formatDateString, generateDays, daysBetween, formatTimeOfDay } from "./datetime.utils.js";

// ============================================================================
// Specialization
// ============================================================================

export { classifySpecialization, SPECIALIZATION_KEYWORDS } from "./specialization/classifier.js";

export type { KeywordSets } from "./specialization/classifier.js";

export {
  canHandleWork,
  isExactMatch,
  parseSpecialization,
  specializationDisplayName,
  specializationDescription,
} from "./specialization/specialization.js";

// ============================================================================
// Requests
// ============================================================================

export {
  MaintenanceRequestSchema,
  canTransition,
  isAssignableStatus,
  isEmergency,
  requiredSpecializationFor,
  scheduleRequest,
  failForEmergencyOverride,
  declineRequest,
  completeRequest,
  closeRequest,
} from "./requests/request-status.js";

export type { MaintenanceRequest, ScheduleRequestParams } from "./requests/request-status.js";

// ============================================================================
// Slots and bookings
// ============================================================================

export { TimeSlot } from "./scheduling/time-slot.js";

export { Booking, normalizeWorkOrderNumber } from "./scheduling/booking.js";

export type { BookingInit, BookingRecord, BookingStatus } from "./scheduling/booking.js";

// ============================================================================
// Workers
// ============================================================================

export { Worker } from "./workers/worker.js";

export type {
  WorkerInit,
  DayAvailability,
  AvailabilityOptions,
  AssignToWorkOptions,
} from "./workers/worker.js";

export { INACTIVE_REASONING } from "./workers/scoring.js";

export {
  createAvailabilitySummary,
  isAvailableOnSummaryDate,
  availabilityStatusForDate,
} from "./workers/availability.js";

export type { AvailabilitySummary, AvailabilitySummaryOptions } from "./workers/availability.js";

// ============================================================================
// Roster
// ============================================================================

export {
  availableForEmergency,
  withSpecialization,
  availableOnDate,
  withLightWorkload,
  filterEligibleWorkers,
  findBestMatch,
  recommendWorkers,
  canAutoAssign,
  rankByAvailability,
  groupBySpecialization,
  workloadDistribution,
} from "./workers/roster.js";

export type { RosterOptions, Recommendation, WorkloadDistribution } from "./workers/roster.js";

// ============================================================================
// Assignment validation
// ============================================================================

export {
  validateUnitAssignment,
  processEmergencyOverride,
  unitAssignmentFor,
  EMERGENCY_CANCELLATION_REASON,
} from "./assignment/validator.js";

export type { UnitAssignmentInput, ValidatorOptions } from "./assignment/validator.js";

export { SnapshotIndex } from "./assignment/snapshot-index.js";

export {
  ExistingBookingSnapshotSchema,
  UnitAssignmentInputSchema,
  assignmentSuccess,
  assignmentFailure,
} from "./assignment/validation.types.js";

export type {
  ExistingBookingSnapshot,
  UnitAssignmentRequest,
  AssignmentValidationResult,
  ValidationOutcome,
  ConflictType,
  CancelledAssignment,
  EmergencyOverrideResult,
} from "./assignment/validation.types.js";
