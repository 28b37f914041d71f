import * as z from "zod";
import { RequestStatusSchema, SpecializationSchema } from "../types.js";

// =============================================================================
// Snapshot - other bookings supplied by the caller
// =============================================================================

export const ExistingBookingSnapshotSchema = z.object({
  requestId: z.string().min(1),
  propertyCode: z.string().min(1),
  unitNumber: z.string().min(1),
  workerEmail: z.string(),
  workerSpecialization: SpecializationSchema,
  workOrderNumber: z.string(),
  scheduledDate: z.date(),
  status: RequestStatusSchema,
  isEmergency: z.boolean(),
});

/**
 * Immutable projection of another request's current booking, fetched once by
 * the caller before validation.
 */
export type ExistingBookingSnapshot = Readonly<z.infer<typeof ExistingBookingSnapshotSchema>>;

// =============================================================================
// Proposed booking
// =============================================================================

export const UnitAssignmentInputSchema = z.object({
  requestId: z.string().min(1),
  propertyCode: z.string().min(1),
  unitNumber: z.string().min(1),
  scheduledDate: z.date(),
  workerEmail: z.string().min(1),
  workerSpecialization: SpecializationSchema,
  requiredSpecialization: SpecializationSchema,
  isEmergency: z.boolean(),
});

export type UnitAssignmentRequest = z.infer<typeof UnitAssignmentInputSchema>;

// =============================================================================
// Worker-level validation
// =============================================================================

/**
 * Result of `Worker.validateAssignment`.
 */
export interface AssignmentValidationResult {
  readonly isValid: boolean;
  readonly errorMessage?: string;
  readonly warnings: readonly string[];
}

export function assignmentSuccess(warnings: readonly string[] = []): AssignmentValidationResult {
  return { isValid: true, warnings: [...warnings] };
}

export function assignmentFailure(errorMessage: string): AssignmentValidationResult {
  return { isValid: false, errorMessage, warnings: [] };
}

// =============================================================================
// Unit-level validation
// =============================================================================

export type ConflictType = "none" | "specialization-mismatch" | "unit-conflict";

/**
 * Outcome of validating a proposed booking against a snapshot.
 *
 * A valid emergency outcome may still require work from the caller: every
 * entry in `assignmentsToCancelForEmergency` must be failed before the new
 * booking is persisted (see `processEmergencyOverride`).
 */
export interface ValidationOutcome {
  readonly isValid: boolean;
  readonly errorMessage?: string;
  readonly conflictType: ConflictType;
  readonly warnings: readonly string[];
  /** Set when a non-emergency request is blocked by other bookings. */
  readonly conflictingBookings: readonly ExistingBookingSnapshot[];
  /** Normal bookings an emergency displaces. */
  readonly assignmentsToCancelForEmergency: readonly ExistingBookingSnapshot[];
  readonly hasEmergencyConflicts: boolean;
  /** Other emergencies on the same unit/date. Reported, never cancelled. */
  readonly emergencyConflicts: readonly ExistingBookingSnapshot[];
}

export interface CancelledAssignment {
  readonly requestId: string;
  readonly workerEmail: string;
  readonly workOrderNumber: string;
  readonly originalScheduledDate: Date;
  readonly cancellationReason: string;
}

/**
 * What the caller must persist to honor an emergency override: each request
 * id moves to Failed through `failForEmergencyOverride`.
 */
export interface EmergencyOverrideResult {
  readonly cancelledRequestIds: readonly string[];
  readonly cancelledAssignments: readonly CancelledAssignment[];
}
