import { formatDateString } from "../datetime.utils.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  isEmergency,
  requiredSpecializationFor,
  type MaintenanceRequest,
} from "../requests/request-status.js";
import {
  canHandleWork,
  isExactMatch,
  specializationDisplayName,
} from "../specialization/specialization.js";
import type { Worker } from "../workers/worker.js";
import { SnapshotIndex } from "./snapshot-index.js";
import {
  UnitAssignmentInputSchema,
  type CancelledAssignment,
  type EmergencyOverrideResult,
  type ExistingBookingSnapshot,
  type UnitAssignmentRequest,
  type ValidationOutcome,
} from "./validation.types.js";

export const EMERGENCY_CANCELLATION_REASON = "Cancelled due to emergency request override";

export interface UnitAssignmentInput extends UnitAssignmentRequest {
  /** Other requests' bookings, as a list or pre-built index. */
  existingBookings: readonly ExistingBookingSnapshot[] | SnapshotIndex;
}

export interface ValidatorOptions {
  logger?: Logger;
}

/**
 * Builds validator input for placing `request` with `worker` on `scheduledDate`.
 */
export function unitAssignmentFor(
  request: MaintenanceRequest,
  worker: Worker,
  scheduledDate: Date,
  existingBookings: readonly ExistingBookingSnapshot[] | SnapshotIndex,
): UnitAssignmentInput {
  return {
    requestId: request.id,
    propertyCode: request.propertyCode,
    unitNumber: request.unitNumber,
    scheduledDate,
    workerEmail: worker.email,
    workerSpecialization: worker.specialization,
    requiredSpecialization: requiredSpecializationFor(request),
    isEmergency: isEmergency(request),
    existingBookings,
  };
}

/**
 * Checks a proposed booking against the other bookings on the same unit and day.
 *
 * 1. The worker must be able to handle the required trade.
 * 2. Other requests' `Scheduled` bookings on the same property, unit and
 *    calendar day are conflicts.
 * 3. A non-emergency request with any conflict fails.
 * 4. An emergency displaces non-emergency conflicts (listed in
 *    `assignmentsToCancelForEmergency`) and reports emergency conflicts
 *    without cancelling them.
 *
 * Nothing is mutated. Business failures come back as `isValid: false`.
 *
 * @throws ZodError when the input itself is malformed
 */
export function validateUnitAssignment(
  input: UnitAssignmentInput,
  options: ValidatorOptions = {},
): ValidationOutcome {
  const logger = options.logger ?? silentLogger;
  const proposal = UnitAssignmentInputSchema.parse(input);
  const day = formatDateString(proposal.scheduledDate);
  const required = specializationDisplayName(proposal.requiredSpecialization);

  if (!canHandleWork(proposal.workerSpecialization, proposal.requiredSpecialization)) {
    logger.debug("Assignment rejected: specialization mismatch", {
      requestId: proposal.requestId,
      workerEmail: proposal.workerEmail,
      workerSpecialization: proposal.workerSpecialization,
      requiredSpecialization: proposal.requiredSpecialization,
    });
    return {
      ...emptyOutcome(),
      isValid: false,
      conflictType: "specialization-mismatch",
      errorMessage: `Worker specialization '${specializationDisplayName(proposal.workerSpecialization)}' cannot handle ${required} work`,
    };
  }

  const warnings: string[] = [];
  if (!isExactMatch(proposal.workerSpecialization, proposal.requiredSpecialization)) {
    warnings.push(`General Maintenance worker assigned to ${required} work`);
  }

  const index =
    input.existingBookings instanceof SnapshotIndex
      ? input.existingBookings
      : new SnapshotIndex(input.existingBookings);
  const conflicts = index
    .find(proposal.propertyCode, proposal.unitNumber, proposal.scheduledDate)
    .filter((entry) => entry.requestId !== proposal.requestId && entry.status === "Scheduled");

  if (conflicts.length === 0) {
    return { ...emptyOutcome(), warnings };
  }

  if (!proposal.isEmergency) {
    logger.debug("Assignment rejected: unit already booked", {
      requestId: proposal.requestId,
      unit: `${proposal.propertyCode}/${proposal.unitNumber}`,
      day,
      conflicts: conflicts.map((c) => c.requestId),
    });
    return {
      ...emptyOutcome(),
      isValid: false,
      conflictType: "unit-conflict",
      warnings,
      conflictingBookings: conflicts,
      errorMessage: `Unit ${proposal.unitNumber} at ${proposal.propertyCode} already has ${conflicts.length} scheduled assignment(s) on ${day}`,
    };
  }

  const toCancel = conflicts.filter((c) => !c.isEmergency);
  const emergencyConflicts = conflicts.filter((c) => c.isEmergency);

  for (const c of toCancel) {
    warnings.push(
      `Emergency override will cancel work order ${c.workOrderNumber} for request ${c.requestId} (${c.workerEmail})`,
    );
  }
  for (const c of emergencyConflicts) {
    warnings.push(
      `Another emergency (request ${c.requestId}) is already scheduled for this unit on ${day}`,
    );
  }

  logger.info("Emergency assignment validated", {
    requestId: proposal.requestId,
    day,
    cancellations: toCancel.map((c) => c.requestId),
    emergencyConflicts: emergencyConflicts.map((c) => c.requestId),
  });

  return {
    ...emptyOutcome(),
    warnings,
    assignmentsToCancelForEmergency: toCancel,
    hasEmergencyConflicts: emergencyConflicts.length > 0,
    emergencyConflicts,
  };
}

/**
 * Turns the cancellation list of a valid emergency outcome into the request
 * ids the caller must move to Failed. Performs no mutation.
 */
export function processEmergencyOverride(
  cancellations: readonly ExistingBookingSnapshot[],
): EmergencyOverrideResult {
  const seen = new Set<string>();
  const cancelledAssignments: CancelledAssignment[] = [];

  for (const booking of cancellations) {
    if (seen.has(booking.requestId)) continue;
    seen.add(booking.requestId);
    cancelledAssignments.push({
      requestId: booking.requestId,
      workerEmail: booking.workerEmail,
      workOrderNumber: booking.workOrderNumber,
      originalScheduledDate: new Date(booking.scheduledDate),
      cancellationReason: EMERGENCY_CANCELLATION_REASON,
    });
  }

  return {
    cancelledRequestIds: [...seen],
    cancelledAssignments,
  };
}

function emptyOutcome(): ValidationOutcome {
  return {
    isValid: true,
    conflictType: "none",
    warnings: [],
    conflictingBookings: [],
    assignmentsToCancelForEmergency: [],
    hasEmergencyConflicts: false,
    emergencyConflicts: [],
  };
}
