import * as z from "zod";
import { SchedulingError } from "../errors.js";
import { formatDateString } from "../datetime.utils.js";
import { classifySpecialization } from "../specialization/classifier.js";
import {
  RequestStatusSchema,
  SpecializationSchema,
  UrgencySchema,
  type RequestStatus,
  type Specialization,
} from "../types.js";

export const MaintenanceRequestSchema = z.object({
  id: z.string().min(1),
  propertyCode: z.string().min(1),
  unitNumber: z.string().min(1),
  title: z.string(),
  description: z.string(),
  urgency: UrgencySchema,
  status: RequestStatusSchema,
  preferredContactTime: z.string().optional(),
  scheduledDate: z.date().optional(),
  assignedWorkerEmail: z.string().optional(),
  workOrderNumber: z.string().optional(),
  /** Overrides the trade derived from title and description. */
  requiredSpecialization: SpecializationSchema.optional(),
  completionNotes: z.string().optional(),
  closureNotes: z.string().optional(),
});

/**
 * A tenant's maintenance request as seen by the engine.
 *
 * Requests are owned and persisted by the caller. The transition helpers in
 * this module return new records and never mutate their input.
 */
export type MaintenanceRequest = Readonly<z.infer<typeof MaintenanceRequestSchema>>;

const ALLOWED_TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  Draft: ["Submitted"],
  Submitted: ["Scheduled", "Declined"],
  Scheduled: ["Done", "Failed"],
  Done: ["Closed"],
  Declined: ["Closed"],
  Failed: [],
  Closed: [],
};

const UNASSIGNABLE_STATUSES: ReadonlySet<RequestStatus> = new Set([
  "Closed",
  "Done",
  "Failed",
  "Declined",
]);

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Whether a worker may be matched against a request in this status.
 */
export function isAssignableStatus(status: RequestStatus): boolean {
  return !UNASSIGNABLE_STATUSES.has(status);
}

export function isEmergency(request: Pick<MaintenanceRequest, "urgency">): boolean {
  return request.urgency === "Emergency";
}

/**
 * The trade the request needs: the explicit value when set, otherwise the
 * classifier's verdict on title and description.
 */
export function requiredSpecializationFor(
  request: Pick<MaintenanceRequest, "title" | "description" | "requiredSpecialization">,
): Specialization {
  return request.requiredSpecialization ?? classifySpecialization(request.title, request.description);
}

function assertTransition(request: MaintenanceRequest, to: RequestStatus): void {
  if (!canTransition(request.status, to)) {
    throw new SchedulingError(
      "invalid-status-transition",
      `Request ${request.id} cannot move from ${request.status} to ${to}`,
      { requestId: request.id, from: request.status, to },
    );
  }
}

export interface ScheduleRequestParams {
  scheduledDate: Date;
  workerEmail: string;
  workOrderNumber: string;
}

/**
 * Submitted → Scheduled. Only submitted requests can be scheduled.
 */
export function scheduleRequest(
  request: MaintenanceRequest,
  params: ScheduleRequestParams,
): MaintenanceRequest {
  assertTransition(request, "Scheduled");
  return {
    ...request,
    status: "Scheduled",
    scheduledDate: params.scheduledDate,
    assignedWorkerEmail: params.workerEmail.trim().toLowerCase(),
    workOrderNumber: params.workOrderNumber,
  };
}

/**
 * Scheduled → Failed, used when an emergency takes the unit/date.
 *
 * The worker assignment is cleared so the request can be picked up again;
 * what was cancelled is kept in `closureNotes`.
 */
export function failForEmergencyOverride(
  request: MaintenanceRequest,
  reason: string,
): MaintenanceRequest {
  assertTransition(request, "Failed");
  const previousDate = request.scheduledDate ? formatDateString(request.scheduledDate) : "unscheduled";
  return {
    ...request,
    status: "Failed",
    completionNotes: `Work cancelled due to emergency override: ${reason}`,
    closureNotes: `Emergency override cancelled assignment: ${request.assignedWorkerEmail ?? "unassigned"} (${request.workOrderNumber ?? "no work order"}) on ${previousDate}`,
    assignedWorkerEmail: undefined,
    workOrderNumber: undefined,
    scheduledDate: undefined,
  };
}

export function declineRequest(request: MaintenanceRequest, reason: string): MaintenanceRequest {
  assertTransition(request, "Declined");
  return { ...request, status: "Declined", closureNotes: reason };
}

/**
 * Scheduled → Done, or Scheduled → Failed when the work was unsuccessful.
 */
export function completeRequest(
  request: MaintenanceRequest,
  successful: boolean,
  notes?: string,
): MaintenanceRequest {
  const next: RequestStatus = successful ? "Done" : "Failed";
  assertTransition(request, next);
  return { ...request, status: next, completionNotes: notes };
}

export function closeRequest(request: MaintenanceRequest, notes: string): MaintenanceRequest {
  assertTransition(request, "Closed");
  return { ...request, status: "Closed", closureNotes: notes };
}
