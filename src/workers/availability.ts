import { formatDateString } from "../datetime.utils.js";
import type { DateRange, Specialization } from "../types.js";
import type { Worker } from "./worker.js";

/**
 * Point-in-time view of one worker's calendar, used for dashboards and for
 * ranking workers by how soon they are free.
 */
export interface AvailabilitySummary {
  workerId: string;
  workerEmail: string;
  workerName: string;
  specialization: Specialization;
  isActive: boolean;
  /** First day with no open bookings, if one falls within the lookahead. */
  nextFullyAvailableDate: Date | undefined;
  /** Open bookings within the workload horizon from the reference date. */
  currentWorkload: number;
  /** Day keys (YYYY-MM-DD) at or above the day capacity. */
  bookedDates: string[];
  /** Day keys with exactly one open booking. */
  partiallyBookedDates: string[];
  /** Lower is better. */
  availabilityScore: number;
  activeAssignmentsCount: number;
  /** Day capacity the status strings are expressed against. */
  slotCapacityPerDay: number;
}

export interface AvailabilitySummaryOptions {
  /** Count a day as booked only once the emergency capacity is used up. */
  includeEmergencyOverride?: boolean;
}

export function createAvailabilitySummary(
  worker: Worker,
  range: DateRange,
  referenceDate: Date = new Date(),
  options: AvailabilitySummaryOptions = {},
): AvailabilitySummary {
  return {
    workerId: worker.id,
    workerEmail: worker.email,
    workerName: worker.name,
    specialization: worker.specialization,
    isActive: worker.isActive,
    nextFullyAvailableDate: worker.nextFullyAvailableDate(referenceDate),
    currentWorkload: worker.upcomingWorkloadCount(referenceDate),
    bookedDates: worker.bookedDates(range, options),
    partiallyBookedDates: worker.partiallyBookedDates(range),
    availabilityScore: worker.availabilityScore(referenceDate),
    activeAssignmentsCount: worker.openBookingCount,
    slotCapacityPerDay: options.includeEmergencyOverride
      ? worker.settings.emergencySlotCapacityPerDay
      : worker.settings.slotCapacityPerDay,
  };
}

/**
 * Whether the summary shows room on `date`. Partially booked days count only
 * when `allowPartial` is set.
 */
export function isAvailableOnSummaryDate(
  summary: AvailabilitySummary,
  date: Date,
  allowPartial = true,
): boolean {
  if (!summary.isActive) return false;
  const day = formatDateString(date);
  if (summary.bookedDates.includes(day)) return false;
  return allowPartial || !summary.partiallyBookedDates.includes(day);
}

/**
 * Human-readable state of one day, e.g. `"Limited Availability (1/2 slots)"`.
 */
export function availabilityStatusForDate(summary: AvailabilitySummary, date: Date): string {
  const day = formatDateString(date);
  const capacity = summary.slotCapacityPerDay;
  if (!summary.isActive) return "Inactive";
  if (summary.bookedDates.includes(day)) return `Fully Booked (${capacity}/${capacity} slots)`;
  if (summary.partiallyBookedDates.includes(day)) {
    return `Limited Availability (1/${capacity} slots)`;
  }
  return `Fully Available (0/${capacity} slots)`;
}
