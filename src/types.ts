/**
 * Core types shared by the assignment engine.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Specializations
// ============================================================================

/**
 * Zod schema for {@link Specialization}.
 */
export const SpecializationSchema = z.enum([
  "GeneralMaintenance",
  "Plumbing",
  "Electrical",
  "HVAC",
  "Carpentry",
  "Painting",
  "Locksmith",
  "ApplianceRepair",
]);

/**
 * Trade classification a worker is qualified for.
 *
 * `GeneralMaintenance` can service any category, at a lower priority than an
 * exact match.
 */
export type Specialization = z.infer<typeof SpecializationSchema>;

export const SPECIALIZATIONS: readonly Specialization[] = SpecializationSchema.options;

// ============================================================================
// Requests
// ============================================================================

export const RequestStatusSchema = z.enum([
  "Draft",
  "Submitted",
  "Declined",
  "Scheduled",
  "Done",
  "Failed",
  "Closed",
]);

/**
 * Lifecycle of a maintenance request.
 *
 * Draft → Submitted → Scheduled → Done → Closed, with the side branches
 * Submitted → Declined and Scheduled → Failed.
 */
export type RequestStatus = z.infer<typeof RequestStatusSchema>;

export const UrgencySchema = z.enum(["Low", "Normal", "High", "Critical", "Emergency"]);

/**
 * Urgency level reported for a request. Only `"Emergency"` triggers
 * emergency handling.
 */
export type Urgency = z.infer<typeof UrgencySchema>;

// ============================================================================
// Time Primitives
// ============================================================================

/**
 * Time of day in 24-hour format.
 *
 * @example
 * ```typescript
 * const noon: TimeOfDay = { hours: 12, minutes: 0 };
 * ```
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

export const SlotTypeSchema = z.enum([
  "Standard",
  "Morning",
  "Afternoon",
  "Evening",
  "TenantPreferred",
  "Emergency",
  "Flexible",
]);

/**
 * Category of a {@link TimeSlot}.
 */
export type SlotType = z.infer<typeof SlotTypeSchema>;

/**
 * Inclusive date range, evaluated at day granularity.
 *
 * @example
 * ```typescript
 * // Both the 3rd and the 9th are included
 * const week: DateRange = {
 *   start: new Date(2030, 2, 3),
 *   end: new Date(2030, 2, 9),
 * };
 * ```
 */
export interface DateRange {
  start: Date;
  end: Date;
}
