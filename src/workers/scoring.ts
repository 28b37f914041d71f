import type { EngineSettings } from "../config.js";
import {
  canHandleWork,
  isExactMatch,
  specializationDisplayName,
} from "../specialization/specialization.js";
import type { Specialization } from "../types.js";

/**
 * Everything the fitness functions need to know about one worker/request pair.
 * Built by `Worker`; kept separate so the formulas can be read (and tested)
 * without the booking bookkeeping around them.
 */
export interface FitnessContext {
  isActive: boolean;
  workerSpecialization: Specialization;
  requiredSpecialization: Specialization;
  isEmergency: boolean;
  /** Worker is on the emergency response roster. */
  emergencyCapable: boolean;
  /** Worker has a free slot on the request's target date. */
  availableOnTargetDate: boolean;
  /** Open bookings inside the workload horizon. */
  upcomingWorkload: number;
}

export const INACTIVE_REASONING = "Worker is inactive";

/**
 * Fitness score; higher is better, 0 means ineligible.
 *
 * ```
 * baseEligibility
 *   + exactMatch        (or generalFallback for a General Maintenance worker)
 *   + availability      when free on the target date
 *   + max(0, workloadBonusMax - workloadPenaltyPerBooking * upcomingWorkload)
 *   + emergencyBonus    for Emergency requests
 * ```
 */
export function calculateScore(ctx: FitnessContext, settings: EngineSettings): number {
  if (!ctx.isActive) return 0;
  if (!canHandleWork(ctx.workerSpecialization, ctx.requiredSpecialization)) return 0;

  const w = settings.scoring;
  let score = w.baseEligibility;

  score += isExactMatch(ctx.workerSpecialization, ctx.requiredSpecialization)
    ? w.exactMatch
    : w.generalFallback;

  if (ctx.availableOnTargetDate) score += w.availability;

  score += Math.max(0, w.workloadBonusMax - w.workloadPenaltyPerBooking * ctx.upcomingWorkload);

  if (ctx.isEmergency) score += w.emergencyBonus;

  return score;
}

/**
 * Confidence in [0, 1] that the worker is the right pick.
 */
export function calculateConfidence(ctx: FitnessContext, settings: EngineSettings): number {
  if (!ctx.isActive) return 0;

  const c = settings.confidence;
  if (isExactMatch(ctx.workerSpecialization, ctx.requiredSpecialization)) {
    return ctx.isEmergency ? c.exactMatchEmergency : c.exactMatch;
  }
  if (canHandleWork(ctx.workerSpecialization, ctx.requiredSpecialization)) {
    return ctx.isEmergency ? c.generalFallbackEmergency : c.generalFallback;
  }
  return 0;
}

export function buildReasoning(ctx: FitnessContext, settings: EngineSettings): string {
  if (!ctx.isActive) return INACTIVE_REASONING;

  const required = specializationDisplayName(ctx.requiredSpecialization);
  const reasons: string[] = [];

  if (isExactMatch(ctx.workerSpecialization, ctx.requiredSpecialization)) {
    reasons.push(`Worker has exact ${required} specialization`);
  } else if (canHandleWork(ctx.workerSpecialization, ctx.requiredSpecialization)) {
    reasons.push(`General Maintenance worker can handle ${required} work`);
  } else {
    reasons.push(
      `Worker specialization ${specializationDisplayName(ctx.workerSpecialization)} does not cover ${required} work`,
    );
  }

  reasons.push(
    ctx.availableOnTargetDate
      ? "Available for immediate assignment"
      : "No free slot on the requested date",
  );

  reasons.push(
    ctx.upcomingWorkload <= settings.lightWorkloadThreshold
      ? `Light workload (${ctx.upcomingWorkload} upcoming)`
      : `Current workload: ${ctx.upcomingWorkload} upcoming assignments`,
  );

  if (ctx.isEmergency) {
    reasons.push(
      ctx.emergencyCapable
        ? "Capable of handling emergency requests"
        : "Not on the emergency roster; confirm before dispatching emergency requests",
    );
  }

  return reasons.join("; ");
}

/**
 * Expected time on site, in minutes. An exact match is already the fastest
 * case; emergencies do not shorten it further.
 */
export function estimateCompletionMinutes(ctx: FitnessContext, settings: EngineSettings): number {
  if (!ctx.isActive) return 0;
  return isExactMatch(ctx.workerSpecialization, ctx.requiredSpecialization)
    ? settings.estimates.exactMatchMinutes
    : settings.estimates.fallbackMinutes;
}
