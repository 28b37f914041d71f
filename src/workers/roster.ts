import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "../config.js";
import { silentLogger, type Logger } from "../logger.js";
import { isEmergency, type MaintenanceRequest } from "../requests/request-status.js";
import { canHandleWork } from "../specialization/specialization.js";
import type { DateRange, Specialization } from "../types.js";
import { createAvailabilitySummary, type AvailabilitySummary } from "./availability.js";
import type { Worker } from "./worker.js";

/**
 * Options shared by the roster queries.
 *
 * @category Roster
 */
export interface RosterOptions {
  /** Day workload is counted from. Defaults to now. */
  referenceDate?: Date;
  /**
   * Thresholds and counts. Defaults to the first worker's settings, then
   * {@link DEFAULT_ENGINE_SETTINGS}.
   */
  settings?: EngineSettings;
  logger?: Logger;
}

/**
 * A scored suggestion of one worker for one request.
 *
 * @category Roster
 */
export interface Recommendation {
  worker: Worker;
  score: number;
  confidence: number;
  reasoning: string;
  estimatedCompletionMinutes: number;
}

/**
 * Aggregate workload over active workers. Every field is 0 when there are none.
 *
 * @category Roster
 */
export interface WorkloadDistribution {
  totalWorkers: number;
  averageWorkload: number;
  minWorkload: number;
  maxWorkload: number;
  /** Workers with more upcoming bookings than the overloaded threshold. */
  overloadedWorkers: number;
}

function activeOnly(workers: Iterable<Worker>): Worker[] {
  return [...workers].filter((w) => w.isActive);
}

function rosterSettings(workers: readonly Worker[], options: RosterOptions): EngineSettings {
  return options.settings ?? workers[0]?.settings ?? DEFAULT_ENGINE_SETTINGS;
}

// =============================================================================
// Filters
// =============================================================================

/**
 * Active workers on the emergency roster. Current bookings are not considered.
 */
export function availableForEmergency(workers: Iterable<Worker>): Worker[] {
  return activeOnly(workers).filter((w) => w.isEmergencyResponseCapable());
}

/**
 * Active workers who can take `specialization` work, General Maintenance included.
 */
export function withSpecialization(workers: Iterable<Worker>, specialization: Specialization): Worker[] {
  return activeOnly(workers).filter((w) => canHandleWork(w.specialization, specialization));
}

/**
 * Active workers not fully booked on `date`.
 */
export function availableOnDate(workers: Iterable<Worker>, date: Date): Worker[] {
  return activeOnly(workers).filter((w) => !w.isFullyBookedOn(date));
}

/**
 * Active workers with at most `maxCount` upcoming bookings.
 */
export function withLightWorkload(
  workers: Iterable<Worker>,
  maxCount?: number,
  options: RosterOptions = {},
): Worker[] {
  const active = activeOnly(workers);
  const limit = maxCount ?? rosterSettings(active, options).lightWorkloadThreshold;
  return active.filter((w) => w.upcomingWorkloadCount(options.referenceDate) <= limit);
}

/**
 * Eligible workers for `request`, best score first.
 */
export function filterEligibleWorkers(workers: Iterable<Worker>, request: MaintenanceRequest): Worker[] {
  return [...workers]
    .filter((w) => w.isEligible(request))
    .map((worker) => ({ worker, score: worker.score(request) }))
    .sort((a, b) => b.score - a.score)
    .map(({ worker }) => worker);
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * The eligible worker with the highest score. On a tie the earlier worker in
 * the input wins.
 *
 * @example
 * ```typescript
 * const best = findBestMatch(workers, leakRequest);
 * if (!best) console.log("Nobody can take this request");
 * ```
 */
export function findBestMatch(
  workers: Iterable<Worker>,
  request: MaintenanceRequest,
  options: RosterOptions = {},
): Worker | undefined {
  const logger = options.logger ?? silentLogger;
  let best: { worker: Worker; score: number } | undefined;

  for (const worker of workers) {
    if (!worker.isEligible(request)) continue;
    const score = worker.score(request);
    if (!best || score > best.score) best = { worker, score };
  }

  if (!best) {
    logger.warn("No eligible worker found", { requestId: request.id });
    return undefined;
  }
  logger.debug("Best match selected", {
    requestId: request.id,
    workerEmail: best.worker.email,
    score: best.score,
  });
  return best.worker;
}

/**
 * Top `topN` recommendations for `request`, highest score first.
 */
export function recommendWorkers(
  workers: Iterable<Worker>,
  request: MaintenanceRequest,
  topN?: number,
  options: RosterOptions = {},
): Recommendation[] {
  const candidates = [...workers];
  const count = topN ?? rosterSettings(candidates, options).recommendationCount;
  return candidates
    .filter((w) => w.isEligible(request))
    .map(
      (worker): Recommendation => ({
        worker,
        score: worker.score(request),
        confidence: worker.recommendationConfidence(request),
        reasoning: worker.recommendationReasoning(request),
        estimatedCompletionMinutes: worker.estimatedCompletionMinutes(request),
      }),
    )
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, count));
}

/**
 * Whether the request may be assigned without a human picking the worker.
 * Only emergencies qualify, and only when someone is eligible.
 */
export function canAutoAssign(workers: Iterable<Worker>, request: MaintenanceRequest): boolean {
  if (!isEmergency(request)) return false;
  return [...workers].some((w) => w.isEligible(request));
}

/**
 * Availability summaries of active workers, soonest available first.
 */
export function rankByAvailability(
  workers: Iterable<Worker>,
  range: DateRange,
  referenceDate: Date = new Date(),
): AvailabilitySummary[] {
  return activeOnly(workers)
    .map((w) => createAvailabilitySummary(w, range, referenceDate))
    .sort((a, b) => a.availabilityScore - b.availabilityScore);
}

// =============================================================================
// Aggregates
// =============================================================================

/**
 * Active workers grouped by specialization. Specializations with nobody
 * active are absent.
 */
export function groupBySpecialization(workers: Iterable<Worker>): Map<Specialization, Worker[]> {
  const groups = new Map<Specialization, Worker[]>();
  for (const worker of activeOnly(workers)) {
    const group = groups.get(worker.specialization);
    if (group) group.push(worker);
    else groups.set(worker.specialization, [worker]);
  }
  return groups;
}

export function workloadDistribution(
  workers: Iterable<Worker>,
  options: RosterOptions = {},
): WorkloadDistribution {
  const active = activeOnly(workers);
  if (active.length === 0) {
    return { totalWorkers: 0, averageWorkload: 0, minWorkload: 0, maxWorkload: 0, overloadedWorkers: 0 };
  }

  const threshold = rosterSettings(active, options).overloadedThreshold;
  const loads = active.map((w) => w.upcomingWorkloadCount(options.referenceDate));
  const total = loads.reduce((sum, n) => sum + n, 0);

  return {
    totalWorkers: active.length,
    averageWorkload: total / active.length,
    minWorkload: Math.min(...loads),
    maxWorkload: Math.max(...loads),
    overloadedWorkers: loads.filter((n) => n > threshold).length,
  };
}
