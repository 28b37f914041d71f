import * as z from "zod";
import { SpecializationSchema } from "./types.js";

const weight = z.number().int().nonnegative();
const probability = z.number().min(0).max(1);

/**
 * Score contributions used by `Worker.score()`. Every weight can be overridden.
 */
const ScoringWeightsSchema = z.object({
  /** Awarded to every active worker that can handle the work. */
  baseEligibility: weight,
  /** Worker specialization equals the required category. */
  exactMatch: weight,
  /** Worker is General Maintenance and the work needs another trade. */
  generalFallback: weight,
  /** Worker has a free slot on the target date. */
  availability: weight,
  /** Bonus for an idle worker, reduced per upcoming booking. */
  workloadBonusMax: weight,
  workloadPenaltyPerBooking: weight,
  /** Request urgency is Emergency. */
  emergencyBonus: weight,
});

const ConfidenceSchema = z.object({
  exactMatch: probability,
  exactMatchEmergency: probability,
  generalFallback: probability,
  generalFallbackEmergency: probability,
});

const EstimatesSchema = z.object({
  exactMatchMinutes: weight,
  fallbackMinutes: weight,
});

export const EngineSettingsSchema = z
  .object({
    scoring: ScoringWeightsSchema,
    confidence: ConfidenceSchema,
    estimates: EstimatesSchema,
    /** Maximum open bookings per worker per calendar day. */
    slotCapacityPerDay: z.number().int().positive(),
    /** Daily capacity when an emergency is being placed. */
    emergencySlotCapacityPerDay: z.number().int().positive(),
    workloadHorizonDays: z.number().int().positive(),
    availabilityLookaheadDays: z.number().int().positive(),
    /** Workers with more upcoming bookings than this count as overloaded. */
    overloadedThreshold: z.number().int().nonnegative(),
    lightWorkloadThreshold: z.number().int().nonnegative(),
    recommendationCount: z.number().int().positive(),
    emergencySpecializations: z.array(SpecializationSchema),
  })
  .refine((s) => s.emergencySlotCapacityPerDay >= s.slotCapacityPerDay, {
    message: "emergencySlotCapacityPerDay must be at least slotCapacityPerDay",
    path: ["emergencySlotCapacityPerDay"],
  });

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

/**
 * Partial settings accepted by {@link resolveEngineSettings}. Nested groups
 * may be overridden field by field.
 */
export type EngineSettingsOverrides = Partial<
  Omit<EngineSettings, "scoring" | "confidence" | "estimates">
> & {
  scoring?: Partial<EngineSettings["scoring"]>;
  confidence?: Partial<EngineSettings["confidence"]>;
  estimates?: Partial<EngineSettings["estimates"]>;
};

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  scoring: {
    baseEligibility: 110,
    exactMatch: 200,
    generalFallback: 100,
    availability: 50,
    workloadBonusMax: 50,
    workloadPenaltyPerBooking: 10,
    emergencyBonus: 50,
  },
  confidence: {
    exactMatch: 0.9,
    exactMatchEmergency: 0.95,
    generalFallback: 0.7,
    generalFallbackEmergency: 0.75,
  },
  estimates: {
    exactMatchMinutes: 120,
    fallbackMinutes: 180,
  },
  slotCapacityPerDay: 2,
  emergencySlotCapacityPerDay: 3,
  workloadHorizonDays: 30,
  availabilityLookaheadDays: 60,
  overloadedThreshold: 5,
  lightWorkloadThreshold: 2,
  recommendationCount: 3,
  emergencySpecializations: ["Plumbing", "Electrical", "HVAC", "Locksmith", "GeneralMaintenance"],
};

/**
 * Merges overrides into {@link DEFAULT_ENGINE_SETTINGS} and validates the result.
 *
 * @throws ZodError when a value is out of range
 *
 * @example
 * ```typescript
 * const settings = resolveEngineSettings({
 *   slotCapacityPerDay: 3,
 *   scoring: { emergencyBonus: 80 },
 * });
 * ```
 */
export function resolveEngineSettings(overrides: EngineSettingsOverrides = {}): EngineSettings {
  const { scoring, confidence, estimates, ...rest } = overrides;
  return EngineSettingsSchema.parse({
    ...DEFAULT_ENGINE_SETTINGS,
    ...rest,
    scoring: { ...DEFAULT_ENGINE_SETTINGS.scoring, ...scoring },
    confidence: { ...DEFAULT_ENGINE_SETTINGS.confidence, ...confidence },
    estimates: { ...DEFAULT_ENGINE_SETTINGS.estimates, ...estimates },
  });
}

const envNumber = z.coerce.number().int().optional();

const SettingsEnvSchema = z.object({
  SCHEDULING_SLOT_CAPACITY: envNumber,
  SCHEDULING_EMERGENCY_SLOT_CAPACITY: envNumber,
  SCHEDULING_WORKLOAD_HORIZON_DAYS: envNumber,
  SCHEDULING_LOOKAHEAD_DAYS: envNumber,
  SCHEDULING_OVERLOADED_THRESHOLD: envNumber,
  SCHEDULING_RECOMMENDATION_COUNT: envNumber,
});

/**
 * Builds settings from `SCHEDULING_*` environment variables.
 * Unset or empty variables keep their defaults.
 *
 * @example
 * ```typescript
 * const settings = settingsFromEnv(process.env);
 * ```
 */
export function settingsFromEnv(env: Record<string, string | undefined>): EngineSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("SCHEDULING_") && value?.trim()),
  );
  const parsed = SettingsEnvSchema.parse(present);

  const overrides: EngineSettingsOverrides = {};
  if (parsed.SCHEDULING_SLOT_CAPACITY !== undefined) {
    overrides.slotCapacityPerDay = parsed.SCHEDULING_SLOT_CAPACITY;
  }
  if (parsed.SCHEDULING_EMERGENCY_SLOT_CAPACITY !== undefined) {
    overrides.emergencySlotCapacityPerDay = parsed.SCHEDULING_EMERGENCY_SLOT_CAPACITY;
  }
  if (parsed.SCHEDULING_WORKLOAD_HORIZON_DAYS !== undefined) {
    overrides.workloadHorizonDays = parsed.SCHEDULING_WORKLOAD_HORIZON_DAYS;
  }
  if (parsed.SCHEDULING_LOOKAHEAD_DAYS !== undefined) {
    overrides.availabilityLookaheadDays = parsed.SCHEDULING_LOOKAHEAD_DAYS;
  }
  if (parsed.SCHEDULING_OVERLOADED_THRESHOLD !== undefined) {
    overrides.overloadedThreshold = parsed.SCHEDULING_OVERLOADED_THRESHOLD;
  }
  if (parsed.SCHEDULING_RECOMMENDATION_COUNT !== undefined) {
    overrides.recommendationCount = parsed.SCHEDULING_RECOMMENDATION_COUNT;
  }

  return resolveEngineSettings(overrides);
}
