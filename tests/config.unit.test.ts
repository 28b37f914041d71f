import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_ENGINE_SETTINGS, resolveEngineSettings, settingsFromEnv } from "../src/config.js";

describe("resolveEngineSettings", () => {
  it("should return the defaults without overrides", () => {
    expect(resolveEngineSettings()).toEqual(DEFAULT_ENGINE_SETTINGS);
  });

  it("should merge nested groups field by field", () => {
    const settings = resolveEngineSettings({ slotCapacityPerDay: 3, scoring: { emergencyBonus: 80 } });
    expect(settings.slotCapacityPerDay).toBe(3);
    expect(settings.scoring.emergencyBonus).toBe(80);
    expect(settings.scoring.exactMatch).toBe(200);
    expect(settings.confidence).toEqual(DEFAULT_ENGINE_SETTINGS.confidence);
  });

  it("should reject a zero day capacity", () => {
    expect(() => resolveEngineSettings({ slotCapacityPerDay: 0 })).toThrow(ZodError);
  });

  it("should reject an emergency capacity below the normal one", () => {
    expect(() => resolveEngineSettings({ slotCapacityPerDay: 4 })).toThrow(
      "emergencySlotCapacityPerDay must be at least slotCapacityPerDay",
    );
  });

  it("should reject confidence outside [0, 1]", () => {
    expect(() => resolveEngineSettings({ confidence: { exactMatch: 1.5 } })).toThrow(ZodError);
  });
});

describe("settingsFromEnv", () => {
  it("should read SCHEDULING_ variables and ignore blanks", () => {
    const settings = settingsFromEnv({
      SCHEDULING_SLOT_CAPACITY: "3",
      SCHEDULING_EMERGENCY_SLOT_CAPACITY: "4",
      SCHEDULING_LOOKAHEAD_DAYS: " ",
      SCHEDULING_RECOMMENDATION_COUNT: "5",
      HOME: "/home/test",
    });
    expect(settings.slotCapacityPerDay).toBe(3);
    expect(settings.emergencySlotCapacityPerDay).toBe(4);
    expect(settings.availabilityLookaheadDays).toBe(60);
    expect(settings.recommendationCount).toBe(5);
  });

  it("should fall back to defaults for an empty environment", () => {
    expect(settingsFromEnv({})).toEqual(DEFAULT_ENGINE_SETTINGS);
  });

  it("should reject non-numeric values", () => {
    expect(() => settingsFromEnv({ SCHEDULING_OVERLOADED_THRESHOLD: "lots" })).toThrow(ZodError);
  });
});
