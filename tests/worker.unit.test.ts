import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveEngineSettings } from "../src/config.js";
import { SchedulingError } from "../src/errors.js";
import { formatDateString } from "../src/datetime.utils.js";
import {
  availabilityStatusForDate,
  isAvailableOnSummaryDate,
} from "../src/workers/availability.js";
import { INACTIVE_REASONING } from "../src/workers/scoring.js";
import { day, freezeClock, makeRequest, makeWorker, releaseClock } from "./helpers.js";

describe("Worker", () => {
  beforeEach(freezeClock);
  afterEach(releaseClock);

  describe("identity and state", () => {
    it("should normalize the email and default the name", () => {
      const worker = makeWorker({ email: " Pat@Example.COM ", name: undefined });
      expect(worker.email).toBe("pat@example.com");
      expect(worker.name).toBe("pat@example.com");
      expect(worker.isActive).toBe(true);
    });

    it("should record the deactivation reason until reactivated", () => {
      const worker = makeWorker();
      worker.deactivate("On leave");
      expect(worker.isActive).toBe(false);
      expect(worker.deactivationReason).toBe("On leave");
      worker.activate();
      expect(worker.deactivationReason).toBeUndefined();
    });

    it("should derive emergency capability from the specialization or flag", () => {
      expect(makeWorker({ specialization: "Plumbing" }).isEmergencyResponseCapable()).toBe(true);
      expect(makeWorker({ specialization: "Painting" }).isEmergencyResponseCapable()).toBe(false);
      expect(
        makeWorker({ specialization: "Painting", emergencyCapable: true }).isEmergencyResponseCapable(),
      ).toBe(true);
      expect(
        makeWorker({ specialization: "Plumbing", emergencyCapable: false }).isEmergencyResponseCapable(),
      ).toBe(false);
      expect(makeWorker({ isActive: false }).isEmergencyResponseCapable()).toBe(false);
    });

    it("should apply a specialization change to matching", () => {
      const worker = makeWorker({ specialization: "Painting" });
      expect(worker.canHandle("Plumbing")).toBe(false);
      worker.changeSpecialization("Plumbing");
      expect(worker.canHandle("Plumbing")).toBe(true);
    });
  });

  describe("inactive worker", () => {
    it("should return the ineligible value from every fitness query", () => {
      const worker = makeWorker({ isActive: false });
      const request = makeRequest({ requiredSpecialization: "Plumbing" });
      expect(worker.score(request)).toBe(0);
      expect(worker.isEligible(request)).toBe(false);
      expect(worker.recommendationConfidence(request)).toBe(0);
      expect(worker.estimatedCompletionMinutes(request)).toBe(0);
      expect(worker.recommendationReasoning(request)).toBe(INACTIVE_REASONING);
      expect(worker.recommendationReasoning(request)).toBe("Worker is inactive");
    });

    it("should have no availability", () => {
      const worker = makeWorker({ isActive: false });
      expect(worker.availabilityForDate(day(1))).toBe(0);
      expect(worker.nextFullyAvailableDate()).toBeUndefined();
      expect(worker.availabilityScore()).toBe(Number.MAX_SAFE_INTEGER);
      expect(worker.bookedDates({ start: day(0), end: day(5) })).toEqual([]);
    });
  });

  describe("score", () => {
    const plumbing = makeRequest({ requiredSpecialization: "Plumbing" });

    it("should score an idle exact match above 300", () => {
      const score = makeWorker().score(plumbing);
      expect(score).toBe(410);
      expect(score).toBeGreaterThan(300);
    });

    it("should score a General Maintenance fallback between 200 and 400 and below the exact match", () => {
      const fallback = makeWorker({ specialization: "GeneralMaintenance" }).score(plumbing);
      expect(fallback).toBe(310);
      expect(fallback).toBeGreaterThan(200);
      expect(fallback).toBeLessThan(400);
      expect(fallback).toBeLessThan(makeWorker().score(plumbing));
    });

    it("should add the emergency bonus", () => {
      const score = makeWorker().score({ ...plumbing, urgency: "Emergency" });
      expect(score).toBe(460);
      expect(score).toBeGreaterThan(330);
    });

    it("should score 0 for an incompatible trade", () => {
      expect(makeWorker({ specialization: "Electrical" }).score(plumbing)).toBe(0);
    });

    it("should reduce the score with workload and a full target day", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(0));
      worker.assignToWork("WO-2", day(0));
      worker.assignToWork("WO-3", day(5));
      expect(worker.score({ ...plumbing, scheduledDate: day(0) })).toBe(110 + 200 + 0 + 20);
      expect(worker.score({ ...plumbing, scheduledDate: day(1) })).toBe(110 + 200 + 50 + 20);
    });

    it("should keep the score bounds for a fully loaded worker", () => {
      const load = (worker: ReturnType<typeof makeWorker>) => {
        worker.assignToWork("WO-1", day(1));
        worker.assignToWork("WO-2", day(1));
        for (const offset of [2, 3, 4, 5]) worker.assignToWork(`WO-${offset + 1}`, day(offset));
        return worker;
      };
      const exact = load(makeWorker());
      const general = load(makeWorker({ specialization: "GeneralMaintenance" }));
      const onFullDay = { ...plumbing, scheduledDate: day(1) };

      expect(exact.upcomingWorkloadCount()).toBe(6);
      expect(exact.score(onFullDay)).toBe(310);
      expect(exact.score(onFullDay)).toBeGreaterThan(300);
      expect(general.score(onFullDay)).toBe(210);
      expect(general.score(onFullDay)).toBeGreaterThan(200);
      expect(general.score(onFullDay)).toBeLessThan(exact.score(onFullDay));
      expect(exact.score({ ...onFullDay, urgency: "Emergency" })).toBeGreaterThan(330);
    });

    it("should use configured weights", () => {
      const settings = resolveEngineSettings({ scoring: { emergencyBonus: 80 } });
      const worker = makeWorker({ settings });
      expect(worker.score({ ...plumbing, urgency: "Emergency" })).toBe(490);
    });
  });

  describe("confidence, reasoning and estimate", () => {
    const plumbing = makeRequest({ requiredSpecialization: "Plumbing" });
    const emergency = { ...plumbing, urgency: "Emergency" as const };

    it("should use the fixed confidence points", () => {
      expect(makeWorker().recommendationConfidence(plumbing)).toBe(0.9);
      expect(makeWorker().recommendationConfidence(emergency)).toBe(0.95);
      const general = makeWorker({ specialization: "GeneralMaintenance" });
      expect(general.recommendationConfidence(plumbing)).toBe(0.7);
      expect(general.recommendationConfidence(emergency)).toBe(0.75);
      expect(makeWorker({ specialization: "HVAC" }).recommendationConfidence(plumbing)).toBe(0);
    });

    it("should explain an exact match", () => {
      expect(makeWorker().recommendationReasoning(plumbing)).toBe(
        "Worker has exact Plumbing specialization; Available for immediate assignment; Light workload (0 upcoming)",
      );
    });

    it("should mention emergency capability for emergencies", () => {
      expect(makeWorker().recommendationReasoning(emergency)).toBe(
        "Worker has exact Plumbing specialization; Available for immediate assignment; Light workload (0 upcoming); Capable of handling emergency requests",
      );
    });

    it("should explain a busy fallback worker", () => {
      const worker = makeWorker({ specialization: "GeneralMaintenance" });
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      worker.assignToWork("WO-3", day(2));
      expect(worker.recommendationReasoning({ ...plumbing, scheduledDate: day(1) })).toBe(
        "General Maintenance worker can handle Plumbing work; No free slot on the requested date; Current workload: 3 upcoming assignments",
      );
    });

    it("should estimate two hours for an exact match and three otherwise", () => {
      expect(makeWorker().estimatedCompletionMinutes(plumbing)).toBe(120);
      expect(makeWorker().estimatedCompletionMinutes(emergency)).toBe(120);
      expect(makeWorker({ specialization: "Electrical" }).estimatedCompletionMinutes(plumbing)).toBe(
        180,
      );
    });
  });

  describe("isEligible", () => {
    it("should require a compatible trade and an assignable status", () => {
      const worker = makeWorker();
      expect(worker.isEligible(makeRequest())).toBe(true);
      expect(worker.isEligible(makeRequest({ status: "Closed" }))).toBe(false);
      expect(worker.isEligible(makeRequest({ requiredSpecialization: "HVAC" }))).toBe(false);
    });
  });

  describe("validateAssignment", () => {
    it("should fail for an inactive worker", () => {
      const result = makeWorker({ isActive: false }).validateAssignment(makeRequest(), day(1));
      expect(result.isValid).toBe(false);
      expect(result.errorMessage).toContain("not active");
    });

    it("should fail for a past date", () => {
      const result = makeWorker().validateAssignment(makeRequest(), day(-1));
      expect(result.isValid).toBe(false);
      expect(result.errorMessage).toContain("future");
    });

    it("should succeed without warnings for an idle exact match", () => {
      expect(makeWorker().validateAssignment(makeRequest(), day(0))).toEqual({
        isValid: true,
        warnings: [],
      });
    });

    it("should warn about a fallback worker on a full day", () => {
      const worker = makeWorker({ specialization: "GeneralMaintenance" });
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      const result = worker.validateAssignment(makeRequest(), day(1));
      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        "General Maintenance worker assigned to Plumbing work",
        "Worker is fully booked on 2030-05-02",
      ]);
    });
  });

  describe("assignToWork", () => {
    it("should allow two bookings a day", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("wo-2", day(1), { notes: "Bring ladder" });
      expect(worker.bookings.map((b) => b.workOrderNumber)).toEqual(["WO-1", "WO-2"]);
      expect(() => worker.assignToWork("WO-3", day(1))).toThrow(
        "Worker already has 2 assignments on 2030-05-02. Maximum is 2 per day.",
      );
    });

    it("should allow a third booking for an emergency", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      worker.assignToWork("WO-3", day(1), { emergency: true });
      try {
        worker.assignToWork("WO-4", day(1), { emergency: true });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SchedulingError);
        if (error instanceof SchedulingError) expect(error.code).toBe("capacity-exceeded");
      }
    });

    it("should reject inactive workers and past dates", () => {
      expect(() => makeWorker({ isActive: false }).assignToWork("WO-1", day(1))).toThrow(
        "Cannot assign work to inactive worker",
      );
      expect(() => makeWorker().assignToWork("WO-1", day(-1))).toThrow(
        "Scheduled date must be today or in the future",
      );
    });

    it("should not count completed bookings against capacity", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      worker.completeWork("WO-1", true);
      expect(() => worker.assignToWork("WO-3", day(1))).not.toThrow();
    });
  });

  describe("completeWork", () => {
    it("should replace the booking with its completed copy", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      const done = worker.completeWork("wo-1", false, "No access");
      expect(done.status).toBe("completed-unsuccessful");
      expect(worker.bookings[0]?.status).toBe("completed-unsuccessful");
      expect(worker.openBookingCount).toBe(0);
    });

    it("should fail for an unknown or completed work order", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      expect(() => worker.completeWork("WO-404", true)).toThrow("Work order 'WO-404' not found");
      worker.completeWork("WO-1", true);
      expect(() => worker.completeWork("WO-1", true)).toThrow("already completed");
    });
  });

  describe("availability", () => {
    it("should count free slots per day", () => {
      const worker = makeWorker();
      expect(worker.availabilityForDate(day(1))).toBe(2);
      worker.assignToWork("WO-1", day(1));
      expect(worker.availabilityForDate(day(1))).toBe(1);
      worker.assignToWork("WO-2", day(1));
      expect(worker.availabilityForDate(day(1))).toBe(0);
      expect(worker.availabilityForDate(day(1), { emergency: true })).toBe(1);
      expect(worker.isAvailableForWork(day(1))).toBe(false);
      expect(worker.availabilityForDate(day(-1))).toBe(0);
    });

    it("should count workload inside the horizon only", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(0));
      worker.assignToWork("WO-2", day(30));
      worker.assignToWork("WO-3", day(31));
      expect(worker.upcomingWorkloadCount()).toBe(2);
      expect(worker.upcomingWorkloadCount(day(0), 60)).toBe(3);
    });

    it("should bucket booked and partially booked days", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      worker.assignToWork("WO-3", day(2));
      const range = { start: day(0), end: day(3) };
      expect(worker.bookedDates(range)).toEqual(["2030-05-02"]);
      expect(worker.partiallyBookedDates(range)).toEqual(["2030-05-03"]);
      expect(worker.bookedDates(range, { includeEmergencyOverride: true })).toEqual([]);
    });

    it("should find the next fully available day and score it", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(0));
      worker.assignToWork("WO-2", day(1));
      worker.assignToWork("WO-3", day(1));
      const next = worker.nextFullyAvailableDate();
      expect(next && formatDateString(next)).toBe("2030-05-03");
      expect(worker.availabilityScore()).toBe(2 * 100 + 3);
      expect(makeWorker().availabilityScore()).toBe(0);
    });

    it("should search from today when the reference date is in the past", () => {
      const next = makeWorker().nextFullyAvailableDate(day(-10));
      expect(next && formatDateString(next)).toBe("2030-05-01");
    });

    it("should use 999 days when nothing is free within the lookahead", () => {
      const settings = resolveEngineSettings({ availabilityLookaheadDays: 1 });
      const worker = makeWorker({ settings });
      worker.assignToWork("WO-1", day(0));
      worker.assignToWork("WO-2", day(1));
      expect(worker.nextFullyAvailableDate()).toBeUndefined();
      expect(worker.availabilityScore()).toBe(999 * 100 + 2);
    });
  });

  describe("availabilitySummary", () => {
    it("should summarize the calendar", () => {
      const worker = makeWorker();
      worker.assignToWork("WO-1", day(1));
      worker.assignToWork("WO-2", day(1));
      worker.assignToWork("WO-3", day(2));
      const summary = worker.availabilitySummary({ start: day(0), end: day(6) });

      expect(summary.workerEmail).toBe("pat@example.com");
      expect(summary.bookedDates).toEqual(["2030-05-02"]);
      expect(summary.partiallyBookedDates).toEqual(["2030-05-03"]);
      expect(summary.currentWorkload).toBe(3);
      expect(summary.activeAssignmentsCount).toBe(3);
      expect(summary.availabilityScore).toBe(3);
      expect(summary.nextFullyAvailableDate && formatDateString(summary.nextFullyAvailableDate)).toBe(
        "2030-05-01",
      );

      expect(availabilityStatusForDate(summary, day(1))).toBe("Fully Booked (2/2 slots)");
      expect(availabilityStatusForDate(summary, day(2))).toBe("Limited Availability (1/2 slots)");
      expect(availabilityStatusForDate(summary, day(3))).toBe("Fully Available (0/2 slots)");

      expect(isAvailableOnSummaryDate(summary, day(1))).toBe(false);
      expect(isAvailableOnSummaryDate(summary, day(2))).toBe(true);
      expect(isAvailableOnSummaryDate(summary, day(2), false)).toBe(false);
    });
  });
});
