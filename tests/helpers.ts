import { vi } from "vitest";
import type { MaintenanceRequest } from "../src/requests/request-status.js";
import type { ExistingBookingSnapshot } from "../src/assignment/validation.types.js";
import { Worker, type WorkerInit } from "../src/workers/worker.js";

/** Frozen "now" for every test: Wednesday 1 May 2030, 09:00 local time. */
export const NOW = new Date(2030, 4, 1, 9, 0, 0);

export function freezeClock(): void {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(NOW);
}

export function releaseClock(): void {
  vi.useRealTimers();
}

/**
 * 10:00 local time, `offset` days from {@link NOW}.
 */
export function day(offset: number): Date {
  return new Date(2030, 4, 1 + offset, 10, 0, 0);
}

export function makeRequest(overrides: Partial<MaintenanceRequest> = {}): MaintenanceRequest {
  return {
    id: "req-1",
    propertyCode: "PROP-1",
    unitNumber: "101",
    title: "Leaking faucet",
    description: "Kitchen faucet drips all night",
    urgency: "Normal",
    status: "Submitted",
    ...overrides,
  };
}

export function makeWorker(overrides: Partial<WorkerInit> = {}): Worker {
  return new Worker({
    id: "w-1",
    email: "pat@example.com",
    name: "Pat",
    specialization: "Plumbing",
    ...overrides,
  });
}

export function makeSnapshot(
  overrides: Partial<ExistingBookingSnapshot> = {},
): ExistingBookingSnapshot {
  return {
    requestId: "req-existing",
    propertyCode: "PROP-1",
    unitNumber: "101",
    workerEmail: "sam@example.com",
    workerSpecialization: "Plumbing",
    workOrderNumber: "WO-0001",
    scheduledDate: day(3),
    status: "Scheduled",
    isEmergency: false,
    ...overrides,
  };
}
