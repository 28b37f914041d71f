import { formatDateString } from "../datetime.utils.js";
import type { ExistingBookingSnapshot } from "./validation.types.js";

function unitDayKey(propertyCode: string, unitNumber: string, date: Date): string {
  return `${propertyCode.trim().toUpperCase()}:${unitNumber.trim().toUpperCase()}:${formatDateString(date)}`;
}

/**
 * Snapshot entries grouped by property, unit and calendar day, so a conflict
 * lookup does not scan the whole snapshot.
 *
 * @example
 * ```typescript
 * const index = new SnapshotIndex(snapshot);
 * index.find("PROP-1", "101", date); // bookings on that unit that day
 * ```
 */
export class SnapshotIndex {
  #entries = new Map<string, ExistingBookingSnapshot[]>();
  #size = 0;

  constructor(snapshot: Iterable<ExistingBookingSnapshot> = []) {
    for (const entry of snapshot) this.add(entry);
  }

  get size(): number {
    return this.#size;
  }

  add(entry: ExistingBookingSnapshot): void {
    const key = unitDayKey(entry.propertyCode, entry.unitNumber, entry.scheduledDate);
    const bucket = this.#entries.get(key);
    if (bucket) bucket.push(entry);
    else this.#entries.set(key, [entry]);
    this.#size++;
  }

  find(propertyCode: string, unitNumber: string, date: Date): readonly ExistingBookingSnapshot[] {
    return this.#entries.get(unitDayKey(propertyCode, unitNumber, date)) ?? [];
  }
}
