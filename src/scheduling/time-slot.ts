import { SchedulingError } from "../errors.js";
import {
  formatDateString,
  formatTimeOfDay,
  isBeforeToday,
  minutesToTimeOfDay,
  startOfDay,
  timeOfDayToMinutes,
} from "../datetime.utils.js";
import type { SlotType, TimeOfDay } from "../types.js";

const MIN_SLOT_MINUTES = 30;
const MAX_SLOT_MINUTES = 8 * 60;

const BUSINESS_HOURS_START: TimeOfDay = { hours: 7, minutes: 0 };
const BUSINESS_HOURS_END: TimeOfDay = { hours: 21, minutes: 0 };

type Window = readonly [start: TimeOfDay, end: TimeOfDay];

const MORNING: Window = [
  { hours: 8, minutes: 0 },
  { hours: 12, minutes: 0 },
];
const AFTERNOON: Window = [
  { hours: 12, minutes: 0 },
  { hours: 17, minutes: 0 },
];
const EVENING: Window = [
  { hours: 17, minutes: 0 },
  { hours: 20, minutes: 0 },
];
const BUSINESS_DAY: Window = [
  { hours: 8, minutes: 0 },
  { hours: 17, minutes: 0 },
];

/**
 * Tenant-facing phrases (lower-cased, trimmed) and the window they stand for.
 */
const PREFERENCE_WINDOWS: Record<string, Window> = {
  morning: MORNING,
  "morning (8 am - 12 pm)": MORNING,
  "morning (8:00 am - 12:00 pm)": MORNING,
  afternoon: AFTERNOON,
  "afternoon (12 pm - 5 pm)": AFTERNOON,
  "afternoon (12:00 pm - 5:00 pm)": AFTERNOON,
  evening: EVENING,
  "evening (5 pm - 8 pm)": EVENING,
  "evening (5:00 pm - 8:00 pm)": EVENING,
  anytime: BUSINESS_DAY,
  "any time": BUSINESS_DAY,
};

/**
 * An immutable service window on one calendar day.
 *
 * Invariants, checked at construction: the day is not in the past, the
 * window starts before it ends, and it lasts between 30 minutes and 8 hours.
 * Tenant-preferred windows are exempt from the 8-hour cap.
 * Windows are half-open (`[start, end)`), so back-to-back slots do not overlap.
 *
 * @example
 * ```typescript
 * const slot = TimeSlot.fromPreference(new Date(2030, 4, 2), "Morning (8 AM - 12 PM)");
 * slot.start; // { hours: 8, minutes: 0 }
 * slot.type;  // "TenantPreferred"
 * ```
 */
export class TimeSlot {
  /** Local midnight of the slot's day. */
  readonly date: Date;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
  readonly type: SlotType;

  constructor(date: Date, start: TimeOfDay, end: TimeOfDay, type: SlotType = "Standard") {
    TimeSlot.#validate(date, start, end, type);
    this.date = startOfDay(date);
    this.start = { hours: start.hours, minutes: start.minutes };
    this.end = { hours: end.hours, minutes: end.minutes };
    this.type = type;
  }

  /**
   * Maps a tenant's free-text preference to a window. Unrecognized or empty
   * input falls back to 08:00–17:00.
   */
  static fromPreference(date: Date, preference: string | null | undefined): TimeSlot {
    const key = preference?.trim().toLowerCase() ?? "";
    const [start, end] = PREFERENCE_WINDOWS[key] ?? BUSINESS_DAY;
    return new TimeSlot(date, start, end, "TenantPreferred");
  }

  /**
   * The three canonical windows: morning 08–12, afternoon 12–17, evening 17–20.
   */
  static standardSlotsFor(date: Date): TimeSlot[] {
    return [
      new TimeSlot(date, MORNING[0], MORNING[1], "Morning"),
      new TimeSlot(date, AFTERNOON[0], AFTERNOON[1], "Afternoon"),
      new TimeSlot(date, EVENING[0], EVENING[1], "Evening"),
    ];
  }

  get startMinutes(): number {
    return timeOfDayToMinutes(this.start);
  }

  get endMinutes(): number {
    return timeOfDayToMinutes(this.end);
  }

  get durationMinutes(): number {
    return this.endMinutes - this.startMinutes;
  }

  overlapsWith(other: TimeSlot): boolean {
    if (formatDateString(this.date) !== formatDateString(other.date)) return false;
    return this.startMinutes < other.endMinutes && this.endMinutes > other.startMinutes;
  }

  isWithinBusinessHours(): boolean {
    return (
      this.startMinutes >= timeOfDayToMinutes(BUSINESS_HOURS_START) &&
      this.endMinutes <= timeOfDayToMinutes(BUSINESS_HOURS_END)
    );
  }

  /**
   * Emergency slots may sit outside business hours; any other slot must not.
   */
  isSuitableForEmergency(): boolean {
    return this.type === "Emergency" || this.isWithinBusinessHours();
  }

  /**
   * The date plus half the window, used as the booking timestamp when only a
   * slot (not an exact time) was chosen.
   */
  midpointTimestamp(): Date {
    const midpoint = minutesToTimeOfDay(this.startMinutes + Math.floor(this.durationMinutes / 2));
    const result = new Date(this.date);
    result.setHours(midpoint.hours, midpoint.minutes, 0, 0);
    return result;
  }

  displayName(): string {
    const range = `${formatTimeOfDay(this.start)} - ${formatTimeOfDay(this.end)}`;
    switch (this.type) {
      case "Morning":
        return `Morning (${range})`;
      case "Afternoon":
        return `Afternoon (${range})`;
      case "Evening":
        return `Evening (${range})`;
      case "TenantPreferred":
        return `Tenant Preferred (${range})`;
      case "Emergency":
        return `Emergency Slot (${range})`;
      default:
        return range;
    }
  }

  equals(other: TimeSlot): boolean {
    return (
      formatDateString(this.date) === formatDateString(other.date) &&
      this.startMinutes === other.startMinutes &&
      this.endMinutes === other.endMinutes &&
      this.type === other.type
    );
  }

  toString(): string {
    return `${formatDateString(this.date)} ${this.displayName()} (${this.type})`;
  }

  static #validate(date: Date, start: TimeOfDay, end: TimeOfDay, type: SlotType): void {
    if (Number.isNaN(date.getTime())) {
      throw new SchedulingError("invalid-time-slot", "Slot date is not a valid date");
    }
    if (isBeforeToday(date)) {
      throw new SchedulingError("invalid-time-slot", "Cannot schedule slots in the past", {
        date: formatDateString(date),
      });
    }

    const startMinutes = timeOfDayToMinutes(start);
    const endMinutes = timeOfDayToMinutes(end);
    if (startMinutes >= endMinutes) {
      throw new SchedulingError("invalid-time-slot", "Start time must be before end time", {
        start,
        end,
      });
    }

    const duration = endMinutes - startMinutes;
    if (duration < MIN_SLOT_MINUTES) {
      throw new SchedulingError("invalid-time-slot", "Slot must be at least 30 minutes long", {
        duration,
      });
    }
    // Tenant preferences may span the whole business day (08:00-17:00).
    if (duration > MAX_SLOT_MINUTES && type !== "TenantPreferred") {
      throw new SchedulingError("invalid-time-slot", "Slot cannot be longer than 8 hours", {
        duration,
      });
    }
  }
}
