import { createEvents, type EventAttributes } from "ics";
import { CALENDAR_PRODUCT_ID } from "../constants";
import type { NormalizedShift } from "../types/schedule";
import { shortDigest } from "../utils/hash";

export interface CalendarOptions {
  calendarName?: string;
}

export class CalendarBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalendarBuildError";
  }
}

const LOCAL_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/;
const UTC_EVENT_TIME = /^(DTSTART|DTEND):(\d{8}T\d{6})Z(?=\r?$)/gm;

// The wall-clock fields are carried as a UTC instant so that only UTC getters
// touch them; the host time zone never applies.
function wallClockMillis(timestamp: string): number {
  const millis = LOCAL_TIMESTAMP.test(timestamp) ? Date.parse(`${timestamp}Z`) : Number.NaN;
  if (Number.isNaN(millis)) {
    throw new CalendarBuildError(`Invalid shift timestamp: ${timestamp}`);
  }
  return millis;
}

function toFloatingTimes(ics: string): string {
  return ics.replace(UTC_EVENT_TIME, "$1:$2");
}

/** Same position and times always give the same UID. */
export function shiftUid(shift: NormalizedShift, index: number): string {
  return `${shortDigest(`${index}|${shift.label}|${shift.start}|${shift.end}`)}@${CALENDAR_PRODUCT_ID}`;
}

export function toEventAttributes(
  shift: NormalizedShift,
  index: number,
  options: CalendarOptions = {}
): EventAttributes {
  return {
    uid: shiftUid(shift, index),
    productId: CALENDAR_PRODUCT_ID,
    calName: options.calendarName,
    title: shift.label,
    start: wallClockMillis(shift.start),
    startInputType: "utc",
    startOutputType: "utc",
    end: wallClockMillis(shift.end),
    endInputType: "utc",
    endOutputType: "utc",
    status: "CONFIRMED",
    busyStatus: "BUSY"
  };
}

/** Events carry floating local times to the second, with no TZID and no UTC suffix. */
export function buildCalendar(shifts: NormalizedShift[], options: CalendarOptions = {}): string {
  if (shifts.length === 0) {
    throw new CalendarBuildError("Cannot build a calendar without events.");
  }

  const { error, value } = createEvents(
    shifts.map((shift, index) => toEventAttributes(shift, index, options))
  );
  if (error || !value) {
    throw new CalendarBuildError(`ICS generation failed: ${error?.message ?? "no output"}`);
  }
  return toFloatingTimes(value);
}
