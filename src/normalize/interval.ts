import type { NormalizationWarning } from "./types";
import { parseClock, toClockText, type ClockTime } from "./clock";

export interface ShiftInterval {
  start: string;
  end: string;
}

export type RejectionReason = "empty" | "degenerate" | "unparseable";

export interface IntervalParseResult {
  value: ShiftInterval | null;
  rejected?: RejectionReason;
  warning?: NormalizationWarning;
}

const END_OF_DAY = new Set(["24:00", "24:00:00"]);

function calendarDay(year: number, month: number, day: number): Date | null {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function addDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

// Hours past 23 roll into the following days.
function atClock(date: Date, clock: ClockTime): Date {
  const next = new Date(date.getTime());
  next.setUTCHours(clock.hours, clock.minutes, clock.seconds, 0);
  return next;
}

/** Timestamps are floating local times carried in UTC fields, so no offset applies. */
export function formatLocalTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

function rejected(reason: RejectionReason, warning?: NormalizationWarning): IntervalParseResult {
  return warning ? { value: null, rejected: reason, warning } : { value: null, rejected: reason };
}

export function normalizeInterval(
  year: number,
  month: number,
  day: number,
  startRaw: string,
  endRaw: string
): IntervalParseResult {
  const startTrimmed = startRaw.trim();
  const endTrimmed = endRaw.trim();
  if (!startTrimmed || !endTrimmed) return rejected("empty");
  if (startTrimmed === endTrimmed) return rejected("degenerate");

  const startText = toClockText(startTrimmed);
  const endText = toClockText(endTrimmed);

  const date = calendarDay(year, month, day);
  if (!date) {
    return rejected("unparseable", {
      code: "INVALID_CALENDAR_DATE",
      message: `Day ${day} does not exist in ${year}-${month} (times: '${startRaw}' -> '${endRaw}')`,
      severity: "warning"
    });
  }

  const startClock = parseClock(startText);
  const endClock = END_OF_DAY.has(endText) ? null : parseClock(endText);
  if (!startClock || (!endClock && !END_OF_DAY.has(endText))) {
    return rejected("unparseable", {
      code: "TIME_PARSE_FAILED",
      message: `Could not parse times for day ${day}: '${startRaw}' -> '${endRaw}'`,
      severity: "warning"
    });
  }

  const start = atClock(date, startClock);
  let end = endClock ? atClock(date, endClock) : addDays(date, 1);
  if (end.getTime() <= start.getTime()) {
    end = addDays(end, 1);
  }
  // Only reachable when the start overflows by more than a day.
  if (end.getTime() <= start.getTime()) {
    return rejected("unparseable", {
      code: "TIME_PARSE_FAILED",
      message: `Shift on day ${day} ends before it starts: '${startRaw}' -> '${endRaw}'`,
      severity: "warning"
    });
  }

  return {
    value: {
      start: formatLocalTimestamp(start),
      end: formatLocalTimestamp(end)
    }
  };
}
