import { pad } from "../utils/text";

export interface ClockTime {
  hours: number;
  minutes: number;
  seconds: number;
}

// Hours above 23 are allowed: duration-typed cells render as e.g. "26:00:00".
const CLOCK_PATTERN = /^(\d{1,3}):([0-5]\d)(?::([0-5]\d))?$/;
const DURATION_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)(?:[.,]\d+)?S)?)?$/i;

export function formatClock(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Renders an ISO-8601 duration such as `PT7H30M` as a clock string
 * (`07:30:00`). Fractional seconds are dropped. Returns null for anything
 * that is not a day/time duration.
 */
export function durationToClock(text: string): string | null {
  const match = text.trim().match(DURATION_PATTERN);
  if (!match) return null;

  const [, days, hours, minutes, seconds] = match;
  if (days === undefined && hours === undefined && minutes === undefined && seconds === undefined) {
    return null;
  }

  const totalSeconds =
    Number(days ?? 0) * 86_400 +
    Number(hours ?? 0) * 3_600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0);
  return formatClock(totalSeconds);
}

/** Durations become clock strings; anything else is only trimmed. */
export function toClockText(text: string): string {
  const trimmed = text.trim();
  return durationToClock(trimmed) ?? trimmed;
}

export function parseClock(text: string): ClockTime | null {
  const match = toClockText(text).match(CLOCK_PATTERN);
  if (!match) return null;
  return {
    hours: Number(match[1]),
    minutes: Number(match[2]),
    seconds: Number(match[3] ?? 0)
  };
}
