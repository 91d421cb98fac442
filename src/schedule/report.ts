import type { NormalizationWarning } from "../normalize/types";
import type { ScheduleResult } from "../types/schedule";

export function formatWarning(warning: NormalizationWarning): string {
  return `${warning.code}: ${warning.message}`.trim();
}

export function logWarnings(warnings: NormalizationWarning[]): void {
  for (const warning of warnings) {
    if (warning.severity === "error") {
      console.error(formatWarning(warning));
    } else {
      console.warn(formatWarning(warning));
    }
  }
}

/** Null when the result holds at least one shift. */
export function describeFailure(result: ScheduleResult): string | null {
  switch (result.status) {
    case "ok":
      return null;
    case "anchor_not_found":
      return `Name '${result.anchor_name}' was not found in the schedule.`;
    case "no_shifts":
      return "No events found in the schedule.";
  }
}
