import { DEFAULT_DAY_MARKER, DEFAULT_EVENT_LABEL } from "../constants";
import { scanGrid } from "../grid/scanner";
import { normalizeInterval } from "../normalize/interval";
import type { NormalizationWarning } from "../normalize/types";
import type { AnchorMatch, Grid, NormalizedShift, ScheduleResult, ScheduleStatus } from "../types/schedule";

export interface ExtractOptions {
  year: number;
  month: number;
  anchorName: string;
  dayMarker?: string;
  label?: string;
}

function assertPeriod(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new RangeError(`Year must be a four-digit integer, got ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Month must be an integer between 1 and 12, got ${month}`);
  }
}

function resolveStatus(anchors: AnchorMatch[], shifts: NormalizedShift[]): ScheduleStatus {
  if (anchors.length === 0) return "anchor_not_found";
  if (shifts.length === 0) return "no_shifts";
  return "ok";
}

/**
 * Walks every anchor for `anchorName` and turns each day column beneath it
 * into a shift. Shifts keep scan order and are never merged or deduplicated.
 */
export function extractShifts(grid: Grid, options: ExtractOptions): ScheduleResult {
  assertPeriod(options.year, options.month);
  const dayMarker = options.dayMarker ?? DEFAULT_DAY_MARKER;
  const label = options.label ?? DEFAULT_EVENT_LABEL;

  const { anchors, rejected_candidates } = scanGrid(grid, options.anchorName, { dayMarker });
  const shifts: NormalizedShift[] = [];
  const warnings: NormalizationWarning[] = rejected_candidates.map((position): NormalizationWarning => ({
    code: "DAY_MARKER_MISSING",
    message: `Cell R${position.row + 1}C${position.column + 1} matches '${options.anchorName}' but is not followed by '${dayMarker}'`,
    severity: "info"
  }));

  for (const anchor of anchors) {
    for (const column of anchor.days) {
      const result = normalizeInterval(
        options.year,
        options.month,
        column.day,
        column.start_raw,
        column.end_raw
      );
      if (result.warning) warnings.push(result.warning);
      if (!result.value) continue;

      shifts.push({
        label,
        day: column.day,
        start: result.value.start,
        end: result.value.end,
        raw: { start: column.start_raw, end: column.end_raw }
      });
    }
  }

  const status = resolveStatus(anchors, shifts);
  if (status === "anchor_not_found") {
    warnings.push({
      code: "ANCHOR_NOT_FOUND",
      message: `No cell named '${options.anchorName}' with '${dayMarker}' beneath it was found.`,
      severity: "error"
    });
  } else if (status === "no_shifts") {
    warnings.push({
      code: "NO_SHIFTS_FOUND",
      message: `No shifts were found for '${options.anchorName}'.`,
      severity: "error"
    });
  }

  return {
    status,
    year: options.year,
    month: options.month,
    anchor_name: options.anchorName,
    anchors,
    shifts,
    warnings
  };
}
