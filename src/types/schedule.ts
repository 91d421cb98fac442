import type { NormalizationWarning } from "../normalize/types";

/** Spreadsheet contents with every cell already rendered to text. Ragged rows read as empty-padded. */
export type Grid = readonly (readonly string[])[];

export interface CellPosition {
  row: number;
  column: number;
}

export interface DayColumn {
  day: number;
  column: number;
  /** Trimmed text two rows below the anchor. */
  start_raw: string;
  /** Trimmed text three rows below the anchor. */
  end_raw: string;
}

export interface AnchorMatch extends CellPosition {
  days: DayColumn[];
}

export interface ScanResult {
  anchors: AnchorMatch[];
  /** Cells equal to the name whose next row is not the day header. */
  rejected_candidates: CellPosition[];
}

export interface NormalizedShift {
  label: string;
  day: number;
  /** Floating local time, `YYYY-MM-DDTHH:MM:SS`. */
  start: string;
  /** Always later than `start`. */
  end: string;
  raw: {
    start: string;
    end: string;
  };
}

export type ScheduleStatus = "ok" | "anchor_not_found" | "no_shifts";

export interface ScheduleResult {
  status: ScheduleStatus;
  year: number;
  month: number;
  anchor_name: string;
  anchors: AnchorMatch[];
  shifts: NormalizedShift[];
  warnings: NormalizationWarning[];
}
