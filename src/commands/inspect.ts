import path from "path";
import { loadProfile, parsePeriod, resolveAnchorName } from "../config/registry";
import { cellText, scanGrid } from "../grid/scanner";
import type { NormalizationWarning } from "../normalize/types";
import { extractShifts } from "../schedule/assemble";
import { logWarnings } from "../schedule/report";
import { listSheetNames, readScheduleGrid } from "../sheet/workbook";
import type { ScheduleStatus } from "../types/schedule";
import { readBinary } from "../utils/fs";

export interface InspectOptions {
  filePath: string;
  anchorName?: string;
  profilePath?: string;
  /** Defaults to the current month. */
  month?: number;
  year?: number;
}

export interface InspectReport {
  sheets: string[];
  sheet_name: string;
  rows: number;
  columns: number;
  anchors: {
    cell: string;
    header: string;
    accepted: boolean;
    days: number[];
  }[];
  status: ScheduleStatus;
  shift_count: number;
  warnings: NormalizationWarning[];
}

function cellLabel(row: number, column: number): string {
  return `R${row + 1}C${column + 1}`;
}

/** Describes where the anchor name appears and what extraction would report, without writing anything. */
export async function runInspect(options: InspectOptions): Promise<InspectReport> {
  const now = new Date();
  const { year, month } = parsePeriod({
    year: options.year ?? now.getFullYear(),
    month: options.month ?? now.getMonth() + 1
  });
  const profile = await loadProfile(options.profilePath);
  const anchorName = resolveAnchorName(profile, options.anchorName);

  const filePath = path.resolve(options.filePath);
  const buffer = await readBinary(filePath);
  const sheets = listSheetNames(buffer);
  const sheet = readScheduleGrid(buffer, {
    filename: path.basename(filePath),
    sheetName: profile.sheet_name,
    cellMode: profile.cell_mode
  });

  const scan = scanGrid(sheet.grid, anchorName, { dayMarker: profile.day_marker });
  const anchors = [
    ...scan.anchors.map((anchor) => ({
      row: anchor.row,
      column: anchor.column,
      accepted: true,
      days: anchor.days.map((column) => column.day)
    })),
    ...scan.rejected_candidates.map((position) => ({ ...position, accepted: false, days: [] }))
  ]
    .sort((a, b) => a.row - b.row || a.column - b.column)
    .map((entry) => ({
      cell: cellLabel(entry.row, entry.column),
      header: cellText(sheet.grid, entry.row + 1, entry.column),
      accepted: entry.accepted,
      days: entry.days
    }));

  const result = extractShifts(sheet.grid, {
    year,
    month,
    anchorName,
    dayMarker: profile.day_marker,
    label: profile.event_label
  });

  console.log(`Sheets: ${sheets.join(", ")}`);
  console.log(`Using '${sheet.sheetName}' (${sheet.rows} rows, ${sheet.columns} columns)`);
  for (const anchor of anchors) {
    const status = anchor.accepted ? `days ${anchor.days.join(", ") || "none"}` : `header '${anchor.header}' ignored`;
    console.log(`${anchor.cell}: ${status}`);
  }
  console.log(`${result.shifts.length} shifts for ${year}-${String(month).padStart(2, "0")} (${result.status})`);
  logWarnings(result.warnings);

  return {
    sheets,
    sheet_name: sheet.sheetName,
    rows: sheet.rows,
    columns: sheet.columns,
    anchors,
    status: result.status,
    shift_count: result.shifts.length,
    warnings: result.warnings
  };
}
