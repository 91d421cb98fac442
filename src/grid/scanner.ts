import { DEFAULT_DAY_MARKER } from "../constants";
import type { AnchorMatch, CellPosition, DayColumn, Grid, ScanResult } from "../types/schedule";
import { foldCase } from "../utils/text";

export interface ScanOptions {
  dayMarker?: string;
}

const DAY_NUMBER = /^[+-]?\d+$/;

export function gridWidth(grid: Grid): number {
  return grid.reduce((width, row) => Math.max(width, row.length), 0);
}

export function cellText(grid: Grid, row: number, column: number): string {
  return (grid[row]?.[column] ?? "").trim();
}

export function parseDayNumber(text: string): number | null {
  const cleaned = text.trim();
  if (!DAY_NUMBER.test(cleaned)) return null;
  const day = Number.parseInt(cleaned, 10);
  return day >= 1 && day <= 31 ? day : null;
}

/** Every cell equal to the marker, row-major. */
export function findMarkerCells(grid: Grid, markerName: string): CellPosition[] {
  const marker = foldCase(markerName);
  if (!marker) return [];

  const positions: CellPosition[] = [];
  grid.forEach((cells, row) => {
    cells.forEach((value, column) => {
      if (foldCase(value) === marker) {
        positions.push({ row, column });
      }
    });
  });
  return positions;
}

export function hasDayHeader(grid: Grid, anchor: CellPosition, dayMarker: string): boolean {
  return foldCase(cellText(grid, anchor.row + 1, anchor.column)) === foldCase(dayMarker);
}

/**
 * Reads the header row under an anchor. Blank, non-numeric and out-of-range
 * cells are skipped without ending the row; repeated days are all kept.
 */
export function readDayColumns(grid: Grid, anchor: CellPosition): DayColumn[] {
  const headerRow = anchor.row + 1;
  const width = gridWidth(grid);
  const days: DayColumn[] = [];

  for (let column = anchor.column + 1; column < width; column++) {
    const day = parseDayNumber(cellText(grid, headerRow, column));
    if (day === null) continue;
    days.push({
      day,
      column,
      start_raw: cellText(grid, anchor.row + 2, column),
      end_raw: cellText(grid, anchor.row + 3, column)
    });
  }

  return days;
}

export function scanGrid(grid: Grid, markerName: string, options: ScanOptions = {}): ScanResult {
  const dayMarker = options.dayMarker ?? DEFAULT_DAY_MARKER;
  const result: ScanResult = { anchors: [], rejected_candidates: [] };

  for (const position of findMarkerCells(grid, markerName)) {
    if (hasDayHeader(grid, position, dayMarker)) {
      result.anchors.push({ ...position, days: readDayColumns(grid, position) });
    } else {
      result.rejected_candidates.push(position);
    }
  }

  return result;
}
