import * as XLSX from "xlsx";
import { DEFAULT_SHEET_NAME } from "../constants";
import type { Grid } from "../types/schedule";
import { cellTextNormalizer, type CellTextMode, type CellTextNormalizer } from "./cellText";

export type WorkbookFormat = "ods" | "excel";

export class UnsupportedFileTypeError extends Error {
  constructor(public filename: string) {
    super("Unsupported file type. Use .ods or .xlsx");
    this.name = "UnsupportedFileTypeError";
  }
}

export class EmptyWorkbookError extends Error {
  constructor() {
    super("Uploaded file is empty.");
    this.name = "EmptyWorkbookError";
  }
}

export class SheetNotFoundError extends Error {
  constructor(
    public sheetName: string,
    public available: string[]
  ) {
    super(`Sheet '${sheetName}' not found. Available sheets: ${available.join(", ") || "none"}`);
    this.name = "SheetNotFoundError";
  }
}

export interface ReadGridOptions {
  filename: string;
  sheetName?: string;
  cellMode?: CellTextMode;
  /** Takes precedence over `cellMode`. */
  normalizeCell?: CellTextNormalizer;
}

export interface SheetGrid {
  format: WorkbookFormat;
  sheetName: string;
  rows: number;
  columns: number;
  grid: Grid;
}

export function detectWorkbookFormat(filename: string): WorkbookFormat {
  const lower = filename.trim().toLowerCase();
  if (lower.endsWith(".ods")) return "ods";
  if (lower.endsWith(".xlsx") || lower.endsWith(".xls")) return "excel";
  throw new UnsupportedFileTypeError(filename);
}

function loadWorkbook(buffer: Buffer): XLSX.WorkBook {
  if (buffer.length === 0) {
    throw new EmptyWorkbookError();
  }
  return XLSX.read(buffer, { type: "buffer", cellNF: true });
}

export function listSheetNames(buffer: Buffer): string[] {
  return loadWorkbook(buffer).SheetNames;
}

function cellValue(cell: XLSX.CellObject): unknown {
  if (cell.t === "e") return cell.w ?? "";
  return cell.v ?? null;
}

function toGrid(sheet: XLSX.WorkSheet, normalizeCell: CellTextNormalizer): { grid: string[][]; columns: number } {
  const ref = sheet["!ref"];
  if (!ref) return { grid: [], columns: 0 };

  const range = XLSX.utils.decode_range(ref);
  const grid: string[][] = [];
  for (let row = range.s.r; row <= range.e.r; row++) {
    const cells: string[] = [];
    for (let column = range.s.c; column <= range.e.c; column++) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r: row, c: column })];
      if (!cell) {
        cells.push(normalizeCell(null));
        continue;
      }
      cells.push(normalizeCell(cellValue(cell), typeof cell.z === "string" ? cell.z : undefined));
    }
    grid.push(cells);
  }
  return { grid, columns: range.e.c - range.s.c + 1 };
}

export function readScheduleGrid(buffer: Buffer, options: ReadGridOptions): SheetGrid {
  const format = detectWorkbookFormat(options.filename);
  const sheetName = options.sheetName ?? DEFAULT_SHEET_NAME;
  const workbook = loadWorkbook(buffer);

  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new SheetNotFoundError(sheetName, workbook.SheetNames);
  }

  const normalizeCell = options.normalizeCell ?? cellTextNormalizer(options.cellMode ?? "typed");
  const { grid, columns } = toGrid(sheet, normalizeCell);

  return {
    format,
    sheetName,
    rows: grid.length,
    columns,
    grid
  };
}
