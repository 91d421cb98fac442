import { describe, expect, it } from "vitest";
import {
  EmptyWorkbookError,
  SheetNotFoundError,
  UnsupportedFileTypeError,
  detectWorkbookFormat,
  listSheetNames,
  readScheduleGrid
} from "../src/sheet/workbook";
import { extractShifts } from "../src/schedule/assemble";
import { SCHEDULE_ROWS, buildWorkbook } from "./helpers/workbook";

describe("detectWorkbookFormat", () => {
  it("recognises spreadsheet extensions case-insensitively", () => {
    expect(detectWorkbookFormat("grafik.ods")).toBe("ods");
    expect(detectWorkbookFormat("Grafik.XLSX")).toBe("excel");
    expect(detectWorkbookFormat("old.xls")).toBe("excel");
  });

  it("rejects other files", () => {
    expect(() => detectWorkbookFormat("grafik.csv")).toThrow(UnsupportedFileTypeError);
    expect(() => detectWorkbookFormat("grafik.csv")).toThrow("Unsupported file type. Use .ods or .xlsx");
  });
});

describe("readScheduleGrid", () => {
  it("reads the Plan sheet of an xlsx workbook as text", () => {
    const buffer = buildWorkbook({ Notes: [["ignore me"]], Plan: SCHEDULE_ROWS });
    const sheet = readScheduleGrid(buffer, { filename: "grafik.xlsx" });

    expect(sheet.format).toBe("excel");
    expect(sheet.sheetName).toBe("Plan");
    expect(sheet.rows).toBe(5);
    expect(sheet.columns).toBe(5);
    expect(sheet.grid[2]).toEqual(["Dzień", "1", "2", "3", "4"]);
    expect(sheet.grid[3]).toEqual(["", "08:00:00", "22:00:00", "", "09:00:00"]);
  });

  it("renders numeric time cells through the typed normalizer", () => {
    const buffer = buildWorkbook({
      Plan: [
        ["Diana", ""],
        ["Dzień", 1],
        ["", 0.25],
        ["", 14 / 24]
      ]
    });
    const sheet = readScheduleGrid(buffer, { filename: "grafik.xlsx" });
    expect(sheet.grid[2][1]).toBe("06:00:00");
    expect(sheet.grid[3][1]).toBe("14:00:00");
  });

  it("reads time-formatted midnight cells as clock times", () => {
    const buffer = buildWorkbook(
      {
        Plan: [
          ["Diana", "", ""],
          ["Dzień", 1, 2],
          ["", 16 / 24, 8 / 24],
          ["", 0, 1]
        ]
      },
      "xlsx",
      { B3: "hh:mm", B4: "hh:mm", C3: "[h]:mm", C4: "[h]:mm" }
    );
    const sheet = readScheduleGrid(buffer, { filename: "grafik.xlsx" });

    expect(sheet.grid[1]).toEqual(["Dzień", "1", "2"]);
    expect(sheet.grid[2]).toEqual(["", "16:00:00", "08:00:00"]);
    expect(sheet.grid[3]).toEqual(["", "00:00:00", "24:00:00"]);

    const result = extractShifts(sheet.grid, { year: 2024, month: 3, anchorName: "diana" });
    expect(result.shifts.map((shift) => [shift.start, shift.end])).toEqual([
      ["2024-03-01T16:00:00", "2024-03-02T00:00:00"],
      ["2024-03-02T08:00:00", "2024-03-03T00:00:00"]
    ]);
  });

  it("honours the generic cell mode", () => {
    const buffer = buildWorkbook({ Plan: [["Diana", 0.25]] });
    const sheet = readScheduleGrid(buffer, { filename: "grafik.xlsx", cellMode: "generic" });
    expect(sheet.grid[0]).toEqual(["Diana", "0.25"]);
  });

  it("pads ragged rows to a rectangle", () => {
    const buffer = buildWorkbook({ Plan: [["Diana"], ["Dzień", 1, 2]] });
    const sheet = readScheduleGrid(buffer, { filename: "grafik.xlsx" });
    expect(sheet.grid).toEqual([
      ["Diana", "", ""],
      ["Dzień", "1", "2"]
    ]);
  });

  it("reads OpenDocument spreadsheets", () => {
    const buffer = buildWorkbook({ Plan: SCHEDULE_ROWS }, "ods");
    const sheet = readScheduleGrid(buffer, { filename: "grafik.ods" });
    expect(sheet.format).toBe("ods");
    expect(sheet.grid[1][0]).toBe("Diana");
    expect(sheet.grid[4][2]).toBe("06:00:00");
  });

  it("reports a missing sheet with the available names", () => {
    const buffer = buildWorkbook({ Grafik: SCHEDULE_ROWS });
    expect(() => readScheduleGrid(buffer, { filename: "grafik.xlsx" })).toThrow(SheetNotFoundError);
    expect(() => readScheduleGrid(buffer, { filename: "grafik.xlsx" })).toThrow(
      "Sheet 'Plan' not found. Available sheets: Grafik"
    );
    expect(readScheduleGrid(buffer, { filename: "grafik.xlsx", sheetName: "Grafik" }).rows).toBe(5);
  });

  it("rejects empty uploads and unsupported names before parsing", () => {
    expect(() => readScheduleGrid(Buffer.alloc(0), { filename: "grafik.xlsx" })).toThrow(EmptyWorkbookError);
    expect(() => readScheduleGrid(buildWorkbook({ Plan: SCHEDULE_ROWS }), { filename: "grafik.txt" })).toThrow(
      UnsupportedFileTypeError
    );
  });

  it("lists sheet names", () => {
    expect(listSheetNames(buildWorkbook({ Plan: [["a"]], Urlopy: [["b"]] }))).toEqual(["Plan", "Urlopy"]);
  });
});
