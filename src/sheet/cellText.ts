import * as XLSX from "xlsx";
import { durationToClock, formatClock } from "../normalize/clock";
import { pad } from "../utils/text";

export type CellTextMode = "generic" | "typed" | "duration";

/**
 * Turns whatever a spreadsheet reader produced for one cell into trimmed text.
 * `numberFormat` is the cell's display format when the reader knows it.
 */
export type CellTextNormalizer = (value: unknown, numberFormat?: string) => string;

const SECONDS_PER_DAY = 86_400;

function genericCellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

// Spreadsheets store times as fractions of a day. Values below 2 are treated as
// clock/duration cells ("[h]:mm" may run past 24h); larger ones are date-times.
function fractionToClock(value: number): string {
  const fraction = value < 2 ? value : value - Math.floor(value);
  return formatClock(Math.round(fraction * SECONDS_PER_DAY));
}

/** Date formats that show hours or seconds, including elapsed `[h]:mm`. */
export function isClockFormat(numberFormat: string | undefined): boolean {
  if (!numberFormat) return false;
  return XLSX.SSF.is_date(numberFormat) === true && /[hs]/i.test(numberFormat);
}

function typedCellText(value: unknown, numberFormat?: string): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return "";
    // 00:00 is stored as 0 and [h]:mm 24:00 as 1.
    if (value >= 0 && isClockFormat(numberFormat)) return fractionToClock(value);
    if (Number.isInteger(value)) return value.toString();
    if (value > 0) return fractionToClock(value);
    return value.toString();
  }
  if (value instanceof Date) {
    return `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
  }
  return String(value).trim();
}

function durationCellText(value: unknown, numberFormat?: string): string {
  const text = typedCellText(value, numberFormat);
  return durationToClock(text) ?? text;
}

export function cellTextNormalizer(mode: CellTextMode): CellTextNormalizer {
  switch (mode) {
    case "generic":
      return genericCellText;
    case "typed":
      return typedCellText;
    case "duration":
      return durationCellText;
  }
}
