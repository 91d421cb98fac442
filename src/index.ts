export { scanGrid, findMarkerCells, readDayColumns, parseDayNumber } from "./grid/scanner";
export { normalizeInterval } from "./normalize/interval";
export type { IntervalParseResult, RejectionReason, ShiftInterval } from "./normalize/interval";
export { durationToClock, parseClock } from "./normalize/clock";
export type { NormalizationWarning } from "./normalize/types";
export { extractShifts } from "./schedule/assemble";
export type { ExtractOptions } from "./schedule/assemble";
export { cellTextNormalizer } from "./sheet/cellText";
export type { CellTextMode, CellTextNormalizer } from "./sheet/cellText";
export { readScheduleGrid, detectWorkbookFormat } from "./sheet/workbook";
export { buildCalendar } from "./ics/calendar";
export { handleRequest } from "./http/handler";
export type {
  AnchorMatch,
  DayColumn,
  Grid,
  NormalizedShift,
  ScanResult,
  ScheduleResult,
  ScheduleStatus
} from "./types/schedule";
