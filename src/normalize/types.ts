export type WarningSeverity = "info" | "warning" | "error";

export type WarningCode =
  | "TIME_PARSE_FAILED"
  | "INVALID_CALENDAR_DATE"
  | "DAY_MARKER_MISSING"
  | "ANCHOR_NOT_FOUND"
  | "NO_SHIFTS_FOUND";

export interface NormalizationWarning {
  code: WarningCode;
  message: string;
  severity: WarningSeverity;
}
