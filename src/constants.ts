export const DEFAULT_DAY_MARKER = "dzień";
export const DEFAULT_SHEET_NAME = "Plan";
export const DEFAULT_EVENT_LABEL = "Work";
export const CALENDAR_PRODUCT_ID = "shift-ics";
export const CALENDAR_FILENAME = "work_schedule.ics";
