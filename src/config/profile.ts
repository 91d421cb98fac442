import { z } from "zod";
import { DEFAULT_DAY_MARKER, DEFAULT_EVENT_LABEL, DEFAULT_SHEET_NAME } from "../constants";

export const CellModeSchema = z.enum(["generic", "typed", "duration"]);

export const ScheduleProfileSchema = z.object({
  anchor_name: z.string().trim().min(1).optional(),
  day_marker: z.string().trim().min(1).default(DEFAULT_DAY_MARKER),
  sheet_name: z.string().min(1).default(DEFAULT_SHEET_NAME),
  event_label: z.string().trim().min(1).default(DEFAULT_EVENT_LABEL),
  cell_mode: CellModeSchema.default("typed")
});

export const ServerSettingsSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  host: z.string().min(1).default("0.0.0.0"),
  max_upload_bytes: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  request_timeout_ms: z.coerce.number().int().positive().default(30_000)
});

export const PeriodSchema = z.object({
  year: z.coerce.number().int().min(1000).max(9999),
  month: z.coerce.number().int().min(1).max(12)
});

export type ScheduleProfile = z.infer<typeof ScheduleProfileSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type Period = z.infer<typeof PeriodSchema>;
