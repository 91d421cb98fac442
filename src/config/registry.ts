import {
  PeriodSchema,
  ScheduleProfileSchema,
  ServerSettingsSchema,
  type Period,
  type ScheduleProfile,
  type ServerSettings
} from "./profile";
import { readJson } from "../utils/fs";

type Env = Record<string, string | undefined>;

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function profileInputFromEnv(env: Env): Record<string, string | undefined> {
  return {
    anchor_name: envValue(env, "SCHEDULE_ANCHOR_NAME"),
    day_marker: envValue(env, "SCHEDULE_DAY_MARKER"),
    sheet_name: envValue(env, "SCHEDULE_SHEET_NAME"),
    event_label: envValue(env, "SCHEDULE_EVENT_LABEL"),
    cell_mode: envValue(env, "SCHEDULE_CELL_MODE")
  };
}

/** Environment values first, then the profile file on top of them. */
export async function loadProfile(profilePath?: string, env: Env = process.env): Promise<ScheduleProfile> {
  const base = profileInputFromEnv(env);
  if (!profilePath) {
    return ScheduleProfileSchema.parse(base);
  }
  const data = await readJson<unknown>(profilePath);
  const fromFile = ScheduleProfileSchema.partial().parse(data);
  return ScheduleProfileSchema.parse({ ...base, ...fromFile });
}

export function loadServerSettings(env: Env = process.env): ServerSettings {
  return ServerSettingsSchema.parse({
    port: envValue(env, "PORT"),
    host: envValue(env, "HOST"),
    max_upload_bytes: envValue(env, "MAX_UPLOAD_BYTES"),
    request_timeout_ms: envValue(env, "REQUEST_TIMEOUT_MS")
  });
}

export function resolveAnchorName(profile: ScheduleProfile, override?: string): string {
  const name = override?.trim() || profile.anchor_name;
  if (!name) {
    throw new Error("No anchor name configured. Pass --name or set SCHEDULE_ANCHOR_NAME.");
  }
  return name;
}

export function parsePeriod(input: { year: unknown; month: unknown }): Period {
  return PeriodSchema.parse(input);
}
