import type { ScheduleProfile, ServerSettings } from "../config/profile";
import { resolveAnchorName } from "../config/registry";
import { CALENDAR_FILENAME } from "../constants";
import { buildCalendar } from "../ics/calendar";
import { schedulePeriodTag } from "../io/paths";
import { extractShifts } from "../schedule/assemble";
import { describeFailure, logWarnings } from "../schedule/report";
import {
  EmptyWorkbookError,
  SheetNotFoundError,
  UnsupportedFileTypeError,
  readScheduleGrid,
  type SheetGrid
} from "../sheet/workbook";
import { utcIsoSeconds } from "../utils/time";
import { RequestError, parseUploadRequest, type UploadRequest } from "./request";

export interface HandlerContext {
  profile: ScheduleProfile;
  settings: ServerSettings;
}

const UPLOAD_PATH = "/upload-schedule";
const HEALTH_PATH = "/healthz";

function jsonError(message: string, status: number): Response {
  return Response.json({ error: message }, { status });
}

function readUpload(upload: UploadRequest, profile: ScheduleProfile): SheetGrid {
  try {
    return readScheduleGrid(upload.file.bytes, {
      filename: upload.file.name,
      sheetName: profile.sheet_name,
      cellMode: profile.cell_mode
    });
  } catch (error) {
    if (
      error instanceof UnsupportedFileTypeError ||
      error instanceof SheetNotFoundError ||
      error instanceof EmptyWorkbookError
    ) {
      throw new RequestError(error.message, 400);
    }
    console.error("Failed to read file", error);
    throw new RequestError(
      `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
      500
    );
  }
}

async function handleUpload(request: Request, context: HandlerContext): Promise<Response> {
  console.log(`Request received for ${UPLOAD_PATH}`);
  const upload = await parseUploadRequest(request, context.settings);
  console.log(`File read complete, size: ${upload.file.bytes.length} bytes`);

  let anchorName: string;
  try {
    anchorName = resolveAnchorName(context.profile, upload.anchorName);
  } catch (error) {
    throw new RequestError(error instanceof Error ? error.message : String(error), 400);
  }

  const sheet = readUpload(upload, context.profile);
  console.log(`Grid created from sheet '${sheet.sheetName}': ${sheet.rows} rows, ${sheet.columns} columns`);

  const result = extractShifts(sheet.grid, {
    year: upload.year,
    month: upload.month,
    anchorName,
    dayMarker: context.profile.day_marker,
    label: context.profile.event_label
  });
  logWarnings(result.warnings);

  const failure = describeFailure(result);
  if (failure) {
    throw new RequestError(failure, 400);
  }

  console.log(`Generating ICS content for ${result.shifts.length} shifts`);
  const ics = buildCalendar(result.shifts, {
    calendarName: `${context.profile.event_label} ${schedulePeriodTag(upload.year, upload.month)}`
  });

  return new Response(ics, {
    status: 200,
    headers: {
      "Content-Type": "text/calendar; charset=utf-8",
      "Content-Disposition": `attachment; filename=${CALENDAR_FILENAME}`,
      "Cache-Control": "no-cache"
    }
  });
}

export async function handleRequest(request: Request, context: HandlerContext): Promise<Response> {
  const url = new URL(request.url);

  if (url.pathname === HEALTH_PATH) {
    if (request.method !== "GET") {
      return jsonError("Method not allowed", 405);
    }
    return Response.json({ status: "ok", timestamp: utcIsoSeconds() });
  }

  if (url.pathname !== UPLOAD_PATH) {
    return jsonError("Not found", 404);
  }
  if (request.method !== "POST") {
    return jsonError("Method not allowed", 405);
  }

  try {
    return await handleUpload(request, context);
  } catch (error) {
    if (error instanceof RequestError) {
      return jsonError(error.message, error.status);
    }
    console.error("Failed to process schedule upload", error);
    return jsonError("Failed to process schedule", 500);
  }
}
