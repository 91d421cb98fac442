import path from "path";
import { loadProfile, parsePeriod, resolveAnchorName } from "../config/registry";
import { buildCalendar } from "../ics/calendar";
import { defaultOutputPath, schedulePeriodTag, type OutputFormat } from "../io/paths";
import { extractShifts } from "../schedule/assemble";
import { describeFailure, logWarnings } from "../schedule/report";
import { readScheduleGrid } from "../sheet/workbook";
import { readBinary, writeJson, writeText } from "../utils/fs";
import { fileSafeStamp } from "../utils/time";

export interface ConvertOptions {
  filePath: string;
  month: number;
  year: number;
  anchorName?: string;
  profilePath?: string;
  outPath?: string;
  format: OutputFormat;
}

export async function runConvert(options: ConvertOptions): Promise<string> {
  const { year, month } = parsePeriod({ year: options.year, month: options.month });
  const profile = await loadProfile(options.profilePath);
  const anchorName = resolveAnchorName(profile, options.anchorName);

  const filePath = path.resolve(options.filePath);
  const buffer = await readBinary(filePath);
  console.log(`File read complete, size: ${buffer.length} bytes`);

  const sheet = readScheduleGrid(buffer, {
    filename: path.basename(filePath),
    sheetName: profile.sheet_name,
    cellMode: profile.cell_mode
  });
  console.log(`Grid created from sheet '${sheet.sheetName}': ${sheet.rows} rows, ${sheet.columns} columns`);

  const result = extractShifts(sheet.grid, {
    year,
    month,
    anchorName,
    dayMarker: profile.day_marker,
    label: profile.event_label
  });
  logWarnings(result.warnings);

  const failure = describeFailure(result);
  if (failure) {
    throw new Error(failure);
  }

  const outPath = path.resolve(
    options.outPath ?? defaultOutputPath(process.cwd(), year, month, fileSafeStamp(), options.format)
  );
  if (options.format === "json") {
    await writeJson(outPath, result);
  } else {
    const ics = buildCalendar(result.shifts, {
      calendarName: `${profile.event_label} ${schedulePeriodTag(year, month)}`
    });
    await writeText(outPath, ics);
  }

  console.log(`Wrote ${result.shifts.length} shifts to ${outPath}`);
  return outPath;
}
