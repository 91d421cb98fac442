import path from "path";
import { pad } from "../utils/text";

export type OutputFormat = "ics" | "json";

export function schedulePeriodTag(year: number, month: number): string {
  return `${year}${pad(month)}`;
}

export function defaultOutputPath(
  outDir: string,
  year: number,
  month: number,
  stamp: string,
  format: OutputFormat
): string {
  return path.join(outDir, `work_schedule_${schedulePeriodTag(year, month)}_${stamp}.${format}`);
}
