#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";
import pkg from "../../package.json";
import { runConvert } from "../commands/convert";
import { runInspect } from "../commands/inspect";
import { runServe } from "../commands/serve";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SHIFT_ICS_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("shift-ics")
  .description("Convert one person's shifts from a monthly schedule spreadsheet into an iCalendar file")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides SHIFT_ICS_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("convert")
  .requiredOption("--file <path>", "Schedule workbook (.ods, .xlsx or .xls)")
  .requiredOption("--month <n>", "Month of the schedule (1-12)", parseInteger)
  .requiredOption("--year <n>", "Year of the schedule", parseInteger)
  .option("--name <name>", "Name in the anchor cell (overrides SCHEDULE_ANCHOR_NAME)")
  .option("--profile <path>", "Schedule profile JSON")
  .option("--out <path>", "Output path (default: work_schedule_<YYYYMM>_<timestamp>.<format>)")
  .addOption(new Option("--format <format>", "Output format").choices(["ics", "json"]).default("ics"))
  .action(async (opts) => {
    await runConvert({
      filePath: opts.file,
      month: opts.month,
      year: opts.year,
      anchorName: opts.name,
      profilePath: opts.profile,
      outPath: opts.out,
      format: opts.format
    });
  });

program
  .command("inspect")
  .requiredOption("--file <path>", "Schedule workbook (.ods, .xlsx or .xls)")
  .option("--name <name>", "Name in the anchor cell (overrides SCHEDULE_ANCHOR_NAME)")
  .option("--profile <path>", "Schedule profile JSON")
  .option("--month <n>", "Month to check dates against (default: current)", parseInteger)
  .option("--year <n>", "Year to check dates against (default: current)", parseInteger)
  .action(async (opts) => {
    await runInspect({
      filePath: opts.file,
      anchorName: opts.name,
      profilePath: opts.profile,
      month: opts.month,
      year: opts.year
    });
  });

program
  .command("serve")
  .description("Serve POST /upload-schedule")
  .option("--port <n>", "Port (overrides PORT)", parseInteger)
  .option("--host <host>", "Host (overrides HOST)")
  .option("--profile <path>", "Schedule profile JSON")
  .action(async (opts) => {
    await runServe({ port: opts.port, host: opts.host, profilePath: opts.profile });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
