// src/cli.ts — Command-line argument parsing

import { parseArgs } from "node:util"
import { ConfigError } from "./config.js"
import { isValidPeriod } from "./workflow/period.js"

export interface CliOptions {
  dryRun: boolean
  /** File to read annotated CSV from, "-" for stdin */
  input?: string
  period?: string
  /** Cron expression; overrides RETIRE_SCHEDULE */
  schedule?: string
  help: boolean
}

export const USAGE = `Usage: tsdb-retire [options]

Archives every point tagged with the current retirement period, waits for the
archive server to confirm, then deletes the points from the source store.

Options:
  --dry-run             query and summarize only; nothing is sent or deleted
  -i, --input <file>    read annotated CSV from <file> ("-" for stdin);
                        requires --dry-run
  -p, --period <YYYY-MM>
                        retire this period instead of the current month
  --schedule <cron>     keep running and retire on every cron tick
  -h, --help            show this help

Configuration is read from RETIRE_* environment variables.`

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      "dry-run": { type: "boolean", default: false },
      input: { type: "string", short: "i" },
      period: { type: "string", short: "p" },
      schedule: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
    strict: true,
  }).values
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof parse>
  try {
    values = parse(argv)
  } catch (err) {
    throw new ConfigError("argv", err instanceof Error ? err.message : String(err))
  }

  const options: CliOptions = {
    dryRun: values["dry-run"] ?? false,
    input: values.input,
    period: values.period,
    schedule: values.schedule,
    help: values.help ?? false,
  }

  if (options.period !== undefined && !isValidPeriod(options.period)) {
    throw new ConfigError("--period", `expected YYYY-MM (got "${options.period}")`)
  }
  if (options.input !== undefined && !options.dryRun) {
    throw new ConfigError("--input", "requires --dry-run")
  }
  if (options.schedule !== undefined && (options.input !== undefined || options.period !== undefined)) {
    throw new ConfigError("--schedule", "cannot be combined with --input or --period")
  }
  return options
}
