#!/usr/bin/env node
// src/index.ts — tsdb-retire entry point
// Boot sequence: args → config → source → transfer → journal → run (or schedule)

import { parseCliArgs, USAGE, type CliOptions } from "./cli.js"
import { ConfigError, loadConfig, type RetireConfig } from "./config.js"
import { startRetirementSchedule, validateSchedule, type RetirementSchedule } from "./cron/schedule.js"
import { FileRunJournal } from "./persistence/journal.js"
import { InfluxSourceStore } from "./store/influx.js"
import { readLines } from "./stream/lines.js"
import { TcpConfirmationChannel, resolvePeers } from "./transfer/confirmation.js"
import { RsyncPusher } from "./transfer/rsync.js"
import { ExitCode, RetireError, exitCodeForError } from "./workflow/errors.js"
import { RetirementWorkflow, exitCodeFor, type RetirementDeps } from "./workflow/retirement.js"
import { disposeAllWorkspaces } from "./workflow/workspace.js"

/** Wire every port from configuration. The archive peers are resolved per call. */
async function createWorkflow(config: RetireConfig, dryRun: boolean): Promise<RetirementWorkflow> {
  const deps: RetirementDeps = {
    source: new InfluxSourceStore({ ...config.influx, tag: config.tag }),
    workRoot: config.workRoot,
    tag: config.tag,
    confirmTimeoutMs: config.commit.timeoutMs,
  }
  if (dryRun) return new RetirementWorkflow(deps)

  const allowedPeers = await resolvePeers(config.archive.host)
  console.log(`[retire] accepting confirmations from ${allowedPeers.join(", ")} on ${config.commit.host}:${config.commit.port}`)

  return new RetirementWorkflow({
    ...deps,
    pusher: new RsyncPusher({
      host: config.archive.host,
      module: config.archive.rsyncModule,
      binaryPath: config.archive.rsyncBin,
      timeoutMs: config.archive.rsyncTimeoutMs,
    }),
    confirmations: new TcpConfirmationChannel({
      host: config.commit.host,
      port: config.commit.port,
      allowedPeers,
    }),
    journal: new FileRunJournal(config.stateDir),
  })
}

async function runOnce(config: RetireConfig, cli: CliOptions): Promise<number> {
  let workflow: RetirementWorkflow
  try {
    workflow = await createWorkflow(config, cli.dryRun)
  } catch (err) {
    const error = new RetireError(
      "RENDEZVOUS_FAILED",
      `can't resolve archive host ${config.archive.host}: ${err instanceof Error ? err.message : String(err)}`,
    )
    console.error(error.message)
    return exitCodeForError(error.code)
  }
  const status = await workflow.run({
    period: cli.period,
    dryRun: cli.dryRun,
    input: cli.input !== undefined ? readLines(cli.input) : undefined,
  })
  return exitCodeFor(status)
}

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2))
  if (cli.help) {
    console.log(USAGE)
    return ExitCode.ARCHIVED
  }

  const config = loadConfig(process.env, { requireArchive: !cli.dryRun })
  const expression = cli.schedule ?? config.schedule.expression

  let schedule: RetirementSchedule | undefined
  const handleSignal = (signal: "SIGINT" | "SIGTERM") => {
    console.warn(`[retire] ${signal} received, cleaning up`)
    schedule?.stop()
    const removed = disposeAllWorkspaces()
    if (removed > 0) console.warn(`[retire] removed ${removed} working director${removed === 1 ? "y" : "ies"}`)
    process.exit(signal === "SIGINT" ? ExitCode.INTERRUPTED_SIGINT : ExitCode.INTERRUPTED_SIGTERM)
  }
  process.on("SIGINT", () => handleSignal("SIGINT"))
  process.on("SIGTERM", () => handleSignal("SIGTERM"))

  if (!expression) return runOnce(config, cli)

  const scheduleOpts = { expression, timezone: config.schedule.timezone }
  try {
    validateSchedule(scheduleOpts)
  } catch (err) {
    throw new ConfigError("RETIRE_SCHEDULE", err instanceof Error ? err.message : String(err))
  }

  schedule = startRetirementSchedule(scheduleOpts, async () => {
    const code = await runOnce(config, cli)
    console.log(`[schedule] run finished with exit code ${code}`)
  })

  // Scheduled mode only ends on a signal
  return new Promise<number>(() => {})
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(`[retire] invalid configuration: ${err.message}`)
      console.error(USAGE)
      process.exit(ExitCode.CONFIG_INVALID)
    }
    console.error("[retire] fatal:", err)
    process.exit(ExitCode.FATAL)
  })
