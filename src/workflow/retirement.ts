// src/workflow/retirement.ts — One retirement run: query, build, transfer, confirm, delete
//
// The delete is issued exactly when the push succeeded. The confirmation only
// changes the reported status, never whether the source is cleaned up.

import {
  buildRetirementBatch,
  type BatchOutcome,
  formatSummary,
  type LineSource,
  type MeasurementCount,
} from "../batch/builder.js"
import { FileGroupStore } from "../batch/group-store.js"
import type { JournalRun, RunJournal, RunState } from "../persistence/journal.js"
import type { SourceStore } from "../store/types.js"
import { StructuralError } from "../stream/errors.js"
import type { ConfirmationChannel, ConfirmationResult } from "../transfer/confirmation.js"
import { TransferCoordinator, type DeliveryStage } from "../transfer/coordinator.js"
import type { ArchivePusher } from "../transfer/rsync.js"
import { DeletionCommitter, type DeletionResult } from "./committer.js"
import { ExitCode, RetireError, exitCodeForError, type RetireErrorCode } from "./errors.js"
import { formatInstant, isValidPeriod, periodOf } from "./period.js"
import { Workspace } from "./workspace.js"

export interface RetirementDeps {
  source: SourceStore
  /** Required unless every run is a dry run */
  pusher?: ArchivePusher
  confirmations?: ConfirmationChannel
  journal?: RunJournal
  workRoot: string
  tag: string
  confirmTimeoutMs: number
  clock?: () => Date
}

export interface RunOptions {
  /** YYYY-MM to retire. Defaults to the UTC month of the run start. */
  period?: string
  /** Build and summarize only */
  dryRun?: boolean
  /**
   * Read annotated CSV from here instead of querying the source. Only valid
   * with `dryRun`: the delete covers every point of the period, not just the
   * ones read from the input.
   */
  input?: LineSource
}

export type RetirementStatus =
  | {
      kind: "archived"
      period: string
      summary: MeasurementCount[]
      total: number
      confirmation: ConfirmationResult
      deletion: DeletionResult
    }
  | { kind: "resumed"; period: string; runId: string; deletion: DeletionResult }
  | { kind: "dry_run"; period: string; summary: MeasurementCount[]; total: number }
  | { kind: "no_data"; period: string }
  | { kind: "structural_error"; period: string; error: StructuralError }
  | { kind: "aborted"; period: string; error: RetireError }

/** Process exit code for a finished run. */
export function exitCodeFor(status: RetirementStatus): number {
  switch (status.kind) {
    case "archived":
      if (status.deletion.kind === "delete_failed") return ExitCode.DELETE_FAILED
      return confirmationExitCode(status.confirmation)
    case "resumed":
      return status.deletion.kind === "deleted" ? ExitCode.ARCHIVED : ExitCode.DELETE_FAILED
    case "dry_run":
      return ExitCode.ARCHIVED
    case "no_data":
      return ExitCode.NO_DATA
    case "structural_error":
      return status.error.exitCode
    case "aborted":
      return exitCodeForError(status.error.code)
  }
}

const STAGE_ERRORS: Record<DeliveryStage, RetireErrorCode> = {
  rendezvous: "RENDEZVOUS_FAILED",
  compress: "COMPRESSION_FAILED",
  push: "TRANSFER_FAILED",
}

export class RetirementWorkflow {
  private readonly clock: () => Date
  private readonly committer: DeletionCommitter

  constructor(private readonly deps: RetirementDeps) {
    this.clock = deps.clock ?? (() => new Date())
    this.committer = new DeletionCommitter(deps.source, deps.tag)
  }

  async run(options: RunOptions = {}): Promise<RetirementStatus> {
    const startedAt = this.clock()
    const period = options.period ?? periodOf(startedAt)
    if (!isValidPeriod(period)) {
      return aborted(period, "CONFIG_INVALID", `Invalid period "${period}", expected YYYY-MM`)
    }
    const dryRun = options.dryRun ?? false
    if (options.input !== undefined && !dryRun) {
      return aborted(period, "CONFIG_INVALID", "an input override is only accepted on a dry run")
    }

    if (!dryRun) {
      const pending = await this.pendingDeletion(period)
      if (pending) return this.resume(period, pending.runId, pending.stopInstant)
    }

    const runId = dryRun ? undefined : await this.begin(period, formatInstant(startedAt))
    const status = await this.execute(period, startedAt, dryRun, options.input, runId)
    await this.mark(runId, finalState(status), finalDetail(status))
    return status
  }

  private async execute(
    period: string,
    startedAt: Date,
    dryRun: boolean,
    input: LineSource | undefined,
    runId: string | undefined,
  ): Promise<RetirementStatus> {
    console.log(`[retire] retiring points tagged ${this.deps.tag}="${period}"${dryRun ? " (dry run)" : ""}`)

    let lines: LineSource
    try {
      lines = input ?? await this.deps.source.queryRetired(period)
    } catch (err) {
      return aborted(period, "SOURCE_FAILED", `can't query retired points: ${messageOf(err)}`)
    }

    let ws: Workspace
    try {
      ws = await Workspace.create(this.deps.workRoot)
    } catch (err) {
      return aborted(period, "WORKSPACE_FAILED", `can't create working directory: ${messageOf(err)}`)
    }

    try {
      let outcome: BatchOutcome
      try {
        outcome = await buildRetirementBatch(lines, new FileGroupStore(ws.path))
      } catch (err) {
        return aborted(period, "SOURCE_FAILED", `can't read retired points: ${messageOf(err)}`)
      }

      if (outcome.kind === "empty") {
        console.log(`[retire] no retired points for ${period}`)
        return { kind: "no_data", period }
      }
      if (outcome.kind === "structural_error") {
        logStructuralError(outcome.error)
        return { kind: "structural_error", period, error: outcome.error }
      }

      for (const line of formatSummary(outcome.summary, outcome.total)) console.log(line)
      await this.mark(runId, "built", `${outcome.groups.length} group(s), ${outcome.total} point(s)`)

      if (dryRun) {
        return { kind: "dry_run", period, summary: outcome.summary, total: outcome.total }
      }

      const { pusher, confirmations } = this.deps
      if (!pusher || !confirmations) {
        return aborted(period, "CONFIG_INVALID", "no archive transfer configured")
      }

      const coordinator = new TransferCoordinator({
        pusher,
        confirmations,
        confirmTimeoutMs: this.deps.confirmTimeoutMs,
        onStage: (stage, detail) => this.mark(runId, stage, JSON.stringify(detail)),
      })
      const report = await coordinator.run(outcome.groups)

      if (report.transfer.kind === "delivery_failed") {
        const { stage, cause } = report.transfer
        console.error(`[transfer] ${stage} failed: ${cause.message}`)
        return aborted(period, STAGE_ERRORS[stage], cause.message, { stage })
      }

      const confirmation: ConfirmationResult = report.confirmation ?? { kind: "timed_out" }
      logConfirmation(confirmation)
      await this.mark(runId, confirmationState(confirmation))

      const deletion = await this.committer.commit(period, startedAt)
      if (deletion.kind === "deleted") {
        if (confirmation.kind === "committed") {
          console.log("[retire] measurements archived successfully")
        } else {
          console.warn("[retire] measurements archived, but not confirmed by the archive server")
        }
      }

      return {
        kind: "archived",
        period,
        summary: outcome.summary,
        total: outcome.total,
        confirmation,
        deletion,
      }
    } finally {
      ws.dispose()
    }
  }

  /** Delete-only run for a period the archive already received. */
  private async resume(period: string, runId: string, stopInstant: string): Promise<RetirementStatus> {
    console.log(`[retire] run ${runId} for ${period} was delivered but not deleted; resuming at delete`)
    const deletion = await this.committer.commit(period, new Date(stopInstant))
    await this.mark(runId, deletion.kind, deletion.kind === "delete_failed" ? deletion.cause.message : "resumed")
    return { kind: "resumed", period, runId, deletion }
  }

  private async pendingDeletion(period: string): Promise<JournalRun | undefined> {
    if (!this.deps.journal) return undefined
    try {
      return await this.deps.journal.pendingDeletion(period)
    } catch (err) {
      console.error(`[journal] can't read journal: ${messageOf(err)}`)
      return undefined
    }
  }

  private async begin(period: string, stopInstant: string): Promise<string | undefined> {
    if (!this.deps.journal) return undefined
    try {
      const run = await this.deps.journal.begin(period, stopInstant)
      console.log(`[journal] run ${run.runId} started for ${period}`)
      return run.runId
    } catch (err) {
      console.error(`[journal] can't record run start: ${messageOf(err)}`)
      return undefined
    }
  }

  private async mark(runId: string | undefined, state: RunState, detail?: string): Promise<void> {
    if (!this.deps.journal || runId === undefined) return
    try {
      await this.deps.journal.mark(runId, state, detail)
    } catch (err) {
      console.error(`[journal] can't record ${state} for run ${runId}: ${messageOf(err)}`)
    }
  }
}

function aborted(
  period: string,
  code: RetireErrorCode,
  message: string,
  context: Record<string, unknown> = {},
): RetirementStatus {
  const error = new RetireError(code, message, { period, ...context })
  console.error(error.message)
  return { kind: "aborted", period, error }
}

function confirmationExitCode(confirmation: ConfirmationResult): number {
  switch (confirmation.kind) {
    case "committed": return ExitCode.ARCHIVED
    case "rejected": return ExitCode.UNCONFIRMED_REJECTED
    case "timed_out": return ExitCode.UNCONFIRMED_TIMEOUT
  }
}

function confirmationState(confirmation: ConfirmationResult): RunState {
  switch (confirmation.kind) {
    case "committed": return "confirmed"
    case "rejected": return "rejected"
    case "timed_out": return "timed_out"
  }
}

function finalState(status: RetirementStatus): RunState {
  switch (status.kind) {
    case "archived":
    case "resumed":
      return status.deletion.kind
    case "dry_run":
      return "built"
    case "no_data":
      return "no_data"
    case "structural_error":
    case "aborted":
      return "aborted"
  }
}

function finalDetail(status: RetirementStatus): string | undefined {
  switch (status.kind) {
    case "archived":
    case "resumed":
      return status.deletion.kind === "delete_failed" ? status.deletion.cause.message : undefined
    case "structural_error":
    case "aborted":
      return status.error.message
    default:
      return undefined
  }
}

function logConfirmation(confirmation: ConfirmationResult): void {
  switch (confirmation.kind) {
    case "committed":
      console.log("[confirm] archive server committed the batch")
      break
    case "rejected":
      console.warn(`[confirm] archive server rejected the batch: ${confirmation.message}`)
      break
    case "timed_out":
      console.warn(`[confirm] no confirmation from the archive server${confirmation.detail ? ` (${confirmation.detail})` : ""}`)
      break
  }
}

function logStructuralError(error: StructuralError): void {
  console.error(`[retire] ${error.message}`)
  for (const line of error.annotationLines) console.error(`  ${line}`)
  console.error(`> ${error.line}`)
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
