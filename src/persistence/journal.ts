// src/persistence/journal.ts — Durable journal of retirement runs and their state transitions

import { join } from "node:path"
import { Type, type Static } from "@sinclair/typebox"
import { ulid } from "ulid"
import { AtomicJsonStore } from "./json-store.js"

export const RUN_STATES = [
  "started",
  "built",
  "compressed",
  "pushed",
  "awaiting_confirmation",
  "confirmed",
  "rejected",
  "timed_out",
  "deleted",
  "delete_failed",
  "no_data",
  "aborted",
] as const

export type RunState = (typeof RUN_STATES)[number]

/** States after which the archive holds the batch but the source may still hold it too. */
const PENDING_DELETION: ReadonlySet<RunState> = new Set<RunState>([
  "pushed",
  "awaiting_confirmation",
  "confirmed",
  "rejected",
  "timed_out",
  "delete_failed",
])

const RunStateSchema = Type.Union(RUN_STATES.map((s) => Type.Literal(s)))

const TransitionSchema = Type.Object({
  state: RunStateSchema,
  at: Type.String(),
  detail: Type.Optional(Type.String()),
})

const RunSchema = Type.Object({
  runId: Type.String(),
  period: Type.String(),
  stopInstant: Type.String(),
  state: RunStateSchema,
  history: Type.Array(TransitionSchema),
})

export const JournalSchema = Type.Object({
  _schemaVersion: Type.Literal(1),
  runs: Type.Array(RunSchema),
})

export type JournalRun = Static<typeof RunSchema>
export type JournalFile = Static<typeof JournalSchema>

export const JOURNAL_FILE = "retire-journal.json"
export const MAX_JOURNAL_RUNS = 50

export interface RunJournal {
  begin(period: string, stopInstant: string): Promise<JournalRun>
  mark(runId: string, state: RunState, detail?: string): Promise<void>
  /** Latest run for `period` if it was delivered but never deleted. */
  pendingDeletion(period: string): Promise<JournalRun | undefined>
}

export class FileRunJournal implements RunJournal {
  private readonly store: AtomicJsonStore<typeof JournalSchema>

  constructor(stateDir: string, private readonly now: () => Date = () => new Date()) {
    this.store = new AtomicJsonStore(join(stateDir, JOURNAL_FILE), JournalSchema)
  }

  get path(): string {
    return this.store.path
  }

  async begin(period: string, stopInstant: string): Promise<JournalRun> {
    const run: JournalRun = {
      runId: ulid(),
      period,
      stopInstant,
      state: "started",
      history: [{ state: "started", at: this.now().toISOString() }],
    }
    await this.store.update((current) => {
      const runs = [...(current?.runs ?? []), run]
      return { _schemaVersion: 1, runs: runs.slice(-MAX_JOURNAL_RUNS) }
    })
    return run
  }

  async mark(runId: string, state: RunState, detail?: string): Promise<void> {
    const at = this.now().toISOString()
    await this.store.update((current) => {
      const runs = (current?.runs ?? []).map((run) => {
        if (run.runId !== runId) return run
        const transition = detail === undefined ? { state, at } : { state, at, detail }
        return { ...run, state, history: [...run.history, transition] }
      })
      return { _schemaVersion: 1, runs }
    })
  }

  async pendingDeletion(period: string): Promise<JournalRun | undefined> {
    const journal = await this.store.read()
    if (!journal) return undefined
    const latest = journal.runs.filter((run) => run.period === period).at(-1)
    if (!latest || !PENDING_DELETION.has(latest.state)) return undefined
    return latest
  }

  async runs(): Promise<JournalRun[]> {
    return (await this.store.read())?.runs ?? []
  }
}
