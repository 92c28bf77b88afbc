// tests/retire/fakes.ts — In-process stand-ins for the workflow's ports

import type { DeleteRequest, SourceStore } from "../../src/store/types.js"
import type { ConfirmationChannel, ConfirmationResult, Rendezvous } from "../../src/transfer/confirmation.js"
import type { ArchivePusher, PushReceipt } from "../../src/transfer/rsync.js"
import type { JournalRun, RunJournal, RunState } from "../../src/persistence/journal.js"

export class FakeSource implements SourceStore {
  readonly queries: string[] = []
  readonly deletes: DeleteRequest[] = []
  queryError: Error | undefined
  deleteError: Error | undefined

  constructor(private readonly lines: readonly string[] = []) {}

  async queryRetired(period: string): Promise<AsyncIterable<string>> {
    this.queries.push(period)
    if (this.queryError) throw this.queryError
    const lines = this.lines
    return (async function* () {
      yield* lines
    })()
  }

  async delete(request: DeleteRequest): Promise<void> {
    this.deletes.push(request)
    if (this.deleteError) throw this.deleteError
  }
}

export class FakePusher implements ArchivePusher {
  readonly destination = "rsync://archive.test:/tsdb_retired/"
  readonly pushed: string[][] = []
  error: Error | undefined

  async push(paths: readonly string[]): Promise<PushReceipt> {
    this.pushed.push([...paths])
    if (this.error) throw this.error
    return { destination: this.destination, files: paths.map((p) => p.split("/").pop() ?? p), durationMs: 1 }
  }
}

/** Answers every rendezvous with a fixed result. */
export class FakeConfirmations implements ConfirmationChannel {
  opened = 0
  closed = 0
  waitedWith: number[] = []
  openError: Error | undefined

  constructor(private readonly result: ConfirmationResult) {}

  async open(): Promise<Rendezvous> {
    if (this.openError) throw this.openError
    this.opened++
    return {
      address: { host: "127.0.0.1", port: 0 },
      wait: async (timeoutMs) => {
        this.waitedWith.push(timeoutMs)
        return this.result
      },
      close: async () => {
        this.closed++
      },
    }
  }
}

export class MemoryJournal implements RunJournal {
  readonly runs: JournalRun[] = []
  private next = 0

  async begin(period: string, stopInstant: string): Promise<JournalRun> {
    const run: JournalRun = {
      runId: `run-${++this.next}`,
      period,
      stopInstant,
      state: "started",
      history: [{ state: "started", at: "2024-09-30T00:00:00.000Z" }],
    }
    this.runs.push(run)
    return run
  }

  async mark(runId: string, state: RunState, detail?: string): Promise<void> {
    const run = this.runs.find((r) => r.runId === runId)
    if (!run) throw new Error(`unknown run ${runId}`)
    run.state = state
    run.history.push(detail === undefined ? { state, at: "2024-09-30T00:00:00.000Z" } : { state, at: "2024-09-30T00:00:00.000Z", detail })
  }

  async pendingDeletion(period: string): Promise<JournalRun | undefined> {
    const latest = this.runs.filter((r) => r.period === period).at(-1)
    return latest && ["pushed", "awaiting_confirmation", "confirmed", "rejected", "timed_out", "delete_failed"].includes(latest.state)
      ? latest
      : undefined
  }

  statesOf(runId: string): RunState[] {
    return this.runs.find((r) => r.runId === runId)?.history.map((h) => h.state) ?? []
  }
}
