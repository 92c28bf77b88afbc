// tests/retire/journal.test.ts — Run journal on the atomic JSON store

import { afterEach, beforeEach, describe, it, expect } from "vitest"
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { tmpdir } from "node:os"
import { Type } from "@sinclair/typebox"
import { AtomicJsonStore, StoreCorruptionError, WriteSizeLimitError } from "../../src/persistence/json-store.js"
import { FileRunJournal, JOURNAL_FILE, MAX_JOURNAL_RUNS } from "../../src/persistence/journal.js"

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "journal-test-"))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

const CounterSchema = Type.Object({ count: Type.Number() })

describe("AtomicJsonStore", () => {
  it("returns null when nothing has been written", async () => {
    const store = new AtomicJsonStore(join(dir, "counter.json"), CounterSchema)
    expect(await store.read()).toBeNull()
  })

  it("writes sorted JSON and keeps the previous version as backup", async () => {
    const path = join(dir, "counter.json")
    const store = new AtomicJsonStore(path, CounterSchema)
    await store.write({ count: 1 })
    await store.write({ count: 2 })

    expect(readFileSync(path, "utf-8")).toBe('{\n  "count": 2\n}\n')
    expect(JSON.parse(readFileSync(path + ".bak", "utf-8"))).toEqual({ count: 1 })
    expect(await store.read()).toEqual({ count: 2 })
  })

  it("falls back to the backup when the primary fails validation", async () => {
    const path = join(dir, "counter.json")
    const store = new AtomicJsonStore(path, CounterSchema)
    await store.write({ count: 1 })
    await store.write({ count: 2 })
    writeFileSync(path, '{"count":"two"}')

    expect(await store.read()).toEqual({ count: 1 })
  })

  it("quarantines files when nothing validates", async () => {
    const path = join(dir, "counter.json")
    writeFileSync(path, "{not json")
    const store = new AtomicJsonStore(path, CounterSchema)

    await expect(store.read()).rejects.toThrow(StoreCorruptionError)
    expect(existsSync(path)).toBe(false)
    expect(readdirSync(dir).filter((f) => f.startsWith("counter.json.corrupt."))).toHaveLength(1)
  })

  it("refuses writes over the size limit", async () => {
    const store = new AtomicJsonStore(join(dir, "counter.json"), CounterSchema, { maxSizeBytes: 8 })
    await expect(store.write({ count: 12345 })).rejects.toThrow(WriteSizeLimitError)
  })

  it("serializes concurrent updates", async () => {
    const store = new AtomicJsonStore(join(dir, "counter.json"), CounterSchema)
    await Promise.all(
      Array.from({ length: 10 }, () => store.update((current) => ({ count: (current?.count ?? 0) + 1 }))),
    )
    expect(await store.read()).toEqual({ count: 10 })
  })
})

describe("FileRunJournal", () => {
  const clock = () => new Date("2024-09-30T03:04:05.000Z")

  it("records a run and its transitions", async () => {
    const journal = new FileRunJournal(dir, clock)
    const run = await journal.begin("2024-09", "2024-09-30T03:04:05Z")
    await journal.mark(run.runId, "built", "2 group(s), 3 point(s)")
    await journal.mark(run.runId, "pushed")

    const [stored] = await journal.runs()
    expect(stored.runId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
    expect(stored.state).toBe("pushed")
    expect(stored.history).toEqual([
      { state: "started", at: "2024-09-30T03:04:05.000Z" },
      { state: "built", at: "2024-09-30T03:04:05.000Z", detail: "2 group(s), 3 point(s)" },
      { state: "pushed", at: "2024-09-30T03:04:05.000Z" },
    ])
    expect(journal.path).toBe(join(dir, JOURNAL_FILE))
  })

  it("reports a delivered but undeleted run as pending deletion", async () => {
    const journal = new FileRunJournal(dir, clock)
    const run = await journal.begin("2024-09", "2024-09-30T03:04:05Z")
    expect(await journal.pendingDeletion("2024-09")).toBeUndefined()

    await journal.mark(run.runId, "timed_out")
    expect((await journal.pendingDeletion("2024-09"))?.runId).toBe(run.runId)
    expect(await journal.pendingDeletion("2024-08")).toBeUndefined()

    await journal.mark(run.runId, "deleted")
    expect(await journal.pendingDeletion("2024-09")).toBeUndefined()
  })

  it("only looks at the latest run of a period", async () => {
    const journal = new FileRunJournal(dir, clock)
    const first = await journal.begin("2024-09", "2024-09-30T03:04:05Z")
    await journal.mark(first.runId, "delete_failed")
    const second = await journal.begin("2024-09", "2024-09-30T04:00:00Z")
    await journal.mark(second.runId, "aborted")

    expect(await journal.pendingDeletion("2024-09")).toBeUndefined()
  })

  it("keeps the most recent runs only", async () => {
    const journal = new FileRunJournal(dir, clock)
    for (let i = 0; i < MAX_JOURNAL_RUNS + 3; i++) {
      await journal.begin("2024-09", "2024-09-30T03:04:05Z")
    }
    expect(await journal.runs()).toHaveLength(MAX_JOURNAL_RUNS)
  })
})
