// tests/retire/workspace.test.ts — Working directories, periods and the delete request

import { afterEach, beforeEach, describe, it, expect } from "vitest"
import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs"
import { basename, join } from "node:path"
import { tmpdir } from "node:os"
import { Workspace, disposeAllWorkspaces } from "../../src/workflow/workspace.js"
import { formatInstant, isValidPeriod, periodOf } from "../../src/workflow/period.js"
import { DeletionCommitter } from "../../src/workflow/committer.js"
import { FakeSource } from "./fakes.js"

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "workspace-test-"))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe("Workspace", () => {
  it("creates a ret_ directory and removes it with its contents", async () => {
    const ws = await Workspace.create(root)
    expect(basename(ws.path).startsWith("ret_")).toBe(true)
    writeFileSync(join(ws.path, "append.m1.2024-09.csv"), "x\n")

    ws.dispose()
    ws.dispose()

    expect(ws.isDisposed).toBe(true)
    expect(existsSync(ws.path)).toBe(false)
  })

  it("disposes every live workspace at once", async () => {
    await Workspace.create(root)
    await Workspace.create(root)
    expect(disposeAllWorkspaces()).toBe(2)
    expect(readdirSync(root)).toEqual([])
  })
})

describe("periods", () => {
  it("takes the UTC year-month", () => {
    expect(periodOf(new Date("2024-09-30T23:30:00-02:00"))).toBe("2024-10")
    expect(periodOf(new Date("2024-01-01T00:00:00Z"))).toBe("2024-01")
  })

  it("validates YYYY-MM", () => {
    expect(isValidPeriod("2024-09")).toBe(true)
    expect(isValidPeriod("2024-00")).toBe(false)
    expect(isValidPeriod("2024-9")).toBe(false)
  })

  it("formats instants at second precision", () => {
    expect(formatInstant(new Date("2024-09-30T03:04:05.678Z"))).toBe("2024-09-30T03:04:05Z")
  })
})

describe("DeletionCommitter", () => {
  it("deletes from the epoch to the run start for the period's tag", async () => {
    const source = new FakeSource()
    const result = await new DeletionCommitter(source, "RetDate").commit("2024-09", new Date("2024-09-30T03:04:05.678Z"))

    expect(result.kind).toBe("deleted")
    expect(source.deletes).toEqual([
      { start: "1970-01-01T00:00:00Z", stop: "2024-09-30T03:04:05Z", predicate: 'RetDate="2024-09"' },
    ])
  })

  it("reports a failed delete instead of throwing", async () => {
    const source = new FakeSource()
    source.deleteError = new Error("HTTP 500")
    const result = await new DeletionCommitter(source, "RetDate").commit("2024-09", new Date())

    expect(result.kind).toBe("delete_failed")
    if (result.kind === "delete_failed") expect(result.cause.message).toBe("HTTP 500")
  })
})
