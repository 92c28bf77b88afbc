// src/batch/builder.ts — Drives parser → router over one retirement batch

import { RecordStreamParser } from "../stream/parser.js"
import { StructuralError } from "../stream/errors.js"
import type { ClosedGroup, GroupStore } from "./group-store.js"
import { Router } from "./router.js"

export interface MeasurementCount {
  measurement: string
  count: number
}

export interface BatchGroup extends ClosedGroup {
  records: number
}

export type BatchOutcome =
  | { kind: "success"; groups: BatchGroup[]; summary: MeasurementCount[]; total: number }
  | { kind: "empty" }
  | { kind: "structural_error"; error: StructuralError }

export type LineSource = Iterable<string> | AsyncIterable<string>

/**
 * Parse and route every line of `lines` into `store`.
 *
 * Structural errors abort immediately and leave no finalized group behind.
 * Any other error (e.g. the source stream failing) aborts the store and is
 * rethrown to the caller.
 */
export async function buildRetirementBatch(lines: LineSource, store: GroupStore): Promise<BatchOutcome> {
  const parser = new RecordStreamParser()
  const router = new Router(store)

  try {
    for await (const line of lines) {
      const event = parser.accept(line)
      if (event.kind === "record") router.route(event)
    }
  } catch (err) {
    store.abort()
    if (err instanceof StructuralError) {
      return { kind: "structural_error", error: err }
    }
    throw err
  }

  if (router.total === 0) {
    store.close()
    return { kind: "empty" }
  }

  const groups = store.close().map((group) => ({
    ...group,
    records: router.groupCounts.get(group.fileName) ?? 0,
  }))
  groups.sort((a, b) => compareText(a.fileName, b.fileName))

  return {
    kind: "success",
    groups,
    summary: summarize(router.measurementCounts),
    total: router.total,
  }
}

/** Per-measurement counts ordered by measurement name. */
export function summarize(counts: ReadonlyMap<string, number>): MeasurementCount[] {
  return [...counts.entries()]
    .map(([measurement, count]) => ({ measurement, count }))
    .sort((a, b) => compareText(a.measurement, b.measurement))
}

/** Render the summary the way operators read it in the log. */
export function formatSummary(summary: readonly MeasurementCount[], total: number): string[] {
  return [
    ...summary.map(({ measurement, count }) => `${measurement} ${count}`),
    `*** Total points selected: ${total} ***`,
  ]
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
