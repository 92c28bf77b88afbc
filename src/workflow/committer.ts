// src/workflow/committer.ts — Issues the destructive delete for a retired period
//
// Called exactly when the push succeeded. A failure is reported, never retried
// by re-transferring.

import { buildRetiredPredicate } from "../store/influx.js"
import type { DeleteRequest, SourceStore } from "../store/types.js"
import { EPOCH_START, formatInstant } from "./period.js"

export type DeletionResult =
  | { kind: "deleted"; request: DeleteRequest }
  | { kind: "delete_failed"; request: DeleteRequest; cause: Error }

export class DeletionCommitter {
  constructor(
    private readonly source: SourceStore,
    private readonly tag: string,
  ) {}

  /** Delete request covering [epoch, stopInstant] for points tagged `period`. */
  requestFor(period: string, stopInstant: Date): DeleteRequest {
    return {
      start: EPOCH_START,
      stop: formatInstant(stopInstant),
      predicate: buildRetiredPredicate(this.tag, period),
    }
  }

  async commit(period: string, stopInstant: Date): Promise<DeletionResult> {
    const request = this.requestFor(period, stopInstant)
    console.log(`[delete] deleting retired points ${request.predicate} in [${request.start}, ${request.stop}]`)
    try {
      await this.source.delete(request)
      console.log("[delete] retired points deleted")
      return { kind: "deleted", request }
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err))
      console.error(`[delete] can't delete retired points: ${cause.message}`)
      return { kind: "delete_failed", request, cause }
    }
  }
}
