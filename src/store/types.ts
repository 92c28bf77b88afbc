// src/store/types.ts — Source time-series store port

export interface DeleteRequest {
  /** RFC 3339, inclusive */
  start: string
  /** RFC 3339, the instant the run's query began */
  stop: string
  /** Store predicate, e.g. RetDate="2024-09" */
  predicate: string
}

/** The live store points are read from and retired out of. */
export interface SourceStore {
  /** Annotated CSV lines of every point whose retirement tag equals `period`. */
  queryRetired(period: string): Promise<AsyncIterable<string>>
  delete(request: DeleteRequest): Promise<void>
}

export class SourceStoreError extends Error {
  readonly name = "SourceStoreError"

  constructor(
    readonly operation: "query" | "delete",
    readonly status: number | undefined,
    message: string,
  ) {
    super(`Source ${operation} failed${status !== undefined ? ` (HTTP ${status})` : ""}: ${message}`)
  }
}
