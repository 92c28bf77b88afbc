// src/batch/group-store.ts — Append-only backing storage for output groups
//
// Each (measurement, period) group is one file in the batch working directory.
// Writes are buffered per group. A file is only open while a buffer is being
// appended to it, so the number of groups is not bounded by the fd limit.

import { closeSync, fsyncSync, openSync, statSync, writeSync } from "node:fs"
import { join } from "node:path"

export interface GroupKey {
  measurement: string
  period: string
}

export interface ClosedGroup {
  key: GroupKey
  fileName: string
  path: string
  bytes: number
}

/** Storage the router appends to. Owned by exactly one batch. */
export interface GroupStore {
  /** True when the group's backing storage already holds any bytes. */
  hasContent(key: GroupKey): boolean
  append(key: GroupKey, lines: readonly string[]): void
  /** Flush and durably close every group. The store is unusable afterwards. */
  close(): ClosedGroup[]
  /** Release every group without finalizing it. */
  abort(): void
}

/**
 * Encode a measurement for use inside a file name. Everything but
 * `[A-Za-z0-9_-]` is percent-encoded, `.` included, so the separators of
 * groupFileName never occur inside a part and the mapping is injective.
 */
export function encodeNamePart(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*~.]/g,
    (ch) => "%" + ch.charCodeAt(0).toString(16).toUpperCase(),
  )
}

/** Deterministic file name, e.g. append.S_UpFgl_WindDirection.2024-09.csv */
export function groupFileName(key: GroupKey): string {
  return `append.${encodeNamePart(key.measurement)}.${encodeNamePart(key.period)}.csv`
}

const FLUSH_THRESHOLD_BYTES = 64 * 1024

interface GroupWriter {
  key: GroupKey
  fileName: string
  path: string
  /** Bytes on disk when the batch first touched the group */
  initialBytes: number
  flushedBytes: number
  buffer: string[]
  bufferedBytes: number
}

export class FileGroupStore implements GroupStore {
  private writers = new Map<string, GroupWriter>()
  private closed = false

  constructor(private readonly dir: string) {}

  hasContent(key: GroupKey): boolean {
    const writer = this.writerFor(key)
    return writer.initialBytes + writer.flushedBytes + writer.bufferedBytes > 0
  }

  append(key: GroupKey, lines: readonly string[]): void {
    const writer = this.writerFor(key)
    for (const line of lines) {
      const chunk = line + "\n"
      writer.buffer.push(chunk)
      writer.bufferedBytes += Buffer.byteLength(chunk, "utf-8")
    }
    if (writer.bufferedBytes >= FLUSH_THRESHOLD_BYTES) this.flush(writer)
  }

  close(): ClosedGroup[] {
    this.assertOpen()
    this.closed = true

    const groups: ClosedGroup[] = []
    const failures: Error[] = []
    for (const writer of this.writers.values()) {
      try {
        this.flush(writer, true)
        groups.push({
          key: writer.key,
          fileName: writer.fileName,
          path: writer.path,
          bytes: writer.initialBytes + writer.flushedBytes,
        })
      } catch (err) {
        failures.push(new Error(`${writer.fileName}: ${err instanceof Error ? err.message : String(err)}`))
      }
    }
    this.writers.clear()
    if (failures.length > 0) {
      throw new AggregateError(failures, `Failed to close ${failures.length} group(s): ${failures.map((e) => e.message).join("; ")}`)
    }
    return groups
  }

  abort(): void {
    if (this.closed) return
    this.closed = true
    this.writers.clear()
  }

  private writerFor(key: GroupKey): GroupWriter {
    this.assertOpen()
    const fileName = groupFileName(key)
    const existing = this.writers.get(fileName)
    if (existing) return existing

    const path = join(this.dir, fileName)
    const writer: GroupWriter = {
      key: { ...key },
      fileName,
      path,
      initialBytes: statSync(path, { throwIfNoEntry: false })?.size ?? 0,
      flushedBytes: 0,
      buffer: [],
      bufferedBytes: 0,
    }
    this.writers.set(fileName, writer)
    return writer
  }

  /** Append the buffer to the group's file; with `durable`, fsync it as well. */
  private flush(writer: GroupWriter, durable = false): void {
    if (writer.buffer.length === 0 && !durable) return
    const fd = openSync(writer.path, "a")
    try {
      if (writer.buffer.length > 0) {
        writeSync(fd, writer.buffer.join(""))
        writer.flushedBytes += writer.bufferedBytes
        writer.buffer = []
        writer.bufferedBytes = 0
      }
      if (durable) fsyncSync(fd)
    } finally {
      closeSync(fd)
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new Error("Group store is already closed")
  }
}
