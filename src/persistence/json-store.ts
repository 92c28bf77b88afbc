// src/persistence/json-store.ts — Schema-checked JSON document on disk, replaced atomically
//
// Layout next to the document: <file>.tmp while a write is in flight, <file>.bak
// holding the previous version. Reads try the document, then .bak, then .tmp.

import { mkdir, open, readFile, rename, stat } from "node:fs/promises"
import { dirname } from "node:path"
import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"

/** No candidate file holds a document that parses and matches the schema. */
export class StoreCorruptionError extends Error {
  readonly name = "StoreCorruptionError"

  constructor(readonly filePath: string, readonly quarantined: readonly string[]) {
    super(`Store corruption: ${filePath}: no valid copy among ${quarantined.length} file(s), moved aside`)
  }
}

export class WriteSizeLimitError extends Error {
  readonly name = "WriteSizeLimitError"

  constructor(readonly bytes: number, readonly limitBytes: number) {
    super(`Document of ${bytes} bytes exceeds the ${limitBytes} byte limit`)
  }
}

export interface AtomicJsonStoreOptions {
  /** Largest serialized document accepted by write(). Default 10 MiB. */
  maxSizeBytes?: number
}

/** Serializes callers so read-modify-write cycles never interleave. */
class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve()

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task)
    this.tail = run.catch(() => undefined)
    return run
  }
}

export class AtomicJsonStore<S extends TSchema> {
  private readonly queue = new SerialQueue()
  private readonly limit: number

  constructor(
    private readonly filePath: string,
    private readonly schema: S,
    options: AtomicJsonStoreOptions = {},
  ) {
    this.limit = options.maxSizeBytes ?? 10 * 1024 * 1024
  }

  get path(): string {
    return this.filePath
  }

  /** The stored document, or null when none was ever written. */
  read(): Promise<Static<S> | null> {
    return this.queue.enqueue(() => this.load())
  }

  write(doc: Static<S>): Promise<void> {
    return this.queue.enqueue(() => this.save(doc))
  }

  /** Apply `change` to the current document (null if none) and store the result. */
  update(change: (current: Static<S> | null) => Static<S>): Promise<Static<S>> {
    return this.queue.enqueue(async () => {
      const next = change(await this.load())
      await this.save(next)
      return next
    })
  }

  private candidates(): string[] {
    return [this.filePath, `${this.filePath}.bak`, `${this.filePath}.tmp`]
  }

  private async load(): Promise<Static<S> | null> {
    const present: string[] = []
    for (const candidate of this.candidates()) {
      const text = await readFile(candidate, "utf-8").catch(() => undefined)
      if (text === undefined) continue
      present.push(candidate)
      const doc = this.decode(text)
      if (doc !== null) return doc
    }
    if (present.length === 0) return null

    const moved: string[] = []
    for (const candidate of present) {
      const target = `${candidate}.corrupt.${Date.now()}`
      try {
        await rename(candidate, target)
        moved.push(target)
        console.warn(`[journal] moved unreadable ${candidate} to ${target}`)
      } catch (err) {
        console.error(`[journal] could not move unreadable ${candidate} aside:`, err)
      }
    }
    throw new StoreCorruptionError(this.filePath, moved)
  }

  private decode(text: string): Static<S> | null {
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch {
      return null
    }
    return Value.Check(this.schema, value) ? value : null
  }

  private async save(doc: Static<S>): Promise<void> {
    const text = JSON.stringify(doc, withSortedKeys, 2) + "\n"
    const bytes = Buffer.byteLength(text, "utf-8")
    if (bytes > this.limit) throw new WriteSizeLimitError(bytes, this.limit)

    const dir = dirname(this.filePath)
    const tmp = `${this.filePath}.tmp`
    await mkdir(dir, { recursive: true })

    const handle = await open(tmp, "w")
    try {
      await handle.writeFile(text, "utf-8")
      await handle.sync()
    } finally {
      await handle.close()
    }

    const hasCurrent = await stat(this.filePath).then(() => true, () => false)
    if (hasCurrent) await rename(this.filePath, `${this.filePath}.bak`)
    await rename(tmp, this.filePath)
    await syncDirectory(dir)
  }
}

function withSortedKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
}

/** Make the renames durable. Not every filesystem can fsync a directory. */
async function syncDirectory(dir: string): Promise<void> {
  const handle = await open(dir, "r").catch(() => undefined)
  if (!handle) return
  try {
    await handle.sync()
  } catch (err) {
    console.warn(`[journal] directory fsync unsupported for ${dir}:`, err instanceof Error ? err.message : err)
  } finally {
    await handle.close()
  }
}
