// src/workflow/workspace.ts — Per-run working directory with guaranteed removal
//
// Every live workspace is tracked so a signal handler can remove them
// synchronously before the process exits.

import { mkdtempSync, rmSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { join } from "node:path"

const live = new Set<Workspace>()

export class Workspace {
  private disposed = false

  private constructor(readonly path: string) {}

  static async create(root: string, prefix = "ret_"): Promise<Workspace> {
    await mkdir(root, { recursive: true })
    const ws = new Workspace(mkdtempSync(join(root, prefix)))
    live.add(ws)
    return ws
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  /** Remove the directory and everything in it. Safe to call repeatedly. */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    live.delete(this)
    rmSync(this.path, { recursive: true, force: true })
  }
}

/** Remove every workspace still alive. Used from signal handlers. */
export function disposeAllWorkspaces(): number {
  let count = 0
  for (const ws of [...live]) {
    try {
      ws.dispose()
      count++
    } catch (err) {
      console.error(`[retire] could not remove working directory ${ws.path}:`, err)
    }
  }
  return count
}
