// src/transfer/rsync.ts — Pushes compressed append-files to the archive's rsync module

import { basename, dirname } from "node:path"
import { childEnv, ExecFileRunner, type CommandRunner } from "./exec.js"

export interface PushReceipt {
  destination: string
  files: string[]
  durationMs: number
}

/** Anything that can deliver finished artifacts to the archive inbound share. */
export interface ArchivePusher {
  readonly destination: string
  push(paths: readonly string[]): Promise<PushReceipt>
}

export interface RsyncPusherOptions {
  host: string
  module: string
  binaryPath?: string
  timeoutMs?: number
  runner?: CommandRunner
}

/** Reject option injection and anything that would change the URL's shape. */
export function validateRsyncTarget(host: string, module: string): void {
  if (!host || host.startsWith("-") || !/^[A-Za-z0-9.:\[\]_-]+$/.test(host)) {
    throw new Error(`Invalid archive host: "${host}"`)
  }
  if (!module || module.startsWith("-") || !/^[A-Za-z0-9._-]+$/.test(module)) {
    throw new Error(`Invalid rsync module: "${module}"`)
  }
}

export class RsyncPusher implements ArchivePusher {
  readonly destination: string
  private readonly binaryPath: string
  private readonly timeoutMs: number
  private readonly runner: CommandRunner

  constructor(opts: RsyncPusherOptions) {
    validateRsyncTarget(opts.host, opts.module)
    this.destination = `rsync://${opts.host}:/${opts.module}/`
    this.binaryPath = opts.binaryPath ?? "rsync"
    this.timeoutMs = opts.timeoutMs ?? 600_000
    this.runner = opts.runner ?? new ExecFileRunner()
  }

  async push(paths: readonly string[]): Promise<PushReceipt> {
    if (paths.length === 0) {
      throw new Error("Nothing to push")
    }

    // Files are addressed relative to their directory so only basenames land remotely
    const cwd = dirname(paths[0])
    const files = paths.map((p) => {
      if (dirname(p) !== cwd) throw new Error(`Artifacts must share one directory: ${p}`)
      return basename(p)
    })

    const result = await this.runner.run({
      binaryPath: this.binaryPath,
      args: ["--times", "--", ...files, this.destination],
      cwd,
      timeoutMs: this.timeoutMs,
      env: childEnv(),
      maxBuffer: 1_048_576,
    })

    if (result.exitCode !== 0) {
      throw new Error(
        `rsync to ${this.destination} failed (exit ${result.exitCode}): ${result.stderr.trim() || result.stdout.trim()}`,
      )
    }

    return { destination: this.destination, files, durationMs: result.durationMs }
  }
}
