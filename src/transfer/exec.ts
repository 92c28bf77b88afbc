// src/transfer/exec.ts — Child process execution for external transfer tools

import { execFile } from "node:child_process"

export interface ExecSpec {
  /** Binary name or path, resolved through PATH when bare */
  binaryPath: string
  /** Argument vector; never passed through a shell */
  args: string[]
  cwd: string
  /** Hard bound; the child is killed with SIGKILL when exceeded */
  timeoutMs: number
  env: Record<string, string>
  /** Max stdout+stderr bytes */
  maxBuffer: number
}

export interface ExecResult {
  stdout: string
  stderr: string
  exitCode: number
  durationMs: number
}

export interface CommandRunner {
  run(spec: ExecSpec): Promise<ExecResult>
}

/** Runs commands with execFile. Non-zero exits resolve; spawn failures and timeouts reject. */
export class ExecFileRunner implements CommandRunner {
  run(spec: ExecSpec): Promise<ExecResult> {
    const start = Date.now()
    return new Promise((resolve, reject) => {
      execFile(
        spec.binaryPath,
        spec.args,
        {
          cwd: spec.cwd,
          env: spec.env,
          timeout: spec.timeoutMs,
          maxBuffer: spec.maxBuffer,
          encoding: "utf-8",
          killSignal: "SIGKILL",
        },
        (err, stdout, stderr) => {
          const durationMs = Date.now() - start
          if (!err) {
            resolve({ stdout, stderr, exitCode: 0, durationMs })
            return
          }
          // killed is set for an overflowing output buffer as well as for the timeout
          if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
            reject(new Error(`${spec.binaryPath} produced more than ${spec.maxBuffer} bytes of output`))
            return
          }
          if (err.killed) {
            reject(new Error(`${spec.binaryPath} timed out after ${spec.timeoutMs}ms`))
            return
          }
          if (typeof err.code === "number") {
            resolve({ stdout, stderr, exitCode: err.code, durationMs })
            return
          }
          reject(err)
        },
      )
    })
  }
}

/** Minimal environment handed to child processes. */
export function childEnv(): Record<string, string> {
  const env: Record<string, string> = { PATH: process.env.PATH ?? "/usr/bin:/usr/local/bin" }
  for (const key of ["HOME", "LANG", "RSYNC_PASSWORD"]) {
    const value = process.env[key]
    if (value !== undefined) env[key] = value
  }
  return env
}
