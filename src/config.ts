// src/config.ts — Configuration loader from environment variables

import { tmpdir } from "node:os"
import { validateRsyncTarget } from "./transfer/rsync.js"

export interface RetireConfig {
  // Source store
  influx: {
    url: string
    token: string
    org: string
    bucket: string
    /** Flux range start, e.g. "-5y" */
    queryRange: string
    maxRetries: number
  }
  /** Tag key carrying the retirement period */
  tag: string

  // Archive transfer
  archive: {
    /** Empty only when the archive is not needed (dry run) */
    host: string
    rsyncModule: string
    rsyncBin: string
    rsyncTimeoutMs: number
  }

  // Confirmation rendezvous
  commit: {
    host: string
    port: number
    timeoutMs: number
  }

  // Local state
  workRoot: string
  stateDir: string

  // Scheduled mode
  schedule: {
    expression: string
    timezone: string
  }
}

export interface LoadConfigOptions {
  /** Require the archive host (every mode except dry run) */
  requireArchive?: boolean
}

/** Invalid environment or command-line configuration */
export class ConfigError extends Error {
  readonly name = "ConfigError"

  constructor(readonly key: string, message: string) {
    super(`${key}: ${message}`)
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
export function parseIntEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  if (!/^\s*-?\d+\s*$/.test(raw)) {
    throw new ConfigError(envKey, `must be a valid integer (got "${raw}")`)
  }
  return parseInt(raw, 10)
}

function parsePortEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: string): number {
  const port = parseIntEnv(env, envKey, fallback)
  if (port < 0 || port > 65_535) {
    throw new ConfigError(envKey, `must be a TCP port (got ${port})`)
  }
  return port
}

function parsePositiveEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: string): number {
  const value = parseIntEnv(env, envKey, fallback)
  if (value <= 0) {
    throw new ConfigError(envKey, `must be positive (got ${value})`)
  }
  return value
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: LoadConfigOptions = {}): RetireConfig {
  const archiveHost = (env.RETIRE_ARCHIVE_HOST ?? "").trim()
  const rsyncModule = env.RETIRE_RSYNC_MODULE ?? "tsdb_retired"

  if (options.requireArchive && !archiveHost) {
    throw new ConfigError("RETIRE_ARCHIVE_HOST", "is required")
  }
  if (archiveHost) {
    try {
      validateRsyncTarget(archiveHost, rsyncModule)
    } catch (err) {
      throw new ConfigError("RETIRE_ARCHIVE_HOST", err instanceof Error ? err.message : String(err))
    }
  }

  const maxRetries = parseIntEnv(env, "RETIRE_HTTP_RETRIES", "2")
  if (maxRetries < 0) {
    throw new ConfigError("RETIRE_HTTP_RETRIES", `must not be negative (got ${maxRetries})`)
  }

  return {
    influx: {
      url: env.RETIRE_INFLUX_URL ?? "http://localhost:8086",
      token: env.RETIRE_INFLUX_TOKEN ?? "",
      org: env.RETIRE_INFLUX_ORG ?? "",
      bucket: env.RETIRE_INFLUX_BUCKET ?? "autogen",
      queryRange: env.RETIRE_QUERY_RANGE ?? "-5y",
      maxRetries,
    },
    tag: env.RETIRE_TAG ?? "RetDate",

    archive: {
      host: archiveHost,
      rsyncModule,
      rsyncBin: env.RETIRE_RSYNC_BIN ?? "rsync",
      rsyncTimeoutMs: parsePositiveEnv(env, "RETIRE_RSYNC_TIMEOUT_MS", "600000"),
    },

    commit: {
      host: env.RETIRE_COMMIT_HOST ?? "0.0.0.0",
      port: parsePortEnv(env, "RETIRE_COMMIT_PORT", "333"),
      timeoutMs: parsePositiveEnv(env, "RETIRE_COMMIT_TIMEOUT_MS", "60000"),
    },

    workRoot: env.RETIRE_WORK_ROOT || tmpdir(),
    stateDir: env.RETIRE_STATE_DIR ?? "./data",

    schedule: {
      expression: (env.RETIRE_SCHEDULE ?? "").trim(),
      timezone: (env.RETIRE_SCHEDULE_TZ ?? "").trim(),
    },
  }
}
