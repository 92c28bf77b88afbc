// src/workflow/errors.ts — Retirement workflow error codes and process exit codes

import { STRUCTURAL_EXIT_CODES } from "../stream/errors.js"

/** Error codes for workflow stages outside the parser */
export type RetireErrorCode =
  | "SOURCE_FAILED"
  | "WORKSPACE_FAILED"
  | "COMPRESSION_FAILED"
  | "TRANSFER_FAILED"
  | "RENDEZVOUS_FAILED"
  | "DELETE_FAILED"
  | "CONFIG_INVALID"

/** Typed error for workflow stage failures */
export class RetireError extends Error {
  readonly name = "RetireError"
  readonly code: RetireErrorCode
  readonly context: Record<string, unknown>

  constructor(code: RetireErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[retire] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/**
 * Process exit codes. Stable: operators match on them.
 * 1–5 are the structural error classes of the record stream.
 */
export const ExitCode = {
  ARCHIVED: 0,
  UNKNOWN_HEADER: STRUCTURAL_EXIT_CODES.unknown_header,
  ANNOTATION_COUNT: STRUCTURAL_EXIT_CODES.annotation_count,
  BLANK_MEASUREMENT: STRUCTURAL_EXIT_CODES.blank_measurement,
  BLANK_TIME: STRUCTURAL_EXIT_CODES.blank_time,
  MISSING_COLUMNS: STRUCTURAL_EXIT_CODES.missing_columns,
  NO_DATA: 10,
  SOURCE_FAILED: 20,
  WORKSPACE_FAILED: 21,
  COMPRESSION_FAILED: 22,
  TRANSFER_FAILED: 23,
  RENDEZVOUS_FAILED: 24,
  UNCONFIRMED_TIMEOUT: 30,
  UNCONFIRMED_REJECTED: 31,
  DELETE_FAILED: 40,
  /** Unexpected exception, logged as `[retire] fatal:` */
  FATAL: 70,
  CONFIG_INVALID: 78,
  INTERRUPTED_SIGINT: 130,
  INTERRUPTED_SIGTERM: 143,
} as const

/** Exit code for an abort with the given stage error code. */
export function exitCodeForError(code: RetireErrorCode): number {
  switch (code) {
    case "SOURCE_FAILED": return ExitCode.SOURCE_FAILED
    case "WORKSPACE_FAILED": return ExitCode.WORKSPACE_FAILED
    case "COMPRESSION_FAILED": return ExitCode.COMPRESSION_FAILED
    case "TRANSFER_FAILED": return ExitCode.TRANSFER_FAILED
    case "RENDEZVOUS_FAILED": return ExitCode.RENDEZVOUS_FAILED
    case "DELETE_FAILED": return ExitCode.DELETE_FAILED
    case "CONFIG_INVALID": return ExitCode.CONFIG_INVALID
  }
}
