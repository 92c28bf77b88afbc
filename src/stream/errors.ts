// src/stream/errors.ts — Structural errors raised while decoding the annotated record stream

/** One code per structural failure class. Each maps to a stable exit code. */
export type StructuralErrorCode =
  | "unknown_header"
  | "annotation_count"
  | "blank_measurement"
  | "blank_time"
  | "missing_columns"

/** Process exit code per structural failure class. */
export const STRUCTURAL_EXIT_CODES: Readonly<Record<StructuralErrorCode, number>> = {
  unknown_header: 1,
  annotation_count: 2,
  blank_measurement: 3,
  blank_time: 4,
  missing_columns: 5,
}

/** Typed error for every malformed-stream condition */
export class StructuralError extends Error {
  readonly name = "StructuralError"
  readonly code: StructuralErrorCode
  /** 1-based input line number, blank lines included */
  readonly lineNumber: number
  readonly line: string
  /** Annotation lines read so far for the block in progress */
  readonly annotationLines: readonly string[]

  constructor(opts: {
    code: StructuralErrorCode
    message: string
    lineNumber: number
    line: string
    annotationLines?: readonly string[]
  }) {
    super(`${opts.message} (line #${opts.lineNumber})`)
    this.code = opts.code
    this.lineNumber = opts.lineNumber
    this.line = opts.line
    this.annotationLines = opts.annotationLines ?? []
  }

  get exitCode(): number {
    return STRUCTURAL_EXIT_CODES[this.code]
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      lineNumber: this.lineNumber,
      line: this.line,
      annotationLines: [...this.annotationLines],
    }
  }
}
