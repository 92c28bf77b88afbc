// src/stream/parser.ts — Annotated CSV record stream parser (explicit state machine)
//
// States: expect_group → expect_datatype → expect_default → expect_columns → data.
// A "#group" line in the data state starts the next block; any other marker
// line there is an unknown block shape.

import {
  ROLE_MARKERS,
  buildColumnIndex,
  fieldOf,
  isBlank,
  isMarkerLine,
  missingColumns,
  splitFields,
  type AnnotationBlock,
} from "./annotation.js"
import { StructuralError } from "./errors.js"

export type ParserState =
  | "expect_group"
  | "expect_datatype"
  | "expect_default"
  | "expect_columns"
  | "data"

export interface DataRecord {
  measurement: string
  time: string
  /** YYYY-MM truncation of `time` */
  period: string
  /** The input line, unmodified */
  raw: string
  lineNumber: number
}

export interface RoutedRecord {
  block: AnnotationBlock
  record: DataRecord
}

export type ParseEvent =
  | { kind: "skip" }
  | { kind: "annotation"; state: ParserState }
  | ({ kind: "record" } & RoutedRecord)

/** Strip a trailing carriage return left over from CRLF input. */
export function normalizeLine(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line
}

export class RecordStreamParser {
  private state: ParserState = "expect_group"
  private pending: string[] = []
  private pendingStart = 0
  private live: AnnotationBlock | undefined
  private versions = 0
  private lineNumber = 0

  get currentState(): ParserState {
    return this.state
  }

  /** The block data lines are currently interpreted through, if any. */
  get liveBlock(): AnnotationBlock | undefined {
    return this.live
  }

  get linesRead(): number {
    return this.lineNumber
  }

  /** Feed one line. Throws StructuralError on the first malformed line. */
  accept(input: string): ParseEvent {
    this.lineNumber++
    const line = normalizeLine(input)

    if (isBlank(line)) return { kind: "skip" }

    switch (this.state) {
      case "expect_group":
      case "data":
        if (isMarkerLine(line)) {
          this.expectMarker(line, ROLE_MARKERS.group)
          this.pending = [line]
          this.pendingStart = this.lineNumber
          this.state = "expect_datatype"
          return { kind: "annotation", state: this.state }
        }
        return { kind: "record", ...this.readRecord(line) }

      case "expect_datatype":
        this.expectAnnotation(line, ROLE_MARKERS.datatype)
        this.pending.push(line)
        this.state = "expect_default"
        return { kind: "annotation", state: this.state }

      case "expect_default":
        this.expectAnnotation(line, ROLE_MARKERS.default)
        this.pending.push(line)
        this.state = "expect_columns"
        return { kind: "annotation", state: this.state }

      case "expect_columns":
        this.completeBlock(line)
        this.state = "data"
        return { kind: "annotation", state: this.state }
    }
  }

  private expectAnnotation(line: string, marker: string): void {
    if (!isMarkerLine(line)) {
      // A data line arrived while the block is still incomplete
      throw this.annotationCountError(line)
    }
    this.expectMarker(line, marker)
  }

  private expectMarker(line: string, marker: string): void {
    const first = splitFields(line)[0]
    if (first !== marker) {
      throw new StructuralError({
        code: "unknown_header",
        message: `Unknown header line, expected "${marker}"`,
        lineNumber: this.lineNumber,
        line,
        annotationLines: this.pending,
      })
    }
  }

  private completeBlock(line: string): void {
    const columns = buildColumnIndex(splitFields(line))
    const missing = missingColumns(columns)
    if (missing.length > 0) {
      throw new StructuralError({
        code: "missing_columns",
        message: `Header is missing required column(s) ${missing.join(", ")}`,
        lineNumber: this.lineNumber,
        line,
        annotationLines: this.pending,
      })
    }

    const [group, datatype, defaults] = this.pending
    this.versions++
    this.live = {
      version: this.versions,
      lines: [group, datatype, defaults, line],
      columns,
      startLine: this.pendingStart,
    }
    this.pending = []
  }

  private readRecord(line: string): RoutedRecord {
    const block = this.live
    if (!block) throw this.annotationCountError(line)

    const fields = splitFields(line)
    const measurement = fieldOf(fields, block.columns, "_measurement")
    if (isBlank(measurement)) {
      throw new StructuralError({
        code: "blank_measurement",
        message: "Measurement is empty",
        lineNumber: this.lineNumber,
        line,
      })
    }

    const time = fieldOf(fields, block.columns, "_time")
    if (isBlank(time)) {
      throw new StructuralError({
        code: "blank_time",
        message: "Time is empty",
        lineNumber: this.lineNumber,
        line,
      })
    }

    return {
      block,
      record: {
        measurement,
        time,
        period: time.slice(0, 7),
        raw: line,
        lineNumber: this.lineNumber,
      },
    }
  }

  private annotationCountError(line: string): StructuralError {
    return new StructuralError({
      code: "annotation_count",
      message: `Annotation should have exactly 4 lines, but got ${this.pending.length}`,
      lineNumber: this.lineNumber,
      line,
      annotationLines: this.pending,
    })
  }
}

/** Lazily parse a line sequence into routed records. */
export function* parseRecords(lines: Iterable<string>): Generator<RoutedRecord> {
  const parser = new RecordStreamParser()
  for (const line of lines) {
    const event = parser.accept(line)
    if (event.kind === "record") yield { block: event.block, record: event.record }
  }
}
