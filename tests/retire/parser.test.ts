// tests/retire/parser.test.ts — Annotated CSV state machine

import { describe, it, expect } from "vitest"
import { RecordStreamParser, parseRecords, normalizeLine } from "../../src/stream/parser.js"
import { StructuralError } from "../../src/stream/errors.js"
import { splitFields, buildColumnIndex } from "../../src/stream/annotation.js"
import { HEADER, HEADER_WITH_HOST, SAMPLE_BATCH, hostRow, row } from "./fixtures.js"

function parseAll(lines: readonly string[]) {
  return [...parseRecords(lines)]
}

function structuralErrorOf(lines: readonly string[]): StructuralError {
  try {
    parseAll(lines)
  } catch (err) {
    if (err instanceof StructuralError) return err
    throw err
  }
  throw new Error("expected a structural error")
}

describe("RecordStreamParser", () => {
  it("walks the header states before accepting data", () => {
    const parser = new RecordStreamParser()
    expect(parser.currentState).toBe("expect_group")
    expect(parser.accept(HEADER[0])).toEqual({ kind: "annotation", state: "expect_datatype" })
    expect(parser.accept(HEADER[1])).toEqual({ kind: "annotation", state: "expect_default" })
    expect(parser.accept(HEADER[2])).toEqual({ kind: "annotation", state: "expect_columns" })
    expect(parser.accept(HEADER[3])).toEqual({ kind: "annotation", state: "data" })
    expect(parser.liveBlock?.version).toBe(1)
    expect(parser.liveBlock?.lines).toEqual([...HEADER])
    expect(parser.liveBlock?.startLine).toBe(1)
  })

  it("extracts measurement, time and period from data lines", () => {
    const records = parseAll(SAMPLE_BATCH).map(({ record }) => record)
    expect(records).toHaveLength(3)
    expect(records[0]).toEqual({
      measurement: "S_UpFgl_WindDirection",
      time: "2024-09-03T10:00:00Z",
      period: "2024-09",
      raw: SAMPLE_BATCH[4],
      lineNumber: 5,
    })
    expect(records[2].measurement).toBe("W_WBase_Light")
    expect(records[2].lineNumber).toBe(7)
  })

  it("skips blank lines but counts them in line numbers", () => {
    const lines = ["", ...HEADER, "   ", row("m1", "2024-09-01T00:00:00Z")]
    const records = parseAll(lines)
    expect(records).toHaveLength(1)
    expect(records[0].record.lineNumber).toBe(7)
  })

  it("accepts CRLF line endings and keeps the raw line without the CR", () => {
    const lines = [...HEADER, row("m1", "2024-09-01T00:00:00Z")].map((l) => l + "\r")
    const [first] = parseAll(lines)
    expect(first.record.measurement).toBe("m1")
    expect(first.record.raw).toBe(row("m1", "2024-09-01T00:00:00Z"))
    expect(first.block.lines[0]).toBe(HEADER[0])
  })

  it("starts a new block version when a #group line follows data", () => {
    const lines = [
      ...HEADER,
      row("m1", "2024-09-01T00:00:00Z"),
      ...HEADER_WITH_HOST,
      hostRow("m1", "2024-09-02T00:00:00Z", "edge-1"),
    ]
    const records = parseAll(lines)
    expect(records.map((r) => r.block.version)).toEqual([1, 2])
    expect(records[1].block.startLine).toBe(6)
    expect(records[1].block.columns.get("host")).toBe(10)
  })

  it("reports a first line that is not #group as unknown_header", () => {
    const err = structuralErrorOf(["#foo,bar", ...HEADER.slice(1)])
    expect(err.code).toBe("unknown_header")
    expect(err.lineNumber).toBe(1)
    expect(err.exitCode).toBe(1)
    expect(err.message).toBe('Unknown header line, expected "#group" (line #1)')
  })

  it("reports annotation lines out of order as unknown_header", () => {
    const err = structuralErrorOf([HEADER[0], HEADER[2]])
    expect(err.code).toBe("unknown_header")
    expect(err.lineNumber).toBe(2)
    expect(err.annotationLines).toEqual([HEADER[0]])
  })

  it("reports a fifth marker line after a complete block as unknown_header", () => {
    const err = structuralErrorOf([...HEADER, HEADER[1]])
    expect(err.code).toBe("unknown_header")
    expect(err.lineNumber).toBe(5)
  })

  it("reports a data line inside an incomplete block as annotation_count", () => {
    const err = structuralErrorOf([HEADER[0], HEADER[1], row("m1", "2024-09-01T00:00:00Z")])
    expect(err.code).toBe("annotation_count")
    expect(err.exitCode).toBe(2)
    expect(err.message).toBe("Annotation should have exactly 4 lines, but got 2 (line #3)")
    expect(err.annotationLines).toEqual([HEADER[0], HEADER[1]])
  })

  it("reports data before any block as annotation_count", () => {
    const err = structuralErrorOf([row("m1", "2024-09-01T00:00:00Z")])
    expect(err.code).toBe("annotation_count")
    expect(err.message).toBe("Annotation should have exactly 4 lines, but got 0 (line #1)")
  })

  it("reports a blank measurement", () => {
    const err = structuralErrorOf([...HEADER, row("", "2024-09-01T00:00:00Z")])
    expect(err.code).toBe("blank_measurement")
    expect(err.exitCode).toBe(3)
    expect(err.lineNumber).toBe(5)
    expect(err.line).toBe(row("", "2024-09-01T00:00:00Z"))
  })

  it("reports a blank time", () => {
    const err = structuralErrorOf([...HEADER, row("m1", "2024-09-01T00:00:00Z"), row("m1", " ")])
    expect(err.code).toBe("blank_time")
    expect(err.exitCode).toBe(4)
    expect(err.lineNumber).toBe(6)
  })

  it("reports a columns line without _time as missing_columns", () => {
    const err = structuralErrorOf([...HEADER.slice(0, 3), ",result,table,_value,_measurement"])
    expect(err.code).toBe("missing_columns")
    expect(err.exitCode).toBe(5)
    expect(err.lineNumber).toBe(4)
    expect(err.message).toBe("Header is missing required column(s) _time (line #4)")
  })

  it("stops at the first error", () => {
    const parser = new RecordStreamParser()
    expect(() => parser.accept("#bad")).toThrow(StructuralError)
    expect(parser.linesRead).toBe(1)
  })
})

describe("annotation helpers", () => {
  it("splits quoted fields holding commas and doubled quotes", () => {
    expect(splitFields('a,"b,c","say ""hi""",')).toEqual(["a", "b,c", 'say "hi"', ""])
  })

  it("indexes non-blank column names, later duplicates winning", () => {
    const index = buildColumnIndex(["", "a", " b ", "a"])
    expect([...index.entries()]).toEqual([["a", 3], ["b", 2]])
  })

  it("strips a trailing CR", () => {
    expect(normalizeLine("x\r")).toBe("x")
  })
})
