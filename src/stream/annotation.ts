// src/stream/annotation.ts — Annotation block and column index types for annotated CSV

export type AnnotationRole = "group" | "datatype" | "default" | "columns"

/** Marker expected in the first field of each of the first three annotation lines */
export const ROLE_MARKERS = {
  group: "#group",
  datatype: "#datatype",
  default: "#default",
} as const

/** Columns every data line must carry */
export const REQUIRED_COLUMNS = ["_measurement", "_time"] as const

export type ColumnIndex = ReadonlyMap<string, number>

/**
 * A fully read 4-line header. `lines` holds the raw input lines in role
 * order (group, datatype, default, columns) and is written out unchanged.
 */
export interface AnnotationBlock {
  /** 1 for the first block of a stream, incremented per new block */
  readonly version: number
  readonly lines: readonly [string, string, string, string]
  readonly columns: ColumnIndex
  /** Input line number of the block's first line */
  readonly startLine: number
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0
}

/** Lines beginning with this character belong to an annotation block. */
export function isMarkerLine(line: string): boolean {
  return line.startsWith("#")
}

/**
 * Split one CSV line into fields. Double-quoted fields may hold commas and
 * doubled quotes; quotes are removed from the returned values.
 */
export function splitFields(line: string): string[] {
  const fields: string[] = []
  let current = ""
  let quoted = false

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]
    if (quoted) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        current += ch
      }
    } else if (ch === '"') {
      quoted = true
    } else if (ch === ",") {
      fields.push(current)
      current = ""
    } else {
      current += ch
    }
  }
  fields.push(current)
  return fields
}

/** Map every non-blank column name to its field position. Later duplicates win. */
export function buildColumnIndex(fields: readonly string[]): ColumnIndex {
  const index = new Map<string, number>()
  fields.forEach((name, position) => {
    if (!isBlank(name)) index.set(name.trim(), position)
  })
  return index
}

export function missingColumns(index: ColumnIndex): string[] {
  return REQUIRED_COLUMNS.filter((name) => !index.has(name))
}

/** Read a named field of an already split data line. Missing columns read as "". */
export function fieldOf(fields: readonly string[], index: ColumnIndex, name: string): string {
  const position = index.get(name)
  if (position === undefined) return ""
  return fields[position] ?? ""
}
