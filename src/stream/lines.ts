// src/stream/lines.ts — Line sources for the record stream parser

import { createReadStream } from "node:fs"
import { createInterface } from "node:readline"

/** Stream the lines of a file, or of stdin when `path` is "-". */
export function readLines(path: string): AsyncIterable<string> {
  const input = path === "-" ? process.stdin : createReadStream(path, { encoding: "utf-8" })
  return createInterface({ input, crlfDelay: Infinity })
}
