// src/workflow/period.ts — Retirement period and deletion range helpers

/** Earliest instant a delete can cover */
export const EPOCH_START = "1970-01-01T00:00:00Z"

const PERIOD_RE = /^(\d{4})-(0[1-9]|1[0-2])$/

/** YYYY-MM of `at` in UTC, the form retirement tags are written in. */
export function periodOf(at: Date): string {
  const year = String(at.getUTCFullYear()).padStart(4, "0")
  const month = String(at.getUTCMonth() + 1).padStart(2, "0")
  return `${year}-${month}`
}

export function isValidPeriod(value: string): boolean {
  return PERIOD_RE.test(value)
}

/** RFC 3339 at second precision, e.g. 2024-09-01T03:00:00Z */
export function formatInstant(at: Date): string {
  return at.toISOString().replace(/\.\d{3}Z$/, "Z")
}
