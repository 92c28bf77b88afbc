// src/batch/router.ts — Routes parsed records to their (measurement, period) output group

import type { RoutedRecord } from "../stream/parser.js"
import { groupFileName, type GroupKey, type GroupStore } from "./group-store.js"

export class Router {
  /** Groups that already carry the live annotation block */
  private annotated = new Set<string>()
  private blockVersion = 0
  private readonly perMeasurement = new Map<string, number>()
  private readonly perGroup = new Map<string, number>()
  private routed = 0

  constructor(private readonly store: GroupStore) {}

  get total(): number {
    return this.routed
  }

  get measurementCounts(): ReadonlyMap<string, number> {
    return this.perMeasurement
  }

  /** Record counts keyed by group file name */
  get groupCounts(): ReadonlyMap<string, number> {
    return this.perGroup
  }

  route({ block, record }: RoutedRecord): GroupKey {
    if (block.version !== this.blockVersion) {
      // Schema changed: every group gets the new block before its next record
      this.annotated.clear()
      this.blockVersion = block.version
    }

    const key: GroupKey = { measurement: record.measurement, period: record.period }
    const fileName = groupFileName(key)

    if (!this.annotated.has(fileName)) {
      const separator = this.store.hasContent(key) ? [""] : []
      this.store.append(key, [...separator, ...block.lines])
      this.annotated.add(fileName)
    }

    this.store.append(key, [record.raw])

    this.perMeasurement.set(record.measurement, (this.perMeasurement.get(record.measurement) ?? 0) + 1)
    this.perGroup.set(fileName, (this.perGroup.get(fileName) ?? 0) + 1)
    this.routed++
    return key
  }
}
