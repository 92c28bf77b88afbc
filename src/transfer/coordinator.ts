// src/transfer/coordinator.ts — Compress → push → await confirmation for one batch
//
// Compression and push failures leave the source untouched. Once the push has
// succeeded the batch counts as delivered, whatever the archive answers later.

import type { BatchGroup } from "../batch/builder.js"
import { compressAll, type CompressedArtifact } from "./compress.js"
import type { ConfirmationChannel, ConfirmationResult, Rendezvous } from "./confirmation.js"
import type { ArchivePusher, PushReceipt } from "./rsync.js"

export type DeliveryStage = "rendezvous" | "compress" | "push"

export type TransferResult =
  | { kind: "delivered"; artifacts: CompressedArtifact[]; receipt: PushReceipt }
  | { kind: "delivery_failed"; stage: DeliveryStage; cause: Error }

export type TransferStage = "compressed" | "pushed" | "awaiting_confirmation"

export interface TransferReport {
  transfer: TransferResult
  /** Present only when the transfer was delivered */
  confirmation?: ConfirmationResult
}

export interface TransferCoordinatorOptions {
  pusher: ArchivePusher
  confirmations: ConfirmationChannel
  confirmTimeoutMs?: number
  /** Notified as each stage completes, for the run journal */
  onStage?: (stage: TransferStage, detail: Record<string, unknown>) => Promise<void> | void
}

export class TransferCoordinator {
  private readonly confirmTimeoutMs: number

  constructor(private readonly opts: TransferCoordinatorOptions) {
    this.confirmTimeoutMs = opts.confirmTimeoutMs ?? 60_000
  }

  async run(groups: readonly BatchGroup[]): Promise<TransferReport> {
    let rendezvous: Rendezvous
    try {
      rendezvous = await this.opts.confirmations.open()
    } catch (err) {
      return failed("rendezvous", err)
    }

    try {
      let artifacts: CompressedArtifact[]
      try {
        artifacts = await compressAll(groups.map((g) => g.path))
      } catch (err) {
        return failed("compress", err)
      }
      await this.stage("compressed", { files: artifacts.length })

      let receipt: PushReceipt
      try {
        console.log(`[transfer] sending ${artifacts.length} append-file(s) to ${this.opts.pusher.destination}`)
        receipt = await this.opts.pusher.push(artifacts.map((a) => a.path))
      } catch (err) {
        return failed("push", err)
      }
      await this.stage("pushed", { destination: receipt.destination, files: receipt.files })

      console.log("[transfer] waiting for a confirmation from the archive")
      await this.stage("awaiting_confirmation", { timeoutMs: this.confirmTimeoutMs })
      const confirmation = await rendezvous.wait(this.confirmTimeoutMs)

      return { transfer: { kind: "delivered", artifacts, receipt }, confirmation }
    } finally {
      await rendezvous.close()
    }
  }

  private async stage(stage: TransferStage, detail: Record<string, unknown>): Promise<void> {
    if (!this.opts.onStage) return
    try {
      await this.opts.onStage(stage, detail)
    } catch (err) {
      // Stage notifications must never change the transfer's outcome
      console.error(`[transfer] stage hook failed at ${stage}:`, err)
    }
  }
}

function failed(stage: DeliveryStage, err: unknown): TransferReport {
  const cause = err instanceof Error ? err : new Error(String(err))
  return { transfer: { kind: "delivery_failed", stage, cause } }
}
