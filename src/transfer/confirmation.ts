// src/transfer/confirmation.ts — One-shot TCP rendezvous for the archive's commit message
//
// The archive host connects once per run, writes either the literal COMMIT or
// free error text, and closes. The listener is armed before the push so an
// early answer is not lost; waiting is always bounded.

import { lookup } from "node:dns/promises"
import * as net from "node:net"

export const COMMIT_TOKEN = "COMMIT"

const DEFAULT_MAX_MESSAGE_BYTES = 64 * 1024

export type ConfirmationResult =
  | { kind: "committed" }
  | { kind: "rejected"; message: string }
  | { kind: "timed_out"; detail?: string }

export interface Rendezvous {
  readonly address: { host: string; port: number }
  /** Resolve with the first message, or timed_out once `timeoutMs` elapse. */
  wait(timeoutMs: number): Promise<ConfirmationResult>
  close(): Promise<void>
}

export interface ConfirmationChannel {
  open(): Promise<Rendezvous>
}

export interface TcpConfirmationOptions {
  host: string
  port: number
  /** Peer addresses allowed to answer. Empty accepts any peer. */
  allowedPeers?: readonly string[]
  maxMessageBytes?: number
}

/** Classify the text received from the archive. */
export function interpretMessage(text: string): ConfirmationResult {
  const message = text.trim()
  if (message === COMMIT_TOKEN) return { kind: "committed" }
  if (message.length === 0) return { kind: "timed_out", detail: "empty confirmation message" }
  return { kind: "rejected", message }
}

/** Strip the IPv4-mapped IPv6 prefix so "::ffff:10.0.0.5" compares as "10.0.0.5". */
export function normalizePeer(address: string | undefined): string {
  if (!address) return ""
  return address.startsWith("::ffff:") ? address.slice("::ffff:".length) : address
}

/** Resolve every address of the archive host for the peer allow-list. */
export async function resolvePeers(host: string): Promise<string[]> {
  if (net.isIP(host)) return [host]
  const records = await lookup(host, { all: true })
  return records.map((r) => normalizePeer(r.address))
}

export class TcpConfirmationChannel implements ConfirmationChannel {
  constructor(private readonly opts: TcpConfirmationOptions) {}

  async open(): Promise<Rendezvous> {
    const rendezvous = new TcpRendezvous(
      this.opts.allowedPeers ?? [],
      this.opts.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES,
    )
    await rendezvous.listen(this.opts.host, this.opts.port)
    return rendezvous
  }
}

class TcpRendezvous implements Rendezvous {
  private readonly server: net.Server
  private readonly sockets = new Set<net.Socket>()
  private active: { socket: net.Socket; chunks: Buffer[]; bytes: number } | undefined
  private result: ConfirmationResult | undefined
  private onResult: ((result: ConfirmationResult) => void) | undefined
  private closed = false
  private bound = { host: "", port: 0 }

  constructor(
    private readonly allowedPeers: readonly string[],
    private readonly maxMessageBytes: number,
  ) {
    this.server = net.createServer((socket) => this.handleConnection(socket))
  }

  get address(): { host: string; port: number } {
    return this.bound
  }

  listen(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err)
      this.server.once("error", onError)
      this.server.listen(port, host, () => {
        this.server.off("error", onError)
        this.server.on("error", (err) => {
          console.error("[confirm] listener error:", err.message)
        })
        const addr = this.server.address()
        if (addr && typeof addr === "object") {
          this.bound = { host: addr.address, port: addr.port }
        }
        resolve()
      })
    })
  }

  wait(timeoutMs: number): Promise<ConfirmationResult> {
    if (this.result) return Promise.resolve(this.result)

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.onResult = undefined
        // A peer that is still sending when time runs out is judged on what it sent
        const partial = this.active ? Buffer.concat(this.active.chunks).toString("utf-8") : ""
        this.active?.socket.destroy()
        this.active = undefined
        const result = partial.trim().length > 0
          ? interpretMessage(partial)
          : { kind: "timed_out" as const }
        this.result = result
        resolve(result)
      }, timeoutMs)

      this.onResult = (result) => {
        clearTimeout(timer)
        this.onResult = undefined
        resolve(result)
      }
    })
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve()
    this.closed = true
    for (const socket of this.sockets) socket.destroy()
    this.sockets.clear()
    return new Promise((resolve) => {
      if (!this.server.listening) {
        resolve()
        return
      }
      this.server.close(() => resolve())
    })
  }

  private handleConnection(socket: net.Socket): void {
    const peer = normalizePeer(socket.remoteAddress)

    if (this.result || this.active || this.closed) {
      socket.destroy()
      return
    }
    if (this.allowedPeers.length > 0 && !this.allowedPeers.includes(peer)) {
      console.warn(`[confirm] ignoring connection from unexpected peer ${peer}`)
      socket.destroy()
      return
    }

    const chunks: Buffer[] = []
    const active = { socket, chunks, bytes: 0 }
    this.active = active
    this.sockets.add(socket)

    socket.on("data", (chunk: Buffer) => {
      const room = this.maxMessageBytes - active.bytes
      if (room <= 0) return
      const slice = chunk.length > room ? chunk.subarray(0, room) : chunk
      active.chunks.push(slice)
      active.bytes += slice.length
    })

    socket.on("end", () => {
      this.sockets.delete(socket)
      if (this.active !== active) return
      this.active = undefined
      this.settle(interpretMessage(Buffer.concat(active.chunks).toString("utf-8")))
      socket.end()
    })

    socket.on("error", (err) => {
      this.sockets.delete(socket)
      console.error(`[confirm] connection from ${peer} failed: ${err.message}`)
      if (this.active === active) this.active = undefined
    })

    socket.on("close", () => {
      this.sockets.delete(socket)
    })
  }

  private settle(result: ConfirmationResult): void {
    if (this.result) return
    this.result = result
    this.onResult?.(result)
  }
}
