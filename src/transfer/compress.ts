// src/transfer/compress.ts — Per-file gzip compression of closed output groups

import { createReadStream, createWriteStream } from "node:fs"
import { stat, unlink } from "node:fs/promises"
import { pipeline } from "node:stream/promises"
import { createGzip } from "node:zlib"

export interface CompressedArtifact {
  source: string
  path: string
  bytes: number
  compressedBytes: number
}

/**
 * Compress `path` to `path.gz` and remove the plain file, like `gzip <file>`.
 * Node writes a zero mtime into the gzip header, so output depends only on
 * the input bytes.
 */
export async function compressFile(path: string): Promise<CompressedArtifact> {
  const target = `${path}.gz`
  const { size } = await stat(path)

  await pipeline(
    createReadStream(path),
    createGzip({ level: 6 }),
    createWriteStream(target, { flags: "wx" }),
  )
  await unlink(path)

  const compressed = await stat(target)
  return { source: path, path: target, bytes: size, compressedBytes: compressed.size }
}

/** Compress every file in order. The first failure stops the run. */
export async function compressAll(paths: readonly string[]): Promise<CompressedArtifact[]> {
  const artifacts: CompressedArtifact[] = []
  for (const path of paths) {
    artifacts.push(await compressFile(path))
  }
  return artifacts
}
