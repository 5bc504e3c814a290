/**
 * Gzip helpers for snapshots and host-stored blobs.
 *
 * Uses pako for gzip compression. Decompression verifies the gzip magic and
 * lets pako check the trailing CRC32, so a damaged blob is reported rather
 * than returned.
 *
 * @module core/compression
 */

import pako from 'pako'

import type { ErrorCode } from './errors.js'
import { err, ok, type Result } from './result.js'

/**
 * Gzip compression level (0-9)
 * - 0: No compression (store only)
 * - 1: Best speed
 * - 6: Default (balanced)
 * - 9: Best compression
 */
export type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9

export const DEFAULT_GZIP_LEVEL: GzipLevel = 6

/**
 * Outcome of {@link gunzip}.
 */
export type GunzipResult =
  | { ok: true; data: Uint8Array }
  | { ok: false; reason: 'INVALID_DATA' | 'DECOMPRESSION_FAILED'; message: string }

/**
 * Gzip-compress `data`. The output carries no timestamp, so equal input
 * yields equal bytes.
 */
export function gzip(data: Uint8Array, level: GzipLevel = DEFAULT_GZIP_LEVEL): Uint8Array {
  return pako.gzip(data, { level })
}

/**
 * Check for the gzip magic number (0x1f 0x8b).
 */
export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b
}

export function gunzip(data: Uint8Array): GunzipResult {
  if (!isGzip(data)) {
    return { ok: false, reason: 'INVALID_DATA', message: 'missing gzip magic number (0x1f 0x8b)' }
  }
  try {
    const out: Uint8Array | undefined = pako.ungzip(data)
    // A truncated stream ends without output instead of throwing
    if (!out) {
      return { ok: false, reason: 'DECOMPRESSION_FAILED', message: 'unexpected end of gzip data' }
    }
    return { ok: true, data: out }
  } catch (error) {
    // pako throws its message string rather than an Error
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, reason: 'DECOMPRESSION_FAILED', message }
  }
}

/**
 * Decompress gzip data, reporting any failure as `code`.
 */
export function gunzipOr(data: Uint8Array, code: ErrorCode): Result<Uint8Array> {
  const result = gunzip(data)
  return result.ok ? ok(result.data) : err(code)
}
