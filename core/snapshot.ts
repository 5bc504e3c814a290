/**
 * Save-state blob for a NAND engine.
 *
 * Binary format:
 *   [4 bytes: magic "NAND" = 0x4e, 0x41, 0x4e, 0x44]
 *   [4 bytes: version, little-endian uint32]
 *   [rest:    gzip of the UTF-8 JSON SnapshotPayload]
 *
 * Entries, file contents and descriptors are listed in ascending slot/fd
 * order with keys in a fixed order, and gzip output carries no timestamp, so
 * encoding the same state twice yields the same bytes.
 */

import { z } from 'zod'

import { gunzip, gzip } from './compression.js'
import { MAX_OFFSET } from './constants.js'
import { EntryRecordSchema, type EntryRecord } from './fst.js'
import { err, ok, type Result } from './result.js'
import type { Mode, NandStats } from './types.js'

/** Magic bytes identifying a snapshot blob. */
const MAGIC = new Uint8Array([0x4e, 0x41, 0x4e, 0x44]) // "NAND"

/** Current format version. */
export const SNAPSHOT_VERSION = 1

/** Header size: 4 bytes magic + 4 bytes version. */
const HEADER_SIZE = 8

const CountSchema = z.number().int().min(0)

const GeometrySchema = z.object({
  clusterSize: CountSchema,
  totalClusters: CountSchema,
  reservedClusters: CountSchema,
  badClusters: CountSchema,
  totalInodes: CountSchema,
  maxHandles: CountSchema,
})

const DescriptorRecordSchema = z.object({
  fd: CountSchema,
  slot: CountSchema,
  mode: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  offset: CountSchema.max(MAX_OFFSET),
  uid: CountSchema,
  gid: CountSchema,
})

const StatsSchema = z.object({
  clusterSize: CountSchema,
  freeClusters: CountSchema,
  usedClusters: CountSchema,
  badClusters: CountSchema,
  reservedClusters: CountSchema,
  freeInodes: CountSchema,
  usedInodes: CountSchema,
})

const PayloadSchema = z.object({
  geometry: GeometrySchema,
  entries: z.array(EntryRecordSchema),
  data: z.array(z.object({ slot: CountSchema, bytes: z.string() })),
  handles: z.array(DescriptorRecordSchema),
  stats: StatsSchema,
})

export type Geometry = z.infer<typeof GeometrySchema>

/**
 * An open descriptor as recorded in a snapshot.
 */
export interface DescriptorRecord {
  fd: number
  slot: number
  mode: Exclude<Mode, 0>
  offset: number
  uid: number
  gid: number
}

/**
 * Everything needed to resume an engine.
 */
export interface SnapshotState {
  geometry: Geometry
  entries: EntryRecord[]
  data: Array<{ slot: number; data: Uint8Array }>
  handles: DescriptorRecord[]
  stats: NandStats
}

/**
 * Encode engine state as a snapshot blob.
 */
export function encodeSnapshot(state: SnapshotState): Uint8Array {
  const payload: z.infer<typeof PayloadSchema> = {
    geometry: {
      clusterSize: state.geometry.clusterSize,
      totalClusters: state.geometry.totalClusters,
      reservedClusters: state.geometry.reservedClusters,
      badClusters: state.geometry.badClusters,
      totalInodes: state.geometry.totalInodes,
      maxHandles: state.geometry.maxHandles,
    },
    entries: state.entries,
    data: state.data.map(({ slot, data }) => ({ slot, bytes: Buffer.from(data).toString('base64') })),
    handles: state.handles.map(({ fd, slot, mode, offset, uid, gid }) => ({ fd, slot, mode, offset, uid, gid })),
    stats: {
      clusterSize: state.stats.clusterSize,
      freeClusters: state.stats.freeClusters,
      usedClusters: state.stats.usedClusters,
      badClusters: state.stats.badClusters,
      reservedClusters: state.stats.reservedClusters,
      freeInodes: state.stats.freeInodes,
      usedInodes: state.stats.usedInodes,
    },
  }

  const body = gzip(new TextEncoder().encode(JSON.stringify(payload)))
  const blob = new Uint8Array(HEADER_SIZE + body.byteLength)

  blob.set(MAGIC, 0)
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength)
  view.setUint32(4, SNAPSHOT_VERSION, true)
  blob.set(body, HEADER_SIZE)

  return blob
}

/**
 * Read the format version of a blob without decoding it.
 *
 * @returns `Invalid` if the blob is too short or the magic is wrong
 */
export function snapshotVersion(blob: Uint8Array): Result<number> {
  if (blob.byteLength < HEADER_SIZE) {
    return err('Invalid')
  }
  for (let i = 0; i < MAGIC.length; i++) {
    if (blob[i] !== MAGIC[i]) {
      return err('Invalid')
    }
  }
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength)
  return ok(view.getUint32(4, true))
}

/**
 * Decode a snapshot blob.
 *
 * - `Invalid`: bad header or another format version
 * - `CheckFailed`: the body does not decompress or does not match the schema
 */
export function decodeSnapshot(blob: Uint8Array): Result<SnapshotState> {
  const version = snapshotVersion(blob)
  if (!version.ok) return version
  if (version.value !== SNAPSHOT_VERSION) {
    return err('Invalid')
  }

  const body = gunzip(blob.subarray(HEADER_SIZE))
  if (!body.ok) {
    return err('CheckFailed')
  }

  let json: unknown
  try {
    json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(body.data))
  } catch {
    return err('CheckFailed')
  }

  const parsed = PayloadSchema.safeParse(json)
  if (!parsed.success) {
    return err('CheckFailed')
  }

  const payload = parsed.data
  return ok({
    geometry: payload.geometry,
    entries: payload.entries,
    data: payload.data.map(({ slot, bytes }) => ({ slot, data: new Uint8Array(Buffer.from(bytes, 'base64')) })),
    handles: payload.handles,
    stats: payload.stats,
  })
}
