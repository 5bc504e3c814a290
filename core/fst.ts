/**
 * File system table (FST)
 *
 * The entry table the engine owns: one slot per file or directory, linked into
 * a tree through parent and child slot indices. This module also defines the
 * persisted form of the table (the superblock payload), validated with zod on
 * the way back in, and the usage counters derived from it.
 *
 * @module core/fst
 */

import { z } from 'zod'

import type { NandConfig } from './config.js'
import { MAX_ATTRIBUTE, MAX_OFFSET } from './constants.js'
import { isValidName } from './path.js'
import { err, ok, type Result } from './result.js'
import type { DirectoryStats, Gid, Mode, Uid } from './types.js'

// =============================================================================
// Entries
// =============================================================================

/**
 * One file-table slot.
 */
export interface FstEntry {
  /** Component name; '' for the root */
  name: string
  /** Slot of the parent directory; -1 for the root */
  parent: number
  isFile: boolean
  uid: Uid
  gid: Gid
  attribute: number
  ownerMode: Mode
  groupMode: Mode
  otherMode: Mode
  /** Bytes of content; 0 for directories */
  size: number
  /** Child slots in insertion order (directories only) */
  children: number[]
}

/**
 * Slot-indexed table; free slots are `undefined`.
 */
export type FileTable = Array<FstEntry | undefined>

export const ROOT_SLOT = 0

/**
 * Geometry a stored table is checked against.
 */
export type TableLimits = Pick<NandConfig, 'totalInodes' | 'maxNameLength'>

// =============================================================================
// Persisted Form
// =============================================================================

const ModeSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)])

const IdSchema = z.number().int().min(0).max(0xffffffff)

export const EntryRecordSchema = z.object({
  slot: z.number().int().min(0),
  name: z.string(),
  parent: z.number().int().min(-1),
  isFile: z.boolean(),
  uid: IdSchema,
  gid: IdSchema,
  attribute: z.number().int().min(0).max(MAX_ATTRIBUTE),
  ownerMode: ModeSchema,
  groupMode: ModeSchema,
  otherMode: ModeSchema,
  size: z.number().int().min(0).max(MAX_OFFSET),
  children: z.array(z.number().int().min(0)),
})

export type EntryRecord = z.infer<typeof EntryRecordSchema>

const SuperblockSchema = z.object({
  format: z.literal('nandfs-superblock'),
  version: z.literal(1),
  entries: z.array(EntryRecordSchema),
})

/**
 * Flatten a table into records, ascending by slot, keys in a fixed order.
 */
export function toRecords(table: FileTable): EntryRecord[] {
  const records: EntryRecord[] = []
  table.forEach((entry, slot) => {
    if (!entry) return
    records.push({
      slot,
      name: entry.name,
      parent: entry.parent,
      isFile: entry.isFile,
      uid: entry.uid,
      gid: entry.gid,
      attribute: entry.attribute,
      ownerMode: entry.ownerMode,
      groupMode: entry.groupMode,
      otherMode: entry.otherMode,
      size: entry.size,
      children: [...entry.children],
    })
  })
  return records
}

/**
 * Rebuild a table from records, checking that they describe one well-formed
 * tree rooted at slot 0. Any inconsistency yields `CheckFailed`.
 */
export function fromRecords(records: EntryRecord[], limits: TableLimits): Result<FileTable> {
  const { totalInodes, maxNameLength } = limits
  const table: FileTable = new Array<FstEntry | undefined>(totalInodes).fill(undefined)

  for (const record of records) {
    if (record.slot >= totalInodes || table[record.slot] !== undefined) {
      return err('CheckFailed')
    }
    const { slot: _slot, ...entry } = record
    table[record.slot] = { ...entry, children: [...entry.children] }
  }

  const root = table[ROOT_SLOT]
  if (!root || root.isFile || root.parent !== -1 || root.name !== '') {
    return err('CheckFailed')
  }

  for (const [slot, entry] of table.entries()) {
    if (!entry) continue
    if (entry.isFile && (entry.children.length > 0)) return err('CheckFailed')
    if (!entry.isFile && entry.size !== 0) return err('CheckFailed')

    if (slot !== ROOT_SLOT) {
      const parent = table[entry.parent]
      if (!parent || parent.isFile) return err('CheckFailed')
      if (parent.children.filter((child) => child === slot).length !== 1) return err('CheckFailed')
      if (!isValidName(entry.name, maxNameLength)) return err('CheckFailed')
      if (!reachesRoot(table, slot)) return err('CheckFailed')
    }

    const names = new Set<string>()
    for (const child of entry.children) {
      const childEntry = table[child]
      if (!childEntry || childEntry.parent !== slot || names.has(childEntry.name)) {
        return err('CheckFailed')
      }
      names.add(childEntry.name)
    }
  }

  return ok(table)
}

function reachesRoot(table: FileTable, slot: number): boolean {
  let current = slot
  for (let steps = 0; steps < table.length; steps++) {
    const entry = table[current]
    if (!entry) return false
    if (current === ROOT_SLOT) return true
    current = entry.parent
  }
  return false
}

/**
 * Serialize a table as a superblock payload (UTF-8 JSON).
 */
export function encodeSuperblock(table: FileTable): Uint8Array {
  const payload = { format: 'nandfs-superblock', version: 1, entries: toRecords(table) }
  return new TextEncoder().encode(JSON.stringify(payload))
}

/**
 * Parse a superblock payload back into a table.
 */
export function decodeSuperblock(bytes: Uint8Array, limits: TableLimits): Result<FileTable> {
  let json: unknown
  try {
    json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes))
  } catch {
    return err('CheckFailed')
  }
  const parsed = SuperblockSchema.safeParse(json)
  if (!parsed.success) {
    return err('CheckFailed')
  }
  return fromRecords(parsed.data.entries, limits)
}

// =============================================================================
// Usage
// =============================================================================

/**
 * Clusters a file of `size` bytes occupies.
 */
export function clustersFor(size: number, clusterSize: number): number {
  return Math.ceil(size / clusterSize)
}

/**
 * Clusters and inodes used by the subtree rooted at `slot`, the root included.
 */
export function subtreeUsage(table: FileTable, slot: number, clusterSize: number): DirectoryStats {
  const usage: DirectoryStats = { usedClusters: 0, usedInodes: 0 }
  const pending = [slot]

  while (pending.length > 0) {
    const current = pending.pop()
    if (current === undefined) break
    const entry = table[current]
    if (!entry) continue

    usage.usedInodes++
    if (entry.isFile) {
      usage.usedClusters += clustersFor(entry.size, clusterSize)
    } else {
      pending.push(...entry.children)
    }
  }

  return usage
}
