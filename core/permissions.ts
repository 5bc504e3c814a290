/**
 * Permission evaluation for NAND entries.
 *
 * @module core/permissions
 */

import type { Gid, Mode, Uid } from './types.js'

/**
 * Owner, group and modes of an entry, as far as permission checks care.
 */
export interface Ownership {
  uid: Uid
  gid: Gid
  ownerMode: Mode
  groupMode: Mode
  otherMode: Mode
}

/**
 * Mode that governs a caller's access to an entry.
 *
 * Evaluation order is fixed: a matching uid selects the owner mode even when
 * the group or other mode would grant more; otherwise a matching gid selects
 * the group mode; otherwise the other mode applies.
 */
export function governingMode(entry: Ownership, uid: Uid, gid: Gid): Mode {
  if (entry.uid === uid) return entry.ownerMode
  if (entry.gid === gid) return entry.groupMode
  return entry.otherMode
}

/**
 * Whether the requested bits are a subset of the governing mode.
 * The privileged uid passes every check.
 */
export function hasPermission(entry: Ownership, uid: Uid, gid: Gid, requested: Mode, superUid: Uid): boolean {
  if (uid === superUid) return true
  return (governingMode(entry, uid, gid) & requested) === requested
}
