/**
 * Value types for the NAND filesystem.
 *
 * Plain descriptive records returned by the engine, the access-mode and
 * seek-mode vocabularies, and the backing location selector.
 *
 * @module core/types
 */

// =============================================================================
// Identity
// =============================================================================

/** User id of a caller or entry owner (u32) */
export type Uid = number

/** Group id of a caller or entry owner (u16) */
export type Gid = number

/** Descriptor id in the handle table */
export type Fd = number

/** Free-form attribute byte stored with each entry */
export type FileAttribute = number

// =============================================================================
// Modes
// =============================================================================

/**
 * 2-bit access capability: bit0 = read, bit1 = write.
 */
export const Mode = {
  None: 0,
  Read: 1,
  Write: 2,
  ReadWrite: 3,
} as const

export type Mode = (typeof Mode)[keyof typeof Mode]

export function isMode(value: unknown): value is Mode {
  return value === 0 || value === 1 || value === 2 || value === 3
}

/**
 * Origin for {@link FileSystem.seekFile}.
 */
export const SeekMode = {
  Set: 0,
  Current: 1,
  End: 2,
} as const

export type SeekMode = (typeof SeekMode)[keyof typeof SeekMode]

export function isSeekMode(value: unknown): value is SeekMode {
  return value === 0 || value === 1 || value === 2
}

/**
 * Render a mode as `rw`, `r-`, `-w` or `--`.
 */
export function formatMode(mode: Mode): string {
  return `${mode & Mode.Read ? 'r' : '-'}${mode & Mode.Write ? 'w' : '-'}`
}

// =============================================================================
// Backing Location
// =============================================================================

/**
 * Where a filesystem keeps its contents.
 *
 * - `configured`: durable, user-persistent store on the host
 * - `session`: ephemeral, discarded when the run ends
 */
export type Location = 'configured' | 'session'

export function isLocation(value: unknown): value is Location {
  return value === 'configured' || value === 'session'
}

// =============================================================================
// Records
// =============================================================================

/**
 * Full attribute set of a file or directory.
 */
export interface Metadata {
  uid: Uid
  gid: Gid
  attribute: FileAttribute
  ownerMode: Mode
  groupMode: Mode
  otherMode: Mode
  isFile: boolean
  /** Size in bytes; always 0 for directories */
  size: number
  /** Slot of the entry in the file table */
  fstIndex: number
}

/**
 * Usage of the whole medium.
 */
export interface NandStats {
  clusterSize: number
  freeClusters: number
  usedClusters: number
  badClusters: number
  reservedClusters: number
  freeInodes: number
  usedInodes: number
}

/**
 * Usage of one directory subtree, the directory itself included.
 */
export interface DirectoryStats {
  usedClusters: number
  usedInodes: number
}

/**
 * Position and size seen through an open descriptor.
 */
export interface FileStatus {
  offset: number
  size: number
}

/**
 * Attributes supplied when creating an entry or changing its metadata.
 */
export interface EntryAttributes {
  attribute: FileAttribute
  ownerMode: Mode
  groupMode: Mode
  otherMode: Mode
}
