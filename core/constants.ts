/**
 * NAND Geometry Constants
 *
 * Default limits of the emulated internal flash: allocation unit, cluster and
 * inode counts, handle table size and path bounds. A {@link NandConfig} starts
 * from these values.
 *
 * @module
 */

// =============================================================================
// Clusters
// =============================================================================

/**
 * Size of one allocation unit in bytes (16 KiB).
 */
export const CLUSTER_SIZE = 0x4000

/**
 * Clusters on the medium, reserved ones included.
 */
export const TOTAL_CLUSTERS = 0x7ec0

/**
 * Clusters held back for the system and never handed out to files.
 */
export const RESERVED_CLUSTERS = 0x30

// =============================================================================
// File Table
// =============================================================================

/**
 * Slots in the file table. The root directory occupies slot 0.
 */
export const TOTAL_INODES = 0x17ff

/**
 * Concurrently open descriptors.
 */
export const MAX_HANDLES = 16

// =============================================================================
// Paths
// =============================================================================

/**
 * Components allowed in a path (`/a/b/c` has 3).
 */
export const MAX_PATH_DEPTH = 8

/**
 * Characters allowed in one component.
 */
export const MAX_NAME_LENGTH = 12

/**
 * Characters allowed in a normalized path.
 */
export const MAX_PATH_LENGTH = 64

// =============================================================================
// Identity
// =============================================================================

/**
 * Uid that bypasses permission and ownership checks.
 */
export const SUPER_UID = 0

/**
 * Largest value of a file offset or size (u32).
 */
export const MAX_OFFSET = 0xffffffff

/**
 * Largest attribute byte.
 */
export const MAX_ATTRIBUTE = 0xff

/**
 * All geometry constants in one object.
 *
 * @example
 * ```typescript
 * import { constants } from './constants.js'
 *
 * const bytes = constants.CLUSTER_SIZE * constants.TOTAL_CLUSTERS
 * ```
 */
export const constants = {
  CLUSTER_SIZE,
  TOTAL_CLUSTERS,
  RESERVED_CLUSTERS,
  TOTAL_INODES,
  MAX_HANDLES,
  MAX_PATH_DEPTH,
  MAX_NAME_LENGTH,
  MAX_PATH_LENGTH,
  SUPER_UID,
  MAX_OFFSET,
  MAX_ATTRIBUTE,
} as const

/**
 * Type representing all geometry constants.
 */
export type Constants = typeof constants
