/**
 * NAND Configuration Module
 *
 * Configuration types and utilities for the emulated NAND: geometry, handle
 * table size, path bounds and the privileged uid. Configuration is validated
 * and frozen.
 *
 * @module core/config
 */

import { constants } from './constants.js'
import { FsError } from './errors.js'

/**
 * NAND configuration
 */
export interface NandConfig {
  /** Bytes per cluster */
  readonly clusterSize: number

  /** Clusters on the medium, reserved and bad ones included */
  readonly totalClusters: number

  /** Clusters held back for the system */
  readonly reservedClusters: number

  /** Clusters marked bad at manufacture; never handed out */
  readonly badClusters: number

  /** Slots in the file table (root included) */
  readonly totalInodes: number

  /** Concurrently open descriptors */
  readonly maxHandles: number

  /** Components allowed in a path */
  readonly maxPathDepth: number

  /** Characters allowed in one path component */
  readonly maxNameLength: number

  /** Characters allowed in a normalized path */
  readonly maxPathLength: number

  /** Uid that bypasses permission checks */
  readonly superUid: number
}

/**
 * Configuration options (partial, for user input)
 */
export type NandConfigOptions = Partial<NandConfig>

/**
 * Default configuration values
 */
export const defaultConfig: NandConfig = Object.freeze({
  clusterSize: constants.CLUSTER_SIZE,
  totalClusters: constants.TOTAL_CLUSTERS,
  reservedClusters: constants.RESERVED_CLUSTERS,
  badClusters: 0,
  totalInodes: constants.TOTAL_INODES,
  maxHandles: constants.MAX_HANDLES,
  maxPathDepth: constants.MAX_PATH_DEPTH,
  maxNameLength: constants.MAX_NAME_LENGTH,
  maxPathLength: constants.MAX_PATH_LENGTH,
  superUid: constants.SUPER_UID,
})

/**
 * Validate a whole number within [min, max]
 */
function validateInteger(value: unknown, name: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new FsError('Invalid', 'createConfig', `${name} must be an integer`)
  }
  if (value < min || value > max) {
    throw new FsError('Invalid', 'createConfig', `${name} must be between ${min} and ${max}`)
  }
  return value
}

function pick(value: number | undefined, fallback: number, name: string, min: number, max?: number): number {
  return value !== undefined ? validateInteger(value, name, min, max) : fallback
}

/**
 * Create a new NAND configuration
 *
 * Any invalid option throws an {@link FsError} with code `Invalid`.
 *
 * @example
 * ```typescript
 * // Stock geometry
 * const config = createConfig()
 *
 * // A tiny medium for tests
 * const small = createConfig({ totalClusters: 8, reservedClusters: 0, totalInodes: 16 })
 * ```
 */
export function createConfig(options: NandConfigOptions = {}): NandConfig {
  const clusterSize = pick(options.clusterSize, defaultConfig.clusterSize, 'clusterSize', 1)
  const totalClusters = pick(options.totalClusters, defaultConfig.totalClusters, 'totalClusters', 1)
  const reservedClusters = pick(options.reservedClusters, defaultConfig.reservedClusters, 'reservedClusters', 0, totalClusters)
  const badClusters = pick(options.badClusters, defaultConfig.badClusters, 'badClusters', 0, totalClusters - reservedClusters)

  const config: NandConfig = {
    clusterSize,
    totalClusters,
    reservedClusters,
    badClusters,
    // The root always takes one slot
    totalInodes: pick(options.totalInodes, defaultConfig.totalInodes, 'totalInodes', 1),
    maxHandles: pick(options.maxHandles, defaultConfig.maxHandles, 'maxHandles', 1),
    maxPathDepth: pick(options.maxPathDepth, defaultConfig.maxPathDepth, 'maxPathDepth', 1),
    maxNameLength: pick(options.maxNameLength, defaultConfig.maxNameLength, 'maxNameLength', 1),
    maxPathLength: pick(options.maxPathLength, defaultConfig.maxPathLength, 'maxPathLength', 2),
    superUid: pick(options.superUid, defaultConfig.superUid, 'superUid', 0, 0xffffffff),
  }

  return Object.freeze(config)
}

/**
 * Clusters that files may occupy.
 */
export function usableClusters(config: NandConfig): number {
  return config.totalClusters - config.reservedClusters - config.badClusters
}

/**
 * Settings read from the process environment.
 */
export interface EnvSettings {
  /** Host directory of the configured (durable) NAND */
  root?: string
}

/**
 * Read nandfs settings from environment variables.
 *
 * - `NANDFS_ROOT`: host directory backing the configured location
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): EnvSettings {
  const root = env.NANDFS_ROOT?.trim()
  return root ? { root } : {}
}
