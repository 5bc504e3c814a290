/**
 * Formatting utilities for CLI output
 */

import { formatMode } from '../../core/types.js'
import type { DirectoryStats, Metadata, NandStats } from '../../core/types.js'
import type { LsEntry, LsFormatOptions } from '../types.js'

/**
 * Type marker and the three modes, e.g. `drwrwr-` or `-rwr---`
 */
export function formatPermissions(entry: Pick<LsEntry, 'isFile' | 'ownerMode' | 'groupMode' | 'otherMode'>): string {
  const type = entry.isFile ? '-' : 'd'
  return type + formatMode(entry.ownerMode) + formatMode(entry.groupMode) + formatMode(entry.otherMode)
}

/**
 * Format ls output; long format adds permissions, owner, group and size
 */
export function formatLsOutput(entries: LsEntry[], options: LsFormatOptions = {}): string {
  if (!options.long) {
    return entries.map((e) => e.name).join('\n')
  }

  return entries
    .map((entry) => {
      const size = entry.size.toString().padStart(10, ' ')
      return `${formatPermissions(entry)} ${entry.uid} ${entry.gid} ${size} ${entry.name}`
    })
    .join('\n')
}

/**
 * Format stat output, one `key: value` per line
 */
export function formatStat(path: string, meta: Metadata): string {
  return [
    `path: ${path}`,
    `type: ${meta.isFile ? 'file' : 'directory'}`,
    `size: ${meta.size}`,
    `uid: ${meta.uid}`,
    `gid: ${meta.gid}`,
    `attribute: ${meta.attribute}`,
    `permissions: ${formatPermissions(meta)}`,
    `index: ${meta.fstIndex}`,
  ].join('\n')
}

export function formatNandStats(stats: NandStats): string {
  return [
    `cluster size: ${stats.clusterSize}`,
    `clusters used: ${stats.usedClusters}`,
    `clusters free: ${stats.freeClusters}`,
    `clusters reserved: ${stats.reservedClusters}`,
    `clusters bad: ${stats.badClusters}`,
    `inodes used: ${stats.usedInodes}`,
    `inodes free: ${stats.freeInodes}`,
  ].join('\n')
}

/**
 * Format du output: clusters, inodes and path, tab separated
 */
export function formatDirectoryStats(path: string, stats: DirectoryStats): string {
  return `${stats.usedClusters}\t${stats.usedInodes}\t${path}`
}
