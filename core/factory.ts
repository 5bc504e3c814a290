/**
 * Construct a filesystem for a backing location.
 *
 * @module core/factory
 */

import { MemoryBackend, type NandBackend } from './backend.js'
import { configFromEnv, createConfig, type NandConfig, type NandConfigOptions } from './config.js'
import { NandFileSystem } from './engine.js'
import { isFsError } from './errors.js'
import type { FileSystem } from './filesystem.js'
import { err, type Result } from './result.js'
import type { Location } from './types.js'
import { HostBackend } from '../storage/host-backend.js'

export interface FileSystemOptions extends NandConfigOptions {
  /** Host directory for the configured location; defaults to `NANDFS_ROOT` */
  root?: string
  /** Environment to read defaults from */
  env?: Record<string, string | undefined>
}

/**
 * Build a filesystem over the backing for `location`.
 *
 * An existing superblock is loaded; a blank medium is formatted with the
 * privileged uid as the root owner.
 *
 * - `Invalid`: bad geometry, or `configured` without a root directory
 * - `SuperblockInitFailed`: the stored superblock cannot be loaded
 *
 * @example
 * ```typescript
 * const session = makeFileSystem('session', { totalInodes: 64 })
 * const durable = makeFileSystem('configured', { root: '/var/lib/nandfs' })
 * ```
 */
export function makeFileSystem(location: Location = 'session', options: FileSystemOptions = {}): Result<FileSystem> {
  const { root, env, ...geometry } = options

  let config: NandConfig
  try {
    config = createConfig(geometry)
  } catch (error) {
    if (isFsError(error)) return err(error.code)
    throw error
  }

  let backend: NandBackend
  if (location === 'configured') {
    const directory = root ?? configFromEnv(env).root
    if (!directory) return err('Invalid')
    backend = new HostBackend(directory)
  } else {
    backend = new MemoryBackend()
  }

  return NandFileSystem.mount(backend, config)
}
