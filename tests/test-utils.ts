/**
 * Shared helpers for filesystem tests
 *
 * Builds small in-memory NANDs (16-byte clusters, 8 usable clusters, 8 file
 * table slots, 4 descriptors) so capacity limits are reachable with a few
 * bytes and entries.
 */

import { MemoryBackend } from '../core/backend.js'
import { createConfig, type NandConfigOptions } from '../core/config.js'
import { NandFileSystem } from '../core/engine.js'
import { unwrap, check } from '../core/result.js'
import { Mode, type Gid, type Uid } from '../core/types.js'

export const SMALL_GEOMETRY = {
  clusterSize: 16,
  totalClusters: 10,
  reservedClusters: 2,
  totalInodes: 8,
  maxHandles: 4,
} satisfies NandConfigOptions

export interface TestFilesystem {
  fs: NandFileSystem
  backend: MemoryBackend
}

/**
 * Mount a freshly formatted small NAND over a memory backend.
 */
export function createTestFilesystem(options: NandConfigOptions = {}): TestFilesystem {
  const backend = new MemoryBackend()
  const fs = unwrap(NandFileSystem.mount(backend, createConfig({ ...SMALL_GEOMETRY, ...options })))
  return { fs, backend }
}

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text)
export const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes)

/**
 * Create a file open to everyone and write `content` into it.
 */
export function writeFile(fs: NandFileSystem, path: string, content: string, uid: Uid = 0, gid: Gid = 0): void {
  check(fs.createFile(uid, gid, path, 0, Mode.ReadWrite, Mode.ReadWrite, Mode.ReadWrite), 'createFile', path)
  const handle = unwrap(fs.openFile(uid, gid, path, Mode.Write), 'openFile', path)
  unwrap(handle.write(encode(content)), 'writeBytesToFile', path)
  check(handle.close(), 'close', path)
}

/**
 * Read a whole file as UTF-8.
 */
export function readFile(fs: NandFileSystem, path: string, uid: Uid = 0, gid: Gid = 0): string {
  const handle = unwrap(fs.openFile(uid, gid, path, Mode.Read), 'openFile', path)
  const { size } = unwrap(handle.getStatus())
  const bytes = unwrap(handle.readBytes(size))
  check(handle.close())
  return decode(bytes)
}

/**
 * Create a directory with the given modes (default: all read/write).
 */
export function mkdir(
  fs: NandFileSystem,
  path: string,
  uid: Uid = 0,
  gid: Gid = 0,
  modes: [Mode, Mode, Mode] = [Mode.ReadWrite, Mode.ReadWrite, Mode.ReadWrite]
): void {
  check(fs.createDirectory(uid, gid, path, 0, ...modes), 'createDirectory', path)
}
