/**
 * nandfs - emulated NAND flash filesystem
 *
 * A hierarchical filesystem over a small flash medium: bounded paths,
 * uid/gid ownership with 2-bit permission modes, a fixed file table, cluster
 * quotas, a bounded descriptor table, and save-state snapshots.
 *
 * @example
 * ```typescript
 * import { makeFileSystem, Mode, unwrap } from 'nandfs'
 *
 * const fs = unwrap(makeFileSystem('session'))
 * fs.createDirectory(0, 0, '/title', 0, Mode.ReadWrite, Mode.ReadWrite, Mode.Read)
 * fs.createFile(0, 0, '/title/save.bin', 0, Mode.ReadWrite, Mode.Read, Mode.None)
 *
 * const handle = unwrap(fs.openFile(0, 0, '/title/save.bin', Mode.Write))
 * handle.write(new TextEncoder().encode('hello'))
 * handle.close()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Filesystem
// =============================================================================

export { type FileSystem } from './filesystem.js'
export { NandFileSystem } from './engine.js'
export { makeFileSystem, type FileSystemOptions } from './factory.js'
export { FileHandle, type TypedArray } from './handle.js'

// =============================================================================
// Backends
// =============================================================================

export { type NandBackend, type BackendOperation, MemoryBackend } from './backend.js'
export { HostBackend } from '../storage/host-backend.js'

// =============================================================================
// Results & Errors
// =============================================================================

export { type Ok, type Err, type Result, ok, err, isOk, isErr, codeOf, fromCode, unwrap, check } from './result.js'

export {
  type ErrorCode,
  type ResultCode,
  type Errno,
  type ErrorCategory,
  ERROR_KINDS,
  FsError,
  isFsError,
  isErrorCode,
  errnoOf,
  codeFromErrno,
  describeCode,
  errorCategory,
  isRecoverable,
} from './errors.js'

// =============================================================================
// Types
// =============================================================================

export {
  type Uid,
  type Gid,
  type Fd,
  type FileAttribute,
  type Location,
  type Metadata,
  type NandStats,
  type DirectoryStats,
  type FileStatus,
  type EntryAttributes,
  Mode,
  SeekMode,
  isMode,
  isSeekMode,
  isLocation,
  formatMode,
} from './types.js'

// =============================================================================
// Configuration
// =============================================================================

export {
  type NandConfig,
  type NandConfigOptions,
  type EnvSettings,
  defaultConfig,
  createConfig,
  usableClusters,
  configFromEnv,
} from './config.js'

export { constants, type Constants } from './constants.js'

// =============================================================================
// Paths & Permissions
// =============================================================================

export { sep, normalize, components, isValidName, parsePath, join, dirname, basename, isWithin, type PathLimits } from './path.js'
export { governingMode, hasPermission, type Ownership } from './permissions.js'

// =============================================================================
// Snapshots
// =============================================================================

export { SNAPSHOT_VERSION, encodeSnapshot, decodeSnapshot, snapshotVersion, type SnapshotState, type Geometry, type DescriptorRecord } from './snapshot.js'
