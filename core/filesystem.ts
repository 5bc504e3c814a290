/**
 * FileSystem contract
 *
 * The operations a NAND filesystem offers to the emulated system. Callers
 * depend on this interface only; the backing location is chosen by
 * {@link makeFileSystem} and is invisible here.
 *
 * Every operation is synchronous and returns a {@link Result} or a
 * {@link ResultCode}. None throws, and a failed operation leaves the entry
 * table and the handle table as they were.
 *
 * @module core/filesystem
 */

import type { ResultCode } from './errors.js'
import type { FileHandle } from './handle.js'
import type { Result } from './result.js'
import type {
  DirectoryStats,
  Fd,
  FileAttribute,
  FileStatus,
  Gid,
  Location,
  Metadata,
  Mode,
  NandStats,
  SeekMode,
  Uid,
} from './types.js'

export interface FileSystem {
  /** Location of the backing store */
  readonly location: Location

  // ===========================================================================
  // Medium
  // ===========================================================================

  /**
   * Erase every entry and descriptor and start over with an empty root owned
   * by `uid`. Irreversible.
   *
   * @returns `SuperblockInitFailed` if the medium cannot be erased,
   *          `SuperblockWriteFailed` if the new superblock cannot be written
   */
  format(uid: Uid): ResultCode

  // ===========================================================================
  // Descriptors
  // ===========================================================================

  /**
   * Open a file. The returned handle closes the descriptor when closed or
   * disposed.
   *
   * @returns `NotFound`, `AccessDenied`, `NoFreeHandle`, or `Invalid` for a
   *          directory or a mode other than Read, Write or ReadWrite
   */
  openFile(uid: Uid, gid: Gid, path: string, mode: Mode): Result<FileHandle>

  /**
   * Close a descriptor.
   *
   * @returns `Invalid` if `fd` is not open
   */
  close(fd: Fd): ResultCode

  /**
   * Read up to `buffer.length` bytes at the descriptor's offset into
   * `buffer` and advance the offset. Reading at or past the end yields 0.
   *
   * @returns Number of bytes read
   */
  readBytesFromFile(fd: Fd, buffer: Uint8Array): Result<number>

  /**
   * Write `data` at the descriptor's offset, growing the file as needed,
   * and advance the offset.
   *
   * @returns Number of bytes written, or `NoFreeSpace`
   */
  writeBytesToFile(fd: Fd, data: Uint8Array): Result<number>

  /**
   * Move the descriptor's offset. Seeking past the end is allowed.
   *
   * @returns The new absolute offset, or `Invalid` if it would be negative
   */
  seekFile(fd: Fd, offset: number, mode: SeekMode): Result<number>

  /**
   * Current offset and size seen through a descriptor.
   */
  getFileStatus(fd: Fd): Result<FileStatus>

  // ===========================================================================
  // Entries
  // ===========================================================================

  /**
   * Create an empty file owned by the caller.
   *
   * @returns `AlreadyExists`, `NotFound` (missing parent), `AccessDenied`
   *          (no write on the parent), `FstFull`, `TooManyPathComponents`
   */
  createFile(
    callerUid: Uid,
    callerGid: Gid,
    path: string,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode

  /**
   * Create an empty directory owned by the caller. Fails like {@link createFile}.
   */
  createDirectory(
    callerUid: Uid,
    callerGid: Gid,
    path: string,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode

  /**
   * Delete a file or an empty directory.
   *
   * @returns `NotFound`, `AccessDenied`, `FileNotEmpty`, or `InUse` for an open file
   */
  delete(callerUid: Uid, callerGid: Gid, path: string): ResultCode

  /**
   * Move an entry, replacing a destination of the same type. A destination
   * directory must be empty. The entry keeps its table slot.
   */
  rename(callerUid: Uid, callerGid: Gid, oldPath: string, newPath: string): ResultCode

  /**
   * Names of a directory's immediate children, in insertion order.
   */
  readDirectory(callerUid: Uid, callerGid: Gid, path: string): Result<string[]>

  getMetadata(callerUid: Uid, callerGid: Gid, path: string): Result<Metadata>

  /**
   * Replace an entry's attributes. Only the owner or the privileged uid may
   * do so, and only the privileged uid may hand the entry to another uid.
   */
  setMetadata(
    callerUid: Uid,
    path: string,
    uid: Uid,
    gid: Gid,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode

  // ===========================================================================
  // Usage
  // ===========================================================================

  getNandStats(): Result<NandStats>

  getDirectoryStats(path: string): Result<DirectoryStats>

  // ===========================================================================
  // Save State
  // ===========================================================================

  /**
   * Capture entries, file contents, quota counters and open descriptors.
   * The caller must not run other operations concurrently.
   */
  snapshot(): Result<Uint8Array>

  /**
   * Replace the whole state with a snapshot taken earlier. Descriptors come
   * back under the same ids with the same offsets.
   *
   * @returns `Invalid` for a foreign or incompatible blob, `CheckFailed` for a
   *          damaged one
   */
  restore(blob: Uint8Array): ResultCode
}
