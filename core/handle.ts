/**
 * FileHandle - scoped capability over an open descriptor.
 *
 * A handle holds a non-owning reference to its filesystem and a descriptor
 * id. Closing (or disposing) it closes the descriptor once; afterwards, and
 * after {@link FileHandle.release}, it is detached and further closes are
 * no-ops.
 *
 * @example
 * ```typescript
 * const opened = fs.openFile(1000, 1, '/title/save.bin', Mode.Read)
 * if (opened.ok) {
 *   const handle = opened.value
 *   const header = new Uint32Array(4)
 *   const read = handle.read(header, 4)   // 'ShortRead' if the file is shorter
 *   handle.close()
 * }
 * ```
 *
 * @module core/handle
 */

import type { ResultCode } from './errors.js'
import type { FileSystem } from './filesystem.js'
import { err, ok, type Result } from './result.js'
import type { Fd, FileStatus, SeekMode } from './types.js'

/**
 * Arrays accepted by the typed read/write helpers.
 */
export type TypedArray =
  | Uint8Array
  | Uint8ClampedArray
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array

export class FileHandle {
  private readonly fs: FileSystem
  private fd: Fd | undefined

  constructor(fs: FileSystem, fd: Fd) {
    this.fs = fs
    this.fd = fd
  }

  /** Descriptor id, or `undefined` once closed or released */
  get descriptor(): Fd | undefined {
    return this.fd
  }

  /** Whether the handle still owns its descriptor */
  get isBound(): boolean {
    return this.fd !== undefined
  }

  /**
   * Detach without closing; the caller now owns the descriptor and must
   * close it through {@link FileSystem.close}.
   *
   * @returns The descriptor id, or `undefined` if already detached
   */
  release(): Fd | undefined {
    const fd = this.fd
    this.fd = undefined
    return fd
  }

  /**
   * Close the descriptor if still bound. Idempotent.
   */
  close(): ResultCode {
    const fd = this.release()
    if (fd === undefined) return 'Success'
    return this.fs.close(fd)
  }

  [Symbol.dispose](): void {
    this.close()
  }

  /**
   * Read `count` elements into `target`.
   *
   * @returns `count`, or `ShortRead` if the file ended first
   */
  read(target: TypedArray, count: number = target.length): Result<number> {
    if (this.fd === undefined) return err('Invalid')
    const bytes = elementBytes(target, count)
    if (!bytes) return err('Invalid')

    const result = this.fs.readBytesFromFile(this.fd, bytes)
    if (!result.ok) return result
    if (result.value !== bytes.byteLength) return err('ShortRead')
    return ok(count)
  }

  /**
   * Write the first `count` elements of `source`.
   *
   * @returns `count`
   */
  write(source: TypedArray, count: number = source.length): Result<number> {
    if (this.fd === undefined) return err('Invalid')
    const bytes = elementBytes(source, count)
    if (!bytes) return err('Invalid')

    const result = this.fs.writeBytesToFile(this.fd, bytes)
    if (!result.ok) return result
    return ok(count)
  }

  /**
   * Read up to `size` bytes into a fresh array sized to what was read.
   */
  readBytes(size: number): Result<Uint8Array> {
    if (this.fd === undefined) return err('Invalid')
    if (!Number.isInteger(size) || size < 0) return err('Invalid')

    const buffer = new Uint8Array(size)
    const result = this.fs.readBytesFromFile(this.fd, buffer)
    if (!result.ok) return result
    return ok(buffer.subarray(0, result.value))
  }

  seek(offset: number, mode: SeekMode): Result<number> {
    if (this.fd === undefined) return err('Invalid')
    return this.fs.seekFile(this.fd, offset, mode)
  }

  getStatus(): Result<FileStatus> {
    if (this.fd === undefined) return err('Invalid')
    return this.fs.getFileStatus(this.fd)
  }
}

/**
 * Byte view over the first `count` elements, or undefined if `count` is out of range.
 */
function elementBytes(array: TypedArray, count: number): Uint8Array | undefined {
  if (!Number.isInteger(count) || count < 0 || count > array.length) {
    return undefined
  }
  return new Uint8Array(array.buffer, array.byteOffset, count * array.BYTES_PER_ELEMENT)
}
