/**
 * @fileoverview NAND filesystem error kinds
 *
 * The closed set of failure kinds every engine operation reports, with the
 * numeric return value the console's filesystem module uses for each and a
 * human-readable message. Engine operations never throw: they return these
 * codes inside a {@link Result}. {@link FsError} is the thrown form, used only
 * where a boundary has to throw (configuration validation, `unwrap`).
 *
 * @example
 * ```typescript
 * import { FsError, errnoOf } from './errors.js'
 *
 * errnoOf('NotFound')                        // -106
 * throw new FsError('NotFound', 'open', '/title/00000001/data.bin')
 * // NotFound: no such file or directory, open '/title/00000001/data.bin'
 * ```
 *
 * @module core/errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Failure kinds with their numeric return values, messages and category.
 */
const ERROR_CODES = {
  Invalid: { errno: -101, message: 'invalid argument', category: 'structural' },
  AccessDenied: { errno: -102, message: 'permission denied', category: 'permission' },
  SuperblockWriteFailed: { errno: -103, message: 'superblock write failed', category: 'medium' },
  SuperblockInitFailed: { errno: -104, message: 'superblock initialization failed', category: 'medium' },
  AlreadyExists: { errno: -105, message: 'file already exists', category: 'structural' },
  NotFound: { errno: -106, message: 'no such file or directory', category: 'structural' },
  FstFull: { errno: -107, message: 'file table full', category: 'capacity' },
  NoFreeSpace: { errno: -108, message: 'no free space', category: 'capacity' },
  NoFreeHandle: { errno: -109, message: 'no free file handle', category: 'capacity' },
  TooManyPathComponents: { errno: -110, message: 'too many path components', category: 'structural' },
  InUse: { errno: -111, message: 'file in use', category: 'structural' },
  BadBlock: { errno: -112, message: 'bad block', category: 'medium' },
  EccError: { errno: -113, message: 'ECC error', category: 'medium' },
  CriticalEccError: { errno: -114, message: 'critical ECC error', category: 'medium' },
  FileNotEmpty: { errno: -115, message: 'directory not empty', category: 'structural' },
  CheckFailed: { errno: -116, message: 'consistency check failed', category: 'medium' },
  UnknownError: { errno: -117, message: 'unknown error', category: 'unknown' },
  ShortRead: { errno: -118, message: 'short read', category: 'short-read' },
} as const

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Union of all failure kinds.
 */
export type ErrorCode = keyof typeof ERROR_CODES

/**
 * Outcome of an operation that yields no value: success or one failure kind.
 */
export type ResultCode = 'Success' | ErrorCode

/**
 * Numeric return values corresponding to the failure kinds.
 */
export type Errno = (typeof ERROR_CODES)[ErrorCode]['errno']

/**
 * Broad grouping of failure kinds by what the caller can do about them.
 *
 * - `structural`: fix the request and retry
 * - `capacity`: retry after resources are freed
 * - `permission`: retry only under another identity
 * - `medium`: backing-medium fault
 * - `short-read`: a typed read got fewer bytes than requested
 */
export type ErrorCategory = (typeof ERROR_CODES)[ErrorCode]['category']

/**
 * Every failure kind, in return-value order.
 */
export const ERROR_KINDS = Object.freeze(Object.keys(ERROR_CODES).filter(isErrorCode))

// ============================================================================
// Lookups
// ============================================================================

/**
 * Check whether a string names a failure kind.
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_CODES, value)
}

/**
 * Numeric return value for a result code (0 for success).
 */
export function errnoOf(code: ResultCode): number {
  return code === 'Success' ? 0 : ERROR_CODES[code].errno
}

/**
 * Map a numeric return value back to its result code.
 * Unknown values map to `UnknownError`.
 */
export function codeFromErrno(errno: number): ResultCode {
  if (errno === 0) return 'Success'
  return ERROR_KINDS.find((code) => ERROR_CODES[code].errno === errno) ?? 'UnknownError'
}

/**
 * Human-readable description of a result code.
 */
export function describeCode(code: ResultCode): string {
  return code === 'Success' ? 'success' : ERROR_CODES[code].message
}

export function errorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CODES[code].category
}

/**
 * Whether the affected filesystem instance can keep operating after `code`.
 *
 * A critical ECC error or a failed superblock initialization leaves the
 * medium unusable until it is formatted.
 */
export function isRecoverable(code: ErrorCode): boolean {
  return code !== 'CriticalEccError' && code !== 'SuperblockInitFailed'
}

// ============================================================================
// Thrown Form
// ============================================================================

/**
 * Error thrown at the boundaries that cannot return a result code.
 *
 * Message format follows the Node.js fs convention:
 * `Code: message, syscall 'path' -> 'dest'`
 *
 * @example
 * ```typescript
 * const error = new FsError('AccessDenied', 'delete', '/shared2/sys')
 * error.message  // "AccessDenied: permission denied, delete '/shared2/sys'"
 * error.errno    // -102
 * ```
 */
export class FsError extends Error {
  /** Failure kind */
  readonly code: ErrorCode

  /** Numeric return value */
  readonly errno: number

  /** Operation that failed (e.g., 'open', 'createFile') */
  readonly syscall?: string

  /** Source path involved in the operation */
  readonly path?: string

  /** Destination path for rename */
  readonly dest?: string

  constructor(code: ErrorCode, syscall?: string, path?: string, dest?: string) {
    const { errno, message } = ERROR_CODES[code]
    super(`${code}: ${message}${syscall ? `, ${syscall}` : ''}${path ? ` '${path}'` : ''}${dest ? ` -> '${dest}'` : ''}`)
    this.name = 'FsError'
    this.code = code
    this.errno = errno
    this.syscall = syscall
    this.path = path
    this.dest = dest
  }
}

/**
 * Type guard for {@link FsError}, optionally narrowed to one code.
 */
export function isFsError(error: unknown, code?: ErrorCode): error is FsError {
  return error instanceof FsError && (code === undefined || error.code === code)
}
