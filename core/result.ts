/**
 * Result type shared by every fallible operation.
 *
 * A result is exactly one of a typed success value or a failure kind.
 *
 * @module core/result
 */

import { FsError, type ErrorCode, type ResultCode } from './errors.js'

export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

export interface Err {
  readonly ok: false
  readonly code: ErrorCode
}

export type Result<T> = Ok<T> | Err

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err(code: ErrorCode): Err {
  return { ok: false, code }
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
  return result.ok
}

export function isErr<T>(result: Result<T>): result is Err {
  return !result.ok
}

/**
 * Collapse a result to its result code, dropping the value.
 */
export function codeOf<T>(result: Result<T>): ResultCode {
  return result.ok ? 'Success' : result.code
}

/**
 * Lift a bare result code into a `Result<void>`.
 */
export function fromCode(code: ResultCode): Result<void> {
  return code === 'Success' ? ok(undefined) : err(code)
}

/**
 * Return the value of a successful result or throw an {@link FsError}.
 *
 * For callers outside the engine (CLI, tests) that prefer exceptions.
 *
 * @example
 * ```typescript
 * const names = unwrap(fs.readDirectory(0, 0, '/title'), 'readDirectory', '/title')
 * ```
 */
export function unwrap<T>(result: Result<T>, syscall?: string, path?: string): T {
  if (!result.ok) {
    throw new FsError(result.code, syscall, path)
  }
  return result.value
}

/**
 * Throw an {@link FsError} unless `code` is `'Success'`.
 */
export function check(code: ResultCode, syscall?: string, path?: string): void {
  if (code !== 'Success') {
    throw new FsError(code, syscall, path)
  }
}
