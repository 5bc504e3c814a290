/**
 * Path utilities for NAND paths
 *
 * NAND paths are absolute, '/'-separated and bounded: a limited number of
 * components, each of limited length, and a limited total length. Runs of
 * separators collapse and a trailing separator is ignored; every engine
 * operation goes through {@link parsePath}, so the rules apply uniformly.
 *
 * @module path
 * @example
 * ```typescript
 * import { normalize, parsePath, join, dirname, basename } from './path.js'
 *
 * normalize('//title///00010000/')   // '/title/00010000'
 * join('/title', '00010000')         // '/title/00010000'
 * dirname('/title/00010000')         // '/title'
 * basename('/title/00010000')        // '00010000'
 * ```
 */

import type { NandConfig } from './config.js'
import { err, ok, type Result } from './result.js'

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Path separator character.
 */
export const sep = '/' as const

// =============================================================================
// TYPES
// =============================================================================

/**
 * Bounds a path must respect.
 */
export type PathLimits = Pick<NandConfig, 'maxPathDepth' | 'maxNameLength' | 'maxPathLength'>

// =============================================================================
// NORMALIZATION
// =============================================================================

/**
 * Collapse runs of separators and drop a trailing separator.
 *
 * Dot segments are left alone; {@link parsePath} rejects them.
 *
 * @example
 * ```typescript
 * normalize('/shared2//sys/')  // '/shared2/sys'
 * normalize('///')             // '/'
 * ```
 */
export function normalize(path: string): string {
  const collapsed = path.replace(/\/+/g, sep)
  if (collapsed.length > 1 && collapsed.endsWith(sep)) {
    return collapsed.slice(0, -1)
  }
  return collapsed
}

/**
 * Split a normalized absolute path into its components.
 * The root yields an empty array.
 */
export function components(path: string): string[] {
  return normalize(path).split(sep).filter((part) => part.length > 0)
}

/**
 * Check a single component: non-empty, within the length bound, not a dot
 * segment, no separator or NUL.
 */
export function isValidName(name: string, maxNameLength: number): boolean {
  if (name.length === 0 || name.length > maxNameLength) return false
  if (name === '.' || name === '..') return false
  return !name.includes(sep) && !name.includes('\0')
}

/**
 * Validate a path and return its components.
 *
 * - `Invalid`: not a string, relative, a bad component, or too long once normalized
 * - `TooManyPathComponents`: more components than `maxPathDepth`
 *
 * @example
 * ```typescript
 * parsePath('/title/00010000', limits)  // { ok: true, value: ['title', '00010000'] }
 * parsePath('title', limits)            // { ok: false, code: 'Invalid' }
 * ```
 */
export function parsePath(path: unknown, limits: PathLimits): Result<string[]> {
  if (typeof path !== 'string' || !path.startsWith(sep)) {
    return err('Invalid')
  }

  const normalized = normalize(path)
  const parts = components(normalized)

  if (parts.length > limits.maxPathDepth) {
    return err('TooManyPathComponents')
  }
  if (!parts.every((part) => isValidName(part, limits.maxNameLength))) {
    return err('Invalid')
  }
  if (normalized.length > limits.maxPathLength) {
    return err('Invalid')
  }

  return ok(parts)
}

// =============================================================================
// COMPOSITION
// =============================================================================

/**
 * Append a component to a directory path.
 */
export function join(dir: string, name: string): string {
  const base = normalize(dir)
  return base === sep ? `${sep}${name}` : `${base}${sep}${name}`
}

/**
 * Directory portion of a path; the root is its own parent.
 */
export function dirname(path: string): string {
  const parts = components(path)
  parts.pop()
  return sep + parts.join(sep)
}

/**
 * Last component of a path, or '' for the root.
 */
export function basename(path: string): string {
  const parts = components(path)
  return parts[parts.length - 1] ?? ''
}

/**
 * Whether `path` is `base` or lies below it.
 */
export function isWithin(base: string, path: string): boolean {
  const b = normalize(base)
  const p = normalize(path)
  if (b === sep) return p.startsWith(sep)
  return p === b || p.startsWith(b + sep)
}
