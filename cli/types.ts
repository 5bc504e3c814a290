/**
 * CLI Types for nandfs
 */

import type { FileSystem } from '../core/filesystem.js'
import type { Result } from '../core/result.js'
import type { Gid, Mode, Uid } from '../core/types.js'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  error?: string
}

/**
 * Caller identity every command runs under
 */
export interface Identity {
  uid: Uid
  gid: Gid
}

/**
 * Dependencies injected into {@link runCLI}.
 */
export interface CLIContext {
  /** Open the NAND at `root` (or the default location when undefined) */
  openFileSystem: (root: string | undefined) => Result<FileSystem>
  stdout: (text: string) => void
  stderr: (text: string) => void
}

/**
 * Entry in a directory listing
 */
export interface LsEntry {
  name: string
  isFile: boolean
  uid: Uid
  gid: Gid
  size: number
  ownerMode: Mode
  groupMode: Mode
  otherMode: Mode
}

/**
 * Options for ls output formatting
 */
export interface LsFormatOptions {
  long?: boolean
}
