/**
 * nandfs - emulated NAND flash filesystem
 *
 * @example
 * ```typescript
 * import { makeFileSystem, unwrap } from 'nandfs'
 *
 * const fs = unwrap(makeFileSystem('configured', { root: './nand' }))
 * const stats = unwrap(fs.getNandStats())
 * ```
 *
 * @example CLI
 * ```bash
 * nandfs --root ./nand ls /
 * nandfs --root ./nand df
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'

export { runCLI, createCLI, type CLIContext, type CommandResult } from './cli/index.js'
