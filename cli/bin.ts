#!/usr/bin/env node
/**
 * nandfs CLI entry point
 *
 * Operates on the configured (durable) NAND in the directory given by
 * `--root` or `NANDFS_ROOT`. The directory is created and formatted on
 * first use.
 *
 * Usage:
 *   nandfs --root ./nand ls /
 *   NANDFS_ROOT=./nand nandfs put /title/save.bin hello
 *   NANDFS_ROOT=./nand nandfs --uid 1000 --gid 1 cat /title/save.bin
 */

import { runCLI } from './index.js'
import { makeFileSystem } from '../core/factory.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('[nandfs-cli]')

const context = {
  openFileSystem: (root: string | undefined) => makeFileSystem('configured', root === undefined ? {} : { root }),
  stdout: (text: string) => {
    process.stdout.write(text + '\n')
  },
  stderr: (text: string) => {
    process.stderr.write(text + '\n')
  },
}

try {
  process.exitCode = runCLI(process.argv.slice(2), context).exitCode
} catch (err: unknown) {
  logger.error('Fatal error:', err)
  process.exitCode = 1
}
