/**
 * HostBackend - durable NAND contents in a host directory.
 *
 * Layout under the root directory:
 *   superblock.bin     gzip of the serialized file table
 *   data/<slot>.bin    gzip of one file's content
 *
 * The superblock is written to a temporary file and renamed into place, so a
 * crash mid-write leaves the previous superblock intact. Host I/O errors are
 * reported as medium faults, never thrown:
 *
 * - data read/write/erase failure: `BadBlock`
 * - data blob that fails gzip or CRC checks: `EccError`
 * - superblock write failure: `SuperblockWriteFailed`
 * - unreadable superblock or failed wipe: `SuperblockInitFailed`
 *
 * @example
 * ```typescript
 * const backend = new HostBackend('/var/lib/nandfs')
 * const fs = unwrap(NandFileSystem.mount(backend, createConfig()))
 * ```
 *
 * @module storage/host-backend
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import type { NandBackend } from '../core/backend.js'
import { gunzipOr, gzip } from '../core/compression.js'
import type { ResultCode } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'
import { logger } from '../utils/logger.js'

const log = logger.child('host')

const SUPERBLOCK_FILE = 'superblock.bin'
const DATA_DIR = 'data'

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class HostBackend implements NandBackend {
  readonly location = 'configured' as const
  readonly root: string

  constructor(root: string) {
    this.root = root
  }

  private get superblockPath(): string {
    return join(this.root, SUPERBLOCK_FILE)
  }

  private get dataDir(): string {
    return join(this.root, DATA_DIR)
  }

  private dataPath(slot: number): string {
    return join(this.dataDir, `${slot}.bin`)
  }

  readSuperblock(): Result<Uint8Array | undefined> {
    const path = this.superblockPath
    if (!existsSync(path)) return ok(undefined)

    let raw: Uint8Array
    try {
      raw = readFileSync(path)
    } catch (error) {
      log.error(`cannot read ${path}: ${describe(error)}`)
      return err('SuperblockInitFailed')
    }
    return gunzipOr(raw, 'SuperblockInitFailed')
  }

  writeSuperblock(data: Uint8Array): ResultCode {
    const path = this.superblockPath
    const staging = `${path}.tmp`
    try {
      mkdirSync(this.root, { recursive: true })
      writeFileSync(staging, gzip(data))
      renameSync(staging, path)
      return 'Success'
    } catch (error) {
      log.error(`cannot write ${path}: ${describe(error)}`)
      return 'SuperblockWriteFailed'
    }
  }

  readData(slot: number): Result<Uint8Array> {
    const path = this.dataPath(slot)
    if (!existsSync(path)) return ok(new Uint8Array(0))

    let raw: Uint8Array
    try {
      raw = readFileSync(path)
    } catch (error) {
      log.warn(`cannot read ${path}: ${describe(error)}`)
      return err('BadBlock')
    }

    const data = gunzipOr(raw, 'EccError')
    if (!data.ok) log.warn(`corrupt data blob ${path}`)
    return data
  }

  writeData(slot: number, data: Uint8Array): ResultCode {
    const path = this.dataPath(slot)
    try {
      mkdirSync(this.dataDir, { recursive: true })
      writeFileSync(path, gzip(data))
      return 'Success'
    } catch (error) {
      log.warn(`cannot write ${path}: ${describe(error)}`)
      return 'BadBlock'
    }
  }

  eraseData(slot: number): ResultCode {
    const path = this.dataPath(slot)
    try {
      rmSync(path, { force: true })
      return 'Success'
    } catch (error) {
      log.warn(`cannot remove ${path}: ${describe(error)}`)
      return 'BadBlock'
    }
  }

  erase(): ResultCode {
    try {
      rmSync(this.dataDir, { recursive: true, force: true })
      rmSync(this.superblockPath, { force: true })
      mkdirSync(this.dataDir, { recursive: true })
      return 'Success'
    } catch (error) {
      log.error(`cannot wipe ${this.root}: ${describe(error)}`)
      return 'SuperblockInitFailed'
    }
  }
}
