/**
 * NandBackend Interface
 *
 * The storage primitive underneath the NAND engine. A backend stores the
 * superblock (the serialized file table) and one data blob per file-table
 * slot, and reports medium faults as result codes instead of throwing.
 *
 * Implementations:
 * - `MemoryBackend` - ephemeral, per-session contents
 * - `HostBackend` - durable directory on the host (storage/host-backend.ts)
 *
 * @module backend
 */

import type { ErrorCode, ResultCode } from './errors.js'
import { err, ok, type Result } from './result.js'
import type { Location } from './types.js'

// =============================================================================
// NandBackend Interface
// =============================================================================

/**
 * Pluggable storage primitive for the NAND engine.
 *
 * @example
 * ```typescript
 * class MyBackend implements NandBackend {
 *   readonly location = 'session'
 *   readSuperblock() { return ok(undefined) }
 *   // ... other methods
 * }
 *
 * const fs = NandFileSystem.mount(new MyBackend(), createConfig())
 * ```
 */
export interface NandBackend {
  /** Which location this backend implements */
  readonly location: Location

  /**
   * Read the stored superblock.
   *
   * @returns The superblock bytes, or `undefined` for a blank medium
   */
  readSuperblock(): Result<Uint8Array | undefined>

  /**
   * Replace the stored superblock.
   */
  writeSuperblock(data: Uint8Array): ResultCode

  /**
   * Read the data blob of a file-table slot. A slot never written reads as empty.
   */
  readData(slot: number): Result<Uint8Array>

  /**
   * Replace the data blob of a file-table slot.
   */
  writeData(slot: number, data: Uint8Array): ResultCode

  /**
   * Drop the data blob of a file-table slot.
   */
  eraseData(slot: number): ResultCode

  /**
   * Wipe the whole medium: superblock and every data blob.
   */
  erase(): ResultCode
}

// =============================================================================
// Fault Injection
// =============================================================================

/**
 * Backend operations that can be made to fail.
 */
export type BackendOperation = 'readSuperblock' | 'writeSuperblock' | 'readData' | 'writeData' | 'eraseData' | 'erase'

interface Fault {
  operation: BackendOperation
  code: ErrorCode
  slot?: number
  remaining: number
}

// =============================================================================
// Memory Backend
// =============================================================================

/**
 * In-memory backend for the session location.
 *
 * Contents live as long as the instance. Faults can be scheduled to exercise
 * medium-error paths.
 *
 * @example
 * ```typescript
 * const backend = new MemoryBackend()
 * backend.failNext('writeData', 'BadBlock')
 * const fs = unwrap(NandFileSystem.mount(backend, createConfig()))
 * ```
 */
export class MemoryBackend implements NandBackend {
  readonly location = 'session' as const
  private superblock: Uint8Array | undefined
  private blobs = new Map<number, Uint8Array>()
  private faults: Fault[] = []

  /**
   * Make the next `times` calls of `operation` fail with `code`.
   * With `slot`, only calls for that slot are affected.
   */
  failNext(operation: BackendOperation, code: ErrorCode, options: { slot?: number; times?: number } = {}): void {
    this.faults.push({ operation, code, slot: options.slot, remaining: options.times ?? 1 })
  }

  clearFaults(): void {
    this.faults = []
  }

  /**
   * Slots that currently hold a data blob, ascending.
   */
  storedSlots(): number[] {
    return [...this.blobs.keys()].sort((a, b) => a - b)
  }

  readSuperblock(): Result<Uint8Array | undefined> {
    const fault = this.takeFault('readSuperblock')
    if (fault) return err(fault)
    return ok(this.superblock)
  }

  writeSuperblock(data: Uint8Array): ResultCode {
    const fault = this.takeFault('writeSuperblock')
    if (fault) return fault
    this.superblock = data.slice()
    return 'Success'
  }

  readData(slot: number): Result<Uint8Array> {
    const fault = this.takeFault('readData', slot)
    if (fault) return err(fault)
    return ok(this.blobs.get(slot) ?? new Uint8Array(0))
  }

  writeData(slot: number, data: Uint8Array): ResultCode {
    const fault = this.takeFault('writeData', slot)
    if (fault) return fault
    this.blobs.set(slot, data.slice())
    return 'Success'
  }

  eraseData(slot: number): ResultCode {
    const fault = this.takeFault('eraseData', slot)
    if (fault) return fault
    this.blobs.delete(slot)
    return 'Success'
  }

  erase(): ResultCode {
    const fault = this.takeFault('erase')
    if (fault) return fault
    this.superblock = undefined
    this.blobs.clear()
    return 'Success'
  }

  private takeFault(operation: BackendOperation, slot?: number): ErrorCode | undefined {
    const index = this.faults.findIndex(
      (fault) => fault.operation === operation && (fault.slot === undefined || fault.slot === slot)
    )
    if (index === -1) return undefined

    const fault = this.faults[index]
    if (fault === undefined) return undefined
    fault.remaining--
    if (fault.remaining <= 0) {
      this.faults.splice(index, 1)
    }
    return fault.code
  }
}
