/**
 * NandFileSystem - the NAND filesystem engine.
 *
 * Owns the file table, the descriptor table, permission evaluation and quota
 * accounting, and persists the file table through a {@link NandBackend}
 * whenever it changes. Every operation returns a result instead of
 * throwing; an operation that fails after touching the in-memory table rolls
 * its change back before returning.
 *
 * @example
 * ```typescript
 * const mounted = NandFileSystem.mount(new MemoryBackend(), createConfig())
 * if (mounted.ok) {
 *   const fs = mounted.value
 *   fs.createDirectory(0, 0, '/title', 0, Mode.ReadWrite, Mode.ReadWrite, Mode.Read)
 * }
 * ```
 *
 * @module core/engine
 */

import type { NandBackend } from './backend.js'
import { usableClusters, type NandConfig } from './config.js'
import { MAX_ATTRIBUTE, MAX_OFFSET } from './constants.js'
import type { ResultCode } from './errors.js'
import type { FileSystem } from './filesystem.js'
import {
  ROOT_SLOT,
  clustersFor,
  decodeSuperblock,
  encodeSuperblock,
  fromRecords,
  subtreeUsage,
  toRecords,
  type FileTable,
  type FstEntry,
} from './fst.js'
import { FileHandle } from './handle.js'
import { parsePath } from './path.js'
import { hasPermission } from './permissions.js'
import { err, ok, type Result } from './result.js'
import { decodeSnapshot, encodeSnapshot, type DescriptorRecord } from './snapshot.js'
import {
  Mode,
  SeekMode,
  isMode,
  isSeekMode,
  type DirectoryStats,
  type EntryAttributes,
  type Fd,
  type FileAttribute,
  type FileStatus,
  type Gid,
  type Location,
  type Metadata,
  type NandStats,
  type Uid,
} from './types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('engine')

/**
 * An open descriptor.
 */
interface Descriptor {
  slot: number
  mode: Exclude<Mode, 0>
  offset: number
  uid: Uid
  gid: Gid
}

/**
 * Engine state captured before a restore.
 */
interface SavedState {
  table: FileTable
  handles: Array<Descriptor | undefined>
  data: Array<{ slot: number; data: Uint8Array }>
}

function isId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffffffff
}

function isValidAttributes(attrs: EntryAttributes): boolean {
  return (
    Number.isInteger(attrs.attribute) &&
    attrs.attribute >= 0 &&
    attrs.attribute <= MAX_ATTRIBUTE &&
    isMode(attrs.ownerMode) &&
    isMode(attrs.groupMode) &&
    isMode(attrs.otherMode)
  )
}

export class NandFileSystem implements FileSystem {
  readonly config: NandConfig
  private readonly backend: NandBackend
  private table: FileTable
  private handles: Array<Descriptor | undefined>

  private constructor(backend: NandBackend, config: NandConfig, table: FileTable) {
    this.backend = backend
    this.config = config
    this.table = table
    this.handles = new Array<Descriptor | undefined>(config.maxHandles).fill(undefined)
  }

  /**
   * Attach an engine to a backend. A blank medium is formatted with the
   * privileged uid as the root owner; an existing superblock is loaded.
   *
   * @returns `SuperblockInitFailed` if the stored superblock cannot be read
   *          or does not describe a valid table
   */
  static mount(backend: NandBackend, config: NandConfig): Result<NandFileSystem> {
    const stored = backend.readSuperblock()
    if (!stored.ok) {
      log.error(`superblock read failed: ${stored.code}`)
      return err('SuperblockInitFailed')
    }

    if (stored.value === undefined) {
      const fs = new NandFileSystem(backend, config, [])
      const code = fs.format(config.superUid)
      return code === 'Success' ? ok(fs) : err(code)
    }

    const table = decodeSuperblock(stored.value, config)
    if (!table.ok) {
      log.error('stored superblock is not a valid file table')
      return err('SuperblockInitFailed')
    }
    log.debug(`mounted ${backend.location} medium`)
    return ok(new NandFileSystem(backend, config, table.value))
  }

  get location(): Location {
    return this.backend.location
  }

  // ===========================================================================
  // Medium
  // ===========================================================================

  format(uid: Uid): ResultCode {
    if (!isId(uid)) return 'Invalid'

    const erased = this.backend.erase()
    if (erased !== 'Success') {
      log.error(`medium erase failed: ${erased}`)
      return 'SuperblockInitFailed'
    }

    const table: FileTable = new Array<FstEntry | undefined>(this.config.totalInodes).fill(undefined)
    table[ROOT_SLOT] = {
      name: '',
      parent: -1,
      isFile: false,
      uid,
      gid: 0,
      attribute: 0,
      ownerMode: Mode.ReadWrite,
      groupMode: Mode.ReadWrite,
      otherMode: Mode.ReadWrite,
      size: 0,
      children: [],
    }
    this.table = table
    this.handles.fill(undefined)

    log.info(`formatted ${this.backend.location} medium, root owned by uid ${uid}`)
    return this.flush()
  }

  // ===========================================================================
  // Descriptors
  // ===========================================================================

  openFile(uid: Uid, gid: Gid, path: string, mode: Mode): Result<FileHandle> {
    if (!isMode(mode) || mode === Mode.None) return err('Invalid')

    const slot = this.lookup(path)
    if (!slot.ok) return slot
    const entry = this.entryAt(slot.value)

    if (!entry.isFile) return err('Invalid')
    if (!this.permits(entry, uid, gid, mode)) return err('AccessDenied')

    const fd = this.handles.findIndex((descriptor) => descriptor === undefined)
    if (fd === -1) return err('NoFreeHandle')

    this.handles[fd] = { slot: slot.value, mode, offset: 0, uid, gid }
    return ok(new FileHandle(this, fd))
  }

  close(fd: Fd): ResultCode {
    if (!this.descriptor(fd)) return 'Invalid'
    this.handles[fd] = undefined
    return 'Success'
  }

  readBytesFromFile(fd: Fd, buffer: Uint8Array): Result<number> {
    const descriptor = this.descriptor(fd)
    if (!descriptor) return err('Invalid')
    if ((descriptor.mode & Mode.Read) === 0) return err('AccessDenied')

    const entry = this.entryAt(descriptor.slot)
    if (descriptor.offset >= entry.size || buffer.byteLength === 0) return ok(0)

    const stored = this.backend.readData(descriptor.slot)
    if (!stored.ok) {
      log.warn(`read of slot ${descriptor.slot} failed: ${stored.code}`)
      return stored
    }

    const count = Math.min(buffer.byteLength, entry.size - descriptor.offset)
    const chunk = stored.value.subarray(descriptor.offset, descriptor.offset + count)
    buffer.set(chunk)
    // Past the stored bytes the file reads as zeros
    buffer.fill(0, chunk.byteLength, count)

    descriptor.offset += count
    return ok(count)
  }

  writeBytesToFile(fd: Fd, data: Uint8Array): Result<number> {
    const descriptor = this.descriptor(fd)
    if (!descriptor) return err('Invalid')
    if ((descriptor.mode & Mode.Write) === 0) return err('AccessDenied')
    if (data.byteLength === 0) return ok(0)

    const entry = this.entryAt(descriptor.slot)
    const end = descriptor.offset + data.byteLength
    if (end > MAX_OFFSET) return err('NoFreeSpace')

    const newSize = Math.max(entry.size, end)
    const extraClusters =
      clustersFor(newSize, this.config.clusterSize) - clustersFor(entry.size, this.config.clusterSize)
    if (extraClusters > this.freeClusters()) return err('NoFreeSpace')

    const stored = this.backend.readData(descriptor.slot)
    if (!stored.ok) return stored
    const previous = stored.value.subarray(0, entry.size)

    const content = new Uint8Array(newSize)
    content.set(previous)
    content.set(data, descriptor.offset)

    const written = this.backend.writeData(descriptor.slot, content)
    if (written !== 'Success') {
      log.warn(`write of slot ${descriptor.slot} failed: ${written}`)
      return err(written)
    }

    if (newSize !== entry.size) {
      const oldSize = entry.size
      entry.size = newSize
      const code = this.commit(() => {
        entry.size = oldSize
        this.restoreData(descriptor.slot, previous)
      })
      if (code !== 'Success') return err(code)
    }

    descriptor.offset = end
    return ok(data.byteLength)
  }

  seekFile(fd: Fd, offset: number, mode: SeekMode): Result<number> {
    const descriptor = this.descriptor(fd)
    if (!descriptor) return err('Invalid')
    if (!isSeekMode(mode) || !Number.isInteger(offset)) return err('Invalid')

    let base: number
    switch (mode) {
      case SeekMode.Set:
        base = 0
        break
      case SeekMode.Current:
        base = descriptor.offset
        break
      case SeekMode.End:
        base = this.entryAt(descriptor.slot).size
        break
      default:
        return err('Invalid')
    }

    const next = base + offset
    if (next < 0 || next > MAX_OFFSET) return err('Invalid')

    descriptor.offset = next
    return ok(next)
  }

  getFileStatus(fd: Fd): Result<FileStatus> {
    const descriptor = this.descriptor(fd)
    if (!descriptor) return err('Invalid')
    return ok({ offset: descriptor.offset, size: this.entryAt(descriptor.slot).size })
  }

  // ===========================================================================
  // Entries
  // ===========================================================================

  createFile(
    callerUid: Uid,
    callerGid: Gid,
    path: string,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode {
    return this.createEntry(callerUid, callerGid, path, true, { attribute, ownerMode, groupMode, otherMode })
  }

  createDirectory(
    callerUid: Uid,
    callerGid: Gid,
    path: string,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode {
    return this.createEntry(callerUid, callerGid, path, false, { attribute, ownerMode, groupMode, otherMode })
  }

  delete(callerUid: Uid, callerGid: Gid, path: string): ResultCode {
    const parts = parsePath(path, this.config)
    if (!parts.ok) return parts.code
    if (parts.value.length === 0) return 'Invalid'

    const slot = this.resolve(parts.value)
    if (!slot.ok) return slot.code
    const entry = this.entryAt(slot.value)
    const parent = this.entryAt(entry.parent)

    if (!this.permits(parent, callerUid, callerGid, Mode.Write)) return 'AccessDenied'
    if (!entry.isFile && entry.children.length > 0) return 'FileNotEmpty'
    if (entry.isFile && this.isOpen(slot.value)) return 'InUse'

    const position = parent.children.indexOf(slot.value)
    parent.children.splice(position, 1)
    this.table[slot.value] = undefined

    const code = this.commit(() => {
      parent.children.splice(position, 0, slot.value)
      this.table[slot.value] = entry
    })
    if (code !== 'Success') return code

    if (entry.isFile) this.discardData(slot.value)
    return 'Success'
  }

  rename(callerUid: Uid, callerGid: Gid, oldPath: string, newPath: string): ResultCode {
    const oldParts = parsePath(oldPath, this.config)
    if (!oldParts.ok) return oldParts.code
    const newParts = parsePath(newPath, this.config)
    if (!newParts.ok) return newParts.code
    if (oldParts.value.length === 0 || newParts.value.length === 0) return 'Invalid'

    const source = this.resolve(oldParts.value)
    if (!source.ok) return source.code
    const target = this.resolveParent(newParts.value)
    if (!target.ok) return target.code

    const sourceSlot = source.value
    const entry = this.entryAt(sourceSlot)
    const oldParent = this.entryAt(entry.parent)
    const newParentSlot = target.value.parent
    const newParent = this.entryAt(newParentSlot)
    const newName = target.value.name

    if (!this.permits(oldParent, callerUid, callerGid, Mode.Write)) return 'AccessDenied'
    if (!this.permits(newParent, callerUid, callerGid, Mode.Write)) return 'AccessDenied'

    if (entry.parent === newParentSlot && entry.name === newName) return 'Success'
    if (!entry.isFile && this.isAncestor(sourceSlot, newParentSlot)) return 'Invalid'

    const bounds = this.checkMovedPaths(sourceSlot, newParentSlot, newName)
    if (bounds !== 'Success') return bounds

    const replacedSlot = this.childSlot(newParent, newName)
    const replaced = replacedSlot === undefined ? undefined : this.entryAt(replacedSlot)
    if (replacedSlot !== undefined && replaced) {
      if (replaced.isFile !== entry.isFile) return 'Invalid'
      if (!replaced.isFile && replaced.children.length > 0) return 'FileNotEmpty'
      if (replaced.isFile && this.isOpen(replacedSlot)) return 'InUse'
    }

    // Detach the source, drop the replaced entry, then attach under the new name
    const oldName = entry.name
    const oldParentSlot = entry.parent
    const oldPosition = oldParent.children.indexOf(sourceSlot)
    oldParent.children.splice(oldPosition, 1)

    let replacedPosition = -1
    if (replacedSlot !== undefined) {
      replacedPosition = newParent.children.indexOf(replacedSlot)
      newParent.children.splice(replacedPosition, 1)
      this.table[replacedSlot] = undefined
    }

    entry.name = newName
    entry.parent = newParentSlot
    newParent.children.push(sourceSlot)

    const code = this.commit(() => {
      newParent.children.pop()
      entry.name = oldName
      entry.parent = oldParentSlot
      if (replacedSlot !== undefined && replaced) {
        this.table[replacedSlot] = replaced
        newParent.children.splice(replacedPosition, 0, replacedSlot)
      }
      oldParent.children.splice(oldPosition, 0, sourceSlot)
    })
    if (code !== 'Success') return code

    if (replacedSlot !== undefined && replaced?.isFile) this.discardData(replacedSlot)
    return 'Success'
  }

  readDirectory(callerUid: Uid, callerGid: Gid, path: string): Result<string[]> {
    const slot = this.lookup(path)
    if (!slot.ok) return slot
    const entry = this.entryAt(slot.value)

    if (entry.isFile) return err('Invalid')
    if (!this.permits(entry, callerUid, callerGid, Mode.Read)) return err('AccessDenied')

    return ok(entry.children.map((child) => this.entryAt(child).name))
  }

  getMetadata(callerUid: Uid, callerGid: Gid, path: string): Result<Metadata> {
    const slot = this.lookup(path)
    if (!slot.ok) return slot
    const entry = this.entryAt(slot.value)

    if (slot.value !== ROOT_SLOT && !this.permits(this.entryAt(entry.parent), callerUid, callerGid, Mode.Read)) {
      return err('AccessDenied')
    }

    return ok({
      uid: entry.uid,
      gid: entry.gid,
      attribute: entry.attribute,
      ownerMode: entry.ownerMode,
      groupMode: entry.groupMode,
      otherMode: entry.otherMode,
      isFile: entry.isFile,
      size: entry.size,
      fstIndex: slot.value,
    })
  }

  setMetadata(
    callerUid: Uid,
    path: string,
    uid: Uid,
    gid: Gid,
    attribute: FileAttribute,
    ownerMode: Mode,
    groupMode: Mode,
    otherMode: Mode
  ): ResultCode {
    const attrs: EntryAttributes = { attribute, ownerMode, groupMode, otherMode }
    if (!isId(uid) || !isId(gid) || !isValidAttributes(attrs)) return 'Invalid'

    const slot = this.lookup(path)
    if (!slot.ok) return slot.code
    const entry = this.entryAt(slot.value)

    const privileged = callerUid === this.config.superUid
    if (!privileged && callerUid !== entry.uid) return 'AccessDenied'
    if (!privileged && uid !== entry.uid) return 'AccessDenied'
    if (entry.isFile && entry.size !== 0 && uid !== entry.uid) return 'FileNotEmpty'

    const previous = { ...entry }
    Object.assign(entry, { uid, gid, ...attrs })

    return this.commit(() => {
      Object.assign(entry, previous)
    })
  }

  // ===========================================================================
  // Usage
  // ===========================================================================

  getNandStats(): Result<NandStats> {
    return ok(this.computeStats(this.table))
  }

  getDirectoryStats(path: string): Result<DirectoryStats> {
    const slot = this.lookup(path)
    if (!slot.ok) return slot
    if (this.entryAt(slot.value).isFile) return err('Invalid')
    return ok(subtreeUsage(this.table, slot.value, this.config.clusterSize))
  }

  // ===========================================================================
  // Save State
  // ===========================================================================

  snapshot(): Result<Uint8Array> {
    const data = this.collectData()
    if (!data.ok) return data

    const handles: DescriptorRecord[] = []
    this.handles.forEach((descriptor, fd) => {
      if (descriptor) handles.push({ fd, ...descriptor })
    })

    return ok(
      encodeSnapshot({
        geometry: {
          clusterSize: this.config.clusterSize,
          totalClusters: this.config.totalClusters,
          reservedClusters: this.config.reservedClusters,
          badClusters: this.config.badClusters,
          totalInodes: this.config.totalInodes,
          maxHandles: this.config.maxHandles,
        },
        entries: toRecords(this.table),
        data: data.value,
        handles,
        stats: this.computeStats(this.table),
      })
    )
  }

  restore(blob: Uint8Array): ResultCode {
    const decoded = decodeSnapshot(blob)
    if (!decoded.ok) return decoded.code
    const state = decoded.value

    const { geometry } = state
    if (
      geometry.clusterSize !== this.config.clusterSize ||
      geometry.totalClusters !== this.config.totalClusters ||
      geometry.reservedClusters !== this.config.reservedClusters ||
      geometry.badClusters !== this.config.badClusters ||
      geometry.totalInodes !== this.config.totalInodes ||
      geometry.maxHandles !== this.config.maxHandles
    ) {
      return 'Invalid'
    }

    const rebuilt = fromRecords(state.entries, this.config)
    if (!rebuilt.ok) return rebuilt.code
    const table = rebuilt.value

    const stats = this.computeStats(table)
    const recorded = state.stats
    if (
      stats.usedClusters !== recorded.usedClusters ||
      stats.freeClusters !== recorded.freeClusters ||
      stats.usedInodes !== recorded.usedInodes ||
      stats.freeInodes !== recorded.freeInodes ||
      stats.badClusters !== recorded.badClusters ||
      stats.reservedClusters !== recorded.reservedClusters ||
      stats.clusterSize !== recorded.clusterSize
    ) {
      return 'CheckFailed'
    }

    const seenData = new Set<number>()
    for (const { slot, data } of state.data) {
      const entry = table[slot]
      if (!entry?.isFile || entry.size !== data.byteLength || seenData.has(slot)) return 'CheckFailed'
      seenData.add(slot)
    }
    // Every non-empty file must carry its content
    for (const [slot, entry] of table.entries()) {
      if (entry?.isFile && entry.size > 0 && !seenData.has(slot)) return 'CheckFailed'
    }

    const handles = new Array<Descriptor | undefined>(this.config.maxHandles).fill(undefined)
    for (const { fd, slot, mode, offset, uid, gid } of state.handles) {
      if (fd >= handles.length || handles[fd] || !table[slot]?.isFile) return 'CheckFailed'
      handles[fd] = { slot, mode, offset, uid, gid }
    }

    // Keep the current contents so a failure below can put them back
    const saved = this.collectData()
    if (!saved.ok) return saved.code
    const previous: SavedState = { table: this.table, handles: this.handles, data: saved.value }

    const erased = this.backend.erase()
    if (erased !== 'Success') {
      log.error(`medium erase failed during restore: ${erased}`)
      this.reinstate(previous)
      return 'SuperblockInitFailed'
    }
    for (const { slot, data } of state.data) {
      const written = this.backend.writeData(slot, data)
      if (written !== 'Success') {
        log.error(`restore of slot ${slot} failed: ${written}`)
        this.reinstate(previous)
        return written
      }
    }

    this.table = table
    this.handles = handles
    const code = this.commit(() => this.reinstate(previous))
    if (code === 'Success') {
      log.info(`restored snapshot: ${stats.usedInodes} entries, ${state.handles.length} open descriptors`)
    }
    return code
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private createEntry(uid: Uid, gid: Gid, path: string, isFile: boolean, attrs: EntryAttributes): ResultCode {
    if (!isValidAttributes(attrs) || !isId(uid) || !isId(gid)) return 'Invalid'

    const parts = parsePath(path, this.config)
    if (!parts.ok) return parts.code
    if (parts.value.length === 0) return 'Invalid'

    const target = this.resolveParent(parts.value)
    if (!target.ok) return target.code
    const parent = this.entryAt(target.value.parent)

    if (!this.permits(parent, uid, gid, Mode.Write)) return 'AccessDenied'
    if (this.childSlot(parent, target.value.name) !== undefined) return 'AlreadyExists'

    const slot = this.table.findIndex((entry, index) => index !== ROOT_SLOT && entry === undefined)
    if (slot === -1) return 'FstFull'

    this.table[slot] = {
      name: target.value.name,
      parent: target.value.parent,
      isFile,
      uid,
      gid,
      ...attrs,
      size: 0,
      children: [],
    }
    parent.children.push(slot)

    return this.commit(() => {
      parent.children.pop()
      this.table[slot] = undefined
    })
  }

  /**
   * Parse and resolve a path to a slot.
   */
  private lookup(path: string): Result<number> {
    const parts = parsePath(path, this.config)
    if (!parts.ok) return parts
    return this.resolve(parts.value)
  }

  /**
   * Walk components from the root. A file in the middle of a path is `Invalid`.
   */
  private resolve(parts: string[]): Result<number> {
    let slot = ROOT_SLOT
    for (const name of parts) {
      const entry = this.entryAt(slot)
      if (entry.isFile) return err('Invalid')
      const child = this.childSlot(entry, name)
      if (child === undefined) return err('NotFound')
      slot = child
    }
    return ok(slot)
  }

  /**
   * Resolve every component but the last, which must name a directory.
   */
  private resolveParent(parts: string[]): Result<{ parent: number; name: string }> {
    const name = parts[parts.length - 1]
    if (name === undefined) return err('Invalid')

    const parent = this.resolve(parts.slice(0, -1))
    if (!parent.ok) return parent
    if (this.entryAt(parent.value).isFile) return err('Invalid')
    return ok({ parent: parent.value, name })
  }

  private childSlot(dir: FstEntry, name: string): number | undefined {
    return dir.children.find((child) => this.table[child]?.name === name)
  }

  /**
   * Entry at a slot known to be occupied. Slots reached through the tree or
   * an open descriptor always are; an empty slot here is a broken table.
   */
  private entryAt(slot: number): FstEntry {
    const entry = this.table[slot]
    if (!entry) {
      throw new Error(`file table slot ${slot} is empty`)
    }
    return entry
  }

  private descriptor(fd: Fd): Descriptor | undefined {
    if (!Number.isInteger(fd) || fd < 0 || fd >= this.handles.length) return undefined
    return this.handles[fd]
  }

  private isOpen(slot: number): boolean {
    return this.handles.some((descriptor) => descriptor?.slot === slot)
  }

  private isAncestor(ancestor: number, slot: number): boolean {
    let current = slot
    while (current !== -1) {
      if (current === ancestor) return true
      current = this.entryAt(current).parent
    }
    return false
  }

  /**
   * Check that every path in the subtree at `slot` stays within the depth
   * and length bounds once the subtree sits under `parent` as `name`.
   */
  private checkMovedPaths(slot: number, parent: number, name: string): ResultCode {
    let depth = 1
    let length = 1 + name.length
    for (let current = parent; current !== ROOT_SLOT; ) {
      const ancestor = this.entryAt(current)
      depth++
      length += 1 + ancestor.name.length
      current = ancestor.parent
    }

    const below = this.extentBelow(slot)
    if (depth + below.depth > this.config.maxPathDepth) return 'TooManyPathComponents'
    if (length + below.length > this.config.maxPathLength) return 'Invalid'
    return 'Success'
  }

  /**
   * Most components and most characters any descendant adds to the path of `slot`.
   */
  private extentBelow(slot: number): { depth: number; length: number } {
    const extent = { depth: 0, length: 0 }
    for (const child of this.entryAt(slot).children) {
      const sub = this.extentBelow(child)
      extent.depth = Math.max(extent.depth, 1 + sub.depth)
      extent.length = Math.max(extent.length, 1 + this.entryAt(child).name.length + sub.length)
    }
    return extent
  }

  private permits(entry: FstEntry, uid: Uid, gid: Gid, requested: Mode): boolean {
    return hasPermission(entry, uid, gid, requested, this.config.superUid)
  }

  private freeClusters(): number {
    return this.computeStats(this.table).freeClusters
  }

  private computeStats(table: FileTable): NandStats {
    const usage = subtreeUsage(table, ROOT_SLOT, this.config.clusterSize)
    return {
      clusterSize: this.config.clusterSize,
      freeClusters: Math.max(0, usableClusters(this.config) - usage.usedClusters),
      usedClusters: usage.usedClusters,
      badClusters: this.config.badClusters,
      reservedClusters: this.config.reservedClusters,
      freeInodes: this.config.totalInodes - usage.usedInodes,
      usedInodes: usage.usedInodes,
    }
  }

  /**
   * Persist the file table; on failure run `undo` so memory matches the medium.
   */
  private commit(undo: () => void): ResultCode {
    const code = this.flush()
    if (code !== 'Success') undo()
    return code
  }

  private flush(): ResultCode {
    const code = this.backend.writeSuperblock(encodeSuperblock(this.table))
    if (code !== 'Success') {
      log.error(`superblock write failed: ${code}`)
      return 'SuperblockWriteFailed'
    }
    return 'Success'
  }

  /**
   * Content of every non-empty file, padded to its size.
   */
  private collectData(): Result<Array<{ slot: number; data: Uint8Array }>> {
    const data: Array<{ slot: number; data: Uint8Array }> = []
    for (const [slot, entry] of this.table.entries()) {
      if (!entry?.isFile || entry.size === 0) continue
      const stored = this.backend.readData(slot)
      if (!stored.ok) return stored

      // Sparse tails read as zeros; record them that way
      const content = new Uint8Array(entry.size)
      content.set(stored.value.subarray(0, entry.size))
      data.push({ slot, data: content })
    }
    return ok(data)
  }

  /**
   * Put back the state captured before a restore, in memory and on the medium.
   */
  private reinstate(state: SavedState): void {
    this.table = state.table
    this.handles = state.handles

    const erased = this.backend.erase()
    if (erased !== 'Success') {
      log.error(`medium erase failed while reinstating: ${erased}`)
    }
    for (const { slot, data } of state.data) {
      this.restoreData(slot, data)
    }
    if (this.flush() !== 'Success') {
      log.error('previous superblock could not be written back')
    }
  }

  private restoreData(slot: number, data: Uint8Array): void {
    const code = this.backend.writeData(slot, data)
    if (code !== 'Success') {
      log.error(`rollback of slot ${slot} failed: ${code}`)
    }
  }

  /**
   * Drop the data of a slot that has left the table. A failure only leaves
   * an orphaned blob behind, since a reused slot starts at size 0.
   */
  private discardData(slot: number): void {
    const code = this.backend.eraseData(slot)
    if (code !== 'Success') {
      log.warn(`could not erase data of slot ${slot}: ${code}`)
    }
  }
}
