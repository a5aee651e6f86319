/**
 * Persistent ORAM store - a PathOram whose server image and client state
 * live in files.
 *
 * Files, for a base path `<base>`:
 * - `<base>.oram`: server image (header + server memory)
 * - `<base>.oram-client`: client state (position map, stash, RNG state,
 *   checksum of the image it was flushed with)
 * - `<base>.oram.lock`: exists only while a flush is writing the pair
 *
 * All operations on one store run one at a time under a FIFO mutex, so
 * concurrent callers see the same results as some sequential order.
 * A file lock is taken per flush, not for the lifetime of the store.
 */

import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { fileExtensions, imageHeaderSize } from './constants'
import { deserializeImageHeader, serializeImageHeader } from './block-format'
import { ConfigurationError, CorruptStateError } from './errors'
import { FileLock } from './file-lock'
import { resolveGeometry } from './geometry'
import type { GeometryOptions } from './geometry'
import { Mutex } from './mutex'
import { PathOram } from './path-oram'
import type { OramClientState } from './path-oram'
import { createSampler, samplerFromKind } from './path-sampler'
import { ServerMemory } from './server-memory'
import { crc32, deserializeClientState, serializeClientState } from './state-format'
import type { OramGeometry, OramStats, OramStoreOptions } from './types'

const defaultLockTimeout = 10_000

// Geometry fields persisted by the store, checked against the open options
const storedFields = [
  'height',
  'blockSize',
  'bucketSize',
  'idSize',
  'blockCount',
  'stashCapacity'
] as const

export interface OramStorePaths {
  image: string
  clientState: string
  lock: string
}

export class OramStore {
  readonly paths: OramStorePaths

  private readonly oram: PathOram
  private readonly lockTimeout: number
  private readonly mutex = new Mutex()
  private dirty = false
  private closed = false

  private constructor(paths: OramStorePaths, oram: PathOram, lockTimeout: number) {
    this.paths = paths
    this.oram = oram
    this.lockTimeout = lockTimeout
  }

  /**
   * Open the store at `options.path`, or create and flush a new one when
   * neither file exists yet.
   *
   * Throws CorruptStateError if only one of the two files exists, if either
   * fails validation, or if the given options disagree with what is stored.
   */
  static async create(options: OramStoreOptions): Promise<OramStore> {
    const paths = storePaths(options.path)
    const lockTimeout = options.lockTimeout ?? defaultLockTimeout

    const image = await readIfExists(paths.image)
    const clientState = await readIfExists(paths.clientState)

    if (!image && !clientState) {
      const store = new OramStore(paths, OramStore.initialize(options), lockTimeout)
      store.dirty = true
      await store.flush()
      return store
    }

    if (!image) {
      throw new CorruptStateError(paths.image, 'server image is missing')
    }
    if (!clientState) {
      throw new CorruptStateError(paths.clientState, 'client state is missing')
    }

    const oram = OramStore.load(paths, options, image, clientState)
    return new OramStore(paths, oram, lockTimeout)
  }

  get geometry(): OramGeometry {
    return this.oram.geometry
  }

  get blockCount(): number {
    return this.oram.blockCount
  }

  /**
   * Read a block. Never-written blocks read as zeroes.
   */
  async read(blockId: number): Promise<Uint8Array> {
    return this.mutex.runExclusive(() => {
      this.assertOpen()
      // Reads remap the block and move others, so state changes too
      this.dirty = true
      return this.oram.read(blockId)
    })
  }

  async write(blockId: number, data: Uint8Array): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.assertOpen()
      this.dirty = true
      this.oram.write(blockId, data)
    })
  }

  /**
   * Write the server image and client state to disk under the file lock.
   * Each file is written to a temporary path and renamed into place.
   */
  async flush(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      this.assertOpen()
      await this.flushUnlocked()
    })
  }

  /**
   * Flush pending changes and refuse further operations.
   */
  async close(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.closed) {
        return
      }
      await this.flushUnlocked()
      this.closed = true
    })
  }

  stats(): OramStats {
    return this.oram.stats()
  }

  private async flushUnlocked(): Promise<void> {
    if (!this.dirty) {
      return
    }

    const header = serializeImageHeader(this.oram.geometry)
    const memory = this.oram.memory.bytes
    const image = new Uint8Array(header.length + memory.length)
    image.set(header, 0)
    image.set(memory, header.length)

    const clientState = serializeClientState(
      { ...this.oram.exportState(), imageChecksum: crc32(memory) },
      this.oram.geometry.blockSize
    )

    await mkdir(dirname(this.paths.image), { recursive: true })

    const fileLock = new FileLock(this.paths.lock, this.lockTimeout)
    await fileLock.acquire()

    try {
      await writeAtomically(this.paths.image, image)
      await writeAtomically(this.paths.clientState, clientState)
      this.dirty = false
    } finally {
      await fileLock.release()
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`ORAM store is closed: ${this.paths.image}`)
    }
  }

  private static initialize(options: OramStoreOptions): PathOram {
    if (options.height === undefined || options.blockSize === undefined) {
      throw new ConfigurationError(
        `height and blockSize are required to create a new store at ${options.path}`
      )
    }

    const seed = options.seed ?? BigInt(Date.now())
    const oram = new PathOram({
      height: options.height,
      blockSize: options.blockSize,
      bucketSize: options.bucketSize,
      idSize: options.idSize,
      blockCount: options.blockCount,
      stashCapacity: options.stashCapacity,
      sampler: createSampler(options.sampler ?? 'xorshift', seed)
    })
    oram.initialize(seed)
    return oram
  }

  private static load(
    paths: OramStorePaths,
    options: OramStoreOptions,
    image: Uint8Array,
    clientStateData: Uint8Array
  ): PathOram {
    const header = deserializeImageHeader(image)
    if (!header) {
      throw new CorruptStateError(paths.image, 'invalid server image header')
    }

    const state = deserializeClientState(clientStateData, header.blockSize)
    if (!state) {
      throw new CorruptStateError(paths.clientState, 'invalid or corrupted client state')
    }

    const stored: Required<GeometryOptions> = {
      height: header.height,
      blockSize: header.blockSize,
      bucketSize: header.bucketSize,
      idSize: header.idSize,
      blockCount: state.blockCount,
      stashCapacity: state.stashCapacity
    }

    for (const name of storedFields) {
      const requested = options[name]
      if (requested !== undefined && requested !== stored[name]) {
        throw new CorruptStateError(
          paths.image,
          `store has ${name} ${stored[name]}, but ${requested} was requested`
        )
      }
    }

    const geometry = resolveStoredGeometry(paths.image, stored)

    if (image.length !== imageHeaderSize + geometry.byteLength) {
      throw new CorruptStateError(
        paths.image,
        `expected ${imageHeaderSize + geometry.byteLength} bytes, found ${image.length}`
      )
    }

    // The two files are renamed one after the other; a crash in between
    // leaves a client state from another flush next to the image
    const memory = image.subarray(imageHeaderSize)
    if (crc32(memory) !== state.imageChecksum) {
      throw new CorruptStateError(
        paths.clientState,
        'client state does not belong to the server image'
      )
    }

    const problem = checkClientState(state, geometry.leafCount)
    if (problem) {
      throw new CorruptStateError(paths.clientState, problem)
    }

    const sampler = samplerFromKind(state.samplerKind, state.rngState)
    if (!sampler) {
      throw new CorruptStateError(paths.clientState, 'invalid sampler state')
    }

    const oram = new PathOram({
      ...stored,
      sampler,
      memory: new ServerMemory(geometry, new Uint8Array(memory))
    })
    oram.loadState(state)
    return oram
  }
}

/**
 * File paths of a store, with any store extension stripped from `path`.
 */
export function storePaths(path: string): OramStorePaths {
  let basePath = path
  for (const extension of [fileExtensions.clientState, fileExtensions.image]) {
    if (basePath.endsWith(extension)) {
      basePath = basePath.slice(0, -extension.length)
      break
    }
  }

  return {
    image: basePath + fileExtensions.image,
    clientState: basePath + fileExtensions.clientState,
    lock: basePath + fileExtensions.lock
  }
}

/**
 * Whether either file of the store at `path` exists.
 */
export async function storeExists(path: string): Promise<boolean> {
  const paths = storePaths(path)
  return (await fileExists(paths.image)) || (await fileExists(paths.clientState))
}

function resolveStoredGeometry(
  imagePath: string,
  stored: GeometryOptions
): OramGeometry {
  try {
    return resolveGeometry(stored).geometry
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new CorruptStateError(imagePath, error.message)
    }
    throw error
  }
}

/**
 * Returns a description of the first inconsistency, or null.
 */
function checkClientState(state: OramClientState, leafCount: number): string | null {
  for (const leaf of state.positions) {
    if (leaf >= leafCount) {
      return `leaf ${leaf} is out of range`
    }
  }

  const seen = new Set<number>()
  for (const id of state.written) {
    if (id >= state.blockCount || seen.has(id)) {
      return `written id ${id} is invalid`
    }
    seen.add(id)
  }

  if (state.stash.length > state.stashCapacity) {
    return `stash holds ${state.stash.length} blocks, capacity is ${state.stashCapacity}`
  }
  seen.clear()
  for (const block of state.stash) {
    if (block.id >= state.blockCount || seen.has(block.id)) {
      return `stash id ${block.id} is invalid`
    }
    seen.add(block.id)
  }

  return null
}

async function readIfExists(filePath: string): Promise<Uint8Array | null> {
  try {
    return await readFile(filePath)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null
    }
    throw error
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath)
    return true
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}

async function writeAtomically(filePath: string, data: Uint8Array): Promise<void> {
  const tempPath = `${filePath}.tmp`
  await writeFile(tempPath, data)
  await rename(tempPath, filePath)
}
