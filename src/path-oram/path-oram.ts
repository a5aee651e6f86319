import invariant from 'tiny-invariant'
import { ResourcePool } from '../containers/resource-pool'
import { SparseSet } from '../containers/sparse-set'
import { emptyBlockId, oramOp } from './constants'
import { ConfigurationError, StashOverflowError } from './errors'
import { resolveGeometry } from './geometry'
import { Xorshift64Sampler } from './path-sampler'
import { PositionMap } from './position-map'
import { ServerMemory } from './server-memory'
import type {
  Bucket,
  BucketObserver,
  IdBlock,
  OramGeometry,
  OramOp,
  OramStats,
  PathOramOptions,
  PathSampler,
  SamplerKind
} from './types'

/**
 * Everything the client must keep to resume an ORAM later.
 */
export interface OramClientState {
  samplerKind: SamplerKind
  rngState: bigint
  blockCount: number
  stashCapacity: number
  positions: Uint32Array
  written: number[]
  stash: IdBlock[]
}

/**
 * Path-ORAM client over an untrusted server memory.
 *
 * Every access reads one whole root-to-leaf path into the stash and writes
 * the same path back, evicting stash blocks as deep as their assigned
 * leaves allow. The physical buckets touched depend only on a leaf chosen
 * uniformly at random, never on which block was requested or whether it
 * was a read or a write.
 *
 * Call `initialize` (or `loadState`) before the first access.
 */
export class PathOram {
  readonly geometry: OramGeometry
  readonly blockCount: number
  readonly memory: ServerMemory

  private readonly sampler: PathSampler
  private readonly positions: PositionMap
  private readonly stash: ResourcePool<Uint8Array>
  private readonly written: SparseSet
  private readonly onBucketAccess?: BucketObserver

  // Reused buffers for the path being read and the bucket being written
  private readonly pathBuckets: Bucket[]
  private readonly outgoing: Bucket

  private initialized = false
  private accesses = 0
  private overflows = 0
  private peakStashSize = 0

  constructor(options: PathOramOptions) {
    const { geometry, blockCount, stashCapacity } = resolveGeometry(options)

    if (options.memory && !sameGeometry(options.memory.geometry, geometry)) {
      throw new ConfigurationError(
        'Server memory geometry does not match the ORAM options'
      )
    }

    this.geometry = geometry
    this.blockCount = blockCount
    this.memory = options.memory ?? new ServerMemory(geometry)
    this.sampler = options.sampler ?? new Xorshift64Sampler(BigInt(Date.now()))
    this.positions = PositionMap.create(blockCount)
    this.stash = new ResourcePool(
      blockCount,
      stashCapacity,
      () => new Uint8Array(geometry.blockSize)
    )
    this.written = new SparseSet(blockCount)
    this.onBucketAccess = options.onBucketAccess

    this.pathBuckets = Array.from({ length: geometry.height + 1 }, () =>
      this.memory.createBucket()
    )
    this.outgoing = this.memory.createBucket()
  }

  /**
   * Reseed the sampler, mark every server slot empty and assign every block
   * a fresh leaf. Payload bytes in server memory are left as they are.
   */
  initialize(seed: bigint): void {
    this.sampler.seed(seed)
    this.memory.clearIds()
    this.positions.fill(this.sampler, this.geometry.leafCount)
    this.stash.clear()
    this.written.clear()
    this.accesses = 0
    this.overflows = 0
    this.peakStashSize = 0
    this.initialized = true
  }

  /**
   * Read a block into `out` (allocated when omitted). A block that was never
   * written reads as zeroes.
   */
  read(blockId: number, out?: Uint8Array): Uint8Array {
    const buffer = out ?? new Uint8Array(this.geometry.blockSize)
    this.access(oramOp.read, blockId, buffer)
    return buffer
  }

  write(blockId: number, data: Uint8Array): void {
    this.access(oramOp.write, blockId, data)
  }

  /**
   * Perform one oblivious access. On a read, `payload` receives the block;
   * on a write, it supplies the new contents.
   *
   * Throws StashOverflowError, leaving all state unchanged, when the path
   * holds more blocks than the stash has room for.
   */
  access(op: OramOp, blockId: number, payload: Uint8Array): void {
    invariant(this.initialized, 'ORAM must be initialized before access')
    invariant(
      Number.isInteger(blockId) && blockId >= 0 && blockId < this.blockCount,
      `block ${blockId} is out of range`
    )
    invariant(
      payload.length === this.geometry.blockSize,
      `payload must be ${this.geometry.blockSize} bytes, got ${payload.length}`
    )

    const leaf = this.positions.remap(
      blockId,
      this.sampler.nextLeaf(this.geometry.leafCount)
    )

    const required = this.fetchPath(leaf, op === oramOp.write ? blockId : emptyBlockId)
    const available = this.stash.capacity - this.stash.size
    if (required > available) {
      this.positions.set(blockId, leaf)
      this.overflows++
      throw new StashOverflowError(blockId, required, available)
    }

    this.stashPath()

    if (op === oramOp.read) {
      const held = this.stash.get(blockId)
      if (held) {
        payload.set(held)
      } else {
        invariant(
          !this.written.contains(blockId),
          `block ${blockId} was written but is missing from the path and stash`
        )
        payload.fill(0)
      }
    } else {
      const { handle } = this.stash.emplaceEmpty(blockId)
      invariant(handle !== ResourcePool.end, 'stash has no room for the block')
      this.stash.valueAt(handle).set(payload)
      this.written.insert(blockId)
    }

    this.peakStashSize = Math.max(this.peakStashSize, this.stash.size)
    this.writePath(leaf)
    this.accesses++
  }

  /**
   * Index of the bucket at `height` on the path from the root to `leaf`.
   * Height 0 is the root, height L the leaf bucket.
   */
  nodeOnPath(leaf: number, height: number): number {
    invariant(
      Number.isInteger(leaf) && leaf >= 0 && leaf < this.geometry.leafCount,
      `leaf ${leaf} is out of range`
    )
    invariant(
      Number.isInteger(height) && height >= 0 && height <= this.geometry.height,
      `height ${height} is out of range`
    )

    let node = leaf + Math.floor(this.geometry.bucketCount / 2)
    for (let level = this.geometry.height - 1; level >= height; level--) {
      node = Math.floor((node + 1) / 2) - 1
    }
    return node
  }

  /**
   * Bucket indices from the root down to `leaf`.
   */
  pathOf(leaf: number): number[] {
    const path: number[] = []
    for (let height = 0; height <= this.geometry.height; height++) {
      path.push(this.nodeOnPath(leaf, height))
    }
    return path
  }

  leafOf(blockId: number): number {
    return this.positions.get(blockId)
  }

  get stashSize(): number {
    return this.stash.size
  }

  get stashCapacity(): number {
    return this.stash.capacity
  }

  stats(): OramStats {
    return {
      accesses: this.accesses,
      overflows: this.overflows,
      stashSize: this.stash.size,
      stashCapacity: this.stash.capacity,
      peakStashSize: this.peakStashSize
    }
  }

  /**
   * Snapshot the client state. Buffers are copies.
   */
  exportState(): OramClientState {
    invariant(this.initialized, 'ORAM must be initialized before export')

    const stash: IdBlock[] = []
    for (const [id, data] of this.stash.entries()) {
      stash.push({ id, data: data.slice() })
    }
    // Stash iteration runs back to front; store front to back so that
    // loadState rebuilds the same order and eviction stays reproducible
    stash.reverse()

    return {
      samplerKind: this.sampler.kind,
      rngState: this.sampler.snapshot(),
      blockCount: this.blockCount,
      stashCapacity: this.stash.capacity,
      positions: this.positions.toLeaves().slice(),
      written: [...this.written],
      stash
    }
  }

  /**
   * Resume from a snapshot taken with `exportState`. Server memory must
   * already hold the matching image.
   */
  loadState(state: OramClientState): void {
    invariant(state.blockCount === this.blockCount, 'block count does not match')
    invariant(
      state.stashCapacity === this.stash.capacity,
      'stash capacity does not match'
    )
    invariant(state.positions.length === this.blockCount, 'position map size does not match')
    invariant(state.samplerKind === this.sampler.kind, 'sampler kind does not match')

    this.sampler.restore(state.rngState)
    for (let id = 0; id < state.positions.length; id++) {
      invariant(
        state.positions[id] < this.geometry.leafCount,
        `leaf ${state.positions[id]} is out of range`
      )
      this.positions.set(id, state.positions[id])
    }

    this.written.clear()
    for (const id of state.written) {
      invariant(this.written.insert(id), `written id ${id} is invalid`)
    }

    this.stash.clear()
    for (const block of state.stash) {
      const { handle, inserted } = this.stash.emplaceEmpty(block.id)
      invariant(inserted, `stash entry ${block.id} is invalid`)
      this.stash.valueAt(handle).set(block.data)
    }

    this.accesses = 0
    this.overflows = 0
    this.peakStashSize = this.stash.size
    this.initialized = true
  }

  /**
   * Read the path to `leaf` into the path buffers and count the stash
   * slots the access will need: every live block on the path that the
   * stash does not hold, plus one for a write of a block found nowhere.
   */
  private fetchPath(leaf: number, writeId: number): number {
    let required = 0
    let writeIdFound = writeId === emptyBlockId || this.stash.contains(writeId)

    for (let height = 0; height <= this.geometry.height; height++) {
      const node = this.nodeOnPath(leaf, height)
      const bucket = this.memory.readBucket(node, this.pathBuckets[height])
      this.onBucketAccess?.('read', node)

      for (const slot of bucket) {
        if (slot.id === emptyBlockId) {
          continue
        }
        invariant(
          slot.id < this.blockCount,
          `server memory holds unknown block id ${slot.id}`
        )
        if (!this.stash.contains(slot.id)) {
          required++
        }
        if (slot.id === writeId) {
          writeIdFound = true
        }
      }
    }

    return writeIdFound ? required : required + 1
  }

  /**
   * Move the live blocks of the fetched path into the stash. A block the
   * stash already holds keeps the stash copy.
   */
  private stashPath(): void {
    for (const bucket of this.pathBuckets) {
      for (const slot of bucket) {
        if (slot.id === emptyBlockId) {
          continue
        }
        const { handle, inserted } = this.stash.emplaceEmpty(slot.id)
        invariant(handle !== ResourcePool.end, 'stash has no room for the path')
        if (inserted) {
          this.stash.valueAt(handle).set(slot.data)
        }
      }
    }
  }

  /**
   * Write the path back from the leaf to the root. Each bucket takes up to
   * Z stash blocks whose own path passes through it, in stash order.
   */
  private writePath(leaf: number): void {
    const bucketSize = this.geometry.bucketSize

    for (let height = this.geometry.height; height >= 0; height--) {
      const node = this.nodeOnPath(leaf, height)

      const selected: number[] = []
      for (const id of this.stash.handles()) {
        if (selected.length === bucketSize) {
          break
        }
        if (this.nodeOnPath(this.positions.get(id), height) === node) {
          selected.push(id)
        }
      }

      for (let slot = 0; slot < bucketSize; slot++) {
        const target = this.outgoing[slot]
        if (slot < selected.length) {
          target.id = selected[slot]
          target.data.set(this.stash.at(target.id))
          this.stash.erase(target.id)
        } else {
          target.id = emptyBlockId
        }
      }

      this.memory.writeBucket(node, this.outgoing)
      this.onBucketAccess?.('write', node)
    }
  }
}

function sameGeometry(a: OramGeometry, b: OramGeometry): boolean {
  return (
    a.height === b.height &&
    a.bucketSize === b.bucketSize &&
    a.blockSize === b.blockSize &&
    a.idSize === b.idSize
  )
}
