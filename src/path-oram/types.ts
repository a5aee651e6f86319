/**
 * Types for the Path-ORAM engine and its persistent store.
 */

import type { oramOp, samplerKind } from './constants'
import type { ServerMemory } from './server-memory'

/**
 * Access operation (read or write).
 */
export type OramOp = (typeof oramOp)[keyof typeof oramOp]

export type SamplerKind = (typeof samplerKind)[keyof typeof samplerKind]

/**
 * One bucket slot: a block id (or `emptyBlockId`) and its payload.
 */
export interface IdBlock {
  id: number
  data: Uint8Array
}

/**
 * Fixed-size group of slots at one node of the server tree.
 */
export type Bucket = IdBlock[]

/**
 * Shape of the server tree and its byte layout, derived from the options.
 */
export interface OramGeometry {
  /** Tree height L; the tree has L + 1 levels */
  height: number
  /** Slots per bucket (Z) */
  bucketSize: number
  /** Payload bytes per block (B) */
  blockSize: number
  /** Bytes of block id stored in front of each payload */
  idSize: number
  /** 2^(L+1) - 1 */
  bucketCount: number
  /** 2^L */
  leafCount: number
  /** bucketSize * bucketCount */
  slotCount: number
  /** idSize + blockSize */
  slotSize: number
  /** slotCount * slotSize */
  byteLength: number
}

export type BucketAccessKind = 'read' | 'write'

/**
 * Called for every physical bucket the engine reads or writes.
 */
export type BucketObserver = (kind: BucketAccessKind, bucket: number) => void

/**
 * Source of random leaves for the position map.
 */
export interface PathSampler {
  readonly kind: SamplerKind
  /** Restart the sequence from a seed */
  seed(seed: bigint): void
  /** Uniform leaf in `[0, leafCount)` */
  nextLeaf(leafCount: number): number
  /** Opaque state that `restore` accepts, for persistence */
  snapshot(): bigint
  restore(state: bigint): void
}

/**
 * Options for creating a Path-ORAM engine.
 */
export interface PathOramOptions {
  /** Tree height L (1-24) */
  height: number
  /** Payload bytes per block */
  blockSize: number
  /** Slots per bucket (default: 4) */
  bucketSize?: number
  /** Bytes used for block ids in server memory, 1-8 (default: 8) */
  idSize?: number
  /** Number of logical blocks (default: bucketSize * bucketCount) */
  blockCount?: number
  /** Stash capacity (default: 4 * ceil(log2(bucketSize * bucketCount))) */
  stashCapacity?: number
  /** Leaf source (default: xorshift64) */
  sampler?: PathSampler
  /** Server memory to attach to instead of allocating a fresh one */
  memory?: ServerMemory
  /** Observer of physical bucket traffic */
  onBucketAccess?: BucketObserver
}

/**
 * Counters describing engine activity since initialization.
 */
export interface OramStats {
  accesses: number
  overflows: number
  stashSize: number
  stashCapacity: number
  peakStashSize: number
}

export type SamplerName = 'xorshift' | 'crypto'

/**
 * Options for opening or creating a persistent ORAM store.
 */
export interface OramStoreOptions {
  /** Base path of the store files (extension optional) */
  path: string
  /** Tree height, required when creating a new store */
  height?: number
  /** Payload bytes per block, required when creating a new store */
  blockSize?: number
  bucketSize?: number
  idSize?: number
  blockCount?: number
  stashCapacity?: number
  /** Seed for a new store's xorshift sampler (default: current time) */
  seed?: bigint
  /** Sampler for a new store (default: 'xorshift') */
  sampler?: SamplerName
  /** Lock acquisition timeout in milliseconds when flushing (default: 10000) */
  lockTimeout?: number
}
