import invariant from 'tiny-invariant'

/**
 * Anything blocks can be read from: a PathOram, an OramStore, or a fake.
 */
export interface BlockSource {
  read(blockId: number): Uint8Array | Promise<Uint8Array>
}

/**
 * LRU cache of block payloads in front of a BlockSource.
 *
 * Consecutive lookups that land in the same block cost one ORAM access.
 * Map insertion order tracks recency: the first key is the least recently
 * used, the last the most recent.
 *
 * Returned buffers belong to the cache; copy them before mutating.
 */
export class BlockCache {
  private readonly blocks: Map<number, Uint8Array>
  private readonly source: BlockSource
  private readonly maxBlocks: number

  private hitCount = 0
  private missCount = 0

  /**
   * @param maxBlocks - Blocks to keep (default: 1, the last block read)
   */
  constructor(source: BlockSource, maxBlocks = 1) {
    invariant(
      Number.isInteger(maxBlocks) && maxBlocks > 0,
      'maxBlocks must be a positive integer'
    )

    this.source = source
    this.maxBlocks = maxBlocks
    this.blocks = new Map()
  }

  /**
   * Return a block, reading it from the source on a miss.
   */
  async get(blockId: number): Promise<Uint8Array> {
    const cached = this.blocks.get(blockId)
    if (cached) {
      this.hitCount++
      // Move to the most recently used position
      this.blocks.delete(blockId)
      this.blocks.set(blockId, cached)
      return cached
    }

    this.missCount++
    const block = await this.source.read(blockId)
    this.store(blockId, block)
    return block
  }

  has(blockId: number): boolean {
    return this.blocks.has(blockId)
  }

  /**
   * Drop one block, e.g. after it was written through another path.
   */
  invalidate(blockId: number): boolean {
    return this.blocks.delete(blockId)
  }

  clear(): void {
    this.blocks.clear()
  }

  get size(): number {
    return this.blocks.size
  }

  get capacity(): number {
    return this.maxBlocks
  }

  get hits(): number {
    return this.hitCount
  }

  get misses(): number {
    return this.missCount
  }

  private store(blockId: number, block: Uint8Array): void {
    if (this.blocks.has(blockId)) {
      this.blocks.delete(blockId)
    } else if (this.blocks.size >= this.maxBlocks) {
      for (const oldest of this.blocks.keys()) {
        this.blocks.delete(oldest)
        break
      }
    }
    this.blocks.set(blockId, block)
  }
}
