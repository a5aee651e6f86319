/**
 * Client-side position map: the leaf each logical block is assigned to.
 *
 * Every access reassigns the accessed block to a fresh leaf before any
 * bucket is touched, so consecutive accesses to one block walk
 * independent paths.
 */

import invariant from 'tiny-invariant'
import type { PathSampler } from './types'

export class PositionMap {
  private readonly leaves: Uint32Array

  private constructor(leaves: Uint32Array) {
    this.leaves = leaves
  }

  /**
   * Create a map of `blockCount` entries, all on leaf 0 until filled.
   */
  static create(blockCount: number): PositionMap {
    return new PositionMap(new Uint32Array(blockCount))
  }

  get size(): number {
    return this.leaves.length
  }

  /**
   * Assign every block a fresh leaf.
   */
  fill(sampler: PathSampler, leafCount: number): void {
    for (let id = 0; id < this.leaves.length; id++) {
      this.leaves[id] = sampler.nextLeaf(leafCount)
    }
  }

  get(blockId: number): number {
    this.assertId(blockId)
    return this.leaves[blockId]
  }

  set(blockId: number, leaf: number): void {
    this.assertId(blockId)
    this.leaves[blockId] = leaf
  }

  /**
   * Assign a new leaf and return the previous one.
   */
  remap(blockId: number, leaf: number): number {
    const previous = this.get(blockId)
    this.leaves[blockId] = leaf
    return previous
  }

  /**
   * The underlying leaves, for persistence.
   */
  toLeaves(): Uint32Array {
    return this.leaves
  }

  private assertId(blockId: number): void {
    invariant(
      Number.isInteger(blockId) && blockId >= 0 && blockId < this.leaves.length,
      `block ${blockId} is out of range`
    )
  }
}
