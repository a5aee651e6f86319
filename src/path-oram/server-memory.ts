/**
 * Untrusted server memory: the ORAM tree as one flat byte array.
 *
 * Buckets sit in level order (bucket 0 is the root, children of bucket i
 * are 2i + 1 and 2i + 2). Whoever holds this memory sees which buckets are
 * read and written, but never which logical block an access was for.
 */

import invariant from 'tiny-invariant'
import { emptyBlockId } from './constants'
import { decodeSlot, encodeSlot, writeBlockId } from './block-format'
import type { Bucket, IdBlock, OramGeometry } from './types'

export class ServerMemory {
  readonly geometry: OramGeometry
  private readonly buffer: Uint8Array

  /**
   * Wrap existing bytes, or allocate zeroed memory when none are given.
   */
  constructor(geometry: OramGeometry, bytes?: Uint8Array) {
    invariant(
      bytes === undefined || bytes.length === geometry.byteLength,
      `server memory must be ${geometry.byteLength} bytes`
    )
    this.geometry = geometry
    this.buffer = bytes ?? new Uint8Array(geometry.byteLength)
  }

  /**
   * Raw bytes, for persistence.
   */
  get bytes(): Uint8Array {
    return this.buffer
  }

  /**
   * Allocate a bucket's worth of empty slots with payload buffers.
   */
  createBucket(): Bucket {
    const bucket: Bucket = []
    for (let i = 0; i < this.geometry.bucketSize; i++) {
      bucket.push({
        id: emptyBlockId,
        data: new Uint8Array(this.geometry.blockSize)
      })
    }
    return bucket
  }

  /**
   * Decode bucket `index` into `into`, reusing its slot buffers.
   */
  readBucket(index: number, into: Bucket): Bucket {
    this.assertBucket(index)
    invariant(
      into.length === this.geometry.bucketSize,
      `bucket must hold ${this.geometry.bucketSize} slots`
    )

    const base = this.bucketOffset(index)
    for (let slot = 0; slot < into.length; slot++) {
      decodeSlot(this.buffer, base + slot * this.geometry.slotSize, this.geometry, into[slot])
    }
    return into
  }

  /**
   * Encode `blocks` into bucket `index`.
   */
  writeBucket(index: number, blocks: readonly IdBlock[]): void {
    this.assertBucket(index)
    invariant(
      blocks.length === this.geometry.bucketSize,
      `bucket must hold ${this.geometry.bucketSize} slots`
    )

    const base = this.bucketOffset(index)
    for (let slot = 0; slot < blocks.length; slot++) {
      encodeSlot(this.buffer, base + slot * this.geometry.slotSize, blocks[slot], this.geometry)
    }
  }

  /**
   * Mark every slot empty. Payload bytes are left as they are.
   */
  clearIds(): void {
    for (let slot = 0; slot < this.geometry.slotCount; slot++) {
      writeBlockId(this.buffer, slot * this.geometry.slotSize, emptyBlockId, this.geometry.idSize)
    }
  }

  private bucketOffset(index: number): number {
    return index * this.geometry.bucketSize * this.geometry.slotSize
  }

  private assertBucket(index: number): void {
    invariant(
      Number.isInteger(index) && index >= 0 && index < this.geometry.bucketCount,
      `bucket ${index} is out of range`
    )
  }
}
