import { describe, it, expect } from 'vitest'
import { emptyBlockId } from './constants'
import { resolveGeometry } from './geometry'
import { ServerMemory } from './server-memory'

describe('ServerMemory', () => {
  const { geometry } = resolveGeometry({ height: 3, blockSize: 8 })

  it('should size memory from the geometry', () => {
    const memory = new ServerMemory(geometry)
    expect(geometry.bucketCount).toBe(15)
    expect(geometry.slotSize).toBe(16)
    expect(memory.bytes.length).toBe(960)
  })

  it('should reject bytes of the wrong length', () => {
    expect(() => new ServerMemory(geometry, new Uint8Array(10))).toThrow(
      'Invariant failed: server memory must be 960 bytes'
    )
  })

  it('should write a bucket at its level-order offset', () => {
    const memory = new ServerMemory(geometry)
    memory.clearIds()
    const bucket = memory.createBucket()
    bucket[0].id = 7
    bucket[0].data.set([1, 2, 3, 4, 5, 6, 7, 8])
    memory.writeBucket(2, bucket)

    // bucket 2 starts at 2 * 4 slots * 16 bytes
    expect(Array.from(memory.bytes.subarray(128, 144))).toEqual([
      7, 0, 0, 0, 0, 0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8
    ])
    expect(Array.from(memory.bytes.subarray(144, 152))).toEqual([
      0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff
    ])

    const read = memory.readBucket(2, memory.createBucket())
    expect(read.map((slot) => slot.id)).toEqual([7, emptyBlockId, emptyBlockId, emptyBlockId])
    expect(Array.from(read[0].data)).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
  })

  it('should clear ids without touching payloads', () => {
    const memory = new ServerMemory(geometry)
    const bucket = memory.createBucket()
    bucket[0].id = 3
    bucket[0].data.fill(9)
    memory.writeBucket(0, bucket)

    memory.clearIds()

    const read = memory.readBucket(0, memory.createBucket())
    expect(read[0].id).toBe(emptyBlockId)
    expect(Array.from(read[0].data)).toEqual([9, 9, 9, 9, 9, 9, 9, 9])
  })

  it('should reject buckets outside the tree', () => {
    const memory = new ServerMemory(geometry)
    expect(() => memory.readBucket(15, memory.createBucket())).toThrow(
      'Invariant failed: bucket 15 is out of range'
    )
  })
})
