import { describe, it, expect } from 'vitest'
import { emptyBlockId, oramOp } from './constants'
import { ConfigurationError, StashOverflowError } from './errors'
import { resolveGeometry } from './geometry'
import { PathOram } from './path-oram'
import { Xorshift64Sampler } from './path-sampler'
import { ServerMemory } from './server-memory'
import type { BucketAccessKind } from './types'

function filled(value: number, size = 8): Uint8Array {
  return new Uint8Array(size).fill(value)
}

function createOram(seed = 0xdeadbeefn, blockCount?: number): PathOram {
  const oram = new PathOram({
    height: 3,
    blockSize: 8,
    blockCount,
    sampler: new Xorshift64Sampler(seed)
  })
  oram.initialize(seed)
  return oram
}

/**
 * Count the copies of every block across server memory and the stash,
 * checking that each server copy lies on its block's path.
 */
function countCopies(oram: PathOram): Map<number, number> {
  const copies = new Map<number, number>()
  const bucket = oram.memory.createBucket()

  for (let node = 0; node < oram.geometry.bucketCount; node++) {
    oram.memory.readBucket(node, bucket)
    for (const slot of bucket) {
      if (slot.id === emptyBlockId) {
        continue
      }
      expect(oram.pathOf(oram.leafOf(slot.id))).toContain(node)
      copies.set(slot.id, (copies.get(slot.id) ?? 0) + 1)
    }
  }

  for (const block of oram.exportState().stash) {
    copies.set(block.id, (copies.get(block.id) ?? 0) + 1)
  }
  return copies
}

// MINSTD generator for test workloads
function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 48271) % 2147483647
    return state
  }
}

describe('PathOram', () => {
  describe('paths', () => {
    it('should map leaves to level-order bucket paths', () => {
      const oram = createOram()
      expect(oram.pathOf(0)).toEqual([0, 1, 3, 7])
      expect(oram.pathOf(5)).toEqual([0, 2, 5, 12])
      expect(oram.pathOf(7)).toEqual([0, 2, 6, 14])
      expect(oram.nodeOnPath(3, 3)).toBe(10)
    })

    it('should reject leaves and heights outside the tree', () => {
      const oram = createOram()
      expect(() => oram.nodeOnPath(8, 0)).toThrow('Invariant failed: leaf 8 is out of range')
      expect(() => oram.nodeOnPath(0, 4)).toThrow('Invariant failed: height 4 is out of range')
    })
  })

  describe('read and write', () => {
    it('should round trip the documented scenario', () => {
      const oram = createOram(0xdeadbeefn)

      oram.write(5, filled(5))
      oram.write(12, filled(12))

      expect(Array.from(oram.read(5))).toEqual([5, 5, 5, 5, 5, 5, 5, 5])
      expect(Array.from(oram.read(12))).toEqual([12, 12, 12, 12, 12, 12, 12, 12])
      expect(Array.from(oram.read(30))).toEqual([0, 0, 0, 0, 0, 0, 0, 0])
    })

    it('should fill the caller buffer with zeroes for a never-written block', () => {
      const oram = createOram()
      const out = filled(0xaa)
      const result = oram.read(3, out)

      expect(result).toBe(out)
      expect(Array.from(out)).toEqual([0, 0, 0, 0, 0, 0, 0, 0])
    })

    it('should return the latest write', () => {
      const oram = createOram()
      oram.write(1, filled(1))
      oram.write(1, filled(2))
      expect(Array.from(oram.read(1))).toEqual([2, 2, 2, 2, 2, 2, 2, 2])
    })

    it('should match a reference map over a random workload', () => {
      const oram = createOram(7n, 24)
      const reference = new Map<number, number>()
      const next = lcg(12345)

      for (let step = 0; step < 400; step++) {
        const id = next() % 24
        if (next() % 2 === 0) {
          const value = next() % 256
          oram.write(id, filled(value))
          reference.set(id, value)
        } else {
          const expected = reference.get(id) ?? 0
          expect(Array.from(oram.read(id))).toEqual(Array.from(filled(expected)))
        }
      }

      for (const [id, count] of countCopies(oram)) {
        expect(reference.has(id)).toBe(true)
        expect(count).toBe(1)
      }
      expect(countCopies(oram).size).toBe(reference.size)
      expect(oram.stats().overflows).toBe(0)
    })

    it('should keep exactly one copy of every written block after each access', () => {
      const oram = createOram(99n, 16)
      const written = new Set<number>()

      for (let id = 0; id < 16; id++) {
        oram.write(id, filled(id))
        written.add(id)

        const copies = countCopies(oram)
        expect(copies.size).toBe(written.size)
        for (const count of copies.values()) {
          expect(count).toBe(1)
        }
      }
    })

    it('should reject ids and buffers that do not fit', () => {
      const oram = createOram()
      expect(() => oram.read(60)).toThrow('Invariant failed: block 60 is out of range')
      expect(() => oram.write(-1, filled(0))).toThrow(
        'Invariant failed: block -1 is out of range'
      )
      expect(() => oram.write(0, filled(0, 4))).toThrow(
        'Invariant failed: payload must be 8 bytes, got 4'
      )
    })

    it('should refuse access before initialization', () => {
      const oram = new PathOram({ height: 3, blockSize: 8 })
      expect(() => oram.read(0)).toThrow(
        'Invariant failed: ORAM must be initialized before access'
      )
    })

    it('should fail loudly when a written block has vanished', () => {
      const oram = createOram()
      oram.write(5, filled(5))
      // The first write into an empty tree always evicts, at worst to the root
      expect(oram.stashSize).toBe(0)

      oram.memory.clearIds()

      expect(() => oram.read(5)).toThrow(
        'Invariant failed: block 5 was written but is missing from the path and stash'
      )
    })
  })

  describe('access pattern', () => {
    it('should read the old path root first and write it back leaf first', () => {
      const events: Array<[BucketAccessKind, number]> = []
      const oram = new PathOram({
        height: 3,
        blockSize: 8,
        sampler: new Xorshift64Sampler(5n),
        onBucketAccess: (kind, bucket) => events.push([kind, bucket])
      })
      oram.initialize(5n)

      const leaf = oram.leafOf(9)
      const path = oram.pathOf(leaf)
      oram.write(9, filled(9))

      expect(events).toEqual([
        ...path.map((node): [BucketAccessKind, number] => ['read', node]),
        ...[...path].reverse().map((node): [BucketAccessKind, number] => ['write', node])
      ])
    })

    it('should touch 2(L + 1) buckets per access whatever the request', () => {
      let touched = 0
      const oram = new PathOram({
        height: 3,
        blockSize: 8,
        blockCount: 16,
        sampler: new Xorshift64Sampler(11n),
        onBucketAccess: () => touched++
      })
      oram.initialize(11n)

      const next = lcg(777)
      for (let step = 0; step < 100; step++) {
        const before = touched
        const id = next() % 16
        if (step % 3 === 0) {
          oram.read(id)
        } else {
          oram.write(id, filled(step % 256))
        }
        expect(touched - before).toBe(8)
      }
    })

    it('should spread accesses over every leaf', () => {
      const leafHits = new Array<number>(8).fill(0)
      const oram = new PathOram({
        height: 3,
        blockSize: 8,
        blockCount: 4,
        sampler: new Xorshift64Sampler(3n),
        onBucketAccess: (kind, bucket) => {
          // Leaf buckets are 7..14
          if (kind === 'read' && bucket >= 7) {
            leafHits[bucket - 7]++
          }
        }
      })
      oram.initialize(3n)

      for (let step = 0; step < 800; step++) {
        oram.read(0)
      }

      for (const hits of leafHits) {
        expect(hits).toBeGreaterThan(40)
      }
    })

    it('should remap the block to a fresh leaf on every access', () => {
      const oram = createOram(21n)
      const sampler = new Xorshift64Sampler(21n)
      // initialize draws one leaf per block before any access
      for (let id = 0; id < 60; id++) {
        expect(oram.leafOf(id)).toBe(sampler.nextLeaf(8))
      }

      oram.read(4)
      expect(oram.leafOf(4)).toBe(sampler.nextLeaf(8))
    })
  })

  describe('stash overflow', () => {
    function crowdedOram(): PathOram {
      const oram = new PathOram({
        height: 3,
        blockSize: 8,
        stashCapacity: 2,
        sampler: new Xorshift64Sampler(1n)
      })
      oram.initialize(1n)

      // Three blocks in the root are on every path
      const root = oram.memory.createBucket()
      root[0].id = 1
      root[1].id = 2
      root[2].id = 3
      oram.memory.writeBucket(0, root)
      return oram
    }

    it('should throw before changing any state', () => {
      const oram = crowdedOram()
      const leaf = oram.leafOf(0)
      const memory = oram.memory.bytes.slice()

      let caught: unknown
      try {
        oram.write(0, filled(1))
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(StashOverflowError)
      expect(caught).toMatchObject({ blockId: 0, required: 4, available: 2 })
      expect(oram.leafOf(0)).toBe(leaf)
      expect(oram.memory.bytes).toEqual(memory)
      expect(oram.stashSize).toBe(0)
    })

    it('should count overflows in the stats', () => {
      const oram = crowdedOram()
      expect(() => oram.read(0)).toThrow(
        'Stash overflow while accessing block 0: 3 slot(s) needed, 2 free'
      )
      expect(oram.stats()).toEqual({
        accesses: 0,
        overflows: 1,
        stashSize: 0,
        stashCapacity: 2,
        peakStashSize: 0
      })
    })

    it('should not write any bucket when it overflows', () => {
      const kinds: BucketAccessKind[] = []
      const oram = new PathOram({
        height: 3,
        blockSize: 8,
        stashCapacity: 1,
        sampler: new Xorshift64Sampler(1n),
        onBucketAccess: (kind) => kinds.push(kind)
      })
      oram.initialize(1n)
      const root = oram.memory.createBucket()
      root[0].id = 1
      root[1].id = 2
      oram.memory.writeBucket(0, root)

      expect(() => oram.read(0)).toThrow(StashOverflowError)
      expect(kinds).toEqual(['read', 'read', 'read', 'read'])
    })
  })

  describe('eviction', () => {
    it('should leave no stash block that fits a free slot on the written path', () => {
      let writtenNodes: number[] = []
      const oram = new PathOram({
        height: 4,
        blockSize: 8,
        bucketSize: 2,
        blockCount: 24,
        stashCapacity: 24,
        sampler: new Xorshift64Sampler(8n),
        onBucketAccess: (kind, bucket) => {
          if (kind === 'write') {
            writtenNodes.push(bucket)
          }
        }
      })
      oram.initialize(8n)

      const bucket = oram.memory.createBucket()
      const next = lcg(4242)
      let stashedChecks = 0

      for (let step = 0; step < 1000; step++) {
        writtenNodes = []
        const id = next() % 24
        if (next() % 4 === 0) {
          oram.read(id)
        } else {
          oram.write(id, filled(step % 256))
        }

        for (const block of oram.exportState().stash) {
          stashedChecks++
          const leaf = oram.leafOf(block.id)
          for (let height = 0; height <= 4; height++) {
            const node = oram.nodeOnPath(leaf, height)
            if (!writtenNodes.includes(node)) {
              break
            }
            oram.memory.readBucket(node, bucket)
            expect(bucket.every((slot) => slot.id !== emptyBlockId)).toBe(true)
          }
        }
      }

      expect(stashedChecks).toBeGreaterThan(0)
      expect(oram.stats().overflows).toBe(0)
    })
  })

  describe('stats', () => {
    it('should track accesses and peak stash occupancy', () => {
      const oram = createOram()
      oram.write(1, filled(1))
      oram.read(1)
      oram.read(2)

      const stats = oram.stats()
      expect(stats.accesses).toBe(3)
      expect(stats.overflows).toBe(0)
      expect(stats.stashCapacity).toBe(24)
      expect(stats.peakStashSize).toBeGreaterThanOrEqual(1)
      expect(stats.stashSize).toBe(oram.stashSize)
    })
  })

  describe('state snapshots', () => {
    it('should resume from an exported state', () => {
      const original = createOram(17n, 20)
      for (let id = 0; id < 20; id++) {
        original.write(id, filled(id + 1))
      }

      const state = original.exportState()
      const resumed = new PathOram({
        height: 3,
        blockSize: 8,
        blockCount: 20,
        memory: new ServerMemory(original.geometry, original.memory.bytes.slice()),
        sampler: new Xorshift64Sampler(1n)
      })
      resumed.loadState(state)

      for (let id = 0; id < 20; id++) {
        expect(Array.from(resumed.read(id))).toEqual(Array.from(filled(id + 1)))
        original.read(id)
      }
      // Both drew the same leaves, so both moved the same blocks
      expect(resumed.memory.bytes).toEqual(original.memory.bytes)
    })

    it('should reject memory of another shape', () => {
      const { geometry } = resolveGeometry({ height: 2, blockSize: 8 })
      expect(
        () => new PathOram({ height: 3, blockSize: 8, memory: new ServerMemory(geometry) })
      ).toThrow(ConfigurationError)
    })
  })

  describe('access', () => {
    it('should accept the operation explicitly', () => {
      const oram = createOram()
      oram.access(oramOp.write, 2, filled(4))
      const out = new Uint8Array(8)
      oram.access(oramOp.read, 2, out)
      expect(Array.from(out)).toEqual([4, 4, 4, 4, 4, 4, 4, 4])
    })
  })
})
