import { describe, it, expect } from 'vitest'
import { Xorshift64Sampler } from './path-sampler'
import { PositionMap } from './position-map'

describe('PositionMap', () => {
  it('should fill every entry from the sampler in id order', () => {
    const map = PositionMap.create(5)
    map.fill(new Xorshift64Sampler(1n), 8)

    const expected = new Xorshift64Sampler(1n)
    for (let id = 0; id < 5; id++) {
      expect(map.get(id)).toBe(expected.nextLeaf(8))
    }
  })

  it('should return the previous leaf on remap', () => {
    const map = PositionMap.create(2)
    map.set(1, 6)
    expect(map.remap(1, 2)).toBe(6)
    expect(map.get(1)).toBe(2)
  })

  it('should reject ids outside the map', () => {
    const map = PositionMap.create(2)
    expect(() => map.get(2)).toThrow('Invariant failed: block 2 is out of range')
  })

})
