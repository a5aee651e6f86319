import { describe, it, expect } from 'vitest'
import { samplerKind } from './constants'
import { ConfigurationError } from './errors'
import {
  CryptoPathSampler,
  Xorshift64Sampler,
  createSampler,
  samplerFromKind
} from './path-sampler'

describe('Xorshift64Sampler', () => {
  it('should apply the 13/7/17 shift sequence', () => {
    const sampler = new Xorshift64Sampler(1n)
    // 1 -> 8193 -> 8257 -> 8257 ^ (8257 << 17)
    expect(sampler.next()).toBe(1082269761n)
  })

  it('should reduce the state modulo the leaf count', () => {
    const sampler = new Xorshift64Sampler(1n)
    expect(sampler.nextLeaf(8)).toBe(1)
  })

  it('should repeat the sequence for the same seed', () => {
    const a = new Xorshift64Sampler(0xdeadbeefn)
    const b = new Xorshift64Sampler(0xdeadbeefn)
    for (let i = 0; i < 50; i++) {
      expect(a.nextLeaf(1024)).toBe(b.nextLeaf(1024))
    }
  })

  it('should resume from a snapshot', () => {
    const sampler = new Xorshift64Sampler(42n)
    for (let i = 0; i < 5; i++) {
      sampler.nextLeaf(16)
    }

    const state = sampler.snapshot()
    const first = [sampler.nextLeaf(16), sampler.nextLeaf(16), sampler.nextLeaf(16)]
    sampler.restore(state)
    const second = [sampler.nextLeaf(16), sampler.nextLeaf(16), sampler.nextLeaf(16)]

    expect(second).toEqual(first)
  })

  it('should stay within 64 bits', () => {
    const sampler = new Xorshift64Sampler(0xffffffffffffffffn)
    for (let i = 0; i < 100; i++) {
      const value = sampler.next()
      expect(value).toBeGreaterThan(0n)
      expect(value < 1n << 64n).toBe(true)
    }
  })

  it('should reject a zero seed', () => {
    expect(() => new Xorshift64Sampler(0n)).toThrow(ConfigurationError)
    expect(() => new Xorshift64Sampler(1n << 64n)).toThrow(
      'xorshift64 seed must be non-zero'
    )
  })
})

describe('CryptoPathSampler', () => {
  it('should return leaves in range', () => {
    const sampler = new CryptoPathSampler()
    for (let i = 0; i < 200; i++) {
      const leaf = sampler.nextLeaf(8)
      expect(leaf).toBeGreaterThanOrEqual(0)
      expect(leaf).toBeLessThan(8)
    }
    expect(sampler.snapshot()).toBe(0n)
  })
})

describe('sampler factories', () => {
  it('should build samplers by name', () => {
    expect(createSampler('crypto')).toBeInstanceOf(CryptoPathSampler)
    expect(createSampler('xorshift', 7n).snapshot()).toBe(7n)
  })

  it('should build samplers from a persisted kind', () => {
    expect(samplerFromKind(samplerKind.xorshift, 9n)?.snapshot()).toBe(9n)
    expect(samplerFromKind(samplerKind.crypto, 0n)).toBeInstanceOf(CryptoPathSampler)
    expect(samplerFromKind(samplerKind.xorshift, 0n)).toBeNull()
    expect(samplerFromKind(5, 1n)).toBeNull()
  })
})
