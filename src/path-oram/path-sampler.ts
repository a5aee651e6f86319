import { randomInt } from 'node:crypto'
import invariant from 'tiny-invariant'
import { samplerKind } from './constants'
import { ConfigurationError } from './errors'
import type { PathSampler, SamplerKind, SamplerName } from './types'

const mask64 = (1n << 64n) - 1n

/**
 * Deterministic xorshift64 leaf source. The same seed always yields the
 * same sequence of leaves, which makes runs reproducible.
 */
export class Xorshift64Sampler implements PathSampler {
  readonly kind: SamplerKind = samplerKind.xorshift
  private state: bigint

  constructor(seed: bigint) {
    this.state = Xorshift64Sampler.validSeed(seed)
  }

  seed(seed: bigint): void {
    this.state = Xorshift64Sampler.validSeed(seed)
  }

  /**
   * Advance the generator and return the next raw 64-bit value.
   */
  next(): bigint {
    let x = this.state
    x ^= (x << 13n) & mask64
    x ^= x >> 7n
    x ^= (x << 17n) & mask64
    this.state = x
    return x
  }

  nextLeaf(leafCount: number): number {
    invariant(
      Number.isInteger(leafCount) && leafCount > 0,
      'leafCount must be a positive integer'
    )
    return Number(this.next() % BigInt(leafCount))
  }

  snapshot(): bigint {
    return this.state
  }

  restore(state: bigint): void {
    this.state = Xorshift64Sampler.validSeed(state)
  }

  private static validSeed(seed: bigint): bigint {
    const state = seed & mask64
    // Zero is a fixed point of xorshift
    if (state === 0n) {
      throw new ConfigurationError('xorshift64 seed must be non-zero')
    }
    return state
  }
}

/**
 * Leaf source backed by the operating system's CSPRNG. It has no state to
 * seed or persist.
 */
export class CryptoPathSampler implements PathSampler {
  readonly kind: SamplerKind = samplerKind.crypto

  seed(_seed: bigint): void {}

  nextLeaf(leafCount: number): number {
    invariant(
      Number.isInteger(leafCount) && leafCount > 0,
      'leafCount must be a positive integer'
    )
    return randomInt(0, leafCount)
  }

  snapshot(): bigint {
    return 0n
  }

  restore(_state: bigint): void {}
}

/**
 * Build a sampler by name. A missing xorshift seed falls back to the clock.
 */
export function createSampler(name: SamplerName, seed?: bigint): PathSampler {
  if (name === 'crypto') {
    return new CryptoPathSampler()
  }
  return new Xorshift64Sampler(seed ?? BigInt(Date.now()))
}

/**
 * Build a sampler from the kind byte of a persisted client state.
 */
export function samplerFromKind(kind: number, state: bigint): PathSampler | null {
  if (kind === samplerKind.crypto) {
    return new CryptoPathSampler()
  }
  if (kind === samplerKind.xorshift && (state & mask64) !== 0n) {
    return new Xorshift64Sampler(state)
  }
  return null
}
