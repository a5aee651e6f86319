import { defaultBucketSize, defaultIdSize, maxHeight, maxIdSize } from './constants'
import { emptyIdPattern } from './block-format'
import { ConfigurationError } from './errors'
import type { OramGeometry } from './types'

// Bucket size and height are stored as single bytes in the image header
const maxBucketSize = 255
// Block ids are stored as 4 bytes in the client state
const maxBlockCount = 0xffffffff

export interface GeometryOptions {
  height: number
  blockSize: number
  bucketSize?: number
  idSize?: number
  blockCount?: number
  stashCapacity?: number
}

export interface ResolvedGeometry {
  geometry: OramGeometry
  blockCount: number
  stashCapacity: number
}

/**
 * Apply defaults to geometry options and validate the result.
 * Throws ConfigurationError for any value out of range.
 */
export function resolveGeometry(options: GeometryOptions): ResolvedGeometry {
  const height = options.height
  const blockSize = options.blockSize
  const bucketSize = options.bucketSize ?? defaultBucketSize
  const idSize = options.idSize ?? defaultIdSize

  requireInteger('height', height, 1, maxHeight)
  requireInteger('blockSize', blockSize, 1, Number.MAX_SAFE_INTEGER)
  requireInteger('bucketSize', bucketSize, 1, maxBucketSize)
  requireInteger('idSize', idSize, 1, maxIdSize)

  const leafCount = 2 ** height
  const bucketCount = 2 * leafCount - 1
  const slotCount = bucketSize * bucketCount
  const slotSize = idSize + blockSize

  const blockCount = options.blockCount ?? slotCount
  requireInteger('blockCount', blockCount, 1, Math.min(slotCount, maxBlockCount))

  // The all-ones id marks an empty slot, so the largest id must stay below it
  if (BigInt(blockCount - 1) >= emptyIdPattern(idSize)) {
    throw new ConfigurationError(
      `blockCount ${blockCount} needs ids that do not fit in ${idSize} byte(s)`
    )
  }

  const stashCapacity =
    options.stashCapacity ??
    Math.min(defaultStashCapacity(slotCount), blockCount)
  requireInteger('stashCapacity', stashCapacity, 1, blockCount)

  return {
    geometry: {
      height,
      bucketSize,
      blockSize,
      idSize,
      bucketCount,
      leafCount,
      slotCount,
      slotSize,
      byteLength: slotCount * slotSize
    },
    blockCount,
    stashCapacity
  }
}

/**
 * 4 * ceil(log2(slotCount)), never less than one slot.
 */
export function defaultStashCapacity(slotCount: number): number {
  return Math.max(1, 4 * ceilLog2(slotCount))
}

export function ceilLog2(value: number): number {
  let bits = 0
  while (2 ** bits < value) {
    bits++
  }
  return bits
}

function requireInteger(
  name: string,
  value: number,
  min: number,
  max: number
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      `${name} must be an integer between ${min} and ${max}, got ${value}`
    )
  }
}
