import type { SamplerName } from '../path-oram'

export const sharedFlags = {
  store: {
    type: String,
    alias: 's',
    default: './data.oram',
    description: 'Path to the ORAM store'
  }
}

export const geometryFlags = {
  height: {
    type: Number,
    alias: 'L',
    default: 10,
    description: 'Tree height (1-24)'
  },
  blockSize: {
    type: Number,
    alias: 'b',
    default: 64,
    description: 'Payload bytes per block'
  },
  bucketSize: {
    type: Number,
    alias: 'z',
    default: 4,
    description: 'Slots per bucket'
  },
  idSize: {
    type: Number,
    default: 8,
    description: 'Bytes of block id stored in server memory (1-8)'
  },
  blockCount: {
    type: Number,
    description: 'Number of logical blocks (default: every slot)'
  },
  stashCapacity: {
    type: Number,
    description: 'Stash capacity (default: 4 * ceil(log2(slots)))'
  },
  seed: {
    type: parseSeed,
    description: 'Seed for the xorshift64 sampler (default: current time)'
  },
  sampler: {
    type: parseSampler,
    description: 'Leaf sampler: xorshift or crypto (default: xorshift)'
  }
}

export const encodingFlags = {
  encoding: {
    type: parseEncoding,
    alias: 'e',
    description: 'Payload encoding: utf8 or hex'
  }
}

export type PayloadEncoding = 'utf8' | 'hex'

function parseSeed(value: string): bigint {
  return BigInt(value)
}

function parseSampler(value: string): SamplerName {
  if (value === 'xorshift' || value === 'crypto') {
    return value
  }
  throw new Error(`Unknown sampler "${value}", expected xorshift or crypto`)
}

function parseEncoding(value: string): PayloadEncoding {
  if (value === 'utf8' || value === 'hex') {
    return value
  }
  throw new Error(`Unknown encoding "${value}", expected utf8 or hex`)
}
