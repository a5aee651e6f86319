/**
 * Constants for the Path-ORAM engine and its persisted files.
 */

// In-memory id of an empty bucket slot. On the wire it is all-ones.
export const emptyBlockId = -1

// Geometry defaults and limits
export const defaultBucketSize = 4
export const defaultIdSize = 8
export const maxHeight = 24
export const maxIdSize = 8

// Server image magic (ASCII "ORAM") and client state magic (ASCII "ORCS")
export const imageMagic = 0x4f52414d
export const clientStateMagic = 0x4f524353
export const clientStateTrailer = 0xdeadbeef

export const imageVersion = 1
export const clientStateVersion = 2

export const imageHeaderSize = 16

// Server image header layout (16 bytes total)
export const imageHeaderOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  height: 6, // 1 byte
  bucketSize: 7, // 1 byte
  idSize: 8, // 1 byte
  reserved: 9, // 3 bytes
  blockSize: 12 // 4 bytes
} as const

// Client state fixed header layout, followed by variable sections
export const clientStateOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  samplerKind: 6, // 1 byte
  flags: 7, // 1 byte
  rngState: 8, // 8 bytes
  blockCount: 16, // 4 bytes
  stashCapacity: 20, // 4 bytes
  imageChecksum: 24, // 4 bytes
  positionMap: 28 // blockCount * 4 bytes
} as const

export const samplerKind = {
  xorshift: 0,
  crypto: 1
} as const

export const fileExtensions = {
  image: '.oram',
  clientState: '.oram-client',
  lock: '.oram.lock'
} as const

// Access operations
export const oramOp = {
  read: 0,
  write: 1
} as const
