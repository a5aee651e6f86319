/**
 * Binary format of the persisted client state.
 *
 * Layout (little-endian):
 * - Magic (4 bytes): 0x4F524353 ("ORCS")
 * - Version (2 bytes)
 * - Sampler kind (1 byte): 0 = xorshift64, 1 = crypto
 * - Flags (1 byte): reserved, zero
 * - RNG state (8 bytes)
 * - Block count N (4 bytes)
 * - Stash capacity (4 bytes)
 * - Image checksum (4 bytes): CRC32 of the server memory flushed with it
 * - Position map (N * 4 bytes)
 * - Written count W (4 bytes), then W ids (4 bytes each)
 * - Stash count S (4 bytes), then S entries of [id:4][payload:blockSize]
 * - Checksum (4 bytes): CRC32 of everything above
 * - Trailer (4 bytes): 0xDEADBEEF
 */

import {
  clientStateMagic,
  clientStateOffsets,
  clientStateTrailer,
  clientStateVersion,
  samplerKind
} from './constants'
import type { OramClientState } from './path-oram'
import type { IdBlock, SamplerKind } from './types'

/**
 * Client state as persisted, tied to the server image it was flushed with.
 */
export interface StoredClientState extends OramClientState {
  imageChecksum: number
}

/**
 * Total serialized size of a client state.
 */
export function clientStateSize(
  state: Pick<OramClientState, 'blockCount' | 'written' | 'stash'>,
  blockSize: number
): number {
  return (
    clientStateOffsets.positionMap +
    state.blockCount * 4 +
    4 +
    state.written.length * 4 +
    4 +
    state.stash.length * (4 + blockSize) +
    8
  )
}

export function serializeClientState(
  state: StoredClientState,
  blockSize: number
): Uint8Array {
  const buffer = new Uint8Array(clientStateSize(state, blockSize))
  const view = new DataView(buffer.buffer)

  view.setUint32(clientStateOffsets.magic, clientStateMagic, true)
  view.setUint16(clientStateOffsets.version, clientStateVersion, true)
  view.setUint8(clientStateOffsets.samplerKind, state.samplerKind)
  view.setUint8(clientStateOffsets.flags, 0)
  view.setBigUint64(clientStateOffsets.rngState, state.rngState, true)
  view.setUint32(clientStateOffsets.blockCount, state.blockCount, true)
  view.setUint32(clientStateOffsets.stashCapacity, state.stashCapacity, true)
  view.setUint32(clientStateOffsets.imageChecksum, state.imageChecksum, true)

  let offset = clientStateOffsets.positionMap
  for (const leaf of state.positions) {
    view.setUint32(offset, leaf, true)
    offset += 4
  }

  view.setUint32(offset, state.written.length, true)
  offset += 4
  for (const id of state.written) {
    view.setUint32(offset, id, true)
    offset += 4
  }

  view.setUint32(offset, state.stash.length, true)
  offset += 4
  for (const block of state.stash) {
    view.setUint32(offset, block.id, true)
    offset += 4
    buffer.set(block.data, offset)
    offset += blockSize
  }

  view.setUint32(offset, crc32(buffer.subarray(0, offset)), true)
  offset += 4

  view.setUint32(offset, clientStateTrailer, true)

  return buffer
}

/**
 * Deserialize a client state.
 * Returns null if the data is truncated, corrupted or of another version.
 */
export function deserializeClientState(
  data: Uint8Array,
  blockSize: number
): StoredClientState | null {
  if (data.length < clientStateOffsets.positionMap + 16) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  if (view.getUint32(clientStateOffsets.magic, true) !== clientStateMagic) {
    return null
  }
  if (view.getUint16(clientStateOffsets.version, true) !== clientStateVersion) {
    return null
  }

  const kind = parseSamplerKind(view.getUint8(clientStateOffsets.samplerKind))
  if (kind === null) {
    return null
  }

  const rngState = view.getBigUint64(clientStateOffsets.rngState, true)
  const blockCount = view.getUint32(clientStateOffsets.blockCount, true)
  const stashCapacity = view.getUint32(clientStateOffsets.stashCapacity, true)
  const imageChecksum = view.getUint32(clientStateOffsets.imageChecksum, true)

  // Checksum and trailer sit at the end, whatever the section sizes
  const checksumOffset = data.length - 8
  if (view.getUint32(checksumOffset + 4, true) !== clientStateTrailer) {
    return null
  }
  if (view.getUint32(checksumOffset, true) !== crc32(data.subarray(0, checksumOffset))) {
    return null
  }

  let offset = clientStateOffsets.positionMap
  if (offset + blockCount * 4 + 4 > checksumOffset) {
    return null
  }
  const positions = new Uint32Array(blockCount)
  for (let id = 0; id < blockCount; id++) {
    positions[id] = view.getUint32(offset, true)
    offset += 4
  }

  const writtenCount = view.getUint32(offset, true)
  offset += 4
  if (offset + writtenCount * 4 + 4 > checksumOffset) {
    return null
  }
  const written: number[] = []
  for (let i = 0; i < writtenCount; i++) {
    written.push(view.getUint32(offset, true))
    offset += 4
  }

  const stashCount = view.getUint32(offset, true)
  offset += 4
  if (offset + stashCount * (4 + blockSize) !== checksumOffset) {
    return null
  }
  const stash: IdBlock[] = []
  for (let i = 0; i < stashCount; i++) {
    const id = view.getUint32(offset, true)
    offset += 4
    stash.push({ id, data: data.slice(offset, offset + blockSize) })
    offset += blockSize
  }

  return {
    samplerKind: kind,
    rngState,
    blockCount,
    stashCapacity,
    imageChecksum,
    positions,
    written,
    stash
  }
}

function parseSamplerKind(value: number): SamplerKind | null {
  if (value === samplerKind.xorshift) {
    return samplerKind.xorshift
  }
  if (value === samplerKind.crypto) {
    return samplerKind.crypto
  }
  return null
}

/**
 * CRC32 with the standard (IEEE) polynomial.
 */
const crc32Table = makeCrc32Table()

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let j = 0; j < 8; j++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
    }
    table[i] = c
  }
  return table
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}
