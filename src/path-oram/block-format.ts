/**
 * Server memory wire format.
 *
 * Server memory is a flat run of slots, bucket after bucket in level order:
 * [id:idSize][payload:blockSize] per slot. The id is little-endian; an
 * empty slot has every id bit set.
 *
 * A persisted server image prefixes that run with a 16-byte header:
 * [magic:4][version:2][height:1][bucketSize:1][idSize:1][reserved:3][blockSize:4]
 */

import invariant from 'tiny-invariant'
import {
  emptyBlockId,
  imageMagic,
  imageVersion,
  imageHeaderSize,
  imageHeaderOffsets
} from './constants'
import type { IdBlock, OramGeometry } from './types'

export interface ImageHeader {
  version: number
  height: number
  bucketSize: number
  idSize: number
  blockSize: number
}

/**
 * The all-ones id of the given byte width, which marks an empty slot.
 */
export function emptyIdPattern(idSize: number): bigint {
  return (1n << BigInt(idSize * 8)) - 1n
}

/**
 * Write a block id little-endian: byte i is `(id >> 8i) & 0xff`.
 */
export function writeBlockId(
  target: Uint8Array,
  offset: number,
  id: number,
  idSize: number
): void {
  const pattern = emptyIdPattern(idSize)
  const value = id === emptyBlockId ? pattern : BigInt(id)
  invariant(
    id === emptyBlockId || (id >= 0 && value < pattern),
    `block id ${id} does not fit in ${idSize} byte(s)`
  )

  for (let i = 0; i < idSize; i++) {
    target[offset + i] = Number((value >> BigInt(i * 8)) & 0xffn)
  }
}

/**
 * Read a little-endian block id. The all-ones pattern reads as `emptyBlockId`.
 */
export function readBlockId(
  source: Uint8Array,
  offset: number,
  idSize: number
): number {
  let value = 0n
  for (let i = 0; i < idSize; i++) {
    value |= BigInt(source[offset + i]) << BigInt(i * 8)
  }

  if (value === emptyIdPattern(idSize)) {
    return emptyBlockId
  }
  invariant(
    value <= BigInt(Number.MAX_SAFE_INTEGER),
    `block id ${value} is out of range`
  )
  return Number(value)
}

/**
 * Encode one slot at the given byte offset.
 */
export function encodeSlot(
  target: Uint8Array,
  offset: number,
  block: IdBlock,
  geometry: OramGeometry
): void {
  writeBlockId(target, offset, block.id, geometry.idSize)
  if (block.id !== emptyBlockId) {
    invariant(
      block.data.length === geometry.blockSize,
      `payload must be ${geometry.blockSize} bytes, got ${block.data.length}`
    )
    target.set(block.data, offset + geometry.idSize)
  }
}

/**
 * Decode one slot into `into`, reusing its payload buffer.
 */
export function decodeSlot(
  source: Uint8Array,
  offset: number,
  geometry: OramGeometry,
  into: IdBlock
): IdBlock {
  into.id = readBlockId(source, offset, geometry.idSize)
  const payloadStart = offset + geometry.idSize
  into.data.set(source.subarray(payloadStart, payloadStart + geometry.blockSize))
  return into
}

/**
 * Serialize the server image header.
 */
export function serializeImageHeader(geometry: OramGeometry): Uint8Array {
  const buffer = new Uint8Array(imageHeaderSize)
  const view = new DataView(buffer.buffer)

  view.setUint32(imageHeaderOffsets.magic, imageMagic, true)
  view.setUint16(imageHeaderOffsets.version, imageVersion, true)
  view.setUint8(imageHeaderOffsets.height, geometry.height)
  view.setUint8(imageHeaderOffsets.bucketSize, geometry.bucketSize)
  view.setUint8(imageHeaderOffsets.idSize, geometry.idSize)
  view.setUint32(imageHeaderOffsets.blockSize, geometry.blockSize, true)

  // Reserved bytes are already zero

  return buffer
}

/**
 * Deserialize the server image header.
 * Returns null if the magic or version does not match.
 */
export function deserializeImageHeader(data: Uint8Array): ImageHeader | null {
  if (data.length < imageHeaderSize) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  const magic = view.getUint32(imageHeaderOffsets.magic, true)
  if (magic !== imageMagic) {
    return null
  }

  const version = view.getUint16(imageHeaderOffsets.version, true)
  if (version !== imageVersion) {
    return null
  }

  return {
    version,
    height: view.getUint8(imageHeaderOffsets.height),
    bucketSize: view.getUint8(imageHeaderOffsets.bucketSize),
    idSize: view.getUint8(imageHeaderOffsets.idSize),
    blockSize: view.getUint32(imageHeaderOffsets.blockSize, true)
  }
}
