/**
 * Readers that fetch model parameters out of ORAM blocks by structured
 * coordinates, and the matching writer that packs a layer into blocks.
 */

import invariant from 'tiny-invariant'
import { BlockCache } from './block-cache'
import type { BlockSource } from './block-cache'
import type {
  AddressTranslator,
  BlockLocation,
  ThresholdAddressTranslator,
  WeightAddressTranslator
} from './address-translator'

/**
 * Anything blocks can be written to.
 */
export interface BlockSink {
  write(blockId: number, data: Uint8Array): void | Promise<void>
}

/**
 * Interpret bytes as an unsigned little-endian integer.
 */
export function decodeLittleEndian(bytes: Uint8Array): bigint {
  let value = 0n
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i])
  }
  return value
}

/**
 * Encode an unsigned integer little-endian into `size` bytes.
 */
export function encodeLittleEndian(value: bigint, size: number): Uint8Array {
  invariant(
    value >= 0n && value < 1n << BigInt(size * 8),
    `value ${value} does not fit in ${size} byte(s)`
  )

  const bytes = new Uint8Array(size)
  let remaining = value
  for (let i = 0; i < size; i++) {
    bytes[i] = Number(remaining & 0xffn)
    remaining >>= 8n
  }
  return bytes
}

export abstract class ParameterReader<T extends AddressTranslator> {
  readonly translator: T
  readonly cache: BlockCache

  /**
   * @param cacheBlocks - Blocks kept in the reader's LRU cache (default: 1)
   */
  constructor(source: BlockSource, translator: T, cacheBlocks = 1) {
    this.translator = translator
    this.cache = new BlockCache(source, cacheBlocks)
  }

  protected async readAt(layer: number, location: BlockLocation): Promise<Uint8Array> {
    const block = await this.cache.get(location.block)
    invariant(
      block.length === this.translator.blockSize,
      `block ${location.block} has ${block.length} bytes, expected ${this.translator.blockSize}`
    )
    const size = this.translator.elementSize(layer)
    return block.slice(location.byteOffset, location.byteOffset + size)
  }
}

export class WeightReader extends ParameterReader<WeightAddressTranslator> {
  /**
   * Bytes of the weight element at (layer, pe, tile).
   */
  async read(layer: number, pe: number, tile: number): Promise<Uint8Array> {
    return this.readAt(layer, this.translator.indexToBlock(layer, pe, tile))
  }

  async readValue(layer: number, pe: number, tile: number): Promise<bigint> {
    return decodeLittleEndian(await this.read(layer, pe, tile))
  }
}

export class ThresholdReader extends ParameterReader<ThresholdAddressTranslator> {
  /**
   * Bytes of the threshold at (layer, pe, nf, threshold).
   */
  async read(
    layer: number,
    pe: number,
    nf: number,
    threshold: number
  ): Promise<Uint8Array> {
    return this.readAt(layer, this.translator.indexToBlock(layer, pe, nf, threshold))
  }

  async readValue(
    layer: number,
    pe: number,
    nf: number,
    threshold: number
  ): Promise<bigint> {
    return decodeLittleEndian(await this.read(layer, pe, nf, threshold))
  }
}

/**
 * Pack a layer's elements, in flat index order, into the layer's block
 * range and write every block. Unused block tails are zero.
 */
export async function writeLayer(
  sink: BlockSink,
  translator: AddressTranslator,
  layer: number,
  elements: readonly Uint8Array[]
): Promise<void> {
  const layout = translator.layout(layer)
  invariant(
    elements.length === layout.elementCount,
    `layer ${layer} has ${layout.elementCount} elements, got ${elements.length}`
  )

  for (let index = 0; index < layout.blockCount; index++) {
    const block = new Uint8Array(translator.blockSize)
    const first = index * layout.elementsPerBlock
    const last = Math.min(first + layout.elementsPerBlock, layout.elementCount)

    for (let element = first; element < last; element++) {
      const bytes = elements[element]
      invariant(
        bytes.length === layout.elementSize,
        `element ${element} must be ${layout.elementSize} bytes, got ${bytes.length}`
      )
      block.set(bytes, (element - first) * layout.elementSize)
    }

    await sink.write(layout.startBlock + index, block)
  }
}
