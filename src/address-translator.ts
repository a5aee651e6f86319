/**
 * Address translation for model parameters stored in fixed-size blocks.
 *
 * Each layer's elements are packed into a contiguous run of blocks that
 * follows the previous layer's run. An element never straddles two blocks,
 * so the tail of a block may stay unused.
 */

import invariant from 'tiny-invariant'
import { ConfigurationError } from './path-oram/errors'

export interface LayerLayout {
  /** Bytes per element */
  elementSize: number
  /** Whole elements that fit in one block */
  elementsPerBlock: number
  /** Elements in the layer */
  elementCount: number
  /** Blocks the layer occupies */
  blockCount: number
  /** First block of the layer */
  startBlock: number
}

export interface BlockLocation {
  block: number
  byteOffset: number
}

export interface WeightShape {
  /** Input columns processed in parallel, per layer */
  simd: readonly number[]
  /** Bits per weight, per layer */
  weightBits: readonly number[]
  /** Output rows processed in parallel, per layer */
  pe: readonly number[]
  /** Weight tiles per processing element, per layer */
  tiles: readonly number[]
}

export interface ThresholdShape {
  /** Neuron folds, per layer */
  nf: readonly number[]
  /** Processing elements, per layer */
  pe: readonly number[]
  /** Thresholds per output, per layer */
  numThresholds: readonly number[]
  /** Bits per threshold, per layer */
  thresholdBits: readonly number[]
}

export function ceilDiv(numerator: number, denominator: number): number {
  return Math.floor(numerator / denominator) + (numerator % denominator !== 0 ? 1 : 0)
}

/**
 * Shared layout computation; subclasses define how structured coordinates
 * flatten into a per-layer element index.
 */
export abstract class AddressTranslator {
  public readonly blockSize: number
  public readonly layerCount: number

  private readonly layouts: readonly LayerLayout[]

  protected constructor(
    blockSize: number,
    elementBits: readonly number[],
    elementCounts: readonly number[],
    blockOffset: number
  ) {
    if (!Number.isInteger(blockSize) || blockSize < 1) {
      throw new ConfigurationError(
        `Block size must be a positive integer, got ${blockSize}`
      )
    }
    if (!Number.isInteger(blockOffset) || blockOffset < 0) {
      throw new ConfigurationError(
        `Block offset must be a non-negative integer, got ${blockOffset}`
      )
    }

    const layouts: LayerLayout[] = []
    let nextBlock = blockOffset

    for (let layer = 0; layer < elementBits.length; layer++) {
      const elementSize = ceilDiv(elementBits[layer], 8)
      if (elementSize > blockSize) {
        throw new ConfigurationError(
          `Layer ${layer} elements take ${elementSize} bytes, more than the ${blockSize}-byte block`
        )
      }

      const elementsPerBlock = Math.floor(blockSize / elementSize)
      const elementCount = elementCounts[layer]
      const blockCount = ceilDiv(elementCount, elementsPerBlock)

      layouts.push(
        Object.freeze({
          elementSize,
          elementsPerBlock,
          elementCount,
          blockCount,
          startBlock: nextBlock
        })
      )
      nextBlock += blockCount
    }

    this.blockSize = blockSize
    this.layerCount = layouts.length
    this.layouts = Object.freeze(layouts)
  }

  elementSize(layer: number): number {
    return this.layout(layer).elementSize
  }

  blockElements(layer: number): number {
    return this.layout(layer).elementsPerBlock
  }

  startBlock(layer: number): number {
    return this.layout(layer).startBlock
  }

  blockCount(layer: number): number {
    return this.layout(layer).blockCount
  }

  layout(layer: number): LayerLayout {
    this.assertLayer(layer)
    return this.layouts[layer]
  }

  /**
   * One past the last block used by any layer.
   */
  totalBlocks(): number {
    if (this.layerCount === 0) {
      return 0
    }
    const last = this.layouts[this.layerCount - 1]
    return last.startBlock + last.blockCount
  }

  protected assertLayer(layer: number): void {
    invariant(
      Number.isInteger(layer) && layer >= 0 && layer < this.layerCount,
      `layer ${layer} is out of range`
    )
  }

  /**
   * Location of the element with the given flat index inside a layer.
   */
  elementToBlock(layer: number, element: number): BlockLocation {
    const layout = this.layout(layer)
    invariant(
      Number.isInteger(element) && element >= 0 && element < layout.elementCount,
      `element ${element} is outside layer ${layer}`
    )

    return {
      block: layout.startBlock + Math.floor(element / layout.elementsPerBlock),
      byteOffset: layout.elementSize * (element % layout.elementsPerBlock)
    }
  }
}

/**
 * Weight matrices, addressed by (layer, pe, tile). One element holds the
 * `simd` weights a processing element consumes per tile.
 */
export class WeightAddressTranslator extends AddressTranslator {
  private readonly tiles: readonly number[]
  private readonly pe: readonly number[]

  constructor(blockSize: number, shape: WeightShape, blockOffset = 0) {
    const layers = validateShape([
      ['simd', shape.simd],
      ['weightBits', shape.weightBits],
      ['pe', shape.pe],
      ['tiles', shape.tiles]
    ])

    super(
      blockSize,
      layers.map((layer) => shape.weightBits[layer] * shape.simd[layer]),
      layers.map((layer) => shape.pe[layer] * shape.tiles[layer]),
      blockOffset
    )

    this.tiles = Object.freeze([...shape.tiles])
    this.pe = Object.freeze([...shape.pe])
  }

  indexToBlock(layer: number, pe: number, tile: number): BlockLocation {
    this.assertLayer(layer)
    invariant(
      Number.isInteger(pe) && pe >= 0 && pe < this.pe[layer],
      `pe ${pe} is outside layer ${layer}`
    )
    invariant(
      Number.isInteger(tile) && tile >= 0 && tile < this.tiles[layer],
      `tile ${tile} is outside layer ${layer}`
    )
    return this.elementToBlock(layer, pe * this.tiles[layer] + tile)
  }
}

/**
 * Activation thresholds, addressed by (layer, pe, nf, threshold).
 */
export class ThresholdAddressTranslator extends AddressTranslator {
  private readonly nf: readonly number[]
  private readonly pe: readonly number[]
  private readonly numThresholds: readonly number[]

  constructor(blockSize: number, shape: ThresholdShape, blockOffset = 0) {
    const layers = validateShape([
      ['nf', shape.nf],
      ['pe', shape.pe],
      ['numThresholds', shape.numThresholds],
      ['thresholdBits', shape.thresholdBits]
    ])

    super(
      blockSize,
      layers.map((layer) => shape.thresholdBits[layer]),
      layers.map(
        (layer) => shape.pe[layer] * shape.nf[layer] * shape.numThresholds[layer]
      ),
      blockOffset
    )

    this.nf = Object.freeze([...shape.nf])
    this.pe = Object.freeze([...shape.pe])
    this.numThresholds = Object.freeze([...shape.numThresholds])
  }

  indexToBlock(
    layer: number,
    pe: number,
    nf: number,
    threshold: number
  ): BlockLocation {
    this.assertLayer(layer)
    invariant(
      Number.isInteger(pe) && pe >= 0 && pe < this.pe[layer],
      `pe ${pe} is outside layer ${layer}`
    )
    invariant(
      Number.isInteger(nf) && nf >= 0 && nf < this.nf[layer],
      `nf ${nf} is outside layer ${layer}`
    )
    invariant(
      Number.isInteger(threshold) && threshold >= 0 && threshold < this.numThresholds[layer],
      `threshold ${threshold} is outside layer ${layer}`
    )

    const thresholds = this.numThresholds[layer]
    const element = pe * this.nf[layer] * thresholds + nf * thresholds + threshold
    return this.elementToBlock(layer, element)
  }
}

/**
 * Checks that every per-layer array has the same length and holds positive
 * integers. Returns the layer indices.
 */
function validateShape(
  arrays: ReadonlyArray<[string, readonly number[]]>
): number[] {
  const layerCount = arrays[0][1].length

  for (const [name, values] of arrays) {
    if (values.length !== layerCount) {
      throw new ConfigurationError(
        `Shape array "${name}" has ${values.length} layers, expected ${layerCount}`
      )
    }
    values.forEach((value, layer) => {
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(
          `Shape array "${name}" has invalid value ${value} at layer ${layer}`
        )
      }
    })
  }

  return Array.from({ length: layerCount }, (_, layer) => layer)
}
