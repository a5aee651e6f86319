import type { PayloadEncoding } from './flags'

/**
 * Parse a block id argument, or return null if it is not a valid id.
 */
export function parseBlockId(value: string, blockCount: number): number | null {
  if (!/^\d+$/.test(value)) {
    return null
  }
  const blockId = Number(value)
  return blockId < blockCount ? blockId : null
}

/**
 * Encode a payload argument into a zero-padded block.
 * Returns null if it does not fit.
 */
export function encodePayload(
  value: string,
  encoding: PayloadEncoding,
  blockSize: number
): Uint8Array | null {
  const bytes = Buffer.from(value, encoding)
  if (bytes.length > blockSize) {
    return null
  }
  const block = new Uint8Array(blockSize)
  block.set(bytes)
  return block
}

/**
 * Format a block for display. utf8 drops trailing zero padding.
 */
export function formatPayload(block: Uint8Array, encoding: PayloadEncoding): string {
  if (encoding === 'hex') {
    return Buffer.from(block).toString('hex')
  }
  let end = block.length
  while (end > 0 && block[end - 1] === 0) {
    end--
  }
  return Buffer.from(block.subarray(0, end)).toString('utf8')
}
