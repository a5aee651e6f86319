import { rm } from 'node:fs/promises'

export interface TestPaths {
  basePath: string
  imagePath: string
  clientStatePath: string
  lockPath: string
}

/**
 * Generate unique store paths with a prefix.
 */
export function createTestPaths(prefix: string): TestPaths {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  const basePath = `/tmp/test-oram-${prefix}-${id}`
  return {
    basePath,
    imagePath: `${basePath}.oram`,
    clientStatePath: `${basePath}.oram-client`,
    lockPath: `${basePath}.oram.lock`
  }
}

/**
 * Remove every file a store may have left behind.
 */
export async function cleanup(paths: TestPaths[]): Promise<void> {
  for (const { imagePath, clientStatePath, lockPath } of paths) {
    for (const filePath of [
      imagePath,
      `${imagePath}.tmp`,
      clientStatePath,
      `${clientStatePath}.tmp`,
      lockPath
    ]) {
      await rm(filePath, { force: true })
    }
  }
}

/**
 * Flip a single byte in a byte array at the specified index.
 */
export function flipByte(data: Uint8Array, index: number): void {
  if (index >= 0 && index < data.length) {
    data[index] = data[index] ^ 0xff
  }
}

export function filled(value: number, size = 8): Uint8Array {
  return new Uint8Array(size).fill(value)
}
