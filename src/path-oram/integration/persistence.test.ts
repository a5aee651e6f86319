/**
 * Persistence integration tests for OramStore.
 * Stores are flushed to real files and reopened.
 */

import { readFile, rm, stat } from 'node:fs/promises'
import { describe, it, expect, afterEach } from 'vitest'
import { OramStore, storeExists } from '../oram-store'
import { ConfigurationError } from '../errors'
import { cleanup, createTestPaths, filled, type TestPaths } from './helpers'

describe('OramStore persistence', () => {
  const testPathsList: TestPaths[] = []

  afterEach(async () => {
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  it('should create both files for a new store', async () => {
    const paths = createTestPaths('create')
    testPathsList.push(paths)

    const store = await OramStore.create({
      path: paths.basePath,
      height: 3,
      blockSize: 8,
      seed: 0xdeadbeefn
    })
    await store.close()

    const image = await readFile(paths.imagePath)
    // 16-byte header + 60 slots of 16 bytes
    expect(image.length).toBe(976)
    expect(Array.from(image.subarray(0, 4))).toEqual([0x4d, 0x41, 0x52, 0x4f])
    // Every slot id is the empty pattern after initialization
    expect(Array.from(image.subarray(16, 24))).toEqual([
      0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff
    ])

    const clientState = await stat(paths.clientStatePath)
    // 28 header + 240 positions + 4 written count + 4 stash count + 8 footer
    expect(clientState.size).toBe(284)
    await expect(stat(paths.lockPath)).rejects.toThrow()
  })

  it('should keep blocks across reopen', async () => {
    const paths = createTestPaths('reopen')
    testPathsList.push(paths)

    const store = await OramStore.create({
      path: paths.basePath,
      height: 3,
      blockSize: 8,
      seed: 0xdeadbeefn
    })
    await store.write(5, filled(5))
    await store.write(12, filled(12))
    await store.close()

    const reopened = await OramStore.create({ path: paths.imagePath })
    expect(reopened.geometry.height).toBe(3)
    expect(reopened.blockCount).toBe(60)
    expect(Array.from(await reopened.read(5))).toEqual(Array.from(filled(5)))
    expect(Array.from(await reopened.read(12))).toEqual(Array.from(filled(12)))
    expect(Array.from(await reopened.read(30))).toEqual(Array.from(filled(0)))
    await reopened.close()
  })

  it('should continue the leaf sequence after reopen', async () => {
    const pathsA = createTestPaths('sequence-a')
    const pathsB = createTestPaths('sequence-b')
    testPathsList.push(pathsA, pathsB)

    const options = { height: 3, blockSize: 8, blockCount: 20, seed: 77n }
    const continuous = await OramStore.create({ ...options, path: pathsA.basePath })
    const interrupted = await OramStore.create({ ...options, path: pathsB.basePath })

    for (let id = 0; id < 10; id++) {
      await continuous.write(id, filled(id))
      await interrupted.write(id, filled(id))
    }
    await interrupted.close()
    const resumed = await OramStore.create({ path: pathsB.basePath })

    for (let id = 10; id < 20; id++) {
      await continuous.write(id, filled(id))
      await resumed.write(id, filled(id))
    }
    await continuous.close()
    await resumed.close()

    const imageA = await readFile(pathsA.imagePath)
    const imageB = await readFile(pathsB.imagePath)
    expect(imageB.equals(imageA)).toBe(true)
  })

  it('should keep the crypto sampler across reopen', async () => {
    const paths = createTestPaths('crypto')
    testPathsList.push(paths)

    const store = await OramStore.create({
      path: paths.basePath,
      height: 2,
      blockSize: 4,
      sampler: 'crypto'
    })
    await store.write(3, filled(7, 4))
    await store.close()

    const reopened = await OramStore.create({ path: paths.basePath })
    expect(Array.from(await reopened.read(3))).toEqual([7, 7, 7, 7])
    await reopened.close()
  })

  it('should report whether any store file exists', async () => {
    const paths = createTestPaths('exists')
    testPathsList.push(paths)

    expect(await storeExists(paths.basePath)).toBe(false)

    const store = await OramStore.create({ path: paths.basePath, height: 2, blockSize: 8 })
    await store.close()
    expect(await storeExists(paths.basePath)).toBe(true)
    expect(await storeExists(paths.imagePath)).toBe(true)

    await rm(paths.imagePath)
    expect(await storeExists(paths.basePath)).toBe(true)

    await rm(paths.clientStatePath)
    expect(await storeExists(paths.basePath)).toBe(false)
  })

  it('should require a geometry to create a store', async () => {
    const paths = createTestPaths('no-geometry')
    testPathsList.push(paths)

    await expect(OramStore.create({ path: paths.basePath })).rejects.toThrow(
      ConfigurationError
    )
  })

  it('should refuse operations after close', async () => {
    const paths = createTestPaths('closed')
    testPathsList.push(paths)

    const store = await OramStore.create({ path: paths.basePath, height: 2, blockSize: 4 })
    await store.close()

    await expect(store.read(0)).rejects.toThrow(`ORAM store is closed: ${paths.imagePath}`)
  })
})
