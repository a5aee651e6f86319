import { command } from 'cleye'
import { OramStore, storeExists } from '../path-oram'
import { geometryFlags, sharedFlags } from './flags'

export const init = command(
  {
    name: 'init',
    flags: {
      ...sharedFlags,
      ...geometryFlags
    },
    help: {
      description: 'Create a new ORAM store',
      examples: [
        'oram init -L 8 -b 32',
        'oram init -s ./weights.oram -L 12 -b 64 --sampler crypto'
      ]
    }
  },
  async (argv) => {
    const { flags } = argv
    if (await storeExists(flags.store)) {
      console.error(`A store already exists at ${flags.store}`)
      process.exitCode = 1
      return
    }

    const store = await OramStore.create({
      path: flags.store,
      height: flags.height,
      blockSize: flags.blockSize,
      bucketSize: flags.bucketSize,
      idSize: flags.idSize,
      blockCount: flags.blockCount,
      stashCapacity: flags.stashCapacity,
      seed: flags.seed,
      sampler: flags.sampler
    })

    try {
      const { geometry } = store
      console.log(`Created ORAM store: ${store.paths.image}`)
      console.log(
        `  height: ${geometry.height}, buckets: ${geometry.bucketCount}, ` +
          `slots: ${geometry.slotCount}, block size: ${geometry.blockSize}`
      )
      console.log(
        `  blocks: ${store.blockCount}, stash capacity: ${store.stats().stashCapacity}`
      )
    } finally {
      await store.close()
    }
  }
)
