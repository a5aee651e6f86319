import { command } from 'cleye'
import { OramStore } from '../path-oram'
import { sharedFlags } from './flags'

export const inspect = command(
  {
    name: 'inspect',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show the geometry and stash usage of an ORAM store',
      examples: ['oram inspect', 'oram inspect -s ./weights.oram']
    }
  },
  async (argv) => {
    const store = await OramStore.create({ path: argv.flags.store })

    try {
      console.log(
        JSON.stringify(
          {
            files: store.paths,
            geometry: store.geometry,
            blockCount: store.blockCount,
            stash: {
              size: store.stats().stashSize,
              capacity: store.stats().stashCapacity
            }
          },
          null,
          2
        )
      )
    } finally {
      await store.close()
    }
  }
)
