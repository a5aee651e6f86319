import { command } from 'cleye'
import { OramStore } from '../path-oram'
import { encodingFlags, sharedFlags } from './flags'
import { formatPayload, parseBlockId } from './payload'

export const read = command(
  {
    name: 'read',
    parameters: ['<block>'],
    flags: {
      ...sharedFlags,
      ...encodingFlags
    },
    help: {
      description: 'Read a block; never-written blocks read as zeroes',
      examples: ['oram read 5', 'oram read -e utf8 -s ./weights.oram 12']
    }
  },
  async (argv) => {
    const store = await OramStore.create({ path: argv.flags.store })

    try {
      const [blockArg] = argv._
      const blockId = parseBlockId(blockArg, store.blockCount)
      if (blockId === null) {
        console.error(`Invalid block id "${blockArg}" (store has ${store.blockCount} blocks)`)
        process.exitCode = 1
        return
      }

      const block = await store.read(blockId)
      console.log(formatPayload(block, argv.flags.encoding ?? 'hex'))
    } finally {
      await store.close()
    }
  }
)
