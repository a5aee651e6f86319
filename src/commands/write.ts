import { command } from 'cleye'
import { OramStore } from '../path-oram'
import { encodingFlags, sharedFlags } from './flags'
import { encodePayload, parseBlockId } from './payload'

export const write = command(
  {
    name: 'write',
    parameters: ['<block>', '<data>'],
    flags: {
      ...sharedFlags,
      ...encodingFlags
    },
    help: {
      description: 'Write a block, zero-padded to the block size',
      examples: ['oram write 5 "hello"', 'oram write -e hex 12 deadbeef']
    }
  },
  async (argv) => {
    const store = await OramStore.create({ path: argv.flags.store })

    try {
      const [blockArg, data] = argv._
      const blockId = parseBlockId(blockArg, store.blockCount)
      if (blockId === null) {
        console.error(`Invalid block id "${blockArg}" (store has ${store.blockCount} blocks)`)
        process.exitCode = 1
        return
      }

      const block = encodePayload(data, argv.flags.encoding ?? 'utf8', store.geometry.blockSize)
      if (!block) {
        console.error(`Data does not fit in a ${store.geometry.blockSize}-byte block`)
        process.exitCode = 1
        return
      }

      await store.write(blockId, block)
      console.log(`Wrote block ${blockId}`)
    } finally {
      await store.close()
    }
  }
)
