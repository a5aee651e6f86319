#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { init } from './commands/init'
import { inspect } from './commands/inspect'
import { read } from './commands/read'
import { write } from './commands/write'
import { isPackageJson } from './types'

function loadPackageJson() {
  const parsed: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'package.json'), 'utf8')
  )
  if (!isPackageJson(parsed)) {
    throw new Error('package.json is missing name, version or description')
  }
  return parsed
}

const packageJson = loadPackageJson()

cli({
  name: 'oram',
  version: packageJson.version,
  help: {
    description: packageJson.description
  },
  commands: [init, write, read, inspect]
})
