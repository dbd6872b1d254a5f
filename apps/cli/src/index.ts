#!/usr/bin/env node
import 'dotenv/config'
import { createLogger } from '@steward/core'
import { run } from './cli'

const log = createLogger('cli')

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error('Unexpected failure', error)
    process.exitCode = 1
  })
