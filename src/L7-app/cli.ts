#!/usr/bin/env node
import { createProgram } from './program.js'
import logger from '../L1-infra/logger/configLogger.js'

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err)
    logger.debug(err instanceof Error && err.stack ? err.stack : message)
    console.error(`Error: ${message}`)
    process.exitCode = 1
  })
