#!/usr/bin/env tsx

import { loadBaseEnv, logger } from '@wordvm/core'
import { createCli } from './cli'

// Load environment variables
const env = loadBaseEnv()

// Initialize logger
logger.init(env.LOG_LEVEL)

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed:', error)
    process.exit(1)
  })
