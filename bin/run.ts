#!/usr/bin/env node

import { config as loadDotenv } from 'dotenv'
import { hideBin } from 'yargs/helpers'
import { runCli } from '../src/cli/cli'
import { logger } from '../src/logger'

// SWEEP_EMAIL / SWEEP_PASSWORD and SWEEP_* overrides may live in .env
loadDotenv()

runCli(hideBin(process.argv)).catch((error: unknown) => {
  logger.error('sweep failed:', error)
  process.exit(1)
})
