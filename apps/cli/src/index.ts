#!/usr/bin/env tsx
import chalk from 'chalk'
import { errorMessage } from '@intentcfg/types'
import { createProgram } from './program.js'

try {
  await createProgram().parseAsync(process.argv)
} catch (error) {
  console.error(chalk.red(`[error] ${errorMessage(error)}`))
  process.exit(1)
}
