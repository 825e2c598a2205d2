#!/usr/bin/env node
import { configureLogger } from '@tierline/telemetry'
import { createProgram, formatStartupFailure } from './cli.js'

await configureLogger()

try {
  await createProgram().parseAsync(process.argv)
} catch (err) {
  console.error(formatStartupFailure(err))
  process.exitCode = 1
}
