/**
 * secret-fleet GitHub Action entry point
 */

import { run } from './main.js'
import { setFailed } from './core.js'
import { formatErrorForCli } from '../lib/errors.js'

// The runner sends SIGINT on cancellation: let in-flight batches finish, start no new ones
const controller = new AbortController()
process.once('SIGINT', () => controller.abort())
process.once('SIGTERM', () => controller.abort())

run({ signal: controller.signal }).catch((error: unknown) => {
  setFailed(formatErrorForCli(error))
})
