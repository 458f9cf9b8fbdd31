/**
 * GitHub Actions runtime helpers
 *
 * Workflow commands and environment files, written inline to avoid a
 * dependency on @actions/core.
 */

import fs from 'node:fs'
import type { Logger } from '../types.js'

/**
 * Escape a workflow command message (%, CR and LF would end the command)
 */
export function escapeData(value: string): string {
  return value
    .replace(/%/g, '%25')
    .replace(/\r/g, '%0D')
    .replace(/\n/g, '%0A')
}

export function info(message: string): void {
  console.log(message)
}

export function debug(message: string): void {
  console.log(`::debug::${escapeData(message)}`)
}

export function warning(message: string): void {
  console.log(`::warning::${escapeData(message)}`)
}

export function error(message: string): void {
  console.log(`::error::${escapeData(message)}`)
}

export function setFailed(message: string): void {
  error(message)
  process.exitCode = 1
}

/**
 * Register a value to be masked in all later log output
 */
export function setSecret(value: string): void {
  console.log(`::add-mask::${escapeData(value)}`)
}

function appendEnvFile(filePath: string, name: string, value: string): void {
  if (value.includes('\n')) {
    const delimiter = `ghadelimiter_${Date.now()}`
    fs.appendFileSync(filePath, `${name}<<${delimiter}\n${value}\n${delimiter}\n`)
  } else {
    fs.appendFileSync(filePath, `${name}=${value}\n`)
  }
}

export function setOutput(name: string, value: string, env: Record<string, string | undefined> = process.env): void {
  const outputFile = env.GITHUB_OUTPUT
  if (outputFile) {
    appendEnvFile(outputFile, name, value)
  } else {
    // Outside a runner
    console.log(`${name}=${value}`)
  }
}

/**
 * Append markdown to the job summary, when the runner provides one
 */
export function appendSummary(markdown: string, env: Record<string, string | undefined> = process.env): boolean {
  const summaryFile = env.GITHUB_STEP_SUMMARY
  if (!summaryFile) {
    return false
  }
  fs.appendFileSync(summaryFile, markdown)
  return true
}

/**
 * Logger writing workflow commands. Debug lines show up with step debug
 * logging enabled, or always when `verbose` is set.
 */
export function createActionLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    debug: message => options.verbose ? info(message) : debug(message),
    info,
    warn: warning,
    error
  }
}
