/**
 * secret-fleet GitHub Action - Input Parser
 *
 * Parses and validates inputs from GitHub Actions environment variables.
 * Inputs are available as INPUT_<NAME> environment variables.
 */

import type { TriggerKind } from '../types.js'
import type { SecretEntry } from '../lib/config-loader.js'
import { splitList } from '../lib/config-loader.js'
import { AuthorizationError, InvalidConfigError } from '../lib/errors.js'

type Env = Record<string, string | undefined>

export interface ActionInputs {
  // Credentials and target
  token: string
  /** Empty when the input is absent; the config file and GITHUB_REPOSITORY_OWNER come next */
  owner: string
  /** GitHub Enterprise Server API URL */
  apiUrl?: string

  // Trigger
  trigger: TriggerKind
  /** Requested mode; scheduled runs ignore `false` */
  dryRun: boolean

  // Filters
  repositoryFilter?: string
  specificRepos: string[]

  // Secrets
  secrets: SecretEntry[]
  envFile?: string

  // Scheduling
  batchSize?: number
  maxParallelBatches?: number

  // Behavior
  configPath?: string
  failOnError: boolean
  maskValues: boolean
  verbose: boolean
}

/**
 * Get input from GitHub Actions environment
 * INPUT_<NAME> upper-cased with spaces as underscores; dashes are kept (INPUT_DRY-RUN)
 */
export function getInput(name: string, env: Env = process.env): string {
  const envName = `INPUT_${name.replace(/ /g, '_').toUpperCase()}`
  return (env[envName] || '').trim()
}

/**
 * Get boolean input
 */
export function getBooleanInput(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  const value = getInput(name, env).toLowerCase()
  if (!value) return defaultValue
  return value === 'true' || value === 'yes' || value === '1'
}

/**
 * Get integer input (>= 1)
 */
export function getIntegerInput(name: string, env: Env = process.env): number | undefined {
  const value = getInput(name, env)
  if (!value) return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidConfigError(`input "${name}" must be a positive integer, got "${value}"`)
  }
  return parsed
}

/**
 * Parse secrets-to-create
 *
 *   NPM_TOKEN                        value from $NPM_TOKEN
 *   SONAR_TOKEN=env:ORG_SONAR_TOKEN  value from $ORG_SONAR_TOKEN
 *   DEPLOY_KEY=dotenv:.env.fleet     value from DEPLOY_KEY in .env.fleet
 */
export function parseSecretsInput(value: string): SecretEntry[] {
  return splitList(value).map(item => {
    const eq = item.indexOf('=')
    if (eq === -1) {
      return { name: item }
    }
    const name = item.slice(0, eq).trim()
    const source = item.slice(eq + 1).trim()
    return source ? { name, source } : { name }
  })
}

/**
 * Trigger of the current workflow run
 */
export function getTrigger(env: Env = process.env): TriggerKind {
  return env.GITHUB_EVENT_NAME === 'schedule' ? 'schedule' : 'manual'
}

/**
 * Parse and validate all inputs
 */
export function getInputs(env: Env = process.env): ActionInputs {
  // Token - check env vars as fallback
  const token = getInput('token', env) ||
    env.GITHUB_TOKEN ||
    env.GH_TOKEN ||
    ''

  if (!token) {
    throw new AuthorizationError('No GitHub token. Set the "token" input or GITHUB_TOKEN environment variable.')
  }

  return {
    token,
    owner: getInput('owner', env),
    apiUrl: env.GITHUB_API_URL || undefined,
    trigger: getTrigger(env),
    dryRun: getBooleanInput('dry-run', true, env),
    repositoryFilter: getInput('repository-filter', env) || undefined,
    specificRepos: splitList(getInput('specific-repos', env)),
    secrets: parseSecretsInput(getInput('secrets-to-create', env)),
    envFile: getInput('env-file', env) || undefined,
    batchSize: getIntegerInput('batch-size', env),
    maxParallelBatches: getIntegerInput('max-parallel-batches', env),
    configPath: getInput('config', env) || undefined,
    failOnError: getBooleanInput('fail-on-error', true, env),
    maskValues: getBooleanInput('mask-values', true, env),
    verbose: getBooleanInput('verbose', false, env)
  }
}
