/**
 * Run configuration
 *
 * A RunConfig is built once from the trigger inputs (and the optional config
 * file), validated, frozen and never mutated afterwards.
 */

import type {
  BackoffConfig,
  RepositoryFilter,
  RunConfig,
  SecretSpec,
  TriggerKind
} from './types.js'
import {
  DEFAULT_BACKOFF,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PARALLEL_BATCHES,
  REPOSITORY_FILTERS
} from './types.js'
import { DuplicateSecretError, InvalidConfigError, MissingInputError } from './lib/errors.js'
import { createSecretSpec } from './lib/secret-resolver.js'
import type { FleetFileConfig, SecretEntry } from './lib/config-loader.js'

export interface RunConfigInput {
  account: string
  trigger?: TriggerKind
  /** Requested mode; live runs must ask for `false` explicitly */
  dryRun?: boolean
  repositoryFilter?: string
  specificRepos?: readonly string[]
  secrets: ReadonlyArray<SecretSpec | SecretEntry>
  batchSize?: number
  maxParallelBatches?: number
  backoff?: Partial<BackoffConfig>
}

/**
 * Scheduled runs are always dry runs, whatever was requested.
 * Manual runs honor the request and default to a dry run.
 */
export function resolveDryRun(trigger: TriggerKind, requested: boolean | undefined): { dryRun: boolean; forced: boolean } {
  if (trigger === 'schedule') {
    return { dryRun: true, forced: requested === false }
  }
  return { dryRun: requested ?? true, forced: false }
}

export function parseRepositoryFilter(value: string | undefined): RepositoryFilter {
  if (value === undefined || value.trim() === '') {
    return 'all'
  }
  const normalized = value.trim().toLowerCase()
  const match = REPOSITORY_FILTERS.find(filter => filter === normalized)
  if (!match) {
    throw new InvalidConfigError(`repository filter "${value}" must be one of ${REPOSITORY_FILTERS.join(', ')}`)
  }
  return match
}

function positiveInteger(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback
  }
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

function nonNegativeInteger(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidConfigError(`${name} must be a non-negative integer, got ${value}`)
  }
  return value
}

function isSecretSpec(value: SecretSpec | SecretEntry): value is SecretSpec {
  return typeof value.source === 'object'
}

/**
 * Validate inputs and build the frozen RunConfig
 */
export function createRunConfig(input: RunConfigInput): RunConfig {
  const account = input.account.trim()
  if (!account) {
    throw new MissingInputError('owner')
  }

  const trigger = input.trigger ?? 'manual'
  const { dryRun, forced } = resolveDryRun(trigger, input.dryRun)
  const repositoryFilter = parseRepositoryFilter(input.repositoryFilter)

  const specificRepos = (input.specificRepos ?? []).map(name => name.trim()).filter(Boolean)
  if (repositoryFilter === 'specific' && specificRepos.length === 0) {
    throw new InvalidConfigError('repository filter "specific" needs at least one repository in specific_repos')
  }

  if (input.secrets.length === 0) {
    throw new MissingInputError('secrets-to-create')
  }

  const secrets: SecretSpec[] = []
  const names = new Set<string>()
  const targets = new Set<string>()
  for (const entry of input.secrets) {
    const spec = isSecretSpec(entry) ? entry : createSecretSpec(entry)
    if (names.has(spec.name)) {
      throw new DuplicateSecretError(spec.name)
    }
    // GitHub secret names are case-insensitive
    const targetKey = spec.target.toUpperCase()
    if (targets.has(targetKey)) {
      throw new DuplicateSecretError(spec.target)
    }
    names.add(spec.name)
    targets.add(targetKey)
    secrets.push(Object.freeze({ ...spec, source: Object.freeze({ ...spec.source }) }))
  }

  const backoff: BackoffConfig = Object.freeze({
    maxAttempts: positiveInteger(input.backoff?.maxAttempts, DEFAULT_BACKOFF.maxAttempts, 'backoff.max_attempts'),
    baseDelayMs: nonNegativeInteger(input.backoff?.baseDelayMs, DEFAULT_BACKOFF.baseDelayMs, 'backoff.base_delay_ms'),
    maxDelayMs: nonNegativeInteger(input.backoff?.maxDelayMs, DEFAULT_BACKOFF.maxDelayMs, 'backoff.max_delay_ms')
  })

  return Object.freeze({
    account,
    trigger,
    dryRun,
    dryRunForced: forced,
    repositoryFilter,
    specificRepos: Object.freeze(repositoryFilter === 'specific' ? specificRepos : []),
    secrets: Object.freeze(secrets),
    batchSize: positiveInteger(input.batchSize, DEFAULT_BATCH_SIZE, 'batch_size'),
    maxParallelBatches: positiveInteger(input.maxParallelBatches, DEFAULT_MAX_PARALLEL_BATCHES, 'max_parallel_batches'),
    backoff
  })
}

/**
 * Layer explicit inputs over the config file. Inputs win when set.
 */
export function mergeWithFileConfig(
  file: FleetFileConfig,
  inputs: Partial<Omit<RunConfigInput, 'secrets'>> & { secrets?: SecretEntry[] }
): RunConfigInput {
  return {
    account: inputs.account || file.owner || '',
    trigger: inputs.trigger,
    dryRun: inputs.dryRun,
    repositoryFilter: inputs.repositoryFilter || file.repositoryFilter,
    specificRepos: inputs.specificRepos && inputs.specificRepos.length > 0 ? inputs.specificRepos : file.specificRepos,
    secrets: inputs.secrets && inputs.secrets.length > 0 ? inputs.secrets : file.secrets ?? [],
    batchSize: inputs.batchSize ?? file.batchSize,
    maxParallelBatches: inputs.maxParallelBatches ?? file.maxParallelBatches,
    backoff: {
      maxAttempts: inputs.backoff?.maxAttempts ?? file.backoff?.maxAttempts,
      baseDelayMs: inputs.backoff?.baseDelayMs ?? file.backoff?.baseDelayMs,
      maxDelayMs: inputs.backoff?.maxDelayMs ?? file.backoff?.maxDelayMs
    }
  }
}
