/**
 * secret-fleet - Type Definitions
 */

// ============================================================================
// Repository Types
// ============================================================================

/**
 * Repository visibility as reported by the hosting API.
 * `internal` (enterprise) repositories are treated as private when filtering.
 */
export type RepositoryVisibility = 'public' | 'private' | 'internal'

/**
 * Immutable snapshot of a repository, fetched once per run
 */
export interface Repository {
  readonly owner: string
  readonly name: string
  /** owner/name */
  readonly fullName: string
  readonly visibility: RepositoryVisibility
  readonly archived: boolean
  readonly disabled: boolean
}

export type RepositoryFilter = 'all' | 'public' | 'private' | 'specific'

export const REPOSITORY_FILTERS: readonly RepositoryFilter[] = ['all', 'public', 'private', 'specific']

// ============================================================================
// Secret Types
// ============================================================================

/**
 * Where a secret value comes from
 *
 * - env:     process environment variable
 * - dotenv:  a key inside a dotenv file
 * - memory:  a value supplied programmatically (library usage, tests)
 */
export type SecretSource =
  | { type: 'env'; key: string }
  | { type: 'dotenv'; file: string; key: string }
  | { type: 'memory'; key: string }

export interface SecretSpec {
  /** Unique key within a run */
  readonly name: string
  readonly source: SecretSource
  /** Secret name written to repositories (defaults to `name`) */
  readonly target: string
}

/**
 * Secret value after resolution. Kept in memory for the run only.
 */
export interface ResolvedSecret {
  readonly spec: SecretSpec
  readonly value: string
}

// ============================================================================
// Run Configuration
// ============================================================================

/** What started the run */
export type TriggerKind = 'schedule' | 'manual'

export interface BackoffConfig {
  /** Attempts per call, including the first one */
  readonly maxAttempts: number
  readonly baseDelayMs: number
  /** Cap for any single wait */
  readonly maxDelayMs: number
}

export interface RunConfig {
  readonly account: string
  readonly trigger: TriggerKind
  readonly dryRun: boolean
  /** The schedule policy overrode a requested live run */
  readonly dryRunForced: boolean
  readonly repositoryFilter: RepositoryFilter
  /** Only used when repositoryFilter is 'specific' */
  readonly specificRepos: readonly string[]
  readonly secrets: readonly SecretSpec[]
  readonly batchSize: number
  readonly maxParallelBatches: number
  readonly backoff: BackoffConfig
}

export const DEFAULT_BATCH_SIZE = 10
export const DEFAULT_MAX_PARALLEL_BATCHES = 3

export const DEFAULT_BACKOFF: BackoffConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000
}

// ============================================================================
// Batch Types
// ============================================================================

export interface BatchJob {
  readonly index: number
  readonly repositories: readonly Repository[]
}

// ============================================================================
// Deployment Results
// ============================================================================

export type DeploymentOutcome = 'created' | 'updated' | 'skipped' | 'failed'

export interface DeploymentResult {
  /** owner/name */
  readonly repository: string
  /** Target secret name */
  readonly secret: string
  readonly outcome: DeploymentOutcome
  /** Why a pair was skipped or failed */
  readonly reason?: string
  /** Error code for failed pairs */
  readonly code?: string
  readonly durationMs: number
}

export interface DeploymentFailure {
  readonly repository: string
  readonly secret: string
  readonly reason: string
  readonly code: string
}

export type RunStatus =
  | 'succeeded'
  | 'succeeded-with-warnings'
  | 'partial-failure'
  | 'aborted'
  | 'cancelled'

export type ExclusionReason = 'archived' | 'disabled'

export interface RunReport {
  readonly status: RunStatus
  readonly account: string
  readonly trigger: TriggerKind
  readonly dryRun: boolean
  readonly dryRunForced: boolean
  readonly filter: RepositoryFilter
  readonly counts: Readonly<Record<DeploymentOutcome, number>>
  /** Number of (repository, secret) pairs that produced a result */
  readonly attempts: number
  readonly repositories: number
  readonly results: readonly DeploymentResult[]
  readonly failures: readonly DeploymentFailure[]
  /** Names from specific_repos that did not resolve */
  readonly notFound: readonly string[]
  /** Secret names that could not be resolved (recorded once each) */
  readonly missingSecrets: readonly string[]
  readonly excluded: readonly { repository: string; reason: ExclusionReason }[]
  readonly warnings: readonly string[]
  readonly batches: { readonly total: number; readonly completed: number; readonly cancelled: number }
  readonly fatalError?: { readonly code: string; readonly message: string }
  readonly startedAt: string
  readonly finishedAt: string
  readonly durationMs: number
}

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}
