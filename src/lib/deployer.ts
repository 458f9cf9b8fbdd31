/**
 * Deployment Executor
 *
 * One create-or-update call per (repository, secret) pair. The executor never
 * throws: every failure becomes a `failed` result so the batch and the run
 * carry on.
 */

import type { BackoffConfig, DeploymentResult, Logger, Repository, ResolvedSecret } from '../types.js'
import { DEFAULT_BACKOFF } from '../types.js'
import type { FleetApi } from '../github/client.js'
import type { EncryptionAdapter } from './crypto.js'
import { toDeploymentError } from './errors.js'
import { withBackoff, type BatchThrottle, type Sleep } from './retry.js'

export const DRY_RUN_REASON = 'dry-run'

export interface DeploymentExecutorOptions {
  api: Pick<FleetApi, 'putSecret'>
  encryption: EncryptionAdapter
  dryRun: boolean
  backoff?: BackoffConfig
  logger?: Logger
  sleep?: Sleep
}

export class DeploymentExecutor {
  private readonly api: Pick<FleetApi, 'putSecret'>
  private readonly encryption: EncryptionAdapter
  private readonly dryRun: boolean
  private readonly backoff: BackoffConfig
  private readonly logger?: Logger
  private readonly sleep?: Sleep

  constructor(options: DeploymentExecutorOptions) {
    this.api = options.api
    this.encryption = options.encryption
    this.dryRun = options.dryRun
    this.backoff = options.backoff ?? DEFAULT_BACKOFF
    this.logger = options.logger
    this.sleep = options.sleep
  }

  /**
   * Create or overwrite one secret in one repository.
   *
   * 201 → created, 204 → updated. Overwrites are last-write-wins, so running
   * the same pair twice leaves one secret with the latest value.
   */
  async deploy(
    repository: Repository,
    secret: ResolvedSecret,
    options: { throttle?: BatchThrottle } = {}
  ): Promise<DeploymentResult> {
    const secretName = secret.spec.target
    const startTime = Date.now()

    if (this.dryRun) {
      this.logger?.info(`[dry-run] would set ${secretName} on ${repository.fullName}`)
      return {
        repository: repository.fullName,
        secret: secretName,
        outcome: 'skipped',
        reason: DRY_RUN_REASON,
        durationMs: 0
      }
    }

    const { throttle } = options
    let throttled = false

    try {
      const outcome = await withBackoff(
        async () => {
          // The key is cached per repository, so retries only repeat the failed call
          const sealed = await this.encryption.encrypt(repository, secret.value)
          return this.api.putSecret(repository, secretName, sealed)
        },
        {
          ...this.backoff,
          sleep: this.sleep,
          onRetry: (attempt, _error, delayMs) => {
            throttled = true
            throttle?.noteThrottled()
            this.logger?.warn(
              `Rate limited on ${repository.fullName} (${secretName}), attempt ${attempt}/${this.backoff.maxAttempts}, waiting ${delayMs}ms`
            )
          }
        }
      )

      if (!throttled) {
        throttle?.noteClean()
      }

      this.logger?.debug(`${outcome} ${secretName} on ${repository.fullName}`)
      return {
        repository: repository.fullName,
        secret: secretName,
        outcome,
        durationMs: Date.now() - startTime
      }
    } catch (err) {
      const error = toDeploymentError(err)
      this.logger?.debug(`failed ${secretName} on ${repository.fullName}: [${error.code}] ${error.message}`)
      return {
        repository: repository.fullName,
        secret: secretName,
        outcome: 'failed',
        reason: error.message,
        code: error.code,
        durationMs: Date.now() - startTime
      }
    }
  }
}
