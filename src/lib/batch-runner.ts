/**
 * Batch Runner
 *
 * Partitions the repository list into fixed-size batches and runs a bounded
 * number of them concurrently. Inside a batch, repositories are handled one
 * at a time so outbound calls stay bounded by the number of parallel batches.
 */

import pLimit from 'p-limit'
import type { BackoffConfig, BatchJob, DeploymentResult, Logger, Repository, ResolvedSecret } from '../types.js'
import { BatchThrottle, type Sleep } from './retry.js'
import type { DeploymentExecutor } from './deployer.js'

export const BATCH_HALTED_REASON = 'batch halted after persistent rate limiting'

export type BatchWorker = (job: BatchJob) => Promise<void>

export interface BatchRunSummary {
  total: number
  /** Batches whose worker ran to the end */
  completed: number
  /** Batches never started because the run was aborted */
  cancelled: number
  /** Workers that threw (not expected: workers record failures themselves) */
  errors: Array<{ batch: number; error: Error }>
}

/**
 * Split repositories into batches of `batchSize`, keeping enumeration order.
 * Every repository lands in exactly one batch.
 */
export function partitionIntoBatches(repositories: readonly Repository[], batchSize: number): BatchJob[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`)
  }

  const jobs: BatchJob[] = []
  for (let start = 0; start < repositories.length; start += batchSize) {
    jobs.push({
      index: jobs.length,
      repositories: repositories.slice(start, start + batchSize)
    })
  }
  return jobs
}

/**
 * Run batch jobs with at most `maxParallelBatches` in flight
 *
 * Aborting the signal stops new batches from starting; batches already
 * running finish their current work.
 */
export async function runBatches(
  jobs: readonly BatchJob[],
  worker: BatchWorker,
  options: {
    maxParallelBatches: number
    signal?: AbortSignal
    onBatchStart?: (job: BatchJob) => void
    onBatchComplete?: (job: BatchJob, durationMs: number) => void
  }
): Promise<BatchRunSummary> {
  const { maxParallelBatches, signal, onBatchStart, onBatchComplete } = options

  if (!Number.isInteger(maxParallelBatches) || maxParallelBatches < 1) {
    throw new RangeError(`maxParallelBatches must be a positive integer, got ${maxParallelBatches}`)
  }

  const limit = pLimit(maxParallelBatches)
  let completed = 0
  let cancelled = 0
  const errors: BatchRunSummary['errors'] = []

  await Promise.all(
    jobs.map(job =>
      limit(async () => {
        if (signal?.aborted) {
          cancelled++
          return
        }

        onBatchStart?.(job)
        const startTime = Date.now()

        try {
          await worker(job)
          completed++
        } catch (err) {
          errors.push({ batch: job.index, error: err instanceof Error ? err : new Error(String(err)) })
        }

        onBatchComplete?.(job, Date.now() - startTime)
      })
    )
  )

  return { total: jobs.length, completed, cancelled, errors }
}

/**
 * Worker that deploys every secret to every repository of a batch, in order
 *
 * When the API keeps throttling past the backoff budget, the rest of the
 * batch is not attempted: each remaining pair is recorded as failed so the
 * report still has one result per pair.
 */
export function createDeploymentWorker(options: {
  secrets: readonly ResolvedSecret[]
  executor: DeploymentExecutor
  record: (result: DeploymentResult) => void
  backoff: Pick<BackoffConfig, 'baseDelayMs' | 'maxDelayMs'>
  logger?: Logger
  sleep?: Sleep
}): BatchWorker {
  const { secrets, executor, record, backoff, logger, sleep } = options

  return async (job: BatchJob) => {
    const throttle = new BatchThrottle(backoff, sleep)
    let halted = false

    logger?.debug(`Batch ${job.index + 1}: ${job.repositories.map(r => r.fullName).join(', ')}`)

    for (const repository of job.repositories) {
      for (const secret of secrets) {
        if (halted) {
          record({
            repository: repository.fullName,
            secret: secret.spec.target,
            outcome: 'failed',
            reason: BATCH_HALTED_REASON,
            code: 'BATCH_HALTED',
            durationMs: 0
          })
          continue
        }

        await throttle.pause()
        const result = await executor.deploy(repository, secret, { throttle })
        record(result)

        if (result.outcome === 'failed' && result.code === 'RATE_LIMITED') {
          halted = true
          logger?.warn(`Batch ${job.index + 1} halted: ${repository.fullName} stayed rate limited`)
        }
      }
    }
  }
}
