/**
 * Run Controller
 *
 * enumerate → resolve secrets → batch → deploy → report
 *
 * Only a failed enumeration (authorization included) ends a run early. Every
 * other failure is recorded at the smallest scope and the run carries on, so
 * a run always ends with a complete report.
 */

import type { Logger, Repository, RunConfig, RunReport } from './types.js'
import type { FleetApi } from './github/client.js'
import { enumerateRepositories } from './lib/enumerator.js'
import { SecretResolver } from './lib/secret-resolver.js'
import { EncryptionAdapter } from './lib/crypto.js'
import { DeploymentExecutor } from './lib/deployer.js'
import { createDeploymentWorker, partitionIntoBatches, runBatches } from './lib/batch-runner.js'
import { NO_ELIGIBLE_REPOSITORIES, RunReportBuilder, formatReport } from './lib/report.js'
import { wrapError } from './lib/errors.js'
import { silentLogger } from './lib/logger.js'
import type { Sleep } from './lib/retry.js'

export interface RunDistributionOptions {
  config: RunConfig
  api: FleetApi
  /** Defaults to a resolver over process.env */
  resolver?: SecretResolver
  logger?: Logger
  /** Aborting stops new batches from starting */
  signal?: AbortSignal
  sleep?: Sleep
  now?: () => Date
}

export async function runDistribution(options: RunDistributionOptions): Promise<RunReport> {
  const { config, api, signal, sleep } = options
  const logger = options.logger ?? silentLogger
  const now = options.now ?? (() => new Date())
  const report = new RunReportBuilder(config, now())

  logger.info(`Distributing ${config.secrets.length} secret(s) to ${config.repositoryFilter} repositories of ${config.account}${config.dryRun ? ' (dry run)' : ''}`)

  if (config.dryRunForced) {
    report.addWarning('scheduled run: dry run enforced, requested live mode ignored')
    logger.warn('Scheduled trigger: dry run enforced')
  }

  // Enumeration has to succeed before anything else runs
  const repositories: Repository[] = []
  try {
    await api.verifyAccess(config.account, config.repositoryFilter)

    for await (const event of enumerateRepositories(api, config)) {
      switch (event.type) {
        case 'repository':
          repositories.push(event.repository)
          report.addRepository()
          break
        case 'excluded':
          report.addExcluded(event.repository.fullName, event.reason)
          logger.debug(`Skipping ${event.reason} repository ${event.repository.fullName}`)
          break
        case 'not-found':
          report.addNotFound(event.error.repository)
          logger.warn(event.error.message)
          break
      }
    }
  } catch (error) {
    const fatal = wrapError(error, 'ENUMERATION_FAILED')
    logger.error(fatal.suggestion ? `${fatal.message} (${fatal.suggestion})` : fatal.message)
    report.setFatalError(fatal)
    return emit(report.finish(now()), logger)
  }

  logger.info(`Found ${repositories.length} eligible repositories`)

  const resolver = options.resolver ?? new SecretResolver()
  const { resolved, missing } = resolver.resolveAll(config.secrets)
  for (const error of missing) {
    report.addMissingSecret(error.secretName)
    logger.warn(error.message)
  }

  if (repositories.length === 0) {
    report.addWarning(NO_ELIGIBLE_REPOSITORIES)
    logger.warn('No eligible repositories after filtering')
    return emit(report.finish(now()), logger)
  }

  if (resolved.length === 0) {
    report.addWarning('no secrets to deploy')
    logger.warn('None of the requested secrets has a value')
    return emit(report.finish(now()), logger)
  }

  const jobs = partitionIntoBatches(repositories, config.batchSize)
  const encryption = new EncryptionAdapter(api, logger)
  const executor = new DeploymentExecutor({
    api,
    encryption,
    dryRun: config.dryRun,
    backoff: config.backoff,
    logger,
    sleep
  })
  const worker = createDeploymentWorker({
    secrets: resolved,
    executor,
    record: result => report.addResult(result),
    backoff: config.backoff,
    logger,
    sleep
  })

  logger.info(`Processing ${jobs.length} batch(es) of up to ${config.batchSize}, ${config.maxParallelBatches} at a time`)

  const summary = await runBatches(jobs, worker, {
    maxParallelBatches: config.maxParallelBatches,
    signal,
    onBatchStart: job => logger.debug(`Batch ${job.index + 1}/${jobs.length} started`),
    onBatchComplete: (job, durationMs) => logger.debug(`Batch ${job.index + 1}/${jobs.length} done in ${durationMs}ms`)
  })

  for (const { batch, error } of summary.errors) {
    report.addWarning(`batch ${batch + 1} stopped unexpectedly: ${error.message}`)
  }
  if (summary.cancelled > 0) {
    report.addWarning(`run cancelled: ${summary.cancelled} batch(es) not started`)
  }
  report.setBatches({ total: summary.total, completed: summary.completed, cancelled: summary.cancelled })

  return emit(report.finish(now()), logger)
}

function emit(report: RunReport, logger: Logger): RunReport {
  logger.info(formatReport(report))
  return report
}
