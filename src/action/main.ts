/**
 * secret-fleet GitHub Action
 *
 * Pushes the requested secrets to every eligible repository of the owner.
 * Scheduled runs are always dry runs; manual dispatch honors the dry-run input.
 *
 * Outputs: status, created, updated, skipped, failed, report-json
 */

import type { RunReport } from '../types.js'
import { getInputs } from './inputs.js'
import { appendSummary, createActionLogger, info, setFailed, setOutput, setSecret } from './core.js'
import { GitHubFleetApi, type FleetApi, type GitHubFleetApiOptions } from '../github/client.js'
import { loadConfig, type SecretEntry } from '../lib/config-loader.js'
import { createRunConfig, mergeWithFileConfig } from '../config.js'
import { SecretResolver } from '../lib/secret-resolver.js'
import { formatErrorForCli } from '../lib/errors.js'
import { formatReportJson, formatReportMarkdown } from '../lib/report.js'
import { runDistribution } from '../run.js'
import type { Sleep } from '../lib/retry.js'

export interface ActionRunOptions {
  env?: Record<string, string | undefined>
  signal?: AbortSignal
  /** Replaces the Octokit-backed API (in-process stand-ins) */
  createApi?: (options: GitHubFleetApiOptions) => FleetApi
  sleep?: Sleep
}

/**
 * Secrets without a source read from the env file when one is configured
 */
function withDefaultSource(secrets: SecretEntry[] | undefined, envFile: string | undefined): SecretEntry[] | undefined {
  if (!secrets || !envFile) {
    return secrets
  }
  return secrets.map(entry => entry.source ? entry : { ...entry, source: `dotenv:${envFile}#${entry.name}` })
}

export async function run(options: ActionRunOptions = {}): Promise<RunReport | null> {
  const env = options.env ?? process.env

  try {
    const inputs = getInputs(env)
    const logger = createActionLogger({ verbose: inputs.verbose })
    const cwd = env.GITHUB_WORKSPACE || process.cwd()

    const { config: fileConfig, path: configPath } = loadConfig(inputs.configPath, { cwd, env })
    if (configPath) {
      logger.info(`Using config ${configPath}`)
    }

    const envFile = inputs.envFile ?? fileConfig.envFile
    const config = createRunConfig(mergeWithFileConfig(
      { ...fileConfig, secrets: withDefaultSource(fileConfig.secrets, envFile) },
      {
        account: inputs.owner || fileConfig.owner || env.GITHUB_REPOSITORY_OWNER,
        trigger: inputs.trigger,
        dryRun: inputs.dryRun,
        repositoryFilter: inputs.repositoryFilter,
        specificRepos: inputs.specificRepos,
        secrets: withDefaultSource(inputs.secrets, envFile),
        batchSize: inputs.batchSize,
        maxParallelBatches: inputs.maxParallelBatches
      }
    ))

    info(`🔐 secret-fleet`)
    info(`   Owner:   ${config.account}`)
    info(`   Trigger: ${config.trigger}`)
    info(`   Mode:    ${config.dryRun ? 'dry run' : 'live'}`)
    info(`   Filter:  ${config.repositoryFilter}${config.repositoryFilter === 'specific' ? ` (${config.specificRepos.join(', ')})` : ''}`)
    info(`   Secrets: ${config.secrets.map(s => s.target).join(', ')}`)
    info('')

    const resolver = new SecretResolver({ env, cwd })
    if (inputs.maskValues) {
      for (const { value } of resolver.resolveAll(config.secrets).resolved) {
        setSecret(value)
      }
    }

    const apiOptions: GitHubFleetApiOptions = { token: inputs.token, baseUrl: inputs.apiUrl, logger }
    const api = options.createApi ? options.createApi(apiOptions) : new GitHubFleetApi(apiOptions)

    const report = await runDistribution({
      config,
      api,
      resolver,
      logger,
      signal: options.signal,
      sleep: options.sleep
    })

    setOutput('status', report.status, env)
    setOutput('created', String(report.counts.created), env)
    setOutput('updated', String(report.counts.updated), env)
    setOutput('skipped', String(report.counts.skipped), env)
    setOutput('failed', String(report.counts.failed), env)
    setOutput('report-json', JSON.stringify(formatReportJson(report)), env)
    appendSummary(formatReportMarkdown(report), env)

    if (report.fatalError) {
      setFailed(`Run aborted: ${report.fatalError.message}`)
    } else if (report.counts.failed > 0 && inputs.failOnError) {
      setFailed(`${report.counts.failed} secret deployment(s) failed`)
    } else if (report.status === 'cancelled') {
      setFailed('Run cancelled before all batches started')
    }

    return report
  } catch (error) {
    setFailed(formatErrorForCli(error))
    return null
  }
}
