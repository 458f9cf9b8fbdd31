/**
 * secret-fleet
 *
 * Distribute GitHub Actions secrets across the repositories of an account.
 *
 * @example
 * ```ts
 * import { GitHubFleetApi, createRunConfig, runDistribution } from 'secret-fleet'
 *
 * const report = await runDistribution({
 *   config: createRunConfig({
 *     account: 'acme',
 *     dryRun: false,
 *     repositoryFilter: 'private',
 *     secrets: [{ name: 'NPM_TOKEN' }]
 *   }),
 *   api: new GitHubFleetApi({ token: process.env.GITHUB_TOKEN ?? '' })
 * })
 * ```
 */

// Run controller and configuration
export { runDistribution } from './run.js'
export type { RunDistributionOptions } from './run.js'
export { createRunConfig, mergeWithFileConfig, parseRepositoryFilter, resolveDryRun } from './config.js'
export type { RunConfigInput } from './config.js'
export { loadConfig, findConfigFile, parseFileConfig } from './lib/config-loader.js'
export type { FleetFileConfig, SecretEntry } from './lib/config-loader.js'

// Components
export { GitHubFleetApi, hasRequiredScope } from './github/client.js'
export type { FleetApi, GitHubFleetApiOptions, PutSecretOutcome, RepositoryPublicKey, SealedSecret } from './github/client.js'
export { enumerateRepositories } from './lib/enumerator.js'
export type { EnumerationEvent } from './lib/enumerator.js'
export { SecretResolver, createSecretSpec, parseSecretSource, validateSecretName } from './lib/secret-resolver.js'
export { EncryptionAdapter, sealSecret } from './lib/crypto.js'
export { partitionIntoBatches, runBatches, createDeploymentWorker } from './lib/batch-runner.js'
export { DeploymentExecutor } from './lib/deployer.js'
export { RunReportBuilder, formatReport, formatReportJson, formatReportMarkdown } from './lib/report.js'
export { withBackoff, BatchThrottle } from './lib/retry.js'
export { classifyProviders, DEFAULT_PROVIDER_RULES } from './lib/provider-classifier.js'
export { createConsoleLogger, silentLogger } from './lib/logger.js'

// Errors
export * from './lib/errors.js'

// Types
export * from './types.js'
