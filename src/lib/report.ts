/**
 * Run Report
 *
 * Results are appended while batches run (single-threaded event loop, so
 * appends from concurrent batches are serialized) and frozen by `finish()`.
 * After that, the builder rejects further appends.
 */

import type {
  DeploymentOutcome,
  DeploymentResult,
  ExclusionReason,
  RunConfig,
  RunReport,
  RunStatus
} from '../types.js'
import type { FleetError } from './errors.js'

export const NO_ELIGIBLE_REPOSITORIES = 'no eligible repositories'

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

export class RunReportBuilder {
  private readonly config: Pick<RunConfig, 'account' | 'trigger' | 'dryRun' | 'dryRunForced' | 'repositoryFilter'>
  private readonly startedAt: Date
  private readonly results: DeploymentResult[] = []
  private readonly notFound: string[] = []
  private readonly missingSecrets: string[] = []
  private readonly excluded: Array<{ repository: string; reason: ExclusionReason }> = []
  private readonly warnings: string[] = []
  private repositories = 0
  private batches = { total: 0, completed: 0, cancelled: 0 }
  private fatalError?: { code: string; message: string }
  private report: RunReport | null = null

  constructor(
    config: Pick<RunConfig, 'account' | 'trigger' | 'dryRun' | 'dryRunForced' | 'repositoryFilter'>,
    startedAt: Date = new Date()
  ) {
    this.config = config
    this.startedAt = startedAt
  }

  get finished(): boolean {
    return this.report !== null
  }

  addResult(result: DeploymentResult): void {
    this.assertOpen()
    this.results.push(result)
  }

  /** Count an eligible repository */
  addRepository(): void {
    this.assertOpen()
    this.repositories++
  }

  addNotFound(repository: string): void {
    this.assertOpen()
    this.notFound.push(repository)
    this.warnings.push(`repository not found: ${repository}`)
  }

  addMissingSecret(secretName: string): void {
    this.assertOpen()
    if (this.missingSecrets.includes(secretName)) return
    this.missingSecrets.push(secretName)
    this.warnings.push(`secret ${secretName} has no value and was skipped for all repositories`)
  }

  addExcluded(repository: string, reason: ExclusionReason): void {
    this.assertOpen()
    this.excluded.push({ repository, reason })
  }

  addWarning(message: string): void {
    this.assertOpen()
    this.warnings.push(message)
  }

  setBatches(batches: { total: number; completed: number; cancelled: number }): void {
    this.assertOpen()
    this.batches = { ...batches }
  }

  setFatalError(error: FleetError): void {
    this.assertOpen()
    this.fatalError = { code: error.code, message: error.message }
  }

  /**
   * Freeze the report. Calling it again returns the same object.
   */
  finish(finishedAt: Date = new Date()): RunReport {
    if (this.report) {
      return this.report
    }

    const counts: Record<DeploymentOutcome, number> = { created: 0, updated: 0, skipped: 0, failed: 0 }
    for (const result of this.results) {
      counts[result.outcome]++
    }

    const failures = this.results
      .filter(r => r.outcome === 'failed')
      .map(r => ({
        repository: r.repository,
        secret: r.secret,
        reason: r.reason ?? 'unknown error',
        code: r.code ?? 'UNKNOWN_ERROR'
      }))

    const report: RunReport = {
      status: this.computeStatus(counts),
      account: this.config.account,
      trigger: this.config.trigger,
      dryRun: this.config.dryRun,
      dryRunForced: this.config.dryRunForced,
      filter: this.config.repositoryFilter,
      counts,
      attempts: this.results.length,
      repositories: this.repositories,
      results: [...this.results],
      failures,
      notFound: [...this.notFound],
      missingSecrets: [...this.missingSecrets],
      excluded: [...this.excluded],
      warnings: [...this.warnings],
      batches: { ...this.batches },
      ...(this.fatalError ? { fatalError: { ...this.fatalError } } : {}),
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - this.startedAt.getTime())
    }

    this.report = deepFreeze(report)
    return this.report
  }

  private computeStatus(counts: Record<DeploymentOutcome, number>): RunStatus {
    if (this.fatalError) return 'aborted'
    if (this.batches.cancelled > 0) return 'cancelled'
    if (counts.failed > 0) return 'partial-failure'
    if (this.warnings.length > 0) return 'succeeded-with-warnings'
    return 'succeeded'
  }

  private assertOpen(): void {
    if (this.report) {
      throw new Error('Run report is already finished')
    }
  }
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Plain-text summary for the run log
 */
export function formatReport(report: RunReport): string {
  const lines: string[] = []

  lines.push('')
  lines.push(`Secrets Distribution Summary${report.dryRun ? ' (dry run)' : ''}:`)
  lines.push(`  Status:       ${report.status}`)
  lines.push(`  Account:      ${report.account}`)
  lines.push(`  Filter:       ${report.filter}`)
  lines.push(`  Repositories: ${report.repositories}`)
  lines.push(`  Attempts:     ${report.attempts}`)
  lines.push(`  Created:      ${report.counts.created}`)
  lines.push(`  Updated:      ${report.counts.updated}`)
  lines.push(`  Skipped:      ${report.counts.skipped}`)
  lines.push(`  Failed:       ${report.counts.failed}`)
  lines.push(`  Duration:     ${report.durationMs}ms`)

  if (report.fatalError) {
    lines.push('')
    lines.push(`Aborted: [${report.fatalError.code}] ${report.fatalError.message}`)
  }

  if (report.warnings.length > 0) {
    lines.push('')
    lines.push('Warnings:')
    for (const warning of report.warnings) {
      lines.push(`  ! ${warning}`)
    }
  }

  if (report.failures.length > 0) {
    lines.push('')
    lines.push('Failures:')
    for (const failure of report.failures) {
      lines.push(`  ✗ ${failure.repository} ${failure.secret}: ${failure.reason}`)
    }
  }

  return lines.join('\n')
}

/**
 * Markdown summary for $GITHUB_STEP_SUMMARY
 */
export function formatReportMarkdown(report: RunReport): string {
  const lines: string[] = []

  lines.push(`## Secrets distribution${report.dryRun ? ' (dry run)' : ''}`)
  lines.push('')
  if (report.dryRunForced) {
    lines.push('> Scheduled run: dry run enforced.')
    lines.push('')
  }
  lines.push(`**Status:** ${report.status} · **Account:** ${report.account} · **Filter:** ${report.filter}`)
  lines.push('')
  lines.push('| Created | Updated | Skipped | Failed | Repositories |')
  lines.push('| ---: | ---: | ---: | ---: | ---: |')
  lines.push(`| ${report.counts.created} | ${report.counts.updated} | ${report.counts.skipped} | ${report.counts.failed} | ${report.repositories} |`)

  if (report.fatalError) {
    lines.push('')
    lines.push(`**Aborted:** \`${report.fatalError.code}\` ${report.fatalError.message}`)
  }

  if (report.warnings.length > 0) {
    lines.push('')
    lines.push('### Warnings')
    lines.push('')
    for (const warning of report.warnings) {
      lines.push(`- ${warning}`)
    }
  }

  if (report.failures.length > 0) {
    lines.push('')
    lines.push('### Failures')
    lines.push('')
    lines.push('| Repository | Secret | Code | Reason |')
    lines.push('| --- | --- | --- | --- |')
    for (const failure of report.failures) {
      lines.push(`| ${failure.repository} | ${failure.secret} | ${failure.code} | ${failure.reason.replace(/\|/g, '\\|')} |`)
    }
  }

  return lines.join('\n') + '\n'
}

/**
 * Compact JSON form (results omitted, they can be large)
 */
export function formatReportJson(report: RunReport): Record<string, unknown> {
  return {
    status: report.status,
    account: report.account,
    trigger: report.trigger,
    dryRun: report.dryRun,
    dryRunForced: report.dryRunForced,
    filter: report.filter,
    counts: report.counts,
    attempts: report.attempts,
    repositories: report.repositories,
    failures: report.failures,
    notFound: report.notFound,
    missingSecrets: report.missingSecrets,
    excluded: report.excluded.length,
    warnings: report.warnings,
    batches: report.batches,
    fatalError: report.fatalError,
    durationMs: report.durationMs
  }
}
