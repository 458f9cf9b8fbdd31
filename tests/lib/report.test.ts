/**
 * Tests for report.ts
 */

import { describe, it, expect } from 'vitest'
import {
  NO_ELIGIBLE_REPOSITORIES,
  RunReportBuilder,
  formatReport,
  formatReportJson,
  formatReportMarkdown
} from '../../src/lib/report.js'
import { AuthorizationError } from '../../src/lib/errors.js'
import type { DeploymentResult } from '../../src/types.js'

const runConfig = {
  account: 'acme',
  trigger: 'manual' as const,
  dryRun: false,
  dryRunForced: false,
  repositoryFilter: 'all' as const
}

const startedAt = new Date('2026-03-01T12:00:00.000Z')
const finishedAt = new Date('2026-03-01T12:00:01.250Z')

function result(repository: string, outcome: DeploymentResult['outcome'], extra: Partial<DeploymentResult> = {}): DeploymentResult {
  return { repository, secret: 'NPM_TOKEN', outcome, durationMs: 5, ...extra }
}

describe('report', () => {
  describe('RunReportBuilder', () => {
    it('should count outcomes and attempts', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addRepository()
      builder.addRepository()
      builder.addResult(result('acme/a', 'created'))
      builder.addResult(result('acme/b', 'updated'))

      const report = builder.finish(finishedAt)

      expect(report.status).toBe('succeeded')
      expect(report.counts).toEqual({ created: 1, updated: 1, skipped: 0, failed: 0 })
      expect(report.attempts).toBe(2)
      expect(report.repositories).toBe(2)
      expect(report.durationMs).toBe(1250)
      expect(report.startedAt).toBe('2026-03-01T12:00:00.000Z')
    })

    it('should derive failures from failed results', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addResult(result('acme/a', 'failed', { reason: 'HTTP 422: Validation Failed', code: 'DEPLOYMENT_FAILED' }))
      builder.addResult(result('acme/b', 'failed'))

      const report = builder.finish(finishedAt)

      expect(report.status).toBe('partial-failure')
      expect(report.failures).toEqual([
        { repository: 'acme/a', secret: 'NPM_TOKEN', reason: 'HTTP 422: Validation Failed', code: 'DEPLOYMENT_FAILED' },
        { repository: 'acme/b', secret: 'NPM_TOKEN', reason: 'unknown error', code: 'UNKNOWN_ERROR' }
      ])
    })

    it('should mark warnings', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addNotFound('acme/ghost')
      builder.addMissingSecret('SONAR_TOKEN')
      builder.addMissingSecret('SONAR_TOKEN')
      builder.addExcluded('acme/old', 'archived')

      const report = builder.finish(finishedAt)

      expect(report.status).toBe('succeeded-with-warnings')
      expect(report.notFound).toEqual(['acme/ghost'])
      expect(report.missingSecrets).toEqual(['SONAR_TOKEN'])
      expect(report.excluded).toEqual([{ repository: 'acme/old', reason: 'archived' }])
      expect(report.warnings).toEqual([
        'repository not found: acme/ghost',
        'secret SONAR_TOKEN has no value and was skipped for all repositories'
      ])
    })

    it('should not warn about exclusions alone', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addExcluded('acme/old', 'archived')
      expect(builder.finish(finishedAt).status).toBe('succeeded')
    })

    it('should rank aborted over every other status', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addResult(result('acme/a', 'failed'))
      builder.setBatches({ total: 2, completed: 1, cancelled: 1 })
      builder.setFatalError(new AuthorizationError('Bad credentials'))

      const report = builder.finish(finishedAt)

      expect(report.status).toBe('aborted')
      expect(report.fatalError).toEqual({ code: 'UNAUTHORIZED', message: 'Bad credentials' })
    })

    it('should rank cancelled over partial failure', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      builder.addResult(result('acme/a', 'failed'))
      builder.setBatches({ total: 2, completed: 1, cancelled: 1 })

      expect(builder.finish(finishedAt).status).toBe('cancelled')
    })

    it('should freeze the report and reject later appends', () => {
      const builder = new RunReportBuilder(runConfig, startedAt)
      const report = builder.finish(finishedAt)

      expect(builder.finished).toBe(true)
      expect(builder.finish()).toBe(report)
      expect(Object.isFrozen(report.counts)).toBe(true)
      expect(() => builder.addResult(result('acme/a', 'created'))).toThrow('Run report is already finished')
      expect(() => builder.addWarning('late')).toThrow('Run report is already finished')
    })

    it('should omit fatalError when the run completed', () => {
      const report = new RunReportBuilder(runConfig, startedAt).finish(finishedAt)
      expect('fatalError' in report).toBe(false)
    })
  })

  describe('formatting', () => {
    function sampleReport() {
      const builder = new RunReportBuilder({ ...runConfig, dryRun: true }, startedAt)
      builder.addRepository()
      builder.addResult(result('acme/a', 'skipped', { reason: 'dry-run' }))
      builder.addResult(result('acme/b', 'failed', { reason: 'HTTP 422: a | b', code: 'DEPLOYMENT_FAILED' }))
      builder.addWarning(NO_ELIGIBLE_REPOSITORIES)
      builder.setBatches({ total: 1, completed: 1, cancelled: 0 })
      return builder.finish(finishedAt)
    }

    it('should format a plain-text summary', () => {
      const text = formatReport(sampleReport())
      const lines = text.split('\n')

      expect(lines[1]).toBe('Secrets Distribution Summary (dry run):')
      expect(lines[2]).toBe('  Status:       partial-failure')
      expect(lines).toContain('  Skipped:      1')
      expect(lines).toContain('  ! no eligible repositories')
      expect(lines).toContain('  ✗ acme/b NPM_TOKEN: HTTP 422: a | b')
    })

    it('should format a markdown summary', () => {
      const markdown = formatReportMarkdown(sampleReport())
      const lines = markdown.split('\n')

      expect(lines[0]).toBe('## Secrets distribution (dry run)')
      expect(lines).toContain('| 0 | 0 | 1 | 1 | 1 |')
      expect(lines).toContain('- no eligible repositories')
      expect(lines).toContain('| acme/b | NPM_TOKEN | DEPLOYMENT_FAILED | HTTP 422: a \\| b |')
      expect(markdown.endsWith('\n')).toBe(true)
    })

    it('should note an enforced dry run in markdown', () => {
      const report = new RunReportBuilder({ ...runConfig, trigger: 'schedule', dryRun: true, dryRunForced: true }, startedAt)
        .finish(finishedAt)
      expect(formatReportMarkdown(report).split('\n')[2]).toBe('> Scheduled run: dry run enforced.')
    })

    it('should format compact JSON without per-pair results', () => {
      const json = formatReportJson(sampleReport())

      expect(json.status).toBe('partial-failure')
      expect(json.counts).toEqual({ created: 0, updated: 0, skipped: 1, failed: 1 })
      expect(json.excluded).toBe(0)
      expect('results' in json).toBe(false)
      expect(JSON.parse(JSON.stringify(json)).durationMs).toBe(1250)
    })
  })
})
