/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  expandEnvVars,
  findConfigFile,
  loadConfig,
  parseFileConfig,
  splitList
} from '../../src/lib/config-loader.js'
import { ConfigNotFoundError, InvalidConfigError } from '../../src/lib/errors.js'

describe('config-loader', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-fleet-config-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('expandEnvVars', () => {
    const env = { ORG: 'acme', EMPTY: '' }

    it('should expand ${VAR} and $VAR', () => {
      expect(expandEnvVars('${ORG}/api', env)).toBe('acme/api')
      expect(expandEnvVars('$ORG-tools', env)).toBe('acme-tools')
    })

    it('should apply defaults for unset or empty variables', () => {
      expect(expandEnvVars('${MISSING:-fallback}', env)).toBe('fallback')
      expect(expandEnvVars('${EMPTY:-fallback}', env)).toBe('fallback')
      expect(expandEnvVars('${ORG:-fallback}', env)).toBe('acme')
    })

    it('should expand unset variables to an empty string', () => {
      expect(expandEnvVars('x${MISSING}y', env)).toBe('xy')
    })
  })

  describe('splitList', () => {
    it('should split on commas and newlines', () => {
      expect(splitList('a, b\nc,,\n d ')).toEqual(['a', 'b', 'c', 'd'])
      expect(splitList('')).toEqual([])
    })
  })

  describe('findConfigFile', () => {
    it('should prefer the .github directory', () => {
      fs.mkdirSync(path.join(tempDir, '.github'))
      fs.writeFileSync(path.join(tempDir, '.github', 'secret-fleet.yaml'), 'owner: acme\n')
      fs.writeFileSync(path.join(tempDir, 'secret-fleet.yaml'), 'owner: other\n')

      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, '.github', 'secret-fleet.yaml'))
    })

    it('should search parent directories', () => {
      const nested = path.join(tempDir, 'a', 'b')
      fs.mkdirSync(nested, { recursive: true })
      fs.writeFileSync(path.join(tempDir, 'secret-fleet.yml'), 'owner: acme\n')

      expect(findConfigFile(nested)).toBe(path.join(tempDir, 'secret-fleet.yml'))
    })
  })

  describe('parseFileConfig', () => {
    it('should return an empty config for an empty document', () => {
      expect(parseFileConfig(null)).toEqual({})
    })

    it('should read every field', () => {
      const config = parseFileConfig({
        owner: '${ORG}',
        repository_filter: 'Specific',
        specific_repos: ['api', 'web'],
        batch_size: 5,
        max_parallel_batches: '2',
        env_file: '.env.fleet',
        backoff: { max_attempts: 4, base_delay_ms: 500, max_delay_ms: 8000 },
        secrets: [
          'NPM_TOKEN',
          { name: 'SONAR_TOKEN', source: 'env:ORG_SONAR_TOKEN' },
          { name: 'DEPLOY_KEY', source: 'dotenv:.env.fleet#PROD_DEPLOY_KEY', target: 'PROD_DEPLOY_KEY' }
        ]
      }, 'fleet.yaml', { ORG: 'acme' })

      expect(config).toEqual({
        owner: 'acme',
        repositoryFilter: 'specific',
        specificRepos: ['api', 'web'],
        batchSize: 5,
        maxParallelBatches: 2,
        envFile: '.env.fleet',
        backoff: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 8000 },
        secrets: [
          { name: 'NPM_TOKEN' },
          { name: 'SONAR_TOKEN', source: 'env:ORG_SONAR_TOKEN', target: undefined },
          { name: 'DEPLOY_KEY', source: 'dotenv:.env.fleet#PROD_DEPLOY_KEY', target: 'PROD_DEPLOY_KEY' }
        ]
      })
    })

    it('should accept specific_repos as a comma separated string', () => {
      expect(parseFileConfig({ specific_repos: 'api, web' }, undefined, {}).specificRepos).toEqual(['api', 'web'])
    })

    it('should reject invalid values with the field name', () => {
      expect(() => parseFileConfig(['not', 'a', 'mapping'], 'fleet.yaml')).toThrow('Invalid config in fleet.yaml: top level must be a mapping')
      expect(() => parseFileConfig({ repository_filter: 'forks' }, 'fleet.yaml')).toThrow(
        'Invalid config in fleet.yaml: repository_filter: expected one of all, public, private, specific'
      )
      expect(() => parseFileConfig({ batch_size: 0 }, 'fleet.yaml')).toThrow('batch_size: expected an integer >= 1')
      expect(() => parseFileConfig({ backoff: { max_attempts: 'many' } }, 'fleet.yaml')).toThrow('backoff.max_attempts: expected an integer >= 1')
      expect(() => parseFileConfig({ secrets: 'NPM_TOKEN' }, 'fleet.yaml')).toThrow('secrets: expected a list')
      expect(() => parseFileConfig({ secrets: [{ source: 'env:X' }] }, 'fleet.yaml')).toThrow('secrets[0].name: is required')
      expect(() => parseFileConfig({ specific_repos: [1, 2] }, 'fleet.yaml')).toThrow(InvalidConfigError)
    })
  })

  describe('loadConfig', () => {
    it('should return an empty config when no file exists', () => {
      expect(loadConfig(undefined, { cwd: tempDir })).toEqual({ config: {}, path: null })
    })

    it('should load a discovered file', () => {
      fs.mkdirSync(path.join(tempDir, '.github'))
      const file = path.join(tempDir, '.github', 'secret-fleet.yaml')
      fs.writeFileSync(file, 'owner: acme\nsecrets:\n  - NPM_TOKEN\n')

      expect(loadConfig(undefined, { cwd: tempDir, env: {} })).toEqual({
        config: { owner: 'acme', secrets: [{ name: 'NPM_TOKEN' }] },
        path: file
      })
    })

    it('should resolve an explicit path against cwd', () => {
      fs.writeFileSync(path.join(tempDir, 'custom.yaml'), 'batch_size: 3\n')

      expect(loadConfig('custom.yaml', { cwd: tempDir }).config).toEqual({ batchSize: 3 })
    })

    it('should fail when an explicit path does not exist', () => {
      expect(() => loadConfig('missing.yaml', { cwd: tempDir })).toThrow(ConfigNotFoundError)
    })

    it('should report YAML syntax errors', () => {
      fs.writeFileSync(path.join(tempDir, 'broken.yaml'), 'owner: [unclosed\n')

      expect(() => loadConfig('broken.yaml', { cwd: tempDir })).toThrow(/YAML parse error/)
    })
  })
})
