/**
 * Tests for secret-resolver.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  SecretResolver,
  createSecretSpec,
  describeSource,
  parseSecretSource,
  validateSecretName
} from '../../src/lib/secret-resolver.js'
import { InvalidConfigError, InvalidSecretNameError, MissingSecretError } from '../../src/lib/errors.js'

describe('secret-resolver', () => {
  describe('validateSecretName', () => {
    it('should accept letters, digits and underscores', () => {
      expect(() => validateSecretName('NPM_TOKEN')).not.toThrow()
      expect(() => validateSecretName('_private2')).not.toThrow()
    })

    it('should reject invalid names', () => {
      expect(() => validateSecretName('')).toThrow(InvalidSecretNameError)
      expect(() => validateSecretName('2FA_SEED')).toThrow(InvalidSecretNameError)
      expect(() => validateSecretName('NPM-TOKEN')).toThrow(InvalidSecretNameError)
      expect(() => validateSecretName('github_token')).toThrow('the GITHUB_ prefix is reserved')
    })
  })

  describe('parseSecretSource', () => {
    it('should read the secret name from the environment by default', () => {
      expect(parseSecretSource(undefined, 'NPM_TOKEN')).toEqual({ type: 'env', key: 'NPM_TOKEN' })
      expect(parseSecretSource('  ', 'NPM_TOKEN')).toEqual({ type: 'env', key: 'NPM_TOKEN' })
    })

    it('should treat a bare reference as a variable name', () => {
      expect(parseSecretSource('ORG_NPM_TOKEN', 'NPM_TOKEN')).toEqual({ type: 'env', key: 'ORG_NPM_TOKEN' })
    })

    it('should parse env, memory and dotenv references', () => {
      expect(parseSecretSource('env:ORG_NPM_TOKEN', 'NPM_TOKEN')).toEqual({ type: 'env', key: 'ORG_NPM_TOKEN' })
      expect(parseSecretSource('memory:npm', 'NPM_TOKEN')).toEqual({ type: 'memory', key: 'npm' })
      expect(parseSecretSource('dotenv:.env.fleet#PROD_NPM', 'NPM_TOKEN')).toEqual({ type: 'dotenv', file: '.env.fleet', key: 'PROD_NPM' })
      expect(parseSecretSource('dotenv:.env.fleet', 'NPM_TOKEN')).toEqual({ type: 'dotenv', file: '.env.fleet', key: 'NPM_TOKEN' })
      expect(parseSecretSource('dotenv:.env.fleet#', 'NPM_TOKEN')).toEqual({ type: 'dotenv', file: '.env.fleet', key: 'NPM_TOKEN' })
    })

    it('should reject incomplete or unknown references', () => {
      expect(() => parseSecretSource('env:', 'X')).toThrow(InvalidConfigError)
      expect(() => parseSecretSource('memory:', 'X')).toThrow(InvalidConfigError)
      expect(() => parseSecretSource('dotenv:#KEY', 'X')).toThrow(InvalidConfigError)
      expect(() => parseSecretSource('vault:kv/x', 'X')).toThrow(
        'Invalid config: unknown secret source "vault" in "vault:kv/x" (expected env:, dotenv: or memory:)'
      )
    })
  })

  describe('createSecretSpec', () => {
    it('should default the target to the name', () => {
      expect(createSecretSpec({ name: ' NPM_TOKEN ' })).toEqual({
        name: 'NPM_TOKEN',
        source: { type: 'env', key: 'NPM_TOKEN' },
        target: 'NPM_TOKEN'
      })
    })

    it('should validate the target name', () => {
      expect(createSecretSpec({ name: 'npm', source: 'memory:npm', target: 'NPM_TOKEN' }).target).toBe('NPM_TOKEN')
      expect(() => createSecretSpec({ name: 'NPM_TOKEN', target: 'GITHUB_NPM' })).toThrow(InvalidSecretNameError)
    })
  })

  describe('describeSource', () => {
    it('should describe each source kind', () => {
      expect(describeSource({ type: 'env', key: 'A' })).toBe('environment variable A')
      expect(describeSource({ type: 'dotenv', file: '.env', key: 'A' })).toBe('.env (A)')
      expect(describeSource({ type: 'memory', key: 'A' })).toBe('provided values (A)')
    })
  })

  describe('SecretResolver', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-fleet-resolver-'))
      fs.writeFileSync(path.join(tempDir, '.env.fleet'), 'PROD_NPM=test-dotenv-npm\nEMPTY=\n')
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('should resolve env, memory and dotenv sources', () => {
      const resolver = new SecretResolver({
        env: { NPM_TOKEN: 'test-env-npm' },
        values: { sonar: 'test-memory-sonar' },
        cwd: tempDir
      })

      expect(resolver.resolve(createSecretSpec({ name: 'NPM_TOKEN' }))).toBe('test-env-npm')
      expect(resolver.resolve(createSecretSpec({ name: 'SONAR_TOKEN', source: 'memory:sonar' }))).toBe('test-memory-sonar')
      expect(resolver.resolve(createSecretSpec({ name: 'NPM_PROD', source: 'dotenv:.env.fleet#PROD_NPM' }))).toBe('test-dotenv-npm')
    })

    it('should throw MissingSecretError for absent or empty values', () => {
      const resolver = new SecretResolver({ env: { EMPTY_VAR: '' }, cwd: tempDir })

      expect(() => resolver.resolve(createSecretSpec({ name: 'ABSENT' }))).toThrow(MissingSecretError)
      expect(() => resolver.resolve(createSecretSpec({ name: 'EMPTY_VAR' }))).toThrow(
        'Secret "EMPTY_VAR" has no value in environment variable EMPTY_VAR'
      )
      expect(() => resolver.resolve(createSecretSpec({ name: 'EMPTY', source: 'dotenv:.env.fleet' }))).toThrow(MissingSecretError)
    })

    it('should treat a missing dotenv file as a missing secret', () => {
      const resolver = new SecretResolver({ env: {}, cwd: tempDir })
      expect(() => resolver.resolve(createSecretSpec({ name: 'X', source: 'dotenv:nope.env' }))).toThrow(
        `Secret "X" has no value in nope.env (X)`
      )
    })

    it('should turn a dotenv read error into a missing secret', () => {
      fs.mkdirSync(path.join(tempDir, 'env-dir'))
      const resolver = new SecretResolver({ env: {}, cwd: tempDir })
      const spec = createSecretSpec({ name: 'X', source: 'dotenv:env-dir' })

      expect(() => resolver.resolve(spec)).toThrow(MissingSecretError)
      expect(() => resolver.resolve(spec)).toThrow('Secret "X" could not be read from env-dir (X): EISDIR')
      expect(resolver.resolveAll([spec]).missing.map(e => e.secretName)).toEqual(['X'])
    })

    it('should read each value once per run', () => {
      const env: Record<string, string | undefined> = { NPM_TOKEN: 'test-first' }
      const resolver = new SecretResolver({ env })
      const spec = createSecretSpec({ name: 'NPM_TOKEN' })

      expect(resolver.resolve(spec)).toBe('test-first')
      env.NPM_TOKEN = 'test-second'
      expect(resolver.resolve(spec)).toBe('test-first')
    })

    it('should parse a dotenv file once', () => {
      const resolver = new SecretResolver({ env: {}, cwd: tempDir })
      const spec = createSecretSpec({ name: 'NPM_PROD', source: 'dotenv:.env.fleet#PROD_NPM' })
      const other = createSecretSpec({ name: 'OTHER', source: 'dotenv:.env.fleet#PROD_NPM' })

      expect(resolver.resolve(spec)).toBe('test-dotenv-npm')
      fs.writeFileSync(path.join(tempDir, '.env.fleet'), 'PROD_NPM=test-changed\n')
      expect(resolver.resolve(other)).toBe('test-dotenv-npm')
    })

    it('should split resolved and missing secrets', () => {
      const resolver = new SecretResolver({ env: { A: 'test-a' } })
      const { resolved, missing } = resolver.resolveAll([
        createSecretSpec({ name: 'A' }),
        createSecretSpec({ name: 'B' })
      ])

      expect(resolved.map(r => [r.spec.name, r.value])).toEqual([['A', 'test-a']])
      expect(missing.map(e => e.secretName)).toEqual(['B'])
    })
  })
})
