/**
 * Secret Resolver
 *
 * Turns SecretSpecs into values. Values are read once per resolver (one run)
 * and kept in memory only.
 *
 * Source references:
 *   env:VAR               process environment
 *   dotenv:path/.env#VAR  key inside a dotenv file (VAR defaults to the secret name)
 *   memory:KEY            value passed programmatically
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import type { ResolvedSecret, SecretSource, SecretSpec } from '../types.js'
import { InvalidConfigError, InvalidSecretNameError, MissingSecretError } from './errors.js'

const SECRET_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Validate a GitHub Actions secret name
 */
export function validateSecretName(name: string): void {
  if (!name) {
    throw new InvalidSecretNameError(name, 'name is empty')
  }
  if (!SECRET_NAME_PATTERN.test(name)) {
    throw new InvalidSecretNameError(name, 'only letters, digits and underscores are allowed, and it may not start with a digit')
  }
  if (/^GITHUB_/i.test(name)) {
    throw new InvalidSecretNameError(name, 'the GITHUB_ prefix is reserved')
  }
}

/**
 * Parse a source reference. Without a reference the secret name is read from the environment.
 */
export function parseSecretSource(reference: string | undefined, name: string): SecretSource {
  if (reference === undefined || reference.trim() === '') {
    return { type: 'env', key: name }
  }

  const ref = reference.trim()
  const colon = ref.indexOf(':')
  if (colon === -1) {
    // Bare variable name
    return { type: 'env', key: ref }
  }

  const scheme = ref.slice(0, colon)
  const rest = ref.slice(colon + 1)

  switch (scheme) {
    case 'env':
      if (!rest) throw new InvalidConfigError(`source "${ref}" names no variable`)
      return { type: 'env', key: rest }

    case 'memory':
      if (!rest) throw new InvalidConfigError(`source "${ref}" names no key`)
      return { type: 'memory', key: rest }

    case 'dotenv': {
      const hash = rest.lastIndexOf('#')
      const file = hash === -1 ? rest : rest.slice(0, hash)
      const key = hash === -1 ? name : rest.slice(hash + 1) || name
      if (!file) throw new InvalidConfigError(`source "${ref}" names no file`)
      return { type: 'dotenv', file, key }
    }

    default:
      throw new InvalidConfigError(`unknown secret source "${scheme}" in "${ref}" (expected env:, dotenv: or memory:)`)
  }
}

/**
 * Build a SecretSpec from a name and optional source/target
 */
export function createSecretSpec(input: { name: string; source?: string; target?: string }): SecretSpec {
  const name = input.name.trim()
  const target = input.target?.trim() || name
  validateSecretName(target)

  return {
    name,
    source: parseSecretSource(input.source, name),
    target
  }
}

export function describeSource(source: SecretSource): string {
  switch (source.type) {
    case 'env':
      return `environment variable ${source.key}`
    case 'dotenv':
      return `${source.file} (${source.key})`
    case 'memory':
      return `provided values (${source.key})`
  }
}

export interface SecretResolverOptions {
  /** Environment to read env: sources from (default: process.env) */
  env?: Record<string, string | undefined>
  /** Values for memory: sources */
  values?: Record<string, string>
  /** Base directory for relative dotenv paths (default: process.cwd()) */
  cwd?: string
}

export class SecretResolver {
  private readonly cache = new Map<string, string>()
  private readonly dotenvFiles = new Map<string, Record<string, string> | null>()
  private readonly env: Record<string, string | undefined>
  private readonly values: Record<string, string>
  private readonly cwd: string

  constructor(options: SecretResolverOptions = {}) {
    this.env = options.env ?? process.env
    this.values = options.values ?? {}
    this.cwd = options.cwd ?? process.cwd()
  }

  /**
   * Value of a secret, or MissingSecretError when the source has none (or an empty one)
   */
  resolve(spec: SecretSpec): string {
    const cached = this.cache.get(spec.name)
    if (cached !== undefined) {
      return cached
    }

    let value: string | undefined
    try {
      value = this.lookup(spec.source)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new MissingSecretError(spec.name, describeSource(spec.source), reason)
    }
    if (value === undefined || value === '') {
      throw new MissingSecretError(spec.name, describeSource(spec.source))
    }

    this.cache.set(spec.name, value)
    return value
  }

  /**
   * Resolve every secret; missing ones are collected instead of thrown
   */
  resolveAll(specs: readonly SecretSpec[]): { resolved: ResolvedSecret[]; missing: MissingSecretError[] } {
    const resolved: ResolvedSecret[] = []
    const missing: MissingSecretError[] = []

    for (const spec of specs) {
      try {
        resolved.push({ spec, value: this.resolve(spec) })
      } catch (error) {
        if (error instanceof MissingSecretError) {
          missing.push(error)
        } else {
          throw error
        }
      }
    }

    return { resolved, missing }
  }

  private lookup(source: SecretSource): string | undefined {
    switch (source.type) {
      case 'env':
        return this.env[source.key]
      case 'memory':
        return this.values[source.key]
      case 'dotenv':
        return this.readDotenv(source.file)?.[source.key]
    }
  }

  private readDotenv(file: string): Record<string, string> | null {
    const filePath = path.resolve(this.cwd, file)
    if (this.dotenvFiles.has(filePath)) {
      return this.dotenvFiles.get(filePath) ?? null
    }

    if (!fs.existsSync(filePath)) {
      this.dotenvFiles.set(filePath, null)
      return null
    }

    // Read errors (a directory, no permission) propagate to resolve() and are not cached
    const parsed = dotenv.parse(fs.readFileSync(filePath, 'utf-8'))
    this.dotenvFiles.set(filePath, parsed)
    return parsed
  }
}
