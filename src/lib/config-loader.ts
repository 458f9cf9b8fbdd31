/**
 * secret-fleet Config Loader
 *
 * Loads the optional YAML config file. Action inputs override anything set
 * here; the file is the place for long secret lists and source mappings.
 *
 * ```yaml
 * owner: acme
 * repository_filter: private
 * batch_size: 10
 * max_parallel_batches: 3
 * env_file: .env.fleet
 * secrets:
 *   - NPM_TOKEN
 *   - name: SONAR_TOKEN
 *     source: env:ORG_SONAR_TOKEN
 *   - name: DEPLOY_KEY
 *     source: dotenv:.env.fleet#PROD_DEPLOY_KEY
 *     target: PROD_DEPLOY_KEY
 * ```
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { RepositoryFilter } from '../types.js'
import { REPOSITORY_FILTERS } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError } from './errors.js'

export const CONFIG_FILES = ['.github/secret-fleet.yaml', '.github/secret-fleet.yml', 'secret-fleet.yaml', 'secret-fleet.yml']
const MAX_SEARCH_DEPTH = 5

export interface SecretEntry {
  name: string
  source?: string
  target?: string
}

export interface FleetFileConfig {
  owner?: string
  repositoryFilter?: RepositoryFilter
  specificRepos?: string[]
  batchSize?: number
  maxParallelBatches?: number
  envFile?: string
  backoff?: {
    maxAttempts?: number
    baseDelayMs?: number
    maxDelayMs?: number
  }
  secrets?: SecretEntry[]
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Record<string, string | undefined> = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Find a config file by searching up from the start directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
    for (const candidate of CONFIG_FILES) {
      const filePath = path.join(currentDir, candidate)
      if (fs.existsSync(filePath)) {
        return filePath
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }
    currentDir = parentDir
  }

  return null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

class FieldReader {
  constructor(
    private readonly source: Record<string, unknown>,
    private readonly configPath: string | undefined,
    private readonly env: Record<string, string | undefined>,
    private readonly prefix = ''
  ) {}

  string(key: string): string | undefined {
    const value = this.source[key]
    if (value === undefined || value === null) return undefined
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw this.invalid(key, 'expected a string')
    }
    return expandEnvVars(String(value), this.env)
  }

  integer(key: string, min: number): number | undefined {
    const value = this.source[key]
    if (value === undefined || value === null) return undefined
    const parsed = typeof value === 'string' ? Number(expandEnvVars(value, this.env)) : value
    if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < min) {
      throw this.invalid(key, `expected an integer >= ${min}`)
    }
    return parsed
  }

  stringList(key: string): string[] | undefined {
    const value = this.source[key]
    if (value === undefined || value === null) return undefined
    if (typeof value === 'string') {
      return splitList(expandEnvVars(value, this.env))
    }
    if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
      throw this.invalid(key, 'expected a list of strings')
    }
    return value.map(item => expandEnvVars(String(item), this.env).trim()).filter(Boolean)
  }

  nested(key: string): FieldReader | undefined {
    const value = this.source[key]
    if (value === undefined || value === null) return undefined
    if (!isRecord(value)) {
      throw this.invalid(key, 'expected a mapping')
    }
    return new FieldReader(value, this.configPath, this.env, `${this.prefix}${key}.`)
  }

  raw(key: string): unknown {
    return this.source[key]
  }

  invalid(key: string, message: string): InvalidConfigError {
    return new InvalidConfigError(`${this.prefix}${key}: ${message}`, this.configPath)
  }
}

/**
 * Split a comma or newline separated list
 */
export function splitList(value: string): string[] {
  return value
    .split(/[,\n]/)
    .map(item => item.trim())
    .filter(Boolean)
}

/**
 * Validate a parsed YAML document
 */
export function parseFileConfig(
  document: unknown,
  configPath?: string,
  env: Record<string, string | undefined> = process.env
): FleetFileConfig {
  if (document === undefined || document === null) {
    return {}
  }
  if (!isRecord(document)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const fields = new FieldReader(document, configPath, env)
  const config: FleetFileConfig = {}

  const owner = fields.string('owner')
  if (owner) config.owner = owner

  const filter = fields.string('repository_filter')
  if (filter !== undefined) {
    const normalized = filter.toLowerCase()
    const match = REPOSITORY_FILTERS.find(f => f === normalized)
    if (!match) {
      throw fields.invalid('repository_filter', `expected one of ${REPOSITORY_FILTERS.join(', ')}`)
    }
    config.repositoryFilter = match
  }

  const specificRepos = fields.stringList('specific_repos')
  if (specificRepos) config.specificRepos = specificRepos

  const batchSize = fields.integer('batch_size', 1)
  if (batchSize !== undefined) config.batchSize = batchSize

  const maxParallel = fields.integer('max_parallel_batches', 1)
  if (maxParallel !== undefined) config.maxParallelBatches = maxParallel

  const envFile = fields.string('env_file')
  if (envFile) config.envFile = envFile

  const backoff = fields.nested('backoff')
  if (backoff) {
    config.backoff = {
      maxAttempts: backoff.integer('max_attempts', 1),
      baseDelayMs: backoff.integer('base_delay_ms', 0),
      maxDelayMs: backoff.integer('max_delay_ms', 0)
    }
  }

  const secrets = fields.raw('secrets')
  if (secrets !== undefined && secrets !== null) {
    if (!Array.isArray(secrets)) {
      throw fields.invalid('secrets', 'expected a list')
    }
    config.secrets = secrets.map((entry: unknown, index: number) => {
      if (typeof entry === 'string') {
        return { name: expandEnvVars(entry, env).trim() }
      }
      if (!isRecord(entry)) {
        throw fields.invalid(`secrets[${index}]`, 'expected a name or a mapping with "name"')
      }
      const item = new FieldReader(entry, configPath, env, `secrets[${index}].`)
      const name = item.string('name')
      if (!name) {
        throw item.invalid('name', 'is required')
      }
      return {
        name,
        source: item.string('source'),
        target: item.string('target')
      }
    })
  }

  return config
}

/**
 * Load a config file. An explicit path must exist; without one the file is
 * searched for and its absence is not an error.
 */
export function loadConfig(
  explicitPath?: string,
  options: { cwd?: string; env?: Record<string, string | undefined> } = {}
): { config: FleetFileConfig; path: string | null } {
  const cwd = options.cwd ?? process.cwd()
  let configPath: string | null

  if (explicitPath) {
    configPath = path.resolve(cwd, explicitPath)
    if (!fs.existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath)
    }
  } else {
    configPath = findConfigFile(cwd)
    if (!configPath) {
      return { config: {}, path: null }
    }
  }

  let document: unknown
  try {
    document = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new InvalidConfigError(`YAML parse error: ${reason}`, configPath, error)
  }

  return { config: parseFileConfig(document, configPath, options.env), path: configPath }
}
