/**
 * secret-fleet Error Hierarchy
 *
 * Typed error classes so the run controller can decide, per failure, whether
 * the run stops or the failure is recorded and processing continues.
 *
 * Hierarchy:
 *   FleetError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── ValidationError (input validation)
 *   │   ├── MissingInputError
 *   │   ├── InvalidSecretNameError
 *   │   └── DuplicateSecretError
 *   ├── AuthorizationError        fatal, aborts the run
 *   ├── NotFoundError             per specific repository name
 *   ├── MissingSecretError        per secret, recorded once
 *   ├── EncryptionError           per (repository, secret) pair
 *   └── DeploymentCallError       per (repository, secret) pair
 *       └── RateLimitError        transient throttling
 */

interface FleetErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all secret-fleet errors
 */
export class FleetError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: FleetErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'FleetError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for log output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends FleetError {
  constructor(message: string, code: string, options?: FleetErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when an explicitly requested config file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(
      `Config file not found: ${searchedPath}`,
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Check the "config" input or remove it to use action inputs only',
        context: { searchedPath }
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when the config file or an input has an invalid value
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the secret-fleet.yaml syntax and the action inputs',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends FleetError {
  constructor(message: string, code: string, options?: FleetErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when required input is missing
 */
export class MissingInputError extends ValidationError {
  constructor(inputName: string) {
    super(
      `Input required and not supplied: ${inputName}`,
      'MISSING_INPUT',
      {
        suggestion: `Provide the "${inputName}" input`,
        context: { inputName }
      }
    )
    this.name = 'MissingInputError'
  }
}

/**
 * Thrown when a secret name is not accepted by GitHub Actions
 */
export class InvalidSecretNameError extends ValidationError {
  constructor(secretName: string, reason: string) {
    super(
      `Invalid secret name "${secretName}": ${reason}`,
      'INVALID_SECRET_NAME',
      {
        suggestion: 'Secret names may only contain letters, digits and underscores, must not start with a digit or GITHUB_',
        context: { secretName }
      }
    )
    this.name = 'InvalidSecretNameError'
  }
}

/**
 * Thrown when the same secret is requested twice in one run
 */
export class DuplicateSecretError extends ValidationError {
  constructor(secretName: string) {
    super(
      `Secret "${secretName}" is listed more than once`,
      'DUPLICATE_SECRET',
      {
        suggestion: 'Each secret (and each target name) may appear only once per run',
        context: { secretName }
      }
    )
    this.name = 'DuplicateSecretError'
  }
}

// =============================================================================
// Run Errors
// =============================================================================

/**
 * Credential is missing, rejected or lacks the scope needed to list
 * repositories and write secrets. Ends the run before any mutation.
 */
export class AuthorizationError extends FleetError {
  constructor(message: string, options?: { status?: number; scopes?: string; cause?: unknown }) {
    super(
      message,
      'UNAUTHORIZED',
      {
        suggestion: 'Use a token with the "repo" scope (classic) or Secrets: write + Metadata: read (fine-grained)',
        context: options?.status !== undefined || options?.scopes !== undefined
          ? { status: options.status, scopes: options.scopes }
          : undefined,
        cause: options?.cause
      }
    )
    this.name = 'AuthorizationError'
  }
}

/**
 * A repository named in specific_repos does not exist or is not visible
 */
export class NotFoundError extends FleetError {
  readonly repository: string

  constructor(repository: string, cause?: unknown) {
    super(
      `Repository not found: ${repository}`,
      'REPOSITORY_NOT_FOUND',
      {
        suggestion: 'Check the name in specific_repos and that the token can see the repository',
        context: { repository },
        cause
      }
    )
    this.name = 'NotFoundError'
    this.repository = repository
  }
}

/**
 * A requested secret has no value in its source
 */
export class MissingSecretError extends FleetError {
  readonly secretName: string

  constructor(secretName: string, sourceDescription: string, readError?: string) {
    super(
      readError
        ? `Secret "${secretName}" could not be read from ${sourceDescription}: ${readError}`
        : `Secret "${secretName}" has no value in ${sourceDescription}`,
      'MISSING_SECRET',
      {
        suggestion: readError
          ? `Check that ${sourceDescription} points at a readable dotenv file`
          : `Expose the value to the job (for example "env: ${secretName}: \${{ secrets.${secretName} }}")`,
        context: readError
          ? { secretName, source: sourceDescription, readError }
          : { secretName, source: sourceDescription }
      }
    )
    this.name = 'MissingSecretError'
    this.secretName = secretName
  }
}

/**
 * Public key could not be fetched or the key material is invalid
 */
export class EncryptionError extends FleetError {
  constructor(message: string, repository: string, cause?: unknown) {
    super(
      message,
      'ENCRYPTION_FAILED',
      {
        context: { repository },
        cause
      }
    )
    this.name = 'EncryptionError'
  }
}

/**
 * A create-or-update call was rejected
 */
export class DeploymentCallError extends FleetError {
  /** HTTP status, when the hosting API answered */
  readonly status?: number

  /** Transient failures may succeed when retried */
  readonly transient: boolean

  constructor(
    message: string,
    options: { status?: number; transient?: boolean; code?: string; cause?: unknown } = {}
  ) {
    super(message, options.code ?? 'DEPLOYMENT_FAILED', {
      context: options.status !== undefined ? { status: options.status } : undefined,
      cause: options.cause
    })
    this.name = 'DeploymentCallError'
    this.status = options.status
    this.transient = options.transient ?? false
  }
}

/**
 * The hosting API asked us to slow down (primary or secondary rate limit)
 */
export class RateLimitError extends DeploymentCallError {
  /** Wait requested by the API, when it sent one */
  readonly retryAfterMs?: number

  constructor(message: string, options: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { status: options.status, transient: true, code: 'RATE_LIMITED', cause: options.cause })
    this.name = 'RateLimitError'
    this.retryAfterMs = options.retryAfterMs
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFleetError(error: unknown): error is FleetError {
  return error instanceof FleetError
}

export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

// =============================================================================
// HTTP error mapping
// =============================================================================

interface HttpErrorShape {
  status: number
  message: string
  headers: Record<string, string | number | undefined>
}

/**
 * Read status and headers from an Octokit RequestError (or anything shaped like one)
 */
export function asHttpError(error: unknown): HttpErrorShape | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null
  }
  const status = error.status
  if (typeof status !== 'number') {
    return null
  }

  const headers: Record<string, string | number | undefined> = {}
  const response = 'response' in error ? error.response : undefined
  if (typeof response === 'object' && response !== null && 'headers' in response) {
    const raw = response.headers
    if (typeof raw === 'object' && raw !== null) {
      for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'string' || typeof value === 'number') {
          headers[key.toLowerCase()] = value
        }
      }
    }
  }

  const message = error instanceof Error ? error.message : `HTTP ${status}`
  return { status, message, headers }
}

/**
 * Whether an HTTP failure is GitHub throttling rather than a permission problem.
 *
 * Primary limit: 403/429 with x-ratelimit-remaining: 0.
 * Secondary limit: 403/429 with retry-after or a "secondary rate limit" message.
 */
export function isThrottleResponse(http: HttpErrorShape): boolean {
  if (http.status !== 403 && http.status !== 429) {
    return false
  }
  if (http.status === 429) {
    return true
  }
  return String(http.headers['x-ratelimit-remaining']) === '0' ||
    http.headers['retry-after'] !== undefined ||
    /secondary rate limit/i.test(http.message)
}

/**
 * Wait the API asked for, from retry-after or x-ratelimit-reset
 */
export function retryAfterMs(http: HttpErrorShape, now: number = Date.now()): number | undefined {
  const retryAfter = http.headers['retry-after']
  if (retryAfter !== undefined) {
    const seconds = Number(retryAfter)
    if (Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000
    }
  }
  const reset = http.headers['x-ratelimit-reset']
  if (reset !== undefined) {
    const resetAt = Number(reset) * 1000
    if (Number.isFinite(resetAt) && resetAt > now) {
      return resetAt - now
    }
  }
  return undefined
}

/**
 * Map a failed create-or-update call to the error taxonomy
 */
export function toDeploymentError(error: unknown): FleetError {
  if (isFleetError(error)) {
    return error
  }
  const http = asHttpError(error)
  if (http) {
    if (isThrottleResponse(http)) {
      return new RateLimitError(`Rate limited (HTTP ${http.status}): ${http.message}`, {
        status: http.status,
        retryAfterMs: retryAfterMs(http),
        cause: error
      })
    }
    return new DeploymentCallError(`HTTP ${http.status}: ${http.message}`, {
      status: http.status,
      transient: http.status >= 500,
      cause: error
    })
  }
  return wrapError(error, 'DEPLOYMENT_FAILED')
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for log output
 */
export function formatErrorForCli(error: unknown): string {
  if (isFleetError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a FleetError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): FleetError {
  if (isFleetError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new FleetError(error.message, defaultCode, { cause: error })
  }
  return new FleetError(String(error), defaultCode)
}
