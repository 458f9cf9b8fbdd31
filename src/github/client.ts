/**
 * GitHub client - Octokit wrapper for the calls a distribution run needs
 *
 * The rest of the code talks to the `FleetApi` contract only, so tests can
 * swap in an in-memory implementation.
 *
 * Octokit's own retry and throttling plugins are disabled: rate limiting is
 * handled by the batch scheduler's backoff so a persistently throttled batch
 * can be reported instead of waiting indefinitely.
 */

import { Octokit } from 'octokit'
import type { Logger, Repository, RepositoryFilter, RepositoryVisibility } from '../types.js'
import {
  AuthorizationError,
  asHttpError,
  isFleetError,
  isThrottleResponse,
  toDeploymentError,
  wrapError,
  type FleetError
} from '../lib/errors.js'

export interface RepositoryPublicKey {
  keyId: string
  /** base64 Curve25519 public key */
  key: string
}

export interface SealedSecret {
  /** base64 sealed box */
  encryptedValue: string
  keyId: string
}

export type PutSecretOutcome = 'created' | 'updated'

/**
 * Hosting API operations used by a run
 */
export interface FleetApi {
  /** Throws AuthorizationError when the credential cannot work on the account */
  verifyAccess(account: string, filter: RepositoryFilter): Promise<void>
  /** Every repository of the account the credential can see, page by page */
  listRepositories(account: string): AsyncIterable<Repository>
  /** null when the repository does not exist or is not visible */
  getRepository(owner: string, name: string): Promise<Repository | null>
  getPublicKey(repository: Repository): Promise<RepositoryPublicKey>
  putSecret(repository: Repository, secretName: string, sealed: SealedSecret): Promise<PutSecretOutcome>
}

export interface GitHubFleetApiOptions {
  token: string
  /** GitHub Enterprise Server API URL */
  baseUrl?: string
  logger?: Logger
  /** Replaces the global fetch (in-process stand-ins) */
  fetch?: typeof fetch
}

/** Fields read from repository payloads (org, user and authenticated-user listings) */
interface RepositoryPayload {
  name: string
  full_name: string
  private: boolean
  visibility?: string
  archived?: boolean
  disabled?: boolean
  owner: { login: string }
}

type AccountType = 'Organization' | 'User'

const PER_PAGE = 100

export function toRepository(payload: RepositoryPayload): Repository {
  let visibility: RepositoryVisibility
  if (payload.visibility === 'public' || payload.visibility === 'private' || payload.visibility === 'internal') {
    visibility = payload.visibility
  } else {
    visibility = payload.private ? 'private' : 'public'
  }

  return {
    owner: payload.owner.login,
    name: payload.name,
    fullName: payload.full_name,
    visibility,
    archived: payload.archived ?? false,
    disabled: payload.disabled ?? false
  }
}

/**
 * Whether a classic token's x-oauth-scopes header allows writing secrets
 * for the repositories the filter selects
 */
export function hasRequiredScope(scopesHeader: string, filter: RepositoryFilter): boolean {
  const scopes = scopesHeader.split(',').map(s => s.trim()).filter(Boolean)
  if (scopes.includes('repo')) {
    return true
  }
  return filter === 'public' && scopes.includes('public_repo')
}

export class GitHubFleetApi implements FleetApi {
  private readonly octokit: Octokit
  private readonly logger?: Logger
  private readonly accountTypes = new Map<string, AccountType>()
  private authenticatedLogin: string | null | undefined

  constructor(options: GitHubFleetApiOptions) {
    if (!options.token) {
      throw new AuthorizationError('No GitHub token provided')
    }

    const logger = options.logger
    this.logger = logger

    this.octokit = new Octokit({
      auth: options.token,
      userAgent: 'secret-fleet',
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
      ...(logger
        ? {
            log: {
              debug: (message: string) => logger.debug(message),
              info: (message: string) => logger.debug(message),
              warn: (message: string) => logger.warn(message),
              error: (message: string) => logger.error(message)
            }
          }
        : {}),
      throttle: {
        enabled: false,
        onRateLimit: () => false,
        onSecondaryRateLimit: () => false
      },
      retry: { enabled: false }
    })
  }

  async verifyAccess(account: string, filter: RepositoryFilter): Promise<void> {
    try {
      const response = await this.octokit.rest.users.getByUsername({ username: account })
      this.accountTypes.set(account, response.data.type === 'Organization' ? 'Organization' : 'User')

      // Classic tokens report their scopes; fine-grained and installation tokens don't
      const scopes = response.headers['x-oauth-scopes']
      if (typeof scopes === 'string' && !hasRequiredScope(scopes, filter)) {
        throw new AuthorizationError(
          `Token scopes "${scopes || '(none)'}" do not allow writing repository secrets`,
          { scopes }
        )
      }
    } catch (error) {
      throw this.mapAccessError(error, account)
    }
  }

  async *listRepositories(account: string): AsyncGenerator<Repository> {
    try {
      const pages = await this.repositoryPages(account)
      for await (const page of pages) {
        for (const payload of page.data) {
          yield toRepository(payload)
        }
      }
    } catch (error) {
      throw this.mapAccessError(error, account)
    }
  }

  async getRepository(owner: string, name: string): Promise<Repository | null> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo: name })
      return toRepository(data)
    } catch (error) {
      const http = asHttpError(error)
      if (http?.status === 404) {
        return null
      }
      throw this.mapAccessError(error, owner)
    }
  }

  async getPublicKey(repository: Repository): Promise<RepositoryPublicKey> {
    try {
      const { data } = await this.octokit.rest.actions.getRepoPublicKey({
        owner: repository.owner,
        repo: repository.name
      })
      return { keyId: data.key_id, key: data.key }
    } catch (error) {
      throw toDeploymentError(error)
    }
  }

  async putSecret(repository: Repository, secretName: string, sealed: SealedSecret): Promise<PutSecretOutcome> {
    try {
      const response = await this.octokit.rest.actions.createOrUpdateRepoSecret({
        owner: repository.owner,
        repo: repository.name,
        secret_name: secretName,
        encrypted_value: sealed.encryptedValue,
        key_id: sealed.keyId
      })
      // 201 Created for a new secret, 204 No Content when an existing one was replaced
      return response.status === 201 ? 'created' : 'updated'
    } catch (error) {
      throw toDeploymentError(error)
    }
  }

  private async repositoryPages(account: string): Promise<AsyncIterable<{ data: RepositoryPayload[] }>> {
    const type = await this.accountType(account)

    if (type === 'Organization') {
      this.logger?.debug(`Listing repositories of organization ${account}`)
      return this.octokit.paginate.iterator(this.octokit.rest.repos.listForOrg, {
        org: account,
        type: 'all',
        per_page: PER_PAGE
      })
    }

    const login = await this.currentLogin()
    if (login !== null && login.toLowerCase() === account.toLowerCase()) {
      // Only the owner's own listing includes private repositories
      this.logger?.debug(`Listing repositories owned by the authenticated user ${account}`)
      return this.octokit.paginate.iterator(this.octokit.rest.repos.listForAuthenticatedUser, {
        affiliation: 'owner',
        visibility: 'all',
        per_page: PER_PAGE
      })
    }

    this.logger?.debug(`Listing public repositories of user ${account}`)
    return this.octokit.paginate.iterator(this.octokit.rest.repos.listForUser, {
      username: account,
      type: 'owner',
      per_page: PER_PAGE
    })
  }

  private async accountType(account: string): Promise<AccountType> {
    const cached = this.accountTypes.get(account)
    if (cached) {
      return cached
    }
    const { data } = await this.octokit.rest.users.getByUsername({ username: account })
    const type: AccountType = data.type === 'Organization' ? 'Organization' : 'User'
    this.accountTypes.set(account, type)
    return type
  }

  /**
   * Login of the token owner; null for installation tokens, which cannot call GET /user
   */
  private async currentLogin(): Promise<string | null> {
    if (this.authenticatedLogin !== undefined) {
      return this.authenticatedLogin
    }
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated()
      this.authenticatedLogin = data.login
    } catch (error) {
      this.logger?.debug(`GET /user unavailable for this token: ${wrapError(error).message}`)
      this.authenticatedLogin = null
    }
    return this.authenticatedLogin
  }

  private mapAccessError(error: unknown, account: string): FleetError {
    if (isFleetError(error)) {
      return error
    }
    const http = asHttpError(error)
    if (http) {
      if (http.status === 401) {
        return new AuthorizationError('GitHub rejected the token (HTTP 401 Bad credentials)', {
          status: 401,
          cause: error
        })
      }
      if (http.status === 403 && !isThrottleResponse(http)) {
        return new AuthorizationError(`Token is not allowed to access repositories of "${account}"`, {
          status: 403,
          cause: error
        })
      }
      if (http.status === 404) {
        return new AuthorizationError(`Account "${account}" not found or not visible to the token`, {
          status: 404,
          cause: error
        })
      }
      return toDeploymentError(error)
    }
    return wrapError(error)
  }
}
