/**
 * Repository Enumerator
 *
 * Produces the repositories a run targets, lazily, as the hosting API pages
 * them in. Archived and disabled repositories are always excluded; names
 * from specific_repos that do not resolve are reported, not fatal.
 */

import type { ExclusionReason, Repository, RepositoryFilter } from '../types.js'
import type { FleetApi } from '../github/client.js'
import { NotFoundError } from './errors.js'

export type EnumerationEvent =
  | { type: 'repository'; repository: Repository }
  | { type: 'excluded'; repository: Repository; reason: ExclusionReason }
  | { type: 'not-found'; error: NotFoundError }

export interface EnumerationOptions {
  account: string
  repositoryFilter: RepositoryFilter
  specificRepos?: readonly string[]
}

/**
 * Why a repository cannot receive secrets, or null when it can
 */
export function exclusionReason(repository: Repository): ExclusionReason | null {
  if (repository.archived) return 'archived'
  if (repository.disabled) return 'disabled'
  return null
}

export function matchesVisibility(repository: Repository, filter: RepositoryFilter): boolean {
  switch (filter) {
    case 'public':
      return repository.visibility === 'public'
    case 'private':
      return repository.visibility !== 'public'
    case 'all':
    case 'specific':
      return true
  }
}

/**
 * Split a specific_repos entry into owner and name. Bare names belong to the account.
 */
export function parseRepositoryName(entry: string, account: string): { owner: string; name: string } {
  const trimmed = entry.trim()
  const slash = trimmed.indexOf('/')
  if (slash === -1) {
    return { owner: account, name: trimmed }
  }
  return { owner: trimmed.slice(0, slash), name: trimmed.slice(slash + 1) }
}

/**
 * Collapse duplicates (case-insensitive, as GitHub treats names) keeping first occurrence order
 */
export function uniqueRepositoryNames(entries: readonly string[], account: string): Array<{ owner: string; name: string }> {
  const seen = new Set<string>()
  const result: Array<{ owner: string; name: string }> = []

  for (const entry of entries) {
    if (!entry.trim()) continue
    const parsed = parseRepositoryName(entry, account)
    const key = `${parsed.owner}/${parsed.name}`.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    result.push(parsed)
  }

  return result
}

/**
 * Enumerate repositories for a run
 *
 * AuthorizationError from the API propagates: nothing downstream can proceed
 * without a successful enumeration.
 */
export async function* enumerateRepositories(
  api: Pick<FleetApi, 'listRepositories' | 'getRepository'>,
  options: EnumerationOptions
): AsyncGenerator<EnumerationEvent> {
  const { account, repositoryFilter } = options

  if (repositoryFilter === 'specific') {
    for (const { owner, name } of uniqueRepositoryNames(options.specificRepos ?? [], account)) {
      const repository = await api.getRepository(owner, name)
      if (!repository) {
        yield { type: 'not-found', error: new NotFoundError(`${owner}/${name}`) }
        continue
      }
      yield classify(repository)
    }
    return
  }

  for await (const repository of api.listRepositories(account)) {
    if (!matchesVisibility(repository, repositoryFilter)) {
      continue
    }
    yield classify(repository)
  }
}

function classify(repository: Repository): EnumerationEvent {
  const reason = exclusionReason(repository)
  return reason
    ? { type: 'excluded', repository, reason }
    : { type: 'repository', repository }
}
