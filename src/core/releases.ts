// Release changelogs: pick releases that mention a keyword, then summarize
// the commits between two of them. Shared by the session controller and
// the HTTP facade.

import type { Commit, Release, RepositoryClient, RepositoryTarget } from '../github/types.ts'
import { filterReleasesByKeyword } from '../github/client.ts'
import type { ErrorPayload } from './errors.ts'
import { debugLog } from '../debug/logger.ts'

export type ReleaseSelection =
  | { kind: 'since_previous'; release: string }
  | { kind: 'between'; newer: string; older: string }

export type ReleaseRange = {
  newer: Release
  older: Release
}

export type ResolveReleaseResult =
  | { success: true; range: ReleaseRange }
  | { success: false; error: ErrorPayload }

/**
 * Releases whose tag, title or body mention `keyword`, in listing order
 * (newest first).
 */
export async function listKeywordReleases(
  client: RepositoryClient,
  repository: RepositoryTarget,
  keyword: string,
): Promise<Release[]> {
  const releases = await client.listReleases(repository)
  const matching = filterReleasesByKeyword(releases, keyword)
  debugLog.info('Releases: filtered by keyword', {
    repository: repository.name,
    keyword,
    total: releases.length,
    matching: matching.length,
  })
  return matching
}

/**
 * Pair the chosen releases. `releases` must be newest first, as listed.
 *
 * - `since_previous`: the release and the next older one in the list
 * - `between`: `newer` must come before `older` in the list
 */
export function resolveReleaseRange(
  releases: Release[],
  selection: ReleaseSelection,
  keyword: string,
): ResolveReleaseResult {
  const find = (tag: string) => releases.findIndex((r) => r.tagName === tag)
  const missing = (tag: string): ResolveReleaseResult => ({
    success: false,
    error: { kind: 'not_found', message: `Release "${tag}" is not among the "${keyword}" releases` },
  })

  if (selection.kind === 'since_previous') {
    const index = find(selection.release)
    const release = releases[index]
    if (index === -1 || !release) return missing(selection.release)

    const previous = releases[index + 1]
    if (!previous) {
      return {
        success: false,
        error: {
          kind: 'validation',
          message: `"${selection.release}" is the oldest "${keyword}" release; there is no previous release to compare with`,
        },
      }
    }
    return { success: true, range: { newer: release, older: previous } }
  }

  const newerIndex = find(selection.newer)
  const olderIndex = find(selection.older)
  const newer = releases[newerIndex]
  const older = releases[olderIndex]
  if (newerIndex === -1 || !newer) return missing(selection.newer)
  if (olderIndex === -1 || !older) return missing(selection.older)

  if (newerIndex >= olderIndex) {
    return {
      success: false,
      error: {
        kind: 'validation',
        message: `"${selection.newer}" must be newer than "${selection.older}"`,
      },
    }
  }
  return { success: true, range: { newer, older } }
}

export function releaseReference(range: ReleaseRange): string {
  return `${range.older.tagName}..${range.newer.tagName}`
}

/**
 * Commits in `newer` that are not in `older`, most recent first. The older
 * release's own commit belongs to the earlier changelog and is left out.
 */
export function listReleaseCommits(
  client: RepositoryClient,
  repository: RepositoryTarget,
  range: ReleaseRange,
): Promise<Commit[]> {
  return client.listCommits(repository, {
    sinceRef: range.older.tagName,
    untilRef: range.newer.tagName,
    includeSince: false,
  })
}
