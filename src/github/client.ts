/**
 * GitHub REST API client for commit-digest
 *
 * Reads commit history, per-commit diffs, comparisons and releases.
 * Failures are thrown as typed errors; nothing is retried.
 */

import type {
  Commit,
  GitHubCommit,
  GitHubCommitDetail,
  GitHubCommitFile,
  GitHubCompare,
  GitHubRelease,
  GitHubRepository,
  ListCommitsOptions,
  Release,
  RepoInfo,
  RepositoryClient,
  RepositorySummary,
  RepositoryTarget,
} from './types.ts'
import {
  AuthenticationError,
  NotFoundError,
  RateLimitError,
  RepositoryError,
} from '../core/errors.ts'
import { debugLog } from '../debug/logger.ts'

export const GITHUB_API_BASE = 'https://api.github.com'
const PER_PAGE_MAX = 100
const DEFAULT_COMMIT_LIMIT = 30
const MAX_PAGES = 10

export const NO_DIFF_PLACEHOLDER = 'No detailed changes available'

/**
 * Parse a GitHub repository URL into owner and repo components.
 *
 * Supports formats:
 * - https://github.com/owner/repo
 * - github.com/owner/repo
 * - owner/repo
 * - https://github.com/owner/repo.git
 * - git@github.com:owner/repo.git
 */
export function parseRepoUrl(repoUrl: string): RepoInfo | null {
  if (!repoUrl) {
    return null
  }

  const trimmed = repoUrl.trim()

  const sshMatch = trimmed.match(/^git@github\.com:([^/]+)\/(.+?)(?:\.git)?$/)
  if (sshMatch?.[1] && sshMatch[2]) {
    return { owner: sshMatch[1], repo: sshMatch[2] }
  }

  const httpsMatch = trimmed.match(
    /^(?:https?:\/\/)?github\.com\/([^/]+)\/([^/]+?)(?:\.git)?(?:\/.*)?$/
  )
  if (httpsMatch?.[1] && httpsMatch[2]) {
    return { owner: httpsMatch[1], repo: httpsMatch[2] }
  }

  const shortMatch = trimmed.match(/^([^/]+)\/([^/]+)$/)
  if (shortMatch?.[1] && shortMatch[2] && !trimmed.includes(':')) {
    return { owner: shortMatch[1], repo: shortMatch[2] }
  }

  return null
}

/**
 * Convert a GitHub API commit to the application's commit shape.
 */
export function toCommit(commit: GitHubCommit): Commit {
  return {
    sha: commit.sha,
    shortSha: commit.sha.substring(0, 7),
    message: commit.commit.message,
    author: commit.commit.author.name,
    authorEmail: commit.commit.author.email,
    date: commit.commit.author.date,
    url: commit.html_url,
  }
}

function toRelease(release: GitHubRelease): Release {
  return {
    tagName: release.tag_name,
    name: release.name,
    body: release.body,
    publishedAt: release.published_at,
    url: release.html_url,
  }
}

function toRepositorySummary(repo: GitHubRepository): RepositorySummary {
  return {
    fullName: repo.full_name,
    owner: repo.owner.login,
    name: repo.name,
    defaultBranch: repo.default_branch,
    private: repo.private,
    description: repo.description,
  }
}

/**
 * Join per-file patches into one diff text. Files without a patch
 * (binary, too large) are skipped.
 */
export function formatDiff(files: GitHubCommitFile[] | undefined): string {
  const blocks = (files ?? [])
    .filter((file) => file.patch)
    .map((file) => `File: ${file.filename}\n${file.patch}`)

  return blocks.length > 0 ? blocks.join('\n\n') : NO_DIFF_PLACEHOLDER
}

/**
 * Keep releases whose tag, title or body mentions the keyword.
 */
export function filterReleasesByKeyword(releases: Release[], keyword: string): Release[] {
  const needle = keyword.toLowerCase()
  return releases.filter(
    (r) =>
      r.tagName.toLowerCase().includes(needle) ||
      (r.name?.toLowerCase().includes(needle) ?? false) ||
      (r.body?.toLowerCase().includes(needle) ?? false)
  )
}

/**
 * Format commits as a readable list (similar to git log --oneline),
 * numbered from 1 in listing order.
 */
export function formatCommitLog(
  commits: Commit[],
  options: { numbered?: boolean; includeDate?: boolean } = {}
): string {
  const { numbered = false, includeDate = false } = options

  return commits
    .map((commit, i) => {
      const firstLine = commit.message.split('\n')[0] ?? ''
      const prefix = numbered ? `${i + 1}. ` : ''
      const date = includeDate ? ` ${commit.date.split('T')[0]}` : ''
      return `${prefix}${commit.shortSha}${date} ${firstLine}`
    })
    .join('\n')
}

/**
 * Extract `message` from a GitHub error body, or null when the body is not
 * a JSON error document.
 */
function readGitHubMessage(body: string): string | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return null
  }
  if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message
  }
  return null
}

// ============================================================================
// Client
// ============================================================================

export type GitHubClientOptions = {
  token: string
  /** Injected in tests */
  fetch?: typeof fetch
  baseUrl?: string
}

type QueryParams = Record<string, string | number | undefined>

export class GitHubClient implements RepositoryClient {
  private readonly token: string
  private readonly fetchImpl: typeof fetch
  private readonly baseUrl: string

  constructor(options: GitHubClientOptions) {
    this.token = options.token
    this.fetchImpl = options.fetch ?? fetch
    this.baseUrl = options.baseUrl ?? GITHUB_API_BASE
  }

  private repoPath(repository: RepositoryTarget): string {
    return `/repos/${repository.owner}/${repository.name}`
  }

  /**
   * Perform a GET and decode JSON, mapping failures onto the error taxonomy.
   */
  private async request<T>(path: string, params: QueryParams = {}): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`)
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value))
    }

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'commit-digest',
      'X-GitHub-Api-Version': '2022-11-28',
      Authorization: `Bearer ${this.token}`,
    }

    debugLog.debug('GitHub: request', { path, params })

    let response: Response
    try {
      response = await this.fetchImpl(url.toString(), { headers })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      debugLog.error('GitHub: network failure', { path, message })
      throw new RepositoryError(`Failed to reach GitHub: ${message}`, { cause: err })
    }

    if (!response.ok) {
      throw await this.toError(response, path)
    }

    return (await response.json()) as T
  }

  private async toError(response: Response, path: string): Promise<Error> {
    const body = await response.text()
    const detail = readGitHubMessage(body) ?? `${response.status} ${response.statusText}`.trim()

    const status = response.status
    const message = `GitHub API: ${detail}`
    const options = { source: 'github' as const, statusCode: status }
    const remaining = response.headers.get('x-ratelimit-remaining')
    const reset = response.headers.get('x-ratelimit-reset')

    debugLog.warn('GitHub: request failed', { path, status, detail })

    if (status === 429 || (status === 403 && (remaining === '0' || /rate limit/i.test(detail)))) {
      return new RateLimitError(message, {
        ...options,
        resetAt: reset ? Number(reset) : undefined,
      })
    }
    if (status === 401 || status === 403) {
      return new AuthenticationError(message, options)
    }
    if (status === 404 || status === 422) {
      return new NotFoundError(message, options)
    }
    return new RepositoryError(message, options)
  }

  /**
   * Fetch pages until a short page, `maxItems`, or MAX_PAGES.
   */
  private async paginate<T>(path: string, params: QueryParams, maxItems = Infinity): Promise<T[]> {
    const items: T[] = []
    const perPage = Math.min(maxItems, PER_PAGE_MAX)
    let page = 1

    while (page <= MAX_PAGES && items.length < maxItems) {
      const batch = await this.request<T[]>(path, { ...params, per_page: perPage, page })
      items.push(...batch)
      if (batch.length < perPage) break
      page++
    }

    return items.slice(0, maxItems)
  }

  async listRepositories(): Promise<RepositorySummary[]> {
    const repos = await this.paginate<GitHubRepository>('/user/repos', { sort: 'updated' })
    return repos.map(toRepositorySummary)
  }

  /**
   * List commits, most recent first.
   *
   * With `sinceRef` the compare endpoint is used and the result includes
   * the `sinceRef` commit unless `includeSince` is false. If `sinceRef` is not behind `untilRef` the
   * range is inverted and the result is empty.
   */
  async listCommits(repository: RepositoryTarget, options: ListCommitsOptions = {}): Promise<Commit[]> {
    const { sinceRef, untilRef, includeSince = true, limit = DEFAULT_COMMIT_LIMIT } = options
    const head = untilRef ?? repository.defaultBranch

    if (!sinceRef) {
      const commits = await this.paginate<GitHubCommit>(
        `${this.repoPath(repository)}/commits`,
        { sha: head },
        limit
      )
      debugLog.info('GitHub: listed commits', { repository: repository.name, head, count: commits.length })
      return commits.map(toCommit)
    }

    const comparison = await this.request<GitHubCompare>(
      `${this.repoPath(repository)}/compare/${sinceRef}...${head}`
    )

    if (comparison.status === 'behind' || comparison.status === 'diverged') {
      debugLog.info('GitHub: inverted or diverged range', {
        repository: repository.name,
        sinceRef,
        head,
        status: comparison.status,
      })
      return []
    }

    const newestFirst = [...comparison.commits].reverse().map(toCommit)
    if (includeSince) {
      newestFirst.push(toCommit(comparison.base_commit))
    }

    debugLog.info('GitHub: listed commit range', {
      repository: repository.name,
      sinceRef,
      head,
      count: newestFirst.length,
    })

    return newestFirst
  }

  async getCommit(repository: RepositoryTarget, sha: string): Promise<Commit> {
    const detail = await this.request<GitHubCommitDetail>(`${this.repoPath(repository)}/commits/${sha}`)
    return { ...toCommit(detail), diff: formatDiff(detail.files) }
  }

  async getDiff(repository: RepositoryTarget, sha: string): Promise<string> {
    const commit = await this.getCommit(repository, sha)
    return commit.diff ?? NO_DIFF_PLACEHOLDER
  }

  async listReleases(repository: RepositoryTarget): Promise<Release[]> {
    const releases = await this.paginate<GitHubRelease>(`${this.repoPath(repository)}/releases`, {})
    return releases.map(toRelease)
  }
}

export function createGitHubClient(token: string, fetchImpl?: typeof fetch): GitHubClient {
  return new GitHubClient({ token, fetch: fetchImpl })
}
