/**
 * GitHub REST API types for commit-digest
 */

/** GitHub commit author/committer information */
export type GitHubUser = {
  name: string
  email: string
  date: string
}

/** Git-level commit data */
export type GitHubGitCommit = {
  author: GitHubUser
  committer: GitHubUser
  message: string
}

/** A single commit from the list and compare endpoints */
export type GitHubCommit = {
  sha: string
  commit: GitHubGitCommit
  html_url: string
}

/** A changed file on the single-commit endpoint */
export type GitHubCommitFile = {
  filename: string
  status: string
  additions: number
  deletions: number
  /** Absent for binary files and very large diffs */
  patch?: string
}

export type GitHubCommitDetail = GitHubCommit & {
  files?: GitHubCommitFile[]
}

export type GitHubCompareStatus = 'ahead' | 'behind' | 'identical' | 'diverged'

export type GitHubCompare = {
  status: GitHubCompareStatus
  ahead_by: number
  behind_by: number
  total_commits: number
  base_commit: GitHubCommit
  /** Oldest first */
  commits: GitHubCommit[]
}

export type GitHubRelease = {
  tag_name: string
  name: string | null
  body: string | null
  published_at: string | null
  html_url: string
  draft: boolean
  prerelease: boolean
}

export type GitHubRepository = {
  full_name: string
  name: string
  owner: { login: string }
  default_branch: string
  private: boolean
  description: string | null
}

/** Parsed repository information */
export type RepoInfo = {
  owner: string
  repo: string
}

// ============================================================================
// Application types
// ============================================================================

/** Commit as the rest of the application sees it */
export type Commit = {
  sha: string
  shortSha: string
  message: string
  author: string
  authorEmail: string
  /** ISO 8601 */
  date: string
  url: string
  diff?: string
}

export type Release = {
  tagName: string
  name: string | null
  body: string | null
  publishedAt: string | null
  url: string
}

export type RepositorySummary = {
  fullName: string
  owner: string
  name: string
  defaultBranch: string
  private: boolean
  description: string | null
}

/** Target of a repository call: configured owner/name/default branch */
export type RepositoryTarget = {
  owner: string
  name: string
  defaultBranch: string
}

/** Options for listing commits */
export type ListCommitsOptions = {
  /** Oldest commit of the range (inclusive unless `includeSince` is false) */
  sinceRef?: string
  /** Keep the `sinceRef` commit itself (default: true) */
  includeSince?: boolean
  /** Newest commit of the range; defaults to the default branch */
  untilRef?: string
  /** Maximum commits when no sinceRef is given (default: 30) */
  limit?: number
}

/**
 * Contract the session controller and HTTP facade depend on.
 */
export interface RepositoryClient {
  listRepositories(): Promise<RepositorySummary[]>
  listCommits(repository: RepositoryTarget, options?: ListCommitsOptions): Promise<Commit[]>
  getDiff(repository: RepositoryTarget, sha: string): Promise<string>
  getCommit(repository: RepositoryTarget, sha: string): Promise<Commit>
  listReleases(repository: RepositoryTarget): Promise<Release[]>
}
