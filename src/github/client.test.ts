import { describe, it, expect } from 'vitest'
import {
  GitHubClient,
  NO_DIFF_PLACEHOLDER,
  filterReleasesByKeyword,
  formatCommitLog,
  formatDiff,
  parseRepoUrl,
} from './client.ts'
import type { GitHubCommit, Release } from './types.ts'
import {
  AuthenticationError,
  NotFoundError,
  RateLimitError,
  RepositoryError,
} from '../core/errors.ts'

const REPO = { owner: 'acme', name: 'widgets', defaultBranch: 'main' }

type FakeReply = {
  status?: number
  statusText?: string
  body: unknown
  headers?: Record<string, string>
}

type RecordedRequest = {
  url: URL
  init?: RequestInit
}

/**
 * fetch stand-in answering from a router function.
 */
function fakeFetch(route: (url: URL) => FakeReply) {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString())
    requests.push({ url, init })
    const reply = route(url)
    const body = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body)
    return new Response(body, {
      status: reply.status ?? 200,
      statusText: reply.statusText,
      headers: reply.headers,
    })
  }
  return { fetchImpl, requests }
}

function apiCommit(sha: string, message = `Change ${sha}`): GitHubCommit {
  return {
    sha,
    commit: {
      author: { name: 'Dev One', email: 'dev@example.com', date: '2024-03-01T12:00:00Z' },
      committer: { name: 'Dev One', email: 'dev@example.com', date: '2024-03-01T12:00:00Z' },
      message,
    },
    html_url: `https://github.com/acme/widgets/commit/${sha}`,
  }
}

function client(route: (url: URL) => FakeReply) {
  const fake = fakeFetch(route)
  return { client: new GitHubClient({ token: 'test-token', fetch: fake.fetchImpl }), requests: fake.requests }
}

describe('parseRepoUrl', () => {
  it.each([
    ['https://github.com/acme/widgets', 'acme', 'widgets'],
    ['github.com/acme/widgets', 'acme', 'widgets'],
    ['https://github.com/acme/widgets.git', 'acme', 'widgets'],
    ['git@github.com:acme/widgets.git', 'acme', 'widgets'],
    ['acme/widgets', 'acme', 'widgets'],
  ])('parses %s', (input, owner, repo) => {
    expect(parseRepoUrl(input)).toEqual({ owner, repo })
  })

  it('returns null for anything else', () => {
    expect(parseRepoUrl('')).toBeNull()
    expect(parseRepoUrl('widgets')).toBeNull()
  })
})

describe('formatDiff', () => {
  it('joins file patches and skips files without one', () => {
    const diff = formatDiff([
      { filename: 'a.ts', status: 'modified', additions: 1, deletions: 0, patch: '@@ -1 +1 @@\n+a' },
      { filename: 'logo.png', status: 'added', additions: 0, deletions: 0 },
      { filename: 'b.ts', status: 'modified', additions: 1, deletions: 1, patch: '@@ -2 +2 @@\n-b\n+B' },
    ])
    expect(diff).toBe('File: a.ts\n@@ -1 +1 @@\n+a\n\nFile: b.ts\n@@ -2 +2 @@\n-b\n+B')
  })

  it('falls back to a placeholder', () => {
    expect(formatDiff(undefined)).toBe(NO_DIFF_PLACEHOLDER)
    expect(formatDiff([])).toBe(NO_DIFF_PLACEHOLDER)
  })
})

describe('filterReleasesByKeyword', () => {
  const release = (tagName: string, name: string | null, body: string | null): Release => ({
    tagName,
    name,
    body,
    publishedAt: '2024-03-01T00:00:00Z',
    url: `https://github.com/acme/widgets/releases/${tagName}`,
  })

  it('matches tag, title or body without regard to case', () => {
    const releases = [
      release('v1.0-production', null, null),
      release('v1.1', 'Production push', null),
      release('v1.2', null, 'Deployed to PRODUCTION'),
      release('v1.3-beta', 'Beta', 'staging only'),
    ]
    expect(filterReleasesByKeyword(releases, 'production').map((r) => r.tagName)).toEqual([
      'v1.0-production',
      'v1.1',
      'v1.2',
    ])
  })
})

describe('formatCommitLog', () => {
  it('numbers commits and shows first lines', () => {
    const commits = [apiCommit('1111111aaaa', 'First\n\nbody'), apiCommit('2222222bbbb', 'Second')].map(
      (c) => ({
        sha: c.sha,
        shortSha: c.sha.substring(0, 7),
        message: c.commit.message,
        author: c.commit.author.name,
        authorEmail: c.commit.author.email,
        date: c.commit.author.date,
        url: c.html_url,
      }),
    )
    expect(formatCommitLog(commits, { numbered: true, includeDate: true })).toBe(
      '1. 1111111 2024-03-01 First\n2. 2222222 2024-03-01 Second',
    )
  })
})

describe('GitHubClient', () => {
  describe('listCommits', () => {
    it('lists the default branch, most recent first', async () => {
      const { client: github, requests } = client(() => ({ body: [apiCommit('c1'), apiCommit('c2')] }))

      const commits = await github.listCommits(REPO, { limit: 20 })

      expect(commits.map((c) => c.sha)).toEqual(['c1', 'c2'])
      expect(commits[0]).toEqual({
        sha: 'c1',
        shortSha: 'c1',
        message: 'Change c1',
        author: 'Dev One',
        authorEmail: 'dev@example.com',
        date: '2024-03-01T12:00:00Z',
        url: 'https://github.com/acme/widgets/commit/c1',
      })
      expect(requests).toHaveLength(1)
      expect(requests[0]?.url.pathname).toBe('/repos/acme/widgets/commits')
      expect(requests[0]?.url.search).toBe('?sha=main&per_page=20&page=1')
      expect(requests[0]?.init?.headers).toMatchObject({
        Authorization: 'Bearer test-token',
        Accept: 'application/vnd.github+json',
      })
    })

    it('pages until the limit is reached', async () => {
      const { client: github, requests } = client((url) => {
        const page = Number(url.searchParams.get('page'))
        const count = page === 1 ? 100 : 60
        return { body: Array.from({ length: count }, (_, i) => apiCommit(`p${page}-${i}`)) }
      })

      const commits = await github.listCommits(REPO, { limit: 150 })

      expect(commits).toHaveLength(150)
      expect(requests.map((r) => r.url.searchParams.get('page'))).toEqual(['1', '2'])
      expect(commits.at(-1)?.sha).toBe('p2-49')
    })

    it('lists a ref range through the compare endpoint, including the base commit', async () => {
      const { client: github, requests } = client(() => ({
        body: {
          status: 'ahead',
          ahead_by: 2,
          behind_by: 0,
          total_commits: 2,
          base_commit: apiCommit('base'),
          commits: [apiCommit('older'), apiCommit('newer')],
        },
      }))

      const commits = await github.listCommits(REPO, { sinceRef: 'base', untilRef: 'newer' })

      expect(requests[0]?.url.pathname).toBe('/repos/acme/widgets/compare/base...newer')
      expect(commits.map((c) => c.sha)).toEqual(['newer', 'older', 'base'])
    })

    it('leaves out the base commit when asked to', async () => {
      const { client: github } = client(() => ({
        body: {
          status: 'ahead',
          ahead_by: 2,
          behind_by: 0,
          total_commits: 2,
          base_commit: apiCommit('v1.0'),
          commits: [apiCommit('older'), apiCommit('newer')],
        },
      }))

      const commits = await github.listCommits(REPO, { sinceRef: 'v1.0', untilRef: 'v1.1', includeSince: false })

      expect(commits.map((c) => c.sha)).toEqual(['newer', 'older'])
    })

    it('returns nothing for an inverted range', async () => {
      const { client: github } = client(() => ({
        body: {
          status: 'behind',
          ahead_by: 0,
          behind_by: 3,
          total_commits: 0,
          base_commit: apiCommit('newer'),
          commits: [],
        },
      }))

      expect(await github.listCommits(REPO, { sinceRef: 'newer', untilRef: 'older' })).toEqual([])
    })
  })

  describe('getCommit and getDiff', () => {
    const detail = {
      ...apiCommit('abc1234def'),
      files: [{ filename: 'src/app.ts', status: 'modified', additions: 1, deletions: 0, patch: '+x' }],
    }

    it('attaches the formatted diff', async () => {
      const { client: github, requests } = client(() => ({ body: detail }))

      const commit = await github.getCommit(REPO, 'abc1234')

      expect(requests[0]?.url.pathname).toBe('/repos/acme/widgets/commits/abc1234')
      expect(commit.shortSha).toBe('abc1234')
      expect(commit.diff).toBe('File: src/app.ts\n+x')
    })

    it('returns the diff text alone', async () => {
      const { client: github } = client(() => ({ body: detail }))
      expect(await github.getDiff(REPO, 'abc1234def')).toBe('File: src/app.ts\n+x')
    })
  })

  it('lists the user repositories', async () => {
    const { client: github, requests } = client(() => ({
      body: [
        {
          full_name: 'acme/widgets',
          name: 'widgets',
          owner: { login: 'acme' },
          default_branch: 'main',
          private: true,
          description: null,
        },
      ],
    }))

    const repos = await github.listRepositories()

    expect(requests[0]?.url.pathname).toBe('/user/repos')
    expect(repos).toEqual([
      {
        fullName: 'acme/widgets',
        owner: 'acme',
        name: 'widgets',
        defaultBranch: 'main',
        private: true,
        description: null,
      },
    ])
  })

  it('lists releases', async () => {
    const { client: github } = client(() => ({
      body: [
        {
          tag_name: 'v2.0-production',
          name: 'v2.0',
          body: 'notes',
          published_at: '2024-03-01T00:00:00Z',
          html_url: 'https://github.com/acme/widgets/releases/tag/v2.0-production',
          draft: false,
          prerelease: false,
        },
      ],
    }))

    expect(await github.listReleases(REPO)).toEqual([
      {
        tagName: 'v2.0-production',
        name: 'v2.0',
        body: 'notes',
        publishedAt: '2024-03-01T00:00:00Z',
        url: 'https://github.com/acme/widgets/releases/tag/v2.0-production',
      },
    ])
  })

  describe('errors', () => {
    it('maps 401 to an authentication error', async () => {
      const { client: github } = client(() => ({ status: 401, body: { message: 'Bad credentials' } }))

      const attempt = github.listCommits(REPO)

      await expect(attempt).rejects.toBeInstanceOf(AuthenticationError)
      await expect(attempt).rejects.toThrow('GitHub API: Bad credentials')
    })

    it('maps 404 to not found', async () => {
      const { client: github } = client(() => ({ status: 404, body: { message: 'Not Found' } }))
      await expect(github.getDiff(REPO, 'nope')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('maps an exhausted quota to a rate limit error', async () => {
      const { client: github } = client(() => ({
        status: 403,
        body: { message: 'API rate limit exceeded for user' },
        headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' },
      }))

      const attempt = github.listCommits(REPO)

      await expect(attempt).rejects.toBeInstanceOf(RateLimitError)
      await expect(attempt).rejects.toMatchObject({ resetAt: 1700000000, statusCode: 403 })
    })

    it('maps a plain 403 to an authentication error', async () => {
      const { client: github } = client(() => ({ status: 403, body: { message: 'Resource not accessible' } }))
      await expect(github.listReleases(REPO)).rejects.toBeInstanceOf(AuthenticationError)
    })

    it('maps other failures to a repository error', async () => {
      const { client: github } = client(() => ({
        status: 500,
        statusText: 'Internal Server Error',
        body: '<html>oops</html>',
      }))

      const attempt = github.listCommits(REPO)

      await expect(attempt).rejects.toBeInstanceOf(RepositoryError)
      await expect(attempt).rejects.toThrow('GitHub API: 500 Internal Server Error')
    })

    it('wraps network failures', async () => {
      const github = new GitHubClient({
        token: 'test-token',
        fetch: async () => {
          throw new TypeError('fetch failed')
        },
      })

      await expect(github.listCommits(REPO)).rejects.toThrow('Failed to reach GitHub: fetch failed')
    })

    it('does not retry', async () => {
      const { client: github, requests } = client(() => ({ status: 502, body: { message: 'Bad Gateway' } }))
      await expect(github.listCommits(REPO)).rejects.toBeInstanceOf(RepositoryError)
      expect(requests).toHaveLength(1)
    })
  })
})
