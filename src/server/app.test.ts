import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Server } from 'http'
import { startServer } from './index.ts'
import type { ServerDeps } from './types.ts'
import { FakeRepositoryClient, StubSummarizer, makeCommit, makeConfig, makeRelease } from '../testing/fakes.ts'
import { InputTooLargeError } from '../core/errors.ts'
import type { AppContext } from '../config/types.ts'

type CommitsBody = { commits: Array<{ sha: string }> }
type ReleasesBody = { releases: Array<{ tagName: string }> }
type SummariesBody = { repository: string; summaries: Array<{ reference: string; mode: string }> }
type ErrorBody = { error: { kind: string; message: string } }

async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T
}

function makeContext(): AppContext {
  return {
    config: makeConfig({
      repositories: { widgets: { owner: 'acme', name: 'widgets', defaultBranch: 'main' } },
      invalidRepositories: { broken: 'name: Required' },
    }),
    credentials: { githubToken: 'test-token', modelApiKey: 'test-secret' },
    configPath: '/tmp/commit-digest.yaml',
  }
}

describe('HTTP facade', () => {
  let server: Server
  let baseUrl: string
  let repositoryClient: FakeRepositoryClient
  let summarizer: StubSummarizer

  beforeEach(async () => {
    repositoryClient = new FakeRepositoryClient([makeCommit('c1'), makeCommit('c2')])
    summarizer = new StubSummarizer()
    const deps: ServerDeps = { context: makeContext(), repositoryClient, summarizer }
    server = await startServer(deps, 0)
    const address = server.address()
    const port = typeof address === 'object' && address ? address.port : 0
    baseUrl = `http://127.0.0.1:${port}`
  })

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  })

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body })

  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/healthz`)
    expect(res.status).toBe(200)
    expect(await res.text()).toBe('ok')
  })

  it('lists configured repositories', async () => {
    const res = await fetch(`${baseUrl}/api/repositories`)
    expect(await res.json()).toEqual({
      repositories: [{ name: 'widgets', owner: 'acme', repo: 'widgets', defaultBranch: 'main' }],
      invalid: [{ name: 'broken', reason: 'name: Required' }],
    })
  })

  describe('commits', () => {
    it('lists recent commits with the configured limit', async () => {
      const res = await fetch(`${baseUrl}/api/repositories/widgets/commits`)
      const body = await readJson<CommitsBody>(res)

      expect(res.status).toBe(200)
      expect(body.commits.map((c) => c.sha)).toEqual(['c1', 'c2'])
      expect(repositoryClient.listCalls).toEqual([{ limit: 20 }])
    })

    it('passes a ref range through', async () => {
      repositoryClient.rangeCommits = [makeCommit('c1')]
      await fetch(`${baseUrl}/api/repositories/widgets/commits?since=c2&until=c1&limit=5`)
      expect(repositoryClient.listCalls).toEqual([{ sinceRef: 'c2', untilRef: 'c1', limit: 5 }])
    })

    it('rejects a bad limit', async () => {
      const res = await fetch(`${baseUrl}/api/repositories/widgets/commits?limit=0`)
      expect(res.status).toBe(400)
      expect((await readJson<ErrorBody>(res)).error.kind).toBe('validation')
    })

    it('reports a misconfigured repository', async () => {
      const res = await fetch(`${baseUrl}/api/repositories/broken/commits`)
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: { kind: 'configuration', message: 'Repository "broken" is misconfigured: name: Required' },
      })
    })
  })

  describe('releases', () => {
    beforeEach(() => {
      repositoryClient.releases = [
        { tagName: 'v2-production', name: null, body: null, publishedAt: null, url: 'u2' },
        { tagName: 'v2-rc1', name: null, body: null, publishedAt: null, url: 'u1' },
      ]
    })

    it('filters by the configured keyword', async () => {
      const res = await fetch(`${baseUrl}/api/repositories/widgets/releases`)
      const body = await readJson<ReleasesBody>(res)
      expect(body.releases.map((r) => r.tagName)).toEqual(['v2-production'])
    })

    it('accepts another keyword or none', async () => {
      const rc = await readJson<ReleasesBody>(await fetch(`${baseUrl}/api/repositories/widgets/releases?keyword=rc`))
      const all = await readJson<ReleasesBody>(await fetch(`${baseUrl}/api/repositories/widgets/releases?all=true`))
      expect(rc.releases.map((r) => r.tagName)).toEqual(['v2-rc1'])
      expect(all.releases).toHaveLength(2)
    })
  })

  describe('POST /api/summaries', () => {
    it('summarizes one commit', async () => {
      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', commit: 'c1' }))

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        repository: 'widgets',
        summaries: [{ reference: 'c1', shas: ['c1'], text: 'summary of diff-c1', mode: 'each' }],
      })
    })

    it('summarizes a range as one unit', async () => {
      repositoryClient.rangeCommits = [makeCommit('c2'), makeCommit('c1')]

      const res = await post(
        '/api/summaries',
        JSON.stringify({ repository: 'widgets', start: 'c1', end: 'c2', mode: 'combined' }),
      )
      const body = await readJson<SummariesBody>(res)

      expect(repositoryClient.listCalls).toEqual([{ sinceRef: 'c1', untilRef: 'c2' }])
      expect(body.summaries.map((s) => [s.reference, s.mode])).toEqual([['c1..c2', 'combined']])
    })

    it('returns no summaries for an inverted range', async () => {
      repositoryClient.rangeCommits = []

      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', start: 'c1', end: 'c2' }))

      expect(await res.json()).toEqual({ repository: 'widgets', summaries: [] })
      expect(summarizer.calls).toHaveLength(0)
    })

    it('requires either a commit or a range', async () => {
      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', start: 'c1' }))

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: {
          kind: 'validation',
          message: 'Provide one of "commit", "start" and "end", "release", or "newer" and "older"',
        },
      })
    })

    it('refuses a commit and a release together', async () => {
      const res = await post(
        '/api/summaries',
        JSON.stringify({ repository: 'widgets', commit: 'c1', release: 'v3-production' }),
      )

      expect(res.status).toBe(400)
      expect(summarizer.calls).toHaveLength(0)
    })

    describe('release changelogs', () => {
      beforeEach(() => {
        repositoryClient.releases = [
          makeRelease('v3-production'),
          makeRelease('v2-rc2'),
          makeRelease('v2-rc1'),
          makeRelease('v2-production'),
          makeRelease('v1-production'),
        ]
        repositoryClient.rangeCommits = [makeCommit('c2'), makeCommit('c1')]
      })

      it('summarizes the changes since the previous release', async () => {
        const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', release: 'v3-production' }))
        const body = await readJson<SummariesBody>(res)

        expect(res.status).toBe(200)
        expect(repositoryClient.listCalls).toEqual([
          { sinceRef: 'v2-production', untilRef: 'v3-production', includeSince: false },
        ])
        expect(body.summaries.map((s) => [s.reference, s.mode])).toEqual([
          ['c2', 'each'],
          ['c1', 'each'],
          ['v2-production..v3-production', 'changelog'],
        ])
      })

      it('summarizes the changes between two releases of another keyword', async () => {
        const res = await post(
          '/api/summaries',
          JSON.stringify({ repository: 'widgets', newer: 'v2-rc2', older: 'v2-rc1', keyword: 'rc' }),
        )
        const body = await readJson<SummariesBody>(res)

        expect(body.summaries.at(-1)?.reference).toBe('v2-rc1..v2-rc2')
      })

      it('refuses the oldest release', async () => {
        const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', release: 'v1-production' }))

        expect(res.status).toBe(400)
        expect(await res.json()).toEqual({
          error: {
            kind: 'validation',
            message:
              '"v1-production" is the oldest "production" release; there is no previous release to compare with',
          },
        })
        expect(repositoryClient.listCalls).toEqual([])
      })

      it('refuses releases in the wrong order', async () => {
        const res = await post(
          '/api/summaries',
          JSON.stringify({ repository: 'widgets', newer: 'v1-production', older: 'v3-production' }),
        )

        expect(res.status).toBe(400)
        expect((await readJson<ErrorBody>(res)).error.message).toBe(
          '"v1-production" must be newer than "v3-production"',
        )
      })

      it('answers 404 for a release that does not mention the keyword', async () => {
        const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', release: 'v2-rc1' }))

        expect(res.status).toBe(404)
        expect((await readJson<ErrorBody>(res)).error.kind).toBe('not_found')
      })
    })

    it('rejects an unknown mode', async () => {
      const res = await post(
        '/api/summaries',
        JSON.stringify({ repository: 'widgets', start: 'c1', end: 'c2', mode: 'all' }),
      )
      expect(res.status).toBe(400)
    })

    it('rejects a body that is not JSON', async () => {
      const res = await post('/api/summaries', '{"repository":')

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: { kind: 'validation', message: 'Request body is not valid JSON' },
      })
    })

    it('maps a body over the size limit to 413', async () => {
      const res = await post(
        '/api/summaries',
        JSON.stringify({ repository: 'widgets', commit: 'c'.repeat(1_100_000) }),
      )

      expect(res.status).toBe(413)
      expect(await res.json()).toEqual({
        error: { kind: 'input_too_large', message: 'Request body is larger than 1mb' },
      })
      expect(repositoryClient.diffCalls).toEqual([])
    })

    it('rejects a repository name inherited from Object.prototype', async () => {
      const res = await post('/api/summaries', JSON.stringify({ repository: 'constructor', commit: 'c1' }))

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: { kind: 'configuration', message: 'Repository "constructor" is not configured' },
      })
    })

    it('maps a missing commit to 404', async () => {
      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', commit: 'ffff' }))

      expect(res.status).toBe(404)
      expect((await readJson<ErrorBody>(res)).error.kind).toBe('not_found')
    })

    it('maps an oversized prompt to 413', async () => {
      summarizer.failure = new InputTooLargeError('Prompt is 200000 characters; the limit is 120000')

      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', commit: 'c1' }))

      expect(res.status).toBe(413)
      expect(await res.json()).toEqual({
        error: { kind: 'input_too_large', message: 'Prompt is 200000 characters; the limit is 120000' },
      })
    })

    it('maps an unexpected failure to 500', async () => {
      summarizer.failure = new Error('boom')

      const res = await post('/api/summaries', JSON.stringify({ repository: 'widgets', commit: 'c1' }))

      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: { kind: 'unknown', message: 'boom' } })
    })
  })

  it('answers unknown routes with a JSON 404', async () => {
    const res = await fetch(`${baseUrl}/api/nothing`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: { kind: 'not_found', message: 'Route not found' } })
  })
})
