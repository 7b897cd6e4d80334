import type { Request as ExpressRequest, Response as ExpressResponse } from 'express'
import { z } from 'zod'

import type { ServerDeps } from '../types.ts'
import { listRepositoryNames, resolveRepository } from '../../config/config.ts'
import { filterReleasesByKeyword } from '../../github/client.ts'
import type { Commit, Release } from '../../github/types.ts'
import { sendRouteError, sendValidationError, type ErrorResponse } from '../http.ts'

type RepositoryListing = {
  repositories: Array<{ name: string; owner: string; repo: string; defaultBranch: string }>
  invalid: Array<{ name: string; reason: string }>
}

const commitsQuerySchema = z.object({
  since: z.string().min(1).optional(),
  until: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
})

const releasesQuerySchema = z.object({
  keyword: z.string().min(1).optional(),
  all: z.enum(['true', 'false', '1', '0']).optional(),
})

/**
 * GET /api/repositories
 */
export function createRepositoriesHandler({ context }: ServerDeps) {
  return function repositoriesHandler(
    _req: ExpressRequest,
    res: ExpressResponse<RepositoryListing>,
  ): void {
    const { config } = context
    res.json({
      repositories: listRepositoryNames(config).map((name) => {
        const entry = resolveRepository(config, name)
        return { name, owner: entry.owner, repo: entry.name, defaultBranch: entry.defaultBranch }
      }),
      invalid: Object.entries(config.invalidRepositories).map(([name, reason]) => ({ name, reason })),
    })
  }
}

/**
 * GET /api/repositories/:name/commits?since&until&limit
 */
export function createCommitsHandler({ context, repositoryClient }: ServerDeps) {
  return async function commitsHandler(
    req: ExpressRequest<{ name: string }>,
    res: ExpressResponse<{ commits: Commit[] } | ErrorResponse>,
  ): Promise<void> {
    const query = commitsQuerySchema.safeParse(req.query)
    if (!query.success) {
      sendValidationError(res, query.error)
      return
    }

    try {
      const repository = resolveRepository(context.config, req.params.name)
      const commits = await repositoryClient.listCommits(repository, {
        sinceRef: query.data.since,
        untilRef: query.data.until,
        limit: query.data.limit ?? context.config.commitLimit,
      })
      res.json({ commits })
    } catch (err) {
      sendRouteError(res, err)
    }
  }
}

/**
 * GET /api/repositories/:name/releases?keyword&all
 *
 * Filtered by the configured release keyword unless `all` is set.
 */
export function createReleasesHandler({ context, repositoryClient }: ServerDeps) {
  return async function releasesHandler(
    req: ExpressRequest<{ name: string }>,
    res: ExpressResponse<{ releases: Release[] } | ErrorResponse>,
  ): Promise<void> {
    const query = releasesQuerySchema.safeParse(req.query)
    if (!query.success) {
      sendValidationError(res, query.error)
      return
    }

    try {
      const repository = resolveRepository(context.config, req.params.name)
      const releases = await repositoryClient.listReleases(repository)
      const unfiltered = query.data.all === 'true' || query.data.all === '1'
      const keyword = query.data.keyword ?? context.config.releaseKeyword
      res.json({ releases: unfiltered ? releases : filterReleasesByKeyword(releases, keyword) })
    } catch (err) {
      sendRouteError(res, err)
    }
  }
}
