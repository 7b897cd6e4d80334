import type { Request as ExpressRequest, Response as ExpressResponse } from 'express'
import { z } from 'zod'

import type { ServerDeps } from '../types.ts'
import { resolveRepository } from '../../config/config.ts'
import type { RepositoryConfig } from '../../config/types.ts'
import type { Commit } from '../../github/types.ts'
import { runSummaries, SUMMARY_MODES, type Summary, type SummaryMode } from '../../core/summaries.ts'
import {
  listKeywordReleases,
  listReleaseCommits,
  releaseReference,
  resolveReleaseRange,
  type ReleaseSelection,
} from '../../core/releases.ts'
import type { ErrorPayload } from '../../core/errors.ts'
import { sendError, sendRouteError, sendValidationError, type ErrorResponse } from '../http.ts'
import { debugLog } from '../../debug/logger.ts'

export const summaryRequestSchema = z
  .object({
    repository: z.string().min(1, 'repository is required'),
    commit: z.string().min(1).optional(),
    start: z.string().min(1).optional(),
    end: z.string().min(1).optional(),
    release: z.string().min(1).optional(),
    newer: z.string().min(1).optional(),
    older: z.string().min(1).optional(),
    /** Release filter; defaults to the configured releaseKeyword */
    keyword: z.string().min(1).optional(),
    mode: z.enum(SUMMARY_MODES).default('each'),
  })
  .refine(
    (body) => {
      const forms = [
        body.commit !== undefined,
        body.start !== undefined || body.end !== undefined,
        body.release !== undefined,
        body.newer !== undefined || body.older !== undefined,
      ].filter(Boolean).length
      return (
        forms === 1 &&
        (body.start === undefined) === (body.end === undefined) &&
        (body.newer === undefined) === (body.older === undefined)
      )
    },
    { message: 'Provide one of "commit", "start" and "end", "release", or "newer" and "older"' },
  )

export type SummaryRequest = z.infer<typeof summaryRequestSchema>

export type SummaryResponse = {
  repository: string
  summaries: Summary[]
}

type SummaryPlan =
  | { success: true; commits: Commit[]; mode: SummaryMode; reference?: string }
  | { success: false; error: ErrorPayload }

function releaseSelection(body: SummaryRequest): ReleaseSelection | null {
  if (body.release !== undefined) {
    return { kind: 'since_previous', release: body.release }
  }
  if (body.newer !== undefined && body.older !== undefined) {
    return { kind: 'between', newer: body.newer, older: body.older }
  }
  return null
}

async function planSummaries(
  deps: ServerDeps,
  repository: RepositoryConfig,
  body: SummaryRequest,
): Promise<SummaryPlan> {
  const { context, repositoryClient } = deps

  const selection = releaseSelection(body)
  if (selection) {
    const keyword = body.keyword ?? context.config.releaseKeyword
    const releases = await listKeywordReleases(repositoryClient, repository, keyword)
    const resolved = resolveReleaseRange(releases, selection, keyword)
    if (!resolved.success) return resolved
    return {
      success: true,
      commits: await listReleaseCommits(repositoryClient, repository, resolved.range),
      mode: 'changelog',
      reference: releaseReference(resolved.range),
    }
  }

  if (body.commit !== undefined) {
    return { success: true, commits: [await repositoryClient.getCommit(repository, body.commit)], mode: 'each' }
  }

  return {
    success: true,
    commits: await repositoryClient.listCommits(repository, { sinceRef: body.start, untilRef: body.end }),
    mode: body.mode,
  }
}

/**
 * POST /api/summaries
 *
 * - One commit: `{ repository, commit }`
 * - A range: `{ repository, start, end, mode? }` where `start` is the oldest
 *   commit (inclusive). An inverted range returns an empty list.
 * - Changes since the previous release: `{ repository, release, keyword? }`
 * - Changes between releases: `{ repository, newer, older, keyword? }`
 *
 * Release forms always produce per-commit summaries and a changelog.
 */
export function createSummariesHandler(deps: ServerDeps) {
  const { context, repositoryClient, summarizer } = deps

  return async function summariesHandler(
    req: ExpressRequest,
    res: ExpressResponse<SummaryResponse | ErrorResponse>,
  ): Promise<void> {
    const parsed = summaryRequestSchema.safeParse(req.body)
    if (!parsed.success) {
      sendValidationError(res, parsed.error)
      return
    }

    const body = parsed.data
    try {
      const repository = resolveRepository(context.config, body.repository)

      const plan = await planSummaries(deps, repository, body)
      if (!plan.success) {
        sendError(res, plan.error)
        return
      }

      const summaries = await runSummaries({ repositoryClient, summarizer }, repository, plan.commits, {
        mode: plan.mode,
        reference: plan.reference,
      })

      debugLog.info('HTTP: summaries produced', {
        repository: body.repository,
        commits: plan.commits.length,
        summaries: summaries.length,
      })

      res.json({ repository: body.repository, summaries })
    } catch (err) {
      sendRouteError(res, err)
    }
  }
}
