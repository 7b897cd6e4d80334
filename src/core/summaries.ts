// Summarize commits: fetch diffs one at a time, then call the model.
// Shared by the session controller and the HTTP facade.

import type { Commit, RepositoryClient, RepositoryTarget } from '../github/types.ts'
import type { SummarizationClient } from '../ai/summarizer.ts'
import {
  CHANGELOG_TEMPLATE,
  COMMIT_TEMPLATE,
  RANGE_TEMPLATE,
  commitValues,
  rangeValues,
  rangeReference,
} from '../ai/prompts/index.ts'
import type { SummaryMode } from './transcript/types.ts'
import { debugLog } from '../debug/logger.ts'

export type { SummaryMode }

export const SUMMARY_MODES = ['each', 'combined', 'changelog'] as const satisfies readonly SummaryMode[]

export type Summary = {
  reference: string
  shas: string[]
  text: string
  mode: SummaryMode
}

export type SummaryDeps = {
  repositoryClient: RepositoryClient
  summarizer: SummarizationClient
}

export type RunSummariesOptions = {
  mode: SummaryMode
  /** Label of the combined or changelog entry; defaults to `oldest..newest` */
  reference?: string
  /**
   * Called after each summary, before the next network call. A failure
   * later in the range leaves earlier callbacks already delivered.
   */
  onSummary?: (summary: Summary) => Promise<void> | void
  onProgress?: (done: number, total: number) => void
}

async function withDiff(deps: SummaryDeps, repository: RepositoryTarget, commit: Commit): Promise<Commit> {
  if (commit.diff !== undefined) return commit
  const diff = await deps.repositoryClient.getDiff(repository, commit.sha)
  return { ...commit, diff }
}

/**
 * Summarize `commits` (listing order) with the given mode.
 *
 * - `each`: one summary per commit
 * - `combined`: one summary of the concatenated diffs
 * - `changelog`: one summary per commit, then a consolidated changelog
 *
 * An empty list makes no calls and returns [].
 */
export async function runSummaries(
  deps: SummaryDeps,
  repository: RepositoryTarget,
  commits: Commit[],
  options: RunSummariesOptions,
): Promise<Summary[]> {
  const { mode, onSummary, onProgress } = options
  const reference = options.reference ?? rangeReference(commits)
  const summaries: Summary[] = []

  if (commits.length === 0) {
    debugLog.info('Summaries: empty range, nothing to do', { repository: repository.name, mode })
    return summaries
  }

  const emit = async (summary: Summary) => {
    summaries.push(summary)
    await onSummary?.(summary)
  }

  debugLog.info('Summaries: starting', { repository: repository.name, mode, count: commits.length })

  if (mode === 'combined') {
    const withDiffs: Commit[] = []
    for (const commit of commits) {
      withDiffs.push(await withDiff(deps, repository, commit))
      onProgress?.(withDiffs.length, commits.length)
    }
    const values = rangeValues(withDiffs)
    const text = await deps.summarizer.summarize(values.diff ?? '', RANGE_TEMPLATE, values)
    await emit({
      reference,
      shas: commits.map((c) => c.sha),
      text,
      mode,
    })
    return summaries
  }

  let done = 0
  for (const commit of commits) {
    const full = await withDiff(deps, repository, commit)
    const values = commitValues(full)
    const text = await deps.summarizer.summarize(full.diff ?? '', COMMIT_TEMPLATE, values)
    await emit({ reference: commit.shortSha, shas: [commit.sha], text, mode: 'each' })
    done++
    onProgress?.(done, commits.length)
  }

  if (mode === 'changelog') {
    const collected = summaries.map((s) => `### ${s.reference}\n${s.text}`).join('\n\n')
    const text = await deps.summarizer.summarize(collected, CHANGELOG_TEMPLATE, { reference })
    await emit({ reference, shas: commits.map((c) => c.sha), text, mode })
  }

  debugLog.info('Summaries: finished', { repository: repository.name, mode, count: summaries.length })
  return summaries
}
