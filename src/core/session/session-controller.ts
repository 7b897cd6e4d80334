// Session controller - drives the interactive review loop
// SelectingRepository → SelectingRange (or SelectingRelease) → Summarizing → Idle,
// looping back to SelectingRange until the user exits. Client errors abort the current step
// and return to SelectingRange; they never end the session.

import type {
  SessionController,
  SessionControllerDeps,
  SessionEvent,
  SessionEventCallback,
  SessionState,
  SessionStep,
} from './types.ts'
import { getValidNextSteps, isTerminalState, isValidTransition } from './session-transitions.ts'
import { parseRangeInput, selectByPositions, findListedCommit, couldBeSha } from './range.ts'
import { resolveRepository, listRepositoryNames } from '../../config/config.ts'
import type { RepositoryConfig } from '../../config/types.ts'
import type { Commit, Release } from '../../github/types.ts'
import { runSummaries, type Summary, type SummaryMode } from '../summaries.ts'
import {
  listKeywordReleases,
  listReleaseCommits,
  releaseReference,
  resolveReleaseRange,
  type ReleaseSelection,
} from '../releases.ts'
import {
  appendEntry,
  closeTranscript,
  createEntry,
  createTranscript,
} from '../transcript/transcript.ts'
import { isDigestError, toErrorPayload, type ErrorPayload } from '../errors.ts'
import { debugLog } from '../../debug/logger.ts'

export const EMPTY_RANGE_NOTICE = 'Empty or inverted range: nothing to summarize'

type SelectionResult =
  | { success: true; commits: Commit[] }
  | { success: false; error: ErrorPayload }

export function createSessionController(deps: SessionControllerDeps): SessionController {
  const { config, repositoryClient, summarizer, sink, user } = deps

  let state: SessionState = {
    step: 'selecting_repository',
    commits: [],
    transcript: null,
  }
  const subscribers = new Set<SessionEventCallback>()

  // ============================================================================
  // State helpers
  // ============================================================================

  function emit(event: SessionEvent): void {
    for (const callback of subscribers) {
      callback(event)
    }
  }

  function update(updates: Partial<SessionState>): SessionState {
    state = { ...state, ...updates }
    return state
  }

  function transition(to: SessionStep, updates: Partial<SessionState> = {}): SessionState {
    const from = state.step
    if (from !== to && !isValidTransition(from, to)) {
      const allowed = getValidNextSteps(from).join(', ') || 'nothing'
      throw new Error(`Invalid session transition: ${from} → ${to} (allowed: ${allowed})`)
    }
    update({ ...updates, step: to })
    if (from !== to) {
      debugLog.debug('Session: step changed', { from, to })
      emit({ type: 'step_changed', step: to, previousStep: from })
    }
    return state
  }

  function fail(err: unknown, to: SessionStep): SessionState {
    const error = toErrorPayload(err)
    debugLog.error('Session: step failed', { step: state.step, ...error })
    emit({ type: 'error', error })
    return transition(to, { lastError: error, progress: undefined })
  }

  function requireStep(...steps: SessionStep[]): void {
    if (!steps.includes(state.step)) {
      throw new Error(`Operation not allowed while ${state.step}`)
    }
  }

  async function finishTranscript(): Promise<void> {
    const transcript = state.transcript
    if (!transcript) return
    const closed = closeTranscript(transcript)
    update({ transcript: null })
    await sink.close(closed)
  }

  // ============================================================================
  // Repository selection
  // ============================================================================

  async function selectRepository(name: string): Promise<SessionState> {
    requireStep('selecting_repository')
    update({ lastError: undefined, notice: undefined })

    let repository: RepositoryConfig
    let commits: Commit[]
    try {
      repository = resolveRepository(config, name)
      commits = await repositoryClient.listCommits(repository, { limit: config.commitLimit })
    } catch (err) {
      return fail(err, 'selecting_repository')
    }

    const repositoryName = name.trim()
    const transcript = createTranscript(repositoryName, user)
    try {
      await sink.open(transcript)
    } catch (err) {
      return fail(err, 'selecting_repository')
    }

    emit({ type: 'commits_loaded', repository: repositoryName, count: commits.length })
    debugLog.info('Session: repository selected', { repository: repositoryName, commits: commits.length })

    return transition('selecting_range', {
      repositoryName,
      repository,
      commits,
      transcript,
    })
  }

  // ============================================================================
  // Range resolution
  // ============================================================================

  async function resolveRef(repository: RepositoryConfig, ref: string): Promise<Commit[]> {
    const listed = findListedCommit(state.commits, ref)
    if (listed) return [listed]
    return repositoryClient.listCommits(repository, { untilRef: ref, limit: 1 })
  }

  async function resolveSelection(repository: RepositoryConfig, input: string): Promise<SelectionResult> {
    const parsed = parseRangeInput(input)
    if (!parsed.success) {
      return { success: false, error: { kind: 'validation', message: parsed.error } }
    }

    const { selection } = parsed
    switch (selection.kind) {
      case 'positions': {
        const result = selectByPositions(state.commits, selection.start, selection.end)
        if (result.success) return result

        // An all-digit sha reads as a position; past the list, try it as a ref
        const text = input.trim()
        if (!couldBeSha(text)) {
          return { success: false, error: { kind: 'validation', message: result.error } }
        }
        try {
          return { success: true, commits: await resolveRef(repository, text) }
        } catch (err) {
          if (!isDigestError(err) || err.kind !== 'not_found') throw err
          return {
            success: false,
            error: { kind: 'validation', message: `${result.error}, and no commit matches "${text}"` },
          }
        }
      }
      case 'refs': {
        const commits = await repositoryClient.listCommits(repository, {
          sinceRef: selection.sinceRef,
          untilRef: selection.untilRef,
        })
        return { success: true, commits }
      }
      case 'ref':
        return { success: true, commits: await resolveRef(repository, selection.ref) }
    }
  }

  // ============================================================================
  // Summarizing
  // ============================================================================

  async function recordSummary(summary: Summary): Promise<void> {
    const transcript = state.transcript
    if (!transcript) {
      throw new Error('No transcript open for this session')
    }
    const entry = createEntry(summary.reference, summary.shas, summary.text, summary.mode)
    const next = appendEntry(transcript, entry)
    update({ transcript: next })
    await sink.append(next, entry)
    emit({ type: 'summary_added', summary })
  }

  /**
   * summarizing → idle, or back to selecting_range on the first failure.
   */
  async function runRange(
    repository: RepositoryConfig,
    commits: Commit[],
    mode: SummaryMode,
    reference?: string,
  ): Promise<SessionState> {
    const total = commits.length
    transition('summarizing', { progress: { done: 0, total }, releases: undefined })

    try {
      await runSummaries({ repositoryClient, summarizer }, repository, commits, {
        mode,
        reference,
        onSummary: recordSummary,
        onProgress: (done, count) => {
          update({ progress: { done, total: count } })
          emit({ type: 'progress', progress: { done, total: count } })
        },
      })
    } catch (err) {
      return fail(err, 'selecting_range')
    }

    return transition('idle', { progress: undefined })
  }

  function requireRepository(): RepositoryConfig {
    const repository = state.repository
    if (!repository) {
      throw new Error('No repository selected')
    }
    return repository
  }

  async function summarize(rangeInput: string, mode: SummaryMode): Promise<SessionState> {
    requireStep('selecting_range')
    update({ lastError: undefined, notice: undefined })
    const repository = requireRepository()

    let selection: SelectionResult
    try {
      selection = await resolveSelection(repository, rangeInput)
    } catch (err) {
      return fail(err, 'selecting_range')
    }

    if (!selection.success) {
      emit({ type: 'error', error: selection.error })
      return update({ lastError: selection.error })
    }

    if (selection.commits.length === 0) {
      debugLog.info('Session: empty range', { input: rangeInput })
      return update({ notice: EMPTY_RANGE_NOTICE })
    }

    return runRange(repository, selection.commits, mode)
  }

  // ============================================================================
  // Releases
  // ============================================================================

  async function browseReleases(): Promise<SessionState> {
    requireStep('selecting_range')
    update({ lastError: undefined, notice: undefined })
    const repository = requireRepository()

    let releases: Release[]
    try {
      releases = await listKeywordReleases(repositoryClient, repository, config.releaseKeyword)
    } catch (err) {
      return fail(err, 'selecting_range')
    }

    if (releases.length === 0) {
      return update({ notice: `No releases mention "${config.releaseKeyword}"` })
    }
    return transition('selecting_release', { releases })
  }

  async function summarizeReleases(selection: ReleaseSelection): Promise<SessionState> {
    requireStep('selecting_release')
    update({ lastError: undefined, notice: undefined })
    const repository = requireRepository()

    const resolved = resolveReleaseRange(state.releases ?? [], selection, config.releaseKeyword)
    if (!resolved.success) {
      emit({ type: 'error', error: resolved.error })
      return update({ lastError: resolved.error })
    }

    const reference = releaseReference(resolved.range)
    let commits: Commit[]
    try {
      commits = await listReleaseCommits(repositoryClient, repository, resolved.range)
    } catch (err) {
      return fail(err, 'selecting_range')
    }

    if (commits.length === 0) {
      debugLog.info('Session: no commits between releases', { reference })
      return transition('selecting_range', { releases: undefined, notice: EMPTY_RANGE_NOTICE })
    }

    debugLog.info('Session: release changelog', { reference, commits: commits.length })
    return runRange(repository, commits, 'changelog', reference)
  }

  function leaveReleases(): SessionState {
    requireStep('selecting_release')
    return transition('selecting_range', { releases: undefined, lastError: undefined, notice: undefined })
  }

  // ============================================================================
  // Navigation
  // ============================================================================

  function continueSession(): SessionState {
    requireStep('idle')
    return transition('selecting_range', { lastError: undefined, notice: undefined })
  }

  async function changeRepository(): Promise<SessionState> {
    requireStep('selecting_range', 'idle')
    await finishTranscript()
    return transition('selecting_repository', {
      repositoryName: undefined,
      repository: undefined,
      commits: [],
      lastError: undefined,
      notice: undefined,
    })
  }

  async function exit(): Promise<SessionState> {
    if (isTerminalState(state.step)) return state
    requireStep('selecting_repository', 'selecting_range', 'selecting_release', 'idle')
    await finishTranscript()
    debugLog.info('Session: exited')
    return transition('exited')
  }

  return {
    getState: () => state,
    subscribe(callback) {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    repositoryNames: () => listRepositoryNames(config),
    selectRepository,
    summarize,
    browseReleases,
    summarizeReleases,
    leaveReleases,
    continue: continueSession,
    changeRepository,
    exit,
  }
}
