// Session controller types
// These types define the interactive review state machine

import type { DigestConfig, RepositoryConfig } from '../../config/types.ts'
import type { Commit, Release, RepositoryClient } from '../../github/types.ts'
import type { SummarizationClient } from '../../ai/summarizer.ts'
import type { Summary, SummaryMode } from '../summaries.ts'
import type { ReleaseSelection } from '../releases.ts'
import type { Transcript, TranscriptSink } from '../transcript/types.ts'
import type { ErrorPayload } from '../errors.ts'

// ============================================================================
// Session Steps (State Machine)
// ============================================================================

export type SessionStep =
  | 'selecting_repository' // Waiting for a configured repository name
  | 'selecting_range' // Commits loaded, waiting for a range and mode
  | 'selecting_release' // Keyword releases loaded, waiting for a release pair
  | 'summarizing' // Fetching diffs and calling the model
  | 'idle' // Range done, waiting for the next action
  | 'exited' // Transcript closed, session over

// ============================================================================
// Session State
// ============================================================================

export type SessionProgress = {
  done: number
  total: number
}

export type SessionState = {
  step: SessionStep
  repositoryName?: string
  repository?: RepositoryConfig
  /** Most recent commits of the selected repository, newest first */
  commits: Commit[]
  /** Releases mentioning the configured keyword, newest first (selecting_release) */
  releases?: Release[]
  transcript: Transcript | null
  progress?: SessionProgress
  /** Set when the last step failed; cleared on the next action */
  lastError?: ErrorPayload
  /** Informational message for the user (e.g. empty range) */
  notice?: string
}

// ============================================================================
// Session Events (for real-time updates)
// ============================================================================

export type SessionEvent =
  | { type: 'step_changed'; step: SessionStep; previousStep: SessionStep }
  | { type: 'commits_loaded'; repository: string; count: number }
  | { type: 'summary_added'; summary: Summary }
  | { type: 'progress'; progress: SessionProgress }
  | { type: 'error'; error: ErrorPayload }

export type SessionEventCallback = (event: SessionEvent) => void

// ============================================================================
// Controller
// ============================================================================

export type SessionControllerDeps = {
  config: DigestConfig
  repositoryClient: RepositoryClient
  summarizer: SummarizationClient
  sink: TranscriptSink
  /** Recorded in transcript metadata */
  user: string
}

export interface SessionController {
  getState(): SessionState
  subscribe(callback: SessionEventCallback): () => void

  /** Configured repository names, sorted */
  repositoryNames(): string[]

  selectRepository(name: string): Promise<SessionState>
  summarize(rangeInput: string, mode: SummaryMode): Promise<SessionState>

  /** selecting_range → selecting_release, listing the keyword releases */
  browseReleases(): Promise<SessionState>
  /** Changelog of the commits between two releases */
  summarizeReleases(selection: ReleaseSelection): Promise<SessionState>
  /** selecting_release → selecting_range */
  leaveReleases(): SessionState

  /** idle → selecting_range */
  continue(): SessionState
  /** Back to repository selection (closes the current transcript) */
  changeRepository(): Promise<SessionState>
  exit(): Promise<SessionState>
}
