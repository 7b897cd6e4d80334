// Transcript types: the ordered log of summaries produced in one session

export type SummaryMode = 'each' | 'combined' | 'changelog'

export type TranscriptEntry = {
  /** What the summary covers: a short sha, or `oldest..newest` */
  reference: string
  /** Full shas covered, in listing order */
  shas: string[]
  summary: string
  mode: SummaryMode
  createdAt: string
}

export type Transcript = {
  id: string
  repository: string
  user: string
  startedAt: string
  endedAt?: string
  entries: TranscriptEntry[]
}

/**
 * Where transcripts are flushed. `append` runs after every entry so a
 * failure later in a range keeps what was already produced; the
 * transcript passed to it already contains `entry`.
 */
export interface TranscriptSink {
  open(transcript: Transcript): Promise<void>
  append(transcript: Transcript, entry: TranscriptEntry): Promise<void>
  close(transcript: Transcript): Promise<void>
}
