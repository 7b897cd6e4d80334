// Pure transcript operations

import type { SummaryMode, Transcript, TranscriptEntry } from './types.ts'

export function generateTranscriptId(): string {
  const timestamp = Date.now().toString(36)
  const random = Math.random().toString(36).substring(2, 8)
  return `tr_${timestamp}_${random}`
}

export function createTranscript(repository: string, user: string, now = new Date()): Transcript {
  return {
    id: generateTranscriptId(),
    repository,
    user,
    startedAt: now.toISOString(),
    entries: [],
  }
}

export function createEntry(
  reference: string,
  shas: string[],
  summary: string,
  mode: SummaryMode,
  now = new Date(),
): TranscriptEntry {
  return { reference, shas, summary, mode, createdAt: now.toISOString() }
}

/**
 * Return a new transcript with the entry appended.
 */
export function appendEntry(transcript: Transcript, entry: TranscriptEntry): Transcript {
  return { ...transcript, entries: [...transcript.entries, entry] }
}

export function closeTranscript(transcript: Transcript, now = new Date()): Transcript {
  return { ...transcript, endedAt: now.toISOString() }
}
