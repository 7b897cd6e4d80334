// Markdown rendering for transcript files. Human-readable only; nothing
// parses these files back.

import type { Transcript, TranscriptEntry } from './types.ts'

const MODE_LABELS: Record<TranscriptEntry['mode'], string> = {
  each: 'commit',
  combined: 'range',
  changelog: 'changelog',
}

export function formatTranscriptHeader(transcript: Transcript): string {
  return [
    `# Review transcript: ${transcript.repository}`,
    '',
    `- Session: ${transcript.id}`,
    `- User: ${transcript.user}`,
    `- Started: ${transcript.startedAt}`,
    '',
  ].join('\n')
}

export function formatTranscriptEntry(entry: TranscriptEntry, index: number): string {
  const commits = entry.shas.length === 1 ? '1 commit' : `${entry.shas.length} commits`
  return [
    `## ${index}. ${entry.reference} (${MODE_LABELS[entry.mode]})`,
    '',
    `_${entry.createdAt} · ${commits}_`,
    '',
    entry.summary.trim(),
    '',
  ].join('\n')
}

export function formatTranscriptFooter(transcript: Transcript): string {
  const count = transcript.entries.length
  return [
    '---',
    '',
    `Ended: ${transcript.endedAt ?? new Date().toISOString()} · ${count} ${count === 1 ? 'entry' : 'entries'}`,
    '',
  ].join('\n')
}

/**
 * Whole transcript as one document.
 */
export function formatTranscript(transcript: Transcript): string {
  const body = transcript.entries.map((entry, i) => formatTranscriptEntry(entry, i + 1))
  const parts = [formatTranscriptHeader(transcript), ...body]
  if (transcript.endedAt) {
    parts.push(formatTranscriptFooter(transcript))
  }
  return parts.join('\n')
}
