// Appends transcripts to Markdown files, one file per session

import { appendFile, mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import type { Transcript, TranscriptEntry, TranscriptSink } from './types.ts'
import { formatTranscriptEntry, formatTranscriptFooter, formatTranscriptHeader } from './format.ts'
import { sanitizeFilename } from '../../config/paths.ts'
import { debugLog, formatFileTimestamp } from '../../debug/logger.ts'

/**
 * `<repository>_<start time>_<id suffix>.md`. The id suffix keeps two sessions
 * started within the same second apart.
 */
export function transcriptFileName(transcript: Transcript): string {
  const startedAt = new Date(transcript.startedAt)
  const suffix = sanitizeFilename(transcript.id.split('_').at(-1) ?? transcript.id)
  return `${sanitizeFilename(transcript.repository)}_${formatFileTimestamp(startedAt)}_${suffix}.md`
}

export class FileTranscriptSink implements TranscriptSink {
  private readonly paths = new Map<string, string>()

  constructor(private readonly directory: string) {}

  /** Path of the file backing a transcript, once opened */
  pathFor(transcript: Transcript): string | undefined {
    return this.paths.get(transcript.id)
  }

  async open(transcript: Transcript): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const filePath = join(this.directory, transcriptFileName(transcript))
    // wx: never replace an existing transcript
    await writeFile(filePath, formatTranscriptHeader(transcript) + '\n', { encoding: 'utf-8', flag: 'wx' })
    this.paths.set(transcript.id, filePath)
    debugLog.info('Transcript opened', { filePath })
  }

  async append(transcript: Transcript, entry: TranscriptEntry): Promise<void> {
    const filePath = this.requirePath(transcript)
    await appendFile(filePath, formatTranscriptEntry(entry, transcript.entries.length) + '\n', 'utf-8')
  }

  async close(transcript: Transcript): Promise<void> {
    const filePath = this.requirePath(transcript)
    await appendFile(filePath, formatTranscriptFooter(transcript), 'utf-8')
    this.paths.delete(transcript.id)
    debugLog.info('Transcript closed', { filePath, entries: transcript.entries.length })
  }

  private requirePath(transcript: Transcript): string {
    const filePath = this.paths.get(transcript.id)
    if (!filePath) {
      throw new Error(`Transcript ${transcript.id} was not opened`)
    }
    return filePath
  }
}
