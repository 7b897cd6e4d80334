export type { SummaryMode, Transcript, TranscriptEntry, TranscriptSink } from './types.ts'
export { createTranscript, createEntry, appendEntry, closeTranscript, generateTranscriptId } from './transcript.ts'
export { formatTranscript, formatTranscriptEntry, formatTranscriptHeader, formatTranscriptFooter } from './format.ts'
export { FileTranscriptSink, transcriptFileName } from './file-sink.ts'
