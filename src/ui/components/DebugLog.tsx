import React, { useState, useEffect } from 'react'
import { Box, Text, useInput } from 'ink'
import { debugLog, type LogEntry, type LogLevel } from '../../debug/logger.ts'

type DebugLogProps = {
  maxLines?: number
  /** Scroll keys are ignored while a text input has focus */
  isActive?: boolean
}

const LEVEL_STYLES: Record<LogLevel, { color: string; label: string }> = {
  debug: { color: 'gray', label: 'DBG' },
  info: { color: 'cyan', label: 'INF' },
  warn: { color: 'yellow', label: 'WRN' },
  error: { color: 'red', label: 'ERR' },
}

const MAX_DATA_LENGTH = 60

function formatClock(date: Date): string {
  return date.toTimeString().slice(0, 8)
}

function formatData(data: unknown): string {
  if (data === undefined) return ''
  let text: string
  try {
    text = typeof data === 'string' ? data : JSON.stringify(data)
  } catch {
    text = '[unserializable]'
  }
  return text.length > MAX_DATA_LENGTH ? ` ${text.slice(0, MAX_DATA_LENGTH)}…` : ` ${text}`
}

export function DebugLog({ maxLines = 6, isActive = true }: DebugLogProps) {
  const [logs, setLogs] = useState<LogEntry[]>(() => debugLog.getLogs())
  const [scrollOffset, setScrollOffset] = useState(0)

  useEffect(() => {
    return debugLog.subscribe((entry) => {
      setLogs((prev) => [...prev, entry].slice(-200))
      setScrollOffset(0)
    })
  }, [])

  useInput(
    (input) => {
      if (input === '[') {
        setScrollOffset((prev) => Math.min(prev + 1, Math.max(0, logs.length - maxLines)))
      } else if (input === ']') {
        setScrollOffset((prev) => Math.max(prev - 1, 0))
      }
    },
    { isActive },
  )

  const end = logs.length - scrollOffset
  const visible = logs.slice(Math.max(0, end - maxLines), end)

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Box>
        <Text bold dimColor>
          Debug Log
        </Text>
        <Text dimColor> ({logs.length} entries)</Text>
        {scrollOffset > 0 && <Text dimColor> [scrolled: -{scrollOffset}]</Text>}
        {isActive && <Text dimColor>  [/] scroll</Text>}
      </Box>
      {visible.length === 0 ? (
        <Text dimColor>No log entries yet...</Text>
      ) : (
        visible.map((entry, i) => (
          <Box key={`${entry.timestamp.getTime()}-${i}`}>
            <Text dimColor>{formatClock(entry.timestamp)} </Text>
            <Text color={LEVEL_STYLES[entry.level].color}>[{LEVEL_STYLES[entry.level].label}]</Text>
            <Text> {entry.message}</Text>
            <Text dimColor>{formatData(entry.data)}</Text>
          </Box>
        ))
      )}
    </Box>
  )
}
