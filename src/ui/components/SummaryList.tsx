import React from 'react'
import { Box, Text } from 'ink'
import type { Summary } from '../../core/summaries.ts'

const MODE_LABELS: Record<Summary['mode'], string> = {
  each: 'commit',
  combined: 'range',
  changelog: 'changelog',
}

type SummaryListProps = {
  summaries: Summary[]
}

export function SummaryList({ summaries }: SummaryListProps) {
  if (summaries.length === 0) return null

  return (
    <Box flexDirection="column" marginBottom={1}>
      {summaries.map((summary, i) => (
        <Box key={`${summary.reference}-${i}`} flexDirection="column" marginBottom={1}>
          <Text color="yellow" bold>
            {summary.reference} <Text dimColor>({MODE_LABELS[summary.mode]})</Text>
          </Text>
          <Text>{summary.text}</Text>
        </Box>
      ))}
    </Box>
  )
}
