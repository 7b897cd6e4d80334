import React from 'react'
import { Box, Text } from 'ink'
import Spinner from 'ink-spinner'
import type { SessionProgress } from '../../core/session/index.ts'

type SummarizingScreenProps = {
  progress?: SessionProgress
}

export function SummarizingScreen({ progress }: SummarizingScreenProps) {
  return (
    <Box>
      <Text color="cyan">
        <Spinner type="dots" /> Summarizing
        {progress ? ` ${progress.done}/${progress.total}` : ''}...
      </Text>
    </Box>
  )
}
