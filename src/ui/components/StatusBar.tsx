import React from 'react'
import { Box, Text } from 'ink'
import Spinner from 'ink-spinner'
import type { DigestConfig } from '../../config/types.ts'
import { getProviderDisplayName } from '../../config/types.ts'
import type { SessionState } from '../../core/session/types.ts'
import { getStepDescription } from '../../core/session/session-transitions.ts'

type StatusBarProps = {
  config: DigestConfig
  state: SessionState
  busy: boolean
}

export function StatusBar({ config, state, busy }: StatusBarProps) {
  const entries = state.transcript?.entries.length ?? 0
  const failed = Boolean(state.lastError)
  const color = failed ? 'red' : busy ? 'cyan' : 'green'

  return (
    <Box
      borderStyle="single"
      borderColor={state.repositoryName ? 'cyan' : 'gray'}
      paddingX={1}
      flexDirection="column"
    >
      {state.repositoryName && (
        <Box>
          <Text dimColor>Repository: </Text>
          <Text color="green" bold>
            {state.repositoryName}
          </Text>
          <Text dimColor>  Transcript: </Text>
          <Text>
            {entries} {entries === 1 ? 'entry' : 'entries'}
          </Text>
        </Box>
      )}
      <Box>
        <Text dimColor>Provider: </Text>
        <Text color="cyan">{getProviderDisplayName(config.provider)}</Text>
        <Text>  </Text>
        <Text dimColor>Model: </Text>
        <Text color="cyan">{config.model}</Text>
      </Box>
      <Box>
        <Text dimColor>Status: </Text>
        <Text color={color}>
          {busy ? <Spinner type="dots" /> : failed ? '✖' : '●'} {getStepDescription(state.step)}
        </Text>
      </Box>
    </Box>
  )
}
