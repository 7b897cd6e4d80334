import React, { useEffect, useState } from 'react'
import { Box, Text } from 'ink'
import type { DigestConfig } from '../config/types.ts'
import type { SessionController } from '../core/session/index.ts'
import { DebugLog } from './components/index.ts'
import { debugLog } from '../debug/logger.ts'
import { SessionScreen } from './Session/index.tsx'

// ============================================================================
// Types
// ============================================================================

type AppProps = {
  controller: SessionController
  config: DigestConfig
  /** Shown once on startup, e.g. when a starter config was written */
  notice?: string
  debug?: boolean
}

// ============================================================================
// Component
// ============================================================================

export function App({ controller, config, notice, debug = false }: AppProps) {
  const [typing, setTyping] = useState(false)

  useEffect(() => {
    debugLog.setEnabled(debug)
    if (debug) {
      debugLog.info('Debug mode enabled')
    }
  }, [debug])

  const content = (
    <Box flexDirection="column">
      {notice && (
        <Box paddingX={1}>
          <Text color="green">{notice}</Text>
        </Box>
      )}
      <SessionScreen controller={controller} config={config} onInputModeChange={setTyping} />
    </Box>
  )

  if (!debug) {
    return (
      <Box flexDirection="column" width="100%">
        {content}
      </Box>
    )
  }

  return (
    <Box flexDirection="column" width="100%">
      <Box flexDirection="column" flexGrow={1} minHeight={0} width="100%">
        {content}
      </Box>
      <DebugLog maxLines={6} isActive={!typing} />
    </Box>
  )
}
