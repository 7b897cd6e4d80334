import React, { useEffect } from 'react'
import { Box, Text, useApp } from 'ink'
import type { DigestConfig } from '../../config/types.ts'
import type { SessionController } from '../../core/session/index.ts'
import type { SummaryMode } from '../../core/summaries.ts'
import { assertNever } from '../../utils/type-guards.ts'
import { StatusBar, SummaryList } from '../components/index.ts'
import { useSessionController } from '../hooks/useSessionController.ts'
import { RepositoryScreen } from './RepositoryScreen.tsx'
import { RangeScreen } from './RangeScreen.tsx'
import { ReleaseScreen } from './ReleaseScreen.tsx'
import { SummarizingScreen } from './SummarizingScreen.tsx'
import { IdleMenu, type IdleAction } from './IdleMenu.tsx'

type SessionScreenProps = {
  controller: SessionController
  config: DigestConfig
  onInputModeChange?: (typing: boolean) => void
}

export function SessionScreen({ controller, config, onInputModeChange }: SessionScreenProps) {
  const { exit } = useApp()
  const { state, summaries, busy, actionError, run, clearSummaries } = useSessionController(controller)

  useEffect(() => {
    if (state.step === 'exited') exit()
  }, [state.step, exit])

  useEffect(() => {
    onInputModeChange?.(state.step === 'selecting_range')
  }, [state.step, onInputModeChange])

  const handleRange = (range: string, mode: SummaryMode) => {
    clearSummaries()
    void run(() => controller.summarize(range, mode))
  }

  const handleIdle = (action: IdleAction) => {
    switch (action) {
      case 'next':
        clearSummaries()
        void run(() => controller.continue())
        break
      case 'repository':
        clearSummaries()
        void run(() => controller.changeRepository())
        break
      case 'exit':
        void run(() => controller.exit())
        break
      default:
        assertNever(action)
    }
  }

  const renderStep = (): React.ReactNode => {
    switch (state.step) {
      case 'selecting_repository':
        return (
          <RepositoryScreen
            names={controller.repositoryNames()}
            invalid={config.invalidRepositories}
            isFocused={!busy}
            onSelect={(name) => void run(() => controller.selectRepository(name))}
            onExit={() => void run(() => controller.exit())}
          />
        )
      case 'selecting_range':
        return (
          <RangeScreen
            commits={state.commits}
            isFocused={!busy}
            onSubmit={handleRange}
            onReleases={() => void run(() => controller.browseReleases())}
            onBack={() => void run(() => controller.changeRepository())}
          />
        )
      case 'selecting_release':
        return (
          <ReleaseScreen
            releases={state.releases ?? []}
            keyword={config.releaseKeyword}
            isFocused={!busy}
            onSubmit={(selection) => {
              clearSummaries()
              void run(() => controller.summarizeReleases(selection))
            }}
            onBack={() => void run(() => controller.leaveReleases())}
          />
        )
      case 'summarizing':
        return <SummarizingScreen progress={state.progress} />
      case 'idle':
        return <IdleMenu isFocused={!busy} onSelect={handleIdle} />
      case 'exited':
        return <Text dimColor>Transcript saved. Goodbye.</Text>
      default:
        return assertNever(state.step)
    }
  }

  return (
    <Box flexDirection="column" width="100%">
      <Box padding={1} flexDirection="column">
        <Box marginBottom={1}>
          <Text bold>commit-digest</Text>
        </Box>
        <SummaryList summaries={summaries} />
        {state.lastError && (
          <Box marginBottom={1}>
            <Text color="red">
              {state.lastError.kind}: {state.lastError.message}
            </Text>
          </Box>
        )}
        {actionError && (
          <Box marginBottom={1}>
            <Text color="red">{actionError}</Text>
          </Box>
        )}
        {state.notice && (
          <Box marginBottom={1}>
            <Text color="yellow">{state.notice}</Text>
          </Box>
        )}
        {busy && state.step !== 'summarizing' ? <Text color="cyan">Working...</Text> : renderStep()}
      </Box>
      <StatusBar config={config} state={state} busy={busy} />
    </Box>
  )
}
