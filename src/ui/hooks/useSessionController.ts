// useSessionController - mirrors controller state into React and runs actions
import { useState, useEffect, useCallback } from 'react'
import type { SessionController, SessionState } from '../../core/session/index.ts'
import type { Summary } from '../../core/summaries.ts'
import { errorMessage } from '../../core/errors.ts'
import { debugLog } from '../../debug/logger.ts'

export type UseSessionControllerResult = {
  state: SessionState
  /** Summaries produced by the most recent range */
  summaries: Summary[]
  busy: boolean
  /** Set when an action was refused outright (not a client error) */
  actionError: string | null
  run: (action: () => Promise<SessionState> | SessionState) => Promise<void>
  clearSummaries: () => void
}

export function useSessionController(controller: SessionController): UseSessionControllerResult {
  const [state, setState] = useState<SessionState>(() => controller.getState())
  const [summaries, setSummaries] = useState<Summary[]>([])
  const [busy, setBusy] = useState(false)
  const [actionError, setActionError] = useState<string | null>(null)

  useEffect(() => {
    return controller.subscribe((event) => {
      if (event.type === 'summary_added') {
        setSummaries((prev) => [...prev, event.summary])
      }
      setState(controller.getState())
    })
  }, [controller])

  const run = useCallback(
    async (action: () => Promise<SessionState> | SessionState) => {
      setBusy(true)
      setActionError(null)
      try {
        setState(await action())
      } catch (err) {
        debugLog.error('useSessionController: action failed', { error: errorMessage(err) })
        setActionError(errorMessage(err))
        setState(controller.getState())
      } finally {
        setBusy(false)
      }
    },
    [controller],
  )

  const clearSummaries = useCallback(() => setSummaries([]), [])

  return { state, summaries, busy, actionError, run, clearSummaries }
}
