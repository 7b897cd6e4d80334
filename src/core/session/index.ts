// Session module - the interactive review loop used by the TUI

export type {
  SessionStep,
  SessionState,
  SessionEvent,
  SessionEventCallback,
  SessionProgress,
  SessionController,
  SessionControllerDeps,
} from './types.ts'

export { createSessionController, EMPTY_RANGE_NOTICE } from './session-controller.ts'

export {
  parseRangeInput,
  selectByPositions,
  findListedCommit,
  type RangeSelection,
  type ParseRangeResult,
} from './range.ts'

export {
  isValidTransition,
  getValidNextSteps,
  isTerminalState,
  STEP_DESCRIPTIONS,
  getStepDescription,
} from './session-transitions.ts'
