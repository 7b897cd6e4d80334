// Session state machine transitions
// Defines valid transitions between session steps

import type { SessionStep } from './types.ts'

// ============================================================================
// State Machine Definition
// ============================================================================

const VALID_TRANSITIONS: Record<SessionStep, SessionStep[]> = {
  // Start: pick a repository, or quit
  selecting_repository: ['selecting_range', 'exited'],

  // Commits loaded: summarize a range, browse releases, switch repository, or quit
  selecting_range: ['summarizing', 'selecting_release', 'selecting_repository', 'exited'],

  // Releases listed: summarize between two of them, go back, or quit
  selecting_release: ['summarizing', 'selecting_range', 'exited'],

  // Success ends idle; any failure drops back to range selection
  summarizing: ['idle', 'selecting_range'],

  // Next range, another repository, or quit
  idle: ['selecting_range', 'selecting_repository', 'exited'],

  exited: [],
}

// ============================================================================
// Validation Functions
// ============================================================================

export function isValidTransition(from: SessionStep, to: SessionStep): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function getValidNextSteps(currentStep: SessionStep): SessionStep[] {
  return VALID_TRANSITIONS[currentStep]
}

export function isTerminalState(step: SessionStep): boolean {
  return VALID_TRANSITIONS[step].length === 0
}

// ============================================================================
// Step Descriptions
// ============================================================================

export const STEP_DESCRIPTIONS: Record<SessionStep, string> = {
  selecting_repository: 'Choose a repository',
  selecting_range: 'Choose a commit range',
  selecting_release: 'Choose a release',
  summarizing: 'Summarizing commits...',
  idle: 'Range summarized',
  exited: 'Session closed',
}

export function getStepDescription(step: SessionStep): string {
  return STEP_DESCRIPTIONS[step]
}
