// Commit range input parsing
//
// Accepted forms:
//   3          one commit by list position (1 = most recent); an all-digit
//              sha past the end of the list is looked up as a ref
//   1-5        list positions, inclusive; 5-1 is an inverted (empty) range
//   abc1234    one commit by sha
//   abc..def   refs, oldest first (abc inclusive); `...` also works

import type { Commit } from '../../github/types.ts'

export type RangeSelection =
  | { kind: 'positions'; start: number; end: number }
  | { kind: 'refs'; sinceRef: string; untilRef: string }
  | { kind: 'ref'; ref: string }

export type ParseRangeResult =
  | { success: true; selection: RangeSelection }
  | { success: false; error: string }

const POSITION_PATTERN = /^\d{1,6}$/
const POSITIONS_PATTERN = /^(\d{1,6})\s*-\s*(\d{1,6})$/
const REFS_PATTERN = /^(\S+?)\.{2,3}(\S+)$/
const REF_PATTERN = /^[\w./-]+$/
const SHA_PATTERN = /^[0-9a-f]{4,40}$/i

export function parseRangeInput(input: string): ParseRangeResult {
  const trimmed = input.trim()

  if (!trimmed) {
    return { success: false, error: 'Enter a position (3), a range (1-5) or refs (abc..def)' }
  }

  if (POSITION_PATTERN.test(trimmed)) {
    const position = Number(trimmed)
    return { success: true, selection: { kind: 'positions', start: position, end: position } }
  }

  const positions = trimmed.match(POSITIONS_PATTERN)
  if (positions?.[1] && positions[2]) {
    return {
      success: true,
      selection: { kind: 'positions', start: Number(positions[1]), end: Number(positions[2]) },
    }
  }

  const refs = trimmed.match(REFS_PATTERN)
  if (refs?.[1] && refs[2]) {
    return { success: true, selection: { kind: 'refs', sinceRef: refs[1], untilRef: refs[2] } }
  }

  if (REF_PATTERN.test(trimmed)) {
    return { success: true, selection: { kind: 'ref', ref: trimmed } }
  }

  return { success: false, error: `Cannot read "${trimmed}" as a commit range` }
}

export type PositionsResult =
  | { success: true; commits: Commit[] }
  | { success: false; error: string }

/**
 * Slice the listed commits by 1-based positions. `start > end` is an
 * inverted range and yields no commits.
 */
export function selectByPositions(commits: Commit[], start: number, end: number): PositionsResult {
  if (start > end) {
    return { success: true, commits: [] }
  }
  if (start < 1 || end > commits.length) {
    return {
      success: false,
      error: `Positions must be between 1 and ${commits.length}`,
    }
  }
  return { success: true, commits: commits.slice(start - 1, end) }
}

/** True when `text` could be an abbreviated or full commit sha */
export function couldBeSha(text: string): boolean {
  return SHA_PATTERN.test(text)
}

/**
 * Find a listed commit whose sha starts with `ref`.
 */
export function findListedCommit(commits: Commit[], ref: string): Commit | undefined {
  const needle = ref.toLowerCase()
  if (!couldBeSha(needle)) return undefined
  return commits.find((c) => c.sha.toLowerCase().startsWith(needle))
}
