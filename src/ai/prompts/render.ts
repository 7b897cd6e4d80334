// Fill prompt templates with diff and commit context

import type { Commit } from '../../github/types.ts'
import type { PromptTemplate, PromptValues, RenderedPrompt } from './types.ts'

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g

function isPromptKey(key: string): key is keyof PromptValues {
  return key === 'diff' || key === 'message' || key === 'author' || key === 'reference'
}

/**
 * Replace `{{name}}` placeholders. Unknown or missing names become an
 * empty string. A template without `{{diff}}` gets the diff appended.
 */
export function fillTemplate(template: PromptTemplate, values: PromptValues): RenderedPrompt {
  const diff = values.diff ?? ''
  const hasDiffSlot = /\{\{\s*diff\s*\}\}/.test(template.user)

  const filled = template.user.replace(PLACEHOLDER, (_match, key: string) =>
    isPromptKey(key) ? (values[key] ?? '') : '',
  )

  return {
    system: template.system,
    user: hasDiffSlot ? filled : `${filled}\n\n${diff}`,
  }
}

/**
 * Placeholder values describing one commit.
 */
export function commitValues(commit: Commit): PromptValues {
  return {
    reference: commit.shortSha,
    author: commit.author,
    message: commit.message,
    diff: commit.diff,
  }
}

/**
 * `oldest..newest` shorthand for a range listed most recent first.
 */
export function rangeReference(commits: Commit[]): string {
  const first = commits[0]
  const last = commits[commits.length - 1]
  if (!first || !last) return ''
  return first.sha === last.sha ? first.shortSha : `${last.shortSha}..${first.shortSha}`
}

/**
 * Placeholder values for a range summarized as one unit. Diffs are joined
 * under a per-commit header, in listing order.
 */
export function rangeValues(commits: Commit[]): PromptValues {
  return {
    reference: rangeReference(commits),
    author: [...new Set(commits.map((c) => c.author))].join(', '),
    message: commits.map((c) => `- ${c.shortSha} ${c.message.split('\n')[0] ?? ''}`).join('\n'),
    diff: concatenateDiffs(commits),
  }
}

export function concatenateDiffs(commits: Commit[]): string {
  return commits.map((c) => `=== ${c.shortSha} ${c.message.split('\n')[0] ?? ''}\n${c.diff ?? ''}`).join('\n\n')
}
