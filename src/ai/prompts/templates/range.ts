// Combined summary of a commit range

import type { PromptTemplate } from '../types.ts'

export const RANGE_TEMPLATE: PromptTemplate = {
  id: 'range',
  system: `You review a contiguous range of git commits as one unit of work.

Write a short Markdown summary with these sections:
- Overview: two or three sentences on what the range accomplishes.
- Notable changes: bullets, grouped by area of the codebase.
- Review focus: what a reviewer should verify before this ships.

Do not describe commits one by one unless a single commit carries most of the change.`,
  user: `Range: {{reference}}
Commit messages:
{{message}}

Combined diff:
{{diff}}`,
}
