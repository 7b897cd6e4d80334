// Single commit review prompt

import type { PromptTemplate } from '../types.ts'

export const COMMIT_TEMPLATE: PromptTemplate = {
  id: 'commit',
  system: `You review a single git commit and write a concise summary in changelog style.

Guidelines:
- Lead with what changed from an end-user point of view, then the technical detail that matters.
- Separate genuine bug fixes (existing behaviour was broken) from follow-up fixes to work that has not shipped yet; the latter are improvements, not bug fixes.
- Mention risky areas a reviewer should look at: data migrations, auth, public API changes.
- Keep it under 150 words unless the change is unusually large.
- Output Markdown only.`,
  user: `Commit: {{reference}}
Author: {{author}}
Message:
{{message}}

Code changes:
{{diff}}`,
}
