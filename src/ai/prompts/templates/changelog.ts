// Consolidated changelog built from per-commit summaries

import type { PromptTemplate } from '../types.ts'

export const CHANGELOG_TEMPLATE: PromptTemplate = {
  id: 'changelog',
  system: `You turn a list of per-commit summaries into one QA-focused changelog.

Structure:
1. High-level summary: the major changes, the areas needing focused testing, the likely risk areas.
2. Detailed changes, categorized:
   - New Features: what to test, and dependent features that could be affected.
   - Improvements: changed workflows or UI, performance changes to verify.
   - Bug Fixes: the fix, its impact, and what to regression-test.
   - Technical Changes: infrastructure, security or performance implications.
3. Testing focus areas: critical user paths, modified API endpoints, database changes or migrations.
4. Integration points: affected third-party integrations and cross-service dependencies.

Be specific about what QA needs to verify. Output Markdown only.`,
  user: `Changelog for {{reference}}

Commit summaries:
{{diff}}`,
}
