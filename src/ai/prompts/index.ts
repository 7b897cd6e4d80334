// Prompts module - public API

export { COMMIT_TEMPLATE } from './templates/commit.ts'
export { RANGE_TEMPLATE } from './templates/range.ts'
export { CHANGELOG_TEMPLATE } from './templates/changelog.ts'
export { fillTemplate, commitValues, rangeValues, rangeReference, concatenateDiffs } from './render.ts'
export type { PromptTemplate, PromptTemplateId, PromptValues, RenderedPrompt } from './types.ts'
