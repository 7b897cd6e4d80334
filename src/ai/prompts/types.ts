// Types for summary prompt templates

export type PromptTemplateId = 'commit' | 'range' | 'changelog'

/**
 * A prompt template. `user` may reference placeholders written as
 * `{{name}}`; see PromptValues for the names that are filled.
 */
export type PromptTemplate = {
  id: PromptTemplateId | (string & {})
  system: string
  user: string
}

export type PromptValues = {
  /**
   * Diff text, or concatenated diffs for a range. Always filled.
   */
  diff?: string
  /**
   * Commit message (or list of messages for a range).
   */
  message?: string
  author?: string
  /**
   * Short identifier of what is summarized, e.g. `abc1234` or `abc1234..def5678`.
   */
  reference?: string
}

export type RenderedPrompt = {
  system: string
  user: string
}
