import type { AppContext } from '../config/types.ts'
import type { RepositoryClient } from '../github/types.ts'
import type { SummarizationClient } from '../ai/summarizer.ts'

/**
 * Everything the HTTP routes need. Built once at startup.
 */
export type ServerDeps = {
  context: AppContext
  repositoryClient: RepositoryClient
  summarizer: SummarizationClient
}
