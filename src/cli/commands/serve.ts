// `commit-digest serve`: the HTTP facade

import type { AppContext } from '../../config/types.ts'
import type { RepositoryClient } from '../../github/types.ts'
import type { SummarizationClient } from '../../ai/summarizer.ts'
import { startServer } from '../../server/index.ts'
import { debugLog } from '../../debug/logger.ts'

export async function handleServeCommand(
  context: AppContext,
  repositoryClient: RepositoryClient,
  summarizer: SummarizationClient,
  port: number = context.config.server.port,
): Promise<void> {
  debugLog.enableConsole('info')
  const server = await startServer({ context, repositoryClient, summarizer }, port)

  const shutdown = () => {
    debugLog.info('Server shutting down')
    server.close((err) => {
      if (err) {
        debugLog.error('Server close failed', { error: err.message })
        process.exit(1)
      }
      process.exit(0)
    })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}
