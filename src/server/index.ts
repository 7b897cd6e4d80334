import http from 'http'

import type { ServerDeps } from './types.ts'
import { createApp } from './app.ts'
import { debugLog } from '../debug/logger.ts'

/**
 * Start the HTTP facade. Resolves once the server is listening.
 */
export function startServer(deps: ServerDeps, port: number): Promise<http.Server> {
  const server = http.createServer(createApp(deps))

  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, () => {
      server.off('error', reject)
      const address = server.address()
      const boundPort = typeof address === 'object' && address ? address.port : port
      debugLog.info(`Server is running on port ${boundPort}`, {
        repositories: Object.keys(deps.context.config.repositories).length,
        provider: deps.context.config.provider,
      })
      resolve(server)
    })
  })
}

export { createApp } from './app.ts'
export type { ServerDeps } from './types.ts'
