import express from 'express'

import type { ServerDeps } from './types.ts'
import { createSummariesHandler } from './api/summaries.ts'
import {
  createCommitsHandler,
  createReleasesHandler,
  createRepositoriesHandler,
} from './api/repositories.ts'
import { sendError, sendRouteError } from './http.ts'
import type { ErrorPayload } from '../core/errors.ts'

export const BODY_LIMIT = '1mb'

/**
 * Map a body-parser failure (tagged with `type`) to an error payload.
 */
function bodyParserError(err: unknown): ErrorPayload | null {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return null
  }
  switch (err.type) {
    case 'entity.parse.failed':
      return { kind: 'validation', message: 'Request body is not valid JSON' }
    case 'entity.too.large':
      return { kind: 'input_too_large', message: `Request body is larger than ${BODY_LIMIT}` }
    default:
      return null
  }
}

export function createApp(deps: ServerDeps): express.Express {
  const app = express()

  app.use(express.json({ limit: BODY_LIMIT }))

  app.get('/', (_req, res) => {
    res.send('commit-digest server')
  })

  app.get('/healthz', (_req, res) => {
    res.send('ok')
  })

  app.get('/api/repositories', createRepositoriesHandler(deps))
  app.get('/api/repositories/:name/commits', createCommitsHandler(deps))
  app.get('/api/repositories/:name/releases', createReleasesHandler(deps))
  app.post('/api/summaries', createSummariesHandler(deps))

  app.use((_req: express.Request, res: express.Response) => {
    sendError(res, { kind: 'not_found', message: 'Route not found' })
  })

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      // Express recognizes error middleware by its four parameters
      _next: express.NextFunction,
    ) => {
      const bodyError = bodyParserError(err)
      if (bodyError) {
        sendError(res, bodyError)
        return
      }
      sendRouteError(res, err)
    },
  )

  return app
}
