// Error responses for the HTTP facade

import type { Response as ExpressResponse } from 'express'
import type { ZodError } from 'zod'
import { toErrorPayload, type ErrorPayload } from '../core/errors.ts'
import { debugLog } from '../debug/logger.ts'

export type ErrorResponse = {
  error: ErrorPayload
}

const STATUS_BY_KIND: Record<ErrorPayload['kind'], number> = {
  validation: 400,
  configuration: 400,
  authentication: 401,
  not_found: 404,
  input_too_large: 413,
  rate_limit: 429,
  model: 502,
  repository: 502,
  unknown: 500,
}

export function statusForKind(kind: ErrorPayload['kind']): number {
  return STATUS_BY_KIND[kind]
}

export function sendError(res: ExpressResponse<ErrorResponse>, error: ErrorPayload): void {
  res.status(statusForKind(error.kind)).json({ error })
}

/**
 * Serialize any thrown value as `{ error: { kind, message } }`.
 */
export function sendRouteError(res: ExpressResponse<ErrorResponse>, err: unknown): void {
  const payload = toErrorPayload(err)
  const level = payload.kind === 'unknown' ? 'error' : 'warn'
  debugLog[level]('HTTP: request failed', payload)
  sendError(res, payload)
}

export function sendValidationError(res: ExpressResponse<ErrorResponse>, error: ZodError): void {
  const message = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  sendError(res, { kind: 'validation', message })
}
