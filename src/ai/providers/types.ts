// Provider interface and shared types for the summarization client

import type { AIProvider as ProviderType } from '../../config/types.ts'
import {
  AuthenticationError,
  InputTooLargeError,
  ModelError,
  RateLimitError,
  isDigestError,
  type DigestError,
} from '../../core/errors.ts'

export type { ProviderType }

// ============================================================================
// Request Types
// ============================================================================

export type GenerateTextRequest = {
  model: string
  systemPrompt: string
  userPrompt: string
  /** Upper bound on generated tokens */
  maxOutputTokens?: number
}

// ============================================================================
// Provider Interface
// ============================================================================

/**
 * Common interface all model providers implement. One call is one
 * outbound request: providers are built with SDK retries disabled.
 */
export interface SummaryProvider {
  readonly type: ProviderType

  /** Human-readable provider name for the UI */
  readonly displayName: string

  /**
   * Generate text (non-streaming). Throws a DigestError on failure.
   */
  generateText(request: GenerateTextRequest): Promise<string>
}

// ============================================================================
// Error Mapping
// ============================================================================

const CONTEXT_LENGTH_PATTERN =
  /context[_ ]length|maximum context|too many tokens|prompt is too long|request too large/i

function readStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
  if ('status' in err && typeof err.status === 'number') return err.status
  return undefined
}

/**
 * Map a raw SDK error to the error taxonomy. Both the Vercel AI SDK
 * (`statusCode`) and the Anthropic SDK (`status`) expose the HTTP status.
 */
export function mapToProviderError(err: unknown, provider: ProviderType): DigestError {
  if (isDigestError(err)) {
    return err
  }

  const message = err instanceof Error ? err.message : String(err)
  const statusCode = readStatus(err)
  const options = { statusCode, cause: err }
  const prefixed = `${provider}: ${message}`

  if (statusCode === 413 || CONTEXT_LENGTH_PATTERN.test(message)) {
    return new InputTooLargeError(prefixed, options)
  }
  if (statusCode === 401 || statusCode === 403 || /api key|unauthorized/i.test(message)) {
    return new AuthenticationError(prefixed, { ...options, source: 'model' })
  }
  if (statusCode === 429 || /rate limit/i.test(message)) {
    return new RateLimitError(prefixed, { ...options, source: 'model' })
  }

  return new ModelError(prefixed, options)
}
