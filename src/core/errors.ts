// Error taxonomy shared by the GitHub client, the summarizer, the session
// controller and the HTTP facade

// ============================================================================
// Kinds
// ============================================================================

export type DigestErrorKind =
  | 'authentication'
  | 'not_found'
  | 'rate_limit'
  | 'input_too_large'
  | 'model'
  | 'configuration'
  | 'repository'

/**
 * Which remote produced an error, when one did.
 */
export type ErrorSource = 'github' | 'model' | 'config'

export type ErrorPayload = {
  kind: DigestErrorKind | 'validation' | 'unknown'
  message: string
}

type DigestErrorOptions = {
  source?: ErrorSource
  statusCode?: number
  cause?: unknown
}

// ============================================================================
// Base class
// ============================================================================

export class DigestError extends Error {
  readonly kind: DigestErrorKind
  readonly source?: ErrorSource
  readonly statusCode?: number

  constructor(kind: DigestErrorKind, message: string, options: DigestErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'DigestError'
    this.kind = kind
    this.source = options.source
    this.statusCode = options.statusCode
  }
}

// ============================================================================
// Concrete errors
// ============================================================================

/** Credential missing or rejected by GitHub or the model provider. */
export class AuthenticationError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('authentication', message, options)
    this.name = 'AuthenticationError'
  }
}

/** Repository, commit or ref does not exist (or is invisible to the token). */
export class NotFoundError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('not_found', message, options)
    this.name = 'NotFoundError'
  }
}

export class RateLimitError extends DigestError {
  /** Epoch seconds at which GitHub says the quota resets, if known. */
  readonly resetAt?: number

  constructor(message: string, options: DigestErrorOptions & { resetAt?: number } = {}) {
    super('rate_limit', message, options)
    this.name = 'RateLimitError'
    this.resetAt = options.resetAt
  }
}

export class InputTooLargeError extends DigestError {
  readonly inputLength?: number
  readonly limit?: number

  constructor(
    message: string,
    options: DigestErrorOptions & { inputLength?: number; limit?: number } = {},
  ) {
    super('input_too_large', message, { source: 'model', ...options })
    this.name = 'InputTooLargeError'
    this.inputLength = options.inputLength
    this.limit = options.limit
  }
}

export class ModelError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('model', message, { source: 'model', ...options })
    this.name = 'ModelError'
  }
}

export class ConfigurationError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('configuration', message, { source: 'config', ...options })
    this.name = 'ConfigurationError'
  }
}

/** Any GitHub failure that is not auth, not-found or throttling. */
export class RepositoryError extends DigestError {
  constructor(message: string, options: DigestErrorOptions = {}) {
    super('repository', message, { source: 'github', ...options })
    this.name = 'RepositoryError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isDigestError(err: unknown): err is DigestError {
  return err instanceof DigestError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Normalize any thrown value into the `{ kind, message }` shape used by the
 * HTTP facade and the terminal UI.
 */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (isDigestError(err)) {
    return { kind: err.kind, message: err.message }
  }
  return { kind: 'unknown', message: errorMessage(err) }
}
