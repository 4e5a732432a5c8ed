// ---------------------------------------------------------------------------
// Error taxonomy — stable codes that callers can branch on
// ---------------------------------------------------------------------------

/**
 * `request` errors mean the caller sent something unusable and should not retry
 * as-is; `backend` errors mean the models were unavailable and a later retry
 * may succeed.
 */
export type ErrorScope = 'request' | 'backend'

export type QueryErrorCode =
  | 'invalid_query'
  | 'rate_limited'
  | 'classification_failed'
  | 'synthesis_failed'
  | 'timeout'

export type RemoteErrorCode =
  | 'rate_limited'
  | 'network_error'
  | 'provider_unavailable'
  | 'malformed_response'
  | 'timeout'
  | 'aborted'
  | 'authentication_failed'
  | 'invalid_request'
  | 'unknown'

export type RemoteErrorKind = 'transient' | 'permanent'

export class ConductorError extends Error {
  constructor(
    message: string,
    public readonly code: QueryErrorCode | RemoteErrorCode,
    public readonly scope: ErrorScope
  ) {
    super(message)
    this.name = 'ConductorError'
  }
}

export class QueryError extends ConductorError {
  constructor(message: string, code: QueryErrorCode, scope: ErrorScope) {
    super(message, code, scope)
    this.name = 'QueryError'
  }
}

export class InvalidQueryError extends QueryError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'invalid_query', 'request')
    this.name = 'InvalidQueryError'
  }
}

export class ClassificationError extends QueryError {
  constructor(message: string) {
    super(message, 'classification_failed', 'backend')
    this.name = 'ClassificationError'
  }
}

/** Failure of one remote model call. Only `transient` errors are retried. */
export class RemoteError extends ConductorError {
  constructor(
    message: string,
    code: RemoteErrorCode,
    public readonly modelId: string,
    public readonly kind: RemoteErrorKind,
    public readonly retryAfterMs?: number,
    public readonly status?: number
  ) {
    super(message, code, 'backend')
    this.name = 'RemoteError'
  }

  get transient(): boolean {
    return this.kind === 'transient'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
