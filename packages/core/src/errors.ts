export type ValidationErrorCode =
  | 'invalid_change'
  | 'invalid_pattern'
  | 'invalid_profile'
  | 'error_threshold_out_of_range'
  | 'invalid_message'

export class ValidationError extends Error {
  readonly code: ValidationErrorCode

  constructor(code: ValidationErrorCode, message: string) {
    super(message)
    this.name = 'ValidationError'
    this.code = code
  }
}

export class NotFoundError extends Error {
  readonly code = 'not_found' as const
  readonly resource: string
  readonly id: string

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`)
    this.name = 'NotFoundError'
    this.resource = resource
    this.id = id
  }
}

export class ConsensusTimeoutError extends Error {
  readonly code = 'consensus_timeout' as const
  readonly proposalId: string
  readonly timeoutMs: number

  constructor(proposalId: string, timeoutMs: number) {
    super(`No consensus decision for ${proposalId} within ${timeoutMs}ms`)
    this.name = 'ConsensusTimeoutError'
    this.proposalId = proposalId
    this.timeoutMs = timeoutMs
  }
}

export class RollbackError extends Error {
  readonly code = 'rollback_failed' as const
  readonly proposalId: string

  constructor(proposalId: string, message: string) {
    super(message)
    this.name = 'RollbackError'
    this.proposalId = proposalId
  }
}

export class InvalidTransitionError extends Error {
  readonly code = 'invalid_transition' as const
  readonly proposalId: string
  readonly from: string
  readonly to: string

  constructor(params: { proposalId: string; from: string; to: string }) {
    super(`Proposal ${params.proposalId} cannot move from ${params.from} to ${params.to}`)
    this.name = 'InvalidTransitionError'
    this.proposalId = params.proposalId
    this.from = params.from
    this.to = params.to
  }
}

export class QueueUnavailableError extends Error {
  readonly code = 'queue_unavailable' as const
  readonly queue: string

  constructor(queue: string, cause?: unknown) {
    super(`Queue "${queue}" unavailable: ${describeError(cause)}`)
    this.name = 'QueueUnavailableError'
    this.queue = queue
    this.cause = cause
  }
}

export class PersistenceError extends Error {
  readonly code = 'persistence_failed' as const
  readonly operation: string

  constructor(operation: string, cause?: unknown) {
    super(`Persistence failure during ${operation}: ${describeError(cause)}`)
    this.name = 'PersistenceError'
    this.operation = operation
    this.cause = cause
  }
}

export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export function describeError(error: unknown): string {
  if (error === undefined) return 'unknown error'
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  try {
    return JSON.stringify(error)
  } catch {
    return String(error)
  }
}
