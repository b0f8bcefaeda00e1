import type { BackendKind } from '../../types'
import { isNonEmptyArray, isNotNullish } from './validators/type-guards'

export type RankErrorCode = 'CONNECTION_ERROR' | 'INVALID_INPUT'

export interface ErrorContext {
  field?: string
  value?: unknown
  path?: readonly string[]
  backend?: BackendKind
}

export class RankError extends Error {
  public readonly code: RankErrorCode
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: RankErrorCode,
    context?: ErrorContext,
    cause?: unknown,
  ) {
    super(message, isNotNullish(cause) ? { cause } : undefined)
    this.name = 'RankError'
    this.code = code
    this.context = context
  }
}

export class ConnectionError extends RankError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', context, cause)
    this.name = 'ConnectionError'
  }
}

export class InvalidInputError extends RankError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INVALID_INPUT', context)
    this.name = 'InvalidInputError'
  }
}

function formatMessage(message: string, ctx: ErrorContext): string {
  const parts = [message]

  if (isNonEmptyArray(ctx.path)) {
    parts.push(`Path: ${ctx.path.join('.')}`)
  }

  if (isNotNullish(ctx.backend)) {
    parts.push(`Backend: ${ctx.backend}`)
  }

  if (isNotNullish(ctx.field)) {
    parts.push(`Field: ${ctx.field}`)
  }

  return parts.join('\n')
}

export function createError(
  message: string,
  ctx: ErrorContext = {},
): InvalidInputError {
  return new InvalidInputError(formatMessage(message, ctx), ctx)
}

export function createConnectionError(
  cause: unknown,
  ctx: ErrorContext,
): ConnectionError {
  const detail = cause instanceof Error ? cause.message : String(cause)
  return new ConnectionError(
    formatMessage(`Data source unreachable: ${detail}`, ctx),
    ctx,
    cause,
  )
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  // postgres.js
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  // better-sqlite3
  'SQLITE_CANTOPEN',
])

export function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const code = 'code' in error ? error.code : undefined
  if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) return true
  return error instanceof AggregateError
    ? error.errors.some(isConnectionFailure)
    : false
}
