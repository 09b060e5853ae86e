// src/conductor/errors.ts — Conductor typed error class

/** Error codes for orchestration operations */
export type ConductorErrorCode =
  | "UNKNOWN_MODEL"
  | "UNKNOWN_PROVIDER"
  | "REQUEST_TOO_LARGE"
  | "UPSTREAM_ERROR"
  | "BREAKER_OPEN"
  | "WORKFLOW_PARSE_ERROR"
  | "TASK_FAILURE"
  | "CONFIG_INVALID"
  | "TEMPLATE_NOT_FOUND"

/** Codes that are never worth another attempt against the same model */
const NON_RETRYABLE_CODES: ReadonlySet<ConductorErrorCode> = new Set([
  "UNKNOWN_MODEL",
  "UNKNOWN_PROVIDER",
  "REQUEST_TOO_LARGE",
  "BREAKER_OPEN",
  "WORKFLOW_PARSE_ERROR",
  "CONFIG_INVALID",
  "TEMPLATE_NOT_FOUND",
])

export interface ConductorErrorOptions {
  retryable?: boolean
  statusCode?: number
  cause?: unknown
}

/** Typed error for all orchestration operations */
export class ConductorError extends Error {
  readonly name = "ConductorError"
  readonly code: ConductorErrorCode
  readonly context: Record<string, unknown>
  readonly retryable: boolean
  readonly statusCode?: number

  constructor(
    code: ConductorErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options: ConductorErrorOptions = {},
  ) {
    super(`[conductor] ${code}: ${message}`, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.code = code
    this.context = context
    this.retryable = options.retryable ?? !NON_RETRYABLE_CODES.has(code)
    this.statusCode = options.statusCode
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      status_code: this.statusCode,
    }
  }
}

export function isConductorError(err: unknown, code?: ConductorErrorCode): err is ConductorError {
  if (!(err instanceof ConductorError)) return false
  return code === undefined || err.code === code
}

/** Normalize anything thrown into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
