import type { ErrorContext, SerializedSettingError, SettingErrorCode } from "../../ports/error"

export type SettingErrorOptions<C extends SettingErrorCode = SettingErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * Base class of every error raised while reading or converting a setting.
 *
 * @remarks
 * All of them are caller-input errors: they are thrown at the point of
 * violation and never retried. `isOperational` is `false` only for broken
 * bundled data, which no user input can fix.
 */
export class SettingError<C extends SettingErrorCode = SettingErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: SettingErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedSettingError {
    return serializeSettingError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * SettingError keeps its code and context; other errors get code "unknown".
 */
export function serializeSettingError(
  err: unknown,
  options?: SerializeOptions,
): SerializedSettingError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof SettingError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeSettingError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeSettingError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

export function isSettingError(err: unknown): err is SettingError {
  return err instanceof SettingError
}
