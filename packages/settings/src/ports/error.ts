export type SettingErrorCode =
  | "invalid_key"
  | "incomplete_value"
  | "missing_origin"
  | "line_number_unavailable"
  | "conversion_failed"
  | "unknown_language"
  | "invalid_language"
  | "invalid_language_data"

/**
 * Contextual metadata attached to errors.
 * Carries the setting key, its location and the offending input without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Serialized error shape for logging and reporting.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedSettingError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedSettingError
  stack?: string
}>
