import { SettingError } from "./setting-error"

/**
 * Identifies a setting in messages, e.g. `setting "files" (project.cfg:12)`.
 */
export type SettingSubject = Readonly<{
  key: string
  location: string
}>

function describe(subject: SettingSubject): string {
  const at = subject.location === "" ? "" : ` (${subject.location})`
  return `setting "${subject.key}"${at}`
}

export class InvalidKeyError extends SettingError<"invalid_key"> {
  constructor(key: string) {
    super("An empty key is not allowed for a setting.", {
      code: "invalid_key",
      context: { key },
    })
  }
}

export type IncompleteOperation = "read" | "iterate"

/**
 * The setting is a fragment that still has to be appended to a default value.
 */
export class IncompleteValueError extends SettingError<"incomplete_value"> {
  constructor(subject: SettingSubject, operation: IncompleteOperation) {
    const what = operation === "read" ? "Reading the value of" : "Iterating over"

    super(
      `${what} ${describe(subject)} is invalid because the value is incomplete. ` +
        "Access the setting through its section to get the complete value.",
      {
        code: "incomplete_value",
        context: { ...subject, operation },
      },
    )
  }
}

export class MissingOriginError extends SettingError<"missing_origin"> {
  constructor(text: string, subject?: SettingSubject) {
    const of = subject ? ` of ${describe(subject)}` : ""

    super(`Cannot determine the path "${text}"${of} without an origin.`, {
      code: "missing_origin",
      context: { text, ...subject },
    })
  }
}

export class LineNumberUnavailableError extends SettingError<"line_number_unavailable"> {
  constructor(subject: SettingSubject) {
    super(
      `${describe(subject)} was declared with a plain origin, which has no line numbers. ` +
        "Use a source position as origin for line numbers.",
      {
        code: "line_number_unavailable",
        context: { ...subject },
      },
    )
  }
}

export type ConversionTarget = "bool" | "int" | "float" | "url" | (string & {})

export class ConversionError extends SettingError<"conversion_failed"> {
  readonly text: string
  readonly target: ConversionTarget

  constructor(
    text: string,
    target: ConversionTarget,
    options: { subject?: SettingSubject; cause?: unknown } = {},
  ) {
    const of = options.subject ? ` of ${describe(options.subject)}` : ""

    super(`Cannot convert "${text}"${of} to ${target}.`, {
      code: "conversion_failed",
      context: { text, target, ...options.subject },
      cause: options.cause,
    })

    this.text = text
    this.target = target
  }
}

export class UnknownLanguageError extends SettingError<"unknown_language"> {
  constructor(query: string, reason: string) {
    super(`Unknown language "${query}": ${reason}.`, {
      code: "unknown_language",
      context: { query },
    })
  }
}

export class InvalidLanguageError extends SettingError<"invalid_language"> {
  constructor(name: string, cause: UnknownLanguageError) {
    super(`"${name}" is not a valid language. ${cause.message}`, {
      code: "invalid_language",
      context: { name },
      cause,
    })
  }
}

export class InvalidLanguageDataError extends SettingError<"invalid_language_data"> {
  constructor(details: string) {
    super(`Language definitions are malformed:\n${details}`, {
      code: "invalid_language_data",
      isOperational: false,
    })
  }
}
