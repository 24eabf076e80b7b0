import {
  ConversionError,
  IncompleteValueError,
  InvalidKeyError,
  InvalidLanguageDataError,
  InvalidLanguageError,
  LineNumberUnavailableError,
  MissingOriginError,
  UnknownLanguageError,
} from "../errors"
import { SettingError } from "../setting-error"

describe("setting errors", () => {
  const subject = { key: "files", location: "project.cfg:3" }

  it("InvalidKeyError", () => {
    const err = new InvalidKeyError("")

    expect(err).toBeInstanceOf(SettingError)
    expect(err.name).toBe("InvalidKeyError")
    expect(err.code).toBe("invalid_key")
    expect(err.message).toBe("An empty key is not allowed for a setting.")
  })

  it("IncompleteValueError names the setting and the operation", () => {
    const read = new IncompleteValueError(subject, "read")
    const iterate = new IncompleteValueError(subject, "iterate")

    expect(read.message).toBe(
      'Reading the value of setting "files" (project.cfg:3) is invalid because the value ' +
        "is incomplete. Access the setting through its section to get the complete value.",
    )
    expect(iterate.message.startsWith('Iterating over setting "files" (project.cfg:3)')).toBe(true)
    expect(read.context).toEqual({ key: "files", location: "project.cfg:3", operation: "read" })
  })

  it("MissingOriginError with and without a setting", () => {
    expect(new MissingOriginError("a.py").message).toBe(
      'Cannot determine the path "a.py" without an origin.',
    )
    expect(new MissingOriginError("a.py", { key: "files", location: "" }).message).toBe(
      'Cannot determine the path "a.py" of setting "files" without an origin.',
    )
  })

  it("LineNumberUnavailableError", () => {
    const err = new LineNumberUnavailableError({ key: "k", location: "a.cfg" })

    expect(err.code).toBe("line_number_unavailable")
    expect(err.message).toBe(
      'setting "k" (a.cfg) was declared with a plain origin, which has no line numbers. ' +
        "Use a source position as origin for line numbers.",
    )
  })

  it("ConversionError keeps text and target", () => {
    const err = new ConversionError("abc", "int")

    expect(err.message).toBe('Cannot convert "abc" to int.')
    expect(err.text).toBe("abc")
    expect(err.target).toBe("int")
    expect(err.context).toEqual({ text: "abc", target: "int" })
  })

  it("InvalidLanguageError wraps UnknownLanguageError", () => {
    const cause = new UnknownLanguageError("Cobol", "no language with this name or alias")
    const err = new InvalidLanguageError("Cobol", cause)

    expect(cause.message).toBe('Unknown language "Cobol": no language with this name or alias.')
    expect(err.message).toBe(
      '"Cobol" is not a valid language. Unknown language "Cobol": no language with this name or alias.',
    )
    expect(err.cause).toBe(cause)
  })

  it("InvalidLanguageDataError is not operational", () => {
    const err = new InvalidLanguageDataError("✖ Invalid input")

    expect(err.isOperational).toBe(false)
    expect(err.message).toBe("Language definitions are malformed:\n✖ Invalid input")
  })
})
