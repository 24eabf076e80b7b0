import { createNullLogger, type Logger } from "@confval/logger"
import type { MappingView } from "../../ports/converter"
import type { Origin, OriginInput } from "../../ports/origin"
import {
  ConversionError,
  type IncompleteOperation,
  IncompleteValueError,
  InvalidKeyError,
  LineNumberUnavailableError,
  type SettingSubject,
} from "../errors/errors"
import { formatOrigin, originFile, toOrigin } from "../origin/origin"
import { resolveGlobPath, resolvePath } from "../paths/resolve-path"
import { TextValue, type TextValueOptions } from "../text/text-value"

export type SettingOptions = TextValueOptions & {
  /**
   * The declaring file, or a position inside it. Relative paths are resolved
   * against its directory; end it with a separator to name a directory.
   * @default ""
   */
  origin?: OriginInput

  /**
   * The value was read from the command line rather than a file.
   * @default false
   */
  fromExternalInput?: boolean

  /**
   * The value is a fragment to be appended to a default defined elsewhere.
   * @default false
   */
  appendPending?: boolean

  logger?: Logger
}

export type SettingJSON = Readonly<{
  key: string
  value: string
  origin: string
  fromExternalInput: boolean
  appendPending: boolean
}>

/**
 * A key/value pair read from a configuration file or the command line.
 *
 * The value is stored once as text; every conversion is a fresh read of it.
 * While {@link Setting.appendPending} is set, all reads of the value throw
 * {@link IncompleteValueError}.
 *
 * @example
 * ```ts
 * const files = new Setting("files", "src/*.py, tests/*.py", {
 *   origin: { file: "/project/.lintrc", line: 4 },
 * })
 *
 * files.list()     // ["src/*.py", "tests/*.py"]
 * files.globList() // ["/project/src/*.py", "/project/tests/*.py"]
 * files.location   // "/project/.lintrc:4"
 * ```
 */
export class Setting implements Iterable<string>, MappingView {
  /** Cleared by whoever merges the fragment into its default. */
  appendPending: boolean

  readonly fromExternalInput: boolean

  /** Number of source lines the value spans. */
  length: number = 1

  private currentKey: string
  private readonly text: TextValue
  private readonly declaredAt: Origin
  private readonly logger: Logger

  constructor(key: string, value: string | number | boolean, options: SettingOptions = {}) {
    this.appendPending = options.appendPending ?? false
    this.fromExternalInput = options.fromExternalInput ?? false
    this.text = new TextValue(String(value), options)
    this.declaredAt = toOrigin(options.origin ?? "")
    this.logger = options.logger ?? createNullLogger()
    this.currentKey = Setting.validateKey(key)
  }

  private static validateKey(key: string): string {
    const normalized = String(key)

    if (normalized === "") {
      throw new InvalidKeyError(normalized)
    }

    return normalized
  }

  get key(): string {
    return this.currentKey
  }

  set key(key: string) {
    this.currentKey = Setting.validateKey(key)
  }

  get value(): string {
    this.assertComplete("read")
    return this.text.value
  }

  get stripWhitespace(): boolean {
    return this.text.stripWhitespace
  }

  get listDelimiters(): readonly string[] {
    return this.text.listDelimiters
  }

  get removeEmptyElements(): boolean {
    return this.text.removeEmptyElements
  }

  /** The declaring file, or `""`. */
  get origin(): string {
    return originFile(this.declaredAt)
  }

  get originInfo(): Origin {
    return this.declaredAt
  }

  /** `file:line`, `file` or `""`, for messages. */
  get location(): string {
    return formatOrigin(this.declaredAt)
  }

  get lineNumber(): number {
    if (this.declaredAt.kind !== "position") {
      throw new LineNumberUnavailableError(this.subject)
    }

    return this.declaredAt.line
  }

  get endLineNumber(): number {
    return this.length + this.lineNumber - 1
  }

  /**
   * The value's elements, split on the list delimiters.
   *
   * @param removeBackslashes - Remove escaping backslashes from each element.
   */
  list(removeBackslashes: boolean = true): string[] {
    this.assertComplete("iterate")
    return this.text.list(removeBackslashes)
  }

  [Symbol.iterator](): Iterator<string> {
    return this.list()[Symbol.iterator]()
  }

  toMap(): Map<string, string> {
    this.assertComplete("read")
    return this.text.toMap()
  }

  toBoolean(): boolean {
    return this.coerce(() => this.text.toBoolean())
  }

  toInt(): number {
    return this.coerce(() => this.text.toInt())
  }

  toFloat(): number {
    return this.coerce(() => this.text.toFloat())
  }

  toUrl(): string {
    return this.coerce(() => this.text.toUrl())
  }

  /**
   * The value as an absolute path.
   *
   * @param origin - Used only when the setting has no origin of its own.
   * @throws MissingOriginError if the value is relative and no origin is known.
   */
  path(origin?: string): string {
    return resolvePath(this.value, this.effectiveOrigin(origin, "path"), {
      subject: this.subject,
      logger: this.scopedLogger("path"),
    })
  }

  /**
   * Like {@link Setting.path}, with glob metacharacters of the origin's
   * directory escaped. The value itself keeps its glob meaning.
   */
  glob(origin?: string): string {
    return resolveGlobPath(this.value, this.effectiveOrigin(origin, "glob"), {
      subject: this.subject,
      logger: this.scopedLogger("glob"),
    })
  }

  /**
   * Every element resolved against this setting's own origin, in order. A
   * setting without an origin resolves against the working directory.
   */
  pathList(): string[] {
    const logger = this.scopedLogger("pathList")

    return this.list().map((element) =>
      resolvePath(element, this.origin, { subject: this.subject, logger }),
    )
  }

  /** {@link Setting.pathList} with the origin's directory glob-escaped. */
  globList(): string[] {
    const logger = this.scopedLogger("globList")

    return this.list().map((element) =>
      resolveGlobPath(element, this.origin, { subject: this.subject, logger }),
    )
  }

  /** The value; throws like {@link Setting.value} while append-pending. */
  toString(): string {
    return this.value
  }

  /** Readable even while append-pending, so fragments can be reported. */
  toJSON(): SettingJSON {
    return {
      key: this.key,
      value: this.text.value,
      origin: this.location,
      fromExternalInput: this.fromExternalInput,
      appendPending: this.appendPending,
    }
  }

  private get subject(): SettingSubject {
    return { key: this.key, location: this.location }
  }

  private assertComplete(operation: IncompleteOperation): void {
    if (this.appendPending) {
      throw new IncompleteValueError(this.subject, operation)
    }
  }

  private coerce<T>(read: () => T): T {
    this.assertComplete("read")

    try {
      return read()
    } catch (err) {
      if (err instanceof ConversionError) {
        throw new ConversionError(err.text, err.target, { subject: this.subject, cause: err })
      }
      throw err
    }
  }

  private effectiveOrigin(fallback: string | undefined, operation: string): string | undefined {
    if (this.origin !== "") return this.origin

    if (fallback !== undefined) {
      this.scopedLogger(operation).debug("Setting has no origin, using the caller's", {
        origin: fallback,
      })
    }

    return fallback
  }

  private scopedLogger(operation: string): Logger {
    return this.logger.child({
      module: "settings",
      key: this.key,
      ...(this.origin !== "" && { origin: this.origin }),
      ...(this.declaredAt.kind === "position" && { line: this.declaredAt.line }),
      operation,
    })
  }
}
