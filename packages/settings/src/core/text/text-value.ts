import { parseBoolean, parseDecimal, parseInteger, parseUrl } from "./coercions"
import { unescape, unescapedSplit, unescapedStrip } from "./escaping"

export type TextValueOptions = {
  /**
   * Strip unescaped surrounding whitespace from the value and from every
   * list element, dictionary key and dictionary value.
   * @default true
   */
  stripWhitespace?: boolean

  /**
   * Any of these splits the value into list elements unless escaped.
   * @default [",", ";"]
   */
  listDelimiters?: readonly string[]

  /**
   * Separates a key from its value inside a list element.
   * @default ":"
   */
  dictDelimiter?: string

  /**
   * Drop elements that are empty after stripping.
   * @default true
   */
  removeEmptyElements?: boolean
}

export const DEFAULT_LIST_DELIMITERS: readonly string[] = Object.freeze([",", ";"])

/**
 * Raw configuration text with list, dictionary and scalar views.
 *
 * Every view is recomputed from the stored text, so a TextValue can be read
 * any number of times and each list returned is a fresh array.
 *
 * @example
 * ```ts
 * const text = new TextValue(" a, b\\,c ;; d ")
 *
 * text.value  // "a, b\\,c ;; d"
 * text.list() // ["a", "b,c", "d"]
 * ```
 */
export class TextValue implements Iterable<string> {
  readonly value: string
  readonly stripWhitespace: boolean
  readonly listDelimiters: readonly string[]
  readonly dictDelimiter: string
  readonly removeEmptyElements: boolean

  constructor(value: string, options: TextValueOptions = {}) {
    this.stripWhitespace = options.stripWhitespace ?? true
    this.listDelimiters = Object.freeze([...(options.listDelimiters ?? DEFAULT_LIST_DELIMITERS)])
    this.dictDelimiter = options.dictDelimiter ?? ":"
    this.removeEmptyElements = options.removeEmptyElements ?? true
    this.value = this.stripWhitespace ? unescapedStrip(value) : value
  }

  toString(): string {
    return this.value
  }

  /**
   * Splits the value into elements.
   *
   * @param removeBackslashes - Remove escaping backslashes from each element.
   */
  list(removeBackslashes: boolean = true): string[] {
    let elements = unescapedSplit(this.value, this.listDelimiters)

    if (this.stripWhitespace) {
      elements = elements.map(unescapedStrip)
    }

    // Emptiness is judged on the escaped form: "\\ " is not empty.
    if (this.removeEmptyElements) {
      elements = elements.filter((element) => element !== "")
    }

    return removeBackslashes ? elements.map(unescape) : elements
  }

  [Symbol.iterator](): Iterator<string> {
    return this.list()[Symbol.iterator]()
  }

  /**
   * Reads the value as `key: value` pairs separated by the list delimiters.
   *
   * A key without a delimiter maps to the empty string. Insertion order is kept.
   */
  toMap(): Map<string, string> {
    const entries = new Map<string, string>()

    for (const element of unescapedSplit(this.value, this.listDelimiters)) {
      let parts = unescapedSplit(element, [this.dictDelimiter], 1)

      if (this.stripWhitespace) {
        parts = parts.map(unescapedStrip)
      }

      const [key = "", value = ""] = parts.map(unescape)

      if (key === "" && value === "") continue

      entries.set(key, value)
    }

    return entries
  }

  keys(): string[] {
    return [...this.toMap().keys()]
  }

  get(key: string): string | undefined {
    return this.toMap().get(key)
  }

  toBoolean(): boolean {
    return parseBoolean(this.value)
  }

  toInt(): number {
    return parseInteger(this.value)
  }

  toFloat(): number {
    return parseDecimal(this.value)
  }

  toUrl(): string {
    return parseUrl(this.value)
  }

  equals(other: TextValue | string): boolean {
    return this.value === String(other)
  }
}
