/**
 * Converts one textual element into a typed value.
 *
 * Implementations throw a `ConversionError` (or another `SettingError`) when
 * the text is not acceptable. They keep no state between calls.
 */
export interface ElementConverter<T> {
  /** Shown in converter names such as `typedList(int)`. */
  readonly name: string

  parse(text: string): T
}

/**
 * A setting, array or other collection of elements. A bare string is not
 * one: it would iterate character by character.
 */
export type ElementSource = Iterable<string> & object

/**
 * Builds a typed list from the elements of a list-shaped value.
 */
export interface ListConverter<T> {
  readonly name: string

  convert(source: ElementSource): T[]
}

/**
 * Anything that can present itself as ordered `key -> text` pairs.
 * Settings implement this through their dictionary view.
 */
export interface MappingView {
  toMap(): ReadonlyMap<string, string>
}

export type MappingSource =
  | MappingView
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>

/**
 * Builds a typed dictionary from a mapping-shaped value.
 */
export interface DictConverter<R> {
  readonly name: string

  convert(source: MappingSource): R
}
