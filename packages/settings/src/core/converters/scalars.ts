import type { ElementConverter } from "../../ports/converter"
import { parseBoolean, parseDecimal, parseInteger, parseUrl } from "../text/coercions"

export const str: ElementConverter<string> = {
  name: "str",
  parse: (text) => text,
}

export const int: ElementConverter<number> = {
  name: "int",
  parse: parseInteger,
}

export const float: ElementConverter<number> = {
  name: "float",
  parse: parseDecimal,
}

export const bool: ElementConverter<boolean> = {
  name: "bool",
  parse: parseBoolean,
}

export const url: ElementConverter<string> = {
  name: "url",
  parse: parseUrl,
}

/**
 * Wraps a plain function as an {@link ElementConverter}.
 *
 * @example
 * ```ts
 * const upper = elementConverter("upper", (text) => text.toUpperCase())
 * ```
 */
export function elementConverter<T>(name: string, parse: (text: string) => T): ElementConverter<T> {
  return { name, parse }
}
