import type { ElementConverter, ElementSource, ListConverter } from "../../ports/converter"
import { unescapedStrip } from "../text/escaping"
import { bool, float, int, str } from "./scalars"

/**
 * Creates a converter that turns every element of a list-shaped value into a `T`.
 *
 * Elements are stripped before `element.parse` sees them. Iterating an
 * append-pending setting throws, and so does the converter.
 */
export function typedList<T>(element: ElementConverter<T>): ListConverter<T> {
  return Object.freeze({
    name: `typedList(${element.name})`,
    convert(source: ElementSource): T[] {
      return Array.from(source, (item) => element.parse(unescapedStrip(item)))
    },
  })
}

export const strList = typedList(str)

export const intList = typedList(int)

export const floatList = typedList(float)

export const boolList = typedList(bool)
