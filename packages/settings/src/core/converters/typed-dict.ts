import type {
  DictConverter,
  ElementConverter,
  MappingSource,
  MappingView,
} from "../../ports/converter"
import { unescapedStrip } from "../text/escaping"

function isMappingView(source: MappingSource): source is MappingView {
  return "toMap" in source && typeof source.toMap === "function"
}

function isReadonlyMap(source: MappingSource): source is ReadonlyMap<string, string> {
  return source instanceof Map
}

function entriesOf(source: MappingSource): Iterable<readonly [string, string]> {
  if (isReadonlyMap(source)) return source.entries()
  if (isMappingView(source)) return source.toMap().entries()

  return Object.entries(source)
}

function formatDefault(value: unknown): string {
  if (value === undefined) return "undefined"
  if (typeof value === "string") return JSON.stringify(value)

  return JSON.stringify(value) ?? String(value)
}

function* convertEntries<K, V, D>(
  source: MappingSource,
  key: ElementConverter<K>,
  value: ElementConverter<V>,
  defaultForEmpty: D,
): Generator<[K, V | D]> {
  for (const [rawKey, rawValue] of entriesOf(source)) {
    // `key=` means "use the default", not "convert the empty string".
    const converted = rawValue === "" ? defaultForEmpty : value.parse(unescapedStrip(rawValue))

    yield [key.parse(unescapedStrip(rawKey)), converted]
  }
}

/**
 * Creates a converter producing a plain object. Key order is not significant;
 * use {@link typedOrderedDict} where it is.
 *
 * @example
 * ```ts
 * typedDict(str, int, 0).convert({ a: "1", b: "" }) // { a: 1, b: 0 }
 * ```
 */
export function typedDict<K extends string | number, V, D>(
  key: ElementConverter<K>,
  value: ElementConverter<V>,
  defaultForEmpty: D,
): DictConverter<Record<string, V | D>> {
  return Object.freeze({
    name: `typedDict(${key.name}, ${value.name}, default=${formatDefault(defaultForEmpty)})`,
    convert(source: MappingSource): Record<string, V | D> {
      return Object.fromEntries(convertEntries(source, key, value, defaultForEmpty))
    },
  })
}

/**
 * Like {@link typedDict}, but returns a `Map` in the source's insertion order.
 */
export function typedOrderedDict<K, V, D>(
  key: ElementConverter<K>,
  value: ElementConverter<V>,
  defaultForEmpty: D,
): DictConverter<Map<K, V | D>> {
  return Object.freeze({
    name: `typedOrderedDict(${key.name}, ${value.name}, default=${formatDefault(defaultForEmpty)})`,
    convert(source: MappingSource): Map<K, V | D> {
      return new Map(convertEntries(source, key, value, defaultForEmpty))
    },
  })
}
