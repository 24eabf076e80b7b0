import { ConversionError, IncompleteValueError } from "../../errors/errors"
import { Setting } from "../../setting/setting"
import { bool, elementConverter, int, str } from "../scalars"
import { typedDict, typedOrderedDict } from "../typed-dict"

describe("typedDict", () => {
  const converter = typedDict(str, int, 0)

  it("uses the default for empty values", () => {
    expect(converter.convert({ a: "1", b: "" })).toEqual({ a: 1, b: 0 })
  })

  it("reads a setting's dictionary view", () => {
    expect(converter.convert(new Setting("weights", "a: 1, b:"))).toEqual({ a: 1, b: 0 })
  })

  it("reads a Map", () => {
    expect(converter.convert(new Map([["x", " 5 "]]))).toEqual({ x: 5 })
  })

  it("converts keys", () => {
    const byLine = typedDict(int, str, null)

    expect(byLine.convert({ "2": "b", "1": "a", "3": "" })).toEqual({ "1": "a", "2": "b", "3": null })
  })

  it("propagates value conversion failures", () => {
    expect(() => converter.convert({ a: "one" })).toThrow(ConversionError)
  })

  it("fails on an append-pending setting", () => {
    const fragment = new Setting("weights", "a: 1", { appendPending: true })

    expect(() => converter.convert(fragment)).toThrow(IncompleteValueError)
  })

  it("has a readable name", () => {
    expect(converter.name).toBe("typedDict(str, int, default=0)")
  })
})

describe("typedOrderedDict", () => {
  it("keeps the declaration order of the source", () => {
    const ranked = typedOrderedDict(str, int, -1)

    expect([...ranked.convert(new Setting("ranks", "z: 1, a: 2, m:"))]).toEqual([
      ["z", 1],
      ["a", 2],
      ["m", -1],
    ])
  })

  it("supports custom element converters", () => {
    const upper = elementConverter("upper", (text) => text.toUpperCase())
    const flags = typedOrderedDict(upper, bool, false)

    expect(flags.convert(new Setting("flags", "fast: yes, safe"))).toEqual(
      new Map([
        ["FAST", true],
        ["SAFE", false],
      ]),
    )
  })

  it("has a readable name", () => {
    expect(typedOrderedDict(str, bool, "x").name).toBe('typedOrderedDict(str, bool, default="x")')
  })
})
