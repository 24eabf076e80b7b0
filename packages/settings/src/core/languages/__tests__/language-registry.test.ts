import { InvalidLanguageDataError, UnknownLanguageError } from "../../errors/errors"
import { defaultLanguageRegistry, LanguageRegistry } from "../language-registry"

describe("LanguageRegistry", () => {
  const registry = defaultLanguageRegistry

  it("finds a language by name, case-insensitively", () => {
    const python = registry.lookup("PYTHON")

    expect(python.name).toBe("Python")
    expect(python.aliases).toEqual(["py"])
    expect(python.versions).toHaveLength(11)
  })

  it("finds a language by alias", () => {
    expect(registry.lookup("c++").name).toBe("CPP")
    expect(registry.lookup("Objective  C").name).toBe("Objective C")
  })

  it("narrows versions by prefix", () => {
    expect(registry.lookup("py 3").versions).toEqual([
      "3.3",
      "3.4",
      "3.5",
      "3.6",
      "3.7",
      "3.8",
      "3.9",
      "3.10",
      "3.11",
      "3.12",
    ])
  })

  it("accepts several versions", () => {
    expect(registry.lookup("python 3.6, 3.7").versions).toEqual(["3.6", "3.7"])
    expect(registry.lookup("Python 2.7 3.12").versions).toEqual(["2.7", "3.12"])
  })

  it("does not treat 3.1 as a prefix of 3.10", () => {
    expect(() => registry.lookup("Python 3.1")).toThrow(
      'Unknown language "Python 3.1": Python has no version 3.1.',
    )
  })

  it("fails for unknown names", () => {
    expect(() => registry.lookup("Cobol")).toThrow(UnknownLanguageError)
    expect(registry.has("Cobol")).toBe(false)
    expect(registry.has("js 6")).toBe(true)
  })

  it("returns frozen languages", () => {
    const language = registry.lookup("ts")

    expect(Object.isFrozen(language)).toBe(true)
    expect(Object.isFrozen(language.versions)).toBe(true)
  })

  describe("fromData", () => {
    it("applies schema defaults", () => {
      const custom = LanguageRegistry.fromData([{ name: "Foo", aliases: ["f"], versions: ["1.0"] }])

      expect(custom.lookup("f 1")).toEqual({
        name: "Foo",
        aliases: ["f"],
        extensions: [],
        versions: ["1.0"],
      })
    })

    it("rejects malformed data", () => {
      expect(() => LanguageRegistry.fromData([{ aliases: [] }])).toThrow(InvalidLanguageDataError)
      expect(() => LanguageRegistry.fromData({})).toThrow(InvalidLanguageDataError)
    })
  })
})
