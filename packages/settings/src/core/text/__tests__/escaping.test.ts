import { unescape, unescapedSplit, unescapedStrip } from "../escaping"

describe("unescapedSplit", () => {
  it("splits on every delimiter", () => {
    expect(unescapedSplit("a,b;c", [",", ";"])).toEqual(["a", "b", "c"])
  })

  it("does not split on an escaped delimiter", () => {
    expect(unescapedSplit("a,b\\,c", [","])).toEqual(["a", "b\\,c"])
  })

  it("splits after an escaped backslash", () => {
    expect(unescapedSplit("a\\\\,b", [","])).toEqual(["a\\\\", "b"])
  })

  it("supports multi-character delimiters", () => {
    expect(unescapedSplit("a::b:c", ["::"])).toEqual(["a", "b:c"])
  })

  it("honors maxSplit", () => {
    expect(unescapedSplit("a:b:c", [":"], 1)).toEqual(["a", "b:c"])
  })

  it("keeps empty parts", () => {
    expect(unescapedSplit(",a,,", [","])).toEqual(["", "a", "", ""])
    expect(unescapedSplit("", [","])).toEqual([""])
  })

  it("ignores empty delimiters", () => {
    expect(unescapedSplit("abc", [""])).toEqual(["abc"])
  })
})

describe("unescapedStrip", () => {
  it("strips surrounding whitespace", () => {
    expect(unescapedStrip("  a b \t")).toBe("a b")
  })

  it("keeps an escaped trailing whitespace character", () => {
    expect(unescapedStrip("a\\  ")).toBe("a\\ ")
  })

  it("strips after an escaped backslash", () => {
    expect(unescapedStrip("a\\\\  ")).toBe("a\\\\")
  })
})

describe("unescape", () => {
  it("removes escaping backslashes", () => {
    expect(unescape("a\\,b\\\\c")).toBe("a,b\\c")
  })

  it("keeps a trailing lone backslash", () => {
    expect(unescape("a\\")).toBe("a\\")
  })
})
