import { globEscape } from "../glob-escape"

describe("globEscape", () => {
  it("escapes glob metacharacters with backslashes", () => {
    expect(globEscape("test (1)")).toBe("test \\(1\\)")
    expect(globEscape("folder?")).toBe("folder\\?")
    expect(globEscape("a*b[c]")).toBe("a\\*b\\[c\\]")
    expect(globEscape("/a/{b,c}")).toBe("/a/\\{b,c\\}")
  })

  it("leaves plain text alone", () => {
    expect(globEscape("/home/user/project")).toBe("/home/user/project")
  })
})
