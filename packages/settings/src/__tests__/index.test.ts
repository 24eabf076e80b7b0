import {
  IncompleteValueError,
  intList,
  serializeSettingError,
  Setting,
  toLanguage,
  typedDict,
  typedList,
  language,
  str,
  int,
} from "../index"

describe("public API", () => {
  it("reads a section's worth of settings the way a linter would", () => {
    const origin = "/project/.lintrc"
    const settings = {
      files: new Setting("files", "src/**/*.py, tests/*.py", { origin }),
      maxLineLength: new Setting("max_line_length", "79", { origin }),
      languages: new Setting("languages", "Python 3.8, JavaScript", { origin }),
      severities: new Setting("severities", "E501: 2, W291:", { origin }),
      tabWidths: new Setting("tab_widths", "2, 4, 8", { origin }),
    }

    expect(settings.files.globList()).toEqual(["/project/src/**/*.py", "/project/tests/*.py"])
    expect(settings.maxLineLength.toInt()).toBe(79)
    expect(typedList(language).convert(settings.languages).map((l) => l.versions)).toEqual([
      ["3.8"],
      ["5.1", "6", "7", "8"],
    ])
    expect(typedDict(str, int, 1).convert(settings.severities)).toEqual({ E501: 2, W291: 1 })
    expect(intList.convert(settings.tabWidths)).toEqual([2, 4, 8])
    expect(toLanguage("ts").name).toBe("TypeScript")
  })

  it("serializes errors with the setting's key for reporting", () => {
    const fragment = new Setting("ignore", "build/", {
      origin: { file: "/project/.lintrc", line: 9 },
      appendPending: true,
    })

    let caught: unknown
    try {
      fragment.list()
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(IncompleteValueError)
    expect(serializeSettingError(caught)).toMatchObject({
      name: "IncompleteValueError",
      code: "incomplete_value",
      context: { key: "ignore", location: "/project/.lintrc:9", operation: "iterate" },
    })
  })
})
