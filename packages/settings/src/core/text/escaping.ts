/**
 * Backslash-aware string helpers.
 *
 * A character preceded by a backslash is escaped: it never acts as a
 * delimiter and survives stripping. `unescape` removes the escaping
 * backslashes afterwards.
 */

/**
 * Splits `text` on every occurrence of any of `delimiters` that is not escaped.
 *
 * @param maxSplit - Maximum number of splits; `0` means unlimited.
 */
export function unescapedSplit(
  text: string,
  delimiters: readonly string[],
  maxSplit: number = 0,
): string[] {
  const active = delimiters.filter((d) => d !== "")
  const parts: string[] = []
  let current = ""
  let i = 0

  while (i < text.length) {
    const char = text.charAt(i)

    if (char === "\\") {
      current += text.slice(i, i + 2)
      i += 2
      continue
    }

    const delimiter =
      maxSplit === 0 || parts.length < maxSplit
        ? active.find((d) => text.startsWith(d, i))
        : undefined

    if (delimiter === undefined) {
      current += char
      i += 1
    } else {
      parts.push(current)
      current = ""
      i += delimiter.length
    }
  }

  parts.push(current)

  return parts
}

function countTrailingBackslashes(text: string): number {
  let count = 0

  while (count < text.length && text.charAt(text.length - 1 - count) === "\\") {
    count += 1
  }

  return count
}

/**
 * Strips surrounding whitespace, keeping a trailing whitespace character
 * that is escaped by a backslash.
 */
export function unescapedStrip(text: string): string {
  const left = text.trimStart()
  const stripped = left.trimEnd()

  if (stripped.length === left.length) return stripped

  return countTrailingBackslashes(stripped) % 2 === 1
    ? stripped + left.charAt(stripped.length)
    : stripped
}

/**
 * Removes escaping backslashes: `\x` becomes `x`, `\\` becomes `\`.
 */
export function unescape(text: string): string {
  return text.replace(/\\([\s\S])/g, "$1")
}
