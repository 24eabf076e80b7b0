import path from "node:path"
import { escape } from "minimatch"

/**
 * Escapes glob metacharacters (`*`, `?`, `[`, `]`, `(`, `)`, `{`, `}`) so
 * that a minimatch pattern matches `segment` literally.
 *
 * On Windows, where backslash is the path separator, characters are wrapped
 * in a class instead: `[b]` becomes `[[]b[]]`.
 */
export function globEscape(segment: string): string {
  const windowsPathsNoEscape = path.sep === "\\"
  const escaped = escape(segment, { windowsPathsNoEscape })

  // minimatch's escape leaves brace expansion active.
  return escaped.replace(/[{}]/g, windowsPathsNoEscape ? "[$&]" : "\\$&")
}
