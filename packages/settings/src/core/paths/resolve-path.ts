import path from "node:path"
import type { Logger } from "@confval/logger"
import { MissingOriginError, type SettingSubject } from "../errors/errors"
import { globEscape } from "./glob-escape"

export type ResolvePathOptions = {
  /** Escape glob metacharacters in the origin's directory. */
  escapeOrigin?: boolean

  /** Named in the error raised when no origin is available. */
  subject?: SettingSubject

  logger?: Logger
}

/**
 * The directory a relative value is resolved against: the origin itself when
 * it ends with a separator, its parent otherwise.
 */
function originDirectory(origin: string): string {
  return origin.endsWith(path.sep) || origin.endsWith("/") ? origin : path.dirname(origin)
}

function stripTrailingSeparator(resolved: string): string {
  const { root } = path.parse(resolved)

  return resolved !== root && resolved.endsWith(path.sep) ? resolved.slice(0, -1) : resolved
}

/**
 * Turns `text` into an absolute, normalized path.
 *
 * Absolute text is returned trimmed and otherwise unchanged. Relative text is
 * joined to the directory of `origin`; an empty origin stands for the working
 * directory. Nothing touches the filesystem.
 *
 * @throws MissingOriginError if `text` is relative and `origin` is missing.
 *
 * @example
 * ```ts
 * resolvePath("config.ini", "/a/b/origin.cfg")                       // "/a/b/config.ini"
 * resolvePath("x*.py", "/a/[b]/origin.cfg", { escapeOrigin: true })  // "/a/\\[b\\]/x*.py"
 * ```
 */
export function resolvePath(
  text: string,
  origin?: string,
  options: ResolvePathOptions = {},
): string {
  const trimmed = text.trim()

  if (path.isAbsolute(trimmed)) return trimmed

  if (origin === undefined) {
    throw new MissingOriginError(trimmed, options.subject)
  }

  // Absolutize before escaping: a relative origin picks up the working
  // directory here, and its metacharacters need escaping too.
  let directory = path.resolve(originDirectory(origin))

  if (options.escapeOrigin) {
    directory = globEscape(directory)
  }

  const resolved = stripTrailingSeparator(path.normalize(path.join(directory, trimmed)))

  options.logger?.debug("Resolved relative path", {
    operation: options.escapeOrigin ? "glob" : "path",
    origin,
    text: trimmed,
    path: resolved,
  })

  return resolved
}

/**
 * {@link resolvePath} with the origin's directory glob-escaped, so that only
 * `text` keeps its glob meaning.
 */
export function resolveGlobPath(
  text: string,
  origin?: string,
  options: Omit<ResolvePathOptions, "escapeOrigin"> = {},
): string {
  return resolvePath(text, origin, { ...options, escapeOrigin: true })
}
