/**
 * A location inside a configuration file.
 */
export type SourcePosition = Readonly<{
  file: string
  line: number
  column?: number
}>

/**
 * Where a setting was declared.
 *
 * - `none`: built in code or otherwise unknown
 * - `file`: a file, or a directory when the path ends with a separator
 * - `position`: a file plus the line the declaration starts on
 */
export type Origin =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "file"; file: string }>
  | Readonly<{ kind: "position"; file: string; line: number; column?: number }>

/** What readers hand to a setting: `""`, a path, or a position. */
export type OriginInput = string | SourcePosition
