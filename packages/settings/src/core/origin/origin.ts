import type { Origin, OriginInput } from "../../ports/origin"

const NO_ORIGIN: Origin = { kind: "none" }

export function toOrigin(input: OriginInput): Origin {
  if (typeof input === "string") {
    return input === "" ? NO_ORIGIN : { kind: "file", file: input }
  }

  const { file, line, column } = input

  return column === undefined
    ? { kind: "position", file, line }
    : { kind: "position", file, line, column }
}

/** The origin's file path, or `""` when there is none. */
export function originFile(origin: Origin): string {
  return origin.kind === "none" ? "" : origin.file
}

/**
 * Renders an origin for messages: `file:line`, `file` or `""`.
 */
export function formatOrigin(origin: Origin): string {
  switch (origin.kind) {
    case "none":
      return ""
    case "file":
      return origin.file
    case "position":
      return `${origin.file}:${origin.line}`
  }
}
