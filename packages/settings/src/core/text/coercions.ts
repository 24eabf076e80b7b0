import { ConversionError } from "../errors/errors"

const TRUE_STRINGS = new Set(["y", "yes", "yeah", "always", "sure", "definitely", "yup", "true"])
const FALSE_STRINGS = new Set(["n", "no", "nope", "never", "nah", "false"])

const INTEGER_PATTERN = /^[+-]?\d+$/
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i

const URL_PROTOCOLS = new Set(["http:", "https:", "ftp:", "ftps:"])

export function parseBoolean(text: string): boolean {
  const normalized = text.trim().toLowerCase()

  if (TRUE_STRINGS.has(normalized)) return true
  if (FALSE_STRINGS.has(normalized)) return false

  throw new ConversionError(text, "bool")
}

export function parseInteger(text: string): number {
  const trimmed = text.trim()

  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ConversionError(text, "int")
  }

  const value = Number.parseInt(trimmed, 10)

  // Beyond 2^53 a number no longer holds every integer exactly.
  if (!Number.isSafeInteger(value)) {
    throw new ConversionError(text, "int")
  }

  return value
}

export function parseDecimal(text: string): number {
  const trimmed = text.trim()

  if (DECIMAL_PATTERN.test(trimmed)) return Number(trimmed)

  const special = SPECIAL_FLOAT_PATTERN.exec(trimmed)
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  throw new ConversionError(text, "float")
}

/**
 * Accepts absolute http(s) and ftp(s) URLs with a host. Returns the text as given.
 */
export function parseUrl(text: string): string {
  const trimmed = text.trim()
  let url: URL

  try {
    url = new URL(trimmed)
  } catch (err) {
    throw new ConversionError(text, "url", { cause: err })
  }

  if (!URL_PROTOCOLS.has(url.protocol) || url.hostname === "") {
    throw new ConversionError(text, "url")
  }

  return trimmed
}
