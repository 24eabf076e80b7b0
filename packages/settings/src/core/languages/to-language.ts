import type { ElementConverter } from "../../ports/converter"
import type { Language, LanguageLookup } from "../../ports/language"
import { InvalidLanguageError, UnknownLanguageError } from "../errors/errors"
import { defaultLanguageRegistry } from "./language-registry"

/**
 * Looks up `name` in `registry`.
 *
 * @throws InvalidLanguageError wrapping the registry's UnknownLanguageError.
 */
export function toLanguage(
  name: string,
  registry: LanguageLookup = defaultLanguageRegistry,
): Language {
  try {
    return registry.lookup(name)
  } catch (err) {
    if (err instanceof UnknownLanguageError) {
      throw new InvalidLanguageError(name, err)
    }
    throw err
  }
}

export function languageConverter(
  registry: LanguageLookup = defaultLanguageRegistry,
): ElementConverter<Language> {
  return {
    name: "language",
    parse: (text) => toLanguage(text, registry),
  }
}

export const language: ElementConverter<Language> = languageConverter()
