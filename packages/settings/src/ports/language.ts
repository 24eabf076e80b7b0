/**
 * A programming or markup language, narrowed to the versions that were asked for.
 */
export type Language = Readonly<{
  name: string
  aliases: readonly string[]
  extensions: readonly string[]
  versions: readonly string[]
}>

export interface LanguageLookup {
  /**
   * Finds a language by name or alias, optionally followed by versions,
   * e.g. `"Python"`, `"py 3"` or `"python 3.6, 3.7"`.
   *
   * @throws UnknownLanguageError if the name or a version is not known.
   */
  lookup(query: string): Language
}
