import { z } from "zod"
import type { Language, LanguageLookup } from "../../ports/language"
import { InvalidLanguageDataError, UnknownLanguageError } from "../errors/errors"
import languageData from "./languages.json"

export const languageDefinitionSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  extensions: z.array(z.string()).default([]),
  versions: z.array(z.string().min(1)).default([]),
})

export type LanguageDefinition = z.infer<typeof languageDefinitionSchema>

const languageDataSchema = z.array(languageDefinitionSchema)

function normalizeName(name: string): string {
  return name.trim().split(/\s+/).join(" ").toLowerCase()
}

/** A version like "3" selects "3", "3.4", "3.4.1"; it never selects "30". */
function selectsVersion(requested: string, version: string): boolean {
  return version === requested || version.startsWith(`${requested}.`)
}

function splitQuery(query: string): { name: string; versions: string[] } {
  const tokens = query.trim().split(/[\s,]+/).filter((token) => token !== "")
  let nameEnd = tokens.length

  while (nameEnd > 1 && /^\d/.test(tokens[nameEnd - 1] ?? "")) {
    nameEnd -= 1
  }

  return {
    name: normalizeName(tokens.slice(0, nameEnd).join(" ")),
    versions: tokens.slice(nameEnd),
  }
}

export class LanguageRegistry implements LanguageLookup {
  private readonly index = new Map<string, LanguageDefinition>()

  constructor(readonly definitions: readonly LanguageDefinition[]) {
    for (const definition of definitions) {
      for (const name of [definition.name, ...definition.aliases]) {
        this.index.set(normalizeName(name), definition)
      }
    }
  }

  /**
   * Validates raw definitions (e.g. parsed JSON) and builds a registry.
   *
   * @throws InvalidLanguageDataError if the data does not match the schema.
   */
  static fromData(data: unknown): LanguageRegistry {
    const result = languageDataSchema.safeParse(data)

    if (!result.success) {
      throw new InvalidLanguageDataError(z.prettifyError(result.error))
    }

    return new LanguageRegistry(result.data)
  }

  has(query: string): boolean {
    return this.index.has(splitQuery(query).name)
  }

  lookup(query: string): Language {
    const { name, versions: requested } = splitQuery(query)
    const definition = this.index.get(name)

    if (definition === undefined) {
      throw new UnknownLanguageError(query, "no language with this name or alias")
    }

    let versions = definition.versions

    if (requested.length > 0) {
      const selected = new Set<string>()

      for (const version of requested) {
        const matches = definition.versions.filter((v) => selectsVersion(version, v))

        if (matches.length === 0) {
          throw new UnknownLanguageError(
            query,
            `${definition.name} has no version ${version}`,
          )
        }

        for (const match of matches) selected.add(match)
      }

      versions = definition.versions.filter((v) => selected.has(v))
    }

    return Object.freeze({
      name: definition.name,
      aliases: Object.freeze([...definition.aliases]),
      extensions: Object.freeze([...definition.extensions]),
      versions: Object.freeze(versions),
    })
  }
}

export const defaultLanguageRegistry: LanguageRegistry = LanguageRegistry.fromData(languageData)
