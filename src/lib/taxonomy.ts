import taxonomyData from "@/data/taxonomy.json"
import { KeywordTaxonomySchema } from "@/types"
import type { KeywordTaxonomy } from "@/types"

import { ConfigurationError } from "./errors"
import { deepFreeze } from "./freeze"

export type Taxonomy = Readonly<KeywordTaxonomy>

/**
 * Validates raw taxonomy tables and returns a frozen copy.
 * Throws {@link ConfigurationError} when any table is empty or malformed.
 */
export const loadTaxonomy = (raw: unknown): Taxonomy => {
  const result = KeywordTaxonomySchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      "Keyword taxonomy is invalid.",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    )
  }

  return deepFreeze(result.data)
}

export const TAXONOMY: Taxonomy = loadTaxonomy(taxonomyData)

export const countOccurrences = (haystack: string, needle: string): number => {
  if (!needle) return 0
  let count = 0
  let index = haystack.indexOf(needle)
  while (index !== -1) {
    count += 1
    index = haystack.indexOf(needle, index + needle.length)
  }
  return count
}

export const presentTerms = (haystack: string, terms: readonly string[]): string[] =>
  terms.filter((term) => haystack.includes(term))
