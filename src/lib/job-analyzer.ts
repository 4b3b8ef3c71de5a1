import type { JobProfile, KeywordMatch } from "@/types"

import { requireText } from "./errors"
import { deepFreeze } from "./freeze"
import {
  INDUSTRY_IMPORTANCE_CAP,
  MENTION_WEIGHT,
  SOFT_SKILL_IMPORTANCE_CAP,
  TECHNICAL_IMPORTANCE_CAP,
} from "./scoring-policy"
import { TAXONOMY, countOccurrences, presentTerms } from "./taxonomy"
import type { Taxonomy } from "./taxonomy"

type VariantTable = Readonly<Record<string, readonly string[]>>
type ImportanceFormula = (mentions: number, variationsFound: number) => number

const technicalImportance: ImportanceFormula = (mentions, variationsFound) =>
  Math.min(TECHNICAL_IMPORTANCE_CAP, mentions * MENTION_WEIGHT + variationsFound)

const cappedMentions =
  (cap: number): ImportanceFormula =>
  (mentions) =>
    Math.min(cap, mentions * MENTION_WEIGHT)

const scanTable = (
  lowered: string,
  table: VariantTable,
  importanceOf: ImportanceFormula,
): Record<string, KeywordMatch> =>
  Object.entries(table).reduce<Record<string, KeywordMatch>>((profile, [term, variants]) => {
    const counted = variants.map((variant) => [variant, countOccurrences(lowered, variant)] as const)
    const found = counted.filter(([, count]) => count > 0)
    const mentions = found.reduce((sum, [, count]) => sum + count, 0)
    if (mentions === 0) return profile

    return {
      ...profile,
      [term]: {
        term,
        mentions,
        matchedVariations: found.map(([variant]) => variant),
        importance: importanceOf(mentions, found.length),
      },
    }
  }, {})

const sumImportance = (table: Record<string, KeywordMatch>) =>
  Object.values(table).reduce((sum, match) => sum + match.importance, 0)

export const extractMetricsExpectations = (lowered: string, taxonomy: Taxonomy = TAXONOMY): string[] => {
  const numeric = taxonomy.metricPatterns.flatMap((source) =>
    Array.from(lowered.matchAll(new RegExp(source, "g")), (match) => match[0]),
  )
  const context = presentTerms(lowered, taxonomy.metricContextWords)
  return Array.from(new Set([...numeric, ...context]))
}

export const extractActionVerbs = (lowered: string, taxonomy: Taxonomy = TAXONOMY): string[] =>
  presentTerms(lowered, taxonomy.actionVerbs)

/**
 * Matching is case-insensitive substring containment, so "develop" also counts
 * inside "developer". Repeated mentions raise importance up to the category cap.
 */
export const analyzeJobDescription = (jobText: string, taxonomy: Taxonomy = TAXONOMY): JobProfile => {
  const lowered = requireText(jobText, "jobText").toLowerCase()

  const technical = scanTable(lowered, taxonomy.technical, technicalImportance)
  const softSkills = scanTable(lowered, taxonomy.softSkills, cappedMentions(SOFT_SKILL_IMPORTANCE_CAP))
  const industry = scanTable(lowered, taxonomy.industry, cappedMentions(INDUSTRY_IMPORTANCE_CAP))

  return deepFreeze({
    technical,
    softSkills,
    industry,
    actionVerbs: extractActionVerbs(lowered, taxonomy),
    metricsExpectations: extractMetricsExpectations(lowered, taxonomy),
    totalImportanceScore: sumImportance(technical) + sumImportance(softSkills) + sumImportance(industry),
  })
}
