import type { JobProfile, KeywordCategory, KeywordMatch, MatchResult, MatchedKeyword } from "@/types"

import { requireText } from "./errors"
import { deepFreeze } from "./freeze"
import {
  ACTION_VERB_BONUS_CAP,
  ACTION_VERB_BONUS_RATE,
  HIGH_PRIORITY_THRESHOLD,
  IRRELEVANT_PENALTY_CAP,
  IRRELEVANT_PENALTY_PER_ITEM,
  MEDIUM_PRIORITY_THRESHOLD,
  QUANTIFICATION_BONUS_CAP,
  QUANTIFICATION_BONUS_RATE,
  QUANTIFICATION_POINTS_PER_TOKEN,
  clampPercentage,
} from "./scoring-policy"
import { TAXONOMY, presentTerms } from "./taxonomy"
import type { Taxonomy } from "./taxonomy"
import { buildAtsTips } from "./tips"

type CategoryScore = {
  matches: Record<string, MatchedKeyword>
  matchedImportance: number
  possibleImportance: number
  missingHigh: string[]
  missingMedium: string[]
}

const EMPTY_CATEGORY_SCORE: CategoryScore = {
  matches: {},
  matchedImportance: 0,
  possibleImportance: 0,
  missingHigh: [],
  missingMedium: [],
}

const QUANTIFIED_TOKEN = /\d+[%+]?/g

const knownVariants = (category: KeywordCategory, keyword: KeywordMatch, taxonomy: Taxonomy): readonly string[] =>
  taxonomy[category][keyword.term] ?? keyword.matchedVariations

const scoreCategory = (
  category: KeywordCategory,
  jobProfile: JobProfile,
  resumeLower: string,
  taxonomy: Taxonomy,
): CategoryScore =>
  Object.values(jobProfile[category]).reduce<CategoryScore>((acc, keyword) => {
    const found = presentTerms(resumeLower, knownVariants(category, keyword, taxonomy))
    const possibleImportance = acc.possibleImportance + keyword.importance

    if (found.length > 0) {
      return {
        ...acc,
        possibleImportance,
        matchedImportance: acc.matchedImportance + keyword.importance,
        matches: { ...acc.matches, [keyword.term]: { matchedVariations: found, importance: keyword.importance } },
      }
    }

    if (keyword.importance >= HIGH_PRIORITY_THRESHOLD) {
      return { ...acc, possibleImportance, missingHigh: [...acc.missingHigh, keyword.term] }
    }
    if (keyword.importance >= MEDIUM_PRIORITY_THRESHOLD) {
      return { ...acc, possibleImportance, missingMedium: [...acc.missingMedium, keyword.term] }
    }
    return { ...acc, possibleImportance }
  }, EMPTY_CATEGORY_SCORE)

export const computeActionVerbScore = (jobVerbs: readonly string[], resumeLower: string): number =>
  (presentTerms(resumeLower, jobVerbs).length / Math.max(1, jobVerbs.length)) * 100

export const computeQuantificationScore = (resumeText: string): number =>
  Math.min(100, (resumeText.match(QUANTIFIED_TOKEN)?.length ?? 0) * QUANTIFICATION_POINTS_PER_TOKEN)

const jobSignalsSeniority = (jobProfile: JobProfile, jobLower: string, taxonomy: Taxonomy) => {
  const corpus = [
    jobLower,
    ...Object.keys(jobProfile.technical),
    ...Object.keys(jobProfile.softSkills),
    ...Object.keys(jobProfile.industry),
    ...jobProfile.actionVerbs,
    ...jobProfile.metricsExpectations,
  ].join(" ")
  return taxonomy.irrelevance.seniorityMarkers.some((marker) => corpus.includes(marker))
}

export const detectIrrelevantContent = (
  resumeText: string,
  jobProfile: JobProfile,
  jobText = "",
  taxonomy: Taxonomy = TAXONOMY,
): string[] => {
  const resumeLower = resumeText.toLowerCase()
  const rules = taxonomy.irrelevance
  const jobTechnical = Object.keys(jobProfile.technical)

  const technicalJob = rules.technicalJobMarkers.some((marker) => jobTechnical.includes(marker))
  const interests = technicalJob
    ? presentTerms(resumeLower, rules.personalInterests)
        .filter((interest) => !rules.professionallyRelevantInterests.includes(interest))
        .map((interest) => `Personal interest: ${interest}`)
    : []

  const junior = jobSignalsSeniority(jobProfile, jobText.toLowerCase(), taxonomy)
    ? presentTerms(resumeLower, rules.juniorTerms).map((term) => `Junior-level reference: ${term}`)
    : []

  const outdated = presentTerms(resumeLower, rules.obsoleteTechnologies)
    .filter((tech) => !jobTechnical.includes(tech))
    .map((tech) => `Potentially outdated technology: ${tech}`)

  return [...interests, ...junior, ...outdated]
}

/**
 * The resume is re-scanned for each job keyword's variants so that
 * `matchedVariations` lists the surface forms that actually appear.
 */
export const scoreMatch = (
  jobProfile: JobProfile,
  resumeText: string,
  jobText: string,
  taxonomy: Taxonomy = TAXONOMY,
): MatchResult => {
  const resumeLower = requireText(resumeText, "resumeText").toLowerCase()
  requireText(jobText, "jobText")

  const technical = scoreCategory("technical", jobProfile, resumeLower, taxonomy)
  const softSkills = scoreCategory("softSkills", jobProfile, resumeLower, taxonomy)
  const industry = scoreCategory("industry", jobProfile, resumeLower, taxonomy)
  const categories = [technical, softSkills, industry]

  const matchedImportance = categories.reduce((sum, category) => sum + category.matchedImportance, 0)
  const possibleImportance = categories.reduce((sum, category) => sum + category.possibleImportance, 0)
  const missingHighPriority = categories.flatMap((category) => category.missingHigh)
  const missingMediumPriority = categories.flatMap((category) => category.missingMedium)

  const actionVerbScore = computeActionVerbScore(jobProfile.actionVerbs, resumeLower)
  const quantificationScore = computeQuantificationScore(resumeText)
  const irrelevantContent = detectIrrelevantContent(resumeText, jobProfile, jobText, taxonomy)

  const matchPercentage = (matchedImportance / Math.max(1, possibleImportance)) * 100
  const atsOptimizationScore = clampPercentage(
    matchPercentage +
      Math.min(ACTION_VERB_BONUS_CAP, actionVerbScore * ACTION_VERB_BONUS_RATE) +
      Math.min(QUANTIFICATION_BONUS_CAP, quantificationScore * QUANTIFICATION_BONUS_RATE) -
      Math.min(IRRELEVANT_PENALTY_CAP, irrelevantContent.length * IRRELEVANT_PENALTY_PER_ITEM),
  )

  return deepFreeze({
    technicalMatches: technical.matches,
    softSkillMatches: softSkills.matches,
    industryMatches: industry.matches,
    missingHighPriority,
    missingMediumPriority,
    actionVerbScore,
    quantificationScore,
    atsOptimizationScore,
    matchPercentage,
    irrelevantContent,
    atsOptimizationTips: buildAtsTips({ missingHighPriority, actionVerbScore, quantificationScore, irrelevantContent }),
  })
}
