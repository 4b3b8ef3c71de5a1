import type { AtsReport, AtsScoreBand, JobProfile, MatchResult } from "@/types"

import { analyzeJobDescription } from "./job-analyzer"
import { scoreMatch } from "./match-scorer"
import {
  EXCELLENT_SCORE_THRESHOLD,
  GOOD_SCORE_THRESHOLD,
  HIGH_PRIORITY_THRESHOLD,
  OPTIMAL_DENSITY_THRESHOLD,
} from "./scoring-policy"
import { TAXONOMY } from "./taxonomy"
import type { Taxonomy } from "./taxonomy"

export const describeAtsScore = (score: number): AtsScoreBand => {
  if (score >= EXCELLENT_SCORE_THRESHOLD) return "excellent"
  if (score >= GOOD_SCORE_THRESHOLD) return "good"
  return "needs-improvement"
}

const BAND_LABELS: Record<AtsScoreBand, string> = {
  excellent: "Excellent ATS Score",
  good: "Good ATS Score",
  "needs-improvement": "Needs Improvement",
}

export const buildAtsReport = (jobProfile: JobProfile, match: MatchResult): AtsReport => {
  const technicalMatches = Object.entries(match.technicalMatches)

  return {
    jobAnalysis: {
      totalKeywordsIdentified: jobProfile.totalImportanceScore,
      criticalTechnicalSkills: Object.values(jobProfile.technical).filter(
        (keyword) => keyword.importance >= HIGH_PRIORITY_THRESHOLD,
      ).length,
      actionVerbsInJob: jobProfile.actionVerbs.length,
      metricsExpectations: [...jobProfile.metricsExpectations],
    },
    resumePerformance: {
      atsScore: match.atsOptimizationScore,
      scoreBand: describeAtsScore(match.atsOptimizationScore),
      keywordMatchPercentage: match.matchPercentage,
      technicalKeywordsMatched: technicalMatches.length,
      missingCriticalKeywords: match.missingHighPriority.length,
      actionVerbAlignment: match.actionVerbScore,
      quantificationStrength: match.quantificationScore,
    },
    improvementOpportunities: {
      highPriorityAdditions: match.missingHighPriority.slice(0, 5),
      contentToConsiderRemoving: match.irrelevantContent.slice(0, 3),
      optimizationTips: [...match.atsOptimizationTips],
      keywordDensityStatus: match.matchPercentage > OPTIMAL_DENSITY_THRESHOLD ? "Optimal" : "Needs Improvement",
    },
    competitiveAdvantages: {
      uniqueTechnicalCombinations: technicalMatches.slice(0, 5).map(([term]) => term),
      leadershipIndicators: Object.keys(match.softSkillMatches).filter((skill) => skill.includes("leadership")).length,
      scaleExperienceHighlighted: technicalMatches.some(([, keyword]) =>
        keyword.matchedVariations.some((variation) => variation.includes("scale")),
      ),
    },
  }
}

export const generateAtsReport = (jobText: string, resumeText: string, taxonomy: Taxonomy = TAXONOMY): AtsReport => {
  const jobProfile = analyzeJobDescription(jobText, taxonomy)
  return buildAtsReport(jobProfile, scoreMatch(jobProfile, resumeText, jobText, taxonomy))
}

export const formatAtsInsights = (match: MatchResult): string[] => {
  const score = match.atsOptimizationScore
  const lines = [
    `${BAND_LABELS[describeAtsScore(score)]}: ${score.toFixed(1)}% (Match: ${match.matchPercentage.toFixed(1)}%)`,
  ]

  const technical = Object.entries(match.technicalMatches)
  if (technical.length) {
    lines.push(`Matched ${technical.length} technical keywords:`)
    technical.slice(0, 5).forEach(([term, keyword]) => {
      lines.push(`  - ${term} (variations: ${keyword.matchedVariations.slice(0, 3).join(", ")})`)
    })
  }

  if (match.missingHighPriority.length) {
    lines.push(`Missing HIGH PRIORITY keywords: ${match.missingHighPriority.slice(0, 5).join(", ")}`)
  }

  lines.push(`Action Verbs Score: ${match.actionVerbScore.toFixed(1)}%`)
  lines.push(`Quantification Score: ${match.quantificationScore.toFixed(1)}%`)

  if (match.irrelevantContent.length) {
    lines.push(`Consider removing: ${match.irrelevantContent.slice(0, 3).join(", ")}`)
  }

  if (match.atsOptimizationTips.length) {
    lines.push("ATS Optimization Tips:")
    match.atsOptimizationTips.forEach((tip) => lines.push(`  - ${tip}`))
  }

  return lines
}
