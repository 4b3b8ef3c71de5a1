import { z } from "zod"

const percentage = z.number().min(0).max(100)

export const MatchedKeywordSchema = z.object({
  matchedVariations: z.array(z.string()),
  importance: z.number().int().min(0),
})
export type MatchedKeyword = z.infer<typeof MatchedKeywordSchema>

export const MatchResultSchema = z.object({
  technicalMatches: z.record(MatchedKeywordSchema),
  softSkillMatches: z.record(MatchedKeywordSchema),
  industryMatches: z.record(MatchedKeywordSchema),
  missingHighPriority: z.array(z.string()),
  missingMediumPriority: z.array(z.string()),
  actionVerbScore: percentage,
  quantificationScore: percentage,
  atsOptimizationScore: percentage,
  matchPercentage: percentage,
  irrelevantContent: z.array(z.string()),
  atsOptimizationTips: z.array(z.string()).max(4),
})

export type MatchResult = z.infer<typeof MatchResultSchema>

export const AtsScoreBandSchema = z.enum(["excellent", "good", "needs-improvement"])
export type AtsScoreBand = z.infer<typeof AtsScoreBandSchema>

export const KeywordDensityStatusSchema = z.enum(["Optimal", "Needs Improvement"])

export const AtsReportSchema = z.object({
  jobAnalysis: z.object({
    totalKeywordsIdentified: z.number().int().min(0),
    criticalTechnicalSkills: z.number().int().min(0),
    actionVerbsInJob: z.number().int().min(0),
    metricsExpectations: z.array(z.string()),
  }),
  resumePerformance: z.object({
    atsScore: percentage,
    scoreBand: AtsScoreBandSchema,
    keywordMatchPercentage: percentage,
    technicalKeywordsMatched: z.number().int().min(0),
    missingCriticalKeywords: z.number().int().min(0),
    actionVerbAlignment: percentage,
    quantificationStrength: percentage,
  }),
  improvementOpportunities: z.object({
    highPriorityAdditions: z.array(z.string()).max(5),
    contentToConsiderRemoving: z.array(z.string()).max(3),
    optimizationTips: z.array(z.string()).max(4),
    keywordDensityStatus: KeywordDensityStatusSchema,
  }),
  competitiveAdvantages: z.object({
    uniqueTechnicalCombinations: z.array(z.string()).max(5),
    leadershipIndicators: z.number().int().min(0),
    scaleExperienceHighlighted: z.boolean(),
  }),
})

export type AtsReport = z.infer<typeof AtsReportSchema>
