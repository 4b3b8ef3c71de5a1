export {
  KeywordTaxonomySchema,
  EducationLevelSchema,
  CompanyTypeSchema,
} from "./schemas/taxonomy"
export type { KeywordTaxonomy, EducationLevel, CompanyType } from "./schemas/taxonomy"

export {
  KeywordMatchSchema,
  KeywordCategorySchema,
  JobProfileSchema,
  ResumeProfileSchema,
  ExperienceLevelSchema,
  JobRequirementsSchema,
} from "./schemas/analysis"
export type {
  KeywordMatch,
  KeywordCategory,
  JobProfile,
  ResumeProfile,
  ExperienceLevel,
  JobRequirements,
} from "./schemas/analysis"

export {
  MatchedKeywordSchema,
  MatchResultSchema,
  AtsScoreBandSchema,
  KeywordDensityStatusSchema,
  AtsReportSchema,
} from "./schemas/match"
export type { MatchedKeyword, MatchResult, AtsScoreBand, AtsReport } from "./schemas/match"

export { AppConfigSchema } from "./schemas/config"
export type { AppConfigEnv } from "./schemas/config"
