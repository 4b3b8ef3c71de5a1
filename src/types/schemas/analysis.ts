import { z } from "zod"

import { CompanyTypeSchema, EducationLevelSchema } from "./taxonomy"

export const KeywordMatchSchema = z.object({
  term: z.string().min(1),
  mentions: z.number().int().min(0),
  matchedVariations: z.array(z.string()),
  importance: z.number().int().min(0),
})
export type KeywordMatch = z.infer<typeof KeywordMatchSchema>

export const KeywordCategorySchema = z.enum(["technical", "softSkills", "industry"])
export type KeywordCategory = z.infer<typeof KeywordCategorySchema>

export const JobProfileSchema = z.object({
  technical: z.record(KeywordMatchSchema),
  softSkills: z.record(KeywordMatchSchema),
  industry: z.record(KeywordMatchSchema),
  actionVerbs: z.array(z.string()),
  metricsExpectations: z.array(z.string()),
  totalImportanceScore: z.number().int().min(0),
})
export type JobProfile = z.infer<typeof JobProfileSchema>

export const ResumeProfileSchema = z.object({
  technical: z.array(z.string()),
  leadershipExperience: z.array(z.string()),
  yearsExperience: z.number().int().min(0),
  educationLevel: EducationLevelSchema,
  companyTypes: z.array(CompanyTypeSchema),
})
export type ResumeProfile = z.infer<typeof ResumeProfileSchema>

export const ExperienceLevelSchema = z.enum(["junior", "mid", "senior"])
export type ExperienceLevel = z.infer<typeof ExperienceLevelSchema>

export const JobRequirementsSchema = z.object({
  technicalSkills: z.array(z.string()),
  softSkills: z.array(z.string()),
  experienceLevel: ExperienceLevelSchema,
  leadershipRequired: z.boolean(),
  industry: z.string(),
})
export type JobRequirements = z.infer<typeof JobRequirementsSchema>
