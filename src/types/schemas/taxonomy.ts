import { z } from "zod"

const termList = z.array(z.string().trim().toLowerCase().min(1)).min(1)

const canonicalTerm = z
  .string()
  .min(1)
  .refine((term) => term === term.trim().toLowerCase(), "Canonical terms must be trimmed and lowercase.")

const variantTable = z
  .record(canonicalTerm, termList)
  .refine((table) => Object.keys(table).length > 0, "Table must define at least one term.")

const isCompilablePattern = (source: string) => {
  try {
    new RegExp(source)
    return true
  } catch {
    return false
  }
}

export const EducationLevelSchema = z.enum(["bachelor", "master", "phd"])
export type EducationLevel = z.infer<typeof EducationLevelSchema>

export const CompanyTypeSchema = z.enum(["startup", "enterprise"])
export type CompanyType = z.infer<typeof CompanyTypeSchema>

export const KeywordTaxonomySchema = z.object({
  technical: variantTable,
  softSkills: variantTable,
  industry: variantTable,
  actionVerbs: termList,
  metricPatterns: z.array(z.string().min(1).refine(isCompilablePattern, "Metric pattern is not a valid regular expression.")).min(1),
  metricContextWords: termList,
  irrelevance: z.object({
    personalInterests: termList,
    professionallyRelevantInterests: termList,
    technicalJobMarkers: termList,
    seniorityMarkers: termList,
    juniorTerms: termList,
    obsoleteTechnologies: termList,
  }),
  resumeSignals: z.object({
    leadership: termList,
    yearsExperience: z
      .array(z.object({ phrases: termList, years: z.number().int().positive() }))
      .min(1),
    educationLevels: z
      .array(z.object({ level: EducationLevelSchema, triggers: termList }))
      .min(1),
    companyTypes: z
      .array(z.object({ type: CompanyTypeSchema, triggers: termList }))
      .min(1),
  }),
})

export type KeywordTaxonomy = z.infer<typeof KeywordTaxonomySchema>
