import type { CompanyType, EducationLevel, ResumeProfile } from "@/types"

import { requireText } from "./errors"
import { deepFreeze } from "./freeze"
import { TAXONOMY, presentTerms } from "./taxonomy"
import type { Taxonomy } from "./taxonomy"

const includesAny = (lowered: string, triggers: readonly string[]) =>
  triggers.some((trigger) => lowered.includes(trigger))

// Only the literal phrases in the table are recognized; "7+ years" yields 0.
const extractYearsExperience = (lowered: string, taxonomy: Taxonomy): number =>
  taxonomy.resumeSignals.yearsExperience.find((rule) => includesAny(lowered, rule.phrases))?.years ?? 0

// Last matching rule wins when a resume mentions several degrees.
const classifyEducation = (lowered: string, taxonomy: Taxonomy): EducationLevel =>
  taxonomy.resumeSignals.educationLevels.reduce<EducationLevel>(
    (level, rule) => (includesAny(lowered, rule.triggers) ? rule.level : level),
    "bachelor",
  )

const classifyCompanyTypes = (lowered: string, taxonomy: Taxonomy): CompanyType[] =>
  taxonomy.resumeSignals.companyTypes
    .filter((rule) => includesAny(lowered, rule.triggers))
    .map((rule) => rule.type)

export const analyzeResume = (resumeText: string, taxonomy: Taxonomy = TAXONOMY): ResumeProfile => {
  const lowered = requireText(resumeText, "resumeText").toLowerCase()

  return deepFreeze({
    technical: presentTerms(lowered, Object.keys(taxonomy.technical)),
    leadershipExperience: presentTerms(lowered, taxonomy.resumeSignals.leadership),
    yearsExperience: extractYearsExperience(lowered, taxonomy),
    educationLevel: classifyEducation(lowered, taxonomy),
    companyTypes: Array.from(new Set(classifyCompanyTypes(lowered, taxonomy))),
  })
}
