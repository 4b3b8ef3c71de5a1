import { z } from "zod"

import jobIndicatorData from "@/data/job-indicators.json"

import { ConfigurationError } from "./errors"

export type ValidationResult = { valid: true } | { valid: false; error: string }

const terms = z.array(z.string().min(1)).min(1)

const JobIndicatorsSchema = z.object({
  categories: z.object({
    roleTitles: terms,
    jobSections: terms,
    actionVerbs: terms,
    technicalTerms: terms,
    companyIndicators: terms,
    employmentTerms: terms,
  }),
  compensation: terms,
  location: terms,
})

const parsedIndicators = JobIndicatorsSchema.safeParse(jobIndicatorData)
if (!parsedIndicators.success) {
  throw new ConfigurationError(
    "Job indicator tables are invalid.",
    parsedIndicators.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  )
}
const JOB_INDICATORS = parsedIndicators.data

const MIN_CONFIDENCE = 3
const CONFIDENCE_CHECKS = 7

export type JobDescriptionLimits = {
  minLength: number
  maxLength: number
}

export const DEFAULT_JOB_DESCRIPTION_LIMITS: JobDescriptionLimits = { minLength: 100, maxLength: 10_000 }

const countPresent = (lowered: string, list: readonly string[]) => list.filter((term) => lowered.includes(term)).length

/**
 * Checks that pasted text looks like a job posting. Seven independent indicators
 * are evaluated and at least three must hold.
 */
export const validateJobDescription = (
  text: string,
  limits: JobDescriptionLimits = DEFAULT_JOB_DESCRIPTION_LIMITS,
): ValidationResult => {
  const trimmed = text.trim()
  if (!trimmed) {
    return { valid: false, error: "Job description cannot be empty." }
  }
  if (trimmed.length < limits.minLength) {
    return {
      valid: false,
      error: `Job description is too short. Please provide at least ${limits.minLength} characters.`,
    }
  }
  if (trimmed.length > limits.maxLength) {
    return {
      valid: false,
      error: `Job description is too long. Please limit to ${limits.maxLength} characters.`,
    }
  }

  const lowered = trimmed.toLowerCase()
  const scores = Object.fromEntries(
    Object.entries(JOB_INDICATORS.categories).map(([category, list]) => [category, countPresent(lowered, list)]),
  )
  const categoryScore = (category: keyof typeof JOB_INDICATORS.categories) => scores[category] ?? 0

  const totalIndicators = Object.values(scores).reduce((sum, value) => sum + value, 0)
  const categoriesMatched = Object.values(scores).filter((value) => value > 0).length

  const hasRoleTitle = categoryScore("roleTitles") > 0
  const hasJobContent = categoryScore("jobSections") > 0 || categoryScore("actionVerbs") > 0
  const hasContext = categoryScore("technicalTerms") > 0 || categoryScore("companyIndicators") > 0
  const hasCompensation = countPresent(lowered, JOB_INDICATORS.compensation) > 0
  const hasLocation = countPresent(lowered, JOB_INDICATORS.location) > 0

  const confidence = [
    hasRoleTitle,
    hasJobContent,
    hasContext,
    hasCompensation,
    hasLocation,
    totalIndicators >= 5,
    categoriesMatched >= 3,
  ].filter(Boolean).length

  if (confidence >= MIN_CONFIDENCE) {
    return { valid: true }
  }

  const missing = [
    hasRoleTitle ? null : "job title or role",
    hasJobContent ? null : "job responsibilities or duties",
    hasContext ? null : "technical requirements or company context",
  ].filter((item): item is string => item !== null)

  if (missing.length) {
    return {
      valid: false,
      error: `Job description may be incomplete. Consider adding: ${missing.join(", ")}. Current confidence score: ${confidence}/${CONFIDENCE_CHECKS}`,
    }
  }

  return {
    valid: false,
    error:
      "This doesn't appear to be a complete job description. Please ensure it includes job details, requirements, or responsibilities.",
  }
}

const MIN_RESUME_LENGTH = 500
const RESUME_SECTIONS = ["experience", "skills", "education"]
const SENIORITY_SIGNALS = [/\bsenior\b/, /\blead\b/, /\d+\+\s*years/]

export const validateResumeOutput = (resumeText: string, baseResume?: string): ValidationResult => {
  const trimmed = resumeText.trim()
  if (!trimmed) return { valid: false, error: "Resume output is empty" }
  if (trimmed.length < MIN_RESUME_LENGTH) return { valid: false, error: "Resume output is too short" }

  const lowered = trimmed.toLowerCase()
  const missingSections = RESUME_SECTIONS.filter((section) => !lowered.includes(section))
  if (missingSections.length > 1) {
    return { valid: false, error: `Resume missing important sections: ${missingSections.join(", ")}` }
  }

  if (baseResume) {
    const baseLower = baseResume.toLowerCase()
    const expected = SENIORITY_SIGNALS.filter((signal) => signal.test(baseLower))
    if (expected.length > 0 && !expected.some((signal) => signal.test(lowered))) {
      return {
        valid: false,
        error: "Critical seniority indicators were removed - please preserve experience level",
      }
    }
  }

  return { valid: true }
}

const COVER_LETTER_LENGTH = { min: 300, max: 2000 }
const GREETINGS = ["dear", "hello", "greetings"]
const CLOSINGS = ["sincerely", "regards", "best"]

export const validateCoverLetterOutput = (text: string): ValidationResult => {
  const trimmed = text.trim()
  if (!trimmed) return { valid: false, error: "Cover letter output is empty" }
  if (trimmed.length < COVER_LETTER_LENGTH.min) return { valid: false, error: "Cover letter output is too short" }
  if (trimmed.length > COVER_LETTER_LENGTH.max) return { valid: false, error: "Cover letter output is too long" }

  const lowered = trimmed.toLowerCase()
  const hasGreeting = GREETINGS.some((word) => lowered.includes(word))
  const hasClosing = CLOSINGS.some((word) => lowered.includes(word))
  if (!hasGreeting && !hasClosing) {
    return { valid: false, error: "Cover letter missing proper greeting or closing" }
  }

  const paragraphs = trimmed.split(/\n\s*\n/).filter((paragraph) => paragraph.trim())
  if (paragraphs.length < 2) {
    return { valid: false, error: "Cover letter should have multiple paragraphs" }
  }

  return { valid: true }
}

const ANSWER_LENGTH = { min: 50, max: 1500 }

export const validateAnswerOutput = (text: string): ValidationResult => {
  const trimmed = text.trim()
  if (!trimmed) return { valid: false, error: "Answer output is empty" }
  if (trimmed.length < ANSWER_LENGTH.min) return { valid: false, error: "Answer output is too short" }
  if (trimmed.length > ANSWER_LENGTH.max) return { valid: false, error: "Answer output is too long" }
  return { valid: true }
}
