import type { AtsReport, JobProfile, MatchResult } from "@/types"

import { enhanceBulletPoints } from "./bullet-enhancer"
import type { TextCompletionService } from "./completion"
import type { DocumentStore, StoredDocument } from "./document-store"
import { InvalidInputError, OutputValidationError, describeError, requireText } from "./errors"
import { analyzeJobDescription } from "./job-analyzer"
import type { Logger } from "./logger"
import { createLogger } from "./logger"
import { scoreMatch } from "./match-scorer"
import {
  cleanCoverLetterOutput,
  cleanGeneratedText,
  extractCompanyAndJobTitle,
  formatCoverLetterTitle,
  formatDocumentTitle,
} from "./normalizers"
import {
  buildAnswerSystemPrompt,
  buildAnswerUserContent,
  buildCoverLetterSystemPrompt,
  buildCoverLetterUserContent,
  buildResumeSystemPrompt,
  buildResumeUserContent,
} from "./prompts"
import { buildAtsReport, formatAtsInsights } from "./report"
import type { JobDescriptionLimits } from "./validators"
import {
  DEFAULT_JOB_DESCRIPTION_LIMITS,
  validateAnswerOutput,
  validateCoverLetterOutput,
  validateJobDescription,
  validateResumeOutput,
} from "./validators"

export type TailorDependencies = {
  completion: TextCompletionService | null
  store: DocumentStore
  userName: string
  jobDescriptionLimits?: JobDescriptionLimits
  logger?: Logger
  now?: () => Date
}

export type TailorInput = {
  jobText: string
  baseResume: string
  coverLetter?: boolean
  userName?: string
}

export type TailorResult = {
  company: string
  jobTitle: string
  refinedResume: string
  jobProfile: JobProfile
  match: MatchResult
  report: AtsReport
  resumeDocument: StoredDocument
  coverLetter: string | null
  coverLetterDocument: StoredDocument | null
  usedOfflineDraft: boolean
  processingTimeMs: number
}

const TOTAL_STEPS = 4

const offlineCoverLetter = (jobTitle: string, company: string, match: MatchResult) => {
  const strengths = Object.keys(match.technicalMatches).slice(0, 3)
  const focus = strengths.length ? strengths.join(", ") : "the core requirements of the role"
  const employer = company === "Company" ? "your team" : company
  return [
    "Dear Hiring Manager,",
    "",
    `I am excited to apply for the ${jobTitle} position at ${employer}. My recent work has centered on ${focus}, which lines up closely with what this role calls for.`,
    "",
    "In my previous roles I delivered production systems end to end, partnered with product and design, and measured the impact of what we shipped. I would bring the same ownership and attention to detail to this position.",
    "",
    "I would welcome the chance to discuss how my experience can support your goals. Thank you for your time and consideration.",
  ].join("\n")
}

const requireValid = (kind: OutputValidationError["kind"], result: ReturnType<typeof validateResumeOutput>) => {
  if (!result.valid) {
    throw new OutputValidationError(kind, `${kind} validation failed: ${result.error}`)
  }
}

/**
 * Without a completion service the resume is only rephrased locally and the
 * cover letter comes from a template.
 */
export const tailorApplication = async (input: TailorInput, deps: TailorDependencies): Promise<TailorResult> => {
  const logger = deps.logger ?? createLogger("orchestrator")
  const now = deps.now ?? (() => new Date())
  const startedAt = Date.now()
  const userName = input.userName?.trim() || deps.userName

  const jobCheck = validateJobDescription(input.jobText, deps.jobDescriptionLimits ?? DEFAULT_JOB_DESCRIPTION_LIMITS)
  if (!jobCheck.valid) {
    throw new InvalidInputError("jobText", jobCheck.error)
  }
  const baseResume = requireText(input.baseResume, "baseResume")

  logger.info(`Step 1/${TOTAL_STEPS}: refining resume`)
  const jobProfile = analyzeJobDescription(input.jobText)
  const usedOfflineDraft = deps.completion === null

  let refinedResume: string
  if (deps.completion) {
    try {
      refinedResume = cleanGeneratedText(
        await deps.completion.complete({
          system: buildResumeSystemPrompt(),
          user: buildResumeUserContent({ jobDescription: input.jobText, baseResume, jobProfile }),
        }),
      )
    } catch (error) {
      throw new Error(`Failed to refine resume: ${describeError(error)}`, { cause: error })
    }
    requireValid("resume", validateResumeOutput(refinedResume, baseResume))
  } else {
    logger.warn("No completion service configured; using an offline draft.")
    refinedResume = enhanceBulletPoints(cleanGeneratedText(baseResume), jobProfile.actionVerbs)
  }

  const match = scoreMatch(jobProfile, refinedResume, input.jobText)
  const report = buildAtsReport(jobProfile, match)
  formatAtsInsights(match).forEach((line) => logger.info(line))

  logger.info(`Step 2/${TOTAL_STEPS}: storing resume`)
  const { company, jobTitle } = extractCompanyAndJobTitle(input.jobText)
  const resumeDocument = await deps.store.createDocument(formatDocumentTitle(userName, jobTitle), refinedResume)

  let coverLetter: string | null = null
  let coverLetterDocument: StoredDocument | null = null

  if (input.coverLetter) {
    logger.info(`Step 3/${TOTAL_STEPS}: generating cover letter`)
    let rawLetter: string
    if (deps.completion) {
      try {
        rawLetter = await deps.completion.complete({
          system: buildCoverLetterSystemPrompt(),
          user: buildCoverLetterUserContent({ jobDescription: input.jobText, resume: refinedResume, userName }),
        })
      } catch (error) {
        throw new Error(`Failed to generate cover letter: ${describeError(error)}`, { cause: error })
      }
    } else {
      rawLetter = offlineCoverLetter(jobTitle, company, match)
    }

    coverLetter = cleanCoverLetterOutput(rawLetter, userName, now())
    if (deps.completion) {
      requireValid("cover-letter", validateCoverLetterOutput(coverLetter))
    }
    coverLetterDocument = await deps.store.createDocument(formatCoverLetterTitle(company), coverLetter)
  } else {
    logger.info(`Step 3/${TOTAL_STEPS}: skipping cover letter`)
  }

  logger.info(`Step 4/${TOTAL_STEPS}: done`)

  return {
    company,
    jobTitle,
    refinedResume,
    jobProfile,
    match,
    report,
    resumeDocument,
    coverLetter,
    coverLetterDocument,
    usedOfflineDraft,
    processingTimeMs: Date.now() - startedAt,
  }
}

export type AnswerInput = {
  question: string
  jobText: string
  resumeText: string
}

export const answerInterviewQuestion = async (
  input: AnswerInput,
  completion: TextCompletionService,
): Promise<string> => {
  const question = requireText(input.question, "question")
  const jobDescription = requireText(input.jobText, "jobText")
  const resume = requireText(input.resumeText, "resumeText")

  const answer = cleanGeneratedText(
    await completion.complete({
      system: buildAnswerSystemPrompt(),
      user: buildAnswerUserContent({ question, jobDescription, resume }),
    }),
  )
  requireValid("answer", validateAnswerOutput(answer))
  return answer
}

export type IntegrationStatus = {
  openai: boolean
  documentStore: boolean
  baseResume: boolean
}

export type IntegrationDependencies = {
  completion: TextCompletionService | null
  store: DocumentStore
  loadBaseResume?: () => Promise<string>
  logger?: Logger
}

const CONNECTION_CHECK = {
  system: "You are a helpful assistant.",
  user: "Say 'Connection successful' if you can read this.",
}

const runCheck = async (name: string, logger: Logger, check: () => Promise<boolean>) => {
  try {
    return await check()
  } catch (error) {
    logger.warn(`${name} check failed: ${describeError(error)}`)
    return false
  }
}

export const checkIntegrations = async (deps: IntegrationDependencies): Promise<IntegrationStatus> => {
  const logger = deps.logger ?? createLogger("orchestrator")
  const { completion, loadBaseResume } = deps

  const [openai, documentStore, baseResume] = await Promise.all([
    completion
      ? runCheck("openai", logger, async () =>
          (await completion.complete(CONNECTION_CHECK)).toLowerCase().includes("successful"),
        )
      : Promise.resolve(false),
    runCheck("document store", logger, () => deps.store.isAvailable()),
    loadBaseResume
      ? runCheck("base resume", logger, async () => (await loadBaseResume()).trim().length > 0)
      : Promise.resolve(false),
  ])

  return { openai, documentStore, baseResume }
}
