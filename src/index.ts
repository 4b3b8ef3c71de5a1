export * from "./types"

export { analyzeJobDescription, extractActionVerbs, extractMetricsExpectations } from "./lib/job-analyzer"
export { analyzeResume } from "./lib/resume-analyzer"
export {
  scoreMatch,
  detectIrrelevantContent,
  computeActionVerbScore,
  computeQuantificationScore,
} from "./lib/match-scorer"
export { buildAtsTips } from "./lib/tips"
export type { TipInput } from "./lib/tips"
export { buildAtsReport, generateAtsReport, describeAtsScore, formatAtsInsights } from "./lib/report"
export { TAXONOMY, loadTaxonomy, countOccurrences } from "./lib/taxonomy"
export type { Taxonomy } from "./lib/taxonomy"
export * from "./lib/scoring-policy"
export {
  InvalidInputError,
  ConfigurationError,
  CompletionError,
  OutputValidationError,
} from "./lib/errors"

export { enhanceBulletPoints } from "./lib/bullet-enhancer"
export { analyzeJobRequirements, suggestInterviewQuestions } from "./lib/interview-questions"
export {
  validateJobDescription,
  validateResumeOutput,
  validateCoverLetterOutput,
  validateAnswerOutput,
  DEFAULT_JOB_DESCRIPTION_LIMITS,
} from "./lib/validators"
export type { ValidationResult, JobDescriptionLimits } from "./lib/validators"
export {
  cleanGeneratedText,
  cleanCoverLetterOutput,
  extractCompanyAndJobTitle,
  formatDocumentTitle,
  formatCoverLetterTitle,
} from "./lib/normalizers"
export { loadConfig } from "./lib/config"
export type { AppConfig } from "./lib/config"
export { RetryingCompletionService, createCompletionService, createOpenAIChat } from "./lib/completion"
export type { TextCompletionService, CompletionRequest, ChatCompletionFn } from "./lib/completion"
export { PdfDocumentStore, MemoryDocumentStore } from "./lib/document-store"
export type { DocumentStore, StoredDocument } from "./lib/document-store"
export { renderTextPdf } from "./lib/pdf"
export { tailorApplication, answerInterviewQuestion, checkIntegrations } from "./lib/orchestrator"
export type {
  TailorInput,
  TailorResult,
  TailorDependencies,
  AnswerInput,
  IntegrationStatus,
  IntegrationDependencies,
} from "./lib/orchestrator"
export { createLogger, silentLogger } from "./lib/logger"
export type { Logger } from "./lib/logger"
