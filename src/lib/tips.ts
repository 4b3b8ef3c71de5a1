import {
  ACTION_VERB_TIP_THRESHOLD,
  IRRELEVANT_TIP_THRESHOLD,
  MAX_TIPS,
  MISSING_KEYWORDS_IN_TIP,
  QUANTIFICATION_TIP_THRESHOLD,
} from "./scoring-policy"

export type TipInput = {
  missingHighPriority: readonly string[]
  actionVerbScore: number
  quantificationScore: number
  irrelevantContent: readonly string[]
}

type TipRule = (input: TipInput) => string | null

// Evaluated in order; each rule contributes at most one tip.
const TIP_RULES: TipRule[] = [
  ({ missingHighPriority }) =>
    missingHighPriority.length > 0
      ? `HIGH PRIORITY: Include these critical keywords: ${missingHighPriority.slice(0, MISSING_KEYWORDS_IN_TIP).join(", ")}`
      : null,
  ({ actionVerbScore }) =>
    actionVerbScore < ACTION_VERB_TIP_THRESHOLD
      ? "IMPROVE: Use stronger action verbs from the job description in your bullet points"
      : null,
  ({ quantificationScore }) =>
    quantificationScore < QUANTIFICATION_TIP_THRESHOLD
      ? "QUANTIFY: Add more numbers, percentages, and measurable achievements"
      : null,
  ({ irrelevantContent }) =>
    irrelevantContent.length > IRRELEVANT_TIP_THRESHOLD
      ? "REMOVE: Consider removing irrelevant content to make room for job-relevant details"
      : null,
]

export const buildAtsTips = (input: TipInput): string[] =>
  TIP_RULES.map((rule) => rule(input))
    .filter((tip): tip is string => tip !== null)
    .slice(0, MAX_TIPS)
