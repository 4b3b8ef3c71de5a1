import type { ExperienceLevel, JobRequirements, ResumeProfile } from "@/types"

import { requireText } from "./errors"
import { analyzeResume } from "./resume-analyzer"
import { TAXONOMY, presentTerms } from "./taxonomy"
import type { Taxonomy } from "./taxonomy"

const BASE_QUESTIONS = [
  "Why should we choose you for this position?",
  "What interests you most about this role?",
  "How do you handle challenging situations or tight deadlines?",
  "What's your greatest professional achievement?",
  "Where do you see yourself in 5 years?",
  "Why are you looking to leave your current position?",
  "What questions do you have for us?",
]

type RoleQuestionGroup = { triggers: string[]; questions: string[] }

const ROLE_QUESTIONS: RoleQuestionGroup[] = [
  {
    triggers: ["engineer", "developer", "technical", "software"],
    questions: [
      "Walk me through your approach to debugging a complex issue.",
      "How do you stay current with new technologies and best practices?",
      "Describe a time when you had to make a technical decision with limited information.",
      "How do you approach code reviews and collaboration with other developers?",
    ],
  },
  {
    triggers: ["senior", "lead", "manager", "director"],
    questions: [
      "How do you mentor junior team members?",
      "Describe a time when you had to make a difficult decision as a leader.",
      "How do you handle conflicts within your team?",
      "What's your approach to setting and achieving team goals?",
    ],
  },
  {
    triggers: ["startup", "fast-paced", "growth", "scale"],
    questions: [
      "How do you thrive in a fast-paced, changing environment?",
      "Describe a time when you had to wear multiple hats or take on responsibilities outside your role.",
      "How do you prioritize tasks when everything seems urgent?",
    ],
  },
  {
    triggers: ["remote", "distributed", "work from home"],
    questions: [
      "How do you stay productive and motivated while working remotely?",
      "Describe your experience collaborating with distributed teams.",
    ],
  },
]

const SOFT_SKILLS = [
  "leadership",
  "collaboration",
  "communication",
  "problem-solving",
  "innovation",
  "mentoring",
  "cross-functional",
  "strategic",
  "analytical",
]

const SENIOR_TERMS = ["senior", "lead", "principal", "5+ years", "7+ years"]
const JUNIOR_TERMS = ["junior", "entry", "1-2 years", "new grad"]
const LEADERSHIP_TERMS = ["lead", "manage", "mentor", "team lead", "technical lead", "supervise"]

const INDUSTRIES: ReadonlyArray<readonly [industry: string, triggers: string[]]> = [
  ["fintech", ["fintech", "financial", "banking", "payments", "trading"]],
  ["healthcare", ["healthcare", "medical", "health", "patient", "clinical"]],
  ["e-commerce", ["e-commerce", "retail", "marketplace", "shopping", "commerce"]],
  ["saas", ["saas", "software as a service", "b2b", "platform", "subscription"]],
  ["ai/ml", ["machine learning", "artificial intelligence", "data science"]],
]

const SENIOR_YEARS = 5
const LIMITS = { base: 4, gap: 3, strength: 2, role: 3, total: 12 }

const detectIndustries = (lowered: string) =>
  INDUSTRIES.filter(([, triggers]) => triggers.some((trigger) => lowered.includes(trigger))).map(([industry]) => industry)

const classifyExperienceLevel = (lowered: string): ExperienceLevel => {
  if (SENIOR_TERMS.some((term) => lowered.includes(term))) return "senior"
  if (JUNIOR_TERMS.some((term) => lowered.includes(term))) return "junior"
  return "mid"
}

export const analyzeJobRequirements = (jobText: string, taxonomy: Taxonomy = TAXONOMY): JobRequirements => {
  const lowered = requireText(jobText, "jobText").toLowerCase()
  return {
    technicalSkills: presentTerms(lowered, Object.keys(taxonomy.technical)),
    softSkills: presentTerms(lowered, SOFT_SKILLS),
    experienceLevel: classifyExperienceLevel(lowered),
    leadershipRequired: LEADERSHIP_TERMS.some((term) => lowered.includes(term)),
    industry: detectIndustries(lowered)[0] ?? "general",
  }
}

type CandidateBackground = ResumeProfile & { industries: string[] }

const EMPTY_BACKGROUND: CandidateBackground = {
  technical: [],
  leadershipExperience: [],
  yearsExperience: 0,
  educationLevel: "bachelor",
  companyTypes: [],
  industries: [],
}

const gapQuestions = (job: JobRequirements, candidate: CandidateBackground): string[] => {
  const missingSkills = job.technicalSkills.filter((skill) => !candidate.technical.includes(skill))
  return [
    missingSkills.length ? `How would you approach learning ${missingSkills.slice(0, 2).join(", ")} for this role?` : null,
    job.leadershipRequired && candidate.leadershipExperience.length === 0
      ? "How do you see yourself transitioning into a leadership role?"
      : null,
    job.experienceLevel === "senior" && candidate.yearsExperience < SENIOR_YEARS
      ? "How do you feel your experience prepares you for a senior-level position?"
      : null,
    job.industry !== "general" && !candidate.industries.includes(job.industry)
      ? `What interests you about working in the ${job.industry} industry?`
      : null,
  ].filter((question): question is string => question !== null)
}

const strengthQuestions = (job: JobRequirements, candidate: CandidateBackground, jobLower: string): string[] => {
  const sharedSkill = candidate.technical.find((skill) => job.technicalSkills.includes(skill))
  return [
    candidate.leadershipExperience.length > 0 && job.leadershipRequired
      ? "Can you describe your leadership style and how you motivate teams?"
      : null,
    sharedSkill ? `Walk me through a challenging project where you used ${sharedSkill} extensively.` : null,
    candidate.companyTypes.includes("startup") && jobLower.includes("startup")
      ? "What do you enjoy most about working in a startup environment?"
      : null,
  ].filter((question): question is string => question !== null)
}

export const suggestInterviewQuestions = (jobText: string, resumeText?: string): string[] => {
  const job = analyzeJobRequirements(jobText)
  const jobLower = jobText.toLowerCase()
  const candidate: CandidateBackground = resumeText?.trim()
    ? { ...analyzeResume(resumeText), industries: detectIndustries(resumeText.toLowerCase()) }
    : EMPTY_BACKGROUND

  const roleSpecific = ROLE_QUESTIONS.filter((group) =>
    group.triggers.some((trigger) => jobLower.includes(trigger)),
  ).flatMap((group) => group.questions)

  const ordered = [
    ...BASE_QUESTIONS.slice(0, LIMITS.base),
    ...gapQuestions(job, candidate).slice(0, LIMITS.gap),
    ...strengthQuestions(job, candidate, jobLower).slice(0, LIMITS.strength),
    ...roleSpecific.slice(0, LIMITS.role),
  ]

  const seen = new Set<string>()
  return ordered
    .filter((question) => {
      const key = question.toLowerCase()
      return !seen.has(key) && (seen.add(key), true)
    })
    .slice(0, LIMITS.total)
}
