import type { JobProfile } from "@/types"

const RESUME_PRESERVATION_RULES = `
Preservation rules (never modify):
- Keep every education detail exactly as written: degrees, institutions, dates, coursework, GPA, honors.
- Keep all job titles, company names, locations, and employment dates exactly as stated.
- Keep the candidate's seniority (Senior, Lead, Founding) and stated years of experience.
- Never invent employers, projects, dates, metrics, or responsibilities.
`.trim()

const RESUME_OPTIMIZATION_RULES = `
Optimization rules:
- Mirror the exact phrases used in the job description instead of paraphrasing them.
- Weave keywords into achievement bullets, not only into the skills list.
- Start every bullet with a strong action verb and quantify outcomes where the evidence allows.
- Remove hobbies, unrelated interests, and outdated technologies that do not serve this job.
- Use a plain, ATS-parseable layout: no tables, graphics, or markdown.
- Output only the refined resume text.
`.trim()

export const buildResumeSystemPrompt = (): string =>
  [
    "You are an expert resume writer and ATS optimization specialist. Tailor the resume to this specific job while keeping it truthful.",
    RESUME_PRESERVATION_RULES,
    RESUME_OPTIMIZATION_RULES,
  ].join("\n\n")

const topTerms = (table: JobProfile["technical"], limit: number) =>
  Object.values(table)
    .sort((a, b) => b.importance - a.importance)
    .slice(0, limit)
    .map((keyword) => keyword.term)

type ResumeUserContentParams = {
  jobDescription: string
  baseResume: string
  jobProfile: JobProfile
}

export const buildResumeUserContent = ({ jobDescription, baseResume, jobProfile }: ResumeUserContentParams) => {
  const hints = [
    `Priority technical keywords: ${topTerms(jobProfile.technical, 8).join(", ") || "none detected"}`,
    `Soft skills emphasized: ${topTerms(jobProfile.softSkills, 5).join(", ") || "none detected"}`,
    `Action verbs used by the posting: ${jobProfile.actionVerbs.slice(0, 10).join(", ") || "none detected"}`,
  ]

  return [
    `Job Description:\n${jobDescription.trim()}`,
    `Current Resume:\n${baseResume.trim()}`,
    `Keyword analysis:\n${hints.join("\n")}`,
    "Please refine this resume to be tailored for the above job description.",
  ].join("\n\n")
}

export const buildCoverLetterSystemPrompt = (): string =>
  `
You are a professional cover letter writer who creates compelling, personalized cover letters.
- Open with a hook that shows enthusiasm for the specific role and company.
- Connect 2-3 key experiences from the resume to the most important job requirements.
- Close with a clear call to action expressing interest in an interview.
- Keep to 3-4 paragraphs in business letter structure, plain text without markdown.
Output only the cover letter text.
`.trim()

type CoverLetterUserContentParams = {
  jobDescription: string
  resume: string
  userName: string
}

export const buildCoverLetterUserContent = ({ jobDescription, resume, userName }: CoverLetterUserContentParams) =>
  [
    `Job Description:\n${jobDescription.trim()}`,
    `Candidate's Resume:\n${resume.trim()}`,
    `User Name: ${userName}`,
    "Please generate a professional cover letter for this candidate applying to the above position.",
  ].join("\n\n")

export const buildAnswerSystemPrompt = (): string =>
  `
You are an interview coach. Answer the question in the candidate's voice using only experience present in the resume.
- Tie the answer to the job requirements and use a concrete example where possible.
- Keep it under 250 words, plain text, first person.
`.trim()

type AnswerUserContentParams = {
  question: string
  jobDescription: string
  resume: string
}

export const buildAnswerUserContent = ({ question, jobDescription, resume }: AnswerUserContentParams) =>
  [
    `Job Description:\n${jobDescription.trim()}`,
    `Candidate's Resume:\n${resume.trim()}`,
    `Interview Question: ${question.trim()}`,
    "Please provide an authentic answer to this interview question based on the candidate's actual experience and the job requirements.",
  ].join("\n\n")
