import { describe, expect, it } from "vitest"

import {
  validateAnswerOutput,
  validateCoverLetterOutput,
  validateJobDescription,
  validateResumeOutput,
} from "./validators"

const POSTING =
  "Senior Software Engineer\nResponsibilities: build and maintain APIs for our payments platform.\nSalary: $150k per year. Location: Remote."

const resumeBody = (extra: string) =>
  `${extra}\n${"Delivered customer-facing features across web and mobile with measurable impact. ".repeat(8)}`

describe("validateJobDescription", () => {
  it("accepts a realistic posting", () => {
    expect(validateJobDescription(POSTING)).toEqual({ valid: true })
  })

  it("rejects empty, short and long text", () => {
    expect(validateJobDescription("   ")).toEqual({ valid: false, error: "Job description cannot be empty." })
    expect(validateJobDescription("Engineer")).toEqual({
      valid: false,
      error: "Job description is too short. Please provide at least 100 characters.",
    })
    expect(validateJobDescription("a".repeat(10_001))).toEqual({
      valid: false,
      error: "Job description is too long. Please limit to 10000 characters.",
    })
  })

  it("honours custom length limits", () => {
    expect(validateJobDescription(POSTING, { minLength: 10, maxLength: 50 })).toEqual({
      valid: false,
      error: "Job description is too long. Please limit to 50 characters.",
    })
  })

  it("names what is missing from text that does not read like a posting", () => {
    expect(
      validateJobDescription(
        "The quick brown fox jumps over the lazy dog while the sun sets slowly behind the quiet hills of the valley at dusk.",
      ),
    ).toEqual({
      valid: false,
      error:
        "Job description may be incomplete. Consider adding: job title or role, job responsibilities or duties, technical requirements or company context. Current confidence score: 0/7",
    })

    expect(
      validateJobDescription(
        "Engineer wanted to develop ideas with us. We love long walks, good coffee, sunny mornings and quiet evenings at home.",
      ),
    ).toEqual({
      valid: false,
      error:
        "Job description may be incomplete. Consider adding: technical requirements or company context. Current confidence score: 2/7",
    })
  })
})

describe("validateResumeOutput", () => {
  it("accepts a complete resume", () => {
    expect(validateResumeOutput(resumeBody("EXPERIENCE\nSKILLS\nEDUCATION"))).toEqual({ valid: true })
  })

  it("rejects short output", () => {
    expect(validateResumeOutput("Experience, skills, education")).toEqual({
      valid: false,
      error: "Resume output is too short",
    })
  })

  it("tolerates one missing section but not two", () => {
    expect(validateResumeOutput(resumeBody("EXPERIENCE\nSKILLS"))).toEqual({ valid: true })
    expect(validateResumeOutput(resumeBody("EXPERIENCE"))).toEqual({
      valid: false,
      error: "Resume missing important sections: skills, education",
    })
  })

  it("requires a seniority signal from the base resume to survive", () => {
    const base = "Senior engineer with 6+ years of experience"
    expect(validateResumeOutput(resumeBody("EXPERIENCE\nSKILLS\nEDUCATION"), base)).toEqual({
      valid: false,
      error: "Critical seniority indicators were removed - please preserve experience level",
    })
    expect(validateResumeOutput(resumeBody("Senior engineer\nEXPERIENCE\nSKILLS\nEDUCATION"), base)).toEqual({
      valid: true,
    })
  })
})

describe("validateCoverLetterOutput", () => {
  const paragraph = "I have built and scaled payment systems used by millions of customers across Europe. ".repeat(2)

  it("accepts a letter with greeting and paragraphs", () => {
    expect(validateCoverLetterOutput(`Dear Hiring Manager,\n\n${paragraph}\n\n${paragraph}\n\nSincerely,\nJane`)).toEqual({
      valid: true,
    })
  })

  it("rejects a single block of text", () => {
    expect(validateCoverLetterOutput(`Dear Hiring Manager, ${paragraph}${paragraph}`)).toEqual({
      valid: false,
      error: "Cover letter should have multiple paragraphs",
    })
  })

  it("rejects a letter without greeting or closing", () => {
    expect(validateCoverLetterOutput(`${paragraph}\n\n${paragraph}`)).toEqual({
      valid: false,
      error: "Cover letter missing proper greeting or closing",
    })
  })

  it("rejects letters outside the length bounds", () => {
    expect(validateCoverLetterOutput("Dear team, thanks.")).toEqual({ valid: false, error: "Cover letter output is too short" })
    expect(validateCoverLetterOutput(`Dear team,\n\n${"word ".repeat(500)}`)).toEqual({
      valid: false,
      error: "Cover letter output is too long",
    })
  })
})

describe("validateAnswerOutput", () => {
  it("bounds answer length", () => {
    expect(validateAnswerOutput("Too short.")).toEqual({ valid: false, error: "Answer output is too short" })
    expect(validateAnswerOutput("x".repeat(1501))).toEqual({ valid: false, error: "Answer output is too long" })
    expect(validateAnswerOutput("I led the migration of our billing service and cut incident volume in half.")).toEqual({
      valid: true,
    })
  })
})
