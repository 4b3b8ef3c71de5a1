import { describe, expect, it } from "vitest"

import { InvalidInputError } from "./errors"
import { analyzeJobDescription } from "./job-analyzer"
import {
  computeActionVerbScore,
  computeQuantificationScore,
  detectIrrelevantContent,
  scoreMatch,
} from "./match-scorer"

const SENIOR_JOB =
  "Senior Python Engineer\nYou will develop backend services and lead a small team. Requires Python, AWS, leadership, 5+ years of experience."
const SENIOR_RESUME = "Python developer, led team, AWS certified, developed APIs for 6 years"

const score = (jobText: string, resumeText: string) => scoreMatch(analyzeJobDescription(jobText), resumeText, jobText)

describe("scoreMatch", () => {
  it("matches technical keywords through their variants", () => {
    const result = score(SENIOR_JOB, SENIOR_RESUME)

    expect(result.technicalMatches).toEqual({
      python: { matchedVariations: ["python", "py"], importance: 10 },
      aws: { matchedVariations: ["aws"], importance: 3 },
    })
    expect(result.missingHighPriority).toEqual([])
    expect(result.missingMediumPriority).toEqual(["leadership"])
  })

  it("computes the composite score from match, verb and quantification terms", () => {
    const result = score(SENIOR_JOB, SENIOR_RESUME)

    expect(result.matchPercentage).toBeCloseTo((13 / 19) * 100, 6)
    expect(result.actionVerbScore).toBeCloseTo(100 / 3, 6)
    expect(result.quantificationScore).toBe(10)
    expect(result.atsOptimizationScore).toBeCloseTo((13 / 19) * 100 + 20 / 3 + 1.5, 6)
    expect(result.atsOptimizationTips).toEqual([
      "IMPROVE: Use stronger action verbs from the job description in your bullet points",
      "QUANTIFY: Add more numbers, percentages, and measurable achievements",
    ])
  })

  it("reports no missing high priority keywords when every variant is present", () => {
    const jobText = "Kubernetes kubernetes k8s helm platform work. Manage clusters."
    const profile = analyzeJobDescription(jobText)
    const resume = profile.technical.kubernetes?.matchedVariations.join(" ") ?? ""

    expect(scoreMatch(profile, resume, jobText).missingHighPriority).toEqual([])
  })

  it("clamps the score to 100 when bonuses overshoot", () => {
    const result = score(
      "Backend role using Python and Django. Build and deploy services.",
      "Python and Django engineer. Built and deployed services. Cut costs 40% across 12 teams, 3 regions, 99% uptime, 5 launches, 200+ users, 7 apps, 8 apis, 9 jobs, 10 queues",
    )

    expect(result.matchPercentage).toBe(100)
    expect(result.actionVerbScore).toBe(50)
    expect(result.quantificationScore).toBe(100)
    expect(result.atsOptimizationScore).toBe(100)
    expect(result.atsOptimizationTips).toEqual([])
  })

  it("clamps the score to 0 when the penalty exceeds the match", () => {
    const result = score("Frontend role using Python and React.", "Built dashboards. Hobbies: basketball, mentoring.")

    expect(result.matchPercentage).toBe(0)
    expect(result.irrelevantContent).toEqual(["Personal interest: basketball"])
    expect(result.atsOptimizationScore).toBe(0)
  })

  it("puts the missing keyword tip before the action verb tip", () => {
    const result = score("Kubernetes kubernetes k8s helm platform work. Manage clusters.", "Wrote documentation for the billing system and enjoy golf.")

    expect(result.missingHighPriority).toEqual(["kubernetes"])
    expect(result.atsOptimizationTips).toEqual([
      "HIGH PRIORITY: Include these critical keywords: kubernetes",
      "IMPROVE: Use stronger action verbs from the job description in your bullet points",
      "QUANTIFY: Add more numbers, percentages, and measurable achievements",
    ])
  })

  it("adds the removal tip when more than two items are irrelevant", () => {
    const result = score(
      "Senior engineer: maintain legacy portals built with jQuery.",
      "Intern at a agency. Built Flash sites and jQuery widgets, played tennis.",
    )

    expect(result.irrelevantContent).toEqual([
      "Junior-level reference: intern",
      "Potentially outdated technology: flash",
      "Potentially outdated technology: jquery",
    ])
    expect(result.atsOptimizationTips.at(-1)).toBe(
      "REMOVE: Consider removing irrelevant content to make room for job-relevant details",
    )
  })

  it("rejects empty resume or job text", () => {
    const profile = analyzeJobDescription(SENIOR_JOB)
    expect(() => scoreMatch(profile, "  ", SENIOR_JOB)).toThrow(InvalidInputError)
    expect(() => scoreMatch(profile, SENIOR_RESUME, "")).toThrow(InvalidInputError)
  })

  it("returns a frozen result", () => {
    const result = score(SENIOR_JOB, SENIOR_RESUME)
    expect(Object.isFrozen(result)).toBe(true)
    expect(Object.isFrozen(result.missingMediumPriority)).toBe(true)
  })
})

describe("computeActionVerbScore", () => {
  it("is 0 when the resume has none of the job verbs", () => {
    expect(computeActionVerbScore(["develop", "lead"], "wrote reports")).toBe(0)
  })

  it("is 100 when the resume has every job verb", () => {
    expect(computeActionVerbScore(["develop", "lead"], "developed tools and lead reviews")).toBe(100)
  })

  it("guards against a job with no action verbs", () => {
    expect(computeActionVerbScore([], "developed tools")).toBe(0)
  })
})

describe("computeQuantificationScore", () => {
  it("is 0 without numbers", () => {
    expect(computeQuantificationScore("Shipped features and mentored engineers.")).toBe(0)
  })

  it("caps at 100", () => {
    expect(computeQuantificationScore("1 2 3 4 5 6 7 8 9 10 11 12")).toBe(100)
  })

  it("counts percent and plus suffixed numbers once each", () => {
    expect(computeQuantificationScore("Grew revenue 35% for 200+ clients")).toBe(20)
  })
})

describe("detectIrrelevantContent", () => {
  const techJob = "Build web apps with Python and React."

  it("flags hobbies for technical jobs", () => {
    expect(detectIrrelevantContent("Hobbies: basketball", analyzeJobDescription(techJob), techJob)).toEqual([
      "Personal interest: basketball",
    ])
  })

  it("never flags mentoring or volunteering", () => {
    expect(
      detectIrrelevantContent("Mentoring juniors and volunteering on weekends", analyzeJobDescription(techJob), techJob),
    ).toEqual([])
  })

  it("ignores hobbies when the job is not technical", () => {
    const jobText = "Store manager for a retail shop."
    expect(detectIrrelevantContent("Enjoys golf", analyzeJobDescription(jobText), jobText)).toEqual([])
  })

  it("flags obsolete technologies missing from the job technical keywords", () => {
    const jobText = "Maintain our PHP4 and jQuery storefront."
    expect(detectIrrelevantContent("Built jQuery plugins", analyzeJobDescription(jobText), jobText)).toEqual([
      "Potentially outdated technology: jquery",
    ])
  })
})
