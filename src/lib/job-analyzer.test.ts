import { describe, expect, it } from "vitest"

import { InvalidInputError } from "./errors"
import { analyzeJobDescription } from "./job-analyzer"

const sumImportance = (table: Record<string, { importance: number }>) =>
  Object.values(table).reduce((sum, keyword) => sum + keyword.importance, 0)

describe("analyzeJobDescription", () => {
  it("counts every variant occurrence of a technical term", () => {
    const profile = analyzeJobDescription("We use Python and Django. Python is key.")

    expect(profile.technical).toEqual({
      python: { term: "python", mentions: 5, matchedVariations: ["python", "py", "django"], importance: 10 },
    })
    expect(profile.softSkills).toEqual({})
    expect(profile.industry).toEqual({})
    expect(profile.totalImportanceScore).toBe(10)
  })

  it("weights mentions and distinct variants below the technical cap", () => {
    expect(analyzeJobDescription("Python").technical.python?.importance).toBe(6)
    expect(analyzeJobDescription("Python Flask").technical.python?.importance).toBe(9)
  })

  it("caps technical importance at 10", () => {
    const profile = analyzeJobDescription("Python ".repeat(8))
    expect(profile.technical.python?.mentions).toBe(16)
    expect(profile.technical.python?.importance).toBe(10)
  })

  it("caps soft skills at 8 and industry terms at 6", () => {
    const profile = analyzeJobDescription("Lead lead lead lead leadership. Remote remote remote distributed team.")

    expect(profile.softSkills.leadership).toEqual({
      term: "leadership",
      mentions: 6,
      matchedVariations: ["lead", "leadership"],
      importance: 8,
    })
    expect(profile.industry.remote?.importance).toBe(6)
    expect(profile.actionVerbs).toEqual(["lead"])
    expect(profile.totalImportanceScore).toBe(14)
  })

  it("collects metric expectations in first-seen order without duplicates", () => {
    const profile = analyzeJobDescription(
      "Scale to 1000 users with 99.9% uptime. 5+ years required; handle 5000 requests.",
    )

    expect(profile.metricsExpectations).toEqual([
      "5+ years",
      "9%",
      "1000 users",
      "5000 requests",
      "scale to 1000",
      "handle 5000",
      "uptime",
      "users",
      "time",
    ])
    expect(profile.actionVerbs).toEqual(["scale"])
  })

  it("keeps the total equal to the sum of category importances", () => {
    const profile = analyzeJobDescription(
      "Senior Python Engineer. Develop React apps on AWS, mentor peers, remote-first fintech startup with 5+ years.",
    )

    expect(profile.totalImportanceScore).toBe(
      sumImportance(profile.technical) + sumImportance(profile.softSkills) + sumImportance(profile.industry),
    )
  })

  it("is deterministic for identical input", () => {
    const text = "Build Node.js APIs with Docker and Kubernetes. Collaborate with a distributed team."
    expect(analyzeJobDescription(text)).toEqual(analyzeJobDescription(text))
  })

  it("never lowers importance when more variants are mentioned", () => {
    const base = analyzeJobDescription("Experience with Docker.").technical.docker?.importance ?? 0
    const richer = analyzeJobDescription("Experience with Docker, containers and a Dockerfile.").technical.docker?.importance ?? 0

    expect(richer).toBeGreaterThanOrEqual(base)
    expect(richer).toBeLessThanOrEqual(10)
  })

  it("rejects blank text", () => {
    expect(() => analyzeJobDescription("   \n\t")).toThrow(InvalidInputError)
  })

  it("returns a frozen profile", () => {
    const profile = analyzeJobDescription("Python")
    expect(Object.isFrozen(profile)).toBe(true)
    expect(Object.isFrozen(profile.technical.python)).toBe(true)
  })
})
