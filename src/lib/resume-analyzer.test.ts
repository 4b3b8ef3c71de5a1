import { describe, expect, it } from "vitest"

import { InvalidInputError } from "./errors"
import { analyzeResume } from "./resume-analyzer"

describe("analyzeResume", () => {
  it("extracts technical terms, leadership signals and background", () => {
    const profile = analyzeResume(
      "Senior engineer with 5+ years. Led a team of four and mentored interns. Python, React and AWS at a Fortune 500 enterprise. Master of Science, later PhD.",
    )

    expect(profile).toEqual({
      technical: ["python", "react", "aws"],
      leadershipExperience: ["led", "mentored", "senior"],
      yearsExperience: 5,
      educationLevel: "phd",
      companyTypes: ["enterprise"],
    })
  })

  it("maps the 3+ and 4+ years phrases to 3", () => {
    const profile = analyzeResume("Junior developer with 4+ years of Java. Founding engineer at a startup. BSc Computer Science.")

    expect(profile.yearsExperience).toBe(3)
    expect(profile.companyTypes).toEqual(["startup"])
    expect(profile.educationLevel).toBe("bachelor")
    expect(profile.leadershipExperience).toEqual([])
  })

  it("does not parse year counts outside the known phrases", () => {
    expect(analyzeResume("Analyst with 7+ years of experience").yearsExperience).toBe(0)
  })

  it("rejects blank text", () => {
    expect(() => analyzeResume("")).toThrow(InvalidInputError)
  })
})
