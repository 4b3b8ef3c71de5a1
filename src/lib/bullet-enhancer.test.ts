import { describe, expect, it } from "vitest"

import { enhanceBulletPoints } from "./bullet-enhancer"

describe("enhanceBulletPoints", () => {
  it("replaces weak phrases with default strong verbs", () => {
    expect(enhanceBulletPoints("Responsible for billing. I worked on APIs and helped the team.", [])).toBe(
      "Responsible for billing. I developed APIs and collaborated the team.",
    )
  })

  it("prefers a job action verb the resume already uses", () => {
    expect(enhanceBulletPoints("Team lead. I worked on search.", ["deploy", "lead"])).toBe("Team lead. I lead search.")
  })

  it("only replaces whole words", () => {
    expect(enhanceBulletPoints("The candidate did reviews.", [])).toBe("The candidate executed reviews.")
  })
})
