import { describe, expect, it } from "vitest"

import taxonomyData from "@/data/taxonomy.json"

import { ConfigurationError } from "./errors"
import { TAXONOMY, countOccurrences, loadTaxonomy } from "./taxonomy"

describe("keyword taxonomy", () => {
  it("loads the bundled tables", () => {
    expect(Object.keys(TAXONOMY.technical)).toHaveLength(25)
    expect(Object.keys(TAXONOMY.softSkills)).toHaveLength(8)
    expect(Object.keys(TAXONOMY.industry)).toHaveLength(10)
    expect(TAXONOMY.metricPatterns).toHaveLength(11)
    expect(TAXONOMY.technical.python).toEqual(["python", "py", "django", "flask", "fastapi", "python3"])
  })

  it("is read-only", () => {
    expect(Object.isFrozen(TAXONOMY)).toBe(true)
    expect(Object.isFrozen(TAXONOMY.technical.python)).toBe(true)
  })

  it("rejects an empty table", () => {
    expect(() => loadTaxonomy({ ...taxonomyData, actionVerbs: [] })).toThrow(ConfigurationError)
    expect(() => loadTaxonomy({ ...taxonomyData, industry: {} })).toThrow(ConfigurationError)
  })

  it("rejects a term with no variants", () => {
    expect(() => loadTaxonomy({ ...taxonomyData, technical: { python: [] } })).toThrow(ConfigurationError)
  })

  it("rejects canonical terms that are not lowercase", () => {
    expect(() => loadTaxonomy({ ...taxonomyData, technical: { Python: ["python"] } })).toThrow(
      /technical\.Python: Canonical terms must be trimmed and lowercase\./,
    )
  })

  it("rejects metric patterns that do not compile", () => {
    expect(() => loadTaxonomy({ ...taxonomyData, metricPatterns: ["(\\d+"] })).toThrow(ConfigurationError)
  })
})

describe("countOccurrences", () => {
  it("counts non-overlapping matches", () => {
    expect(countOccurrences("banana", "ana")).toBe(1)
    expect(countOccurrences("aaaa", "aa")).toBe(2)
    expect(countOccurrences("python", "java")).toBe(0)
  })
})
