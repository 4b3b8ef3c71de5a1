const WEAK_PHRASES: ReadonlyArray<readonly [weak: string, strong: string]> = [
  ["responsible for", "led"],
  ["worked on", "developed"],
  ["helped", "collaborated"],
  ["did", "executed"],
  ["made", "created"],
  ["used", "leveraged"],
  ["was involved", "contributed"],
  ["participated in", "drove"],
  ["assisted", "supported"],
  ["handled", "managed"],
]

// Whole-word and case-sensitive: "did" inside "candidate" stays put.
export const enhanceBulletPoints = (resumeText: string, actionVerbs: readonly string[]): string =>
  WEAK_PHRASES.reduce((text, [weak, strong]) => {
    const lowered = text.toLowerCase()
    const jobVerb = actionVerbs.find((verb) => lowered.includes(verb))
    return text.replace(new RegExp(`\\b${weak}\\b`, "g"), jobVerb ?? strong)
  }, resumeText)
