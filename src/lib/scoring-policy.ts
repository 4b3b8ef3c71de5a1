// Caps on computed importance per keyword category.
export const TECHNICAL_IMPORTANCE_CAP = 10
export const SOFT_SKILL_IMPORTANCE_CAP = 8
export const INDUSTRY_IMPORTANCE_CAP = 6

export const MENTION_WEIGHT = 2

export const HIGH_PRIORITY_THRESHOLD = 8
export const MEDIUM_PRIORITY_THRESHOLD = 5

export const QUANTIFICATION_POINTS_PER_TOKEN = 10

export const ACTION_VERB_BONUS_RATE = 0.2
export const ACTION_VERB_BONUS_CAP = 20
export const QUANTIFICATION_BONUS_RATE = 0.15
export const QUANTIFICATION_BONUS_CAP = 15
export const IRRELEVANT_PENALTY_PER_ITEM = 2
export const IRRELEVANT_PENALTY_CAP = 10

export const ACTION_VERB_TIP_THRESHOLD = 50
export const QUANTIFICATION_TIP_THRESHOLD = 40
export const IRRELEVANT_TIP_THRESHOLD = 2
export const MISSING_KEYWORDS_IN_TIP = 3
export const MAX_TIPS = 4

export const EXCELLENT_SCORE_THRESHOLD = 85
export const GOOD_SCORE_THRESHOLD = 70
export const OPTIMAL_DENSITY_THRESHOLD = 75

export const clampPercentage = (value: number) => Math.max(0, Math.min(100, value))
