export { EloRanking, createEloRanking } from "@/engine/EloRanking";
export { expectedScore, expectedScoreFromRatings } from "@/engine/expected";
export { OUTCOME_SCORES, isOutcome, type Outcome } from "@/engine/outcomes";
export {
  DEFAULT_K_FACTOR,
  DEFAULT_RATING,
  K_FACTOR_PRESETS,
  RATING_BASE,
  RATING_SCALE,
  resolveKFactor,
  type KFactorPreset,
} from "@/engine/config";
export { validateKFactor, validateRating, type ValidationIssue, type ValidationResult } from "@/engine/validation";
export type { RankingEngine } from "@/engine/types";
