export const DEFAULT_K_FACTOR = 32;
export const DEFAULT_RATING = 1400;

// A RATING_SCALE-point gap means RATING_BASE:1 expected odds.
export const RATING_SCALE = 400;
export const RATING_BASE = 10;

export const K_FACTOR_PRESETS = {
  novice: 40,
  standard: 32,
  established: 20,
  master: 10,
} as const;

export type KFactorPreset = keyof typeof K_FACTOR_PRESETS;

export function resolveKFactor(kFactor: number | KFactorPreset): number {
  return typeof kFactor === "number" ? kFactor : K_FACTOR_PRESETS[kFactor];
}
