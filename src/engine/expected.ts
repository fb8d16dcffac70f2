import { RATING_BASE, RATING_SCALE } from "@/engine/config";
import type { Rated } from "@/models";

const f32 = Math.fround;

/**
 * Logistic expected score for the player rated `ra` against one rated `rb`,
 * evaluated in single precision at every step.
 */
export function expectedScoreFromRatings(ra: number, rb: number): number {
  const exponent = f32(f32(f32(rb) - f32(ra)) / RATING_SCALE);
  const odds = f32(Math.pow(RATING_BASE, exponent));
  return f32(1 / f32(1 + odds));
}

export function expectedScore(playerOne: Rated, playerTwo: Rated): number {
  return expectedScoreFromRatings(playerOne.getRating(), playerTwo.getRating());
}
