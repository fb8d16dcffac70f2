import { DEFAULT_K_FACTOR, resolveKFactor, type KFactorPreset } from "@/engine/config";
import { expectedScore } from "@/engine/expected";
import { OUTCOME_SCORES, type Outcome } from "@/engine/outcomes";
import type { RankingEngine } from "@/engine/types";
import type { Rated } from "@/models";

const f32 = Math.fround;

export class EloRanking implements RankingEngine {
  private kFactor: number;

  constructor(kFactor: number) {
    this.kFactor = kFactor;
  }

  getKFactor(): number {
    return this.kFactor;
  }

  /** Stored as given; see `validateKFactor` for an advisory check. */
  setKFactor(kFactor: number): void {
    this.kFactor = kFactor;
  }

  win<T extends Rated>(winner: T, loser: T): void {
    this.calculateRating(winner, loser, OUTCOME_SCORES.win);
  }

  tie<T extends Rated>(playerOne: T, playerTwo: T): void {
    this.calculateRating(playerOne, playerTwo, OUTCOME_SCORES.tie);
  }

  loss<T extends Rated>(loser: T, winner: T): void {
    this.win(winner, loser);
  }

  /** Applies `outcome` as seen from `playerOne`. */
  record<T extends Rated>(outcome: Outcome, playerOne: T, playerTwo: T): void {
    switch (outcome) {
      case "win":
        this.win(playerOne, playerTwo);
        break;
      case "tie":
        this.tie(playerOne, playerTwo);
        break;
      case "loss":
        this.loss(playerOne, playerTwo);
        break;
    }
  }

  private calculateRating<T extends Rated>(playerOne: T, playerTwo: T, score: number): void {
    const change = f32(f32(this.kFactor) * f32(score - expectedScore(playerOne, playerTwo)));
    // playerTwo gets the negation, never a second computation
    playerOne.changeRating(change);
    playerTwo.changeRating(-change);
  }
}

export function createEloRanking(kFactor: number | KFactorPreset = DEFAULT_K_FACTOR): EloRanking {
  return new EloRanking(resolveKFactor(kFactor));
}
