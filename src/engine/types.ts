import type { Outcome } from "@/engine/outcomes";
import type { Rated } from "@/models";

export interface RankingEngine {
  getKFactor(): number;
  setKFactor(kFactor: number): void;
  win<T extends Rated>(winner: T, loser: T): void;
  tie<T extends Rated>(playerOne: T, playerTwo: T): void;
  loss<T extends Rated>(loser: T, winner: T): void;
  record<T extends Rated>(outcome: Outcome, playerOne: T, playerTwo: T): void;
}
