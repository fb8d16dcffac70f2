export type Outcome = "win" | "tie" | "loss";

export const OUTCOME_SCORES: Readonly<Record<Outcome, number>> = {
  win: 1,
  tie: 0.5,
  loss: 0,
};

export function isOutcome(value: unknown): value is Outcome {
  return value === "win" || value === "tie" || value === "loss";
}
