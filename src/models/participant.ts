import { DEFAULT_RATING } from "@/engine/config";
import type { ID } from "@/models/base";

export interface Rated {
  getRating(): number;
  changeRating(delta: number): void;
}

export class RatedParticipant implements Rated {
  readonly id: ID;
  private rating: number;

  constructor(id: ID, rating = DEFAULT_RATING) {
    this.id = id;
    this.rating = Math.fround(rating);
  }

  getRating(): number {
    return this.rating;
  }

  changeRating(delta: number): void {
    this.rating = Math.fround(this.rating + delta);
  }
}
