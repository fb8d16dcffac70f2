import { createStore, type StoreApi } from "zustand/vanilla";

import { DEFAULT_RATING } from "@/engine/config";
import type { ID, Rated } from "@/models";

export interface RatingStoreState {
  ratings: Record<ID, number>;

  register(id: ID, rating?: number): void;
  changeRating(id: ID, delta: number): void;
  reset(ratings: Record<ID, number>): void;
}

export type RatingStore = StoreApi<RatingStoreState>;

export function createRatingStore(initial: Record<ID, number> = {}): RatingStore {
  return createStore<RatingStoreState>((set) => ({
    ratings: { ...initial },

    register(id, rating = DEFAULT_RATING) {
      set((state) => ({ ratings: { ...state.ratings, [id]: Math.fround(rating) } }));
    },

    changeRating(id, delta) {
      set((state) => ({
        ratings: {
          ...state.ratings,
          [id]: Math.fround((state.ratings[id] ?? DEFAULT_RATING) + delta),
        },
      }));
    },

    reset(ratings) {
      set({ ratings: { ...ratings } });
    },
  }));
}

export function storeParticipant(store: RatingStore, id: ID): Rated {
  return {
    getRating() {
      return store.getState().ratings[id] ?? DEFAULT_RATING;
    },
    changeRating(delta) {
      store.getState().changeRating(id, delta);
    },
  };
}

export function selectLeaderboard(state: Pick<RatingStoreState, "ratings">): ID[] {
  return Object.entries(state.ratings)
    .sort(([idA, a], [idB, b]) => {
      if (b !== a) {
        return b - a;
      }
      return idA.localeCompare(idB);
    })
    .map(([id]) => id);
}
