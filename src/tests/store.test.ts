import { describe, expect, it } from "vitest";

import { createEloRanking } from "@/engine";
import { createRatingStore, selectLeaderboard, storeParticipant } from "@/store";

describe("store-backed participants", () => {
  it("updates ratings held in the store", () => {
    const store = createRatingStore({ alice: 1400, bob: 1400 });
    const ranking = createEloRanking(32);

    ranking.win(storeParticipant(store, "alice"), storeParticipant(store, "bob"));

    expect(store.getState().ratings).toEqual({ alice: 1416, bob: 1384 });
  });

  it("notifies subscribers once per rating change", () => {
    const store = createRatingStore({ alice: 1400, bob: 1400 });
    let notifications = 0;
    const unsubscribe = store.subscribe(() => {
      notifications += 1;
    });

    createEloRanking(32).tie(storeParticipant(store, "alice"), storeParticipant(store, "bob"));
    unsubscribe();

    expect(notifications).toBe(2);
  });

  it("starts unknown ids at the default rating", () => {
    const store = createRatingStore();
    const carol = storeParticipant(store, "carol");
    expect(carol.getRating()).toBe(1400);

    carol.changeRating(12);
    expect(store.getState().ratings.carol).toBe(1412);
  });

  it("registers and resets ratings", () => {
    const store = createRatingStore();
    store.getState().register("dave");
    store.getState().register("erin", 1500.1);
    expect(store.getState().ratings).toEqual({ dave: 1400, erin: Math.fround(1500.1) });

    store.getState().reset({ frank: 1250 });
    expect(store.getState().ratings).toEqual({ frank: 1250 });
  });

  it("orders the leaderboard by rating, then id", () => {
    expect(selectLeaderboard({ ratings: { bob: 1500, alice: 1500, carol: 1600, dave: 1320 } })).toEqual([
      "carol",
      "alice",
      "bob",
      "dave",
    ]);
  });
});
