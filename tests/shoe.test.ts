import { describe, expect, it } from "vitest";
import { cardLabel, ConfigError, createRng, createShoe, DEFAULT_RULES, naiveStrategy, playRound, Shoe } from "../core";

describe("shoe", () => {
  it("holds every card once per deck", () => {
    const shoe = createShoe(6, 7);
    expect(shoe.size()).toBe(312);
    const counts = new Map<string, number>();
    for (let i = 0; i < 312; i += 1) {
      const label = cardLabel(shoe.draw());
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
    expect(counts.size).toBe(52);
    expect([...counts.values()].every((n) => n === 6)).toBe(true);
    expect(shoe.remaining()).toBe(0);
    expect(shoe.shuffles).toBe(0);
  });

  it("reshuffles once exhausted", () => {
    const events: string[] = [];
    const shoe = new Shoe(1, createRng(1));
    shoe.onShuffle(() => events.push("shuffle"));
    for (let i = 0; i < 52; i += 1) {
      shoe.draw();
    }
    expect(events).toHaveLength(0);
    shoe.draw();
    expect(events).toEqual(["shuffle"]);
    expect(shoe.shuffles).toBe(1);
    expect(shoe.remaining()).toBe(51);
  });

  it("keeps the constructor listener after a round has been played", () => {
    const seen: string[] = [];
    const shoe = new Shoe(1, createRng(4), () => seen.push("caller"));
    playRound(shoe, { ...DEFAULT_RULES, decks: 1 }, naiveStrategy, 100);
    for (let i = 0; i < 60; i += 1) {
      shoe.draw();
    }
    expect(shoe.shuffles).toBe(1);
    expect(seen).toEqual(["caller"]);
  });

  it("stops notifying a listener once it is removed", () => {
    const seen: string[] = [];
    const shoe = new Shoe(1, createRng(2));
    const stop = shoe.onShuffle(() => seen.push("first"));
    shoe.onShuffle(() => seen.push("second"));
    for (let i = 0; i < 53; i += 1) shoe.draw();
    stop();
    for (let i = 0; i < 52; i += 1) shoe.draw();
    expect(seen).toEqual(["first", "second", "second"]);
  });

  it("logs a reshuffle into the round it happens in and no other", () => {
    const shoe = new Shoe(1, createRng(6));
    for (let i = 0; i < 50; i += 1) shoe.draw();
    const round = playRound(shoe, { ...DEFAULT_RULES, decks: 1 }, naiveStrategy, 100);
    for (let i = 0; i < 60; i += 1) shoe.draw();
    expect(shoe.shuffles).toBe(2);
    expect(round.events.filter((e) => e.type === "shuffle")).toHaveLength(1);
    expect(round.events[2]).toEqual({ type: "shuffle" });
  });

  it("reuses the same cards after a reshuffle", () => {
    const shoe = createShoe(1, 3);
    const first: string[] = [];
    const second: string[] = [];
    for (let i = 0; i < 52; i += 1) first.push(cardLabel(shoe.draw()));
    for (let i = 0; i < 52; i += 1) second.push(cardLabel(shoe.draw()));
    expect([...second].sort()).toEqual([...first].sort());
  });

  it("never runs dry", () => {
    const shoe = createShoe(2, 9);
    for (let i = 0; i < 1000; i += 1) {
      shoe.draw();
      expect(shoe.remaining()).toBeGreaterThanOrEqual(0);
    }
    expect(shoe.shuffles).toBe(9);
  });

  it("deals the same order for the same seed", () => {
    const a = createShoe(6, 42);
    const b = createShoe(6, 42);
    const drawA = Array.from({ length: 100 }, () => cardLabel(a.draw()));
    const drawB = Array.from({ length: 100 }, () => cardLabel(b.draw()));
    expect(drawA).toEqual(drawB);
  });

  it("rebuilds for a new deck count", () => {
    const shoe = createShoe(1, 5);
    shoe.draw();
    shoe.reset(2);
    expect(shoe.size()).toBe(104);
    expect(shoe.remaining()).toBe(104);
  });

  it("rejects deck counts below one", () => {
    expect(() => createShoe(0, 1)).toThrow(ConfigError);
    expect(() => createShoe(1.5, 1)).toThrow(ConfigError);
  });
});
