import { buildDeck } from "./cards";
import { ConfigError } from "./errors";
import { childLogger } from "./logger";
import { createRng, RNG, shuffleInPlace } from "./rng";
import type { Card, CardSource } from "./types";

const log = childLogger("shoe");

export class Shoe implements CardSource {
  private cards: Card[] = [];
  private index = 0;
  private readonly rng: RNG;
  private readonly listeners = new Set<() => void>();
  private shuffleCount = 0;

  constructor(decks: number, rng: RNG, onShuffle?: () => void) {
    this.rng = rng;
    if (onShuffle) {
      this.listeners.add(onShuffle);
    }
    this.reset(decks);
  }

  onShuffle(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Rebuilds the shoe from scratch for the given deck count. */
  reset(decks: number) {
    if (!Number.isInteger(decks) || decks < 1) {
      throw new ConfigError("Invalid shoe", [`decks must be a positive integer, got ${decks}`]);
    }
    this.cards = [];
    for (let d = 0; d < decks; d += 1) {
      this.cards.push(...buildDeck());
    }
    shuffleInPlace(this.cards, this.rng);
    this.index = 0;
  }

  // Same physical cards, new order.
  private reshuffle() {
    shuffleInPlace(this.cards, this.rng);
    this.index = 0;
    this.shuffleCount += 1;
    log.debug({ size: this.cards.length, shuffles: this.shuffleCount }, "shoe reshuffled");
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  draw(): Card {
    if (this.index >= this.cards.length) {
      this.reshuffle();
    }
    const card = this.cards[this.index];
    this.index += 1;
    return card;
  }

  remaining(): number {
    return this.cards.length - this.index;
  }

  size(): number {
    return this.cards.length;
  }

  get shuffles(): number {
    return this.shuffleCount;
  }
}

export function createShoe(decks: number, seed?: number): Shoe {
  return new Shoe(decks, createRng(seed));
}
