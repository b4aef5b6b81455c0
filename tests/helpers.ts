import { Card, CardSource, Decision, makeCard, Rank, Strategy } from "../core";

export const card = (rank: Rank): Card => makeCard(rank, "spades");

/** Deals a fixed sequence of cards and fails loudly if the round asks for more. */
export class StackedSource implements CardSource {
  private index = 0;
  private readonly cards: Card[];

  constructor(ranks: Rank[]) {
    this.cards = ranks.map((rank) => card(rank));
  }

  draw(): Card {
    if (this.index >= this.cards.length) {
      throw new Error("Out of cards");
    }
    const next = this.cards[this.index];
    this.index += 1;
    return next;
  }

  drawn(): number {
    return this.index;
  }
}

export const always = (decision: Decision): Strategy => ({
  decide: () => decision,
});
