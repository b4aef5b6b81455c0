import type { Card, Rank, Suit } from "./types";

export const RANKS: readonly Rank[] = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K", "A"];
export const SUITS: readonly Suit[] = ["clubs", "diamonds", "hearts", "spades"];

const SUIT_LETTER: Record<Suit, string> = {
  clubs: "C",
  diamonds: "D",
  hearts: "H",
  spades: "S",
};

export function makeCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/** Aces count 11 here; totalling downgrades them as needed. */
export function cardValue(card: Card): number {
  if (card.rank === "A") return 11;
  if (card.rank === "K" || card.rank === "Q" || card.rank === "J" || card.rank === "10") {
    return 10;
  }
  return Number(card.rank);
}

export function isTenValue(card: Card): boolean {
  return cardValue(card) === 10;
}

export function cardLabel(card: Card): string {
  const rank = card.rank === "10" ? "T" : card.rank;
  return `${rank}${SUIT_LETTER[card.suit]}`;
}

export function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(makeCard(rank, suit));
    }
  }
  return deck;
}
