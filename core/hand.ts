import { cardValue } from "./cards";
import type { Card, Hand, HandView } from "./types";

export function createHand(): Hand {
  return {
    cards: [],
    doubled: false,
    surrendered: false,
  };
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

/** Frozen copy for strategies and results; later draws do not show up in it. */
export function snapshotHand(hand: HandView): HandView {
  return Object.freeze({
    cards: Object.freeze([...hand.cards]),
    doubled: hand.doubled,
    surrendered: hand.surrendered,
  });
}

export interface HandValue {
  total: number;
  soft: boolean;
}

/**
 * Counts every ace as 11, then downgrades aces to 1 one at a time while the
 * total is over 21. Soft means at least one ace survived the downgrade.
 */
export function handValue(hand: HandView): HandValue {
  let total = 0;
  let aces = 0;
  for (const card of hand.cards) {
    total += cardValue(card);
    if (card.rank === "A") aces += 1;
  }
  let reduced = 0;
  while (total > 21 && reduced < aces) {
    total -= 10;
    reduced += 1;
  }
  return { total, soft: reduced < aces && total <= 21 };
}

export function hardTotal(hand: HandView): number {
  return handValue(hand).total;
}

export function isSoft(hand: HandView): boolean {
  return handValue(hand).soft;
}

export function isBlackjack(hand: HandView): boolean {
  return hand.cards.length === 2 && hardTotal(hand) === 21;
}

export function isBust(hand: HandView): boolean {
  return hardTotal(hand) > 21;
}
