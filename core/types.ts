export type Rank =
  | "A"
  | "2"
  | "3"
  | "4"
  | "5"
  | "6"
  | "7"
  | "8"
  | "9"
  | "10"
  | "J"
  | "Q"
  | "K";

export type Suit = "clubs" | "diamonds" | "hearts" | "spades";

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export interface Hand {
  cards: Card[];
  doubled: boolean;
  surrendered: boolean;
}

/** A hand that can be looked at but not changed. */
export interface HandView {
  readonly cards: readonly Card[];
  readonly doubled: boolean;
  readonly surrendered: boolean;
}

/** H = hit, S = stand, D = double, R = surrender. */
export type Decision = "H" | "S" | "D" | "R";

export interface Rules {
  decks: number;
  dealerHitsSoft17: boolean;
  doubleAllowed: boolean;
  doubleAfterSplit: boolean; // accepted for completeness; hands are never split
  surrender: boolean;
  peekForBlackjack: boolean;
  blackjackPaysNum: number;
  blackjackPaysDen: number;
}

/**
 * What a strategy gets to see for a single decision. Built fresh for every
 * call and never kept around.
 */
export interface Situation {
  readonly player: HandView;
  readonly dealer: HandView;
  readonly rules: Readonly<Rules>;
  readonly canDouble: boolean;
}

export interface Strategy {
  decide(situation: Situation): Decision;
}

/** Anything the round can draw from. `Shoe` is the production source. */
export interface CardSource {
  draw(): Card;
  /** Registers a reshuffle listener; the returned function removes it. */
  onShuffle?(listener: () => void): () => void;
}

export type Outcome =
  | "playerBlackjack"
  | "dealerBlackjack"
  | "playerBust"
  | "dealerBust"
  | "playerWin"
  | "dealerWin"
  | "push"
  | "playerSurrender";

export type RoundEvent =
  | { type: "deal"; target: "player" | "dealer"; card: Card; revealed: boolean }
  | { type: "action"; decision: Decision }
  | { type: "dealerReveal"; card: Card }
  | { type: "result"; outcome: Outcome; payout: number }
  | { type: "shuffle" };

export interface RoundResult {
  readonly outcome: Outcome;
  readonly playerTotal: number;
  readonly dealerTotal: number;
  readonly payout: number;
  readonly net: number;
  readonly playerHand: HandView;
  readonly dealerHand: HandView;
  readonly events: readonly RoundEvent[];
}

export interface SimConfig {
  rounds: number;
  rules: Rules;
  seed: number;
  bet: number;
  strategy?: Strategy;
}

export interface SimStats {
  rounds: number;
  playerWins: number;
  dealerWins: number;
  pushes: number;
  playerBlackjacks: number;
  dealerBlackjacks: number;
  busts: number;
  surrenders: number;
  doubles: number;
  bankroll: number;
  outcomes: Record<Outcome, number>;
  evPerRound: number;
  stdevPerRound: number;
  ci95: [number, number];
}
