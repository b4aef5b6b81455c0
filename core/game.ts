import { isTenValue } from "./cards";
import { addCard, createHand, handValue, hardTotal, isBlackjack, isBust, snapshotHand } from "./hand";
import type {
  CardSource,
  Decision,
  Hand,
  HandView,
  Outcome,
  RoundEvent,
  RoundResult,
  Rules,
  Strategy,
} from "./types";

export function dealerShouldHit(hand: HandView, rules: Rules): boolean {
  const { total, soft } = handValue(hand);
  if (total < 17) return true;
  if (total === 17 && soft && rules.dealerHitsSoft17) {
    return true;
  }
  return false;
}

/** Amount handed back to the player, stake included. Fractions truncate toward zero. */
export function payoutFor(outcome: Outcome, bet: number, doubled: boolean, rules: Rules): number {
  switch (outcome) {
    case "playerBlackjack":
      return bet + Math.trunc((bet * rules.blackjackPaysNum) / rules.blackjackPaysDen);
    case "dealerBlackjack":
    case "playerBust":
    case "dealerWin":
      return 0;
    case "dealerBust":
    case "playerWin":
      return doubled ? bet * 4 : bet * 2;
    case "push":
      return doubled ? bet * 2 : bet;
    case "playerSurrender":
      return Math.trunc(bet / 2);
  }
}

export function stakeFor(bet: number, doubled: boolean): number {
  return doubled ? bet * 2 : bet;
}

/**
 * Double is only on the table for the first decision; a late or disallowed
 * double and a surrender outside the first decision both fall back to stand.
 */
function effectiveDecision(decision: Decision, firstDecision: boolean, canDouble: boolean, rules: Rules): Decision {
  if (decision === "R") return firstDecision && rules.surrender ? "R" : "S";
  if (decision === "D") return canDouble ? "D" : "S";
  return decision;
}

export function playRound(source: CardSource, rules: Rules, strategy: Strategy, bet: number): RoundResult {
  const events: RoundEvent[] = [];
  const player = createHand();
  const dealer = createHand();
  let holeRevealed = false;

  const dealTo = (hand: Hand, target: "player" | "dealer", revealed: boolean) => {
    const card = source.draw();
    addCard(hand, card);
    events.push({ type: "deal", target, card, revealed });
  };

  const revealHole = () => {
    if (holeRevealed) return;
    holeRevealed = true;
    events.push({ type: "dealerReveal", card: dealer.cards[1] });
  };

  const settle = (outcome: Outcome): RoundResult => {
    revealHole();
    const payout = payoutFor(outcome, bet, player.doubled, rules);
    events.push({ type: "result", outcome, payout });
    return Object.freeze({
      outcome,
      playerTotal: hardTotal(player),
      dealerTotal: hardTotal(dealer),
      payout,
      net: payout - stakeFor(bet, player.doubled),
      playerHand: snapshotHand(player),
      dealerHand: snapshotHand(dealer),
      events,
    });
  };

  const playerTurn = (): Outcome | undefined => {
    for (;;) {
      const firstDecision = player.cards.length === 2;
      const canDouble = rules.doubleAllowed && firstDecision;
      const chosen = strategy.decide({
        player: snapshotHand(player),
        dealer: snapshotHand(dealer),
        rules,
        canDouble,
      });
      const decision = effectiveDecision(chosen, firstDecision, canDouble, rules);
      events.push({ type: "action", decision });

      if (decision === "R") {
        player.surrendered = true;
        return "playerSurrender";
      }
      if (decision === "D") {
        // one card and done; a bust here is left to the showdown
        player.doubled = true;
        dealTo(player, "player", true);
        return undefined;
      }
      if (decision === "H") {
        dealTo(player, "player", true);
        if (isBust(player)) return "playerBust";
        continue;
      }
      return undefined;
    }
  };

  const unsubscribe = source.onShuffle?.(() => {
    events.push({ type: "shuffle" });
  });

  try {
    dealTo(player, "player", true);
    dealTo(dealer, "dealer", true);
    dealTo(player, "player", true);
    dealTo(dealer, "dealer", false);

    const upCard = dealer.cards[0];
    if (rules.peekForBlackjack && (isTenValue(upCard) || upCard.rank === "A") && isBlackjack(dealer)) {
      return settle(isBlackjack(player) ? "push" : "dealerBlackjack");
    }

    if (isBlackjack(player)) {
      return settle("playerBlackjack");
    }

    const early = playerTurn();
    if (early) {
      return settle(early);
    }

    revealHole();
    while (dealerShouldHit(dealer, rules)) {
      dealTo(dealer, "dealer", true);
    }

    if (isBust(dealer)) return settle("dealerBust");
    const playerTotal = hardTotal(player);
    const dealerTotal = hardTotal(dealer);
    if (playerTotal > dealerTotal) return settle("playerWin");
    if (playerTotal < dealerTotal) return settle("dealerWin");
    return settle("push");
  } finally {
    unsubscribe?.();
  }
}
