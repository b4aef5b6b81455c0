import { playRound } from "./game";
import { childLogger } from "./logger";
import { createShoe } from "./shoe";
import { RunningStats } from "./stats";
import { naiveStrategy } from "./strategy";
import type { RoundResult, SimConfig, SimStats } from "./types";

const log = childLogger("simulate");

export function createSimStats(): SimStats {
  return {
    rounds: 0,
    playerWins: 0,
    dealerWins: 0,
    pushes: 0,
    playerBlackjacks: 0,
    dealerBlackjacks: 0,
    busts: 0,
    surrenders: 0,
    doubles: 0,
    bankroll: 0,
    outcomes: {
      playerBlackjack: 0,
      dealerBlackjack: 0,
      playerBust: 0,
      dealerBust: 0,
      playerWin: 0,
      dealerWin: 0,
      push: 0,
      playerSurrender: 0,
    },
    evPerRound: 0,
    stdevPerRound: 0,
    ci95: [0, 0],
  };
}

/** Folds one finished round into the running totals. */
export function recordRound(stats: SimStats, result: RoundResult): void {
  stats.rounds += 1;
  stats.bankroll += result.net;
  stats.outcomes[result.outcome] += 1;
  if (result.playerHand.doubled) stats.doubles += 1;

  switch (result.outcome) {
    case "playerBlackjack":
      stats.playerBlackjacks += 1;
      stats.playerWins += 1;
      break;
    case "dealerBlackjack":
      stats.dealerBlackjacks += 1;
      stats.dealerWins += 1;
      break;
    case "dealerBust":
      stats.playerWins += 1;
      stats.busts += 1;
      break;
    case "playerBust":
      stats.dealerWins += 1;
      stats.busts += 1;
      break;
    case "playerWin":
      stats.playerWins += 1;
      break;
    case "dealerWin":
      stats.dealerWins += 1;
      break;
    case "push":
      stats.pushes += 1;
      break;
    case "playerSurrender":
      stats.surrenders += 1;
      break;
  }
}

function finalize(stats: SimStats, perRound: RunningStats): SimStats {
  stats.evPerRound = perRound.mean;
  stats.stdevPerRound = perRound.stdev();
  stats.ci95 = perRound.confidenceInterval();
  return stats;
}

function run(cfg: SimConfig, onRound?: (result: RoundResult) => void): SimStats {
  const strategy = cfg.strategy ?? naiveStrategy;
  const shoe = createShoe(cfg.rules.decks, cfg.seed);
  const stats = createSimStats();
  const perRound = new RunningStats();

  log.debug({ rounds: cfg.rounds, seed: cfg.seed, bet: cfg.bet, rules: cfg.rules }, "simulation started");

  for (let i = 0; i < cfg.rounds; i += 1) {
    const result = playRound(shoe, cfg.rules, strategy, cfg.bet);
    recordRound(stats, result);
    perRound.push(result.net);
    onRound?.(result);
  }

  finalize(stats, perRound);
  log.debug(
    { rounds: stats.rounds, bankroll: stats.bankroll, evPerRound: stats.evPerRound, shuffles: shoe.shuffles },
    "simulation finished"
  );
  return stats;
}

/**
 * Plays `rounds` rounds back to back on a single shoe seeded from `seed`.
 * Identical configs give identical stats.
 */
export function simulate(cfg: SimConfig): SimStats {
  return run(cfg);
}

/** Same as `simulate`, keeping every round for callers that show hands. */
export function simulateRounds(cfg: SimConfig): { results: RoundResult[]; stats: SimStats } {
  const results: RoundResult[] = [];
  const stats = run(cfg, (result) => {
    results.push(result);
  });
  return { results, stats };
}
