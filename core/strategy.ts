import { hardTotal } from "./hand";
import { nextInt, RNG } from "./rng";
import type { Decision, Situation, Strategy } from "./types";

/**
 * Placeholder play: double a two-card 9-11 when allowed, otherwise hit below
 * 17 and stand on the rest. Never surrenders. Not basic strategy.
 */
export const naiveStrategy: Strategy = {
  decide(s: Situation): Decision {
    const total = hardTotal(s.player);
    if (s.rules.doubleAllowed && s.canDouble && s.player.cards.length === 2 && total >= 9 && total <= 11) {
      return "D";
    }
    if (total < 17) return "H";
    return "S";
  },
};

export function legalDecisions(s: Situation): Decision[] {
  const decisions: Decision[] = ["H", "S"];
  if (s.canDouble && s.player.cards.length === 2) {
    decisions.push("D");
  }
  if (s.rules.surrender && s.player.cards.length === 2) {
    decisions.push("R");
  }
  return decisions;
}

/** Picks uniformly among the legal decisions. Randomness comes from the caller's RNG. */
export function createRandomStrategy(rng: RNG): Strategy {
  return {
    decide(s: Situation): Decision {
      const options = legalDecisions(s);
      return options[nextInt(rng, options.length)];
    },
  };
}
