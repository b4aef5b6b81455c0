import { z } from "zod";
import { ConfigError } from "./errors";
import type { Rules, SimConfig, Strategy } from "./types";

export const DEFAULT_RULES: Readonly<Rules> = Object.freeze({
  decks: 6,
  dealerHitsSoft17: true,
  doubleAllowed: true,
  doubleAfterSplit: true,
  surrender: false,
  peekForBlackjack: true,
  blackjackPaysNum: 3,
  blackjackPaysDen: 2,
});

export const rulesSchema = z.object({
  decks: z.number().int().min(1).default(DEFAULT_RULES.decks),
  dealerHitsSoft17: z.boolean().default(DEFAULT_RULES.dealerHitsSoft17),
  doubleAllowed: z.boolean().default(DEFAULT_RULES.doubleAllowed),
  doubleAfterSplit: z.boolean().default(DEFAULT_RULES.doubleAfterSplit),
  surrender: z.boolean().default(DEFAULT_RULES.surrender),
  peekForBlackjack: z.boolean().default(DEFAULT_RULES.peekForBlackjack),
  blackjackPaysNum: z.number().int().min(0).default(DEFAULT_RULES.blackjackPaysNum),
  blackjackPaysDen: z.number().int().min(1).default(DEFAULT_RULES.blackjackPaysDen),
});

export const simConfigSchema = z.object({
  rounds: z.number().int().min(0),
  seed: z.number().int(),
  bet: z.number().int().min(0),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Missing fields fall back to DEFAULT_RULES. */
export function parseRules(input: unknown = {}): Rules {
  const parsed = rulesSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError("Invalid rules", formatIssues(parsed.error));
  }
  return Object.freeze({ ...parsed.data });
}

const PAYS_PATTERN = /^\s*(\d+)\s*[:/]\s*(\d+)\s*$/;

/** "3:2" or "6/5" to the num/den pair Rules expects. */
export function parseBlackjackPays(ratio: string): Pick<Rules, "blackjackPaysNum" | "blackjackPaysDen"> {
  const match = PAYS_PATTERN.exec(ratio);
  if (!match) {
    throw new ConfigError("Invalid blackjack payout", [`expected "num:den", got "${ratio}"`]);
  }
  const num = Number(match[1]);
  const den = Number(match[2]);
  if (den === 0) {
    throw new ConfigError("Invalid blackjack payout", ["denominator must be at least 1"]);
  }
  return { blackjackPaysNum: num, blackjackPaysDen: den };
}

export interface SimConfigInput {
  rounds: unknown;
  seed: unknown;
  bet: unknown;
  rules?: unknown;
  strategy?: Strategy;
}

export function parseSimConfig(input: SimConfigInput): SimConfig {
  const parsed = simConfigSchema.safeParse({ rounds: input.rounds, seed: input.seed, bet: input.bet });
  if (!parsed.success) {
    throw new ConfigError("Invalid simulation config", formatIssues(parsed.error));
  }
  return {
    ...parsed.data,
    rules: parseRules(input.rules),
    strategy: input.strategy,
  };
}
