// src/engine/strategy.ts
//
// Random play vs EV-informed play over many independent legs.
//
// Per trial leg:
// 1. starting snapshot (random setup by default)
// 2. EV of every legal action from the Monte Carlo engine
// 3. for every policy: choose an action, play the leg once on its own, bank the payout
//
// Policies are data; adding one does not change the aggregation.

import type { Action, LegSnapshot } from "../types";
import { DEFAULT_TRIALS } from "./constants";
import { evaluateActions, insufficientTrials, type InsufficientTrials } from "./monteCarlo";
import { optimalPolicy, randomPolicy, type Policy } from "./policies";
import { mathRandomRng, type Rng } from "./rng";
import { randomStartingSnapshot } from "./setup";
import { simulateLeg } from "./simulateLeg";
import { actionPayout } from "./tickets";

export type CompareOptions = {
  /** Number of independent trial legs. */
  legs: number;

  /** Monte Carlo trials per EV evaluation. */
  evTrials?: number;

  rng?: Rng;

  startingSnapshot?: (rng: Rng) => LegSnapshot;

  /** Extra or replacement policies, keyed by name. "random" and "optimal" are always present. */
  policies?: Readonly<Record<string, Policy>>;
};

export type PolicyStats = {
  meanPayoff: number;
  totalPayoff: number;

  /** How often each action kind was chosen. */
  pyramidPicks: number;
  betPicks: number;
};

export type StrategyReport = {
  ok: true;
  legs: number;
  evTrials: number;
  policies: Readonly<Record<string, PolicyStats>>;
  randomMeanPayoff: number;
  optimalMeanPayoff: number;

  /** (optimal - random) / random * 100; null when random play earned nothing. */
  skillFactorPct: number | null;

  /** First-place probability per camel, averaged over the trial legs. */
  meanFirstPlaceProbabilities: Readonly<Record<string, number>>;
};

export type CompareResult = StrategyReport | InsufficientTrials;

export function skillFactorPct(randomMean: number, optimalMean: number): number | null {
  if (randomMean === 0) return null;
  return ((optimalMean - randomMean) / randomMean) * 100;
}

export function compareStrategies(opts: CompareOptions): CompareResult {
  const legs = opts.legs;
  const evTrials = opts.evTrials ?? DEFAULT_TRIALS;

  if (!Number.isInteger(legs) || legs <= 0) {
    return insufficientTrials(`Leg count must be a positive integer, got ${legs}.`);
  }
  if (!Number.isInteger(evTrials) || evTrials <= 0) {
    return insufficientTrials(`EV trial count must be a positive integer, got ${evTrials}.`);
  }

  const rng = opts.rng ?? mathRandomRng;
  const makeStart = opts.startingSnapshot ?? ((r: Rng) => randomStartingSnapshot(r));
  const policies: Record<string, Policy> = {
    random: randomPolicy,
    optimal: optimalPolicy,
    ...(opts.policies ?? {}),
  };
  const names = Object.keys(policies);

  const totals: Record<string, { payoff: number; pyramid: number; bet: number }> = {};
  for (const name of names) totals[name] = { payoff: 0, pyramid: 0, bet: 0 };

  const probabilitySums: Record<string, number> = {};

  for (let leg = 0; leg < legs; leg++) {
    const snapshot = makeStart(rng);

    const evaluation = evaluateActions(snapshot, { trials: evTrials, rng });
    if (!evaluation.ok) return evaluation;

    for (const [camel, p] of Object.entries(evaluation.probabilities)) {
      probabilitySums[camel] = (probabilitySums[camel] ?? 0) + p;
    }

    for (const name of names) {
      const chosen: Action = policies[name](evaluation.actions, rng).action;
      const { winner } = simulateLeg(snapshot.board, snapshot.bag, rng);

      const t = totals[name];
      t.payoff += actionPayout(chosen, winner);
      if (chosen.kind === "pyramid") t.pyramid++;
      else t.bet++;
    }
  }

  const stats: Record<string, PolicyStats> = {};
  for (const name of names) {
    const t = totals[name];
    stats[name] = {
      meanPayoff: t.payoff / legs,
      totalPayoff: t.payoff,
      pyramidPicks: t.pyramid,
      betPicks: t.bet,
    };
  }

  const meanFirstPlaceProbabilities: Record<string, number> = {};
  for (const [camel, sum] of Object.entries(probabilitySums)) {
    meanFirstPlaceProbabilities[camel] = sum / legs;
  }

  const randomMeanPayoff = stats.random.meanPayoff;
  const optimalMeanPayoff = stats.optimal.meanPayoff;

  return {
    ok: true,
    legs,
    evTrials,
    policies: stats,
    randomMeanPayoff,
    optimalMeanPayoff,
    skillFactorPct: skillFactorPct(randomMeanPayoff, optimalMeanPayoff),
    meanFirstPlaceProbabilities,
  };
}
