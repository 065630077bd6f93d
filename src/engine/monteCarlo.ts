// src/engine/monteCarlo.ts
//
// Leg-winner frequencies by repeated simulation, and action EVs derived from them.
// Every trial starts from the same snapshot; simulateLeg never mutates it, so
// trials are independent and tallies from separate runs can simply be added.

import type { ActionValue, InsufficientTrialsWarning, LegSnapshot } from "../types";
import { DEFAULT_TRIALS, PAYOUT_TABLE, PYRAMID_TICKET_EV } from "./constants";
import { legalActions } from "./legalMoves";
import { mathRandomRng, type Rng } from "./rng";
import { playOutLeg } from "./simulateLeg";
import { validateSnapshot } from "./validateState";

export type EstimateOptions = {
  /** Requested number of trials. Defaults to DEFAULT_TRIALS. */
  trials?: number;

  rng?: Rng;

  /**
   * Optional cutoff (wall clock, external budget...). Asked before each trial with
   * the number completed so far; returning true keeps the partial tally.
   */
  shouldStop?: (completed: number) => boolean;
};

export type WinTally = {
  trials: number;
  firstPlaceCounts: Readonly<Record<string, number>>;
};

export type InsufficientTrials = {
  ok: false;
  warning: InsufficientTrialsWarning;
};

export type WinEstimate =
  | (WinTally & {
      ok: true;
      probabilities: Readonly<Record<string, number>>;
    })
  | InsufficientTrials;

export type ActionEvaluation =
  | {
      ok: true;
      trials: number;
      probabilities: Readonly<Record<string, number>>;
      actions: readonly ActionValue[];
    }
  | InsufficientTrials;

export function insufficientTrials(message: string): InsufficientTrials {
  return { ok: false, warning: { code: "INSUFFICIENT_TRIALS", message } };
}

function isUsableTrialCount(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/** Run up to `trials` legs from the snapshot and count first places. */
export function tallyLegWinners(
  snapshot: LegSnapshot,
  trials: number,
  rng: Rng,
  shouldStop?: (completed: number) => boolean
): WinTally {
  validateSnapshot(snapshot, "tallyLegWinners");

  const counts: Record<string, number> = {};
  for (const camel of snapshot.camels) counts[camel] = 0;

  let completed = 0;
  while (completed < trials) {
    if (shouldStop && shouldStop(completed)) break;
    const { winner } = playOutLeg(snapshot.board, snapshot.bag, rng);
    counts[winner] += 1;
    completed++;
  }

  return { trials: completed, firstPlaceCounts: counts };
}

/** Additive merge; partial tallies from separate workers combine in any order. */
export function mergeTallies(a: WinTally, b: WinTally): WinTally {
  const counts: Record<string, number> = { ...a.firstPlaceCounts };
  for (const [camel, n] of Object.entries(b.firstPlaceCounts)) {
    counts[camel] = (counts[camel] ?? 0) + n;
  }
  return { trials: a.trials + b.trials, firstPlaceCounts: counts };
}

export function probabilitiesFromTally(tally: WinTally): WinEstimate {
  if (tally.trials <= 0) {
    return insufficientTrials("No trials completed; no estimate produced.");
  }

  const probabilities: Record<string, number> = {};
  for (const [camel, n] of Object.entries(tally.firstPlaceCounts)) {
    probabilities[camel] = n / tally.trials;
  }

  return { ok: true, trials: tally.trials, firstPlaceCounts: tally.firstPlaceCounts, probabilities };
}

/** P(camel leads at leg end) for every roster camel. */
export function estimateLegWinner(snapshot: LegSnapshot, opts: EstimateOptions = {}): WinEstimate {
  validateSnapshot(snapshot, "estimateLegWinner");

  const trials = opts.trials ?? DEFAULT_TRIALS;
  if (!isUsableTrialCount(trials)) {
    return insufficientTrials(`Trial count must be a positive integer, got ${trials}.`);
  }

  const tally = tallyLegWinners(snapshot, trials, opts.rng ?? mathRandomRng, opts.shouldStop);
  return probabilitiesFromTally(tally);
}

/**
 * EV of every legal action:
 * - pyramid ticket: exactly 1 coin
 * - next ticket on camel c at position N: PAYOUT_TABLE[N] * P(c first)
 */
export function evaluateActions(snapshot: LegSnapshot, opts: EstimateOptions = {}): ActionEvaluation {
  const estimate = estimateLegWinner(snapshot, opts);
  if (!estimate.ok) return estimate;

  return {
    ok: true,
    trials: estimate.trials,
    probabilities: estimate.probabilities,
    actions: priceActions(snapshot, estimate.probabilities),
  };
}

export function priceActions(snapshot: LegSnapshot, probabilities: Readonly<Record<string, number>>): ActionValue[] {
  return legalActions(snapshot).map((action) => {
    if (action.kind === "pyramid") return { action, ev: PYRAMID_TICKET_EV };
    return { action, ev: PAYOUT_TABLE[action.position] * (probabilities[action.camel] ?? 0) };
  });
}

/** Highest EV first; equal EVs keep their offered order. */
export function rankActions(actions: readonly ActionValue[]): ActionValue[] {
  return actions
    .map((value, order) => ({ value, order }))
    .sort((a, b) => b.value.ev - a.value.ev || a.order - b.order)
    .map(({ value }) => value);
}

export function bestAction(actions: readonly ActionValue[]): ActionValue {
  const best = rankActions(actions)[0];
  if (best === undefined) throw new Error("bestAction called with no actions");
  return best;
}

