import type { ActionValue } from "../types";
import { bestAction } from "./monteCarlo";
import { pick, type Rng } from "./rng";

/**
 * A policy picks one of the offered (action, EV) pairs.
 * The rng is the caller's single randomness source; deterministic policies ignore it.
 */
export type Policy = (choices: readonly ActionValue[], rng: Rng) => ActionValue;

export const randomPolicy: Policy = (choices, rng) => {
  if (choices.length === 0) throw new Error("randomPolicy called with no choices");
  return pick(rng, choices);
};

export const optimalPolicy: Policy = (choices) => {
  if (choices.length === 0) throw new Error("optimalPolicy called with no choices");
  return bestAction(choices);
};

/** Take the best bet only when it beats the pyramid ticket by `margin` coins. */
export function thresholdPolicy(margin: number): Policy {
  return (choices) => {
    const pyramid = choices.find((c) => c.action.kind === "pyramid");
    const best = bestAction(choices);
    if (pyramid && best.action.kind === "bet" && best.ev - pyramid.ev < margin) return pyramid;
    return best;
  };
}
