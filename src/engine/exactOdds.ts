// src/engine/exactOdds.ts
//
// Exact leg-winner probabilities by walking every draw order and every face.
// Exponential (n! * 3^n leaves), so only for small bags; it is the reference
// the Monte Carlo estimator is checked against.

import type { BoardState, CamelId, DiceBag, DieFace, LegSnapshot } from "../types";
import { DIE_FACES, EXACT_ENUMERATION_MAX_DICE } from "./constants";
import { moveCamelStack } from "./applyMove";
import { leader } from "./stateUtils";
import { validateSnapshot } from "./validateState";

export type ExactOdds = {
  /** Number of (draw order, faces) paths that were walked. */
  paths: number;
  probabilities: Readonly<Record<string, number>>;
};

export function exactLegOdds(snapshot: LegSnapshot): ExactOdds {
  validateSnapshot(snapshot, "exactLegOdds");

  if (snapshot.bag.length > EXACT_ENUMERATION_MAX_DICE) {
    throw new RangeError(
      `exactLegOdds supports at most ${EXACT_ENUMERATION_MAX_DICE} dice in the bag, got ${snapshot.bag.length}`
    );
  }

  const probabilities: Record<string, number> = {};
  for (const camel of snapshot.camels) probabilities[camel] = 0;

  let paths = 0;

  const credit = (board: BoardState, weight: number) => {
    const winner = leader(board);
    if (winner === null) throw new Error("exactLegOdds: board has no camels");
    probabilities[winner] += weight;
    paths++;
  };

  const walk = (board: BoardState, bag: DiceBag, weight: number) => {
    if (bag.length === 0) {
      credit(board, weight);
      return;
    }

    const branch = weight / (bag.length * DIE_FACES.length);
    bag.forEach((camel, i) => {
      const rest = [...bag.slice(0, i), ...bag.slice(i + 1)];
      for (const face of DIE_FACES) {
        const moved = moveCamelStack(board, camel, face);
        if (moved.outcome.crossedFinish) credit(moved.board, branch);
        else walk(moved.board, rest, branch);
      }
    });
  };

  walk(snapshot.board, snapshot.bag, 1);

  return { paths, probabilities };
}

export type SingleDieOutcome = {
  camel: CamelId;
  face: DieFace;
  leader: CamelId;
};

export type SingleDieReport = {
  outcomes: readonly SingleDieOutcome[];

  /** Share of the listed outcomes each camel would lead, all faces equally likely. */
  leadShare: Readonly<Record<string, number>>;
};

/**
 * Look one roll ahead: for every die still in the bag and every face,
 * which camel leads right after that single move.
 */
export function singleDieOutcomes(snapshot: LegSnapshot): SingleDieReport {
  validateSnapshot(snapshot, "singleDieOutcomes");

  const outcomes: SingleDieOutcome[] = [];
  const leadShare: Record<string, number> = {};
  for (const camel of snapshot.camels) leadShare[camel] = 0;

  const total = snapshot.bag.length * DIE_FACES.length;

  for (const camel of snapshot.bag) {
    for (const face of DIE_FACES) {
      const { board } = moveCamelStack(snapshot.board, camel, face);
      const first = leader(board);
      if (first === null) throw new Error("singleDieOutcomes: board has no camels");
      outcomes.push({ camel, face, leader: first });
      leadShare[first] += 1 / total;
    }
  }

  return { outcomes, leadShare };
}
