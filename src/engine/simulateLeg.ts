import type { BoardState, CamelId, DiceBag, MoveOutcome } from "../types";
import { advanceLeg } from "./legStep";
import type { Rng } from "./rng";
import { rankCamels } from "./stateUtils";
import { validateLegInput } from "./validateState";

export type LegResult = {
  ranking: readonly CamelId[];
  winner: CamelId;
  steps: readonly MoveOutcome[];

  /** Board and bag as the leg ended. */
  board: BoardState;
  bag: DiceBag;
};

/**
 * Play the rest of the leg from (board, bag).
 * At most bag.length steps; stops early when a move reaches the finish cell.
 * Inputs are not modified, so one snapshot can seed any number of trials.
 * Throws InvalidStateError for a duplicated or off-board die, or a leg that has already ended.
 */
export function simulateLeg(board: BoardState, bag: DiceBag, rng: Rng): LegResult {
  validateLegInput(board, bag, "simulateLeg");
  return playOutLeg(board, bag, rng);
}

/** simulateLeg without the entry check; the Monte Carlo loop validates its snapshot once. */
export function playOutLeg(board: BoardState, bag: DiceBag, rng: Rng): LegResult {
  let curBoard = board;
  let curBag = bag;
  const steps: MoveOutcome[] = [];

  while (curBag.length > 0) {
    const step = advanceLeg(curBoard, curBag, rng);
    curBoard = step.board;
    curBag = step.bag;
    steps.push(step.outcome);
    if (step.legEnded) break;
  }

  const ranking = rankCamels(curBoard);
  const winner = ranking[0];
  if (winner === undefined) throw new Error("simulateLeg: board has no camels");

  return { ranking, winner, steps, board: curBoard, bag: curBag };
}
