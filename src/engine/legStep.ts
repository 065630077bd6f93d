import type { BoardState, DiceBag, MoveOutcome } from "../types";
import { DIE_FACES } from "./constants";
import { moveCamelStack } from "./applyMove";
import { nextInt, pick, type Rng } from "./rng";
import { checkpointBoard, validateLegInput } from "./validateState";

export type LegStepResult = {
  board: BoardState;
  bag: DiceBag;
  outcome: MoveOutcome;

  /** Bag is now empty, or this move reached the finish cell. */
  legEnded: boolean;
};

/**
 * One pyramid roll: draw a die from the bag (without replacement), roll it,
 * move that camel's group.
 *
 * Draw order on the rng is fixed: bag index first, then the face.
 * Callers check the bag before stepping; an empty bag is a logic error.
 * Throws InvalidStateError when the board and bag do not form an open leg.
 */
export function stepLeg(board: BoardState, bag: DiceBag, rng: Rng): LegStepResult {
  validateLegInput(board, bag, "stepLeg");
  return advanceLeg(board, bag, rng);
}

/** stepLeg without the entry check, for loops that validated their start state. */
export function advanceLeg(board: BoardState, bag: DiceBag, rng: Rng): LegStepResult {
  if (bag.length === 0) {
    throw new Error("stepLeg called with an empty dice bag");
  }

  const index = nextInt(rng, 0, bag.length - 1);
  const camel = bag[index];
  const distance = pick(rng, DIE_FACES);

  const nextBag = [...bag.slice(0, index), ...bag.slice(index + 1)];
  const moved = moveCamelStack(board, camel, distance);
  checkpointBoard(board, moved.board, "stepLeg");

  return {
    board: moved.board,
    bag: nextBag,
    outcome: moved.outcome,
    legEnded: nextBag.length === 0 || moved.outcome.crossedFinish,
  };
}
