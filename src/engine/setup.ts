// src/engine/setup.ts
//
// Random starting states for the strategy comparator.
//
// Setup roll: every camel's die is drawn from the pyramid once, in random
// order, and the camel is placed on the cell equal to the face (1..3).
// A camel arriving on an occupied cell goes on top.

import type { BoardState, CamelId, CamelStack, LegSnapshot } from "../types";
import { DEFAULT_CAMELS, DEFAULT_FINISH_INDEX, DIE_FACES, MAX_TICKETS_PER_CAMEL } from "./constants";
import { advanceLeg } from "./legStep";
import { nextInt, pick, type Rng } from "./rng";
import { validateSnapshot } from "./validateState";

export type StartingSnapshotOptions = {
  camels?: readonly CamelId[];
  finishIndex?: number;

  /** Dice already drawn this leg before the decision point (0..camels-1). */
  preRolledDice?: number;

  /** Betting tickets already claimed by other players, spread at random. */
  preClaimedTickets?: number;
};

export function randomStartingSnapshot(rng: Rng, opts: StartingSnapshotOptions = {}): LegSnapshot {
  const camels = opts.camels ?? DEFAULT_CAMELS;
  const finishIndex = opts.finishIndex ?? DEFAULT_FINISH_INDEX;
  const preRolled = opts.preRolledDice ?? 0;
  const preClaimed = opts.preClaimedTickets ?? 0;

  if (!Number.isInteger(finishIndex) || finishIndex <= DIE_FACES.length) {
    throw new RangeError(`finishIndex must be an integer above ${DIE_FACES.length}, got ${finishIndex}`);
  }
  if (!Number.isInteger(preRolled) || preRolled < 0 || preRolled >= camels.length) {
    throw new RangeError(`preRolledDice must be an integer in 0..${camels.length - 1}, got ${preRolled}`);
  }
  const ticketCap = camels.length * MAX_TICKETS_PER_CAMEL;
  if (!Number.isInteger(preClaimed) || preClaimed < 0 || preClaimed > ticketCap) {
    throw new RangeError(`preClaimedTickets must be an integer in 0..${ticketCap}, got ${preClaimed}`);
  }

  const cells: CamelStack[] = Array.from({ length: finishIndex + 1 }, () => []);

  const undrawn = [...camels];
  while (undrawn.length > 0) {
    const i = nextInt(rng, 0, undrawn.length - 1);
    const camel = undrawn[i];
    undrawn.splice(i, 1);
    const cell = pick(rng, DIE_FACES);
    cells[cell] = [...cells[cell], camel];
  }

  let board: BoardState = { finishIndex, cells };
  let bag: readonly CamelId[] = [...camels];

  for (let k = 0; k < preRolled; k++) {
    const step = advanceLeg(board, bag, rng);
    board = step.board;
    bag = step.bag;
    if (step.outcome.crossedFinish) {
      // the leg is over; nothing left to roll
      bag = [];
      break;
    }
  }

  const tickets: Record<string, number> = {};
  for (let k = 0; k < preClaimed; k++) {
    const open = camels.filter((c) => (tickets[c] ?? 0) < MAX_TICKETS_PER_CAMEL);
    const camel = pick(rng, open);
    tickets[camel] = (tickets[camel] ?? 0) + 1;
  }

  const snapshot: LegSnapshot = { camels: [...camels], board, bag, tickets };
  validateSnapshot(snapshot, "randomStartingSnapshot");
  return snapshot;
}
