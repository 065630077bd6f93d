// src/engine/applyMove.ts
//
// Deterministic half of a leg step: move one camel (and its riders) a known
// distance. Random selection lives in legStep.ts.
//
// Stacking rule:
// - the selected camel and every camel above it move as one group
// - the group keeps its internal order and lands on top of the target stack
// - camels below the selected one stay on the origin cell

import type { BoardState, CamelId, CamelStack, DieFace, MoveOutcome } from "../types";
import { locateCamel } from "./stateUtils";

export type StackMoveResult = {
  board: BoardState;
  outcome: MoveOutcome;
};

export function moveCamelStack(board: BoardState, camel: CamelId, distance: DieFace): StackMoveResult {
  const loc = locateCamel(board, camel);
  if (!loc) throw new Error(`moveCamelStack: camel ${camel} is not on the board`);

  const from = loc.cell;
  const reach = from + distance;
  const crossedFinish = reach >= board.finishIndex;
  const to = Math.min(reach, board.finishIndex);

  const origin = board.cells[from];
  const staying = origin.slice(0, loc.height);
  const carried = origin.slice(loc.height);

  const cells: CamelStack[] = board.cells.slice();
  cells[from] = staying;
  cells[to] = [...cells[to], ...carried];

  return {
    board: { finishIndex: board.finishIndex, cells },
    outcome: { camel, distance, from, to, carried, crossedFinish },
  };
}
