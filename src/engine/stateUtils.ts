// src/engine/stateUtils.ts

import type { BoardState, CamelId, LegSnapshot } from "../types";

export type CamelLocation = { cell: number; height: number };

export function locateCamel(board: BoardState, camel: CamelId): CamelLocation | null {
  for (let cell = 0; cell < board.cells.length; cell++) {
    const height = board.cells[cell].indexOf(camel);
    if (height >= 0) return { cell, height };
  }
  return null;
}

/**
 * Finishing order: furthest cell first; inside a cell, top of the stack first.
 */
export function rankCamels(board: BoardState): CamelId[] {
  const ranking: CamelId[] = [];
  for (let cell = board.cells.length - 1; cell >= 0; cell--) {
    const stack = board.cells[cell];
    for (let h = stack.length - 1; h >= 0; h--) ranking.push(stack[h]);
  }
  return ranking;
}

export function leader(board: BoardState): CamelId | null {
  return rankCamels(board)[0] ?? null;
}

export function cloneBoard(board: BoardState): BoardState {
  return {
    finishIndex: board.finishIndex,
    cells: board.cells.map((stack) => [...stack]),
  };
}

export function cloneSnapshot(snapshot: LegSnapshot): LegSnapshot {
  return {
    camels: [...snapshot.camels],
    board: cloneBoard(snapshot.board),
    bag: [...snapshot.bag],
    tickets: { ...snapshot.tickets },
  };
}
