import type { BoardState, CamelId, CamelStack, DiceBag, LegSnapshot, TicketRecord } from "../types";
import { DEFAULT_FINISH_INDEX } from "./constants";
import { InvalidStateError } from "./errors";
import { validateSnapshot } from "./validateState";

export function asCamelId(s: string): CamelId {
  return s as CamelId;
}

/** Cell index -> stack (bottom first). Cells not listed are empty. */
export type Placements = Readonly<Record<number, readonly string[]>>;

/**
 * Build a board from sparse placements.
 * Throws InvalidStateError for a cell outside 0..finishIndex.
 */
export function makeBoard(finishIndex: number, placements: Placements): BoardState {
  if (!Number.isInteger(finishIndex) || finishIndex <= 0) {
    throw new InvalidStateError("makeBoard", `finishIndex must be a positive integer, got ${finishIndex}`);
  }

  const cells: CamelStack[] = Array.from({ length: finishIndex + 1 }, () => []);

  for (const [key, stack] of Object.entries(placements)) {
    const cell = Number(key);
    if (!Number.isInteger(cell) || cell < 0 || cell > finishIndex) {
      throw new InvalidStateError("makeBoard", `cell index out of bounds: ${key}`);
    }
    cells[cell] = stack.map(asCamelId);
  }

  return { finishIndex, cells };
}

export type MakeSnapshotOptions = {
  placements: Placements;

  /** Defaults to every camel found in placements, in board order (cell asc, bottom first). */
  camels?: readonly string[];

  finishIndex?: number;

  /** Defaults to the whole roster (nobody rolled yet). */
  bag?: readonly string[];

  tickets?: Readonly<Record<string, number>>;
};

/**
 * Validated leg snapshot from caller-supplied placements.
 * Initial stacking order is whatever the caller lists; no default is guessed.
 */
export function makeSnapshot(opts: MakeSnapshotOptions): LegSnapshot {
  const board = makeBoard(opts.finishIndex ?? DEFAULT_FINISH_INDEX, opts.placements);

  const camels: readonly CamelId[] = opts.camels
    ? opts.camels.map(asCamelId)
    : board.cells.flatMap((stack) => stack);

  const bag: DiceBag = opts.bag ? opts.bag.map(asCamelId) : [...camels];

  const tickets: TicketRecord = { ...(opts.tickets ?? {}) };

  const snapshot: LegSnapshot = { camels, board, bag, tickets };
  validateSnapshot(snapshot, "makeSnapshot");
  return snapshot;
}

