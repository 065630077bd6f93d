import type { BoardState, CamelId, DiceBag, LegSnapshot, TicketRecord } from "../types";
import { MAX_TICKETS_PER_CAMEL } from "./constants";
import { InvalidStateError } from "./errors";

let checkpoints = process.env.CAMELUP_VALIDATE_STATE !== "0";

/** Turn the per-step board checkpoints on or off. Entry validation always runs. */
export function setStateCheckpoints(enabled: boolean): void {
  checkpoints = enabled;
}

/**
 * validateSnapshot (structural only)
 *
 * Checks the invariants every leg operation relies on:
 * - board has exactly finishIndex + 1 cells
 * - every roster camel sits in exactly one stack slot, nothing else is on the board
 * - bag is a duplicate-free subset of the roster
 * - no camel stands on the finish cell while dice remain (that leg is over)
 * - ticket counts are integers 0..4 on roster camels
 *
 * Public operations call this on entry unconditionally.
 */
export function validateSnapshot(snapshot: LegSnapshot, where = "unknown"): void {
  assert(snapshot && typeof snapshot === "object", "snapshot missing", where);
  assert(Array.isArray(snapshot.camels), "camels not array", where);
  assert(snapshot.camels.length > 0, "no camels", where);

  const roster = new Set<string>();
  for (const c of snapshot.camels) {
    assert(typeof c === "string" && c.length > 0, "camel id invalid", where);
    assert(!roster.has(c), `duplicate camel in roster: ${c}`, where);
    roster.add(c);
  }

  validateBoard(snapshot.board, snapshot.camels, where);
  validateBag(snapshot.bag, roster, where);
  validateLegOpen(snapshot.board, snapshot.bag, where);
  validateTickets(snapshot.tickets, roster, where);
}

/**
 * Entry check for the leg stepper and simulator, which take a board and bag
 * without a roster: the camels on the board stand in for it.
 */
export function validateLegInput(board: BoardState, bag: DiceBag, where: string): void {
  assert(board && typeof board === "object" && Array.isArray(board.cells), "board.cells not array", where);
  const onBoard = board.cells.flat();
  validateBoard(board, onBoard, where);
  validateBag(bag, new Set<string>(onBoard), where);
  validateLegOpen(board, bag, where);
}

/**
 * Conservation check after a move: `after` must hold exactly the camels of
 * `before`. Runs inside stepLeg; skipped when CAMELUP_VALIDATE_STATE=0.
 */
export function checkpointBoard(before: BoardState, after: BoardState, where: string): void {
  if (!checkpoints) return;
  validateBoard(after, before.cells.flat(), where);
}

export function validateBoard(board: BoardState, camels: readonly CamelId[], where: string): void {
  assert(board && typeof board === "object", "board missing", where);
  assert(Number.isInteger(board.finishIndex), "board.finishIndex not integer", where);
  assert(board.finishIndex > 0, "board.finishIndex must be positive", where);
  assert(Array.isArray(board.cells), "board.cells not array", where);
  assert(
    board.cells.length === board.finishIndex + 1,
    `board has ${board.cells.length} cells, expected ${board.finishIndex + 1}`,
    where
  );

  const expected = new Set<string>(camels);
  const seen = new Set<string>();

  board.cells.forEach((stack, cell) => {
    assert(Array.isArray(stack), `cell ${cell} is not a stack`, where);
    for (const camel of stack) {
      assert(expected.has(camel), `unknown camel on board: ${String(camel)} (cell ${cell})`, where);
      assert(!seen.has(camel), `camel appears twice: ${camel}`, where);
      seen.add(camel);
    }
  });

  for (const camel of camels) {
    assert(seen.has(camel), `camel missing from board: ${camel}`, where);
  }
}

function validateBag(bag: DiceBag, roster: ReadonlySet<string>, where: string): void {
  assert(Array.isArray(bag), "bag not array", where);
  const seen = new Set<string>();
  for (const camel of bag) {
    assert(roster.has(camel), `bag holds unknown camel: ${String(camel)}`, where);
    assert(!seen.has(camel), `bag holds camel twice: ${camel}`, where);
    seen.add(camel);
  }
}

function validateLegOpen(board: BoardState, bag: DiceBag, where: string): void {
  const atFinish = board.cells[board.finishIndex];
  assert(
    bag.length === 0 || atFinish.length === 0,
    `leg already ended: ${atFinish.join(",")} on the finish cell with ${bag.length} dice left`,
    where
  );
}

function validateTickets(tickets: TicketRecord, roster: ReadonlySet<string>, where: string): void {
  assert(tickets && typeof tickets === "object", "tickets missing", where);
  for (const [camel, count] of Object.entries(tickets)) {
    assert(roster.has(camel), `tickets for unknown camel: ${camel}`, where);
    assert(Number.isInteger(count), `ticket count for ${camel} not integer`, where);
    assert(
      typeof count === "number" && count >= 0 && count <= MAX_TICKETS_PER_CAMEL,
      `ticket count for ${camel} out of range: ${String(count)}`,
      where
    );
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new InvalidStateError(where, message);
}
