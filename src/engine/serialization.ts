import type { CamelId, LegSnapshot } from "../types";
import { InvalidStateError } from "./errors";
import { asCamelId } from "./makeState";
import { validateSnapshot } from "./validateState";

export function serializeSnapshot(snapshot: LegSnapshot): string {
  return JSON.stringify(snapshot);
}

export function deserializeSnapshot(json: string): LegSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InvalidStateError("deserializeSnapshot", `invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSnapshot(parsed, "deserializeSnapshot");
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function camelList(x: unknown, field: string, where: string): CamelId[] {
  if (!Array.isArray(x)) throw new InvalidStateError(where, `${field} not array`);
  return x.map((c, i) => {
    if (typeof c !== "string") throw new InvalidStateError(where, `${field}[${i}] not a string`);
    return asCamelId(c);
  });
}

/**
 * Shape-check an untrusted value (e.g. a protocol payload) and return it as a
 * validated LegSnapshot. Throws InvalidStateError on any mismatch.
 */
export function parseSnapshot(raw: unknown, where = "parseSnapshot"): LegSnapshot {
  if (!isObject(raw)) throw new InvalidStateError(where, "snapshot is not an object");

  const board = raw["board"];
  if (!isObject(board)) throw new InvalidStateError(where, "board is not an object");

  const finishIndex = board["finishIndex"];
  if (typeof finishIndex !== "number") throw new InvalidStateError(where, "board.finishIndex not a number");

  const rawCells = board["cells"];
  if (!Array.isArray(rawCells)) throw new InvalidStateError(where, "board.cells not array");
  const cells = rawCells.map((stack, i) => camelList(stack, `board.cells[${i}]`, where));

  const rawTickets = raw["tickets"] ?? {};
  if (!isObject(rawTickets)) throw new InvalidStateError(where, "tickets is not an object");
  const tickets: Record<string, number> = {};
  for (const [camel, count] of Object.entries(rawTickets)) {
    if (typeof count !== "number") throw new InvalidStateError(where, `tickets.${camel} not a number`);
    tickets[camel] = count;
  }

  const snapshot: LegSnapshot = {
    camels: camelList(raw["camels"], "camels", where),
    board: { finishIndex, cells },
    bag: camelList(raw["bag"], "bag", where),
    tickets,
  };

  validateSnapshot(snapshot, where);
  return snapshot;
}
