// src/engine/errors.ts

import type { CamelId } from "../types";

export type EngineErrorCode = "INVALID_STATE" | "EXHAUSTED_TICKETS";

/**
 * Supplied board/bag/tickets break a structural invariant
 * (duplicated or missing camel, out-of-range cell, bad ticket count).
 * Always a caller bug; never recovered inside the engine.
 */
export class InvalidStateError extends Error {
  readonly code = "INVALID_STATE" as const;

  constructor(readonly where: string, readonly detail: string) {
    super(`[validateState @ ${where}] ${detail}`);
    this.name = "InvalidStateError";
  }
}

/** A 5th betting ticket was requested for a camel. */
export class ExhaustedTicketsError extends Error {
  readonly code = "EXHAUSTED_TICKETS" as const;

  constructor(readonly camel: CamelId) {
    super(`No betting tickets left for camel ${camel}.`);
    this.name = "ExhaustedTicketsError";
  }
}

export function isEngineError(err: unknown): err is InvalidStateError | ExhaustedTicketsError {
  return err instanceof InvalidStateError || err instanceof ExhaustedTicketsError;
}
