// src/engine/tickets.ts

import type { Action, CamelId, LegSnapshot, TicketPosition, TicketRecord } from "../types";
import { MAX_TICKETS_PER_CAMEL, PAYOUT_TABLE, PYRAMID_TICKET_EV } from "./constants";
import { ExhaustedTicketsError, InvalidStateError } from "./errors";
import { validateSnapshot } from "./validateState";

export const PYRAMID_ACTION: Action = { id: "pyramid", kind: "pyramid" };

export function betAction(camel: CamelId, position: TicketPosition): Action {
  return { id: `bet:${camel}:${position}`, kind: "bet", camel, position };
}

function toTicketPosition(n: number): TicketPosition | null {
  return n === 1 || n === 2 || n === 3 || n === 4 ? n : null;
}

/** Position the next claimed ticket on `camel` would take, or null if all 4 are gone. */
export function nextTicketPosition(tickets: TicketRecord, camel: CamelId): TicketPosition | null {
  const claimed = tickets[camel] ?? 0;
  if (claimed >= MAX_TICKETS_PER_CAMEL) return null;
  return toTicketPosition(claimed + 1);
}

export type ClaimResult = {
  snapshot: LegSnapshot;
  position: TicketPosition;
};

/**
 * Take the next betting ticket on `camel`.
 * Claiming does not touch the board or the dice bag.
 */
export function claimBettingTicket(snapshot: LegSnapshot, camel: CamelId): ClaimResult {
  validateSnapshot(snapshot, "claimBettingTicket");

  if (!snapshot.camels.includes(camel)) {
    throw new InvalidStateError("claimBettingTicket", `unknown camel: ${camel}`);
  }

  const position = nextTicketPosition(snapshot.tickets, camel);
  if (position === null) throw new ExhaustedTicketsError(camel);

  return {
    snapshot: { ...snapshot, tickets: { ...snapshot.tickets, [camel]: position } },
    position,
  };
}

/** Realized coins for an action once the leg winner is known. */
export function actionPayout(action: Action, winner: CamelId): number {
  if (action.kind === "pyramid") return PYRAMID_TICKET_EV;
  return action.camel === winner ? PAYOUT_TABLE[action.position] : 0;
}
