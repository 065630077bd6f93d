// src/engine/legalMoves.ts

import type { Action, LegSnapshot } from "../types";
import { PYRAMID_ACTION, betAction, nextTicketPosition } from "./tickets";

/**
 * Leg actions currently on offer:
 * - the pyramid ticket (always)
 * - the next betting ticket on every camel that still has one
 *
 * Camels with all 4 tickets claimed are left out entirely rather than priced at 0.
 * Order: pyramid first, then camels in roster order.
 */
export function legalActions(snapshot: LegSnapshot): Action[] {
  const actions: Action[] = [PYRAMID_ACTION];

  for (const camel of snapshot.camels) {
    const position = nextTicketPosition(snapshot.tickets, camel);
    if (position === null) continue;
    actions.push(betAction(camel, position));
  }

  return actions;
}
