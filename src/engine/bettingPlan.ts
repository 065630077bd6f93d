import type { CamelId, LegSnapshot, TicketPosition } from "../types";
import { PYRAMID_TICKET_EV } from "./constants";
import {
  estimateLegWinner,
  priceActions,
  rankActions,
  type EstimateOptions,
  type InsufficientTrials,
} from "./monteCarlo";
import { claimBettingTicket } from "./tickets";

export type PlannedTicket = {
  camel: CamelId;
  position: TicketPosition;
  ev: number;
};

export type BettingPlan =
  | {
      ok: true;
      tickets: readonly PlannedTicket[];

      /** Mean EV of the planned tickets over the pyramid ticket, in percent. null when the plan is empty. */
      improvementPct: number | null;

      /** Ticket record after every planned ticket is claimed. */
      finalSnapshot: LegSnapshot;
    }
  | InsufficientTrials;

/**
 * Greedy ticket sequence for the current leg: keep claiming the best betting
 * ticket while its EV is strictly above the pyramid ticket's.
 *
 * Claims never move camels, so one estimate prices the whole sequence;
 * only the ticket positions (and payouts) change between picks.
 */
export function planBettingSequence(snapshot: LegSnapshot, opts: EstimateOptions = {}): BettingPlan {
  const estimate = estimateLegWinner(snapshot, opts);
  if (!estimate.ok) return estimate;

  const tickets: PlannedTicket[] = [];
  let current = snapshot;

  for (;;) {
    const best = rankActions(priceActions(current, estimate.probabilities)).find((v) => v.action.kind === "bet");
    if (!best || best.action.kind !== "bet" || best.ev <= PYRAMID_TICKET_EV) break;

    const claimed = claimBettingTicket(current, best.action.camel);
    tickets.push({ camel: best.action.camel, position: claimed.position, ev: best.ev });
    current = claimed.snapshot;
  }

  const improvementPct =
    tickets.length === 0
      ? null
      : ((tickets.reduce((sum, t) => sum + t.ev, 0) / tickets.length - PYRAMID_TICKET_EV) / PYRAMID_TICKET_EV) * 100;

  return { ok: true, tickets, improvementPct, finalSnapshot: current };
}
