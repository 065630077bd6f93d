// src/engine/constants.ts

import type { CamelId, DieFace, TicketPosition } from "../types";

// Track length of the standard board: cells 0..16, the last one ends the leg.
export const DEFAULT_FINISH_INDEX = 16;

export const DIE_FACES: readonly DieFace[] = [1, 2, 3];

export const DEFAULT_CAMELS: readonly CamelId[] = ["Red", "Blue", "Green", "Yellow", "Purple"].map(
  (name) => name as CamelId
);

export const MAX_TICKETS_PER_CAMEL = 4;

// Coins paid by a betting ticket when its camel leads at leg end.
export const PAYOUT_TABLE: Readonly<Record<TicketPosition, number>> = {
  1: 5,
  2: 3,
  3: 2,
  4: 1,
};

export const PYRAMID_TICKET_EV = 1;

export const DEFAULT_TRIALS = 2000;

// Bags larger than this make exact enumeration (n! * 3^n leaves) too slow.
export const EXACT_ENUMERATION_MAX_DICE = 6;
