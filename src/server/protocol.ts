// src/server/protocol.ts

import type { ActionValue, LegSnapshot, TicketPosition } from "../types";
import type { PolicyStats } from "../engine/strategy";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | EvaluateMessage | ClaimTicketMessage | CompareMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Ask for leg-winner probabilities and the EV of every legal action.
 * `snapshot` is checked by parseSnapshot on arrival.
 */
export interface EvaluateMessage {
  type: "evaluate";
  snapshot: unknown;
  trials?: number;

  /** Per-request seed; otherwise the server's rng is used. */
  seed?: number | string;
  reqId?: string;
}

export interface ClaimTicketMessage {
  type: "claimTicket";
  snapshot: unknown;
  camel: string;
  reqId?: string;
}

export interface CompareMessage {
  type: "compare";
  legs?: number;
  evTrials?: number;
  seed?: number | string;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | EvaluationMessage
  | TicketClaimedMessage
  | ComparisonMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface EvaluationMessage {
  type: "evaluation";
  trials: number;
  probabilities: Record<string, number>;

  /** Highest EV first. */
  actions: ActionValue[];
  reqId?: string;
}

export interface TicketClaimedMessage {
  type: "ticketClaimed";
  camel: string;
  position: TicketPosition;
  snapshot: LegSnapshot;
  reqId?: string;
}

export interface ComparisonMessage {
  type: "comparison";
  legs: number;
  evTrials: number;
  randomMeanPayoff: number;
  optimalMeanPayoff: number;
  skillFactorPct: number | null;
  policies: Record<string, PolicyStats>;
  meanFirstPlaceProbabilities: Record<string, number>;
  reqId?: string;
}

export type ErrorCode =
  | "BAD_MESSAGE"
  | "INVALID_STATE"
  | "EXHAUSTED_TICKETS"
  | "INSUFFICIENT_TRIALS"
  /** Server-side failure; the request itself may have been fine. */
  | "INTERNAL_ERROR";

export interface ErrorMessage {
  type: "error";
  code: ErrorCode;
  message: string;
  reqId?: string;
}
