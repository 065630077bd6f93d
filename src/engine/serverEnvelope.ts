import type { LegSnapshot, TicketPosition } from "../types";
import type { EngineErrorCode } from "./errors";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type ClaimOk = {
  ok: true;
  snapshot: LegSnapshot;
  position: TicketPosition;
};

export type ClaimErr = {
  ok: false;
  error: EngineError;
};

export type ClaimResponse = ClaimOk | ClaimErr;
