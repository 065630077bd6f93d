import type { CamelId, LegSnapshot } from "../types";
import { isEngineError } from "./errors";
import type { ClaimResponse } from "./serverEnvelope";
import { claimBettingTicket } from "./tickets";

/**
 * Claim a betting ticket and return a server-style response.
 *
 * A 5th ticket is a disallowed action, not a failure of the caller's process:
 * it comes back as ok:false with EXHAUSTED_TICKETS. Structural problems in the
 * snapshot come back as INVALID_STATE. Anything else is rethrown.
 */
export function tryClaimTicket(snapshot: LegSnapshot, camel: CamelId): ClaimResponse {
  try {
    const { snapshot: next, position } = claimBettingTicket(snapshot, camel);
    return { ok: true, snapshot: next, position };
  } catch (err) {
    if (!isEngineError(err)) throw err;
    return { ok: false, error: { code: err.code, message: err.message } };
  }
}
