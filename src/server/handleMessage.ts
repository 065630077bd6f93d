import type { ClientMessage, ErrorCode, ServerMessage } from "./protocol";
import {
  asCamelId,
  compareStrategies,
  createRng,
  evaluateActions,
  parseSnapshot,
  rankActions,
  tryClaimTicket,
  type Rng,
  type Seed,
} from "../engine";
import { isEngineError } from "../engine/errors";

export const SERVER_VERSION = "camelup-advisor-0.1.0";

// random and optimal each play one extra leg per compared leg
const COMPARED_POLICIES = 2;

export type AdvisorContext = {
  /** Shared rng for requests that carry no seed. */
  rng: Rng;

  defaultTrials: number;
  defaultCompareLegs: number;

  /**
   * Upper bound on the leg simulations one request may cost: the trial count
   * for evaluate, legs * (evTrials + one leg per policy) for compare.
   */
  maxTrials: number;
};

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function mkError(code: ErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

function rngFor(ctx: AdvisorContext, seed: Seed | undefined): Rng {
  return seed === undefined ? ctx.rng : createRng(seed);
}

function checkCount(value: number, label: string, max: number): string | null {
  if (value > max) return `${label}=${value} exceeds the server limit of ${max}.`;
  return null;
}

/**
 * Pure request/response handler. Engine errors become error messages;
 * anything unexpected propagates to the socket layer.
 */
export function handleClientMessage(ctx: AdvisorContext, msg: ClientMessage): ServerMessage {
  const reqId = msg.reqId;

  try {
    switch (msg.type) {
      case "hello":
        return withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId: msg.clientId ?? "anon" }, reqId);

      case "evaluate": {
        const trials = msg.trials ?? ctx.defaultTrials;
        const tooMany = checkCount(trials, "trials", ctx.maxTrials);
        if (tooMany) return mkError("BAD_MESSAGE", tooMany, reqId);

        const snapshot = parseSnapshot(msg.snapshot, "evaluate");
        const evaluation = evaluateActions(snapshot, { trials, rng: rngFor(ctx, msg.seed) });
        if (!evaluation.ok) return mkError(evaluation.warning.code, evaluation.warning.message, reqId);

        return withReqId(
          {
            type: "evaluation",
            trials: evaluation.trials,
            probabilities: { ...evaluation.probabilities },
            actions: rankActions(evaluation.actions),
          },
          reqId
        );
      }

      case "claimTicket": {
        const snapshot = parseSnapshot(msg.snapshot, "claimTicket");
        const res = tryClaimTicket(snapshot, asCamelId(msg.camel));
        if (!res.ok) return mkError(res.error.code, res.error.message, reqId);

        return withReqId(
          { type: "ticketClaimed", camel: msg.camel, position: res.position, snapshot: res.snapshot },
          reqId
        );
      }

      case "compare": {
        const legs = msg.legs ?? ctx.defaultCompareLegs;
        const evTrials = msg.evTrials ?? ctx.defaultTrials;
        const tooMany =
          checkCount(legs, "legs", ctx.maxTrials) ??
          checkCount(evTrials, "evTrials", ctx.maxTrials) ??
          checkCount(legs * (evTrials + COMPARED_POLICIES), `legs*(evTrials+${COMPARED_POLICIES})`, ctx.maxTrials);
        if (tooMany) return mkError("BAD_MESSAGE", tooMany, reqId);

        const report = compareStrategies({ legs, evTrials, rng: rngFor(ctx, msg.seed) });
        if (!report.ok) return mkError(report.warning.code, report.warning.message, reqId);

        return withReqId(
          {
            type: "comparison",
            legs: report.legs,
            evTrials: report.evTrials,
            randomMeanPayoff: report.randomMeanPayoff,
            optimalMeanPayoff: report.optimalMeanPayoff,
            skillFactorPct: report.skillFactorPct,
            policies: { ...report.policies },
            meanFirstPlaceProbabilities: { ...report.meanFirstPlaceProbabilities },
          },
          reqId
        );
      }

      default: {
        const _exhaustive: never = msg;
        return mkError("BAD_MESSAGE", `Unsupported message: ${JSON.stringify(_exhaustive)}`, reqId);
      }
    }
  } catch (err) {
    if (!isEngineError(err)) throw err;
    return mkError(err.code, err.message, reqId);
  }
}
