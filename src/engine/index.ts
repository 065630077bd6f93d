// Public engine surface

export type {
  CamelId,
  DieFace,
  TicketPosition,
  CamelStack,
  BoardState,
  DiceBag,
  TicketRecord,
  LegSnapshot,
  MoveOutcome,
  Action,
  ActionValue,
  InsufficientTrialsWarning,
} from "../types";

// Board / bag / tickets
export { makeBoard, makeSnapshot, asCamelId } from "./makeState";
export type { Placements, MakeSnapshotOptions } from "./makeState";
export { cloneBoard, cloneSnapshot, locateCamel, rankCamels, leader } from "./stateUtils";
export { validateSnapshot, setStateCheckpoints } from "./validateState";
export { InvalidStateError, ExhaustedTicketsError } from "./errors";
export type { EngineErrorCode } from "./errors";

// Constants
export {
  DEFAULT_CAMELS,
  DEFAULT_FINISH_INDEX,
  DEFAULT_TRIALS,
  DIE_FACES,
  PAYOUT_TABLE,
  PYRAMID_TICKET_EV,
  MAX_TICKETS_PER_CAMEL,
} from "./constants";

// Randomness
export { createRng, mathRandomRng, nextInt, pick } from "./rng";
export type { Rng, Seed } from "./rng";

// Leg stepping / simulation
export { moveCamelStack } from "./applyMove";
export { stepLeg } from "./legStep";
export type { LegStepResult } from "./legStep";
export { simulateLeg } from "./simulateLeg";
export type { LegResult } from "./simulateLeg";

// EV engine
export {
  estimateLegWinner,
  evaluateActions,
  tallyLegWinners,
  mergeTallies,
  probabilitiesFromTally,
  priceActions,
  rankActions,
  bestAction,
} from "./monteCarlo";
export type { EstimateOptions, WinTally, WinEstimate, ActionEvaluation, InsufficientTrials } from "./monteCarlo";
export { legalActions } from "./legalMoves";
export { exactLegOdds, singleDieOutcomes } from "./exactOdds";
export type { ExactOdds, SingleDieReport } from "./exactOdds";

// Tickets
export { PYRAMID_ACTION, betAction, nextTicketPosition, claimBettingTicket, actionPayout } from "./tickets";
export { tryClaimTicket } from "./tryApply";
export type { ClaimResponse, EngineError } from "./serverEnvelope";
export { planBettingSequence } from "./bettingPlan";
export type { BettingPlan, PlannedTicket } from "./bettingPlan";

// Strategy comparison
export { randomPolicy, optimalPolicy, thresholdPolicy } from "./policies";
export type { Policy } from "./policies";
export { randomStartingSnapshot } from "./setup";
export type { StartingSnapshotOptions } from "./setup";
export { compareStrategies, skillFactorPct } from "./strategy";
export type { CompareOptions, CompareResult, StrategyReport, PolicyStats } from "./strategy";

// Wire form of a snapshot
export { serializeSnapshot, deserializeSnapshot, parseSnapshot } from "./serialization";
