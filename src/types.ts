// src/types.ts

export type CamelId = string & { readonly __brand: "CamelId" };

export type DieFace = 1 | 2 | 3;

export type TicketPosition = 1 | 2 | 3 | 4;

/** Camels at one cell, bottom first. The last entry is on top. */
export type CamelStack = readonly CamelId[];

export interface BoardState {
  /** Cell that ends the leg when reached. Moves are clamped to it. */
  finishIndex: number;

  /** Exactly finishIndex + 1 entries: cells 0..finishIndex. */
  cells: readonly CamelStack[];
}

/**
 * Camels whose die is still in the pyramid this leg.
 * Order carries no game meaning; it only makes draws reproducible.
 */
export type DiceBag = readonly CamelId[];

/** Claimed betting tickets per camel (0..4). Missing camel => 0 claimed. */
export type TicketRecord = Readonly<Record<string, number>>;

export interface LegSnapshot {
  camels: readonly CamelId[];
  board: BoardState;
  bag: DiceBag;
  tickets: TicketRecord;
}

export interface MoveOutcome {
  camel: CamelId;
  distance: DieFace;
  from: number;
  to: number;

  // The moved group, bottom first (camel plus everything that rode on it).
  carried: readonly CamelId[];

  crossedFinish: boolean;
}

export type Action =
  | {
      id: "pyramid";
      kind: "pyramid";
    }
  | {
      id: string;
      kind: "bet";
      camel: CamelId;
      position: TicketPosition;
    };

export interface ActionValue {
  action: Action;
  ev: number;
}

export type InsufficientTrialsWarning = {
  code: "INSUFFICIENT_TRIALS";
  message: string;
};
