import { describe, it, expect, afterEach } from "vitest";
import { InvalidStateError, makeBoard, makeSnapshot, setStateCheckpoints, validateSnapshot } from "../src/engine";
import { checkpointBoard } from "../src/engine/validateState";
import type { LegSnapshot } from "../src/types";
import { C, twoCamelSnapshot } from "./helpers";

function expectInvalid(snapshot: LegSnapshot, detail: string) {
  expect(() => validateSnapshot(snapshot, "test")).toThrow(InvalidStateError);
  expect(() => validateSnapshot(snapshot, "test")).toThrow(`[validateState @ test] ${detail}`);
}

describe("validateSnapshot", () => {
  it("accepts a well-formed snapshot", () => {
    expect(() => validateSnapshot(twoCamelSnapshot(), "test")).not.toThrow();
  });

  it("rejects a camel missing from the board", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, board: makeBoard(16, { 3: ["A"] }) }, "camel missing from board: B");
  });

  it("rejects a camel standing on two cells", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, board: makeBoard(16, { 3: ["A"], 5: ["B"], 7: ["A"] }) }, "camel appears twice: A");
  });

  it("rejects a board with the wrong number of cells", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, board: { finishIndex: 16, cells: snap.board.cells.slice(0, 10) } }, "board has 10 cells, expected 17");
  });

  it("rejects dice for camels outside the roster", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, bag: [C("A"), C("Z")] }, "bag holds unknown camel: Z");
  });

  it("rejects ticket counts outside 0..4", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, tickets: { A: 5 } }, "ticket count for A out of range: 5");
    expectInvalid({ ...snap, tickets: { A: 1.5 } }, "ticket count for A not integer");
  });

  it("rejects a leg that already ended with dice left in the bag", () => {
    const snap = makeSnapshot({ placements: { 15: ["B"], 16: ["A"] }, camels: ["A", "B"], bag: [] });
    expectInvalid({ ...snap, bag: [C("B")] }, "leg already ended: A on the finish cell with 1 dice left");
    expect(() =>
      makeSnapshot({ placements: { 15: ["B"], 16: ["A"] }, camels: ["A", "B"], bag: ["B"] })
    ).toThrow("[validateState @ makeSnapshot] leg already ended: A on the finish cell with 1 dice left");
  });

  it("accepts a camel on the finish cell once the bag is empty", () => {
    const snap = makeSnapshot({ placements: { 15: ["B"], 16: ["A"] }, camels: ["A", "B"], bag: [] });
    expect(() => validateSnapshot(snap, "test")).not.toThrow();
  });

  it("rejects a duplicated roster entry", () => {
    const snap = twoCamelSnapshot();
    expectInvalid({ ...snap, camels: [C("A"), C("B"), C("A")] }, "duplicate camel in roster: A");
  });
});

describe("makeBoard / makeSnapshot", () => {
  it("rejects a placement beyond the finish cell", () => {
    expect(() => makeBoard(16, { 17: ["A"] })).toThrow("[validateState @ makeBoard] cell index out of bounds: 17");
  });

  it("defaults the roster to board order and the bag to the roster", () => {
    const snap = makeSnapshot({ placements: { 4: ["C"], 1: ["A", "B"] } });
    expect(snap.camels).toEqual(["A", "B", "C"]);
    expect(snap.bag).toEqual(["A", "B", "C"]);
  });
});

describe("checkpointBoard", () => {
  afterEach(() => setStateCheckpoints(true));

  const before = makeBoard(16, { 3: ["A"], 5: ["B"] });
  const lost = makeBoard(16, { 5: ["B"] });

  it("catches a camel lost during a step", () => {
    expect(() => checkpointBoard(before, lost, "stepLeg")).toThrow("[validateState @ stepLeg] camel missing from board: A");
  });

  it("is skipped when checkpoints are switched off", () => {
    setStateCheckpoints(false);
    expect(() => checkpointBoard(before, lost, "stepLeg")).not.toThrow();
  });
});
