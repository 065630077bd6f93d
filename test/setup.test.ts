import { describe, it, expect } from "vitest";
import { createRng, DEFAULT_CAMELS, randomStartingSnapshot } from "../src/engine";
import { C, drawIndex, rollFace, scriptedRng } from "./helpers";

describe("randomStartingSnapshot", () => {
  it("places every camel on cells 1..3 with the whole bag still in the pyramid", () => {
    const snap = randomStartingSnapshot(createRng("start"));

    expect(snap.camels).toEqual(DEFAULT_CAMELS);
    expect(snap.bag).toEqual(DEFAULT_CAMELS);
    expect(snap.tickets).toEqual({});
    expect(snap.board.cells).toHaveLength(17);

    const occupied = snap.board.cells.flatMap((stack, cell) => (stack.length > 0 ? [cell] : []));
    for (const cell of occupied) expect([1, 2, 3]).toContain(cell);
    expect(snap.board.cells.flat().slice().sort()).toEqual([...DEFAULT_CAMELS].sort());
  });

  it("stacks a later camel on top of an earlier one on the same cell", () => {
    const rng = scriptedRng([drawIndex(1, 2), rollFace(2), drawIndex(0, 1), rollFace(2)]);
    const snap = randomStartingSnapshot(rng, { camels: [C("X"), C("Y")] });

    expect(snap.board.cells[2]).toEqual(["Y", "X"]);
    expect(rng.remaining()).toBe(0);
  });

  it("pre-rolls dice out of the bag", () => {
    const snap = randomStartingSnapshot(createRng("pre"), { preRolledDice: 2 });
    expect(snap.bag).toHaveLength(3);
  });

  it("empties the bag when a pre-roll reaches the finish", () => {
    const rng = createRng("short-track");
    let ended = 0;
    for (let i = 0; i < 200; i++) {
      const snap = randomStartingSnapshot(rng, { finishIndex: 4, preRolledDice: 4 });
      if (snap.board.cells[4].length > 0) {
        ended++;
        expect(snap.bag).toEqual([]);
      }
    }
    expect(ended).toBeGreaterThan(0);
  });

  it("spreads pre-claimed tickets without exceeding four per camel", () => {
    const snap = randomStartingSnapshot(createRng("tickets"), { preClaimedTickets: 20 });
    expect(Object.values(snap.tickets)).toEqual([4, 4, 4, 4, 4]);

    const some = randomStartingSnapshot(createRng("tickets"), { preClaimedTickets: 7 });
    const counts = Object.values(some.tickets);
    expect(counts.reduce((a, b) => a + b, 0)).toBe(7);
    for (const n of counts) expect(n).toBeLessThanOrEqual(4);
  });

  it("rejects out-of-range options", () => {
    const rng = createRng(1);
    expect(() => randomStartingSnapshot(rng, { finishIndex: 3 })).toThrow(RangeError);
    expect(() => randomStartingSnapshot(rng, { preRolledDice: 5 })).toThrow(
      "preRolledDice must be an integer in 0..4, got 5"
    );
    expect(() => randomStartingSnapshot(rng, { preClaimedTickets: 21 })).toThrow(
      "preClaimedTickets must be an integer in 0..20, got 21"
    );
  });
});
