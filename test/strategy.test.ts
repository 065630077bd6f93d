import { describe, it, expect } from "vitest";
import {
  compareStrategies,
  createRng,
  optimalPolicy,
  randomPolicy,
  skillFactorPct,
  thresholdPolicy,
  type ActionValue,
} from "../src/engine";
import { PYRAMID_ACTION, betAction } from "../src/engine/tickets";
import { C, riggedSnapshot, scriptedRng } from "./helpers";

const choices: ActionValue[] = [
  { action: PYRAMID_ACTION, ev: 1 },
  { action: betAction(C("A"), 1), ev: 1.5 },
  { action: betAction(C("B"), 1), ev: 0.4 },
];

describe("policies", () => {
  it("optimal takes the highest EV", () => {
    expect(optimalPolicy(choices, scriptedRng([])).action.id).toBe("bet:A:1");
  });

  it("random picks uniformly through the rng", () => {
    expect(randomPolicy(choices, scriptedRng([0.9])).action.id).toBe("bet:B:1");
    expect(randomPolicy(choices, scriptedRng([0.1])).action.id).toBe("pyramid");
  });

  it("threshold keeps the pyramid ticket unless a bet beats it by the margin", () => {
    expect(thresholdPolicy(1)(choices, scriptedRng([])).action.id).toBe("pyramid");
    expect(thresholdPolicy(0.25)(choices, scriptedRng([])).action.id).toBe("bet:A:1");
  });
});

describe("skillFactorPct", () => {
  it("is the relative gain of optimal over random, in percent", () => {
    expect(skillFactorPct(2, 3)).toBe(50);
    expect(skillFactorPct(0, 3)).toBeNull();
  });
});

describe("compareStrategies", () => {
  it("optimal play beats random play on a rigged leg", () => {
    const report = compareStrategies({
      legs: 60,
      evTrials: 50,
      rng: createRng("rigged"),
      startingSnapshot: () => riggedSnapshot(),
    });
    if (!report.ok) throw new Error(report.warning.message);

    expect(report.optimalMeanPayoff).toBe(5);
    expect(report.policies["optimal"]).toEqual({ meanPayoff: 5, totalPayoff: 300, pyramidPicks: 0, betPicks: 60 });
    expect(report.randomMeanPayoff).toBeLessThan(5);
    expect(report.skillFactorPct).not.toBeNull();
    expect(report.skillFactorPct ?? 0).toBeGreaterThan(0);
    expect(report.meanFirstPlaceProbabilities).toEqual({ A: 1, B: 0 });
  });

  it("runs extra policies alongside random and optimal", () => {
    const report = compareStrategies({
      legs: 20,
      evTrials: 20,
      rng: createRng("extra"),
      startingSnapshot: () => riggedSnapshot(),
      policies: { cautious: thresholdPolicy(10) },
    });
    if (!report.ok) throw new Error(report.warning.message);

    expect(Object.keys(report.policies)).toEqual(["random", "optimal", "cautious"]);
    expect(report.policies["cautious"]).toEqual({ meanPayoff: 1, totalPayoff: 20, pyramidPicks: 20, betPicks: 0 });
  });

  it("plays random starting legs by default", () => {
    const report = compareStrategies({ legs: 10, evTrials: 100, rng: createRng("default") });
    if (!report.ok) throw new Error(report.warning.message);

    expect(report.legs).toBe(10);
    expect(report.policies["optimal"].pyramidPicks + report.policies["optimal"].betPicks).toBe(10);
    const total = Object.values(report.meanFirstPlaceProbabilities).reduce((a, b) => a + b, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  it("warns on unusable leg or trial counts", () => {
    expect(compareStrategies({ legs: 0 })).toEqual({
      ok: false,
      warning: { code: "INSUFFICIENT_TRIALS", message: "Leg count must be a positive integer, got 0." },
    });
    expect(compareStrategies({ legs: 5, evTrials: -3 })).toEqual({
      ok: false,
      warning: { code: "INSUFFICIENT_TRIALS", message: "EV trial count must be a positive integer, got -3." },
    });
  });
});
