import type { CamelId, DieFace, LegSnapshot } from "../src/types";
import type { Rng } from "../src/engine/rng";
import { makeSnapshot, type MakeSnapshotOptions } from "../src/engine/makeState";

// brand cast for tests
export const C = (s: string) => s as CamelId;

/**
 * Rng that replays a fixed list of floats and fails loudly when it runs dry,
 * so a test notices any extra draw.
 */
export function scriptedRng(values: readonly number[]): Rng & { remaining(): number } {
  let i = 0;
  return {
    nextFloat() {
      if (i >= values.length) throw new Error(`scriptedRng exhausted after ${values.length} draws`);
      return values[i++];
    },
    remaining() {
      return values.length - i;
    },
  };
}

/** Float that makes nextInt(rng, 0, n - 1) return `index`. */
export function drawIndex(index: number, n: number): number {
  return (index + 0.5) / n;
}

/** Float that makes pick(rng, DIE_FACES) return `face`. */
export function rollFace(face: DieFace): number {
  return (face - 0.5) / 3;
}

/** One leg step: take bag[index] out of a bag of size n and roll `face`. */
export function step(index: number, n: number, face: DieFace): number[] {
  return [drawIndex(index, n), rollFace(face)];
}

/** Two camels, A on cell 3 and B on cell 5, both dice still in the pyramid. */
export function twoCamelSnapshot(overrides: Partial<MakeSnapshotOptions> = {}): LegSnapshot {
  return makeSnapshot({
    placements: { 3: ["A"], 5: ["B"] },
    camels: ["A", "B"],
    bag: ["A", "B"],
    ...overrides,
  });
}

/** A far ahead of B: A wins the leg whatever the dice do. */
export function riggedSnapshot(): LegSnapshot {
  return makeSnapshot({
    placements: { 0: ["B"], 12: ["A"] },
    camels: ["A", "B"],
    bag: ["A", "B"],
  });
}

export function allCamelsOnBoard(snapshot: Pick<LegSnapshot, "board">): string[] {
  return snapshot.board.cells.flat().slice().sort();
}
