// src/engine/rng.ts
//
// Single randomness source for the engine. Every draw (bag order, die face,
// starting setup, random policy) goes through an injected Rng so that a
// seeded run is reproducible.

export type Seed = number | string;

export interface Rng {
  /** Uniform float in [0, 1). */
  nextFloat(): number;
}

function hashStringToUint32(s: string): number {
  // FNV-1a 32-bit
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function makeXorShift32(seed: number): () => number {
  let x = seed >>> 0;
  if (x === 0) x = 0x6d2b79f5; // xorshift never leaves 0
  return function nextFloat(): number {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  };
}

/**
 * Seeded generator. Numbers are used as the 32-bit state directly,
 * strings are hashed first.
 */
export function createRng(seed: Seed): Rng {
  const state = typeof seed === "number" ? seed : hashStringToUint32(seed);
  return { nextFloat: makeXorShift32(state) };
}

export const mathRandomRng: Rng = { nextFloat: () => Math.random() };

/** Integer in [min, max], both inclusive. */
export function nextInt(rng: Rng, min: number, max: number): number {
  const span = max - min + 1;
  const i = Math.floor(rng.nextFloat() * span);
  // Guard against a source that returns exactly 1.
  return min + Math.min(i, span - 1);
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new Error("pick called with no items");
  return items[nextInt(rng, 0, items.length - 1)];
}
