/**
 * Odyssey Combat - Random Source
 *
 * Randomness is confined to encounter setup (enemy names, skills, evolution
 * rolls). Turn resolution never touches it.
 */

import seedrandom from "seedrandom";

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
}

export function createSeededRng(seed: string): Rng {
  const prng = seedrandom(seed);
  return { next: () => prng() };
}

export const mathRandomRng: Rng = {
  next: () => Math.random(),
};

/**
 * Integer in [min, max], both inclusive.
 */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[randomInt(rng, 0, items.length - 1)];
}

/**
 * Up to `count` distinct items, partial Fisher-Yates on a copy.
 */
export function sampleDistinct<T>(rng: Rng, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = randomInt(rng, i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
