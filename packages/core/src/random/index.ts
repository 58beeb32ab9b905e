// ============================================================================
// HARDWOOD - Random Source
// ============================================================================
// Injectable random numbers. Every engine takes an Rng so games, aging rolls
// and generation can be replayed from a seed.

// Returns a float in [0, 1)
export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

// Mulberry32, small and fast enough for per-possession draws
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Replays the given values in order, cycling when exhausted
export function createScriptedRng(values: readonly number[]): Rng {
  if (values.length === 0) {
    throw new Error('Scripted random source needs at least one value');
  }
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

// Integer in [min, max], inclusive
export function randomInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

// Integer in [0, bound)
export function randomBelow(rng: Rng, bound: number): number {
  return Math.floor(rng() * bound);
}

export function randomFromArray<T>(rng: Rng, arr: readonly T[]): T {
  return arr[randomBelow(rng, arr.length)];
}

export function chance(rng: Rng, probability: number): boolean {
  return rng() < probability;
}

// Index picked proportionally to weight; falls back to the last index on rounding drift
export function weightedIndex(rng: Rng, weights: readonly number[]): number {
  const total = weights.reduce((sum, w) => sum + w, 0);
  let roll = rng() * total;
  for (let i = 0; i < weights.length; i++) {
    roll -= weights[i];
    if (roll < 0) return i;
  }
  return weights.length - 1;
}

// Float in [min, max)
export function randomBetween(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}
