import { describe, expect, it } from 'vitest';
import {
  chance,
  createRng,
  createScriptedRng,
  randomBelow,
  randomFromArray,
  randomInt,
  weightedIndex,
} from './index';

describe('createRng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('produces values in [0, 1)', () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('diverges for different seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });
});

describe('createScriptedRng', () => {
  it('cycles through the given values', () => {
    const rng = createScriptedRng([0.1, 0.5]);
    expect([rng(), rng(), rng()]).toEqual([0.1, 0.5, 0.1]);
  });

  it('rejects an empty script', () => {
    expect(() => createScriptedRng([])).toThrow();
  });
});

describe('helpers', () => {
  it('randomInt is inclusive on both ends', () => {
    expect(randomInt(createScriptedRng([0]), 180, 220)).toBe(180);
    expect(randomInt(createScriptedRng([0.999]), 180, 220)).toBe(220);
  });

  it('randomBelow stays under the bound', () => {
    expect(randomBelow(createScriptedRng([0.99]), 100)).toBe(99);
  });

  it('randomFromArray indexes by the draw', () => {
    expect(randomFromArray(createScriptedRng([0.5]), ['a', 'b', 'c', 'd'])).toBe('c');
  });

  it('chance compares strictly below the probability', () => {
    expect(chance(createScriptedRng([0.05]), 0.05)).toBe(false);
    expect(chance(createScriptedRng([0.04]), 0.05)).toBe(true);
  });

  it('weightedIndex walks cumulative weights', () => {
    const weights = [0.2, 0.3, 0.5];
    expect(weightedIndex(createScriptedRng([0.1]), weights)).toBe(0);
    expect(weightedIndex(createScriptedRng([0.3]), weights)).toBe(1);
    expect(weightedIndex(createScriptedRng([0.9]), weights)).toBe(2);
  });
});
