import { describe, expect, it } from 'vitest';
import { generateRoundRobin } from './schedule';

describe('generateRoundRobin', () => {
  it('pairs every team with every other, home and away', () => {
    const matchdays = generateRoundRobin(['a', 'b', 'c', 'd'], 1);

    expect(matchdays).toHaveLength(6);
    expect(matchdays.every((day) => day.length === 2)).toBe(true);

    const pairings = matchdays.flat().map((f) => `${f.homeTeamId}-${f.awayTeamId}`);
    expect(new Set(pairings).size).toBe(12);
    expect(pairings).toContain('a-b');
    expect(pairings).toContain('b-a');
  });

  it('plays each team once per matchday', () => {
    for (const day of generateRoundRobin(['a', 'b', 'c', 'd', 'e', 'f'], 1)) {
      const teams = day.flatMap((f) => [f.homeTeamId, f.awayTeamId]);
      expect(new Set(teams).size).toBe(teams.length);
    }
  });

  it('gives one team a bye each round when the count is odd', () => {
    const matchdays = generateRoundRobin(['a', 'b', 'c'], 2);
    expect(matchdays).toHaveLength(6);
    expect(matchdays.every((day) => day.length === 1)).toBe(true);
    expect(matchdays[0][0]).toEqual({ id: 's2-r1-b-c', homeTeamId: 'b', awayTeamId: 'c' });
  });

  it('mirrors the first half with venues swapped', () => {
    const matchdays = generateRoundRobin(['a', 'b', 'c', 'd'], 1);
    expect(matchdays[3].map((f) => [f.homeTeamId, f.awayTeamId])).toEqual(
      matchdays[0].map((f) => [f.awayTeamId, f.homeTeamId]),
    );
  });

  it('rejects duplicate team ids', () => {
    expect(() => generateRoundRobin(['a', 'a'], 1)).toThrow('Team ids must be unique');
  });
});
