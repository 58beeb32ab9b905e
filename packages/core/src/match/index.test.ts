import { describe, expect, it } from 'vitest';
import { STANDARD_AGING_CURVE } from '../aging';
import { ConfigurationError, InvalidRosterError, UnknownPlayerError, UnknownTeamError } from '../errors';
import { createRng, createScriptedRng } from '../random';
import type { PlayerRecord, Roster, SkillRatings } from '../types';
import { createSkillRatings } from '../types';
import {
  boxScoreToGameStats,
  getGameWinner,
  shotSuccessThreshold,
  simulateFixture,
  simulateGame,
  simulateGameLive,
  sumTeamPoints,
} from './index';

function buildPlayer(id: string, skills: SkillRatings): PlayerRecord {
  return {
    id,
    name: `Player ${id}`,
    age: 25,
    nationality: 'USA',
    role: 'SF',
    status: 'active',
    skills,
    potential: {
      tier: 'silver',
      maxSkills: createSkillRatings(() => 85),
      overallPotential: 85,
      isHidden: true,
    },
    development: {
      skillExperience: createSkillRatings(() => 0),
      skillUpgrades: createSkillRatings(() => 0),
      totalExperience: 0,
      developmentRate: 1,
      agingCurve: { ...STANDARD_AGING_CURVE },
      milestones: [],
    },
    talentTier: 'starter',
    archetype: null,
    retirementReason: null,
  };
}

function buildRoster(id: string, size: number, skill = 50): Roster {
  return {
    id,
    name: `Team ${id}`,
    players: Array.from({ length: size }, (_, i) =>
      buildPlayer(`${id}-${i}`, createSkillRatings(() => skill)),
    ),
  };
}

describe('shotSuccessThreshold', () => {
  it('uses inside shooting for inside shots and shooting otherwise', () => {
    const player = buildPlayer('x', {
      ...createSkillRatings(() => 50),
      insideShooting: 40,
      shooting: 30,
    });
    expect(shotSuccessThreshold('inside', player)).toBe(-10);
    expect(shotSuccessThreshold('midrange', player)).toBe(15);
    expect(shotSuccessThreshold('three', player)).toBe(45);
  });
});

describe('simulateGame', () => {
  it('scores 30-0 when home always has the ball and every three drops', () => {
    const home = buildRoster('home', 5);
    const away = buildRoster('away', 5);

    const result = simulateGame(home, away, {
      rng: createScriptedRng([0.99]),
      possessions: { min: 10, max: 10 },
      forcedShotType: 'three',
      lockPossession: 'home',
    });

    expect(result.homeScore).toBe(30);
    expect(result.awayScore).toBe(0);
    expect(result.possessions).toBe(10);
    expect(result.boxScore['home-4'].threesMade).toBe(10);
    expect(result.boxScore['home-4'].threesAttempted).toBe(10);
    expect(result.boxScore['home-4'].points).toBe(30);
  });

  it('reconciles box score points with the final score', () => {
    const rng = createRng(77);
    for (let game = 0; game < 20; game++) {
      const home = buildRoster('home', 12, 40 + game);
      const away = buildRoster('away', 10, 60 - game);
      const result = simulateGame(home, away, { rng });

      expect(sumTeamPoints(result.boxScore, 'home')).toBe(result.homeScore);
      expect(sumTeamPoints(result.boxScore, 'away')).toBe(result.awayScore);
      expect(result.possessions).toBeGreaterThanOrEqual(180);
      expect(result.possessions).toBeLessThanOrEqual(220);
    }
  });

  it('credits exactly one rebound for every miss', () => {
    const result = simulateGame(buildRoster('home', 8), buildRoster('away', 8), {
      rng: createRng(5),
    });
    const entries = Object.values(result.boxScore);
    const misses = entries.reduce(
      (sum, e) => sum + e.fieldGoalsAttempted - e.fieldGoalsMade,
      0,
    );
    const rebounds = entries.reduce((sum, e) => sum + e.rebounds, 0);

    expect(misses).toBeGreaterThan(0);
    expect(rebounds).toBe(misses);
  });

  it('keeps the ball after an offensive rebound', () => {
    // Skill 20: inside makes need quality >= 30, offensive boards >= 80
    const live = simulateGameLive(buildRoster('home', 5, 20), buildRoster('away', 5, 20), {
      rng: createScriptedRng([0, 0.1, 0, 0, 0, 0, 0.99]),
      possessions: { min: 1, max: 1 },
    });
    const event = live.next();

    expect(event.done).toBe(false);
    if (event.done) return;
    expect(event.value.side).toBe('home');
    expect(event.value.shotType).toBe('inside');
    expect(event.value.made).toBe(false);
    expect(event.value.rebound).toEqual({
      playerId: 'home-0',
      side: 'home',
      offensive: true,
    });
  });

  it('credits the defense when the offensive rebound fails', () => {
    const result = simulateGame(buildRoster('home', 5, 20), buildRoster('away', 5, 20), {
      rng: createScriptedRng([0, 0.1, 0, 0, 0, 0, 0.1, 0]),
      possessions: { min: 1, max: 1 },
    });

    expect(result.boxScore['home-0'].fieldGoalsAttempted).toBe(1);
    expect(result.boxScore['home-0'].insideAttempted).toBe(1);
    expect(result.boxScore['away-0'].defensiveRebounds).toBe(1);
    expect(result.boxScore['away-0'].rebounds).toBe(1);
  });

  it('lists every roster player, including inactive ones', () => {
    const home = buildRoster('home', 6);
    home.players[5].status = 'retired';
    const result = simulateGame(home, buildRoster('away', 5), { rng: createRng(3) });

    expect(Object.keys(result.boxScore)).toHaveLength(11);
    expect(result.boxScore['home-5'].fieldGoalsAttempted).toBe(0);
    expect(result.boxScore['home-5'].rebounds).toBe(0);
  });

  it('plays empty trips for a team with no players', () => {
    const result = simulateGame(buildRoster('home', 0), buildRoster('away', 3), {
      rng: createRng(4),
      possessions: { min: 10, max: 10 },
    });

    expect(result.homeScore).toBe(0);
    expect(result.possessions).toBe(10);
    expect(Object.keys(result.boxScore)).toEqual(['away-0', 'away-1', 'away-2']);
  });

  it('never changes player skills', () => {
    const home = buildRoster('home', 5);
    const away = buildRoster('away', 5);
    const before = structuredClone([home, away]);

    simulateGame(home, away, { rng: createRng(9) });
    expect([home, away]).toEqual(before);
  });

  it('rejects invalid possession ranges', () => {
    const home = buildRoster('home', 5);
    const away = buildRoster('away', 5);
    expect(() => simulateGame(home, away, { possessions: { min: 10, max: 5 } })).toThrow(
      ConfigurationError,
    );
    expect(() => simulateGame(home, away, { possessions: { min: 10, max: 500 } })).toThrow(
      ConfigurationError,
    );
  });

  it('rejects a player listed on both rosters', () => {
    const home = buildRoster('home', 5);
    const away = buildRoster('away', 4);
    away.players.push(home.players[0]);
    expect(() => simulateGame(home, away)).toThrow(InvalidRosterError);
  });
});

describe('simulateFixture', () => {
  it('throws for an unknown team', () => {
    const rosters = [buildRoster('home', 5)];
    expect(() =>
      simulateFixture({ id: 'f1', homeTeamId: 'home', awayTeamId: 'ghost' }, rosters),
    ).toThrow(UnknownTeamError);
  });

  it('simulates a known pairing', () => {
    const rosters = [buildRoster('home', 5), buildRoster('away', 5)];
    const result = simulateFixture(
      { id: 'f1', homeTeamId: 'home', awayTeamId: 'away' },
      rosters,
      { rng: createRng(1) },
    );
    expect(result.homeTeamId).toBe('home');
    expect(result.awayTeamId).toBe('away');
  });
});

describe('result helpers', () => {
  it('converts a box score line into development stats', () => {
    const result = simulateGame(buildRoster('home', 5), buildRoster('away', 5), {
      rng: createScriptedRng([0.99]),
      possessions: { min: 10, max: 10 },
      forcedShotType: 'three',
      lockPossession: 'home',
    });

    expect(boxScoreToGameStats(result.boxScore, 'home-4')).toEqual({
      points: 30,
      rebounds: 0,
      assists: 0,
      fieldGoalsMade: 10,
      fieldGoalsAttempted: 10,
      threePointersMade: 10,
    });
    expect(() => boxScoreToGameStats(result.boxScore, 'nobody')).toThrow(
      UnknownPlayerError,
    );
    expect(getGameWinner(result)).toBe('home');
  });

  it('reports no winner for a tie', () => {
    expect(
      getGameWinner({
        homeTeamId: 'a',
        awayTeamId: 'b',
        homeScore: 100,
        awayScore: 100,
        possessions: 200,
        boxScore: {},
      }),
    ).toBeNull();
  });
});
