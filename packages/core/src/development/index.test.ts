import { describe, expect, it } from 'vitest';
import { STANDARD_AGING_CURVE } from '../aging';
import type { GameStats, PlayerRecord } from '../types';
import { createSkillRatings } from '../types';
import {
  addGeneralExperience,
  awardPerformanceExperience,
  awardTrainingExperience,
  calculateBaseExperience,
  calculatePotentialTier,
  createDefaultMilestones,
  distributeExperience,
  getCurrentDevelopmentRate,
  getRemainingPotential,
  getUpgradeCost,
  processSkillUpgrades,
  revealPotential,
  updateDevelopmentRate,
} from './index';

function buildPlayer(overrides: Partial<PlayerRecord> = {}): PlayerRecord {
  return {
    id: 'p1',
    name: 'Test Prospect',
    age: 28,
    nationality: 'USA',
    role: 'SG',
    status: 'active',
    skills: createSkillRatings(() => 60),
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
      milestones: createDefaultMilestones(),
    },
    talentTier: 'starter',
    archetype: null,
    retirementReason: null,
    ...overrides,
  };
}

function stats(overrides: Partial<GameStats> = {}): GameStats {
  return {
    points: 0,
    rebounds: 0,
    assists: 0,
    fieldGoalsMade: 0,
    fieldGoalsAttempted: 0,
    threePointersMade: 0,
    ...overrides,
  };
}

const solidNight = stats({
  points: 20,
  rebounds: 5,
  assists: 3,
  fieldGoalsMade: 8,
  fieldGoalsAttempted: 16,
  threePointersMade: 2,
});

describe('calculateBaseExperience', () => {
  it('clamps a 500-point night to 200', () => {
    expect(calculateBaseExperience(stats({ points: 500 }))).toBe(200);
  });

  it('adds weighted counting stats to the base', () => {
    expect(calculateBaseExperience(solidNight)).toBe(109);
  });

  it('penalizes poor shooting', () => {
    expect(
      calculateBaseExperience(
        stats({ points: 4, fieldGoalsMade: 2, fieldGoalsAttempted: 10 }),
      ),
    ).toBe(22);
  });

  it('never drops below 10', () => {
    expect(calculateBaseExperience(stats({ fieldGoalsAttempted: 10 }))).toBe(10);
  });
});

describe('distributeExperience', () => {
  it('splits in proportion to the statline', () => {
    expect(distributeExperience(109, solidNight, 'SG')).toEqual({
      shooting: 37,
      insideShooting: 34,
      rebounding: 19,
      passing: 11,
      ballHandling: 6,
      perimeterDefense: 1,
      postDefense: 1,
    });
  });

  it('sends an empty statline to the defensive skills', () => {
    const split = distributeExperience(100, stats(), 'SG');
    expect(split.perimeterDefense).toBe(60);
    expect(split.postDefense).toBe(40);
    expect(split.shooting).toBe(0);
  });

  it('hands out exactly the total', () => {
    const line = stats({ points: 1, rebounds: 1, assists: 1 });
    for (const total of [2, 7, 13, 109]) {
      const split = distributeExperience(total, line, 'SF');
      const sum = Object.values(split).reduce((acc, xp) => acc + xp, 0);
      expect(sum).toBe(total);
    }
  });

  it('gives the odd point to the largest remainder', () => {
    // Weights: rebounding 1, passing 1, ball handling 0.5, perimeter 0.3, post 0.2
    const split = distributeExperience(2, stats({ rebounds: 1, assists: 1 }), 'SF');
    expect(split).toEqual({
      shooting: 0,
      rebounding: 1,
      passing: 1,
      ballHandling: 0,
      perimeterDefense: 0,
      postDefense: 0,
      insideShooting: 0,
    });
  });

  it('weights ball handling up for point guards', () => {
    const line = stats({ assists: 10 });
    const guard = distributeExperience(100, line, 'PG');
    const wing = distributeExperience(100, line, 'SG');
    expect(guard.ballHandling).toBeGreaterThan(wing.ballHandling);
  });
});

describe('awardPerformanceExperience', () => {
  it('credits the ledger and total experience', () => {
    const player = buildPlayer();
    awardPerformanceExperience(player, solidNight, 1);

    expect(player.development.skillExperience.shooting).toBe(37);
    expect(player.development.totalExperience).toBe(109);
    expect(player.development.milestones[0].achieved).toBe(true);
    expect(player.development.milestones[0].achievedAtAge).toBe(28);
    expect(player.development.milestones[1].achieved).toBe(false);
  });

  it('applies the age modifier and coaching bonus', () => {
    const player = buildPlayer();
    awardPerformanceExperience(player, stats({ points: 500 }), 0.5, 0.2);
    expect(player.development.totalExperience).toBe(120);
  });
});

describe('awardTrainingExperience', () => {
  it('gives the focus skill 70% and splits the rest', () => {
    const player = buildPlayer();
    const awarded = awardTrainingExperience(player, 'shooting', 5);

    expect(awarded).toEqual({ shooting: 42, insideShooting: 9, ballHandling: 9 });
    expect(player.development.totalExperience).toBe(60);
  });
});

describe('addGeneralExperience', () => {
  it('gives the remainder to the first skills', () => {
    const player = buildPlayer();
    addGeneralExperience(player, 107);
    expect(player.development.skillExperience).toEqual({
      shooting: 16,
      rebounding: 16,
      passing: 15,
      ballHandling: 15,
      perimeterDefense: 15,
      postDefense: 15,
      insideShooting: 15,
    });
  });
});

describe('processSkillUpgrades', () => {
  it('spends 100 then stops when the next point costs 200', () => {
    const player = buildPlayer();
    player.skills.shooting = 10;
    player.development.skillExperience.shooting = 250;

    expect(getUpgradeCost(0)).toBe(100);
    expect(getUpgradeCost(1)).toBe(200);
    expect(processSkillUpgrades(player)).toEqual(['shooting']);
    expect(player.skills.shooting).toBe(11);
    expect(player.development.skillExperience.shooting).toBe(150);
    expect(player.development.skillUpgrades.shooting).toBe(1);
  });

  it('buys nothing more on an immediate second pass', () => {
    const player = buildPlayer();
    player.skills.shooting = 10;
    player.development.skillExperience.shooting = 250;

    processSkillUpgrades(player);
    expect(processSkillUpgrades(player)).toEqual([]);
    expect(player.skills.shooting).toBe(11);
    expect(player.development.skillExperience.shooting).toBe(150);
  });

  it('charges the same across many small passes as in one large pass', () => {
    const player = buildPlayer();
    for (let pass = 0; pass < 6; pass++) {
      player.development.skillExperience.passing += 100;
      processSkillUpgrades(player);
    }

    expect(player.skills.passing).toBe(63);
    expect(player.development.skillUpgrades.passing).toBe(3);
    expect(player.development.skillExperience.passing).toBe(0);
  });

  it('climbs the cost ladder within one pass', () => {
    const player = buildPlayer();
    player.development.skillExperience.passing = 600;

    expect(processSkillUpgrades(player)).toEqual(['passing', 'passing', 'passing']);
    expect(player.skills.passing).toBe(63);
    expect(player.development.skillExperience.passing).toBe(0);
  });

  it('stops at the potential ceiling', () => {
    const player = buildPlayer();
    player.skills.rebounding = 84;
    player.development.skillExperience.rebounding = 1000;

    processSkillUpgrades(player);
    expect(player.skills.rebounding).toBe(85);
    expect(player.development.skillExperience.rebounding).toBe(900);
  });

  it('is a no-op without qualifying experience', () => {
    const player = buildPlayer();
    player.development.skillExperience.shooting = 99;
    const before = structuredClone(player);

    expect(processSkillUpgrades(player)).toEqual([]);
    expect(player).toEqual(before);
  });
});

describe('potential helpers', () => {
  it('classifies potential by age band', () => {
    expect(
      calculatePotentialTier(buildPlayer({ age: 21, skills: createSkillRatings(() => 76) })),
    ).toBe('gold');
    expect(
      calculatePotentialTier(buildPlayer({ age: 30, skills: createSkillRatings(() => 90) })),
    ).toBe('silver');
  });

  it('reports remaining headroom and reveals ceilings', () => {
    const player = buildPlayer();
    player.skills.shooting = 90;
    expect(getRemainingPotential(player).shooting).toBe(0);
    expect(getRemainingPotential(player).passing).toBe(25);

    revealPotential(player);
    expect(player.potential.isHidden).toBe(false);
  });
});

describe('development rate', () => {
  it('resets from the age modifier plus coaching', () => {
    const player = buildPlayer({ age: 20 });
    expect(updateDevelopmentRate(player, 0.1)).toBeCloseTo(1.45);
    expect(player.development.developmentRate).toBeCloseTo(1.45);
  });

  it('clamps the effective rate to 3', () => {
    const player = buildPlayer();
    player.development.developmentRate = 2;
    expect(getCurrentDevelopmentRate(player)).toBeCloseTo(2.4);
    player.development.developmentRate = 3;
    expect(getCurrentDevelopmentRate(player)).toBe(3);
  });
});
