import { describe, expect, it } from 'vitest';
import { createRng, createScriptedRng } from '../random';
import type { SkillRatings } from '../types';
import { createSkillRatings, PLAYER_ROLES, SKILLS, TALENT_TIERS } from '../types';
import {
  adjustPotentialForRole,
  applyArchetype,
  generateDraftClassDistribution,
  generatePositionAttributeRanges,
  generatePotentialTier,
  generateRareArchetype,
  generateRookiePotential,
  generateTalentTier,
  potentialAgeFactor,
  potentialFromTier,
  summarizeTalentTiers,
} from './index';

function flatSkills(value: number): SkillRatings {
  return createSkillRatings(() => value);
}

describe('generateTalentTier', () => {
  it('draws superstars at about 2% for established players', () => {
    const rng = createRng(2024);
    const tiers = Array.from({ length: 100_000 }, () => generateTalentTier(false, rng));
    const counts = summarizeTalentTiers(tiers);

    expect(counts.superstar / 100_000).toBeGreaterThan(0.015);
    expect(counts.superstar / 100_000).toBeLessThan(0.025);
    expect(counts.rotation / 100_000).toBeGreaterThan(0.33);
    expect(counts.rotation / 100_000).toBeLessThan(0.37);
  });

  it('uses the rookie table for rookies', () => {
    // 0.19 falls past superstar (0.05) into allStar (0.05-0.20) on the rookie table
    expect(generateTalentTier(true, createScriptedRng([0.19]))).toBe('allStar');
    // ...and past allStar (0.02-0.10) into starter on the veteran table
    expect(generateTalentTier(false, createScriptedRng([0.19]))).toBe('starter');
  });
});

describe('generatePotentialTier', () => {
  it('draws from the conditional table without a bump for a 30-year-old', () => {
    expect(potentialAgeFactor(30, false)).toBe(0.5);
    expect(
      generatePotentialTier('superstar', 30, false, createScriptedRng([0.95])),
    ).toBe('elite');
  });

  it('bumps a rookie twice when both rolls succeed', () => {
    const rng = createScriptedRng([0, 0.1, 0.1]);
    expect(generatePotentialTier('bench', 20, true, rng)).toBe('gold');
  });

  it('never bumps past elite', () => {
    const rng = createScriptedRng([0.99, 0, 0]);
    expect(generatePotentialTier('superstar', 19, true, rng)).toBe('elite');
  });
});

describe('generateRareArchetype', () => {
  it('returns null when the archetype roll fails', () => {
    expect(generateRareArchetype('PG', createScriptedRng([0.5]))).toBeNull();
  });

  it('picks from the role set when the roll succeeds', () => {
    expect(generateRareArchetype('PG', createScriptedRng([0.1, 0]))).toBe('playmaker');
  });

  it('only yields archetypes valid for the role', () => {
    const rng = createRng(9);
    for (let i = 0; i < 2000; i++) {
      const archetype = generateRareArchetype('C', rng);
      if (archetype !== null) {
        expect(['stretchBig', 'defensiveSpecialist', 'athleticFinisher']).toContain(
          archetype,
        );
      }
    }
  });
});

describe('applyArchetype', () => {
  it('shifts values and ceilings', () => {
    const result = applyArchetype(flatSkills(60), flatSkills(70), 'eliteShooter');
    expect(result.skills.shooting).toBe(70);
    expect(result.skills.insideShooting).toBe(55);
    expect(result.maxSkills.shooting).toBe(85);
    expect(result.maxSkills.insideShooting).toBe(60);
    expect(result.skills.passing).toBe(60);
  });

  it('keeps ceilings at or above the new values', () => {
    const result = applyArchetype(flatSkills(60), flatSkills(50), 'eliteShooter');
    expect(result.maxSkills.insideShooting).toBe(55);
    expect(result.maxSkills.shooting).toBe(70);
  });
});

describe('generatePositionAttributeRanges', () => {
  it('keeps every range ordered inside [30, 99]', () => {
    for (const role of PLAYER_ROLES) {
      for (const tier of TALENT_TIERS) {
        const ranges = generatePositionAttributeRanges(role, tier);
        for (const skill of SKILLS) {
          const range = ranges[skill];
          expect(range.min).toBeGreaterThanOrEqual(30);
          expect(range.min).toBeLessThanOrEqual(range.average);
          expect(range.average).toBeLessThanOrEqual(range.max);
          expect(range.max).toBeLessThanOrEqual(99);
        }
      }
    }
  });

  it('stretches primary skills and leaves neutral skills at the tier base', () => {
    expect(generatePositionAttributeRanges('PG', 'superstar').passing).toEqual({
      min: 90,
      max: 99,
      average: 95,
    });
    expect(generatePositionAttributeRanges('PG', 'rotation').insideShooting).toEqual({
      min: 55,
      max: 75,
      average: 65,
    });
  });
});

describe('potential', () => {
  it('builds ceilings from the tier range', () => {
    const potential = potentialFromTier('bronze', createScriptedRng([0]));
    expect(potential.overallPotential).toBe(70);
    expect(potential.maxSkills).toEqual(flatSkills(65));
    expect(potential.isHidden).toBe(true);
  });

  it('raises role skills for centers', () => {
    const potential = adjustPotentialForRole(
      potentialFromTier('bronze', createScriptedRng([0])),
      'C',
    );
    expect(potential.maxSkills.rebounding).toBe(70);
    expect(potential.maxSkills.postDefense).toBe(70);
    expect(potential.maxSkills.insideShooting).toBe(68);
    expect(potential.maxSkills.passing).toBe(65);
  });
});

describe('generateRookiePotential', () => {
  it('projects from the tier bases with no variance at the midpoint', () => {
    const profile = generateRookiePotential('starter', 'gold', createScriptedRng([0.5]));
    expect(profile.hiddenVariance).toBeCloseTo(0);
    expect(profile.developmentRate).toBeCloseTo(1.1);
    expect(profile.ceiling).toBe(92);
    expect(profile.floor).toBe(75);
    expect(profile.bustProbability).toBe(0.25);
    expect(profile.boomProbability).toBe(0.1);
  });
});

describe('generateDraftClassDistribution', () => {
  it('favors early picks and normalizes every pick', () => {
    const picks = generateDraftClassDistribution(10);
    expect(picks).toHaveLength(10);
    expect(picks[0].superstar).toBeCloseTo(0.25 / 1.3);
    expect(picks[0].bench).toBeCloseTo(0.05 / 1.3);
    expect(picks[9].superstar).toBeCloseTo(0.07 / 1.03);
    for (const pick of picks) {
      const total = TALENT_TIERS.reduce((sum, t) => sum + pick[t], 0);
      expect(total).toBeCloseTo(1);
    }
  });
});
