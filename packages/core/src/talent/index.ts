// ============================================================================
// HARDWOOD - Talent Distribution
// ============================================================================
// Stateless generators for talent tiers, potential tiers, rare archetypes and
// role-shaped attribute ranges. Every draw goes through the injected Rng.

import type {
  Archetype,
  PlayerPotential,
  PlayerRole,
  PotentialTier,
  Skill,
  SkillRatings,
  TalentTier,
} from '../types';
import {
  clamp,
  createSkillRatings,
  POTENTIAL_TIERS,
  TALENT_TIERS,
} from '../types';
import type { Rng } from '../random';
import { chance, defaultRng, randomInt, weightedIndex } from '../random';
import type { AttributeRange, TalentConfig } from './config';
import {
  ARCHETYPE_EFFECTS,
  BASE_ATTRIBUTE_RANGES,
  BOOM_PROBABILITY,
  BUST_PROBABILITY,
  DEFAULT_TALENT_CONFIG,
  POTENTIAL_TIER_RANGES,
  RANGE_MULTIPLIERS,
  ROLE_POTENTIAL_ADJUSTMENTS,
  ROLE_SPECIALIZATIONS,
  ROOKIE_CEILING_BASE,
  ROOKIE_FLOOR_BASE,
} from './config';

export * from './config';

export type TalentOdds = Record<TalentTier, number>;

export interface RookieProfile {
  /** Hidden swing applied to projections, -0.15 to +0.15 */
  hiddenVariance: number;
  developmentRate: number;
  ceiling: number;
  floor: number;
  bustProbability: number;
  boomProbability: number;
}

export function drawTalentTier(odds: TalentOdds, rng: Rng = defaultRng): TalentTier {
  return TALENT_TIERS[weightedIndex(rng, TALENT_TIERS.map((t) => odds[t]))];
}

export function generateTalentTier(
  isRookie: boolean,
  rng: Rng = defaultRng,
  config: TalentConfig = DEFAULT_TALENT_CONFIG,
): TalentTier {
  return drawTalentTier(
    isRookie ? config.rookieTalentTierOdds : config.talentTierOdds,
    rng,
  );
}

function bumpTier(tier: PotentialTier): PotentialTier {
  const index = POTENTIAL_TIERS.indexOf(tier);
  return POTENTIAL_TIERS[Math.min(index + 1, POTENTIAL_TIERS.length - 1)];
}

// Rookies count as 1.2; everyone else scales down from age 18
export function potentialAgeFactor(age: number, isRookie: boolean): number {
  if (isRookie) return 1.2;
  return clamp((30 - age) / 12, 0.5, 1.5);
}

export function generatePotentialTier(
  talentTier: TalentTier,
  age: number,
  isRookie: boolean,
  rng: Rng = defaultRng,
  config: TalentConfig = DEFAULT_TALENT_CONFIG,
): PotentialTier {
  const odds = config.potentialOdds[talentTier];
  let tier = POTENTIAL_TIERS[weightedIndex(rng, POTENTIAL_TIERS.map((t) => odds[t]))];

  if (
    potentialAgeFactor(age, isRookie) > config.youthBumpAgeFactor &&
    chance(rng, config.youthBumpChance)
  ) {
    tier = bumpTier(tier);
  }
  if (isRookie && chance(rng, config.rookieBumpChance)) {
    tier = bumpTier(tier);
  }
  return tier;
}

// Most players have no archetype; the rest draw from the role's valid set
export function generateRareArchetype(
  role: PlayerRole,
  rng: Rng = defaultRng,
  config: TalentConfig = DEFAULT_TALENT_CONFIG,
): Archetype | null {
  if (rng() > config.archetypeChance) return null;

  const candidates = ROLE_SPECIALIZATIONS[role].archetypes;
  const weights = candidates.map((a) => config.archetypeWeights[a]);
  return candidates[weightedIndex(rng, weights)];
}

export function applyArchetype(
  skills: SkillRatings,
  maxSkills: SkillRatings,
  archetype: Archetype,
): { skills: SkillRatings; maxSkills: SkillRatings } {
  const effect = ARCHETYPE_EFFECTS[archetype];
  const nextSkills = createSkillRatings((skill) =>
    clamp(skills[skill] + (effect.valueDelta[skill] ?? 0), 0, 99),
  );
  const nextCeilings = createSkillRatings((skill) =>
    Math.max(
      clamp(maxSkills[skill] + (effect.ceilingDelta[skill] ?? 0), 50, 99),
      nextSkills[skill],
    ),
  );
  return { skills: nextSkills, maxSkills: nextCeilings };
}

function skillCategory(
  role: PlayerRole,
  skill: Skill,
): keyof typeof RANGE_MULTIPLIERS | null {
  const specialization = ROLE_SPECIALIZATIONS[role];
  if (specialization.primary.includes(skill)) return 'primary';
  if (specialization.secondary.includes(skill)) return 'secondary';
  if (specialization.weak.includes(skill)) return 'weak';
  return null;
}

/**
 * Per-skill generation ranges for a role and talent tier.
 * Always satisfies 30 <= min <= average <= max <= 99.
 */
export function generatePositionAttributeRanges(
  role: PlayerRole,
  tier: TalentTier,
): Record<Skill, AttributeRange> {
  const base = BASE_ATTRIBUTE_RANGES[tier];

  const rangeFor = (skill: Skill): AttributeRange => {
    const category = skillCategory(role, skill);
    const multiplier = category
      ? RANGE_MULTIPLIERS[category]
      : { min: 1, max: 1, average: 1 };

    let min = clamp(Math.round(base.min * multiplier.min), 30, 90);
    let max = clamp(Math.round(base.max * multiplier.max), 50, 99);
    let average = clamp(Math.round(base.average * multiplier.average), 40, 95);

    min = clamp(min, 30, average);
    max = clamp(max, average, 99);
    average = clamp(average, min, max);
    return { min, max, average };
  };

  return {
    shooting: rangeFor('shooting'),
    rebounding: rangeFor('rebounding'),
    passing: rangeFor('passing'),
    ballHandling: rangeFor('ballHandling'),
    perimeterDefense: rangeFor('perimeterDefense'),
    postDefense: rangeFor('postDefense'),
    insideShooting: rangeFor('insideShooting'),
  };
}

// Draw a value inside a range, biased toward its average
export function sampleAttribute(range: AttributeRange, rng: Rng = defaultRng): number {
  const low = randomInt(rng, range.min, range.average);
  const high = randomInt(rng, range.average, range.max);
  return Math.round((low + high) / 2);
}

// Overall potential and per-skill ceilings for a tier
export function potentialFromTier(
  tier: PotentialTier,
  rng: Rng = defaultRng,
): PlayerPotential {
  const range = POTENTIAL_TIER_RANGES[tier];
  const overallPotential = randomInt(rng, range.minOverall, range.maxOverall);
  const maxSkills = createSkillRatings(() =>
    clamp(
      overallPotential + randomInt(rng, -range.capVariance, range.capVariance),
      50,
      99,
    ),
  );
  return { tier, maxSkills, overallPotential, isHidden: true };
}

export function adjustPotentialForRole(
  potential: PlayerPotential,
  role: PlayerRole,
): PlayerPotential {
  const adjustments = ROLE_POTENTIAL_ADJUSTMENTS[role];
  return {
    ...potential,
    maxSkills: createSkillRatings((skill) =>
      clamp(potential.maxSkills[skill] + (adjustments[skill] ?? 0), 50, 99),
    ),
  };
}

// Ceilings never sit below what the player can already do
export function liftCeilingsToSkills(
  potential: PlayerPotential,
  skills: SkillRatings,
): PlayerPotential {
  return {
    ...potential,
    maxSkills: createSkillRatings((skill) =>
      Math.max(potential.maxSkills[skill], skills[skill]),
    ),
  };
}

export function generateRookiePotential(
  talentTier: TalentTier,
  potentialTier: PotentialTier,
  rng: Rng = defaultRng,
): RookieProfile {
  const hiddenVariance = rng() * 0.3 - 0.15;
  const developmentRate = 0.8 + rng() * 0.6;

  return {
    hiddenVariance,
    developmentRate,
    ceiling: clamp(
      Math.round(ROOKIE_CEILING_BASE[potentialTier] + hiddenVariance * 10),
      70,
      99,
    ),
    floor: clamp(
      Math.round(ROOKIE_FLOOR_BASE[potentialTier] + hiddenVariance * 8),
      45,
      85,
    ),
    bustProbability: BUST_PROBABILITY[talentTier],
    boomProbability: BOOM_PROBABILITY[talentTier],
  };
}

/**
 * Talent odds for each pick of a draft class, best pick first.
 * Early picks shift odds toward superstar/all-star and away from bench.
 */
export function generateDraftClassDistribution(
  classSize: number,
  config: TalentConfig = DEFAULT_TALENT_CONFIG,
): TalentOdds[] {
  const distributions: TalentOdds[] = [];

  for (let pick = 0; pick < classSize; pick++) {
    const bonus = ((classSize - pick) / classSize) * config.draftPickBonus;
    const base = config.rookieTalentTierOdds;
    const raw: TalentOdds = {
      superstar: clamp(base.superstar + bonus, 0, 1),
      allStar: clamp(base.allStar + bonus, 0, 1),
      starter: clamp(base.starter, 0, 1),
      rotation: clamp(base.rotation, 0, 1),
      bench: clamp(base.bench - bonus / 2, 0, 1),
    };
    const total = TALENT_TIERS.reduce((sum, t) => sum + raw[t], 0);
    distributions.push({
      superstar: raw.superstar / total,
      allStar: raw.allStar / total,
      starter: raw.starter / total,
      rotation: raw.rotation / total,
      bench: raw.bench / total,
    });
  }

  return distributions;
}

// Count of tiers across a batch, used by reports
export function summarizeTalentTiers(tiers: readonly TalentTier[]): TalentOdds {
  const counts: TalentOdds = {
    superstar: 0,
    allStar: 0,
    starter: 0,
    rotation: 0,
    bench: 0,
  };
  for (const tier of tiers) counts[tier]++;
  return counts;
}
