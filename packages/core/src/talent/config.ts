// ============================================================================
// HARDWOOD - Talent Distribution Configuration
// ============================================================================
// Probability tables and attribute ranges used when generating new players

import type {
  Archetype,
  PlayerRole,
  PotentialTier,
  Skill,
  TalentTier,
} from '../types';

export interface AttributeRange {
  min: number;
  max: number;
  average: number;
}

export interface RoleSpecialization {
  /** Skills the role leans on; ranges are stretched upward */
  primary: Skill[];
  secondary: Skill[];
  /** Skills the role rarely develops; ranges are compressed downward */
  weak: Skill[];
  /** Archetypes a player of this role can be generated with */
  archetypes: Archetype[];
}

export interface ArchetypeEffect {
  /** Added to current skill values */
  valueDelta: Partial<Record<Skill, number>>;
  /** Added to potential ceilings */
  ceilingDelta: Partial<Record<Skill, number>>;
}

/**
 * Configuration for talent generation
 * Percentages are fractions of 1; each table sums to 1
 */
export interface TalentConfig {
  /** Talent tier odds for established players */
  talentTierOdds: Record<TalentTier, number>;
  /** Talent tier odds for rookies */
  rookieTalentTierOdds: Record<TalentTier, number>;
  /** Potential tier odds conditioned on talent tier */
  potentialOdds: Record<TalentTier, Record<PotentialTier, number>>;
  /** Chance that a young player's potential moves up one tier */
  youthBumpChance: number;
  /** Additional bump chance rolled for rookies */
  rookieBumpChance: number;
  /** Age factor above which the youth bump is rolled */
  youthBumpAgeFactor: number;
  /** Chance a generated player receives any archetype */
  archetypeChance: number;
  /** Relative archetype weights within a role's valid set */
  archetypeWeights: Record<Archetype, number>;
  /** Largest early-pick bonus added to superstar/all-star odds in a draft */
  draftPickBonus: number;
}

export const DEFAULT_TALENT_CONFIG: TalentConfig = {
  talentTierOdds: {
    superstar: 0.02,
    allStar: 0.08,
    starter: 0.25,
    rotation: 0.35,
    bench: 0.3,
  },
  rookieTalentTierOdds: {
    superstar: 0.05,
    allStar: 0.15,
    starter: 0.3,
    rotation: 0.35,
    bench: 0.15,
  },
  potentialOdds: {
    superstar: { elite: 0.6, gold: 0.3, silver: 0.1, bronze: 0 },
    allStar: { elite: 0, gold: 0.4, silver: 0.4, bronze: 0.2 },
    starter: { elite: 0, gold: 0, silver: 0.6, bronze: 0.4 },
    rotation: { elite: 0, gold: 0, silver: 0.2, bronze: 0.8 },
    bench: { elite: 0, gold: 0, silver: 0.1, bronze: 0.9 },
  },
  youthBumpChance: 0.3,
  rookieBumpChance: 0.2,
  youthBumpAgeFactor: 1.1,
  archetypeChance: 0.15,
  archetypeWeights: {
    eliteShooter: 0.05,
    defensiveSpecialist: 0.08,
    playmaker: 0.04,
    athleticFinisher: 0.06,
    stretchBig: 0.03,
    lockdownDefender: 0.05,
    floorGeneral: 0.02,
    energizer: 0.1,
  },
  draftPickBonus: 0.2,
};

export const BASE_ATTRIBUTE_RANGES: Record<TalentTier, AttributeRange> = {
  superstar: { min: 85, max: 99, average: 92 },
  allStar: { min: 75, max: 95, average: 85 },
  starter: { min: 65, max: 85, average: 75 },
  rotation: { min: 55, max: 75, average: 65 },
  bench: { min: 45, max: 65, average: 55 },
};

export const ROLE_SPECIALIZATIONS: Record<PlayerRole, RoleSpecialization> = {
  PG: {
    primary: ['passing', 'ballHandling'],
    secondary: ['perimeterDefense', 'shooting'],
    weak: ['rebounding', 'postDefense'],
    archetypes: ['playmaker', 'floorGeneral', 'lockdownDefender'],
  },
  SG: {
    primary: ['shooting', 'perimeterDefense'],
    secondary: ['ballHandling', 'passing'],
    weak: ['rebounding', 'postDefense'],
    archetypes: ['eliteShooter', 'lockdownDefender', 'athleticFinisher'],
  },
  SF: {
    primary: ['shooting', 'rebounding'],
    secondary: ['perimeterDefense', 'passing'],
    weak: ['postDefense'],
    archetypes: [
      'eliteShooter',
      'defensiveSpecialist',
      'playmaker',
      'athleticFinisher',
      'energizer',
    ],
  },
  PF: {
    primary: ['rebounding', 'insideShooting'],
    secondary: ['postDefense', 'shooting'],
    weak: ['ballHandling', 'passing'],
    archetypes: [
      'stretchBig',
      'athleticFinisher',
      'defensiveSpecialist',
      'energizer',
    ],
  },
  C: {
    primary: ['rebounding', 'postDefense', 'insideShooting'],
    secondary: ['perimeterDefense'],
    weak: ['ballHandling', 'passing', 'shooting'],
    archetypes: ['stretchBig', 'defensiveSpecialist', 'athleticFinisher'],
  },
};

// Range multipliers by skill category: min, max, average
export const RANGE_MULTIPLIERS = {
  primary: { min: 1.1, max: 1.05, average: 1.25 },
  secondary: { min: 1.05, max: 1.0, average: 1.12 },
  weak: { min: 0.7, max: 0.85, average: 0.65 },
} as const;

export const ARCHETYPE_EFFECTS: Record<Archetype, ArchetypeEffect> = {
  eliteShooter: {
    valueDelta: { shooting: 10, insideShooting: -5 },
    ceilingDelta: { shooting: 15, insideShooting: -10 },
  },
  defensiveSpecialist: {
    valueDelta: { perimeterDefense: 8, postDefense: 8, shooting: -5 },
    ceilingDelta: { perimeterDefense: 12, postDefense: 12, shooting: -8 },
  },
  playmaker: {
    valueDelta: { passing: 10, ballHandling: 5, rebounding: -5 },
    ceilingDelta: { passing: 15, ballHandling: 8, rebounding: -8 },
  },
  athleticFinisher: {
    valueDelta: { insideShooting: 10, rebounding: 5, shooting: -5 },
    ceilingDelta: { insideShooting: 15, rebounding: 8, shooting: -10 },
  },
  stretchBig: {
    valueDelta: { shooting: 10, postDefense: -5 },
    ceilingDelta: { shooting: 15, postDefense: -8 },
  },
  lockdownDefender: {
    valueDelta: { perimeterDefense: 12, insideShooting: -5 },
    ceilingDelta: { perimeterDefense: 15, insideShooting: -8 },
  },
  floorGeneral: {
    valueDelta: { passing: 12, ballHandling: 8, postDefense: -5 },
    ceilingDelta: { passing: 15, ballHandling: 10, postDefense: -8 },
  },
  energizer: {
    valueDelta: { rebounding: 6, perimeterDefense: 6, passing: -4 },
    ceilingDelta: { rebounding: 10, perimeterDefense: 10, passing: -6 },
  },
};

export const ARCHETYPE_NAMES: Record<Archetype, string> = {
  eliteShooter: 'Elite Shooter',
  defensiveSpecialist: 'Defensive Specialist',
  playmaker: 'Playmaker',
  athleticFinisher: 'Athletic Finisher',
  stretchBig: 'Stretch Big',
  lockdownDefender: 'Lockdown Defender',
  floorGeneral: 'Floor General',
  energizer: 'Energizer',
};

// Overall potential range and per-skill cap variance by potential tier
export const POTENTIAL_TIER_RANGES: Record<
  PotentialTier,
  { minOverall: number; maxOverall: number; capVariance: number }
> = {
  bronze: { minOverall: 70, maxOverall: 79, capVariance: 5 },
  silver: { minOverall: 80, maxOverall: 89, capVariance: 8 },
  gold: { minOverall: 90, maxOverall: 97, capVariance: 10 },
  elite: { minOverall: 95, maxOverall: 99, capVariance: 12 },
};

export const ROLE_POTENTIAL_ADJUSTMENTS: Record<
  PlayerRole,
  Partial<Record<Skill, number>>
> = {
  PG: { ballHandling: 5, passing: 5 },
  SG: { shooting: 5, perimeterDefense: 3 },
  SF: { shooting: 3, rebounding: 3 },
  PF: { rebounding: 5, insideShooting: 3 },
  C: { rebounding: 5, postDefense: 5, insideShooting: 3 },
};

// Rookie projection bases by potential tier
export const ROOKIE_CEILING_BASE: Record<PotentialTier, number> = {
  bronze: 75,
  silver: 85,
  gold: 92,
  elite: 97,
};

export const ROOKIE_FLOOR_BASE: Record<PotentialTier, number> = {
  bronze: 55,
  silver: 65,
  gold: 75,
  elite: 80,
};

export const BUST_PROBABILITY: Record<TalentTier, number> = {
  superstar: 0.05,
  allStar: 0.15,
  starter: 0.25,
  rotation: 0.35,
  bench: 0.5,
};

export const BOOM_PROBABILITY: Record<TalentTier, number> = {
  superstar: 0.2,
  allStar: 0.15,
  starter: 0.1,
  rotation: 0.08,
  bench: 0.05,
};
