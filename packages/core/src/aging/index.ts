// ============================================================================
// HARDWOOD - Aging System
// ============================================================================
// Season-boundary aging: age advance, skill degradation past decline start,
// retirement evaluation. Aging curves are derived once at player creation.

import type {
  AgingCurve,
  PlayerRecord,
  PlayerRole,
  RetirementReason,
  Skill,
} from '../types';
import { calculateOverallSkill, clamp, SKILLS } from '../types';
import type { Rng } from '../random';
import { chance, defaultRng, randomBetween } from '../random';
import type { AgingConfig } from './constants';
import {
  DEFAULT_AGING_CONFIG,
  MAX_RETIREMENT_AGE,
  ROLE_AGING_OVERRIDES,
  SKILL_DEGRADATION_MULTIPLIERS,
  STANDARD_AGING_CURVE,
} from './constants';

export * from './constants';

export interface SkillChange {
  previousValue: number;
  newValue: number;
  change: number;
}

export interface AgingResult {
  playerId: string;
  playerName: string;
  previousAge: number;
  newAge: number;
  skillChanges: Partial<Record<Skill, SkillChange>>;
  shouldRetire: boolean;
  retirementReason: RetirementReason | null;
}

export interface CareerProjection {
  season: number;
  age: number;
  projectedOverall: number;
  retirementProbability: number;
  retired: boolean;
  retirementReason: RetirementReason | null;
}

// ============================================================================
// Aging curves
// ============================================================================

export function createAgingCurve(
  role: PlayerRole,
  age: number,
  overall: number,
): AgingCurve {
  const curve: AgingCurve = {
    ...STANDARD_AGING_CURVE,
    ...ROLE_AGING_OVERRIDES[role],
  };

  if (overall > 85) {
    curve.retirementAge += 2;
    curve.declineRate *= 0.9;
  } else if (overall < 60) {
    curve.retirementAge -= 2;
    curve.declineRate *= 1.1;
  }

  // Players created past 30 keep a plausible runway
  if (age > 30) {
    curve.declineRate *= 1.2;
    curve.retirementAge = clamp(
      curve.retirementAge - (age - 30),
      age + 1,
      MAX_RETIREMENT_AGE,
    );
  }

  return curve;
}

/**
 * Development multiplier for a given age.
 * Above 1 before the peak, flat through the peak window, falling to 0.1 past
 * retirement age. Non-increasing from decline start onward.
 */
export function getAgeModifier(curve: AgingCurve, age: number): number {
  if (age < curve.peakAge) {
    return clamp(1 + (curve.peakAge - age) * 0.05, 1, 2);
  }
  if (age < curve.declineStartAge) {
    return curve.peakMultiplier;
  }
  if (age < curve.retirementAge) {
    const yearsPastDecline = age - curve.declineStartAge;
    return clamp(
      curve.peakMultiplier - yearsPastDecline * curve.declineRate,
      0.1,
      curve.peakMultiplier,
    );
  }
  return 0.1;
}

export function getSkillDegradationRate(
  curve: AgingCurve,
  age: number,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): number {
  if (age < curve.declineStartAge) return 0;
  if (age < curve.retirementAge) {
    const yearsPastDecline = age - curve.declineStartAge;
    return clamp(yearsPastDecline * curve.declineRate * 0.5, 0, config.maxDeclineRate);
  }
  return config.pastRetirementRate;
}

// ============================================================================
// Degradation
// ============================================================================

function valueMultiplier(value: number): number {
  if (value > 80) return 1.5;
  if (value > 70) return 1.2;
  if (value > 60) return 1.0;
  return 0.8;
}

function ageMultiplier(age: number): number {
  if (age > 35) return 2.0;
  if (age > 32) return 1.5;
  if (age > 30) return 1.0;
  return 0.5;
}

// Points lost this season for one skill, 0 to maxSkillLossPerSeason
export function calculateSkillDegradation(
  skill: Skill,
  value: number,
  rate: number,
  age: number,
  rng: Rng = defaultRng,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): number {
  const base =
    rate *
    SKILL_DEGRADATION_MULTIPLIERS[skill] *
    valueMultiplier(value) *
    ageMultiplier(age) *
    100;
  const jitter = randomBetween(rng, config.jitterMin, config.jitterMax);
  return clamp(Math.round(base * jitter), 0, config.maxSkillLossPerSeason);
}

function applySkillDegradation(
  player: PlayerRecord,
  rate: number,
  result: AgingResult,
  rng: Rng,
  config: AgingConfig,
): void {
  for (const skill of SKILLS) {
    const previousValue = player.skills[skill];
    const amount = calculateSkillDegradation(
      skill,
      previousValue,
      rate,
      player.age,
      rng,
      config,
    );
    // Skills already at or under the floor stay put
    if (amount <= 0 || previousValue <= config.skillFloor) continue;

    const newValue = Math.max(config.skillFloor, previousValue - amount);
    player.skills[skill] = newValue;
    result.skillChanges[skill] = {
      previousValue,
      newValue,
      change: newValue - previousValue,
    };
  }
}

// ============================================================================
// Retirement
// ============================================================================

// First matching rule wins; rolls are only drawn when their age gate is met
export function evaluateRetirement(
  player: PlayerRecord,
  rng: Rng = defaultRng,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): RetirementReason | null {
  const curve = player.development.agingCurve;
  const overall = calculateOverallSkill(player.skills);

  if (player.age >= curve.retirementAge + 2) return 'age';

  if (
    player.age >= curve.declineStartAge + 3 &&
    overall < config.performanceRetirementOverall
  ) {
    return 'performance';
  }

  if (
    player.age >= curve.retirementAge - 2 &&
    chance(rng, config.injuryRetirementChance)
  ) {
    return 'injury';
  }

  if (
    player.age >= curve.retirementAge - 1 &&
    overall < config.voluntaryRetirementOverall &&
    chance(rng, config.voluntaryRetirementChance)
  ) {
    return 'voluntary';
  }

  return null;
}

export function calculateRetirementProbability(player: PlayerRecord): number {
  const curve = player.development.agingCurve;
  if (player.age < curve.declineStartAge) return 0;
  if (player.age >= curve.retirementAge) {
    return 0.8 + 0.1 * (player.age - curve.retirementAge);
  }

  let probability = (player.age - curve.declineStartAge) * 0.05;
  const overall = calculateOverallSkill(player.skills);
  if (overall < 50) probability += 0.2;
  else if (overall > 80) probability -= 0.1;

  return clamp(probability, 0, 0.95);
}

// ============================================================================
// Season processing
// ============================================================================

/**
 * Advance a player one season. Mutates age and skills; a retiring player is
 * marked retired with its reason.
 */
export function processPlayerAging(
  player: PlayerRecord,
  rng: Rng = defaultRng,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): AgingResult {
  const result: AgingResult = {
    playerId: player.id,
    playerName: player.name,
    previousAge: player.age,
    newAge: player.age + 1,
    skillChanges: {},
    shouldRetire: false,
    retirementReason: null,
  };

  player.age = result.newAge;

  const rate = getSkillDegradationRate(player.development.agingCurve, player.age, config);
  if (rate > 0) {
    applySkillDegradation(player, rate, result, rng, config);
  }

  const reason = evaluateRetirement(player, rng, config);
  if (reason) {
    result.shouldRetire = true;
    result.retirementReason = reason;
    player.status = 'retired';
    player.retirementReason = reason;
  }

  return result;
}

export function processTeamAging(
  players: PlayerRecord[],
  rng: Rng = defaultRng,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): AgingResult[] {
  return players.map((player) => processPlayerAging(player, rng, config));
}

export function getTotalSkillLoss(result: AgingResult): number {
  let total = 0;
  for (const change of Object.values(result.skillChanges)) {
    if (change && change.change < 0) total -= change.change;
  }
  return total;
}

export function getDeclinedSkills(result: AgingResult): Skill[] {
  return SKILLS.filter((skill) => {
    const change = result.skillChanges[skill];
    return change !== undefined && change.change < 0;
  });
}

// Ages a copy season by season, stopping at retirement
export function projectCareerProgression(
  player: PlayerRecord,
  seasons: number,
  rng: Rng = defaultRng,
  config: AgingConfig = DEFAULT_AGING_CONFIG,
): CareerProjection[] {
  const copy = structuredClone(player);
  const projections: CareerProjection[] = [];

  for (let season = 1; season <= seasons; season++) {
    const result = processPlayerAging(copy, rng, config);
    projections.push({
      season,
      age: copy.age,
      projectedOverall: Math.round(calculateOverallSkill(copy.skills)),
      retirementProbability: calculateRetirementProbability(copy),
      retired: result.shouldRetire,
      retirementReason: result.retirementReason,
    });
    if (result.shouldRetire) break;
  }

  return projections;
}
