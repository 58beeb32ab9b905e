// ============================================================================
// HARDWOOD - Development System
// ============================================================================
// Game and training performance -> per-skill experience -> skill upgrades
// bounded by hidden potential

import type {
  GameStats,
  PlayerPotential,
  PlayerRecord,
  PlayerRole,
  PotentialTier,
  Skill,
  SkillRatings,
} from '../types';
import {
  calculateOverallSkill,
  clamp,
  clampSkill,
  createSkillRatings,
  MAX_SKILL,
  SKILLS,
} from '../types';
import { getAgeModifier } from '../aging';
import type { DevelopmentConfig } from './constants';
import {
  DEFAULT_DEVELOPMENT_CONFIG,
  PERIMETER_DEFENSE_WEIGHT,
  POST_DEFENSE_WEIGHT,
  RELATED_SKILLS,
} from './constants';

export * from './constants';

// ============================================================================
// Potential
// ============================================================================

export function canImproveSkill(
  potential: PlayerPotential,
  skill: Skill,
  currentValue: number,
): boolean {
  return currentValue < potential.maxSkills[skill] && currentValue < MAX_SKILL;
}

export function getRemainingPotential(player: PlayerRecord): SkillRatings {
  return createSkillRatings((skill) =>
    Math.max(0, player.potential.maxSkills[skill] - player.skills[skill]),
  );
}

// Scouting reveals the ceilings; nothing else changes
export function revealPotential(player: PlayerRecord): void {
  player.potential.isHidden = false;
}

export function calculatePotentialTier(player: PlayerRecord): PotentialTier {
  const overall = calculateOverallSkill(player.skills);

  if (player.age <= 22) {
    if (overall >= 85) return 'elite';
    if (overall >= 75) return 'gold';
    if (overall >= 65) return 'silver';
    return 'bronze';
  }
  if (player.age <= 26) {
    if (overall >= 90) return 'elite';
    if (overall >= 80) return 'gold';
    if (overall >= 70) return 'silver';
    return 'bronze';
  }
  if (overall >= 95) return 'gold';
  if (overall >= 85) return 'silver';
  return 'bronze';
}

// ============================================================================
// Experience ledger
// ============================================================================

function checkMilestones(player: PlayerRecord): void {
  for (const milestone of player.development.milestones) {
    if (
      !milestone.achieved &&
      player.development.totalExperience >= milestone.experienceRequired
    ) {
      milestone.achieved = true;
      milestone.achievedAtAge = player.age;
    }
  }
}

export function addSkillExperience(
  player: PlayerRecord,
  skill: Skill,
  amount: number,
): void {
  if (amount <= 0) return;
  player.development.skillExperience[skill] += amount;
  player.development.totalExperience += amount;
  checkMilestones(player);
}

// Even split with the remainder going to the first skills in order
export function splitEvenly(amount: number): SkillRatings {
  const share = Math.floor(amount / SKILLS.length);
  const remainder = amount % SKILLS.length;
  return createSkillRatings((skill) =>
    SKILLS.indexOf(skill) < remainder ? share + 1 : share,
  );
}

export function addGeneralExperience(player: PlayerRecord, amount: number): void {
  if (amount <= 0) return;
  const split = splitEvenly(amount);
  for (const skill of SKILLS) {
    addSkillExperience(player, skill, split[skill]);
  }
}

// ============================================================================
// Game experience
// ============================================================================

export function calculateBaseExperience(
  stats: GameStats,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): number {
  let experience =
    config.baseGameExperience +
    stats.points * config.pointWeight +
    stats.rebounds * config.reboundWeight +
    stats.assists * config.assistWeight +
    stats.fieldGoalsMade * config.fieldGoalWeight +
    stats.threePointersMade * config.threePointWeight;

  if (stats.fieldGoalsAttempted > 0) {
    const percentage = stats.fieldGoalsMade / stats.fieldGoalsAttempted;
    if (percentage < config.poorShootingThreshold) {
      experience -= config.poorShootingPenalty;
    }
  }

  return clamp(experience, config.minGameExperience, config.maxGameExperience);
}

export function experienceWeights(stats: GameStats, role: PlayerRole): SkillRatings {
  const ballHandlingBase = stats.assists * 0.5;
  return {
    shooting:
      stats.points * 0.3 + stats.fieldGoalsMade * 0.4 + stats.threePointersMade * 0.3,
    insideShooting:
      stats.points * 0.2 + (stats.fieldGoalsMade - stats.threePointersMade) * 0.8,
    rebounding: stats.rebounds,
    passing: stats.assists,
    ballHandling: role === 'PG' ? (ballHandlingBase + 0.3) * 1.5 : ballHandlingBase,
    perimeterDefense: PERIMETER_DEFENSE_WEIGHT,
    postDefense: POST_DEFENSE_WEIGHT,
  };
}

/**
 * Split a game's experience across skills in proportion to what the
 * statline exercised.
 */
export function distributeExperience(
  total: number,
  stats: GameStats,
  role: PlayerRole,
): SkillRatings {
  const weights = experienceWeights(stats, role);
  const weightSum = SKILLS.reduce((sum, skill) => sum + weights[skill], 0);
  if (weightSum <= 0) return splitEvenly(total);

  // Largest remainder, so the shares add up to exactly the total
  const exact = createSkillRatings((skill) => (total * weights[skill]) / weightSum);
  const shares = createSkillRatings((skill) => Math.floor(exact[skill]));
  const handedOut = SKILLS.reduce((sum, skill) => sum + shares[skill], 0);
  const byRemainder = [...SKILLS].sort(
    (a, b) => exact[b] - shares[b] - (exact[a] - shares[a]),
  );
  for (const skill of byRemainder.slice(0, total - handedOut)) {
    shares[skill] += 1;
  }
  return shares;
}

export function awardPerformanceExperience(
  player: PlayerRecord,
  stats: GameStats,
  ageModifier: number,
  coachBonus: number = 0,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): SkillRatings {
  const base = calculateBaseExperience(stats, config);
  const total = Math.round(base * ageModifier * (1 + coachBonus));
  const awarded = distributeExperience(total, stats, player.role);

  for (const skill of SKILLS) {
    addSkillExperience(player, skill, awarded[skill]);
  }
  return awarded;
}

// Age modifier taken from the player's own curve
export function awardGameExperience(
  player: PlayerRecord,
  stats: GameStats,
  coachBonus: number = 0,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): SkillRatings {
  const ageModifier = getAgeModifier(player.development.agingCurve, player.age);
  return awardPerformanceExperience(player, stats, ageModifier, coachBonus, config);
}

// ============================================================================
// Training
// ============================================================================

export function awardTrainingExperience(
  player: PlayerRecord,
  focus: Skill,
  intensity: number,
  coachBonus: number = 0,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): Partial<SkillRatings> {
  const ageModifier = getAgeModifier(player.development.agingCurve, player.age);
  const pool = Math.round(
    intensity * config.trainingExperiencePerIntensity * ageModifier * (1 + coachBonus),
  );
  if (pool <= 0) return {};

  const focusAmount = Math.round(pool * config.trainingFocusShare);
  const related = RELATED_SKILLS[focus];
  const relatedAmount = Math.floor((pool - focusAmount) / related.length);

  const awarded: Partial<SkillRatings> = {};
  awarded[focus] = focusAmount;
  addSkillExperience(player, focus, focusAmount);
  for (const skill of related) {
    awarded[skill] = relatedAmount;
    addSkillExperience(player, skill, relatedAmount);
  }
  return awarded;
}

// ============================================================================
// Upgrades
// ============================================================================

/**
 * Experience needed for the next point of a skill, given how many points the
 * skill has bought over the player's career. 100, 200, 300...
 */
export function getUpgradeCost(
  upgradesBought: number,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): number {
  return (upgradesBought + 1) * config.upgradeCostStep;
}

/**
 * Spend unspent experience on skill points. Each skill upgrades until the next
 * point is unaffordable or the ceiling is reached. Returns one entry per point
 * gained.
 */
export function processSkillUpgrades(
  player: PlayerRecord,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): Skill[] {
  const upgraded: Skill[] = [];
  const ledger = player.development;

  for (const skill of SKILLS) {
    while (canImproveSkill(player.potential, skill, player.skills[skill])) {
      const cost = getUpgradeCost(ledger.skillUpgrades[skill], config);
      if (ledger.skillExperience[skill] < cost) break;

      ledger.skillExperience[skill] -= cost;
      ledger.skillUpgrades[skill] += 1;
      player.skills[skill] = clampSkill(player.skills[skill] + 1);
      upgraded.push(skill);
    }
  }

  return upgraded;
}

// ============================================================================
// Development rate
// ============================================================================

export function getCurrentDevelopmentRate(
  player: PlayerRecord,
  coachBonus: number = 0,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): number {
  const ageModifier = getAgeModifier(player.development.agingCurve, player.age);
  return clamp(
    player.development.developmentRate * ageModifier + coachBonus,
    config.minDevelopmentRate,
    config.maxDevelopmentRate,
  );
}

export function updateDevelopmentRate(
  player: PlayerRecord,
  coachBonus: number = 0,
  config: DevelopmentConfig = DEFAULT_DEVELOPMENT_CONFIG,
): number {
  const ageModifier = getAgeModifier(player.development.agingCurve, player.age);
  player.development.developmentRate = clamp(
    ageModifier + coachBonus,
    config.minDevelopmentRate,
    config.maxDevelopmentRate,
  );
  return player.development.developmentRate;
}
