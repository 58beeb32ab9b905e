// ============================================================================
// HARDWOOD - Development Constants
// ============================================================================

import type { DevelopmentMilestone, Skill } from '../types';

export interface DevelopmentConfig {
  /** Flat experience every player earns for appearing in a game */
  baseGameExperience: number;
  /** Experience per point / rebound / assist / made shot / made three */
  pointWeight: number;
  reboundWeight: number;
  assistWeight: number;
  fieldGoalWeight: number;
  threePointWeight: number;
  /** Penalty for a poor shooting night */
  poorShootingPenalty: number;
  /** Field goal percentage below which the penalty applies */
  poorShootingThreshold: number;
  minGameExperience: number;
  maxGameExperience: number;
  /** Experience per point of training intensity */
  trainingExperiencePerIntensity: number;
  /** Share of training experience going to the focus skill */
  trainingFocusShare: number;
  /** Experience per skill point is this times the upgrade's ordinal */
  upgradeCostStep: number;
  minDevelopmentRate: number;
  maxDevelopmentRate: number;
}

export const DEFAULT_DEVELOPMENT_CONFIG: DevelopmentConfig = {
  baseGameExperience: 20,
  pointWeight: 2,
  reboundWeight: 3,
  assistWeight: 4,
  fieldGoalWeight: 2,
  threePointWeight: 3,
  poorShootingPenalty: 10,
  poorShootingThreshold: 0.3,
  minGameExperience: 10,
  maxGameExperience: 200,
  trainingExperiencePerIntensity: 10,
  trainingFocusShare: 0.7,
  upgradeCostStep: 100,
  minDevelopmentRate: 0.1,
  maxDevelopmentRate: 3.0,
};

// Training a skill spills over into these
export const RELATED_SKILLS: Record<Skill, Skill[]> = {
  shooting: ['insideShooting', 'ballHandling'],
  insideShooting: ['shooting', 'postDefense'],
  rebounding: ['postDefense', 'perimeterDefense'],
  passing: ['ballHandling', 'shooting'],
  ballHandling: ['passing', 'perimeterDefense'],
  perimeterDefense: ['ballHandling', 'rebounding'],
  postDefense: ['rebounding', 'insideShooting'],
};

// Flat weights for skills not driven by the statline
export const PERIMETER_DEFENSE_WEIGHT = 0.3;
export const POST_DEFENSE_WEIGHT = 0.2;

export function createDefaultMilestones(): DevelopmentMilestone[] {
  return [
    {
      name: 'First Steps',
      description: 'Earned your first 100 experience points',
      experienceRequired: 100,
      achieved: false,
    },
    {
      name: 'Rising Talent',
      description: 'Accumulated 500 experience points',
      experienceRequired: 500,
      achieved: false,
    },
    {
      name: 'Experienced Player',
      description: 'Reached 1000 experience points',
      experienceRequired: 1000,
      achieved: false,
    },
    {
      name: 'Veteran',
      description: 'Accumulated 2500 experience points',
      experienceRequired: 2500,
      achieved: false,
    },
    {
      name: 'Elite Performer',
      description: 'Reached 5000 experience points',
      experienceRequired: 5000,
      achieved: false,
    },
  ];
}
