// ============================================================================
// HARDWOOD - Aging Constants
// ============================================================================

import type { AgingCurve, PlayerRole, Skill } from '../types';

export const STANDARD_AGING_CURVE: AgingCurve = {
  peakAge: 27,
  declineStartAge: 30,
  retirementAge: 38,
  peakMultiplier: 1.2,
  declineRate: 0.02,
};

// Role overrides applied on top of the standard curve
export const ROLE_AGING_OVERRIDES: Record<PlayerRole, Partial<AgingCurve>> = {
  PG: { peakAge: 28, declineStartAge: 31, retirementAge: 39, declineRate: 0.018 },
  SG: {},
  SF: { retirementAge: 39, declineRate: 0.019 },
  PF: { peakAge: 26, declineStartAge: 29, retirementAge: 37, declineRate: 0.022 },
  C: { peakAge: 25, declineStartAge: 28, retirementAge: 36, declineRate: 0.025 },
};

// Athletic skills fade faster than skill-based ones
export const SKILL_DEGRADATION_MULTIPLIERS: Record<Skill, number> = {
  shooting: 0.8,
  rebounding: 1.2,
  passing: 0.6,
  ballHandling: 0.9,
  perimeterDefense: 1.3,
  postDefense: 1.1,
  insideShooting: 0.9,
};

export interface AgingConfig {
  /** Skills never decay below this value */
  skillFloor: number;
  /** Upper bound on points lost per skill per season */
  maxSkillLossPerSeason: number;
  /** Jitter multiplier range applied to each skill loss */
  jitterMin: number;
  jitterMax: number;
  /** Degradation rate once a player passes retirement age */
  pastRetirementRate: number;
  /** Cap on the in-decline degradation rate */
  maxDeclineRate: number;
  /** Chance of injury-driven retirement near retirement age */
  injuryRetirementChance: number;
  /** Chance of voluntary retirement for a fading veteran */
  voluntaryRetirementChance: number;
  /** Overall below which a long-declining player retires */
  performanceRetirementOverall: number;
  /** Overall below which a player near retirement age may walk away */
  voluntaryRetirementOverall: number;
}

export const DEFAULT_AGING_CONFIG: AgingConfig = {
  skillFloor: 30,
  maxSkillLossPerSeason: 3,
  jitterMin: 0.75,
  jitterMax: 1.25,
  pastRetirementRate: 0.15,
  maxDeclineRate: 0.1,
  injuryRetirementChance: 0.05,
  voluntaryRetirementChance: 0.15,
  performanceRetirementOverall: 45,
  voluntaryRetirementOverall: 60,
};

export const MAX_RETIREMENT_AGE = 45;
