// ============================================================================
// HARDWOOD - Coaching
// ============================================================================
// Coaches only matter to the economy through the development bonus

import { clamp } from '../types';

export type CoachingSpecialization =
  | 'offensive'
  | 'defensive'
  | 'playerDevelopment'
  | 'teamChemistry';

export interface CoachProfile {
  name: string;
  /** Player development attribute, 0-99; 50 is neutral */
  development: number;
  primarySpecialization: CoachingSpecialization;
  secondarySpecialization: CoachingSpecialization | null;
  /** 1 for a first-year coach */
  experienceLevel: number;
}

export const MIN_COACH_BONUS = -0.2;
export const MAX_COACH_BONUS = 0.3;

export function calculateCoachDevelopmentBonus(coach: CoachProfile | null): number {
  if (!coach) return 0;

  let weight = 0.001;
  if (coach.primarySpecialization === 'playerDevelopment') weight = 0.004;
  else if (coach.secondarySpecialization === 'playerDevelopment') weight = 0.002;

  const bonus =
    (coach.development - 50) * weight + (coach.experienceLevel - 1) * 0.05;
  return clamp(bonus, MIN_COACH_BONUS, MAX_COACH_BONUS);
}
