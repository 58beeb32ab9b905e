// ============================================================================
// HARDWOOD - Game Simulation Constants
// ============================================================================
// All tunable parameters for possession simulation

// Possessions per game (inclusive range)
export const DEFAULT_MIN_POSSESSIONS = 180;
export const DEFAULT_MAX_POSSESSIONS = 220;
// Hard upper bound on simulation work per game
export const MAX_POSSESSIONS_PER_GAME = 400;

// Quality draws are uniform integers in [0, QUALITY_RANGE)
export const QUALITY_RANGE = 100;

// Make threshold: quality >= QUALITY_RANGE - (base + weight * skill)
export const INSIDE_BASE_CHANCE = 30;
export const INSIDE_SKILL_WEIGHT = 2;
export const MIDRANGE_BASE_CHANCE = 25;
export const MIDRANGE_SKILL_WEIGHT = 2;
export const THREE_BASE_CHANCE = 25;
export const THREE_SKILL_WEIGHT = 1;

export const SHOT_POINTS = {
  inside: 2,
  midrange: 2,
  three: 3,
} as const;
