// ============================================================================
// HARDWOOD - Core Types
// ============================================================================

// The seven tracked skills. Records keyed by Skill are exhaustive at compile time.
export const SKILLS = [
  'shooting',
  'rebounding',
  'passing',
  'ballHandling',
  'perimeterDefense',
  'postDefense',
  'insideShooting',
] as const;

export type Skill = (typeof SKILLS)[number];

// Skill ratings, 0-99
export type SkillRatings = Record<Skill, number>;

export const MIN_SKILL = 0;
export const MAX_SKILL = 99;

// Player roles (basketball positions)
export type PlayerRole =
  | 'PG' // Point guard
  | 'SG' // Shooting guard
  | 'SF' // Small forward
  | 'PF' // Power forward
  | 'C'; // Center

export const PLAYER_ROLES: readonly PlayerRole[] = ['PG', 'SG', 'SF', 'PF', 'C'];

export const ROLE_NAMES: Record<PlayerRole, string> = {
  PG: 'Point Guard',
  SG: 'Shooting Guard',
  SF: 'Small Forward',
  PF: 'Power Forward',
  C: 'Center',
};

// Player lifecycle status
export type PlayerStatus =
  | 'active' // On a roster and playing
  | 'retired'; // Career over, removed from rosters at season end

// Coarse classification of current ability, used only at generation time
export type TalentTier =
  | 'superstar'
  | 'allStar'
  | 'starter'
  | 'rotation'
  | 'bench';

export const TALENT_TIERS: readonly TalentTier[] = [
  'superstar',
  'allStar',
  'starter',
  'rotation',
  'bench',
];

// Ceiling classification, lowest to highest
export type PotentialTier = 'bronze' | 'silver' | 'gold' | 'elite';

export const POTENTIAL_TIERS: readonly PotentialTier[] = [
  'bronze',
  'silver',
  'gold',
  'elite',
];

// Rare specialization profiles
export type Archetype =
  | 'eliteShooter'
  | 'defensiveSpecialist'
  | 'playmaker'
  | 'athleticFinisher'
  | 'stretchBig'
  | 'lockdownDefender'
  | 'floorGeneral'
  | 'energizer';

export type RetirementReason = 'age' | 'performance' | 'injury' | 'voluntary';

export const RETIREMENT_REASON_DESCRIPTIONS: Record<RetirementReason, string> = {
  age: 'Reached retirement age',
  performance: 'Performance decline',
  injury: 'Injury concerns',
  voluntary: 'Voluntary retirement',
};

// Hidden per-skill ceilings
export interface PlayerPotential {
  tier: PotentialTier;
  maxSkills: SkillRatings;
  overallPotential: number;
  isHidden: boolean; // Hidden until scouted
}

// Per-player parameters for development-by-age and degradation-by-age
export interface AgingCurve {
  peakAge: number;
  declineStartAge: number;
  retirementAge: number;
  peakMultiplier: number;
  declineRate: number;
}

export interface DevelopmentMilestone {
  name: string;
  description: string;
  experienceRequired: number;
  achieved: boolean;
  achievedAtAge?: number;
}

// Experience ledger
export interface DevelopmentLedger {
  skillExperience: SkillRatings; // Unspent experience per skill
  skillUpgrades: SkillRatings; // Points bought per skill, sets the next cost
  totalExperience: number; // Lifetime experience earned
  developmentRate: number; // 0.1 - 3.0
  agingCurve: AgingCurve;
  milestones: DevelopmentMilestone[];
}

// Player entity (single composed record: identity, skills, potential, ledger)
export interface PlayerRecord {
  id: string;
  name: string;
  age: number;
  nationality: string;
  role: PlayerRole;
  status: PlayerStatus;
  skills: SkillRatings;
  potential: PlayerPotential;
  development: DevelopmentLedger;
  talentTier: TalentTier;
  archetype: Archetype | null;
  retirementReason: RetirementReason | null;
}

// Team roster, ordered
export interface Roster {
  id: string;
  name: string;
  players: PlayerRecord[];
}

// Per-player counting stats for one game
export interface BoxScoreEntry {
  playerId: string;
  teamId: string;
  points: number;
  rebounds: number;
  offensiveRebounds: number;
  defensiveRebounds: number;
  fieldGoalsMade: number;
  fieldGoalsAttempted: number;
  insideMade: number;
  insideAttempted: number;
  midrangeMade: number;
  midrangeAttempted: number;
  threesMade: number;
  threesAttempted: number;
  // Not produced by the possession model; kept for persistence consumers
  assists: number;
  turnovers: number;
  steals: number;
  blocks: number;
}

// Box score keyed by player id
export type BoxScore = Record<string, BoxScoreEntry>;

export interface GameResult {
  homeTeamId: string;
  awayTeamId: string;
  homeScore: number;
  awayScore: number;
  possessions: number;
  boxScore: BoxScore;
}

// Statline consumed by the development engine
export interface GameStats {
  points: number;
  rebounds: number;
  assists: number;
  fieldGoalsMade: number;
  fieldGoalsAttempted: number;
  threePointersMade: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampSkill(value: number): number {
  return clamp(Math.round(value), MIN_SKILL, MAX_SKILL);
}

// Build a full skill record from a per-skill function
export function createSkillRatings(
  valueFor: (skill: Skill) => number,
): SkillRatings {
  return {
    shooting: valueFor('shooting'),
    rebounding: valueFor('rebounding'),
    passing: valueFor('passing'),
    ballHandling: valueFor('ballHandling'),
    perimeterDefense: valueFor('perimeterDefense'),
    postDefense: valueFor('postDefense'),
    insideShooting: valueFor('insideShooting'),
  };
}

// Unrounded mean of the seven skills
export function calculateOverallSkill(skills: SkillRatings): number {
  let total = 0;
  for (const skill of SKILLS) {
    total += skills[skill];
  }
  return total / SKILLS.length;
}

export function calculateOverall(player: PlayerRecord): number {
  return Math.round(calculateOverallSkill(player.skills));
}

export function createEmptyBoxScoreEntry(
  playerId: string,
  teamId: string,
): BoxScoreEntry {
  return {
    playerId,
    teamId,
    points: 0,
    rebounds: 0,
    offensiveRebounds: 0,
    defensiveRebounds: 0,
    fieldGoalsMade: 0,
    fieldGoalsAttempted: 0,
    insideMade: 0,
    insideAttempted: 0,
    midrangeMade: 0,
    midrangeAttempted: 0,
    threesMade: 0,
    threesAttempted: 0,
    assists: 0,
    turnovers: 0,
    steals: 0,
    blocks: 0,
  };
}

// Convert a box score line into the statline used for experience
export function toGameStats(entry: BoxScoreEntry): GameStats {
  return {
    points: entry.points,
    rebounds: entry.rebounds,
    assists: entry.assists,
    fieldGoalsMade: entry.fieldGoalsMade,
    fieldGoalsAttempted: entry.fieldGoalsAttempted,
    threePointersMade: entry.threesMade,
  };
}
