// ============================================================================
// HARDWOOD - Player System
// ============================================================================
// Player creation for roster builds, draft classes and free-agent pools

import { nanoid } from 'nanoid';
import type {
  PlayerRecord,
  PlayerRole,
  Roster,
  SkillRatings,
  TalentTier,
} from '../types';
import {
  calculateOverall,
  calculateOverallSkill,
  clamp,
  createSkillRatings,
  PLAYER_ROLES,
  ROLE_NAMES,
} from '../types';
import type { Rng } from '../random';
import { defaultRng, randomFromArray, randomInt } from '../random';
import { NAME_POOL } from '../data';
import type { TalentConfig } from '../talent';
import {
  adjustPotentialForRole,
  applyArchetype,
  ARCHETYPE_NAMES,
  DEFAULT_TALENT_CONFIG,
  drawTalentTier,
  generateDraftClassDistribution,
  generatePositionAttributeRanges,
  generatePotentialTier,
  generateRareArchetype,
  generateRookiePotential,
  generateTalentTier,
  liftCeilingsToSkills,
  potentialFromTier,
  sampleAttribute,
} from '../talent';
import { createAgingCurve } from '../aging';
import { createDefaultMilestones } from '../development';

export * from './serialization';

// ============================================================================
// Names
// ============================================================================

const MAX_NAME_ATTEMPTS = 50;

/**
 * Tracks names handed out in one generation batch so no two players share
 * a name. Pass the same registry to every call that belongs to the batch.
 */
export class NameRegistry {
  private readonly used = new Set<string>();

  constructor(existing: Iterable<string> = []) {
    for (const name of existing) this.used.add(name);
  }

  has(name: string): boolean {
    return this.used.has(name);
  }

  get size(): number {
    return this.used.size;
  }

  next(rng: Rng = defaultRng): string {
    let name = '';
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      name = `${randomFromArray(rng, NAME_POOL.firstNames)} ${randomFromArray(rng, NAME_POOL.lastNames)}`;
      if (!this.used.has(name)) {
        this.used.add(name);
        return name;
      }
    }

    // Pool exhausted for this draw; disambiguate with a suffix
    let suffix = 2;
    while (this.used.has(`${name} ${suffix}`)) suffix++;
    const unique = `${name} ${suffix}`;
    this.used.add(unique);
    return unique;
  }
}

// ============================================================================
// Generation
// ============================================================================

export interface GeneratePlayerOptions {
  role: PlayerRole;
  age?: number;
  isRookie?: boolean;
  /** Skip the talent draw, e.g. when a draft pick's odds were already applied */
  talentTier?: TalentTier;
  names?: NameRegistry;
  rng?: Rng;
  createId?: () => string;
  config?: TalentConfig;
}

export const ROOKIE_AGE_RANGE = { min: 19, max: 22 } as const;
export const VETERAN_AGE_RANGE = { min: 21, max: 34 } as const;
export const FREE_AGENT_AGE_RANGE = { min: 23, max: 33 } as const;

function drawSkills(role: PlayerRole, tier: TalentTier, rng: Rng): SkillRatings {
  const ranges = generatePositionAttributeRanges(role, tier);
  return createSkillRatings((skill) => sampleAttribute(ranges[skill], rng));
}

export function generatePlayer(options: GeneratePlayerOptions): PlayerRecord {
  const {
    role,
    isRookie = false,
    names = new NameRegistry(),
    rng = defaultRng,
    createId = nanoid,
    config = DEFAULT_TALENT_CONFIG,
  } = options;

  const ageRange = isRookie ? ROOKIE_AGE_RANGE : VETERAN_AGE_RANGE;
  const age = options.age ?? randomInt(rng, ageRange.min, ageRange.max);
  const talentTier = options.talentTier ?? generateTalentTier(isRookie, rng, config);

  let skills = drawSkills(role, talentTier, rng);
  const potentialTier = generatePotentialTier(talentTier, age, isRookie, rng, config);
  let potential = adjustPotentialForRole(potentialFromTier(potentialTier, rng), role);

  const archetype = generateRareArchetype(role, rng, config);
  if (archetype) {
    const shifted = applyArchetype(skills, potential.maxSkills, archetype);
    skills = shifted.skills;
    potential = { ...potential, maxSkills: shifted.maxSkills };
  }
  potential = liftCeilingsToSkills(potential, skills);

  const developmentRate = isRookie
    ? generateRookiePotential(talentTier, potentialTier, rng).developmentRate
    : 1.0;

  return {
    id: createId(),
    name: names.next(rng),
    age,
    nationality: randomFromArray(rng, NAME_POOL.nationalities),
    role,
    status: 'active',
    skills,
    potential,
    development: {
      skillExperience: createSkillRatings(() => 0),
      skillUpgrades: createSkillRatings(() => 0),
      totalExperience: 0,
      developmentRate: clamp(developmentRate, 0.1, 3.0),
      agingCurve: createAgingCurve(role, age, calculateOverallSkill(skills)),
      milestones: createDefaultMilestones(),
    },
    talentTier,
    archetype,
    retirementReason: null,
  };
}

export interface GenerateBatchOptions {
  names?: NameRegistry;
  rng?: Rng;
  createId?: () => string;
  config?: TalentConfig;
}

export const DEFAULT_ROSTER_SIZE = 15;

// Roles cycle PG..C, so a 15-man roster carries three of each
export function generateRoster(
  team: { id: string; name: string; size?: number },
  options: GenerateBatchOptions = {},
): Roster {
  const names = options.names ?? new NameRegistry();
  const size = team.size ?? DEFAULT_ROSTER_SIZE;
  const players: PlayerRecord[] = [];

  for (let i = 0; i < size; i++) {
    players.push(
      generatePlayer({
        ...options,
        role: PLAYER_ROLES[i % PLAYER_ROLES.length],
        names,
      }),
    );
  }

  return { id: team.id, name: team.name, players };
}

// Best pick first; early picks carry better talent odds
export function generateDraftClass(
  size: number,
  options: GenerateBatchOptions = {},
): PlayerRecord[] {
  const rng = options.rng ?? defaultRng;
  const names = options.names ?? new NameRegistry();
  const config = options.config ?? DEFAULT_TALENT_CONFIG;

  return generateDraftClassDistribution(size, config).map((odds) =>
    generatePlayer({
      ...options,
      role: randomFromArray(rng, PLAYER_ROLES),
      isRookie: true,
      talentTier: drawTalentTier(odds, rng),
      names,
      rng,
    }),
  );
}

export function generateFreeAgentPool(
  size: number,
  options: GenerateBatchOptions = {},
): PlayerRecord[] {
  const rng = options.rng ?? defaultRng;
  const names = options.names ?? new NameRegistry();
  const players: PlayerRecord[] = [];

  for (let i = 0; i < size; i++) {
    players.push(
      generatePlayer({
        ...options,
        role: randomFromArray(rng, PLAYER_ROLES),
        age: randomInt(rng, FREE_AGENT_AGE_RANGE.min, FREE_AGENT_AGE_RANGE.max),
        names,
        rng,
      }),
    );
  }

  return players;
}

// One-line label, e.g. "Marcus Whitfield (Point Guard, 24), overall 71, Floor General"
export function describePlayer(player: PlayerRecord): string {
  const label = `${player.name} (${ROLE_NAMES[player.role]}, ${player.age}), overall ${calculateOverall(player)}`;
  return player.archetype ? `${label}, ${ARCHETYPE_NAMES[player.archetype]}` : label;
}
