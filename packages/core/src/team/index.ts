// ============================================================================
// HARDWOOD - Team System
// ============================================================================
// Roster queries, validation and vacancy filling

import type { PlayerRecord, PlayerRole, Roster } from '../types';
import { calculateOverallSkill, PLAYER_ROLES } from '../types';
import { InvalidRosterError, UnknownPlayerError } from '../errors';
import type { Rng } from '../random';
import { defaultRng } from '../random';
import { DEFAULT_ROSTER_SIZE, generatePlayer, NameRegistry } from '../player';

export function getActivePlayers(roster: Roster): PlayerRecord[] {
  return roster.players.filter((p) => p.status === 'active');
}

export function findPlayer(
  rosters: readonly Roster[],
  playerId: string,
): { roster: Roster; player: PlayerRecord } {
  for (const roster of rosters) {
    const player = roster.players.find((p) => p.id === playerId);
    if (player) return { roster, player };
  }
  throw new UnknownPlayerError(playerId);
}

export function countRoles(roster: Roster): Record<PlayerRole, number> {
  const counts: Record<PlayerRole, number> = { PG: 0, SG: 0, SF: 0, PF: 0, C: 0 };
  for (const player of getActivePlayers(roster)) {
    counts[player.role]++;
  }
  return counts;
}

export function calculateTeamOverall(roster: Roster): number {
  const active = getActivePlayers(roster);
  if (active.length === 0) return 0;
  const total = active.reduce((sum, p) => sum + calculateOverallSkill(p.skills), 0);
  return Math.round(total / active.length);
}

export interface RosterRequirements {
  minPlayers: number;
  requiredRoles: readonly PlayerRole[];
}

export const DEFAULT_ROSTER_REQUIREMENTS: RosterRequirements = {
  minPlayers: 5,
  requiredRoles: PLAYER_ROLES,
};

// Throws when the roster cannot field a complete lineup
export function validateRoster(
  roster: Roster,
  requirements: RosterRequirements = DEFAULT_ROSTER_REQUIREMENTS,
): void {
  const active = getActivePlayers(roster);
  if (active.length < requirements.minPlayers) {
    throw new InvalidRosterError(
      roster.id,
      `${active.length} active players, need ${requirements.minPlayers}`,
    );
  }

  const counts = countRoles(roster);
  const missing = requirements.requiredRoles.filter((role) => counts[role] === 0);
  if (missing.length > 0) {
    throw new InvalidRosterError(roster.id, `missing role ${missing.join(', ')}`);
  }

  const ids = new Set<string>();
  for (const player of roster.players) {
    if (ids.has(player.id)) {
      throw new InvalidRosterError(roster.id, `duplicate player ${player.id}`);
    }
    ids.add(player.id);
  }
}

// Removes retired players and returns them
export function removeRetiredPlayers(roster: Roster): PlayerRecord[] {
  const retired = roster.players.filter((p) => p.status === 'retired');
  roster.players = roster.players.filter((p) => p.status !== 'retired');
  return retired;
}

// Role counts a balanced roster of this size aims for
export function targetRoleCounts(size: number): Record<PlayerRole, number> {
  const base = Math.floor(size / PLAYER_ROLES.length);
  const remainder = size % PLAYER_ROLES.length;
  const targets: Record<PlayerRole, number> = { PG: 0, SG: 0, SF: 0, PF: 0, C: 0 };
  PLAYER_ROLES.forEach((role, index) => {
    targets[role] = base + (index < remainder ? 1 : 0);
  });
  return targets;
}

// The role furthest below its target, earliest role first on ties
export function mostNeededRole(roster: Roster, size: number): PlayerRole {
  const counts = countRoles(roster);
  const targets = targetRoleCounts(size);
  let best: PlayerRole = PLAYER_ROLES[0];
  let bestGap = -Infinity;
  for (const role of PLAYER_ROLES) {
    const gap = targets[role] - counts[role];
    if (gap > bestGap) {
      best = role;
      bestGap = gap;
    }
  }
  return best;
}

export interface FillVacanciesOptions {
  targetSize?: number;
  /** Rookies available to sign, best first; signed players are removed */
  draftPool?: PlayerRecord[];
  /** Veterans available to sign; signed players are removed */
  freeAgents?: PlayerRecord[];
  /** Defaults to a registry seeded with the roster's current names */
  names?: NameRegistry;
  rng?: Rng;
  createId?: () => string;
}

function takeFromPool(
  pool: PlayerRecord[] | undefined,
  role: PlayerRole,
): PlayerRecord | undefined {
  if (!pool) return undefined;
  const index = pool.findIndex((p) => p.role === role && p.status === 'active');
  if (index === -1) return undefined;
  return pool.splice(index, 1)[0];
}

/**
 * Sign players until the roster reaches its target size, always filling the
 * most under-staffed role. Draft pool first, then free agents, then a newly
 * generated rookie.
 */
export function fillRosterVacancies(
  roster: Roster,
  options: FillVacanciesOptions = {},
): PlayerRecord[] {
  const targetSize = options.targetSize ?? DEFAULT_ROSTER_SIZE;
  const rng = options.rng ?? defaultRng;
  const names = options.names ?? new NameRegistry(roster.players.map((p) => p.name));
  const signed: PlayerRecord[] = [];

  while (getActivePlayers(roster).length < targetSize) {
    const role = mostNeededRole(roster, targetSize);
    const player =
      takeFromPool(options.draftPool, role) ??
      takeFromPool(options.freeAgents, role) ??
      generatePlayer({
        role,
        isRookie: true,
        names,
        rng,
        createId: options.createId,
      });

    roster.players.push(player);
    signed.push(player);
  }

  return signed;
}
