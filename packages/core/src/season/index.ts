// ============================================================================
// HARDWOOD - Season System
// ============================================================================
// Thin orchestration: simulate a matchday, award experience, and at the season
// boundary spend experience, age players, retire and refill rosters.
// Scheduling is supplied by the caller as fixtures.

import type { GameResult, PlayerRecord, RetirementReason, Roster } from '../types';
import { calculateOverall, toGameStats } from '../types';
import type { Rng } from '../random';
import { createRng, defaultRng } from '../random';
import type { EngineLogger } from '../log';
import { consoleLogger } from '../log';
import type { Fixture, GameOptions } from '../match';
import { findRoster, simulateGame } from '../match';
import {
  awardGameExperience,
  processSkillUpgrades,
  updateDevelopmentRate,
} from '../development';
import { processTeamAging } from '../aging';
import type { CoachProfile } from '../coaching';
import { calculateCoachDevelopmentBonus } from '../coaching';
import {
  DEFAULT_ROSTER_SIZE,
  generateDraftClass,
  generateFreeAgentPool,
  NameRegistry,
} from '../player';
import {
  fillRosterVacancies,
  getActivePlayers,
  removeRetiredPlayers,
  validateRoster,
} from '../team';

export interface TeamRecord {
  teamId: string;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  pointsAgainst: number;
}

export interface LeagueState {
  season: number;
  matchday: number;
  rosters: Roster[];
  records: Record<string, TeamRecord>;
  coaches: Record<string, CoachProfile>;
  retiredPlayers: PlayerRecord[];
}

// Caller-owned collaborators; nothing here is global
export interface SeasonServices {
  rng?: Rng;
  logger?: EngineLogger;
  names?: NameRegistry;
  createId?: () => string;
  gameOptions?: Omit<GameOptions, 'rng'>;
}

export interface MatchdayReport {
  season: number;
  matchday: number;
  results: GameResult[];
  experienceAwarded: number;
}

export interface RetirementRecord {
  playerId: string;
  name: string;
  teamId: string;
  age: number;
  overall: number;
  reason: RetirementReason;
}

export interface SeasonSummary {
  season: number;
  matchdaysPlayed: number;
  records: TeamRecord[];
  skillUpgrades: number;
  retirements: RetirementRecord[];
  signings: number;
}

export interface SeasonEndOptions {
  targetRosterSize?: number;
  /** Extra rookies generated beyond the number of open spots */
  draftSurplus?: number;
  freeAgentPoolSize?: number;
}

// ============================================================================
// Records
// ============================================================================

export function createTeamRecord(teamId: string): TeamRecord {
  return { teamId, wins: 0, losses: 0, ties: 0, pointsFor: 0, pointsAgainst: 0 };
}

// Every roster must be able to field a full lineup
export function createLeagueState(
  rosters: Roster[],
  coaches: Record<string, CoachProfile> = {},
): LeagueState {
  const records: Record<string, TeamRecord> = {};
  for (const roster of rosters) {
    validateRoster(roster);
    records[roster.id] = createTeamRecord(roster.id);
  }

  return { season: 1, matchday: 0, rosters, records, coaches, retiredPlayers: [] };
}

// Ties count in points and the ties column but not in wins or losses
export function applyGameResult(
  records: Record<string, TeamRecord>,
  result: GameResult,
): Record<string, TeamRecord> {
  const home = { ...(records[result.homeTeamId] ?? createTeamRecord(result.homeTeamId)) };
  const away = { ...(records[result.awayTeamId] ?? createTeamRecord(result.awayTeamId)) };

  home.pointsFor += result.homeScore;
  home.pointsAgainst += result.awayScore;
  away.pointsFor += result.awayScore;
  away.pointsAgainst += result.homeScore;

  if (result.homeScore > result.awayScore) {
    home.wins += 1;
    away.losses += 1;
  } else if (result.awayScore > result.homeScore) {
    away.wins += 1;
    home.losses += 1;
  } else {
    home.ties += 1;
    away.ties += 1;
  }

  return { ...records, [home.teamId]: home, [away.teamId]: away };
}

// Wins, then point differential
export function sortRecords(records: Record<string, TeamRecord>): TeamRecord[] {
  return Object.values(records).sort((a, b) => {
    if (b.wins !== a.wins) return b.wins - a.wins;
    return b.pointsFor - b.pointsAgainst - (a.pointsFor - a.pointsAgainst);
  });
}

function coachBonusFor(state: LeagueState, teamId: string): number {
  return calculateCoachDevelopmentBonus(state.coaches[teamId] ?? null);
}

// Each game gets its own source, forked from the orchestrator's
function forkRng(rng: Rng): Rng {
  return createRng(Math.floor(rng() * 0x100000000));
}

// ============================================================================
// Matchday
// ============================================================================

/**
 * Simulate every fixture of a matchday, then award experience for it.
 * All games are played before any player's ledger changes.
 */
export function playMatchday(
  state: LeagueState,
  fixtures: readonly Fixture[],
  services: SeasonServices = {},
): MatchdayReport {
  const rng = services.rng ?? defaultRng;
  const logger = services.logger ?? consoleLogger;

  const scheduled = new Set<string>();
  const pairings = fixtures.map((fixture) => {
    for (const teamId of [fixture.homeTeamId, fixture.awayTeamId]) {
      if (scheduled.has(teamId)) {
        throw new Error(`Team ${teamId} is scheduled twice on one matchday`);
      }
      scheduled.add(teamId);
    }
    return {
      home: findRoster(state.rosters, fixture.homeTeamId),
      away: findRoster(state.rosters, fixture.awayTeamId),
    };
  });

  const results = pairings.map(({ home, away }) =>
    simulateGame(home, away, { ...services.gameOptions, rng: forkRng(rng) }),
  );

  let experienceAwarded = 0;
  for (const [index, result] of results.entries()) {
    const { home, away } = pairings[index];
    for (const roster of [home, away]) {
      const bonus = coachBonusFor(state, roster.id);
      for (const player of getActivePlayers(roster)) {
        const entry = result.boxScore[player.id];
        if (!entry) continue;
        const awarded = awardGameExperience(player, toGameStats(entry), bonus);
        experienceAwarded += Object.values(awarded).reduce((sum, xp) => sum + xp, 0);
      }
    }
    state.records = applyGameResult(state.records, result);
  }

  state.matchday += 1;
  logger.info('season.matchday', {
    season: state.season,
    matchday: state.matchday,
    games: results.length,
    experienceAwarded,
  });

  return { season: state.season, matchday: state.matchday, results, experienceAwarded };
}

// ============================================================================
// Season end
// ============================================================================

/**
 * Close out a season: spend experience, reset development rates, age every
 * player, retire, refill rosters by role and start the next season.
 */
export function completeSeason(
  state: LeagueState,
  services: SeasonServices = {},
  options: SeasonEndOptions = {},
): SeasonSummary {
  const rng = services.rng ?? defaultRng;
  const logger = services.logger ?? consoleLogger;
  const names =
    services.names ??
    new NameRegistry(state.rosters.flatMap((r) => r.players.map((p) => p.name)));
  const targetSize = options.targetRosterSize ?? DEFAULT_ROSTER_SIZE;

  let skillUpgrades = 0;
  for (const roster of state.rosters) {
    const bonus = coachBonusFor(state, roster.id);
    for (const player of getActivePlayers(roster)) {
      skillUpgrades += processSkillUpgrades(player).length;
      updateDevelopmentRate(player, bonus);
    }
  }

  const retirements: RetirementRecord[] = [];
  for (const roster of state.rosters) {
    const results = processTeamAging(getActivePlayers(roster), rng);
    for (const result of results) {
      if (!result.shouldRetire || !result.retirementReason) continue;
      const player = roster.players.find((p) => p.id === result.playerId);
      retirements.push({
        playerId: result.playerId,
        name: result.playerName,
        teamId: roster.id,
        age: result.newAge,
        overall: player ? calculateOverall(player) : 0,
        reason: result.retirementReason,
      });
    }
    state.retiredPlayers.push(...removeRetiredPlayers(roster));
  }

  const openSpots = state.rosters.reduce(
    (sum, roster) => sum + Math.max(0, targetSize - getActivePlayers(roster).length),
    0,
  );
  const batch = { names, rng, createId: services.createId };
  const draftPool = generateDraftClass(openSpots + (options.draftSurplus ?? 5), batch);
  const freeAgents = generateFreeAgentPool(options.freeAgentPoolSize ?? 10, batch);

  let signings = 0;
  for (const roster of state.rosters) {
    signings += fillRosterVacancies(roster, {
      targetSize,
      draftPool,
      freeAgents,
      ...batch,
    }).length;
  }

  const summary: SeasonSummary = {
    season: state.season,
    matchdaysPlayed: state.matchday,
    records: sortRecords(state.records),
    skillUpgrades,
    retirements,
    signings,
  };

  logger.info('season.retirements', {
    season: state.season,
    count: retirements.length,
    byReason: countReasons(retirements),
  });
  logger.info('season.complete', {
    season: state.season,
    skillUpgrades,
    signings,
    leader: summary.records[0]?.teamId ?? null,
  });

  state.season += 1;
  state.matchday = 0;
  const fresh: Record<string, TeamRecord> = {};
  for (const roster of state.rosters) fresh[roster.id] = createTeamRecord(roster.id);
  state.records = fresh;

  return summary;
}

function countReasons(
  retirements: readonly RetirementRecord[],
): Partial<Record<RetirementReason, number>> {
  const counts: Partial<Record<RetirementReason, number>> = {};
  for (const r of retirements) counts[r.reason] = (counts[r.reason] ?? 0) + 1;
  return counts;
}

// ============================================================================
// Multi-season
// ============================================================================

export type ScheduleProvider = (rosters: readonly Roster[], season: number) => Fixture[][];

/**
 * Play several full seasons. The schedule provider returns the matchdays of
 * each season, each matchday a list of fixtures.
 */
export function runCareer(
  state: LeagueState,
  schedule: ScheduleProvider,
  seasons: number,
  services: SeasonServices = {},
  options: SeasonEndOptions = {},
): SeasonSummary[] {
  const summaries: SeasonSummary[] = [];
  for (let i = 0; i < seasons; i++) {
    for (const matchday of schedule(state.rosters, state.season)) {
      playMatchday(state, matchday, services);
    }
    summaries.push(completeSeason(state, services, options));
  }
  return summaries;
}
