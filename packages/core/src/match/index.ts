// ============================================================================
// HARDWOOD - Game Simulation Engine
// ============================================================================
// Possession-by-possession simulation producing a final score and a dense box
// score. Player skills are read, never written.

import type {
  BoxScore,
  BoxScoreEntry,
  GameResult,
  GameStats,
  PlayerRecord,
  Roster,
} from '../types';
import { createEmptyBoxScoreEntry, toGameStats } from '../types';
import type { Rng } from '../random';
import { defaultRng, randomBelow, randomFromArray, randomInt } from '../random';
import {
  ConfigurationError,
  InvalidRosterError,
  UnknownPlayerError,
  UnknownTeamError,
} from '../errors';
import {
  DEFAULT_MAX_POSSESSIONS,
  DEFAULT_MIN_POSSESSIONS,
  INSIDE_BASE_CHANCE,
  INSIDE_SKILL_WEIGHT,
  MAX_POSSESSIONS_PER_GAME,
  MIDRANGE_BASE_CHANCE,
  MIDRANGE_SKILL_WEIGHT,
  QUALITY_RANGE,
  SHOT_POINTS,
  THREE_BASE_CHANCE,
  THREE_SKILL_WEIGHT,
} from './constants';

export * from './constants';

export type ShotType = 'inside' | 'midrange' | 'three';
export const SHOT_TYPES: readonly ShotType[] = ['inside', 'midrange', 'three'];

export type Side = 'home' | 'away';

export interface PossessionRange {
  min: number;
  max: number;
}

export interface GameOptions {
  rng?: Rng;
  possessions?: PossessionRange;
  /** Drill mode: every shot is this type */
  forcedShotType?: ShotType;
  /** Drill mode: this side starts with and never gives up the ball */
  lockPossession?: Side;
}

export interface ReboundEvent {
  playerId: string;
  side: Side;
  offensive: boolean;
}

export interface PossessionEvent {
  number: number;
  side: Side;
  /** Null for an empty trip by a team with no active players */
  playerId: string | null;
  shotType: ShotType | null;
  quality: number;
  made: boolean;
  points: number;
  rebound: ReboundEvent | null;
  homeScore: number;
  awayScore: number;
}

// Game state while possessions are being played
export interface GameState {
  possession: Side;
  homeScore: number;
  awayScore: number;
  possessionsPlayed: number;
  totalPossessions: number;
  boxScore: BoxScore;
}

interface GameContext {
  homeActive: PlayerRecord[];
  awayActive: PlayerRecord[];
  rng: Rng;
  forcedShotType?: ShotType;
  lockPossession?: Side;
}

// ============================================================================
// Shot model
// ============================================================================

export function shotSuccessThreshold(shotType: ShotType, player: PlayerRecord): number {
  switch (shotType) {
    case 'inside':
      return (
        QUALITY_RANGE -
        (INSIDE_BASE_CHANCE + INSIDE_SKILL_WEIGHT * player.skills.insideShooting)
      );
    case 'midrange':
      return (
        QUALITY_RANGE -
        (MIDRANGE_BASE_CHANCE + MIDRANGE_SKILL_WEIGHT * player.skills.shooting)
      );
    case 'three':
      return (
        QUALITY_RANGE - (THREE_BASE_CHANCE + THREE_SKILL_WEIGHT * player.skills.shooting)
      );
  }
}

export function isShotMade(
  shotType: ShotType,
  player: PlayerRecord,
  quality: number,
): boolean {
  return quality >= shotSuccessThreshold(shotType, player);
}

export function isReboundSecured(player: PlayerRecord, quality: number): boolean {
  return quality >= QUALITY_RANGE - player.skills.rebounding;
}

// ============================================================================
// Setup
// ============================================================================

export function resolvePossessionCount(
  range: PossessionRange | undefined,
  rng: Rng,
): number {
  const min = range?.min ?? DEFAULT_MIN_POSSESSIONS;
  const max = range?.max ?? DEFAULT_MAX_POSSESSIONS;

  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0) {
    throw new ConfigurationError(`Invalid possession range: ${min}-${max}`);
  }
  if (min > max) {
    throw new ConfigurationError(`Possession range minimum ${min} exceeds maximum ${max}`);
  }
  if (max > MAX_POSSESSIONS_PER_GAME) {
    throw new ConfigurationError(
      `Possession range maximum ${max} exceeds the per-game limit of ${MAX_POSSESSIONS_PER_GAME}`,
    );
  }
  return randomInt(rng, min, max);
}

function activePlayers(roster: Roster): PlayerRecord[] {
  return roster.players.filter((p) => p.status === 'active');
}

function assertDistinctRosters(home: Roster, away: Roster): void {
  const homeIds = new Set(home.players.map((p) => p.id));
  const shared = away.players.find((p) => homeIds.has(p.id));
  if (shared) {
    throw new InvalidRosterError(
      away.id,
      `player ${shared.id} is also on ${home.id}`,
    );
  }
}

function createBoxScore(home: Roster, away: Roster): BoxScore {
  const boxScore: BoxScore = {};
  for (const player of home.players) {
    boxScore[player.id] = createEmptyBoxScoreEntry(player.id, home.id);
  }
  for (const player of away.players) {
    boxScore[player.id] = createEmptyBoxScoreEntry(player.id, away.id);
  }
  return boxScore;
}

function entryFor(state: GameState, player: PlayerRecord): BoxScoreEntry {
  const entry = state.boxScore[player.id];
  if (!entry) throw new UnknownPlayerError(player.id);
  return entry;
}

function other(side: Side): Side {
  return side === 'home' ? 'away' : 'home';
}

function endPossession(state: GameState, context: GameContext): void {
  if (!context.lockPossession) {
    state.possession = other(state.possession);
  }
}

function addPoints(state: GameState, side: Side, points: number): void {
  if (side === 'home') state.homeScore += points;
  else state.awayScore += points;
}

// ============================================================================
// Possession loop
// ============================================================================

function simulatePossession(state: GameState, context: GameContext): PossessionEvent {
  const side = state.possession;
  const offense = side === 'home' ? context.homeActive : context.awayActive;
  const defense = side === 'home' ? context.awayActive : context.homeActive;
  state.possessionsPlayed++;

  const event: PossessionEvent = {
    number: state.possessionsPlayed,
    side,
    playerId: null,
    shotType: null,
    quality: 0,
    made: false,
    points: 0,
    rebound: null,
    homeScore: state.homeScore,
    awayScore: state.awayScore,
  };

  // No one to shoot: the ball goes back
  if (offense.length === 0) {
    endPossession(state, context);
    return event;
  }

  const shooter = randomFromArray(context.rng, offense);
  const shotType =
    context.forcedShotType ?? SHOT_TYPES[randomBelow(context.rng, SHOT_TYPES.length)];
  const quality = randomBelow(context.rng, QUALITY_RANGE);
  const made = isShotMade(shotType, shooter, quality);

  const entry = entryFor(state, shooter);
  entry.fieldGoalsAttempted++;
  if (shotType === 'inside') entry.insideAttempted++;
  else if (shotType === 'midrange') entry.midrangeAttempted++;
  else entry.threesAttempted++;

  event.playerId = shooter.id;
  event.shotType = shotType;
  event.quality = quality;
  event.made = made;

  if (made) {
    const points = SHOT_POINTS[shotType];
    entry.points += points;
    entry.fieldGoalsMade++;
    if (shotType === 'inside') entry.insideMade++;
    else if (shotType === 'midrange') entry.midrangeMade++;
    else entry.threesMade++;

    addPoints(state, side, points);
    event.points = points;
    endPossession(state, context);
  } else {
    // Every miss is credited to exactly one rebounder when anyone can take it
    const chaser = randomFromArray(context.rng, offense);
    if (isReboundSecured(chaser, randomBelow(context.rng, QUALITY_RANGE))) {
      const chaserEntry = entryFor(state, chaser);
      chaserEntry.rebounds++;
      chaserEntry.offensiveRebounds++;
      event.rebound = { playerId: chaser.id, side, offensive: true };
    } else {
      if (defense.length > 0) {
        const defender = randomFromArray(context.rng, defense);
        const defenderEntry = entryFor(state, defender);
        defenderEntry.rebounds++;
        defenderEntry.defensiveRebounds++;
        event.rebound = { playerId: defender.id, side: other(side), offensive: false };
      }
      endPossession(state, context);
    }
  }

  event.homeScore = state.homeScore;
  event.awayScore = state.awayScore;
  return event;
}

export function createGameState(
  home: Roster,
  away: Roster,
  options: GameOptions = {},
): GameState {
  const rng = options.rng ?? defaultRng;
  const totalPossessions = resolvePossessionCount(options.possessions, rng);
  const possession: Side =
    options.lockPossession ?? (rng() < 0.5 ? 'home' : 'away');

  return {
    possession,
    homeScore: 0,
    awayScore: 0,
    possessionsPlayed: 0,
    totalPossessions,
    boxScore: createBoxScore(home, away),
  };
}

function toResult(home: Roster, away: Roster, state: GameState): GameResult {
  return {
    homeTeamId: home.id,
    awayTeamId: away.id,
    homeScore: state.homeScore,
    awayScore: state.awayScore,
    possessions: state.possessionsPlayed,
    boxScore: state.boxScore,
  };
}

/**
 * Play-by-play simulation. Yields after every possession and returns the
 * final result when the possession count is exhausted.
 */
export function* simulateGameLive(
  home: Roster,
  away: Roster,
  options: GameOptions = {},
): Generator<PossessionEvent, GameResult, void> {
  assertDistinctRosters(home, away);

  const rng = options.rng ?? defaultRng;
  const state = createGameState(home, away, { ...options, rng });
  const context: GameContext = {
    homeActive: activePlayers(home),
    awayActive: activePlayers(away),
    rng,
    forcedShotType: options.forcedShotType,
    lockPossession: options.lockPossession,
  };

  while (state.possessionsPlayed < state.totalPossessions) {
    yield simulatePossession(state, context);
  }

  return toResult(home, away, state);
}

// Instant, complete simulation
export function simulateGame(
  home: Roster,
  away: Roster,
  options: GameOptions = {},
): GameResult {
  const live = simulateGameLive(home, away, options);
  let step = live.next();
  while (!step.done) {
    step = live.next();
  }
  return step.value;
}

// ============================================================================
// Fixtures and results
// ============================================================================

export interface Fixture {
  id: string;
  homeTeamId: string;
  awayTeamId: string;
}

export function findRoster(rosters: readonly Roster[], teamId: string): Roster {
  const roster = rosters.find((r) => r.id === teamId);
  if (!roster) throw new UnknownTeamError(teamId);
  return roster;
}

// Look up both teams, then simulate
export function simulateFixture(
  fixture: Fixture,
  rosters: readonly Roster[],
  options: GameOptions = {},
): GameResult {
  const home = findRoster(rosters, fixture.homeTeamId);
  const away = findRoster(rosters, fixture.awayTeamId);
  return simulateGame(home, away, options);
}

export function sumTeamPoints(boxScore: BoxScore, teamId: string): number {
  let total = 0;
  for (const entry of Object.values(boxScore)) {
    if (entry.teamId === teamId) total += entry.points;
  }
  return total;
}

export function boxScoreToGameStats(boxScore: BoxScore, playerId: string): GameStats {
  const entry = boxScore[playerId];
  if (!entry) throw new UnknownPlayerError(playerId);
  return toGameStats(entry);
}

export function getGameWinner(result: GameResult): string | null {
  if (result.homeScore > result.awayScore) return result.homeTeamId;
  if (result.awayScore > result.homeScore) return result.awayTeamId;
  return null;
}
