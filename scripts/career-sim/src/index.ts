#!/usr/bin/env -S npx tsx
// ============================================================================
// HARDWOOD - Career Sim
// ============================================================================
// Plays games and whole careers with the engine from the command line

import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  calculateTeamOverall,
  consoleLogger,
  createLeagueState,
  createRng,
  defaultRng,
  describePlayer,
  generateRoster,
  generateTalentTier,
  NameRegistry,
  RETIREMENT_REASON_DESCRIPTIONS,
  runCareer,
  silentLogger,
  simulateGame,
  summarizeTalentTiers,
  TALENT_TIERS,
} from '@hardwood/core';
import type { GameResult, Roster, SeasonSummary } from '@hardwood/core';
import type { CareerSimOverrides } from './config';
import { loadConfig } from './config';
import { generateRoundRobin } from './schedule';

// Load environment variables from the script directory
const __dirname = path.dirname(fileURLToPath(import.meta.url));
loadEnv({ path: path.resolve(__dirname, '..', '.env') });

const TEAM_NAMES = [
  'Harbor City',
  'Pine Valley',
  'Red Mesa',
  'Lakeshore',
  'Iron Ridge',
  'Bayside',
  'Northgate',
  'Cedar Falls',
];

function teamName(index: number): string {
  const base = TEAM_NAMES[index % TEAM_NAMES.length];
  const cycle = Math.floor(index / TEAM_NAMES.length);
  return cycle === 0 ? base : `${base} ${cycle + 1}`;
}

function buildLeague(count: number, rosterSize: number, seed: number | undefined) {
  const rng = seed === undefined ? defaultRng : createRng(seed);
  const names = new NameRegistry();
  const rosters: Roster[] = [];
  for (let i = 0; i < count; i++) {
    rosters.push(
      generateRoster({ id: `team-${i + 1}`, name: teamName(i), size: rosterSize }, { rng, names }),
    );
  }
  return { rng, names, rosters };
}

function printGame(result: GameResult, home: Roster, away: Roster): void {
  console.log(`\n${home.name} ${result.homeScore} - ${result.awayScore} ${away.name}`);
  console.log(`  Possessions: ${result.possessions}`);

  const players = [...home.players, ...away.players];
  const topScorer = players.reduce((best, player) =>
    (result.boxScore[player.id]?.points ?? 0) > (result.boxScore[best.id]?.points ?? 0)
      ? player
      : best,
  );
  console.log(`  Top scorer: ${describePlayer(topScorer)}`);

  for (const roster of [home, away]) {
    console.log(`\n  ${roster.name}`);
    const lines = roster.players
      .map((player) => ({ player, entry: result.boxScore[player.id] }))
      .filter(({ entry }) => entry && entry.fieldGoalsAttempted + entry.rebounds > 0)
      .sort((a, b) => (b.entry?.points ?? 0) - (a.entry?.points ?? 0));

    for (const { player, entry } of lines) {
      if (!entry) continue;
      console.log(
        `    ${player.role.padEnd(2)} ${player.name.padEnd(22)} ${String(entry.points).padStart(3)} pts ` +
          `${entry.fieldGoalsMade}/${entry.fieldGoalsAttempted} FG ` +
          `${entry.threesMade}/${entry.threesAttempted} 3P ` +
          `${entry.rebounds} reb`,
      );
    }
  }
}

function printSeason(summary: SeasonSummary, rosters: readonly Roster[]): void {
  const nameOf = (teamId: string) => rosters.find((r) => r.id === teamId)?.name ?? teamId;

  console.log(`\nSeason ${summary.season} (${summary.matchdaysPlayed} matchdays)`);
  summary.records.forEach((record, index) => {
    console.log(
      `  ${String(index + 1).padStart(2)}. ${nameOf(record.teamId).padEnd(16)} ` +
        `${record.wins}-${record.losses}${record.ties > 0 ? `-${record.ties}` : ''} ` +
        `(${record.pointsFor}:${record.pointsAgainst})`,
    );
  });
  console.log(`  Skill upgrades: ${summary.skillUpgrades}`);
  console.log(`  Retirements: ${summary.retirements.length}, signings: ${summary.signings}`);
  for (const retirement of summary.retirements) {
    console.log(
      `    ${retirement.name} (${nameOf(retirement.teamId)}), age ${retirement.age}, ` +
        `overall ${retirement.overall}: ${RETIREMENT_REASON_DESCRIPTIONS[retirement.reason]}`,
    );
  }
}

function fail(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

const program = new Command();

program
  .name('career-sim')
  .description('Simulate basketball games and multi-season careers')
  .version('0.1.0');

program
  .command('game')
  .description('Play one game between two generated teams')
  .option('-s, --seed <seed>', 'Seed for the random source')
  .option('--roster-size <n>', 'Players per roster')
  .action((options: CareerSimOverrides) => {
    try {
      const config = loadConfig(process.env, { ...options, teams: '2' });
      const { rng, rosters } = buildLeague(2, config.rosterSize, config.seed);
      const [home, away] = rosters;
      const result = simulateGame(home, away, { rng });
      printGame(result, home, away);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('season')
  .description('Play full seasons with aging, retirements and roster refills')
  .option('-s, --seed <seed>', 'Seed for the random source')
  .option('-t, --teams <n>', 'Number of teams')
  .option('-n, --seasons <n>', 'Number of seasons')
  .option('--roster-size <n>', 'Players per roster')
  .option('-q, --quiet', 'Silence engine logging')
  .action((options: CareerSimOverrides) => {
    try {
      const config = loadConfig(process.env, options);
      const { rng, names, rosters } = buildLeague(config.teams, config.rosterSize, config.seed);
      const state = createLeagueState(rosters);

      for (const roster of rosters) {
        console.log(`  ${roster.name.padEnd(16)} overall ${calculateTeamOverall(roster)}`);
      }

      const summaries = runCareer(
        state,
        (current, season) => generateRoundRobin(current.map((r) => r.id), season),
        config.seasons,
        {
          rng,
          names,
          logger: config.logLevel === 'silent' ? silentLogger : consoleLogger,
        },
        { targetRosterSize: config.rosterSize },
      );

      for (const summary of summaries) printSeason(summary, state.rosters);
      console.log(`\nRetired players: ${state.retiredPlayers.length}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('talent')
  .description('Show the talent tier distribution over many draws')
  .option('-s, --seed <seed>', 'Seed for the random source')
  .option('-d, --draws <n>', 'Number of draws', '100000')
  .option('-r, --rookies', 'Use the rookie table')
  .action((options: CareerSimOverrides & { draws: string; rookies?: boolean }) => {
    try {
      const config = loadConfig(process.env, { seed: options.seed });
      const draws = Number.parseInt(options.draws, 10);
      if (!Number.isInteger(draws) || draws <= 0) {
        throw new Error(`Invalid draw count: ${options.draws}`);
      }

      const rng = config.seed === undefined ? defaultRng : createRng(config.seed);
      const tiers = Array.from({ length: draws }, () =>
        generateTalentTier(options.rookies === true, rng),
      );
      const counts = summarizeTalentTiers(tiers);

      console.log(`\n${draws} ${options.rookies ? 'rookie' : 'player'} draws`);
      for (const tier of TALENT_TIERS) {
        const share = ((counts[tier] / draws) * 100).toFixed(2);
        console.log(`  ${tier.padEnd(10)} ${String(counts[tier]).padStart(7)}  ${share}%`);
      }
    } catch (error) {
      fail(error);
    }
  });

program.parse();
