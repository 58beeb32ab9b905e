// ============================================================================
// HARDWOOD - Career Sim Schedule
// ============================================================================
// Double round-robin by the circle method. The second half mirrors the first
// with venues swapped, so every pair meets once at each home.

import type { Fixture } from '@hardwood/core';

const BYE = '__bye__';

export function generateRoundRobin(teamIds: readonly string[], season: number): Fixture[][] {
  if (new Set(teamIds).size !== teamIds.length) {
    throw new Error('Team ids must be unique');
  }
  if (teamIds.length < 2) return [];

  const ids = [...teamIds];
  if (ids.length % 2 !== 0) ids.push(BYE);

  const numTeams = ids.length;
  const fixed = ids[0];
  let rotating = ids.slice(1);
  const firstHalf: Array<Array<[string, string]>> = [];

  for (let round = 0; round < numTeams - 1; round++) {
    const rotation = [fixed, ...rotating];
    const pairs: Array<[string, string]> = [];

    for (let match = 0; match < numTeams / 2; match++) {
      const team1 = rotation[match];
      const team2 = rotation[numTeams - 1 - match];
      if (team1 === BYE || team2 === BYE) continue;

      // Alternate venues round by round
      pairs.push(round % 2 === 0 ? [team1, team2] : [team2, team1]);
    }

    firstHalf.push(pairs);
    rotating = [rotating[rotating.length - 1], ...rotating.slice(0, -1)];
  }

  const secondHalf = firstHalf.map((pairs) =>
    pairs.map(([home, away]): [string, string] => [away, home]),
  );

  return [...firstHalf, ...secondHalf].map((pairs, index) =>
    pairs.map(([homeTeamId, awayTeamId]) => ({
      id: `s${season}-r${index + 1}-${homeTeamId}-${awayTeamId}`,
      homeTeamId,
      awayTeamId,
    })),
  );
}
