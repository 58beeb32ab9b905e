// ============================================================================
// HARDWOOD - Career Sim Configuration
// ============================================================================
// Environment first, command options on top, validated as one object.

import { z } from 'zod';

const optionalInt = (min: number, max: number) =>
  z.preprocess(
    (value) => (value === '' || value === undefined ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional(),
  );

export const CareerSimConfigSchema = z.object({
  seed: optionalInt(0, 0xffffffff),
  teams: optionalInt(2, 30).transform((v) => v ?? 8),
  seasons: optionalInt(1, 50).transform((v) => v ?? 3),
  rosterSize: optionalInt(5, 20).transform((v) => v ?? 15),
  logLevel: z.enum(['info', 'silent']).default('info'),
});

export type CareerSimConfig = z.infer<typeof CareerSimConfigSchema>;

export interface CareerSimOverrides {
  seed?: string;
  teams?: string;
  seasons?: string;
  rosterSize?: string;
  quiet?: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: CareerSimOverrides = {},
): CareerSimConfig {
  const result = CareerSimConfigSchema.safeParse({
    seed: overrides.seed ?? env.CAREER_SIM_SEED,
    teams: overrides.teams ?? env.CAREER_SIM_TEAMS,
    seasons: overrides.seasons ?? env.CAREER_SIM_SEASONS,
    rosterSize: overrides.rosterSize ?? env.CAREER_SIM_ROSTER_SIZE,
    logLevel: overrides.quiet ? 'silent' : env.CAREER_SIM_LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
