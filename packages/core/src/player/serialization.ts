// ============================================================================
// HARDWOOD - Player Serialization
// ============================================================================
// Structural conversion between PlayerRecord and a flat key -> string/number
// map, e.g. { 'skills.shooting': 72, 'development.agingCurve.peakAge': 27 }.
// Storage lives outside the engine; this is the contract it persists.

import { z } from 'zod';
import type { PlayerRecord } from '../types';
import { InvalidSerializedRecordError } from '../errors';

export type FlatValue = string | number;
export type FlatRecord = Record<string, FlatValue>;

// =============================================================================
// Zod Schemas for Runtime Validation
// =============================================================================

const skillValue = z.coerce.number().int().min(0).max(99);

const flag = z
  .union([z.boolean(), z.number(), z.string()])
  .transform((value) => value === true || value === 1 || value === '1' || value === 'true');

// Empty strings stand in for null in the flat form
function nullableEnum<U extends string, T extends Readonly<[U, ...U[]]>>(values: T) {
  return z.preprocess(
    (value) => (value === '' || value === undefined ? null : value),
    z.enum(values).nullable(),
  );
}

const SkillRatingsSchema = z.object({
  shooting: skillValue,
  rebounding: skillValue,
  passing: skillValue,
  ballHandling: skillValue,
  perimeterDefense: skillValue,
  postDefense: skillValue,
  insideShooting: skillValue,
});

const experienceValue = z.coerce.number().int().min(0);

const SkillExperienceSchema = z.object({
  shooting: experienceValue,
  rebounding: experienceValue,
  passing: experienceValue,
  ballHandling: experienceValue,
  perimeterDefense: experienceValue,
  postDefense: experienceValue,
  insideShooting: experienceValue,
});

const AgingCurveSchema = z.object({
  peakAge: z.coerce.number().int(),
  declineStartAge: z.coerce.number().int(),
  retirementAge: z.coerce.number().int(),
  peakMultiplier: z.coerce.number(),
  declineRate: z.coerce.number().min(0),
});

const MilestoneSchema = z.object({
  name: z.string(),
  description: z.string(),
  experienceRequired: z.coerce.number().int().min(0),
  achieved: flag,
  achievedAtAge: z.coerce.number().int().optional(),
});

export const PlayerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  age: z.coerce.number().int().min(0),
  nationality: z.string(),
  role: z.enum(['PG', 'SG', 'SF', 'PF', 'C']),
  status: z.enum(['active', 'retired']),
  skills: SkillRatingsSchema,
  potential: z.object({
    tier: z.enum(['bronze', 'silver', 'gold', 'elite']),
    maxSkills: SkillRatingsSchema,
    overallPotential: z.coerce.number().min(0).max(99),
    isHidden: flag,
  }),
  development: z.object({
    skillExperience: SkillExperienceSchema,
    skillUpgrades: SkillExperienceSchema,
    totalExperience: experienceValue,
    developmentRate: z.coerce.number().min(0.1).max(3),
    agingCurve: AgingCurveSchema,
    milestones: z.array(MilestoneSchema).default([]),
  }),
  talentTier: z.enum(['superstar', 'allStar', 'starter', 'rotation', 'bench']),
  archetype: nullableEnum([
    'eliteShooter',
    'defensiveSpecialist',
    'playmaker',
    'athleticFinisher',
    'stretchBig',
    'lockdownDefender',
    'floorGeneral',
    'energizer',
  ]),
  retirementReason: nullableEnum(['age', 'performance', 'injury', 'voluntary']),
});

// =============================================================================
// Flatten / unflatten
// =============================================================================

function flattenInto(value: unknown, key: string, out: FlatRecord): void {
  if (value === undefined) return;
  if (value === null) {
    out[key] = '';
  } else if (typeof value === 'boolean') {
    out[key] = value ? 1 : 0;
  } else if (typeof value === 'number' || typeof value === 'string') {
    out[key] = value;
  } else if (Array.isArray(value)) {
    value.forEach((item, index) => flattenInto(item, `${key}.${index}`, out));
  } else if (typeof value === 'object') {
    for (const [child, childValue] of Object.entries(value)) {
      flattenInto(childValue, key ? `${key}.${child}` : child, out);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Objects keyed 0..n-1 become arrays again
function restoreArrays(node: unknown): unknown {
  if (!isRecord(node)) return node;

  const restored: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    restored[key] = restoreArrays(value);
  }

  const keys = Object.keys(restored);
  const isIndexed =
    keys.length > 0 && keys.every((_, index) => String(index) in restored);
  if (!isIndexed) return restored;

  return keys.map((_, index) => restored[String(index)]);
}

export function flattenRecord(value: unknown): FlatRecord {
  const out: FlatRecord = {};
  flattenInto(value, '', out);
  return out;
}

export function unflattenRecord(flat: FlatRecord): unknown {
  const root: Record<string, unknown> = {};

  for (const [path, value] of Object.entries(flat)) {
    const parts = path.split('.');
    let node = root;
    for (const part of parts.slice(0, -1)) {
      const next = node[part];
      if (isRecord(next)) {
        node = next;
      } else {
        const created: Record<string, unknown> = {};
        node[part] = created;
        node = created;
      }
    }
    node[parts[parts.length - 1]] = value;
  }

  return restoreArrays(root);
}

// =============================================================================
// Player records
// =============================================================================

export function serializePlayer(player: PlayerRecord): FlatRecord {
  return flattenRecord(player);
}

export function deserializePlayer(flat: FlatRecord): PlayerRecord {
  const parsed = PlayerRecordSchema.safeParse(unflattenRecord(flat));
  if (!parsed.success) {
    throw new InvalidSerializedRecordError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const player: PlayerRecord = parsed.data;
  return player;
}
