// ============================================================================
// HARDWOOD - Seed Data
// ============================================================================
// Name and nationality pools for generated players

import namePool from './names.json';

export interface NamePool {
  firstNames: string[];
  lastNames: string[];
  nationalities: string[];
}

export const NAME_POOL: NamePool = namePool;
