// ============================================================================
// HARDWOOD - Core Game Engine
// ============================================================================
// Main entry point for the @hardwood/core package

// Re-export all types
export * from './types';

// Re-export shared plumbing
export * from './random';
export * from './errors';
export * from './log';

// Re-export seed data
export * from './data';

// Re-export talent generation
export * from './talent';

// Re-export aging system
export * from './aging';

// Re-export development system
export * from './development';

// Re-export coaching
export * from './coaching';

// Re-export player system
export * from './player';

// Re-export match engine
export * from './match';

// Re-export team system
export * from './team';

// Re-export season system
export * from './season';
