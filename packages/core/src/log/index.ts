// ============================================================================
// HARDWOOD - Engine Logging
// ============================================================================
// Dotted event names with a detail object, e.g.
//   logger.info('season.retirements', { season: 3, count: 4 })

export type LogDetails = Record<string, unknown>;

export interface EngineLogger {
  info(event: string, details?: LogDetails): void;
  warn(event: string, details?: LogDetails): void;
  error(event: string, details?: LogDetails): void;
}

export const consoleLogger: EngineLogger = {
  info: (event, details) => console.info(event, details ?? {}),
  warn: (event, details) => console.warn(event, details ?? {}),
  error: (event, details) => console.error(event, details ?? {}),
};

const noop = (): void => {};

export const silentLogger: EngineLogger = {
  info: noop,
  warn: noop,
  error: noop,
};
