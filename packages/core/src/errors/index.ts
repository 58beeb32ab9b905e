// ============================================================================
// HARDWOOD - Errors
// ============================================================================
// Named errors surfaced to callers. Numeric edge cases are clamped inside the
// engines and never reach this module.

export class HardwoodError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Caller supplied something the engine cannot resolve
export class ConfigurationError extends HardwoodError {}

export class UnknownTeamError extends ConfigurationError {
  readonly teamId: string;

  constructor(teamId: string) {
    super(`Unknown team: ${teamId}`);
    this.teamId = teamId;
  }
}

export class UnknownPlayerError extends ConfigurationError {
  readonly playerId: string;

  constructor(playerId: string) {
    super(`Unknown player: ${playerId}`);
    this.playerId = playerId;
  }
}

export class InvalidRosterError extends ConfigurationError {
  readonly teamId: string;

  constructor(teamId: string, reason: string) {
    super(`Invalid roster for team ${teamId}: ${reason}`);
    this.teamId = teamId;
  }
}

export class InvalidSerializedRecordError extends ConfigurationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid serialized player record: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
