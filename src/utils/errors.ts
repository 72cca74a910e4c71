// Utilities: Custom error types

export class DiceFormatError extends Error {
  statusCode = 400;
  code = 'DICE_FORMAT';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DiceFormatError';
    this.details = details;
  }
}

/**
 * Invalid static configuration: empty dice script, unknown spell id,
 * malformed combatant definition, duplicate roster id.
 */
export class EncounterConfigError extends Error {
  statusCode = 400;
  code = 'ENCOUNTER_CONFIG';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EncounterConfigError';
    this.details = details;
  }
}

/**
 * Intent submitted while the engine is not awaiting one, or for a
 * combatant whose turn it is not.
 */
export class EncounterUsageError extends Error {
  statusCode = 409;
  code = 'ENCOUNTER_USAGE';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EncounterUsageError';
    this.details = details;
  }
}

/**
 * Step budget exhausted, or a step requested on an ended encounter.
 */
export class EncounterLoopError extends Error {
  statusCode = 500;
  code = 'ENCOUNTER_LOOP';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EncounterLoopError';
    this.details = details;
  }
}

export class EncounterNotFoundError extends Error {
  statusCode = 404;
  code = 'ENCOUNTER_NOT_FOUND';
  details?: Record<string, unknown>;

  constructor(encounterId: string) {
    super(`Encounter not found: ${encounterId}`);
    this.name = 'EncounterNotFoundError';
    this.details = { encounterId };
  }
}
