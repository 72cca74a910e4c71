// Utilities: Configuration management
// Pure functions, no external dependencies

export type TurnOrderPolicy = 'initiative' | 'roster';

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export interface EngineConfig {
  maxSteps: number;
  turnOrder: TurnOrderPolicy;
  initiativeDie: string;
  moraleDie: string;
  /** Roll 1d6 per side for surprise at the start; informational only */
  surprise: boolean;
}

export interface RegistryConfig {
  maxActiveEncounters: number;
}

export interface AppConfig {
  server: ServerConfig;
  engine: EngineConfig;
  registry: RegistryConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxSteps: 256,
  turnOrder: 'initiative',
  initiativeDie: '1d6',
  moraleDie: '2d6',
  surprise: false,
};

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'test'
    ? env.NODE_ENV
    : 'development';

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv,
  };
}

export function buildEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const turnOrder: TurnOrderPolicy = env.ENCOUNTER_TURN_ORDER === 'roster' ? 'roster' : 'initiative';

  return {
    maxSteps: parseInt(env.ENCOUNTER_MAX_STEPS || String(DEFAULT_ENGINE_CONFIG.maxSteps), 10),
    turnOrder,
    initiativeDie: env.ENCOUNTER_INITIATIVE_DIE || DEFAULT_ENGINE_CONFIG.initiativeDie,
    moraleDie: env.ENCOUNTER_MORALE_DIE || DEFAULT_ENGINE_CONFIG.moraleDie,
    surprise: env.ENCOUNTER_SURPRISE === 'true',
  };
}

export function buildRegistryConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  return {
    maxActiveEncounters: parseInt(env.ENCOUNTER_MAX_ACTIVE || '100', 10),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    engine: buildEngineConfig(env),
    registry: buildRegistryConfig(env),
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!Number.isInteger(config.engine.maxSteps) || config.engine.maxSteps < 1) {
    errors.push('ENCOUNTER_MAX_STEPS must be a positive integer');
  }

  if (!Number.isInteger(config.registry.maxActiveEncounters) || config.registry.maxActiveEncounters < 1) {
    errors.push('ENCOUNTER_MAX_ACTIVE must be a positive integer');
  }

  return errors;
}
