// Domain layer exports - pure business logic, no external deps

// Combat domain
export * from './combat/types.js';
export * from './combat/intents.js';
export * from './combat/effects.js';
export * from './combat/events.js';
export * from './combat/dice.js';
export * from './combat/tactics.js';
export * from './combat/views.js';
