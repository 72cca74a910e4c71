// Public entry point for embedding the engine without the HTTP driver

export * from './domain/index.js';

export {
  EncounterEngine,
  type EncounterEngineOptions,
  type StepResult,
} from './application/combat/EncounterEngine.js';
export { meleeAttack, rangedAttack, castSpell, useItem, flee } from './application/combat/IntentFactory.js';
export { ModifierTracker, type ExpiredModifier } from './application/combat/ModifierTracker.js';
export { ConditionTracker, CONDITION_REGISTRY } from './application/combat/ConditionTracker.js';
export { resolveHdPool, resolveRandomGroup, hitDiceOf, type HdCandidate } from './application/combat/targeting.js';
export { RandomTacticalProvider, ScriptedTacticalProvider } from './application/combat/TacticalProviders.js';
export {
  serializeEvent,
  serializeEvents,
  serializeIntent,
  serializeChoice,
  normalizeJson,
  type JsonValue,
  type JsonObject,
} from './application/combat/EventSerializer.js';
export { EventFormatter } from './application/combat/EventFormatter.js';
export { SPELL_CATALOG, getSpell, requireSpell } from './application/combat/catalog/spells.js';
export { ITEM_CATALOG, getItem, requireItem } from './application/combat/catalog/items.js';
export {
  CombatantDefinitionSchema,
  ActionIntentSchema,
  parseIntent,
  type CombatantInput,
} from './application/combat/schemas.js';
export {
  RandomDiceService,
  FixedDiceService,
  SeededDiceService,
  createDiceService,
  parseDiceNotation,
  type DiceOptions,
} from './infrastructure/game/DiceService.js';
export * from './utils/errors.js';
