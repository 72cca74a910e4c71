// Domain layer: Combat engine types
// NO external dependencies - pure TypeScript

export const CombatSide = {
  PARTY: 'PARTY',
  MONSTER: 'MONSTER',
} as const;
export type CombatSide = (typeof CombatSide)[keyof typeof CombatSide];

export const EncounterState = {
  INIT: 'INIT',
  ROUND_START: 'ROUND_START',
  TURN_START: 'TURN_START',
  AWAIT_INTENT: 'AWAIT_INTENT',
  VALIDATE_INTENT: 'VALIDATE_INTENT',
  EXECUTE_ACTION: 'EXECUTE_ACTION',
  CHECK_DEATHS: 'CHECK_DEATHS',
  CHECK_MORALE: 'CHECK_MORALE',
  CHECK_VICTORY: 'CHECK_VICTORY',
  ENDED: 'ENDED',
} as const;
export type EncounterState = (typeof EncounterState)[keyof typeof EncounterState];

export const EncounterOutcome = {
  PARTY_VICTORY: 'PARTY_VICTORY',
  OPPOSITION_VICTORY: 'OPPOSITION_VICTORY',
  FAULTED: 'FAULTED',
} as const;
export type EncounterOutcome = (typeof EncounterOutcome)[keyof typeof EncounterOutcome];

export const ModifiedStat = {
  ATTACK: 'ATTACK',
  DAMAGE: 'DAMAGE',
  ARMOR_CLASS: 'ARMOR_CLASS',
  SAVING_THROW: 'SAVING_THROW',
} as const;
export type ModifiedStat = (typeof ModifiedStat)[keyof typeof ModifiedStat];

/**
 * How a spell or item picks its targets
 */
export const TargetMode = {
  SINGLE_ENEMY: 'SINGLE_ENEMY',
  ALL_ENEMIES: 'ALL_ENEMIES',
  SELF: 'SELF',
  SINGLE_ALLY: 'SINGLE_ALLY',
  ALL_ALLIES: 'ALL_ALLIES',
  ENEMY_GROUP: 'ENEMY_GROUP',
  HD_POOL: 'HD_POOL',
} as const;
export type TargetMode = (typeof TargetMode)[keyof typeof TargetMode];

export type CombatantKind = 'character' | 'monster';

export type CombatantStatus = 'active' | 'dead' | 'fled';

export type Controller = 'ai' | 'external';

export const CHARACTER_CLASSES = [
  'fighter',
  'cleric',
  'magic_user',
  'elf',
  'thief',
  'dwarf',
  'halfling',
] as const;
export type CharacterClass = (typeof CHARACTER_CLASSES)[number];

/**
 * Static description of a combatant as handed to the engine.
 * Validated once at construction; the engine keeps its own copy.
 */
export interface CombatantDefinition {
  id: string;
  name: string;
  kind: CombatantKind;
  hp: number;
  maxHp: number;
  armorClass: number;
  attackBonus: number;
  damage: string; // dice formula like "1d8"
  attacks: number;
  rangedDamage?: string;
  saveTarget: number;
  morale?: number;
  characterClass?: CharacterClass;
  level?: number;
  hitDice?: string; // monsters, e.g. "2d8"
  spellSlots: Record<string, number>;
  spells: string[];
  inventory: string[];
  controller?: Controller;
}

export interface ActiveModifier {
  modifierId: string;
  sourceId: string;
  stat: ModifiedStat;
  value: number;
  remainingRounds?: number; // undefined = permanent until removed
}

export interface ActiveCondition {
  conditionId: string;
  sourceId: string;
  remainingRounds?: number;
  skipTurn: boolean;
  breakOnDamage: boolean;
}

export interface SpellModifier {
  modifierId: string;
  stat: ModifiedStat;
  value: number;
  duration: number;
}

export interface SpellDefinition {
  spellId: string;
  name: string;
  level: number;
  damageDie?: string;
  damagePerLevel?: string; // rolled once per caster level
  healDie?: string;
  numTargets: 1 | -1;
  autoHit: boolean;
  conditionId?: string;
  conditionDuration?: number;
  usableBy: ReadonlySet<CharacterClass>;
  targetMode: TargetMode;
  hasSave: boolean;
  saveNegates: boolean;
  modifiers: readonly SpellModifier[];
  hdPoolDie?: string;
  groupSizeDie?: string;
}

export interface ItemDefinition {
  name: string;
  targetMode: TargetMode;
  damageDie?: string;
  healDie?: string;
  requiresAttackRoll: boolean;
}
