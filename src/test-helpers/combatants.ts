// Test helpers: combatant fixtures

import { CombatantDefinitionSchema, type CombatantInput } from '@/application/combat/schemas.js';
import { CombatContext, type Combatant } from '@/application/combat/CombatContext.js';

export function makeHero(overrides: Partial<CombatantInput> = {}): CombatantInput {
  return {
    id: 'hero',
    name: 'Hero',
    kind: 'character',
    hp: 10,
    armorClass: 12,
    attackBonus: 0,
    damage: '1d8',
    characterClass: 'fighter',
    level: 1,
    ...overrides,
  };
}

export function makeMonster(overrides: Partial<CombatantInput> = {}): CombatantInput {
  return {
    id: 'gob',
    name: 'Goblin',
    kind: 'monster',
    hp: 1,
    armorClass: 12,
    attackBonus: 0,
    damage: '1d6',
    hitDice: '1d8',
    ...overrides,
  };
}

export function makeContext(party: CombatantInput[], opposition: CombatantInput[]): CombatContext {
  return new CombatContext(
    party.map((c) => CombatantDefinitionSchema.parse(c)),
    opposition.map((c) => CombatantDefinitionSchema.parse(c))
  );
}

export function combatantIn(context: CombatContext, id: string): Combatant {
  const found = context.get(id);
  if (!found) {
    throw new Error(`No combatant ${id} in context`);
  }
  return found;
}
