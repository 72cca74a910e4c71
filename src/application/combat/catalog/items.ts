// Application layer: Combat item catalog

import { TargetMode, type ItemDefinition } from '@/domain/combat/types.js';
import { EncounterConfigError } from '@/utils/errors.js';

const ITEMS: readonly ItemDefinition[] = [
  Object.freeze({
    name: 'Oil flask',
    targetMode: TargetMode.SINGLE_ENEMY,
    damageDie: '1d8',
    requiresAttackRoll: true,
  }),
  Object.freeze({
    name: 'Holy water',
    targetMode: TargetMode.SINGLE_ENEMY,
    damageDie: '1d8',
    requiresAttackRoll: true,
  }),
  Object.freeze({
    name: 'Potion of healing',
    targetMode: TargetMode.SELF,
    healDie: '1d6+1',
    requiresAttackRoll: false,
  }),
];

export const ITEM_CATALOG: ReadonlyMap<string, ItemDefinition> = new Map(
  ITEMS.map((item) => [item.name, item])
);

export function getItem(itemName: string): ItemDefinition | undefined {
  return ITEM_CATALOG.get(itemName);
}

export function requireItem(itemName: string): ItemDefinition {
  const item = ITEM_CATALOG.get(itemName);
  if (!item) {
    throw new EncounterConfigError(`Unknown combat item: ${itemName}`, { itemName });
  }
  return item;
}
