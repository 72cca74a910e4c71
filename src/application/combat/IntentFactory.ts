// Application layer: Intent factories
// Build frozen intents; unknown catalog references fail at the call site

import type {
  CastSpellIntent,
  FleeIntent,
  MeleeAttackIntent,
  RangedAttackIntent,
  UseItemIntent,
} from '@/domain/combat/intents.js';
import { requireSpell } from '@/application/combat/catalog/spells.js';
import { requireItem } from '@/application/combat/catalog/items.js';

export function meleeAttack(actorId: string, targetId: string): MeleeAttackIntent {
  return Object.freeze({ type: 'melee_attack', actorId, targetId });
}

export function rangedAttack(actorId: string, targetId: string): RangedAttackIntent {
  return Object.freeze({ type: 'ranged_attack', actorId, targetId });
}

/**
 * @param slotLevel defaults to the spell's own level
 */
export function castSpell(
  actorId: string,
  spellId: string,
  slotLevel?: number,
  targetIds: readonly string[] = []
): CastSpellIntent {
  const spell = requireSpell(spellId);
  return Object.freeze({
    type: 'cast_spell',
    actorId,
    spellId,
    slotLevel: slotLevel ?? spell.level,
    targetIds: Object.freeze([...targetIds]),
  });
}

export function useItem(actorId: string, itemName: string, targetIds: readonly string[] = []): UseItemIntent {
  requireItem(itemName);
  return Object.freeze({
    type: 'use_item',
    actorId,
    itemName,
    targetIds: Object.freeze([...targetIds]),
  });
}

export function flee(actorId: string): FleeIntent {
  return Object.freeze({ type: 'flee', actorId });
}
