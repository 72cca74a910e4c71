// Domain layer: Action intents
// Proposed actions submitted for a combatant's turn, not yet validated

export interface MeleeAttackIntent {
  readonly type: 'melee_attack';
  readonly actorId: string;
  readonly targetId: string;
}

export interface RangedAttackIntent {
  readonly type: 'ranged_attack';
  readonly actorId: string;
  readonly targetId: string;
}

export interface CastSpellIntent {
  readonly type: 'cast_spell';
  readonly actorId: string;
  readonly spellId: string;
  readonly slotLevel: number;
  readonly targetIds: readonly string[];
}

export interface UseItemIntent {
  readonly type: 'use_item';
  readonly actorId: string;
  readonly itemName: string;
  readonly targetIds: readonly string[];
}

export interface FleeIntent {
  readonly type: 'flee';
  readonly actorId: string;
}

export type ActionIntent =
  | MeleeAttackIntent
  | RangedAttackIntent
  | CastSpellIntent
  | UseItemIntent
  | FleeIntent;

export type ActionIntentType = ActionIntent['type'];

/**
 * Canonical string form; two intents are equal iff their keys are equal.
 */
export function intentKey(intent: ActionIntent): string {
  switch (intent.type) {
    case 'melee_attack':
    case 'ranged_attack':
      return `${intent.type}|${intent.actorId}|${intent.targetId}`;
    case 'cast_spell':
      return `${intent.type}|${intent.actorId}|${intent.spellId}|${intent.slotLevel}|${intent.targetIds.join(',')}`;
    case 'use_item':
      return `${intent.type}|${intent.actorId}|${intent.itemName}|${intent.targetIds.join(',')}`;
    case 'flee':
      return `${intent.type}|${intent.actorId}`;
    default: {
      const unreachable: never = intent;
      return unreachable;
    }
  }
}

export function intentsEqual(a: ActionIntent, b: ActionIntent): boolean {
  return intentKey(a) === intentKey(b);
}
