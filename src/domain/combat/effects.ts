// Domain layer: Effects
// The only values allowed to mutate combat state

import type { ModifiedStat } from '@/domain/combat/types.js';

export interface DamageEffect {
  readonly type: 'damage';
  readonly sourceId: string;
  readonly targetId: string;
  readonly amount: number;
}

export interface HealEffect {
  readonly type: 'heal';
  readonly sourceId: string;
  readonly targetId: string;
  readonly amount: number;
}

export interface ConsumeSlotEffect {
  readonly type: 'consume_slot';
  readonly casterId: string;
  readonly level: number;
}

export interface ConsumeItemEffect {
  readonly type: 'consume_item';
  readonly actorId: string;
  readonly itemName: string;
  readonly targetIds: readonly string[];
}

export interface ApplyConditionEffect {
  readonly type: 'apply_condition';
  readonly sourceId: string;
  readonly targetId: string;
  readonly conditionId: string;
  readonly duration?: number;
}

export interface ApplyModifierEffect {
  readonly type: 'apply_modifier';
  readonly sourceId: string;
  readonly targetId: string;
  readonly modifierId: string;
  readonly stat: ModifiedStat;
  readonly value: number;
  readonly duration?: number;
}

export interface FleeEffect {
  readonly type: 'flee';
  readonly combatantId: string;
  readonly initiator: 'intent' | 'morale';
}

export type Effect =
  | DamageEffect
  | HealEffect
  | ConsumeSlotEffect
  | ConsumeItemEffect
  | ApplyConditionEffect
  | ApplyModifierEffect
  | FleeEffect;
