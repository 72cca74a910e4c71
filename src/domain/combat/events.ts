// Domain layer: Encounter events
// Ordered, append-only record of everything observable that happened

import type { ActionIntent } from '@/domain/combat/intents.js';
import type {
  EncounterOutcome,
  EncounterState,
  ModifiedStat,
} from '@/domain/combat/types.js';

export const RejectionCode = {
  INVALID_ACTOR: 'INVALID_ACTOR',
  NOT_CURRENT_COMBATANT: 'NOT_CURRENT_COMBATANT',
  ACTOR_INACTIVE: 'ACTOR_INACTIVE',
  INVALID_TARGET: 'INVALID_TARGET',
  TARGET_NOT_OPPONENT: 'TARGET_NOT_OPPONENT',
  TARGET_NOT_ALLY: 'TARGET_NOT_ALLY',
  WRONG_TARGET_COUNT: 'WRONG_TARGET_COUNT',
  NO_RANGED_WEAPON: 'NO_RANGED_WEAPON',
  UNKNOWN_SPELL: 'UNKNOWN_SPELL',
  SPELL_NOT_KNOWN: 'SPELL_NOT_KNOWN',
  INELIGIBLE_CASTER: 'INELIGIBLE_CASTER',
  SLOT_LEVEL_MISMATCH: 'SLOT_LEVEL_MISMATCH',
  NO_SPELL_SLOT: 'NO_SPELL_SLOT',
  UNKNOWN_ITEM: 'UNKNOWN_ITEM',
  ITEM_NOT_IN_INVENTORY: 'ITEM_NOT_IN_INVENTORY',
} as const;
export type RejectionCode = (typeof RejectionCode)[keyof typeof RejectionCode];

export interface Rejection {
  readonly code: RejectionCode;
  readonly message: string;
}

export type ChoiceKey =
  | 'attack_target'
  | 'ranged_attack_target'
  | 'cast_spell'
  | 'use_item'
  | 'flee';

/**
 * A UI-facing choice offered to the acting combatant
 */
export interface ActionChoice {
  readonly uiKey: ChoiceKey;
  readonly uiArgs: Readonly<Record<string, string | number>>;
  readonly intent: ActionIntent;
}

export function choiceLabel(choice: ActionChoice): string {
  const args = choice.uiArgs;
  const target = args.targetName ?? args.targetId;
  switch (choice.uiKey) {
    case 'attack_target':
      return `Attack ${target ?? '???'}`;
    case 'ranged_attack_target':
      return `Ranged: ${target ?? '???'}`;
    case 'cast_spell': {
      const spell = args.spellName ?? args.spellId ?? '???';
      return target !== undefined ? `Cast ${spell} on ${target}` : `Cast ${spell}`;
    }
    case 'use_item': {
      const item = args.itemName ?? '???';
      return target !== undefined ? `Use ${item} on ${target}` : `Use ${item}`;
    }
    case 'flee':
      return 'Flee';
    default: {
      const unreachable: never = choice.uiKey;
      return unreachable;
    }
  }
}

export interface EncounterStartedEvent {
  readonly type: 'encounter_started';
  readonly encounterId: string;
  readonly combatantIds: readonly string[];
}

export interface SurpriseRolledEvent {
  readonly type: 'surprise_rolled';
  readonly partyRoll: number;
  readonly monsterRoll: number;
  readonly partySurprised: boolean;
  readonly monsterSurprised: boolean;
}

export interface RoundStartedEvent {
  readonly type: 'round_started';
  readonly roundNumber: number;
}

export interface InitiativeRolledEvent {
  readonly type: 'initiative_rolled';
  readonly order: readonly (readonly [string, number])[];
}

export interface TurnQueueBuiltEvent {
  readonly type: 'turn_queue_built';
  readonly queue: readonly string[];
}

export interface TurnStartedEvent {
  readonly type: 'turn_started';
  readonly combatantId: string;
}

export interface TurnSkippedEvent {
  readonly type: 'turn_skipped';
  readonly combatantId: string;
  readonly reason: string;
}

export interface NeedActionEvent {
  readonly type: 'need_action';
  readonly combatantId: string;
  readonly available: readonly ActionChoice[];
}

export interface ActionRejectedEvent {
  readonly type: 'action_rejected';
  readonly combatantId: string;
  readonly reasons: readonly Rejection[];
}

export interface AttackRolledEvent {
  readonly type: 'attack_rolled';
  readonly attackerId: string;
  readonly defenderId: string;
  readonly roll: number;
  readonly total: number;
  readonly needed: number;
  readonly hit: boolean;
  readonly critical: boolean;
}

export interface DamageAppliedEvent {
  readonly type: 'damage_applied';
  readonly sourceId: string;
  readonly targetId: string;
  readonly amount: number;
  readonly targetHpAfter: number;
}

export interface HealingAppliedEvent {
  readonly type: 'healing_applied';
  readonly sourceId: string;
  readonly targetId: string;
  readonly amount: number;
  readonly targetHpAfter: number;
}

export interface SpellCastEvent {
  readonly type: 'spell_cast';
  readonly casterId: string;
  readonly spellId: string;
  readonly spellName: string;
  readonly targetIds: readonly string[];
}

export interface SpellSlotConsumedEvent {
  readonly type: 'spell_slot_consumed';
  readonly casterId: string;
  readonly level: number;
  readonly remaining: number;
}

export interface ItemUsedEvent {
  readonly type: 'item_used';
  readonly actorId: string;
  readonly itemName: string;
  readonly targetIds: readonly string[];
  readonly remaining: number;
}

export interface ConditionAppliedEvent {
  readonly type: 'condition_applied';
  readonly sourceId: string;
  readonly targetId: string;
  readonly conditionId: string;
  readonly duration: number | null;
}

export interface ConditionExpiredEvent {
  readonly type: 'condition_expired';
  readonly combatantId: string;
  readonly conditionId: string;
  readonly reason: 'duration' | 'damage';
}

export interface ModifierAppliedEvent {
  readonly type: 'modifier_applied';
  readonly sourceId: string;
  readonly targetId: string;
  readonly modifierId: string;
  readonly stat: ModifiedStat;
  readonly value: number;
  readonly duration: number | null;
}

export interface ModifierExpiredEvent {
  readonly type: 'modifier_expired';
  readonly combatantId: string;
  readonly modifierId: string;
}

export interface SavingThrowRolledEvent {
  readonly type: 'saving_throw_rolled';
  readonly targetId: string;
  readonly spellName: string;
  readonly roll: number;
  readonly total: number;
  readonly targetNumber: number;
  readonly success: boolean;
}

export interface GroupTargetsResolvedEvent {
  readonly type: 'group_targets_resolved';
  readonly spellName: string;
  readonly poolRoll: number | null;
  readonly resolvedTargetIds: readonly string[];
}

export type MoraleTrigger = 'first_death' | 'half_incapacitated';

export interface MoraleCheckedEvent {
  readonly type: 'morale_checked';
  readonly monsterMorale: number;
  readonly roll: number;
  readonly passed: boolean;
  readonly trigger: MoraleTrigger;
  readonly checksPassedTotal: number;
  readonly nowImmune: boolean;
}

export interface EntityDiedEvent {
  readonly type: 'entity_died';
  readonly entityId: string;
}

export interface EntityFledEvent {
  readonly type: 'entity_fled';
  readonly entityId: string;
  readonly reason: 'intent' | 'morale';
}

export interface VictoryDeterminedEvent {
  readonly type: 'victory_determined';
  readonly outcome: EncounterOutcome;
}

export interface EncounterFaultedEvent {
  readonly type: 'encounter_faulted';
  readonly state: EncounterState;
  readonly errorType: string;
  readonly message: string;
}

export type EncounterEvent =
  | EncounterStartedEvent
  | SurpriseRolledEvent
  | RoundStartedEvent
  | InitiativeRolledEvent
  | TurnQueueBuiltEvent
  | TurnStartedEvent
  | TurnSkippedEvent
  | NeedActionEvent
  | ActionRejectedEvent
  | AttackRolledEvent
  | DamageAppliedEvent
  | HealingAppliedEvent
  | SpellCastEvent
  | SpellSlotConsumedEvent
  | ItemUsedEvent
  | ConditionAppliedEvent
  | ConditionExpiredEvent
  | ModifierAppliedEvent
  | ModifierExpiredEvent
  | SavingThrowRolledEvent
  | GroupTargetsResolvedEvent
  | MoraleCheckedEvent
  | EntityDiedEvent
  | EntityFledEvent
  | VictoryDeterminedEvent
  | EncounterFaultedEvent;

export type EncounterEventType = EncounterEvent['type'];
