// Application layer: Effect application
// The only code path that mutates combatants, trackers or presence

import type { Effect } from '@/domain/combat/effects.js';
import type { EncounterEvent } from '@/domain/combat/events.js';
import type { CombatContext, Combatant } from '@/application/combat/CombatContext.js';
import { conditionBehavior } from '@/application/combat/ConditionTracker.js';

function target(context: CombatContext, id: string): Combatant {
  const combatant = context.get(id);
  if (!combatant) {
    throw new Error(`Effect targets unknown combatant: ${id}`);
  }
  return combatant;
}

/**
 * Apply one effect and return the events it produced, in order.
 */
export function applyEffect(context: CombatContext, effect: Effect): EncounterEvent[] {
  switch (effect.type) {
    case 'damage': {
      const victim = target(context, effect.targetId);
      victim.hp -= effect.amount;
      const events: EncounterEvent[] = [
        {
          type: 'damage_applied',
          sourceId: effect.sourceId,
          targetId: victim.id,
          amount: effect.amount,
          targetHpAfter: Math.max(0, victim.hp),
        },
      ];
      for (const conditionId of context.conditions.removeBreakOnDamage(victim.id)) {
        events.push({ type: 'condition_expired', combatantId: victim.id, conditionId, reason: 'damage' });
      }
      return events;
    }

    case 'heal': {
      const patient = target(context, effect.targetId);
      const before = patient.hp;
      patient.hp = Math.min(patient.maxHp, patient.hp + effect.amount);
      return [
        {
          type: 'healing_applied',
          sourceId: effect.sourceId,
          targetId: patient.id,
          amount: patient.hp - before,
          targetHpAfter: Math.max(0, patient.hp),
        },
      ];
    }

    case 'consume_slot': {
      const caster = target(context, effect.casterId);
      const key = String(effect.level);
      const remaining = Math.max(0, (caster.spellSlots[key] ?? 0) - 1);
      caster.spellSlots[key] = remaining;
      return [{ type: 'spell_slot_consumed', casterId: caster.id, level: effect.level, remaining }];
    }

    case 'consume_item': {
      const actor = target(context, effect.actorId);
      const index = actor.inventory.indexOf(effect.itemName);
      if (index >= 0) actor.inventory.splice(index, 1);
      return [
        {
          type: 'item_used',
          actorId: actor.id,
          itemName: effect.itemName,
          targetIds: effect.targetIds,
          remaining: actor.inventory.filter((name) => name === effect.itemName).length,
        },
      ];
    }

    case 'apply_condition': {
      const behavior = conditionBehavior(effect.conditionId);
      context.conditions.add(effect.targetId, {
        conditionId: effect.conditionId,
        sourceId: effect.sourceId,
        remainingRounds: effect.duration,
        skipTurn: behavior.skipTurn,
        breakOnDamage: behavior.breakOnDamage,
      });
      return [
        {
          type: 'condition_applied',
          sourceId: effect.sourceId,
          targetId: effect.targetId,
          conditionId: effect.conditionId,
          duration: effect.duration ?? null,
        },
      ];
    }

    case 'apply_modifier':
      context.modifiers.add(effect.targetId, {
        modifierId: effect.modifierId,
        sourceId: effect.sourceId,
        stat: effect.stat,
        value: effect.value,
        remainingRounds: effect.duration,
      });
      return [
        {
          type: 'modifier_applied',
          sourceId: effect.sourceId,
          targetId: effect.targetId,
          modifierId: effect.modifierId,
          stat: effect.stat,
          value: effect.value,
          duration: effect.duration ?? null,
        },
      ];

    case 'flee': {
      const runner = target(context, effect.combatantId);
      runner.status = 'fled';
      context.removeFromQueue(runner.id);
      return [{ type: 'entity_fled', entityId: runner.id, reason: effect.initiator }];
    }

    default: {
      const unreachable: never = effect;
      return unreachable;
    }
  }
}
