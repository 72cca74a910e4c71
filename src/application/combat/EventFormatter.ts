// Application layer: Human-readable event log lines

import { choiceLabel, type EncounterEvent } from '@/domain/combat/events.js';
import type { CombatView } from '@/domain/combat/views.js';

function rounds(duration: number | null): string {
  if (duration === null) return '';
  return duration === 1 ? ' for 1 round' : ` for ${duration} rounds`;
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

export class EventFormatter {
  constructor(private names: ReadonlyMap<string, string> = new Map()) {}

  static fromView(view: CombatView): EventFormatter {
    return new EventFormatter(new Map(view.combatants.map((c) => [c.id, c.name])));
  }

  name(id: string): string {
    return this.names.get(id) ?? id;
  }

  private list(ids: readonly string[]): string {
    return ids.map((id) => this.name(id)).join(', ');
  }

  format(event: EncounterEvent): string {
    switch (event.type) {
      case 'encounter_started':
        return `Encounter ${event.encounterId} begins: ${this.list(event.combatantIds)}`;
      case 'surprise_rolled': {
        const rolls = `(party ${event.partyRoll}, monsters ${event.monsterRoll})`;
        if (event.partySurprised) return `The party is surprised ${rolls}`;
        if (event.monsterSurprised) return `The monsters are surprised ${rolls}`;
        return `No surprise ${rolls}`;
      }
      case 'round_started':
        return `-- Round ${event.roundNumber} --`;
      case 'initiative_rolled':
        return `Initiative: ${event.order.map(([id, roll]) => `${this.name(id)} ${roll}`).join(', ')}`;
      case 'turn_queue_built':
        return `Turn order: ${this.list(event.queue)}`;
      case 'turn_started':
        return `${this.name(event.combatantId)}'s turn`;
      case 'turn_skipped':
        return `${this.name(event.combatantId)} loses the turn (${event.reason})`;
      case 'need_action':
        return `${this.name(event.combatantId)} must choose: ${event.available.map(choiceLabel).join(', ')}`;
      case 'action_rejected':
        return `${this.name(event.combatantId)}'s action was rejected: ${event.reasons.map((r) => r.message).join('; ')}`;
      case 'attack_rolled': {
        const result = event.critical ? 'critical hit' : event.hit ? 'hits' : 'misses';
        return `${this.name(event.attackerId)} attacks ${this.name(event.defenderId)}: ${event.roll} (total ${event.total} vs ${event.needed}) ${result}`;
      }
      case 'damage_applied':
        return `${this.name(event.targetId)} takes ${event.amount} damage from ${this.name(event.sourceId)} (${event.targetHpAfter} HP left)`;
      case 'healing_applied':
        return `${this.name(event.sourceId)} heals ${this.name(event.targetId)} for ${event.amount} (${event.targetHpAfter} HP)`;
      case 'spell_cast':
        return event.targetIds.length > 0
          ? `${this.name(event.casterId)} casts ${event.spellName} on ${this.list(event.targetIds)}`
          : `${this.name(event.casterId)} casts ${event.spellName}`;
      case 'spell_slot_consumed':
        return `${this.name(event.casterId)} uses a level ${event.level} slot (${event.remaining} left)`;
      case 'item_used':
        return `${this.name(event.actorId)} uses ${event.itemName} (${event.remaining} left)`;
      case 'condition_applied':
        return `${this.name(event.targetId)} is ${event.conditionId}${rounds(event.duration)}`;
      case 'condition_expired':
        return `${this.name(event.combatantId)} is no longer ${event.conditionId}`;
      case 'modifier_applied':
        return `${this.name(event.targetId)} gains ${event.modifierId} (${event.stat} ${signed(event.value)})${rounds(event.duration)}`;
      case 'modifier_expired':
        return `${this.name(event.combatantId)} loses ${event.modifierId}`;
      case 'saving_throw_rolled':
        return `${this.name(event.targetId)} saves against ${event.spellName}: ${event.total} vs ${event.targetNumber} ${event.success ? 'succeeds' : 'fails'}`;
      case 'group_targets_resolved': {
        const roll = event.poolRoll === null ? '' : ` (roll ${event.poolRoll})`;
        const who = event.resolvedTargetIds.length > 0 ? this.list(event.resolvedTargetIds) : 'no one';
        return `${event.spellName} affects ${who}${roll}`;
      }
      case 'morale_checked':
        return `Monster morale ${event.monsterMorale}: rolled ${event.roll}, ${event.passed ? 'holds' : 'breaks'}${event.nowImmune ? ' (now immune)' : ''}`;
      case 'entity_died':
        return `${this.name(event.entityId)} dies`;
      case 'entity_fled':
        return event.reason === 'morale'
          ? `${this.name(event.entityId)} flees in panic`
          : `${this.name(event.entityId)} flees`;
      case 'victory_determined':
        return `Outcome: ${event.outcome}`;
      case 'encounter_faulted':
        return `Encounter faulted in ${event.state}: ${event.errorType}: ${event.message}`;
      default: {
        const unreachable: never = event;
        return unreachable;
      }
    }
  }

  formatAll(events: readonly EncounterEvent[]): string[] {
    return events.map((event) => this.format(event));
  }
}
