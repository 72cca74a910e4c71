// Application layer: Snapshot builder
// Copies engine state into frozen views; never aliases engine-owned objects

import type { EncounterOutcome, EncounterState } from '@/domain/combat/types.js';
import type { CombatView, CombatantView } from '@/domain/combat/views.js';
import type { CombatContext, Combatant } from '@/application/combat/CombatContext.js';
import { deepFreeze } from '@/utils/freeze.js';

export interface ViewMeta {
  encounterId: string;
  state: EncounterState;
  outcome: EncounterOutcome | null;
}

function combatantView(context: CombatContext, combatant: Combatant): CombatantView {
  return {
    id: combatant.id,
    name: combatant.name,
    side: combatant.side,
    kind: combatant.kind,
    hp: Math.max(0, combatant.hp),
    maxHp: combatant.maxHp,
    armorClass: combatant.armorClass,
    status: combatant.status,
    isAlive: combatant.status !== 'dead' && combatant.hp > 0,
    hasFled: combatant.status === 'fled',
    conditions: context.conditions.getAll(combatant.id).map((c) => ({
      conditionId: c.conditionId,
      sourceId: c.sourceId,
      remainingRounds: c.remainingRounds ?? null,
    })),
    modifiers: context.modifiers.getAll(combatant.id).map((m) => ({
      modifierId: m.modifierId,
      sourceId: m.sourceId,
      stat: m.stat,
      value: m.value,
      remainingRounds: m.remainingRounds ?? null,
    })),
    spellSlots: { ...combatant.spellSlots },
    inventory: [...combatant.inventory],
  };
}

export function buildCombatView(context: CombatContext, meta: ViewMeta): CombatView {
  return deepFreeze({
    encounterId: meta.encounterId,
    state: meta.state,
    outcome: meta.outcome,
    roundNumber: context.roundNumber,
    currentCombatantId: context.currentCombatantId,
    combatants: context.roster().map((c) => combatantView(context, c)),
    announcedDeaths: [...context.announcedDeaths].sort(),
  });
}
