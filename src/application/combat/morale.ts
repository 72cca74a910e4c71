// Application layer: Monster group morale
// One score for the whole group, taken from the first monster in the roster

import { CombatSide } from '@/domain/combat/types.js';
import type { DiceService } from '@/domain/combat/dice.js';
import type { Effect } from '@/domain/combat/effects.js';
import type { MoraleTrigger } from '@/domain/combat/events.js';
import type { CombatContext } from '@/application/combat/CombatContext.js';
import type { Resolution } from '@/application/combat/actions.js';

/** Morale 12 never breaks */
export const FEARLESS_MORALE = 12;
const PASSES_FOR_IMMUNITY = 2;

function pendingTrigger(context: CombatContext): MoraleTrigger | undefined {
  const monsters = context.roster().filter((c) => c.side === CombatSide.MONSTER);
  const state = context.morale;
  const anyDead = monsters.some((c) => c.status === 'dead');
  const incapacitated = monsters.filter((c) => !context.isActive(c)).length;

  const firstDeath = !state.firstDeathChecked && anyDead;
  const half = !state.halfIncapacitatedChecked && incapacitated * 2 >= state.initialMonsterCount;
  // Both can fire on the same death; one roll covers them
  if (firstDeath) state.firstDeathChecked = true;
  if (half) state.halfIncapacitatedChecked = true;

  if (firstDeath) return 'first_death';
  if (half) return 'half_incapacitated';
  return undefined;
}

/**
 * Roll group morale when a trigger has fired since the last check.
 * A failed check makes every active monster flee.
 */
export function checkMorale(context: CombatContext, dice: DiceService, moraleDie: string): Resolution {
  const none: Resolution = { events: [], effects: [] };
  const state = context.morale;
  if (state.immune) return none;

  const monsters = context.roster().filter((c) => c.side === CombatSide.MONSTER);
  const score = monsters[0]?.definition.morale;
  if (score === undefined || score >= FEARLESS_MORALE) {
    state.immune = true;
    return none;
  }

  const active = context.active(CombatSide.MONSTER);
  if (active.length === 0) return none;

  const trigger = pendingTrigger(context);
  if (!trigger) return none;

  const roll = dice.roll(moraleDie);
  const passed = roll <= score;
  if (passed) {
    state.checksPassed += 1;
    if (state.checksPassed >= PASSES_FOR_IMMUNITY) state.immune = true;
  }

  return {
    events: [
      {
        type: 'morale_checked',
        monsterMorale: score,
        roll,
        passed,
        trigger,
        checksPassedTotal: state.checksPassed,
        nowImmune: state.immune,
      },
    ],
    effects: passed
      ? []
      : active.map((monster): Effect => ({ type: 'flee', combatantId: monster.id, initiator: 'morale' })),
  };
}
