// Domain layer: Tactical provider contract
// Chooses an intent for a combatant that no external driver controls

import type { ActionChoice } from '@/domain/combat/events.js';
import type { ActionIntent } from '@/domain/combat/intents.js';
import type { CombatView } from '@/domain/combat/views.js';

export interface TacticalProvider {
  /**
   * Pick one of the offered choices (or build an intent of its own; it is
   * validated like any submitted intent).
   * @param choices non-empty, in the engine's offering order
   * @param context frozen snapshot of the encounter at decision time
   */
  chooseIntent(
    combatantId: string,
    choices: readonly ActionChoice[],
    context: CombatView
  ): ActionIntent;
}
