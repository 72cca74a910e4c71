// Application layer: Tactical providers for AI-controlled combatants

import type { DiceService } from '@/domain/combat/dice.js';
import type { ActionChoice } from '@/domain/combat/events.js';
import { intentKey, intentsEqual, type ActionIntent } from '@/domain/combat/intents.js';
import type { TacticalProvider } from '@/domain/combat/tactics.js';
import type { CombatView } from '@/domain/combat/views.js';
import { EncounterUsageError } from '@/utils/errors.js';

/**
 * Picks uniformly among the offered choices through the dice service,
 * so fixed dice make it deterministic.
 */
export class RandomTacticalProvider implements TacticalProvider {
  constructor(private dice: DiceService) {}

  chooseIntent(_combatantId: string, choices: readonly ActionChoice[], _context: CombatView): ActionIntent {
    return this.dice.choice(choices).intent;
  }
}

export interface ScriptedProviderOptions {
  /** Throw when a scripted intent is not among the offered choices */
  strict?: boolean;
}

/**
 * Replays a queue of intents per combatant, then falls back to the first choice.
 */
export class ScriptedTacticalProvider implements TacticalProvider {
  private queues = new Map<string, ActionIntent[]>();
  private strict: boolean;

  constructor(script: Readonly<Record<string, readonly ActionIntent[]>>, options: ScriptedProviderOptions = {}) {
    for (const [combatantId, intents] of Object.entries(script)) {
      this.queues.set(combatantId, [...intents]);
    }
    this.strict = options.strict ?? false;
  }

  chooseIntent(combatantId: string, choices: readonly ActionChoice[], _context: CombatView): ActionIntent {
    const scripted = this.queues.get(combatantId)?.shift();
    if (!scripted) {
      return choices[0].intent;
    }
    if (this.strict && !choices.some((choice) => intentsEqual(choice.intent, scripted))) {
      throw new EncounterUsageError(`Scripted intent is not available: ${intentKey(scripted)}`, {
        combatantId,
      });
    }
    return scripted;
  }

  remaining(combatantId: string): number {
    return this.queues.get(combatantId)?.length ?? 0;
  }
}
