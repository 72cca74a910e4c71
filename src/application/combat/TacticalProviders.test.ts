import { describe, it, expect } from 'vitest';
import { RandomTacticalProvider, ScriptedTacticalProvider } from './TacticalProviders.js';
import { computeChoices } from './choices.js';
import { flee, meleeAttack } from './IntentFactory.js';
import { buildCombatView } from './views.js';
import { EncounterState } from '@/domain/combat/types.js';
import { FixedDiceService } from '@/infrastructure/game/DiceService.js';
import { EncounterUsageError } from '@/utils/errors.js';
import { combatantIn, makeContext, makeHero, makeMonster } from '@/test-helpers/combatants.js';

function setup() {
  const context = makeContext([makeHero()], [makeMonster(), makeMonster({ id: 'orc', name: 'Orc' })]);
  const choices = computeChoices(context, combatantIn(context, 'hero'));
  const view = buildCombatView(context, { encounterId: 'enc', state: EncounterState.AWAIT_INTENT, outcome: null });
  return { choices, view };
}

describe('RandomTacticalProvider', () => {
  it('picks the choice the dice select', () => {
    const { choices, view } = setup();
    const provider = new RandomTacticalProvider(new FixedDiceService([1, 5]));

    expect(provider.chooseIntent('hero', choices, view)).toEqual(meleeAttack('hero', 'orc'));
    expect(provider.chooseIntent('hero', choices, view)).toEqual(flee('hero'));
  });
});

describe('ScriptedTacticalProvider', () => {
  it('replays the script, then falls back to the first choice', () => {
    const { choices, view } = setup();
    const provider = new ScriptedTacticalProvider({ hero: [flee('hero')] });

    expect(provider.remaining('hero')).toBe(1);
    expect(provider.chooseIntent('hero', choices, view)).toEqual(flee('hero'));
    expect(provider.remaining('hero')).toBe(0);
    expect(provider.chooseIntent('hero', choices, view)).toEqual(meleeAttack('hero', 'gob'));
  });

  it('passes unavailable intents through unless strict', () => {
    const { choices, view } = setup();
    const loose = new ScriptedTacticalProvider({ hero: [meleeAttack('hero', 'ghost')] });
    expect(loose.chooseIntent('hero', choices, view)).toEqual(meleeAttack('hero', 'ghost'));

    const strict = new ScriptedTacticalProvider({ hero: [meleeAttack('hero', 'ghost')] }, { strict: true });
    expect(() => strict.chooseIntent('hero', choices, view)).toThrow(EncounterUsageError);
  });
});
