import { describe, it, expect } from 'vitest';
import { EventFormatter } from './EventFormatter.js';
import { EncounterEngine } from './EncounterEngine.js';
import { meleeAttack } from './IntentFactory.js';
import { ScriptedTacticalProvider } from './TacticalProviders.js';
import { EncounterOutcome, ModifiedStat } from '@/domain/combat/types.js';
import { FixedDiceService } from '@/infrastructure/game/DiceService.js';
import { makeHero, makeMonster } from '@/test-helpers/combatants.js';

const formatter = new EventFormatter(
  new Map([
    ['hero', 'Hero'],
    ['gob', 'Goblin'],
  ])
);

describe('EventFormatter', () => {
  it('formats combat events with names', () => {
    expect(formatter.format({ type: 'round_started', roundNumber: 3 })).toBe('-- Round 3 --');
    expect(
      formatter.format({
        type: 'attack_rolled',
        attackerId: 'hero',
        defenderId: 'gob',
        roll: 14,
        total: 16,
        needed: 12,
        hit: true,
        critical: false,
      })
    ).toBe('Hero attacks Goblin: 14 (total 16 vs 12) hits');
    expect(
      formatter.format({ type: 'damage_applied', sourceId: 'hero', targetId: 'gob', amount: 4, targetHpAfter: 0 })
    ).toBe('Goblin takes 4 damage from Hero (0 HP left)');
    expect(formatter.format({ type: 'victory_determined', outcome: EncounterOutcome.PARTY_VICTORY })).toBe(
      'Outcome: PARTY_VICTORY'
    );
  });

  it('reports which side was surprised', () => {
    const surprise = { type: 'surprise_rolled', partySurprised: false, monsterSurprised: false } as const;
    expect(formatter.format({ ...surprise, partyRoll: 2, monsterRoll: 5, partySurprised: true })).toBe(
      'The party is surprised (party 2, monsters 5)'
    );
    expect(formatter.format({ ...surprise, partyRoll: 6, monsterRoll: 1, monsterSurprised: true })).toBe(
      'The monsters are surprised (party 6, monsters 1)'
    );
    expect(formatter.format({ ...surprise, partyRoll: 3, monsterRoll: 3 })).toBe('No surprise (party 3, monsters 3)');
  });

  it('distinguishes panic from a chosen retreat', () => {
    expect(formatter.format({ type: 'entity_fled', entityId: 'gob', reason: 'morale' })).toBe('Goblin flees in panic');
    expect(formatter.format({ type: 'entity_fled', entityId: 'hero', reason: 'intent' })).toBe('Hero flees');
  });

  it('formats durations and signed modifiers', () => {
    expect(
      formatter.format({ type: 'condition_applied', sourceId: 'hero', targetId: 'gob', conditionId: 'held', duration: 9 })
    ).toBe('Goblin is held for 9 rounds');
    expect(
      formatter.format({ type: 'condition_applied', sourceId: 'hero', targetId: 'gob', conditionId: 'asleep', duration: null })
    ).toBe('Goblin is asleep');
    expect(
      formatter.format({
        type: 'modifier_applied',
        sourceId: 'hero',
        targetId: 'hero',
        modifierId: 'bless_attack',
        stat: ModifiedStat.ATTACK,
        value: 1,
        duration: 1,
      })
    ).toBe('Hero gains bless_attack (ATTACK +1) for 1 round');
  });

  it('formats morale checks', () => {
    expect(
      formatter.format({
        type: 'morale_checked',
        monsterMorale: 7,
        roll: 9,
        passed: false,
        trigger: 'first_death',
        checksPassedTotal: 0,
        nowImmune: false,
      })
    ).toBe('Monster morale 7: rolled 9, breaks');
  });

  it('falls back to ids for unknown combatants', () => {
    expect(formatter.format({ type: 'entity_died', entityId: 'ghost' })).toBe('ghost dies');
  });

  it('takes names from an engine view', () => {
    const engine = new EncounterEngine({
      party: [makeHero({ controller: 'ai' })],
      opposition: [makeMonster()],
      providers: { hero: new ScriptedTacticalProvider({ hero: [meleeAttack('hero', 'gob')] }) },
      dice: new FixedDiceService([15, 5]),
      config: { turnOrder: 'roster' },
      encounterId: 'enc-1',
    });
    engine.runToCompletion();

    expect(EventFormatter.fromView(engine.getView()).formatAll(engine.getEvents())).toEqual([
      'Encounter enc-1 begins: Hero, Goblin',
      '-- Round 1 --',
      'Turn order: Hero, Goblin',
      "Hero's turn",
      'Hero attacks Goblin: 15 (total 15 vs 12) hits',
      'Goblin takes 5 damage from Hero (0 HP left)',
      'Goblin dies',
      'Outcome: PARTY_VICTORY',
    ]);
  });
});
