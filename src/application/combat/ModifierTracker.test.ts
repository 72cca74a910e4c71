import { describe, it, expect } from 'vitest';
import { ModifierTracker } from './ModifierTracker.js';
import { ModifiedStat, type ActiveModifier } from '@/domain/combat/types.js';

function modifier(overrides: Partial<ActiveModifier> = {}): ActiveModifier {
  return {
    modifierId: 'bless_attack',
    sourceId: 'cleric',
    stat: ModifiedStat.ATTACK,
    value: 1,
    ...overrides,
  };
}

describe('ModifierTracker', () => {
  it('sums stacking modifiers per stat', () => {
    const tracker = new ModifierTracker();
    tracker.add('hero', modifier());
    tracker.add('hero', modifier());
    tracker.add('hero', modifier({ modifierId: 'curse', stat: ModifiedStat.ATTACK, value: -3 }));
    tracker.add('hero', modifier({ modifierId: 'shield_ac', stat: ModifiedStat.ARMOR_CLASS, value: 2 }));

    expect(tracker.getTotal('hero', ModifiedStat.ATTACK)).toBe(-1);
    expect(tracker.getTotal('hero', ModifiedStat.ARMOR_CLASS)).toBe(2);
    expect(tracker.getTotal('hero', ModifiedStat.DAMAGE)).toBe(0);
    expect(tracker.getTotal('nobody', ModifiedStat.ATTACK)).toBe(0);
  });

  it('returns copies that do not alias tracker state', () => {
    const tracker = new ModifierTracker();
    const original = modifier({ remainingRounds: 3 });
    tracker.add('hero', original);
    original.value = 99;

    const copies = tracker.getAll('hero');
    copies[0].value = 50;

    expect(tracker.getTotal('hero', ModifiedStat.ATTACK)).toBe(1);
  });

  it.each([1, 2, 5])('expires a %i-round modifier on exactly the last tick', (k) => {
    const tracker = new ModifierTracker();
    tracker.add('hero', modifier({ remainingRounds: k }));

    for (let tick = 1; tick < k; tick++) {
      expect(tracker.tickRound()).toEqual([]);
      expect(tracker.has('hero', 'bless_attack')).toBe(true);
    }
    expect(tracker.tickRound()).toEqual([['hero', 'bless_attack']]);
    expect(tracker.has('hero', 'bless_attack')).toBe(false);
  });

  it('never auto-expires permanent modifiers', () => {
    const tracker = new ModifierTracker();
    tracker.add('hero', modifier({ modifierId: 'ring' }));
    for (let i = 0; i < 50; i++) {
      expect(tracker.tickRound()).toEqual([]);
    }
    expect(tracker.getTotal('hero', ModifiedStat.ATTACK)).toBe(1);
  });

  it('removes every instance explicitly', () => {
    const tracker = new ModifierTracker();
    tracker.add('hero', modifier({ modifierId: 'ring' }));
    tracker.add('hero', modifier({ modifierId: 'ring' }));
    tracker.add('hero', modifier());

    expect(tracker.remove('hero', 'ring')).toBe(2);
    expect(tracker.remove('hero', 'ring')).toBe(0);
    expect(tracker.getAll('hero').map((m) => m.modifierId)).toEqual(['bless_attack']);
  });

  it('reports expirations per combatant in insertion order', () => {
    const tracker = new ModifierTracker();
    tracker.add('b', modifier({ modifierId: 'second', remainingRounds: 1 }));
    tracker.add('a', modifier({ modifierId: 'first', remainingRounds: 1 }));
    tracker.add('b', modifier({ modifierId: 'third', remainingRounds: 1 }));

    expect(tracker.tickRound()).toEqual([
      ['b', 'second'],
      ['b', 'third'],
      ['a', 'first'],
    ]);
  });
});
