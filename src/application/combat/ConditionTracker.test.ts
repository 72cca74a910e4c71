import { describe, it, expect } from 'vitest';
import { ConditionTracker, conditionBehavior } from './ConditionTracker.js';
import type { ActiveCondition } from '@/domain/combat/types.js';

function condition(conditionId: string, remainingRounds?: number): ActiveCondition {
  const behavior = conditionBehavior(conditionId);
  return {
    conditionId,
    sourceId: 'caster',
    remainingRounds,
    skipTurn: behavior.skipTurn,
    breakOnDamage: behavior.breakOnDamage,
  };
}

describe('ConditionTracker', () => {
  it('reports the first turn-skipping condition', () => {
    const tracker = new ConditionTracker();
    tracker.add('gob', condition('blinded', 12));
    expect(tracker.shouldSkipTurn('gob')).toBe(false);

    tracker.add('gob', condition('held', 9));
    expect(tracker.skipReason('gob')).toBe('held');
    expect(tracker.shouldSkipTurn('gob')).toBe(true);
  });

  it('applies the blinded attack penalty', () => {
    const tracker = new ConditionTracker();
    tracker.add('gob', condition('blinded', 12));
    expect(tracker.attackPenalty('gob')).toBe(-2);
    expect(tracker.attackPenalty('hero')).toBe(0);
  });

  it('expires finite conditions on round ticks', () => {
    const tracker = new ConditionTracker();
    tracker.add('gob', condition('held', 2));
    tracker.add('orc', condition('asleep'));

    expect(tracker.tickRound()).toEqual([]);
    expect(tracker.tickRound()).toEqual([['gob', 'held']]);
    expect(tracker.has('gob', 'held')).toBe(false);
    expect(tracker.has('orc', 'asleep')).toBe(true);
  });

  it('breaks sleep on damage but not a hold', () => {
    const tracker = new ConditionTracker();
    tracker.add('gob', condition('asleep'));
    tracker.add('gob', condition('held', 9));

    expect(tracker.removeBreakOnDamage('gob')).toEqual(['asleep']);
    expect(tracker.getAll('gob').map((c) => c.conditionId)).toEqual(['held']);
    expect(tracker.removeBreakOnDamage('nobody')).toEqual([]);
  });

  it('removes the first matching condition', () => {
    const tracker = new ConditionTracker();
    tracker.add('gob', condition('held', 3));
    tracker.add('gob', condition('held', 9));

    expect(tracker.remove('gob', 'held')?.remainingRounds).toBe(3);
    expect(tracker.getAll('gob')).toHaveLength(1);
    expect(tracker.remove('gob', 'asleep')).toBeUndefined();
  });
});
