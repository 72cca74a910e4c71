import { describe, it, expect } from 'vitest';
import { hitDiceOf, resolveHdPool, resolveRandomGroup, type HdCandidate } from './targeting.js';
import { FixedDiceService, SeededDiceService } from '@/infrastructure/game/DiceService.js';

describe('resolveHdPool', () => {
  const abc: HdCandidate[] = [
    { id: 'A', hitDice: 1 },
    { id: 'B', hitDice: 1 },
    { id: 'C', hitDice: 3 },
  ];

  it('takes the weakest candidates that fit the pool', () => {
    expect(resolveHdPool(abc, 2)).toEqual(['A', 'B']);
    expect(resolveHdPool(abc, 4)).toEqual(['A', 'B']);
    expect(resolveHdPool(abc, 5)).toEqual(['A', 'B', 'C']);
  });

  it('sorts by hit dice, keeping input order for ties', () => {
    const candidates: HdCandidate[] = [
      { id: 'big', hitDice: 4 },
      { id: 'first', hitDice: 2 },
      { id: 'second', hitDice: 2 },
    ];
    expect(resolveHdPool(candidates, 4)).toEqual(['first', 'second']);
  });

  it('stops at the first candidate that does not fit', () => {
    const candidates: HdCandidate[] = [
      { id: 'a', hitDice: 2 },
      { id: 'b', hitDice: 2 },
      { id: 'c', hitDice: 5 },
    ];
    expect(resolveHdPool(candidates, 3)).toEqual(['a']);
  });

  it('floors hit dice at 1', () => {
    const candidates: HdCandidate[] = [
      { id: 'zero', hitDice: 0 },
      { id: 'negative', hitDice: -3 },
    ];
    expect(resolveHdPool(candidates, 1)).toEqual(['zero']);
  });

  it('returns nothing for an empty pool or no candidates', () => {
    expect(resolveHdPool(abc, 0)).toEqual([]);
    expect(resolveHdPool(abc, -2)).toEqual([]);
    expect(resolveHdPool([], 10)).toEqual([]);
  });

  it('never exceeds the pool and never shrinks as the pool grows', () => {
    const candidates: HdCandidate[] = [
      { id: 'a', hitDice: 2 },
      { id: 'b', hitDice: 1 },
      { id: 'c', hitDice: 1 },
      { id: 'd', hitDice: 3 },
      { id: 'e', hitDice: 0 },
    ];
    const hd = new Map(candidates.map((c) => [c.id, Math.max(1, c.hitDice)]));
    let previous: string[] = [];
    for (let pool = 0; pool <= 12; pool++) {
      const selected = resolveHdPool(candidates, pool);
      const total = selected.reduce((sum, id) => sum + (hd.get(id) ?? 0), 0);
      expect(total).toBeLessThanOrEqual(Math.max(0, pool));
      for (const id of previous) {
        expect(selected).toContain(id);
      }
      previous = selected;
    }
  });
});

describe('resolveRandomGroup', () => {
  it('samples without replacement through the dice service', () => {
    expect(resolveRandomGroup(['a', 'b', 'c'], 2, new FixedDiceService([0]))).toEqual(['a', 'b']);
  });

  it('caps the sample at the number of candidates', () => {
    const picked = resolveRandomGroup(['a', 'b', 'c'], 5, new FixedDiceService([1]));
    expect(new Set(picked)).toEqual(new Set(['a', 'b', 'c']));
    expect(picked).toHaveLength(3);
  });

  it('returns nothing for a non-positive count or no candidates', () => {
    const dice = new FixedDiceService([0]);
    expect(resolveRandomGroup(['a', 'b'], 0, dice)).toEqual([]);
    expect(resolveRandomGroup(['a', 'b'], -1, dice)).toEqual([]);
    expect(resolveRandomGroup([], 3, dice)).toEqual([]);
    expect(dice.consumed).toBe(0);
  });

  it('returns distinct members of the candidates', () => {
    const dice = new SeededDiceService(99);
    const candidates = ['a', 'b', 'c', 'd', 'e', 'f'];
    for (let count = 0; count <= 8; count++) {
      const picked = resolveRandomGroup(candidates, count, dice);
      expect(picked).toHaveLength(Math.min(count, candidates.length));
      expect(new Set(picked).size).toBe(picked.length);
      for (const id of picked) {
        expect(candidates).toContain(id);
      }
    }
  });

  it('ignores duplicate candidates', () => {
    expect(resolveRandomGroup(['a', 'a', 'b'], 3, new FixedDiceService([0]))).toEqual(['a', 'b']);
  });
});

describe('hitDiceOf', () => {
  it('counts monster hit dice', () => {
    expect(hitDiceOf({ kind: 'monster', hitDice: '3d8+1' })).toBe(3);
    expect(hitDiceOf({ kind: 'monster' })).toBe(1);
  });

  it('uses character level, floored at 1', () => {
    expect(hitDiceOf({ kind: 'character', level: 4 })).toBe(4);
    expect(hitDiceOf({ kind: 'character', level: 0 })).toBe(1);
    expect(hitDiceOf({ kind: 'character' })).toBe(1);
  });
});
