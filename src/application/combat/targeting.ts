// Application layer: Targeting resolver
// Pure functions over candidate lists; no engine state

import type { DiceService } from '@/domain/combat/dice.js';
import type { CombatantDefinition } from '@/domain/combat/types.js';
import { diceCount } from '@/infrastructure/game/DiceService.js';

export interface HdCandidate {
  readonly id: string;
  readonly hitDice: number;
}

/**
 * Select the weakest candidates whose summed hit dice fit in the pool.
 * Ties keep input order; selection stops at the first candidate that does not fit.
 */
export function resolveHdPool(candidates: readonly HdCandidate[], poolTotal: number): string[] {
  if (poolTotal <= 0 || candidates.length === 0) return [];

  const ordered = candidates
    .map((candidate, index) => ({ id: candidate.id, hd: Math.max(1, candidate.hitDice), index }))
    .sort((a, b) => a.hd - b.hd || a.index - b.index);

  const selected: string[] = [];
  let remaining = poolTotal;
  for (const candidate of ordered) {
    if (candidate.hd > remaining) break;
    selected.push(candidate.id);
    remaining -= candidate.hd;
  }
  return selected;
}

/**
 * Sample min(count, candidates) distinct ids without replacement.
 */
export function resolveRandomGroup(
  candidates: readonly string[],
  count: number,
  dice: DiceService
): string[] {
  const pool = [...new Set(candidates)];
  const wanted = Math.min(Math.floor(count), pool.length);
  const selected: string[] = [];
  while (selected.length < wanted) {
    const picked = dice.choice(pool);
    selected.push(picked);
    pool.splice(pool.indexOf(picked), 1);
  }
  return selected;
}

/**
 * Effective hit dice: monsters count the dice in their hit-dice roll,
 * characters use level. Both floor at 1.
 */
export function hitDiceOf(definition: Pick<CombatantDefinition, 'kind' | 'hitDice' | 'level'>): number {
  switch (definition.kind) {
    case 'monster':
      return diceCount(definition.hitDice);
    case 'character':
      return Math.max(1, definition.level ?? 1);
    default:
      return 1;
  }
}
