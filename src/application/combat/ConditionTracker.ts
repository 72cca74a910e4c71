// Application layer: Named conditions (held, asleep, blinded)
// Turn-skip enforcement, duration tracking and break-on-damage

import type { ActiveCondition } from '@/domain/combat/types.js';

export interface ConditionBehavior {
  skipTurn: boolean;
  breakOnDamage: boolean;
  attackPenalty: number;
}

export const CONDITION_REGISTRY: ReadonlyMap<string, ConditionBehavior> = new Map([
  ['held', { skipTurn: true, breakOnDamage: false, attackPenalty: 0 }],
  ['asleep', { skipTurn: true, breakOnDamage: true, attackPenalty: 0 }],
  ['blinded', { skipTurn: false, breakOnDamage: false, attackPenalty: -2 }],
]);

const NO_BEHAVIOR: ConditionBehavior = { skipTurn: false, breakOnDamage: false, attackPenalty: 0 };

export function conditionBehavior(conditionId: string): ConditionBehavior {
  return CONDITION_REGISTRY.get(conditionId) ?? NO_BEHAVIOR;
}

export class ConditionTracker {
  private conditions = new Map<string, ActiveCondition[]>();

  add(targetId: string, condition: ActiveCondition): void {
    const list = this.conditions.get(targetId) ?? [];
    list.push({ ...condition });
    this.conditions.set(targetId, list);
  }

  /**
   * Remove the first matching condition.
   */
  remove(targetId: string, conditionId: string): ActiveCondition | undefined {
    const list = this.conditions.get(targetId);
    if (!list) return undefined;
    const index = list.findIndex((c) => c.conditionId === conditionId);
    if (index < 0) return undefined;
    const [removed] = list.splice(index, 1);
    return removed;
  }

  has(targetId: string, conditionId: string): boolean {
    return (this.conditions.get(targetId) ?? []).some((c) => c.conditionId === conditionId);
  }

  getAll(targetId: string): ActiveCondition[] {
    return (this.conditions.get(targetId) ?? []).map((c) => ({ ...c }));
  }

  shouldSkipTurn(targetId: string): boolean {
    return this.skipReason(targetId) !== undefined;
  }

  skipReason(targetId: string): string | undefined {
    return (this.conditions.get(targetId) ?? []).find((c) => c.skipTurn)?.conditionId;
  }

  attackPenalty(targetId: string): number {
    let penalty = 0;
    for (const c of this.conditions.get(targetId) ?? []) {
      penalty += conditionBehavior(c.conditionId).attackPenalty;
    }
    return penalty;
  }

  tickRound(): Array<readonly [combatantId: string, conditionId: string]> {
    const expired: Array<readonly [string, string]> = [];
    for (const [targetId, list] of this.conditions) {
      const remaining: ActiveCondition[] = [];
      for (const c of list) {
        if (c.remainingRounds !== undefined) {
          c.remainingRounds -= 1;
          if (c.remainingRounds <= 0) {
            expired.push([targetId, c.conditionId]);
            continue;
          }
        }
        remaining.push(c);
      }
      this.conditions.set(targetId, remaining);
    }
    return expired;
  }

  /**
   * @returns ids of the conditions removed
   */
  removeBreakOnDamage(targetId: string): string[] {
    const list = this.conditions.get(targetId);
    if (!list) return [];
    const removed = list.filter((c) => c.breakOnDamage).map((c) => c.conditionId);
    this.conditions.set(targetId, list.filter((c) => !c.breakOnDamage));
    return removed;
  }
}
