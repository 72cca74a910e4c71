// Application layer: Temporary stat modifiers with round-based expiry
// Owned by one encounter engine; never shared between encounters

import type { ActiveModifier, ModifiedStat } from '@/domain/combat/types.js';

export type ExpiredModifier = readonly [combatantId: string, modifierId: string];

export class ModifierTracker {
  private modifiers = new Map<string, ActiveModifier[]>();

  /**
   * Append a modifier. Instances from the same source stack.
   */
  add(combatantId: string, modifier: ActiveModifier): void {
    const list = this.modifiers.get(combatantId) ?? [];
    list.push({ ...modifier });
    this.modifiers.set(combatantId, list);
  }

  /**
   * Remove every instance with this id. The only way to clear permanent modifiers.
   * @returns number of instances removed
   */
  remove(combatantId: string, modifierId: string): number {
    const list = this.modifiers.get(combatantId);
    if (!list) return 0;
    const kept = list.filter((m) => m.modifierId !== modifierId);
    this.modifiers.set(combatantId, kept);
    return list.length - kept.length;
  }

  has(combatantId: string, modifierId: string): boolean {
    return (this.modifiers.get(combatantId) ?? []).some((m) => m.modifierId === modifierId);
  }

  getTotal(combatantId: string, stat: ModifiedStat): number {
    let total = 0;
    for (const m of this.modifiers.get(combatantId) ?? []) {
      if (m.stat === stat) total += m.value;
    }
    return total;
  }

  getAll(combatantId: string): ActiveModifier[] {
    return (this.modifiers.get(combatantId) ?? []).map((m) => ({ ...m }));
  }

  /**
   * Decrement finite durations by one and drop those that reach zero.
   * Permanent modifiers are untouched.
   */
  tickRound(): ExpiredModifier[] {
    const expired: ExpiredModifier[] = [];
    for (const [combatantId, list] of this.modifiers) {
      const remaining: ActiveModifier[] = [];
      for (const m of list) {
        if (m.remainingRounds !== undefined) {
          m.remainingRounds -= 1;
          if (m.remainingRounds <= 0) {
            expired.push([combatantId, m.modifierId]);
            continue;
          }
        }
        remaining.push(m);
      }
      this.modifiers.set(combatantId, remaining);
    }
    return expired;
  }
}
