// Domain layer: Read-only snapshots of an encounter for observers

import type {
  CombatSide,
  CombatantKind,
  CombatantStatus,
  EncounterOutcome,
  EncounterState,
  ModifiedStat,
} from '@/domain/combat/types.js';

export interface ModifierView {
  readonly modifierId: string;
  readonly sourceId: string;
  readonly stat: ModifiedStat;
  readonly value: number;
  readonly remainingRounds: number | null;
}

export interface ConditionView {
  readonly conditionId: string;
  readonly sourceId: string;
  readonly remainingRounds: number | null;
}

export interface CombatantView {
  readonly id: string;
  readonly name: string;
  readonly side: CombatSide;
  readonly kind: CombatantKind;
  readonly hp: number; // clamped at 0
  readonly maxHp: number;
  readonly armorClass: number;
  readonly status: CombatantStatus;
  readonly isAlive: boolean;
  readonly hasFled: boolean;
  readonly conditions: readonly ConditionView[];
  readonly modifiers: readonly ModifierView[];
  readonly spellSlots: Readonly<Record<string, number>>;
  readonly inventory: readonly string[];
}

export interface CombatView {
  readonly encounterId: string;
  readonly state: EncounterState;
  readonly outcome: EncounterOutcome | null;
  readonly roundNumber: number;
  readonly currentCombatantId: string | null;
  readonly combatants: readonly CombatantView[];
  readonly announcedDeaths: readonly string[];
}
