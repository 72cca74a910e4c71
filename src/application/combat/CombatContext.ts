// Application layer: Mutable combat state for one encounter
// Written only by the engine and its effect applier

import {
  CombatSide,
  type CombatantDefinition,
  type CombatantKind,
  type CombatantStatus,
  type Controller,
} from '@/domain/combat/types.js';
import { ModifierTracker } from '@/application/combat/ModifierTracker.js';
import { ConditionTracker } from '@/application/combat/ConditionTracker.js';
import { EncounterConfigError } from '@/utils/errors.js';

export interface Combatant {
  readonly id: string;
  readonly name: string;
  readonly side: CombatSide;
  readonly kind: CombatantKind;
  readonly definition: Readonly<CombatantDefinition>;
  readonly controller: Controller;
  readonly maxHp: number;
  readonly armorClass: number;
  hp: number;
  status: CombatantStatus;
  spellSlots: Record<string, number>;
  inventory: string[];
}

export interface MoraleState {
  readonly initialMonsterCount: number;
  firstDeathChecked: boolean;
  halfIncapacitatedChecked: boolean;
  checksPassed: number;
  immune: boolean;
}

function toCombatant(definition: CombatantDefinition, side: CombatSide): Combatant {
  return {
    id: definition.id,
    name: definition.name,
    side,
    kind: definition.kind,
    definition: Object.freeze({ ...definition }),
    controller: definition.controller ?? (side === CombatSide.PARTY ? 'external' : 'ai'),
    maxHp: definition.maxHp,
    armorClass: definition.armorClass,
    hp: definition.hp,
    status: 'active',
    spellSlots: { ...definition.spellSlots },
    inventory: [...definition.inventory],
  };
}

export class CombatContext {
  /** Roster order: party as given, then opposition as given */
  readonly combatants: ReadonlyMap<string, Combatant>;
  readonly modifiers = new ModifierTracker();
  readonly conditions = new ConditionTracker();
  readonly announcedDeaths = new Set<string>();
  readonly morale: MoraleState;

  turnQueue: string[] = [];
  currentCombatantId: string | null = null;
  roundNumber = 0;

  constructor(party: readonly CombatantDefinition[], opposition: readonly CombatantDefinition[]) {
    if (party.length === 0 || opposition.length === 0) {
      throw new EncounterConfigError('Both sides need at least one combatant', {
        party: party.length,
        opposition: opposition.length,
      });
    }

    const roster = new Map<string, Combatant>();
    const sides: Array<[readonly CombatantDefinition[], CombatSide]> = [
      [party, CombatSide.PARTY],
      [opposition, CombatSide.MONSTER],
    ];
    for (const [definitions, side] of sides) {
      for (const definition of definitions) {
        if (roster.has(definition.id)) {
          throw new EncounterConfigError(`Duplicate combatant id: ${definition.id}`, { id: definition.id });
        }
        roster.set(definition.id, toCombatant(definition, side));
      }
    }
    this.combatants = roster;
    this.morale = {
      initialMonsterCount: opposition.length,
      firstDeathChecked: false,
      halfIncapacitatedChecked: false,
      checksPassed: 0,
      immune: false,
    };
  }

  get(id: string): Combatant | undefined {
    return this.combatants.get(id);
  }

  roster(): Combatant[] {
    return [...this.combatants.values()];
  }

  isActive(combatant: Combatant): boolean {
    return combatant.status === 'active' && combatant.hp > 0;
  }

  active(side?: CombatSide): Combatant[] {
    return this.roster().filter((c) => this.isActive(c) && (side === undefined || c.side === side));
  }

  opponentsOf(combatant: Combatant): Combatant[] {
    return this.active(combatant.side === CombatSide.PARTY ? CombatSide.MONSTER : CombatSide.PARTY);
  }

  alliesOf(combatant: Combatant): Combatant[] {
    return this.active(combatant.side);
  }

  removeFromQueue(combatantId: string): void {
    this.turnQueue = this.turnQueue.filter((id) => id !== combatantId);
  }
}
