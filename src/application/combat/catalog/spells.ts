// Application layer: Spell catalog
// A small static table looked up by spell id, not a rules language

import {
  ModifiedStat,
  TargetMode,
  type CharacterClass,
  type SpellDefinition,
} from '@/domain/combat/types.js';
import { EncounterConfigError } from '@/utils/errors.js';

const ARCANE: ReadonlySet<CharacterClass> = new Set<CharacterClass>(['magic_user', 'elf']);
const DIVINE: ReadonlySet<CharacterClass> = new Set<CharacterClass>(['cleric']);

function define(spell: Omit<SpellDefinition, 'hasSave' | 'saveNegates' | 'modifiers'> & Partial<SpellDefinition>): SpellDefinition {
  return Object.freeze({
    hasSave: false,
    saveNegates: true,
    modifiers: [],
    ...spell,
  });
}

const SPELLS: readonly SpellDefinition[] = [
  define({
    spellId: 'magic_missile',
    name: 'Magic Missile',
    level: 1,
    damageDie: '1d6+1',
    numTargets: 1,
    autoHit: true,
    usableBy: ARCANE,
    targetMode: TargetMode.SINGLE_ENEMY,
  }),
  define({
    spellId: 'sleep',
    name: 'Sleep',
    level: 1,
    numTargets: -1,
    autoHit: true,
    conditionId: 'asleep',
    usableBy: ARCANE,
    targetMode: TargetMode.HD_POOL,
    hdPoolDie: '2d8',
  }),
  define({
    spellId: 'hold_person',
    name: 'Hold Person',
    level: 2,
    numTargets: -1,
    autoHit: true,
    conditionId: 'held',
    conditionDuration: 9,
    usableBy: DIVINE,
    targetMode: TargetMode.ENEMY_GROUP,
    groupSizeDie: '1d4',
    hasSave: true,
  }),
  define({
    spellId: 'light',
    name: 'Light',
    level: 1,
    numTargets: 1,
    autoHit: true,
    conditionId: 'blinded',
    conditionDuration: 12,
    usableBy: new Set<CharacterClass>(['cleric', 'magic_user', 'elf']),
    targetMode: TargetMode.SINGLE_ENEMY,
  }),
  define({
    spellId: 'cure_light_wounds',
    name: 'Cure Light Wounds',
    level: 1,
    numTargets: 1,
    autoHit: true,
    healDie: '1d6+1',
    usableBy: DIVINE,
    targetMode: TargetMode.SINGLE_ALLY,
  }),
  define({
    spellId: 'cause_light_wounds',
    name: 'Cause Light Wounds',
    level: 1,
    numTargets: 1,
    autoHit: false,
    damageDie: '1d6+1',
    usableBy: DIVINE,
    targetMode: TargetMode.SINGLE_ENEMY,
  }),
  define({
    spellId: 'bless',
    name: 'Bless',
    level: 2,
    numTargets: -1,
    autoHit: true,
    usableBy: DIVINE,
    targetMode: TargetMode.ALL_ALLIES,
    modifiers: [
      { modifierId: 'bless_attack', stat: ModifiedStat.ATTACK, value: 1, duration: 6 },
      { modifierId: 'bless_save', stat: ModifiedStat.SAVING_THROW, value: 1, duration: 6 },
    ],
  }),
  define({
    spellId: 'shield',
    name: 'Shield',
    level: 1,
    numTargets: 1,
    autoHit: true,
    usableBy: ARCANE,
    targetMode: TargetMode.SELF,
    modifiers: [{ modifierId: 'shield_ac', stat: ModifiedStat.ARMOR_CLASS, value: 2, duration: 12 }],
  }),
  define({
    spellId: 'fireball',
    name: 'Fireball',
    level: 3,
    damagePerLevel: '1d6',
    numTargets: -1,
    autoHit: true,
    usableBy: ARCANE,
    targetMode: TargetMode.ALL_ENEMIES,
    hasSave: true,
    saveNegates: false,
  }),
  define({
    spellId: 'lightning_bolt',
    name: 'Lightning Bolt',
    level: 3,
    damagePerLevel: '1d6',
    numTargets: -1,
    autoHit: true,
    usableBy: ARCANE,
    targetMode: TargetMode.ALL_ENEMIES,
    hasSave: true,
    saveNegates: false,
  }),
];

export const SPELL_CATALOG: ReadonlyMap<string, SpellDefinition> = new Map(
  SPELLS.map((spell) => [spell.spellId, spell])
);

export function getSpell(spellId: string): SpellDefinition | undefined {
  return SPELL_CATALOG.get(spellId);
}

export function requireSpell(spellId: string): SpellDefinition {
  const spell = SPELL_CATALOG.get(spellId);
  if (!spell) {
    throw new EncounterConfigError(`Unknown spell: ${spellId}`, { spellId });
  }
  return spell;
}
