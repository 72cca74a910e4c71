// Application layer: Intent validation and resolution
// Resolution rolls dice and produces events plus effects; it never mutates state

import type { DiceService } from '@/domain/combat/dice.js';
import type { Effect } from '@/domain/combat/effects.js';
import { RejectionCode, type EncounterEvent, type Rejection } from '@/domain/combat/events.js';
import type {
  ActionIntent,
  CastSpellIntent,
  MeleeAttackIntent,
  RangedAttackIntent,
  UseItemIntent,
} from '@/domain/combat/intents.js';
import {
  ModifiedStat,
  TargetMode,
  type ItemDefinition,
  type SpellDefinition,
} from '@/domain/combat/types.js';
import type { CombatContext, Combatant } from '@/application/combat/CombatContext.js';
import { canCast, slotsAt } from '@/application/combat/choices.js';
import { getSpell, requireSpell } from '@/application/combat/catalog/spells.js';
import { getItem, requireItem } from '@/application/combat/catalog/items.js';
import { hitDiceOf, resolveHdPool, resolveRandomGroup } from '@/application/combat/targeting.js';

export interface Resolution {
  events: EncounterEvent[];
  effects: Effect[];
}

export type ResolutionStep =
  | { readonly kind: 'event'; readonly event: EncounterEvent }
  | { readonly kind: 'effect'; readonly effect: Effect };

export interface ActionResolution extends Resolution {
  /** Events and effects interleaved in the order they were produced */
  steps: ResolutionStep[];
}

class ResolutionBuilder {
  private readonly events: EncounterEvent[] = [];
  private readonly effects: Effect[] = [];
  private readonly steps: ResolutionStep[] = [];

  event(event: EncounterEvent): void {
    this.events.push(event);
    this.steps.push({ kind: 'event', event });
  }

  effect(effect: Effect): void {
    this.effects.push(effect);
    this.steps.push({ kind: 'effect', effect });
  }

  build(): ActionResolution {
    return { events: this.events, effects: this.effects, steps: this.steps };
  }
}

const DEFAULT_HD_POOL_DIE = '2d8';
const DEFAULT_GROUP_SIZE_DIE = '1d4';

function reject(code: RejectionCode, message: string): Rejection {
  return { code, message };
}

// ============================================================================
// Validation
// ============================================================================

function validateOpponent(context: CombatContext, actor: Combatant, targetId: string): Rejection | undefined {
  const target = context.get(targetId);
  if (!target || !context.isActive(target)) {
    return reject(RejectionCode.INVALID_TARGET, `Target ${targetId} is not an active combatant`);
  }
  if (target.side === actor.side) {
    return reject(RejectionCode.TARGET_NOT_OPPONENT, `${target.name} is not an opponent`);
  }
  return undefined;
}

function validateTargets(
  context: CombatContext,
  actor: Combatant,
  mode: TargetMode,
  targetIds: readonly string[]
): Rejection | undefined {
  switch (mode) {
    case TargetMode.SINGLE_ENEMY:
    case TargetMode.SINGLE_ALLY: {
      if (targetIds.length !== 1) {
        return reject(RejectionCode.WRONG_TARGET_COUNT, `Expected exactly one target, got ${targetIds.length}`);
      }
      const [targetId] = targetIds;
      if (mode === TargetMode.SINGLE_ENEMY) {
        return validateOpponent(context, actor, targetId);
      }
      const target = context.get(targetId);
      if (!target || !context.isActive(target)) {
        return reject(RejectionCode.INVALID_TARGET, `Target ${targetId} is not an active combatant`);
      }
      if (target.side !== actor.side) {
        return reject(RejectionCode.TARGET_NOT_ALLY, `${target.name} is not an ally`);
      }
      return undefined;
    }
    case TargetMode.SELF:
      if (targetIds.length > 1) {
        return reject(RejectionCode.WRONG_TARGET_COUNT, 'Self-targeted actions take no other targets');
      }
      if (targetIds.length === 1 && targetIds[0] !== actor.id) {
        return reject(RejectionCode.INVALID_TARGET, 'Self-targeted actions can only target the actor');
      }
      return undefined;
    default:
      if (targetIds.length > 0) {
        return reject(RejectionCode.WRONG_TARGET_COUNT, `Targets for ${mode} are chosen by the engine`);
      }
      return undefined;
  }
}

function validateSpell(context: CombatContext, actor: Combatant, intent: CastSpellIntent): Rejection | undefined {
  const spell = getSpell(intent.spellId);
  if (!spell) {
    return reject(RejectionCode.UNKNOWN_SPELL, `Unknown spell: ${intent.spellId}`);
  }
  if (!actor.definition.spells.includes(spell.spellId)) {
    return reject(RejectionCode.SPELL_NOT_KNOWN, `${actor.name} does not know ${spell.name}`);
  }
  if (!canCast(actor, spell)) {
    return reject(RejectionCode.INELIGIBLE_CASTER, `${actor.name} cannot cast ${spell.name}`);
  }
  if (intent.slotLevel !== spell.level) {
    return reject(
      RejectionCode.SLOT_LEVEL_MISMATCH,
      `${spell.name} is level ${spell.level}, slot level ${intent.slotLevel} given`
    );
  }
  if (slotsAt(actor, intent.slotLevel) <= 0) {
    return reject(RejectionCode.NO_SPELL_SLOT, `No level ${intent.slotLevel} spell slots remaining`);
  }
  return validateTargets(context, actor, spell.targetMode, intent.targetIds);
}

function validateItem(context: CombatContext, actor: Combatant, intent: UseItemIntent): Rejection | undefined {
  const item = getItem(intent.itemName);
  if (!item) {
    return reject(RejectionCode.UNKNOWN_ITEM, `Unknown item: ${intent.itemName}`);
  }
  if (!actor.inventory.includes(item.name)) {
    return reject(RejectionCode.ITEM_NOT_IN_INVENTORY, `${actor.name} has no ${item.name}`);
  }
  return validateTargets(context, actor, item.targetMode, intent.targetIds);
}

/**
 * Check an intent against current state.
 * @returns the first rejection found, or undefined when the intent is legal
 */
export function validateIntent(
  context: CombatContext,
  intent: ActionIntent,
  currentCombatantId: string | null
): Rejection | undefined {
  const actor = context.get(intent.actorId);
  if (!actor) {
    return reject(RejectionCode.INVALID_ACTOR, `Unknown combatant: ${intent.actorId}`);
  }
  if (actor.id !== currentCombatantId) {
    return reject(RejectionCode.NOT_CURRENT_COMBATANT, `It is not ${actor.name}'s turn`);
  }
  if (!context.isActive(actor)) {
    return reject(RejectionCode.ACTOR_INACTIVE, `${actor.name} can no longer act`);
  }

  switch (intent.type) {
    case 'melee_attack':
      return validateOpponent(context, actor, intent.targetId);
    case 'ranged_attack':
      if (actor.definition.rangedDamage === undefined) {
        return reject(RejectionCode.NO_RANGED_WEAPON, `${actor.name} has no ranged weapon`);
      }
      return validateOpponent(context, actor, intent.targetId);
    case 'cast_spell':
      return validateSpell(context, actor, intent);
    case 'use_item':
      return validateItem(context, actor, intent);
    case 'flee':
      return undefined;
    default: {
      const unreachable: never = intent;
      return unreachable;
    }
  }
}

// ============================================================================
// Resolution
// ============================================================================

interface AttackOutcome {
  event: EncounterEvent;
  hit: boolean;
  critical: boolean;
}

/**
 * Ascending AC: natural 1 misses, natural 20 hits and is critical.
 */
function rollToHit(context: CombatContext, attacker: Combatant, defender: Combatant, dice: DiceService): AttackOutcome {
  const roll = dice.d20();
  const bonus =
    attacker.definition.attackBonus +
    context.modifiers.getTotal(attacker.id, ModifiedStat.ATTACK) +
    context.conditions.attackPenalty(attacker.id);
  const total = roll + bonus;
  const needed = defender.armorClass + context.modifiers.getTotal(defender.id, ModifiedStat.ARMOR_CLASS);
  const critical = roll === 20;
  const hit = critical || (roll !== 1 && total >= needed);

  return {
    event: {
      type: 'attack_rolled',
      attackerId: attacker.id,
      defenderId: defender.id,
      roll,
      total,
      needed,
      hit,
      critical,
    },
    hit,
    critical,
  };
}

function rollDamage(context: CombatContext, attacker: Combatant, expr: string, critical: boolean, dice: DiceService): number {
  let amount = dice.roll(expr) + context.modifiers.getTotal(attacker.id, ModifiedStat.DAMAGE);
  if (critical) amount = Math.ceil(amount * 1.5);
  return Math.max(1, amount);
}

function resolveWeaponAttack(
  context: CombatContext,
  intent: MeleeAttackIntent | RangedAttackIntent,
  dice: DiceService
): ActionResolution {
  const attacker = requireCombatant(context, intent.actorId);
  const defender = requireCombatant(context, intent.targetId);
  const ranged = intent.type === 'ranged_attack';
  const expr = ranged ? (attacker.definition.rangedDamage ?? attacker.definition.damage) : attacker.definition.damage;
  const attacks = !ranged && attacker.kind === 'monster' ? attacker.definition.attacks : 1;

  const resolution = new ResolutionBuilder();
  let defenderHp = defender.hp;

  for (let i = 0; i < attacks && defenderHp > 0; i++) {
    const attack = rollToHit(context, attacker, defender, dice);
    resolution.event(attack.event);
    if (!attack.hit) continue;
    const amount = rollDamage(context, attacker, expr, attack.critical, dice);
    resolution.effect({ type: 'damage', sourceId: attacker.id, targetId: defender.id, amount });
    defenderHp -= amount;
  }

  return resolution.build();
}

function rollSave(
  context: CombatContext,
  target: Combatant,
  spellName: string,
  dice: DiceService
): { event: EncounterEvent; success: boolean } {
  const roll = dice.d20();
  const total = roll + context.modifiers.getTotal(target.id, ModifiedStat.SAVING_THROW);
  const targetNumber = target.definition.saveTarget;
  const success = total >= targetNumber;
  return {
    event: { type: 'saving_throw_rolled', targetId: target.id, spellName, roll, total, targetNumber, success },
    success,
  };
}

interface ResolvedTargets {
  targetIds: string[];
  poolRoll: number | null;
  grouped: boolean;
}

function resolveSpellTargets(
  context: CombatContext,
  caster: Combatant,
  spell: SpellDefinition,
  intent: CastSpellIntent,
  dice: DiceService
): ResolvedTargets {
  switch (spell.targetMode) {
    case TargetMode.SINGLE_ENEMY:
    case TargetMode.SINGLE_ALLY:
      return { targetIds: [...intent.targetIds], poolRoll: null, grouped: false };
    case TargetMode.SELF:
      return { targetIds: [caster.id], poolRoll: null, grouped: false };
    case TargetMode.ALL_ENEMIES:
      return { targetIds: context.opponentsOf(caster).map((c) => c.id), poolRoll: null, grouped: false };
    case TargetMode.ALL_ALLIES:
      return { targetIds: context.alliesOf(caster).map((c) => c.id), poolRoll: null, grouped: false };
    case TargetMode.HD_POOL: {
      const poolRoll = dice.roll(spell.hdPoolDie ?? DEFAULT_HD_POOL_DIE);
      const candidates = context
        .opponentsOf(caster)
        .map((c) => ({ id: c.id, hitDice: hitDiceOf(c.definition) }));
      return { targetIds: resolveHdPool(candidates, poolRoll), poolRoll, grouped: true };
    }
    case TargetMode.ENEMY_GROUP: {
      const poolRoll = dice.roll(spell.groupSizeDie ?? DEFAULT_GROUP_SIZE_DIE);
      const candidates = context.opponentsOf(caster).map((c) => c.id);
      return { targetIds: resolveRandomGroup(candidates, poolRoll, dice), poolRoll, grouped: true };
    }
    default: {
      const unreachable: never = spell.targetMode;
      return unreachable;
    }
  }
}

/**
 * Raw spell damage: a flat die, or a die rolled once per caster level.
 */
function rollSpellDamage(caster: Combatant, spell: SpellDefinition, dice: DiceService): number | undefined {
  if (spell.damageDie) {
    return dice.roll(spell.damageDie);
  }
  if (spell.damagePerLevel) {
    const casterLevel = Math.max(1, caster.definition.level ?? 1);
    let total = 0;
    for (let i = 0; i < casterLevel; i++) {
      total += dice.roll(spell.damagePerLevel);
    }
    return total;
  }
  return undefined;
}

function resolveSpell(context: CombatContext, intent: CastSpellIntent, dice: DiceService): ActionResolution {
  const caster = requireCombatant(context, intent.actorId);
  const spell = requireSpell(intent.spellId);
  const resolved = resolveSpellTargets(context, caster, spell, intent, dice);

  const resolution = new ResolutionBuilder();
  resolution.event({
    type: 'spell_cast',
    casterId: caster.id,
    spellId: spell.spellId,
    spellName: spell.name,
    targetIds: resolved.targetIds,
  });
  if (resolved.grouped) {
    resolution.event({
      type: 'group_targets_resolved',
      spellName: spell.name,
      poolRoll: resolved.poolRoll,
      resolvedTargetIds: resolved.targetIds,
    });
  }
  resolution.effect({ type: 'consume_slot', casterId: caster.id, level: intent.slotLevel });

  for (const targetId of resolved.targetIds) {
    const target = requireCombatant(context, targetId);

    let critical = false;
    if (!spell.autoHit) {
      const attack = rollToHit(context, caster, target, dice);
      resolution.event(attack.event);
      if (!attack.hit) continue;
      critical = attack.critical;
    }

    let saved = false;
    if (spell.hasSave) {
      const save = rollSave(context, target, spell.name, dice);
      resolution.event(save.event);
      saved = save.success;
      if (saved && spell.saveNegates) continue;
    }

    const rawDamage = rollSpellDamage(caster, spell, dice);
    if (rawDamage !== undefined) {
      let amount = rawDamage;
      if (critical) amount = Math.ceil(amount * 1.5);
      if (saved) amount = Math.floor(amount / 2);
      resolution.effect({ type: 'damage', sourceId: caster.id, targetId, amount: Math.max(1, amount) });
    }
    if (spell.healDie) {
      resolution.effect({ type: 'heal', sourceId: caster.id, targetId, amount: Math.max(1, dice.roll(spell.healDie)) });
    }
    if (spell.conditionId && !saved) {
      resolution.effect({
        type: 'apply_condition',
        sourceId: caster.id,
        targetId,
        conditionId: spell.conditionId,
        duration: spell.conditionDuration,
      });
    }
    for (const modifier of spell.modifiers) {
      resolution.effect({
        type: 'apply_modifier',
        sourceId: caster.id,
        targetId,
        modifierId: modifier.modifierId,
        stat: modifier.stat,
        value: modifier.value,
        duration: modifier.duration,
      });
    }
  }

  return resolution.build();
}

function resolveItemTargets(context: CombatContext, actor: Combatant, item: ItemDefinition, intent: UseItemIntent): string[] {
  switch (item.targetMode) {
    case TargetMode.SELF:
      return [actor.id];
    case TargetMode.ALL_ENEMIES:
      return context.opponentsOf(actor).map((c) => c.id);
    case TargetMode.ALL_ALLIES:
      return context.alliesOf(actor).map((c) => c.id);
    default:
      return [...intent.targetIds];
  }
}

function resolveItem(context: CombatContext, intent: UseItemIntent, dice: DiceService): ActionResolution {
  const actor = requireCombatant(context, intent.actorId);
  const item = requireItem(intent.itemName);
  const targetIds = resolveItemTargets(context, actor, item, intent);

  const resolution = new ResolutionBuilder();
  resolution.effect({ type: 'consume_item', actorId: actor.id, itemName: item.name, targetIds });

  for (const targetId of targetIds) {
    const target = requireCombatant(context, targetId);
    let critical = false;
    if (item.requiresAttackRoll) {
      const attack = rollToHit(context, actor, target, dice);
      resolution.event(attack.event);
      if (!attack.hit) continue;
      critical = attack.critical;
    }
    if (item.damageDie) {
      let amount = dice.roll(item.damageDie);
      if (critical) amount = Math.ceil(amount * 1.5);
      resolution.effect({ type: 'damage', sourceId: actor.id, targetId, amount: Math.max(1, amount) });
    }
    if (item.healDie) {
      resolution.effect({ type: 'heal', sourceId: actor.id, targetId, amount: Math.max(1, dice.roll(item.healDie)) });
    }
  }

  return resolution.build();
}

/**
 * Turn a validated intent into resolution events and the effects to apply.
 */
export function resolveIntent(context: CombatContext, intent: ActionIntent, dice: DiceService): ActionResolution {
  switch (intent.type) {
    case 'melee_attack':
    case 'ranged_attack':
      return resolveWeaponAttack(context, intent, dice);
    case 'cast_spell':
      return resolveSpell(context, intent, dice);
    case 'use_item':
      return resolveItem(context, intent, dice);
    case 'flee': {
      const resolution = new ResolutionBuilder();
      resolution.effect({ type: 'flee', combatantId: intent.actorId, initiator: 'intent' });
      return resolution.build();
    }
    default: {
      const unreachable: never = intent;
      return unreachable;
    }
  }
}

// Validation runs first, so this only fails on an internal inconsistency
function requireCombatant(context: CombatContext, id: string): Combatant {
  const combatant = context.get(id);
  if (!combatant) {
    throw new Error(`Combatant vanished during resolution: ${id}`);
  }
  return combatant;
}

