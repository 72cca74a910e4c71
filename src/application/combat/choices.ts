// Application layer: Legal action choices for the acting combatant
// Order: melee, ranged, spells, items, flee

import { TargetMode, type ItemDefinition, type SpellDefinition } from '@/domain/combat/types.js';
import type { ActionChoice } from '@/domain/combat/events.js';
import type { CombatContext, Combatant } from '@/application/combat/CombatContext.js';
import { getSpell } from '@/application/combat/catalog/spells.js';
import { getItem } from '@/application/combat/catalog/items.js';
import { castSpell, flee, meleeAttack, rangedAttack, useItem } from '@/application/combat/IntentFactory.js';

export function slotsAt(combatant: Combatant, level: number): number {
  return combatant.spellSlots[String(level)] ?? 0;
}

export function canCast(combatant: Combatant, spell: SpellDefinition): boolean {
  const characterClass = combatant.definition.characterClass;
  return characterClass !== undefined && spell.usableBy.has(characterClass);
}

/**
 * Candidates for a single-target mode; undefined for modes that take no explicit target.
 */
function singleTargets(context: CombatContext, actor: Combatant, mode: TargetMode): Combatant[] | undefined {
  switch (mode) {
    case TargetMode.SINGLE_ENEMY:
      return context.opponentsOf(actor);
    case TargetMode.SINGLE_ALLY:
      return context.alliesOf(actor);
    default:
      return undefined;
  }
}

function spellChoices(context: CombatContext, actor: Combatant, spell: SpellDefinition): ActionChoice[] {
  const base = { spellId: spell.spellId, spellName: spell.name, level: spell.level };
  const targets = singleTargets(context, actor, spell.targetMode);
  if (targets === undefined) {
    return [{ uiKey: 'cast_spell', uiArgs: base, intent: castSpell(actor.id, spell.spellId, spell.level) }];
  }
  return targets.map((target): ActionChoice => ({
    uiKey: 'cast_spell',
    uiArgs: { ...base, targetId: target.id, targetName: target.name },
    intent: castSpell(actor.id, spell.spellId, spell.level, [target.id]),
  }));
}

function itemChoices(context: CombatContext, actor: Combatant, item: ItemDefinition): ActionChoice[] {
  const targets = singleTargets(context, actor, item.targetMode);
  if (targets === undefined) {
    return [{ uiKey: 'use_item', uiArgs: { itemName: item.name }, intent: useItem(actor.id, item.name) }];
  }
  return targets.map((target): ActionChoice => ({
    uiKey: 'use_item',
    uiArgs: { itemName: item.name, targetId: target.id, targetName: target.name },
    intent: useItem(actor.id, item.name, [target.id]),
  }));
}

export function computeChoices(context: CombatContext, actor: Combatant): ActionChoice[] {
  const choices: ActionChoice[] = [];
  const opponents = context.opponentsOf(actor);

  for (const target of opponents) {
    choices.push({
      uiKey: 'attack_target',
      uiArgs: { targetId: target.id, targetName: target.name },
      intent: meleeAttack(actor.id, target.id),
    });
  }

  if (actor.definition.rangedDamage !== undefined) {
    for (const target of opponents) {
      choices.push({
        uiKey: 'ranged_attack_target',
        uiArgs: { targetId: target.id, targetName: target.name },
        intent: rangedAttack(actor.id, target.id),
      });
    }
  }

  for (const spellId of new Set(actor.definition.spells)) {
    const spell = getSpell(spellId);
    if (!spell || !canCast(actor, spell) || slotsAt(actor, spell.level) <= 0) continue;
    choices.push(...spellChoices(context, actor, spell));
  }

  for (const itemName of new Set(actor.inventory)) {
    const item = getItem(itemName);
    if (!item) continue;
    choices.push(...itemChoices(context, actor, item));
  }

  choices.push({ uiKey: 'flee', uiArgs: {}, intent: flee(actor.id) });
  return choices;
}
