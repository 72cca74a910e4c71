// Application layer: Input schemas
// Combatant definitions and intents arriving from outside the engine

import { z } from 'zod';
import { CHARACTER_CLASSES, type CombatantDefinition } from '@/domain/combat/types.js';
import type { ActionIntent } from '@/domain/combat/intents.js';
import { parseDiceNotation } from '@/infrastructure/game/DiceService.js';
import { getSpell } from '@/application/combat/catalog/spells.js';
import { getItem } from '@/application/combat/catalog/items.js';

function isDiceNotation(expr: string): boolean {
  try {
    parseDiceNotation(expr);
    return true;
  } catch {
    return false;
  }
}

const DiceExpression = z.string().refine(isDiceNotation, {
  message: 'Invalid dice notation (expected NdM, NdM+K or NdM-K)',
});

export const CombatantDefinitionSchema = z
  .object({
    id: z.string().min(1).max(100),
    name: z.string().min(1).max(100),
    kind: z.enum(['character', 'monster']),
    hp: z.number().int().min(1, { message: 'Combatants must start with at least 1 hp' }),
    maxHp: z.number().int().positive().optional(),
    armorClass: z.number().int(),
    attackBonus: z.number().int().default(0),
    damage: DiceExpression.default('1d6'),
    attacks: z.number().int().min(1).max(10).default(1),
    rangedDamage: DiceExpression.optional(),
    saveTarget: z.number().int().default(15),
    morale: z.number().int().min(2).max(12).optional(),
    characterClass: z.enum(CHARACTER_CLASSES).optional(),
    level: z.number().int().optional(),
    hitDice: DiceExpression.optional(),
    spellSlots: z.record(z.string().regex(/^\d+$/), z.number().int().min(0)).default({}),
    spells: z
      .array(z.string().refine((id) => getSpell(id) !== undefined, { message: 'Unknown spell id' }))
      .default([]),
    inventory: z
      .array(z.string().refine((name) => getItem(name) !== undefined, { message: 'Unknown combat item' }))
      .default([]),
    controller: z.enum(['ai', 'external']).optional(),
  })
  .transform((data): CombatantDefinition => ({
    ...data,
    maxHp: data.maxHp ?? data.hp,
  }));

export type CombatantInput = z.input<typeof CombatantDefinitionSchema>;

const TargetIds = z.array(z.string().min(1)).default([]);

export const ActionIntentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('melee_attack'), actorId: z.string().min(1), targetId: z.string().min(1) }),
  z.object({ type: z.literal('ranged_attack'), actorId: z.string().min(1), targetId: z.string().min(1) }),
  z.object({
    type: z.literal('cast_spell'),
    actorId: z.string().min(1),
    spellId: z.string().min(1),
    slotLevel: z.number().int().min(1).optional(),
    targetIds: TargetIds,
  }),
  z.object({
    type: z.literal('use_item'),
    actorId: z.string().min(1),
    itemName: z.string().min(1),
    targetIds: TargetIds,
  }),
  z.object({ type: z.literal('flee'), actorId: z.string().min(1) }),
]);

export type ActionIntentInput = z.input<typeof ActionIntentSchema>;

/**
 * Parse an intent from untrusted input. Catalog lookups are left to
 * validation, so an unknown spell becomes a rejection rather than an error.
 */
export function parseIntent(input: unknown): ActionIntent {
  const intent = ActionIntentSchema.parse(input);
  switch (intent.type) {
    case 'cast_spell':
      return Object.freeze({
        ...intent,
        slotLevel: intent.slotLevel ?? getSpell(intent.spellId)?.level ?? 1,
        targetIds: Object.freeze([...intent.targetIds]),
      });
    case 'use_item':
      return Object.freeze({ ...intent, targetIds: Object.freeze([...intent.targetIds]) });
    default:
      return Object.freeze({ ...intent });
  }
}

export const DiceOptionsSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('random') }),
  z.object({ mode: z.literal('seeded'), seed: z.number().int() }),
  z.object({ mode: z.literal('fixed'), values: z.array(z.number().int()).min(1) }),
]);

export const EngineConfigSchema = z.object({
  maxSteps: z.number().int().min(1).max(100_000).optional(),
  turnOrder: z.enum(['initiative', 'roster']).optional(),
  initiativeDie: DiceExpression.optional(),
  moraleDie: DiceExpression.optional(),
  surprise: z.boolean().optional(),
});
