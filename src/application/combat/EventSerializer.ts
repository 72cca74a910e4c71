// Application layer: Event serialization
// Encounter events to JSON-safe records, with derived display fields added

import { choiceLabel, type ActionChoice, type EncounterEvent } from '@/domain/combat/events.js';
import type { ActionIntent } from '@/domain/combat/intents.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Convert any value into plain JSON data: maps become objects, sets and
 * tuples become arrays, undefined properties are dropped.
 */
export function normalizeJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(normalizeJson);
  if (value instanceof Set) return [...value].map(normalizeJson);
  if (value instanceof Map) {
    const out: JsonObject = {};
    for (const [key, entry] of value) {
      out[String(key)] = normalizeJson(entry);
    }
    return out;
  }
  if (typeof value === 'object') return normalizeRecord(value);
  return null;
}

function normalizeRecord(value: object): JsonObject {
  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    out[key] = normalizeJson(entry);
  }
  return out;
}

export function serializeIntent(intent: ActionIntent): JsonObject {
  return normalizeRecord(intent);
}

export function serializeChoice(choice: ActionChoice): JsonObject {
  return {
    uiKey: choice.uiKey,
    uiArgs: normalizeRecord(choice.uiArgs),
    intent: serializeIntent(choice.intent),
    label: choiceLabel(choice),
  };
}

/**
 * Serialize one event. Output always carries `type`; re-serializing
 * the same event yields an equal structure.
 */
export function serializeEvent(event: EncounterEvent): JsonObject {
  switch (event.type) {
    case 'need_action':
      return {
        type: event.type,
        combatantId: event.combatantId,
        available: event.available.map(serializeChoice),
      };
    case 'action_rejected':
      return {
        type: event.type,
        combatantId: event.combatantId,
        reasons: event.reasons.map((r) => ({ code: r.code, message: r.message })),
        reason: event.reasons.map((r) => r.message).join('; '),
      };
    case 'initiative_rolled':
      return {
        type: event.type,
        order: event.order.map(([id, roll]) => [id, roll]),
      };
    case 'encounter_started':
    case 'surprise_rolled':
    case 'round_started':
    case 'turn_queue_built':
    case 'turn_started':
    case 'turn_skipped':
    case 'attack_rolled':
    case 'damage_applied':
    case 'healing_applied':
    case 'spell_cast':
    case 'spell_slot_consumed':
    case 'item_used':
    case 'condition_applied':
    case 'condition_expired':
    case 'modifier_applied':
    case 'modifier_expired':
    case 'saving_throw_rolled':
    case 'group_targets_resolved':
    case 'morale_checked':
    case 'entity_died':
    case 'entity_fled':
    case 'victory_determined':
    case 'encounter_faulted':
      return normalizeRecord(event);
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}

export function serializeEvents(events: readonly EncounterEvent[]): JsonObject[] {
  return events.map(serializeEvent);
}
