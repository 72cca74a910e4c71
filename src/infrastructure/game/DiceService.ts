// Infrastructure layer: Dice service implementations
// Random for production, fixed and seeded for tests and replay

import { randomInt } from 'crypto';
import type { DiceNotation, DiceService } from '@/domain/combat/dice.js';
import { DiceFormatError, EncounterConfigError } from '@/utils/errors.js';

const NOTATION_PATTERN = /^(\d*)d(\d+)([+-]\d+)?$/;
const MAX_DICE = 100;
const MAX_SIDES = 1000;

/**
 * Parse "NdM", "NdM+K", "NdM-K" or "dM". Whitespace and case are ignored.
 */
export function parseDiceNotation(expr: string): DiceNotation {
  const normalized = expr.replace(/\s+/g, '').toLowerCase();
  const match = NOTATION_PATTERN.exec(normalized);
  if (!match) {
    throw new DiceFormatError(`Invalid dice notation: "${expr}". Use NdM, NdM+K or NdM-K`, { expr });
  }

  const [, countText, sidesText, modifierText] = match;
  const count = countText ? parseInt(countText, 10) : 1;
  const sides = parseInt(sidesText, 10);
  const modifier = modifierText ? parseInt(modifierText, 10) : 0;

  if (count < 1 || count > MAX_DICE) {
    throw new DiceFormatError(`Dice count must be between 1 and ${MAX_DICE}, got: ${count}`, { expr });
  }
  if (sides < 1 || sides > MAX_SIDES) {
    throw new DiceFormatError(`Dice must have between 1 and ${MAX_SIDES} sides, got: ${sides}`, { expr });
  }

  return { count, sides, modifier };
}

/**
 * Number of dice in a hit-dice expression like "3d8+2", floored at 1.
 * Unparseable expressions count as a single hit die.
 */
export function diceCount(expr: string | undefined): number {
  if (!expr) return 1;
  try {
    return Math.max(1, parseDiceNotation(expr).count);
  } catch (error) {
    if (error instanceof DiceFormatError) return 1;
    throw error;
  }
}

function wrapIndex(value: number, length: number): number {
  return ((value % length) + length) % length;
}

/**
 * Production dice service backed by crypto.randomInt
 */
export class RandomDiceService implements DiceService {
  roll(expr: string): number {
    const { count, sides, modifier } = parseDiceNotation(expr);
    let total = modifier;
    for (let i = 0; i < count; i++) {
      total += randomInt(1, sides + 1);
    }
    return total;
  }

  d20(): number {
    return randomInt(1, 21);
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[randomInt(0, items.length)];
  }
}

/**
 * Fixed dice service for testing
 * Replays predetermined values in order, cycling when exhausted.
 * Values are returned verbatim, whatever the die size.
 */
export class FixedDiceService implements DiceService {
  private values: readonly number[];
  private index = 0;

  constructor(values: readonly number[]) {
    if (values.length === 0) {
      throw new EncounterConfigError('FixedDiceService requires at least one value');
    }
    if (values.some((v) => !Number.isInteger(v))) {
      throw new EncounterConfigError('FixedDiceService values must be integers', { values: values.join(',') });
    }
    this.values = [...values];
  }

  private next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value;
  }

  roll(expr: string): number {
    const { count, modifier } = parseDiceNotation(expr);
    let total = modifier;
    for (let i = 0; i < count; i++) {
      total += this.next();
    }
    return total;
  }

  d20(): number {
    return this.next();
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[wrapIndex(this.next(), items.length)];
  }

  /**
   * How many values have been consumed so far
   */
  get consumed(): number {
    return this.index;
  }
}

/**
 * Seeded dice service for reproducible rolls
 * Uses a simple Linear Congruential Generator
 * Use when replaying an encounter from its seed
 */
export class SeededDiceService implements DiceService {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  }

  private nextInt(bound: number): number {
    // LCG parameters from glibc
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state % bound;
  }

  roll(expr: string): number {
    const { count, sides, modifier } = parseDiceNotation(expr);
    let total = modifier;
    for (let i = 0; i < count; i++) {
      total += this.nextInt(sides) + 1;
    }
    return total;
  }

  d20(): number {
    return this.nextInt(20) + 1;
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[this.nextInt(items.length)];
  }
}

export type DiceOptions =
  | { mode: 'random' }
  | { mode: 'seeded'; seed: number }
  | { mode: 'fixed'; values: readonly number[] };

export function createDiceService(options: DiceOptions): DiceService {
  switch (options.mode) {
    case 'random':
      return new RandomDiceService();
    case 'seeded':
      return new SeededDiceService(options.seed);
    case 'fixed':
      return new FixedDiceService(options.values);
    default: {
      const unreachable: never = options;
      return unreachable;
    }
  }
}
