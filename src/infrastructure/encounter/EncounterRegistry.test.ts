import { describe, it, expect } from 'vitest';
import { InMemoryEncounterRegistry } from './EncounterRegistry.js';
import { EncounterEngine } from '@/application/combat/EncounterEngine.js';
import { EncounterState } from '@/domain/combat/types.js';
import { FixedDiceService } from '@/infrastructure/game/DiceService.js';
import { EncounterConfigError, EncounterNotFoundError } from '@/utils/errors.js';
import { makeHero, makeMonster } from '@/test-helpers/combatants.js';

function engine(encounterId: string): EncounterEngine {
  return new EncounterEngine({ party: [makeHero()], opposition: [makeMonster()], encounterId });
}

function finished(encounterId: string): EncounterEngine {
  const done = new EncounterEngine({
    party: [makeHero({ controller: 'ai' })],
    opposition: [makeMonster()],
    dice: new FixedDiceService([15, 5]),
    config: { turnOrder: 'roster' },
    encounterId,
  });
  done.runToCompletion();
  return done;
}

describe('InMemoryEncounterRegistry', () => {
  it('stores and looks up encounters by id', () => {
    const registry = new InMemoryEncounterRegistry({ maxActiveEncounters: 5 });
    const first = engine('a');
    registry.add(first);
    registry.add(engine('b'));

    expect(registry.get('a')).toBe(first);
    expect(registry.require('a')).toBe(first);
    expect(registry.get('zzz')).toBeUndefined();
    expect(registry.list()).toEqual(['a', 'b']);
    expect(registry.size).toBe(2);
  });

  it('rejects duplicate ids and enforces the limit', () => {
    const registry = new InMemoryEncounterRegistry({ maxActiveEncounters: 1 });
    registry.add(engine('a'));

    expect(() => registry.add(engine('a'))).toThrow(EncounterConfigError);
    expect(() => registry.add(engine('b'))).toThrow(EncounterConfigError);
  });

  it('does not count finished encounters against the limit', () => {
    const registry = new InMemoryEncounterRegistry({ maxActiveEncounters: 1 });
    const done = finished('a');
    expect(done.state).toBe(EncounterState.ENDED);
    registry.add(done);
    expect(registry.activeCount).toBe(0);

    registry.add(engine('b'));

    expect(registry.list()).toEqual(['b']);
    expect(registry.activeCount).toBe(1);
    expect(() => registry.add(engine('c'))).toThrow('Too many active encounters (limit 1)');
  });

  it('evicts the oldest finished encounter only when room is needed', () => {
    const registry = new InMemoryEncounterRegistry({ maxActiveEncounters: 3 });
    registry.add(finished('a'));
    registry.add(finished('b'));
    registry.add(engine('c'));
    expect(registry.size).toBe(3);

    registry.add(engine('d'));

    expect(registry.list()).toEqual(['b', 'c', 'd']);
    expect(registry.get('a')).toBeUndefined();
    expect(registry.activeCount).toBe(2);
  });

  it('removes encounters', () => {
    const registry = new InMemoryEncounterRegistry({ maxActiveEncounters: 5 });
    registry.add(engine('a'));

    expect(registry.remove('a')).toBe(true);
    expect(registry.remove('a')).toBe(false);
    expect(() => registry.require('a')).toThrow(EncounterNotFoundError);
  });
});
