import { describe, it, expect } from 'vitest';
import { checkMorale } from './morale.js';
import { FixedDiceService } from '@/infrastructure/game/DiceService.js';
import { combatantIn, makeContext, makeHero, makeMonster } from '@/test-helpers/combatants.js';

function kill(context: ReturnType<typeof makeContext>, id: string): void {
  const combatant = combatantIn(context, id);
  combatant.hp = 0;
  combatant.status = 'dead';
}

describe('checkMorale', () => {
  it('routs the group on a failed check after the first death', () => {
    const ctx = makeContext([makeHero()], [makeMonster({ morale: 7 }), makeMonster({ id: 'orc', name: 'Orc' })]);
    kill(ctx, 'gob');
    const dice = new FixedDiceService([5, 4]);

    const { events, effects } = checkMorale(ctx, dice, '2d6');

    expect(events).toEqual([
      {
        type: 'morale_checked',
        monsterMorale: 7,
        roll: 9,
        passed: false,
        trigger: 'first_death',
        checksPassedTotal: 0,
        nowImmune: false,
      },
    ]);
    expect(effects).toEqual([{ type: 'flee', combatantId: 'orc', initiator: 'morale' }]);
  });

  it('fires each trigger once', () => {
    const ctx = makeContext([makeHero()], [makeMonster({ morale: 7 }), makeMonster({ id: 'orc', name: 'Orc' })]);
    kill(ctx, 'gob');
    const dice = new FixedDiceService([1, 1]);

    expect(checkMorale(ctx, dice, '2d6').events).toHaveLength(1);
    expect(checkMorale(ctx, dice, '2d6').events).toEqual([]);
    expect(dice.consumed).toBe(2);
  });

  it('grants immunity after two passed checks', () => {
    const ctx = makeContext(
      [makeHero()],
      [
        makeMonster({ morale: 7 }),
        makeMonster({ id: 'orc', name: 'Orc' }),
        makeMonster({ id: 'rat', name: 'Rat' }),
      ]
    );
    const dice = new FixedDiceService([1, 1]);

    kill(ctx, 'gob');
    expect(checkMorale(ctx, dice, '2d6').events[0]).toMatchObject({
      trigger: 'first_death',
      roll: 2,
      passed: true,
      checksPassedTotal: 1,
      nowImmune: false,
    });

    kill(ctx, 'orc');
    expect(checkMorale(ctx, dice, '2d6').events[0]).toMatchObject({
      trigger: 'half_incapacitated',
      passed: true,
      checksPassedTotal: 2,
      nowImmune: true,
    });
    expect(ctx.morale.immune).toBe(true);
    expect(dice.consumed).toBe(4);
  });

  it('counts fled monsters toward half incapacitated', () => {
    const ctx = makeContext([makeHero()], [makeMonster({ morale: 7 }), makeMonster({ id: 'orc', name: 'Orc' })]);
    combatantIn(ctx, 'orc').status = 'fled';

    const { events, effects } = checkMorale(ctx, new FixedDiceService([6, 6]), '2d6');

    expect(events[0]).toMatchObject({ trigger: 'half_incapacitated', roll: 12, passed: false });
    expect(effects).toEqual([{ type: 'flee', combatantId: 'gob', initiator: 'morale' }]);
  });

  it('does not roll without a trigger', () => {
    const ctx = makeContext([makeHero()], [makeMonster({ morale: 7 }), makeMonster({ id: 'orc', name: 'Orc' })]);
    const dice = new FixedDiceService([1]);

    expect(checkMorale(ctx, dice, '2d6')).toEqual({ events: [], effects: [] });
    expect(dice.consumed).toBe(0);
  });

  it.each([12, undefined])('never checks a group with morale %s', (morale) => {
    const ctx = makeContext([makeHero()], [makeMonster({ morale }), makeMonster({ id: 'orc', name: 'Orc' })]);
    kill(ctx, 'gob');
    const dice = new FixedDiceService([1]);

    expect(checkMorale(ctx, dice, '2d6')).toEqual({ events: [], effects: [] });
    expect(ctx.morale.immune).toBe(true);
    expect(dice.consumed).toBe(0);
  });
});
