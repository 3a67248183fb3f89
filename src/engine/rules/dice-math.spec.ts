import { clampModifier, isSuccess, rollPool, saveTarget, woundTarget } from './dice-math.js';
import { ScriptedDice } from '../testing/scripted-dice.js';

describe('dice math', () => {
  it('caps modifiers at one step either way', () => {
    expect(clampModifier(2)).toBe(1);
    expect(clampModifier(-3)).toBe(-1);
    expect(clampModifier(0)).toBe(0);
  });

  it('treats unmodified 1s and 6s as automatic', () => {
    expect(isSuccess(1, 2, 1)).toBe(false);
    expect(isSuccess(6, 6, -1)).toBe(true);
    expect(isSuccess(2, 3, 1)).toBe(true);
    expect(isSuccess(3, 3, -1)).toBe(false);
  });

  it.each([
    [8, 4, 2],
    [5, 4, 3],
    [4, 4, 4],
    [3, 4, 5],
    [4, 8, 6],
    [3, 5, 5],
  ])('S%i vs T%i wounds on %i+', (s, t, expected) => {
    expect(woundTarget(s, t)).toBe(expected);
  });

  it('applies AP and invulnerable saves', () => {
    expect(saveTarget(3, 0, null)).toBe(3);
    expect(saveTarget(3, -2, null)).toBe(5);
    expect(saveTarget(3, -2, 4)).toBe(4);
    expect(saveTarget(5, -3, null)).toBe(7);
  });

  it('counts successes in a pool', () => {
    const roll = rollPool(new ScriptedDice([1, 3, 4, 6]), 4, 4, 0, 'hit');
    expect(roll).toEqual({ context: 'hit', rolls: [1, 3, 4, 6], threshold: 4, successes: 2 });
  });
});
