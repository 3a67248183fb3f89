import { RngService, SeededDice, seedHash, splitmix64 } from './rng.service.js';

function rolls(dice: SeededDice, n: number): number[] {
  return Array.from({ length: n }, () => dice.d6());
}

describe('SeededDice', () => {
  it('repeats the same rolls for the same seed', () => {
    expect(rolls(new SeededDice('test-seed'), 30)).toEqual(rolls(new SeededDice('test-seed'), 30));
  });

  it('diverges for different seeds', () => {
    expect(rolls(new SeededDice('seed-1'), 20)).not.toEqual(rolls(new SeededDice('seed-2'), 20));
  });

  it('continues the stream when rebuilt at a cursor', () => {
    const full = new SeededDice('seed-xyz');
    const first = rolls(full, 12);

    const resumed = new RngService().create('seed-xyz', 5);

    expect(rolls(resumed, 7)).toEqual(first.slice(5));
    expect(resumed.cursor).toBe(12);
    expect(resumed.consumed).toBe(7);
  });

  it('advances the cursor by one per die of any size', () => {
    const dice = new SeededDice('track', 10);
    dice.d6();
    dice.d3();
    dice.die(20);
    expect(dice.cursor).toBe(13);
  });

  it('keeps d6 within 1..6 and d3 within 1..3', () => {
    const dice = new SeededDice('faces');
    const d6 = new Set(rolls(dice, 600));
    const d3 = new Set(Array.from({ length: 300 }, () => dice.d3()));

    expect([...d6].sort()).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...d3].sort()).toEqual([1, 2, 3]);
  });
});

describe('splitmix64', () => {
  it('matches the reference output for a zero state', () => {
    expect(splitmix64(0n, 0)).toBe(0xe220a8397b1dcdafn);
  });

  it('hashes the empty seed to the FNV offset basis', () => {
    expect(seedHash('')).toBe(0xcbf29ce484222325n);
  });
});
