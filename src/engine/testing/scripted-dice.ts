import type { DiceSource } from '../../types/index.js';
import type { DiceFactory } from '../rng/rng.service.js';

/** Dice that return a fixed script, failing loudly when it runs out. */
export class ScriptedDice implements DiceSource {
  private readonly queue: number[];
  private _cursor: number;

  constructor(rolls: number[], cursor: number = 0) {
    this.queue = [...rolls];
    this._cursor = cursor;
  }

  d6(): number {
    return this.take('d6');
  }

  d3(): number {
    return this.take('d3');
  }

  get cursor(): number {
    return this._cursor;
  }

  get remaining(): number {
    return this.queue.length;
  }

  private take(kind: string): number {
    const next = this.queue.shift();
    if (next === undefined) throw new Error(`Scripted dice exhausted on ${kind}`);
    this._cursor++;
    return next;
  }
}

/** Hands out one shared script regardless of seed/cursor. */
export class ScriptedDiceFactory implements DiceFactory {
  readonly dice: ScriptedDice;

  constructor(rolls: number[] = []) {
    this.dice = new ScriptedDice(rolls);
  }

  create(): DiceSource {
    return this.dice;
  }
}
