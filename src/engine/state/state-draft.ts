import type {
  DiceSource,
  StateDiff,
  WorldState,
} from '../../types/index.js';
import type { DiceFactory } from '../rng/rng.service.js';
import type { StateDiffService } from './state-diff.service.js';

/**
 * Working copy for one action. Later steps of a multi-step resolution read the
 * state produced by earlier steps before anything reaches the authority.
 */
export class StateDraft {
  private working: WorldState;
  private readonly diffs: StateDiff[] = [];

  constructor(
    base: WorldState,
    private readonly applier: StateDiffService,
  ) {
    this.working = base;
  }

  get state(): WorldState {
    return this.working;
  }

  get changes(): StateDiff[] {
    return [...this.diffs];
  }

  push(diffs: StateDiff[]): void {
    if (diffs.length === 0) return;
    this.working = this.applier.apply(this.working, diffs);
    this.diffs.push(...diffs);
  }

  dice(factory: DiceFactory): DiceSource {
    return factory.create(this.working.meta.rng.seed, this.working.meta.rng.cursor);
  }

  /** Persists how far the dice stream advanced so replays roll the same values. */
  commitDice(dice: DiceSource): void {
    if (dice.cursor === this.working.meta.rng.cursor) return;
    this.push([{ op: 'set', path: 'meta.rng.cursor', value: dice.cursor }]);
  }
}
