import { Logger } from '@nestjs/common';
import type {
  Action,
  StateAuthority,
  StateDiff,
  WorldState,
} from '../../types/index.js';
import type { StateDiffService } from './state-diff.service.js';

export interface ActionLogEntry {
  seq: number;
  action: Action;
  changes: StateDiff[];
}

/** Process-memory authority: canonical tree plus an append-only action log. */
export class InMemoryStateAuthority implements StateAuthority {
  private readonly logger = new Logger(InMemoryStateAuthority.name);
  private state: WorldState;
  private readonly log: ActionLogEntry[] = [];

  constructor(
    initial: WorldState,
    private readonly applier: StateDiffService,
  ) {
    this.state = structuredClone(initial);
  }

  applyStateChanges(diffs: StateDiff[]): void {
    if (diffs.length === 0) return;
    this.state = this.applier.apply(this.state, diffs);
    this.logger.debug(`Applied ${diffs.length} diff(s)`);
  }

  createSnapshot(): WorldState {
    return structuredClone(this.state);
  }

  record(action: Action, changes: StateDiff[]): ActionLogEntry {
    const entry: ActionLogEntry = {
      seq: this.log.length + 1,
      action: structuredClone(action),
      changes: structuredClone(changes),
    };
    this.log.push(entry);
    return entry;
  }

  get seq(): number {
    return this.log.length;
  }

  entries(): ActionLogEntry[] {
    return structuredClone(this.log);
  }
}
