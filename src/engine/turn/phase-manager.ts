// Orchestrator: one per game session. Drives validate → process → apply-diff →
// advance and owns the turn structure between phases.

import { Logger } from '@nestjs/common';
import type {
  Action,
  ActionResult,
  AvailableAction,
  PhaseType,
  StateDiff,
  UnitEffects,
  ValidationResult,
  WorldState,
} from '../../types/index.js';
import type { EngineConfigService } from '../engine-config.service.js';
import { failed, validation } from '../phases/phase.js';
import type { Phase, PhaseRecord } from '../phases/phase.js';
import type { ActionLogEntry, InMemoryStateAuthority } from '../state/state-authority.js';
import { otherPlayer, paths } from '../state/world-queries.js';
import { contextFrom } from './turn-context.js';
import type { TurnContext } from './turn-context.js';

export interface PhaseSource {
  create(type: PhaseType): Phase | null;
}

export interface SubmitOutcome {
  result: ActionResult;
  /** Phase diffs followed by any turn-structure diffs from advancing. */
  changes: StateDiff[];
  entry: ActionLogEntry | null;
  /** Phases entered while advancing, in order. */
  entered: PhaseType[];
}

const PRE_BATTLE: Partial<Record<PhaseType, PhaseType>> = {
  DEPLOYMENT: 'ROLL_OFF',
  ROLL_OFF: 'SCOUT',
  SCOUT: 'SHOOTING',
  SHOOTING: 'FIGHT',
};

/** Effects that last until the end of the owning player's turn. */
const TURN_EFFECTS: Array<keyof UnitEffects> = [
  'charged_this_turn',
  'charge_from_intervention',
  'has_shot',
  'has_fought',
  'fights_last',
];

const GAME_OVER_ERROR = 'The game is over';

export class PhaseManager {
  private readonly logger = new Logger(PhaseManager.name);
  private phase: Phase | null = null;

  constructor(
    private readonly authority: InMemoryStateAuthority,
    private readonly phases: PhaseSource,
    private readonly config: EngineConfigService,
  ) {}

  /** Enters the phase named in the world state, advancing past empty phases. */
  start(): PhaseType[] {
    return this.enter(this.snapshot().meta.phase, []);
  }

  get context(): TurnContext {
    return contextFrom(this.snapshot());
  }

  get phaseType(): PhaseType {
    return this.phase?.type ?? 'GAME_OVER';
  }

  get currentPhase(): Phase | null {
    return this.phase;
  }

  snapshot(): WorldState {
    return this.authority.createSnapshot();
  }

  phaseState(): PhaseRecord | null {
    return this.phase?.exportState() ?? null;
  }

  validate(action: Action): ValidationResult {
    if (!this.phase) return validation([GAME_OVER_ERROR]);
    return this.phase.validateAction(action, this.context);
  }

  submit(action: Action): SubmitOutcome {
    const phase = this.phase;
    if (!phase) {
      return { result: failed(GAME_OVER_ERROR), changes: [], entry: null, entered: [] };
    }
    const ctx = this.context;
    const check = phase.validateAction(action, ctx);
    if (!check.valid) {
      this.logger.warn(`Rejected ${action.type} from player ${action.player}: ${check.errors.join('; ')}`);
      return { result: failed(check.errors), changes: [], entry: null, entered: [] };
    }

    const result = phase.processAction(action, ctx);
    if (!result.success) {
      return { result, changes: [], entry: null, entered: [] };
    }

    const changes = [...result.changes];
    this.apply(result.changes);
    this.logger.debug(`${action.type} from player ${action.player}: ${result.changes.length} diff(s)`);

    let entered: PhaseType[] = [];
    if (result.flow.kind === 'COMPLETE' || phase.shouldCompletePhase()) {
      entered = this.advance(changes);
    }
    const entry = this.authority.record(action, changes);
    return { result, changes, entry, entered };
  }

  availableActions(): AvailableAction[] {
    return this.phase?.availableActions(this.context) ?? [];
  }

  private apply(diffs: StateDiff[]): void {
    if (diffs.length === 0) return;
    this.authority.applyStateChanges(diffs);
    this.phase?.applyLocalChanges(diffs);
  }

  /** Leaves the current phase and enters the next one, collecting the diffs. */
  private advance(changes: StateDiff[]): PhaseType[] {
    const current = this.phase;
    if (!current) return [];
    current.exit();
    this.phase = null;
    const next = this.nextPhase(current.type, changes);
    return this.enter(next, changes);
  }

  private enter(type: PhaseType, changes: StateDiff[]): PhaseType[] {
    const entered: PhaseType[] = [];
    let next = type;
    for (;;) {
      const state = this.snapshot();
      if (state.meta.phase !== next) this.push(changes, [{ op: 'set', path: 'meta.phase', value: next }]);
      entered.push(next);

      const phase = this.phases.create(next);
      if (!phase) {
        this.logger.log('Game over');
        return entered;
      }
      this.logger.log(`Entering ${next} (round ${this.context.battleRound}, player ${this.context.activePlayer})`);
      const { complete } = phase.enter(this.snapshot(), this.context);
      if (!complete && !phase.shouldCompletePhase()) {
        this.phase = phase;
        return entered;
      }
      phase.exit();
      this.logger.log(`${next} has nothing to do`);
      next = this.nextPhase(next, changes);
    }
  }

  private nextPhase(from: PhaseType, changes: StateDiff[]): PhaseType {
    const following = PRE_BATTLE[from];
    if (following) return following;
    if (from !== 'FIGHT') return 'GAME_OVER';
    return this.endTurn(changes);
  }

  /** Clears turn effects, hands the turn over and moves the round on. */
  private endTurn(changes: StateDiff[]): PhaseType {
    const state = this.snapshot();
    const diffs: StateDiff[] = [];
    for (const unit of Object.values(state.units)) {
      for (const effect of TURN_EFFECTS) {
        if (unit.effects[effect] !== undefined) {
          diffs.push({ op: 'remove', path: paths.unitEffect(unit.id, effect) });
        }
      }
    }

    const nextPlayer = otherPlayer(state.meta.active_player);
    const firstPlayer = state.meta.first_player ?? state.meta.active_player;
    const round = nextPlayer === firstPlayer ? state.meta.battle_round + 1 : state.meta.battle_round;
    const gameOver = round > this.config.get().maxBattleRounds;

    if (gameOver) {
      diffs.push({ op: 'set', path: 'meta.game_over', value: true });
    } else {
      diffs.push({ op: 'set', path: 'meta.active_player', value: nextPlayer });
      if (round !== state.meta.battle_round) {
        diffs.push({ op: 'set', path: 'meta.battle_round', value: round });
      }
    }
    this.push(changes, diffs);
    this.logger.log(
      gameOver ? `Battle round ${state.meta.battle_round} was the last` : `Turn passes to player ${nextPlayer}`,
    );
    return gameOver ? 'GAME_OVER' : 'SHOOTING';
  }

  private push(changes: StateDiff[], diffs: StateDiff[]): void {
    changes.push(...diffs);
    this.authority.applyStateChanges(diffs);
  }
}
