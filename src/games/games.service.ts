import { randomUUID } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import { Injectable, Logger } from '@nestjs/common';
import {
  GameNotFoundError,
  GameOverError,
  SequenceConflictError,
  UnknownWeaponError,
} from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { EngineConfigService } from '../engine/engine-config.service.js';
import type { PhaseRecord } from '../engine/phases/phase.js';
import { ReplayService } from '../engine/replay/replay.service.js';
import type { ActionLogEntry, InMemoryStateAuthority } from '../engine/state/state-authority.js';
import type { PhaseManager } from '../engine/turn/phase-manager.js';
import type {
  Action,
  ActionResult,
  AvailableAction,
  Model,
  PhaseType,
  StateDiff,
  Unit,
  WorldState,
} from '../types/index.js';
import type { CreateGameBody } from './dto/create-game.dto.js';

interface GameSession {
  id: string;
  initial: WorldState;
  authority: InMemoryStateAuthority;
  manager: PhaseManager;
  createdAt: Date;
}

export interface GameView {
  game_id: string;
  seq: number;
  phase: PhaseType;
  state: WorldState;
  phase_state: PhaseRecord | null;
  available_actions: AvailableAction[];
}

export interface SubmitActionResponse {
  accepted: boolean;
  seq: number;
  phase: PhaseType;
  result: ActionResult;
  changes: StateDiff[];
  entered_phases: PhaseType[];
  available_actions: AvailableAction[];
}

export interface ReplayCheck {
  game_id: string;
  seq: number;
  consistent: boolean;
  /** seq of the first logged action whose replayed diffs differ. */
  first_divergence: number | null;
}

/** In-memory game sessions; each owns an authority and a phase manager. */
@Injectable()
export class GamesService {
  private readonly logger = new Logger(GamesService.name);
  private readonly sessions = new Map<string, GameSession>();

  constructor(
    private readonly replayService: ReplayService,
    private readonly configService: EngineConfigService,
    private readonly content: ContentLoaderService,
  ) {}

  createGame(body: CreateGameBody): GameView {
    const unknown = [...new Set(body.units.flatMap((u) => u.weapons))].filter(
      (id) => !this.content.getWeapon(id),
    );
    if (unknown.length > 0) {
      throw new UnknownWeaponError(unknown);
    }

    const id = randomUUID();
    const initial = this.buildWorld(id, body);
    const { authority, manager } = this.replayService.createSession(initial);
    this.sessions.set(id, { id, initial, authority, manager, createdAt: new Date() });
    this.logger.log(`Game ${id} created: ${body.units.length} units, ${manager.phaseType}`);
    return this.view(id);
  }

  submitAction(gameId: string, action: Action, expectedSeq: number): SubmitActionResponse {
    const session = this.session(gameId);
    const { authority, manager } = session;
    if (expectedSeq !== authority.seq) {
      throw new SequenceConflictError(authority.seq, expectedSeq);
    }
    if (manager.phaseType === 'GAME_OVER') {
      throw new GameOverError(gameId);
    }

    const { result, changes, entered } = manager.submit(action);
    if (entered.length > 0) {
      this.logger.log(`Game ${gameId} entered ${entered.join(' → ')}`);
    }
    return {
      accepted: result.success,
      seq: authority.seq,
      phase: manager.phaseType,
      result,
      changes,
      entered_phases: entered,
      available_actions: manager.availableActions(),
    };
  }

  getGame(gameId: string): GameView {
    return this.view(gameId);
  }

  getLog(gameId: string): { game_id: string; seq: number; entries: ActionLogEntry[] } {
    const { authority } = this.session(gameId);
    return { game_id: gameId, seq: authority.seq, entries: authority.entries() };
  }

  /** Replays the log from the initial state and compares diffs and the final state. */
  verifyReplay(gameId: string): ReplayCheck {
    const { initial, authority } = this.session(gameId);
    const entries = authority.entries();
    const replayed = this.replayService.replay(
      initial,
      entries.map((e) => e.action),
    );
    const diverged = entries.find(
      (e, i) => !isDeepStrictEqual(e.changes, replayed.steps[i]?.changes),
    );
    const consistent =
      diverged === undefined && isDeepStrictEqual(replayed.state, authority.createSnapshot());
    if (!consistent) this.logger.warn(`Replay of game ${gameId} diverged`);
    return {
      game_id: gameId,
      seq: authority.seq,
      consistent,
      first_divergence: diverged?.seq ?? null,
    };
  }

  private session(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) throw new GameNotFoundError(gameId);
    return session;
  }

  private view(gameId: string): GameView {
    const { authority, manager } = this.session(gameId);
    return {
      game_id: gameId,
      seq: authority.seq,
      phase: manager.phaseType,
      state: authority.createSnapshot(),
      phase_state: manager.phaseState(),
      available_actions: manager.availableActions(),
    };
  }

  private buildWorld(id: string, body: CreateGameBody): WorldState {
    const config = this.configService.get();
    const inBattle = body.start_phase !== 'DEPLOYMENT';
    const units = body.units.map((u): Unit => ({
      id: u.id,
      owner: u.owner,
      status: inBattle ? 'DEPLOYED' : 'UNDEPLOYED',
      models: u.models.map(
        (m, i): Model => ({
          id: m.id ?? `${u.id}-m${i}`,
          position: inBattle && m.position ? { ...m.position } : null,
          rotation: m.rotation,
          base_mm: m.base_mm,
          base_type: m.base_type,
          base_length_mm: m.base_length_mm,
          alive: true,
          current_wounds: u.stats.wounds,
        }),
      ),
      effects: inBattle && u.charged_this_turn ? { charged_this_turn: true } : {},
      meta: {
        name: u.name,
        keywords: u.keywords,
        abilities: u.abilities,
        weapons: u.weapons,
        stats: u.stats,
      },
    }));

    return {
      meta: {
        game_id: id,
        battle_round: 1,
        active_player: body.first_player,
        phase: body.start_phase,
        first_player: inBattle ? body.first_player : null,
        debug_mode: body.debug_mode && config.debugModeAllowed,
        game_over: false,
        rng: { seed: body.seed ?? randomUUID(), cursor: 0 },
        roll_off: null,
      },
      board: body.board,
      players: {
        '1': { cp: config.startingCp, kills: 0 },
        '2': { cp: config.startingCp, kills: 0 },
      },
      units: Object.fromEntries(units.map((u) => [u.id, u])),
    };
  }
}
