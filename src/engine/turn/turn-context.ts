import type { PlayerId, WorldState } from '../../types/index.js';

/** Built once per action by the orchestrator and handed to every phase call. */
export interface TurnContext {
  activePlayer: PlayerId;
  battleRound: number;
  debugMode: boolean;
}

export function contextFrom(state: WorldState): TurnContext {
  return {
    activePlayer: state.meta.active_player,
    battleRound: state.meta.battle_round,
    debugMode: state.meta.debug_mode,
  };
}
