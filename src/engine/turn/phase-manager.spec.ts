import { PhaseManager } from './phase-manager.js';
import { InMemoryStateAuthority } from '../state/state-authority.js';
import { makeUnit, makeWorld } from '../testing/fixtures.js';
import { makePhaseDeps, makePhaseFactory } from '../testing/phase-deps.js';
import type { TestDeps } from '../testing/phase-deps.js';
import type { WorldState } from '../../types/index.js';

function managerFor(world: WorldState, deps: TestDeps = makePhaseDeps()) {
  const authority = new InMemoryStateAuthority(world, deps.applier);
  return { manager: new PhaseManager(authority, makePhaseFactory(deps), deps.config), authority, deps };
}

function battleWorld(): WorldState {
  return makeWorld(
    [
      makeUnit('a', 1, [{ x: 10, y: 5 }], { weapons: ['bolt_rifle'] }),
      makeUnit('b', 2, [{ x: 10, y: 38 }]),
    ],
    { phase: 'SHOOTING' },
  );
}

describe('PhaseManager', () => {
  it('runs deployment and the roll-off into the first shooting phase', () => {
    const world = makeWorld(
      [
        makeUnit('a', 1, [null], { status: 'UNDEPLOYED', weapons: ['bolt_rifle'] }),
        makeUnit('b', 2, [null], { status: 'UNDEPLOYED' }),
      ],
      { phase: 'DEPLOYMENT', first_player: null },
    );
    const { manager, authority } = managerFor(world, makePhaseDeps([2, 5]));

    expect(manager.start()).toEqual(['DEPLOYMENT']);
    manager.submit({ type: 'DEPLOY_UNIT', player: 1, unit_id: 'a', positions: [{ x: 10, y: 5 }] });
    expect(manager.context.activePlayer).toBe(2);

    const deployed = manager.submit({ type: 'DEPLOY_UNIT', player: 2, unit_id: 'b', positions: [{ x: 10, y: 38 }] });
    expect(deployed.entered).toEqual(['ROLL_OFF']);
    expect(deployed.changes.at(-1)).toEqual({ op: 'set', path: 'meta.phase', value: 'ROLL_OFF' });

    manager.submit({ type: 'ROLL_OFF', player: 1 });
    const chosen = manager.submit({ type: 'CHOOSE_FIRST_TURN', player: 2, first_player: 1 });

    expect(chosen.entered).toEqual(['SCOUT', 'SHOOTING']);
    expect(manager.phaseType).toBe('SHOOTING');
    expect(manager.availableActions().map((a) => `${a.type}:${a.unit_id ?? ''}`)).toEqual([
      'SELECT_SHOOTER:a',
      'SKIP_UNIT:a',
      'END_SHOOTING:',
    ]);
    expect(authority.seq).toBe(4);
    expect(authority.createSnapshot().meta).toMatchObject({
      phase: 'SHOOTING',
      first_player: 1,
      active_player: 1,
      roll_off: { winner: 2 },
    });
  });

  it('skips empty phases and moves the round on when play returns to the first player', () => {
    const { manager, authority } = managerFor(battleWorld());
    manager.start();

    const outcome = manager.submit({ type: 'END_SHOOTING', player: 1 });

    expect(outcome.entered).toEqual(['FIGHT', 'SHOOTING', 'FIGHT', 'SHOOTING']);
    expect(authority.createSnapshot().meta).toMatchObject({ battle_round: 2, active_player: 1 });
    expect(manager.phaseType).toBe('SHOOTING');
  });

  it('clears turn effects at the end of the turn', () => {
    const { manager, authority } = managerFor(battleWorld());
    manager.start();
    manager.submit({ type: 'SKIP_UNIT', player: 1, unit_id: 'a' });
    expect(authority.createSnapshot().units.a.effects).toEqual({ has_shot: true });

    const outcome = manager.submit({ type: 'END_SHOOTING', player: 1 });

    expect(outcome.changes).toContainEqual({ op: 'remove', path: 'units.a.effects.has_shot' });
    expect(authority.createSnapshot().units.a.effects).toEqual({});
    expect(outcome.entry?.seq).toBe(2);
  });

  it('rejects an invalid action without touching the state or the log', () => {
    const { manager, authority } = managerFor(battleWorld());
    manager.start();
    const before = authority.createSnapshot();

    const outcome = manager.submit({ type: 'END_SHOOTING', player: 2 });

    expect(outcome.result.success).toBe(false);
    expect(outcome.result.errors).toEqual(['Only the active player (1) can end the shooting phase']);
    expect(outcome.entry).toBeNull();
    expect(authority.seq).toBe(0);
    expect(authority.createSnapshot()).toEqual(before);
  });

  it('ends the game after the last battle round', () => {
    const deps = makePhaseDeps();
    deps.config.update({ maxBattleRounds: 1 });
    const { manager, authority } = managerFor(battleWorld(), deps);
    manager.start();

    const outcome = manager.submit({ type: 'END_SHOOTING', player: 1 });

    expect(outcome.entered).toEqual(['FIGHT', 'SHOOTING', 'FIGHT', 'GAME_OVER']);
    expect(manager.phaseType).toBe('GAME_OVER');
    expect(authority.createSnapshot().meta).toMatchObject({
      phase: 'GAME_OVER',
      game_over: true,
      battle_round: 1,
    });
    expect(manager.availableActions()).toEqual([]);
    expect(manager.submit({ type: 'END_SHOOTING', player: 1 }).result.errors).toEqual(['The game is over']);
  });

  it('writes debug mode through a diff so the next context sees it', () => {
    const { manager, authority } = managerFor(battleWorld());
    manager.start();

    manager.submit({ type: 'TOGGLE_DEBUG_MODE', player: 2, enabled: true });

    expect(manager.context.debugMode).toBe(true);
    expect(authority.entries()[0].changes).toEqual([{ op: 'set', path: 'meta.debug_mode', value: true }]);
    expect(
      manager.submit({
        type: 'DEBUG_MOVE',
        player: 2,
        unit_id: 'b',
        model_id: 'b-m0',
        position: { x: 20, y: 30 },
      }).result.success,
    ).toBe(true);
    expect(authority.createSnapshot().units.b.models[0].position).toEqual({ x: 20, y: 30 });
  });
});
