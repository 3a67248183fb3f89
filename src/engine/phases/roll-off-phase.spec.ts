import { RollOffPhase } from './roll-off-phase.js';
import { makeUnit, makeWorld } from '../testing/fixtures.js';
import { makePhaseDeps, PhaseHarness } from '../testing/phase-deps.js';

function harness(rolls: number[]) {
  const deps = makePhaseDeps(rolls);
  const world = makeWorld([makeUnit('a', 1, [{ x: 10, y: 5 }])], {
    phase: 'ROLL_OFF',
    first_player: null,
  });
  const h = new PhaseHarness(new RollOffPhase(deps), world, deps);
  h.enter();
  return h;
}

describe('RollOffPhase', () => {
  it('re-rolls ties and asks the winner to choose', () => {
    const h = harness([3, 3, 5, 2]);
    expect(h.phase.availableActions().map((a) => `${a.type}:${a.player}`)).toEqual([
      'ROLL_OFF:1',
      'ROLL_OFF:2',
    ]);

    const result = h.submit({ type: 'ROLL_OFF', player: 2 });

    expect(result.changes).toEqual([
      {
        op: 'set',
        path: 'meta.roll_off',
        value: {
          rolls: [
            { player_1: 3, player_2: 3 },
            { player_1: 5, player_2: 2 },
          ],
          winner: 1,
        },
      },
      { op: 'set', path: 'meta.rng.cursor', value: 4 },
    ]);
    expect(result.flow).toMatchObject({ kind: 'AWAITING_INPUT', input: 'FIRST_TURN_CHOICE', player: 1 });
    expect(result.metadata.log).toEqual(['Player 1 wins the roll-off (5 vs 2)']);
    expect(h.phase.shouldCompletePhase()).toBe(false);
  });

  it('lets only the winner pick the first player', () => {
    const h = harness([1, 6]);
    expect(h.validate({ type: 'CHOOSE_FIRST_TURN', player: 2, first_player: 2 }).errors).toEqual([
      'Roll off before choosing the first player',
    ]);
    h.submit({ type: 'ROLL_OFF', player: 1 });

    expect(h.validate({ type: 'ROLL_OFF', player: 1 }).errors).toEqual([
      'The roll-off has already been made',
    ]);
    expect(h.validate({ type: 'CHOOSE_FIRST_TURN', player: 1, first_player: 1 }).errors).toEqual([
      'Only the roll-off winner (player 2) chooses who goes first',
    ]);

    const chosen = h.submit({ type: 'CHOOSE_FIRST_TURN', player: 2, first_player: 1 });

    expect(chosen.changes).toEqual([
      { op: 'set', path: 'meta.first_player', value: 1 },
      { op: 'set', path: 'meta.active_player', value: 1 },
    ]);
    expect(h.phase.shouldCompletePhase()).toBe(true);
    expect(h.phase.availableActions()).toEqual([]);
  });

  it('is already complete when the first player is known', () => {
    const deps = makePhaseDeps();
    const phase = new RollOffPhase(deps);
    const world = makeWorld([], { first_player: 2 });

    expect(phase.enter(world, { activePlayer: 2, battleRound: 1, debugMode: false })).toEqual({
      complete: true,
    });
  });
});
