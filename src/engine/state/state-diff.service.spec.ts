import { StateDiffService } from './state-diff.service.js';
import { StateDraft } from './state-draft.js';
import { InMemoryStateAuthority } from './state-authority.js';
import { makeUnit, makeWorld } from '../testing/fixtures.js';
import { ScriptedDice } from '../testing/scripted-dice.js';

describe('StateDiffService', () => {
  const service = new StateDiffService();

  it('sets nested values by dotted path without touching the input', () => {
    const world = makeWorld([makeUnit('a', 1, [{ x: 10, y: 10 }])]);
    const next = service.apply(world, [
      { op: 'set', path: 'units.a.models.0.position', value: { x: 12, y: 10 } },
      { op: 'set', path: 'meta.active_player', value: 2 },
    ]);

    expect(next.units.a.models[0].position).toEqual({ x: 12, y: 10 });
    expect(next.meta.active_player).toBe(2);
    expect(world.units.a.models[0].position).toEqual({ x: 10, y: 10 });
    expect(world.meta.active_player).toBe(1);
  });

  it('creates missing intermediate objects on set', () => {
    const world = makeWorld([makeUnit('a', 1, [{ x: 0, y: 0 }])]);
    const next = service.apply(world, [
      { op: 'set', path: 'units.a.effects.stance', value: 'AGGRESSIVE' },
    ]);
    expect(next.units.a.effects.stance).toBe('AGGRESSIVE');
  });

  it('removes keys and treats removal under a missing branch as a no-op', () => {
    const world = makeWorld([
      makeUnit('a', 1, [{ x: 0, y: 0 }], { effects: { has_fought: true } }),
    ]);
    const next = service.apply(world, [
      { op: 'remove', path: 'units.a.effects.has_fought' },
      { op: 'remove', path: 'units.ghost.effects.stance' },
    ]);
    expect(next.units.a.effects).toEqual({});
    expect(next.units.ghost).toBeUndefined();
  });

  it('applies diffs in order', () => {
    const world = makeWorld([]);
    const next = service.apply(world, [
      { op: 'set', path: 'players.1.kills', value: 1 },
      { op: 'set', path: 'players.1.kills', value: 2 },
    ]);
    expect(next.players['1'].kills).toBe(2);
  });

  it('rejects paths that traverse a scalar', () => {
    const world = makeWorld([]);
    expect(() =>
      service.apply(world, [{ op: 'set', path: 'meta.battle_round.x', value: 1 }]),
    ).toThrow('traverses a scalar');
  });

  it('rejects malformed paths', () => {
    const world = makeWorld([]);
    expect(() =>
      service.apply(world, [{ op: 'set', path: 'meta..phase', value: 'FIGHT' }]),
    ).toThrow('Malformed diff path');
  });
});

describe('StateDraft', () => {
  const applier = new StateDiffService();

  it('accumulates changes and exposes the working state', () => {
    const world = makeWorld([makeUnit('a', 1, [{ x: 0, y: 0 }])]);
    const draft = new StateDraft(world, applier);

    draft.push([{ op: 'set', path: 'units.a.effects.has_fought', value: true }]);
    draft.push([]);

    expect(draft.state.units.a.effects.has_fought).toBe(true);
    expect(draft.changes).toEqual([
      { op: 'set', path: 'units.a.effects.has_fought', value: true },
    ]);
    expect(world.units.a.effects.has_fought).toBeUndefined();
  });

  it('commits the dice cursor only when dice were consumed', () => {
    const world = makeWorld([]);
    const draft = new StateDraft(world, applier);
    const dice = new ScriptedDice([4, 5]);
    const factory = { create: () => dice };

    const source = draft.dice(factory);
    draft.commitDice(source);
    expect(draft.changes).toEqual([]);

    source.d6();
    source.d6();
    draft.commitDice(source);
    expect(draft.changes).toEqual([
      { op: 'set', path: 'meta.rng.cursor', value: 2 },
    ]);
  });
});

describe('InMemoryStateAuthority', () => {
  it('hands out isolated snapshots and logs actions in sequence', () => {
    const authority = new InMemoryStateAuthority(makeWorld([]), new StateDiffService());
    const snapshot = authority.createSnapshot();
    snapshot.meta.battle_round = 99;

    authority.applyStateChanges([{ op: 'set', path: 'meta.battle_round', value: 2 }]);
    authority.record({ type: 'END_SHOOTING', player: 1 }, []);
    authority.record({ type: 'END_FIGHT', player: 1 }, []);

    expect(authority.createSnapshot().meta.battle_round).toBe(2);
    expect(authority.seq).toBe(2);
    expect(authority.entries().map((e) => e.seq)).toEqual([1, 2]);
  });
});
