import { createResolution, ResolutionPipeline } from './resolution-pipeline.js';
import { KillHandlerService } from './kill-handler.service.js';
import { MeasurementService } from '../geometry/measurement.service.js';
import { StateDiffService } from '../state/state-diff.service.js';
import { StateDraft } from '../state/state-draft.js';
import { FakeRulesEngine } from '../testing/fake-rules-engine.js';
import { ScriptedDiceFactory } from '../testing/scripted-dice.js';
import { makeUnit, makeWorld, testConfig } from '../testing/fixtures.js';
import type { AttackAssignment, UnitEffects, WorldState } from '../../types/index.js';

function assign(weaponId: string, target = 'b'): AttackAssignment {
  return { weapon_id: weaponId, target_unit_id: target, model_ids: ['a-m0'] };
}

describe('ResolutionPipeline', () => {
  let rules: FakeRulesEngine;
  let pipeline: ResolutionPipeline;
  let state: WorldState;
  const applier = new StateDiffService();

  function world(effects: UnitEffects = {}): WorldState {
    return makeWorld([
      makeUnit('a', 1, [{ x: 10, y: 10 }], { effects }),
      makeUnit('b', 2, [{ x: 12, y: 10 }, { x: 13.5, y: 10 }]),
    ]);
  }

  beforeEach(() => {
    const config = testConfig();
    rules = new FakeRulesEngine();
    const killHandler = new KillHandlerService(rules, new MeasurementService(config), config);
    pipeline = new ResolutionPipeline(rules, new ScriptedDiceFactory(), killHandler);
    state = world();
  });

  it('resolves a single weapon immediately in fast mode', () => {
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon')]);
    const step = pipeline.confirm(res, new StateDraft(state, applier));

    expect(step.done).toBe(true);
    expect(step.flow).toEqual({ kind: 'CONTINUE' });
    expect(step.resolution.mode).toBe('fast');
    expect(step.metadata.weapon_order_required).toBeUndefined();
    expect(step.resolution.completed_weapons).toEqual([
      {
        weapon_ids: ['close_combat_weapon'],
        target_unit_ids: ['b'],
        hits: 0,
        wounds: 0,
        saves_failed: 0,
        casualties: 0,
      },
    ]);
  });

  it('asks for a weapon order when two distinct weapons are assigned', () => {
    const res = createResolution('a', 1, 'MELEE', [
      assign('close_combat_weapon'),
      assign('power_fist'),
      assign('power_fist', 'c'),
    ]);
    const step = pipeline.confirm(res, new StateDraft(state, applier));

    expect(step.done).toBe(false);
    expect(step.metadata.weapon_order_required).toBe(true);
    expect(step.metadata.weapons).toHaveLength(2);
    expect(step.flow).toMatchObject({ kind: 'AWAITING_INPUT', input: 'WEAPON_ORDER', player: 1 });
    expect(rules.resolveCalls).toHaveLength(0);
  });

  it('rolls every weapon together in fast mode', () => {
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon'), assign('power_fist')]);
    const step = pipeline.start(res, new StateDraft(state, applier), 'fast');

    expect(step.done).toBe(true);
    expect(rules.resolveCalls).toHaveLength(1);
    expect(rules.resolveCalls[0].assignments.map((a) => a.weapon_id)).toEqual([
      'close_combat_weapon',
      'power_fist',
    ]);
  });

  it('pauses in sequential mode even when a weapon causes no wounds', () => {
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon'), assign('power_fist')]);
    const step = pipeline.start(res, new StateDraft(state, applier), 'sequential', [
      'power_fist',
      'close_combat_weapon',
    ]);

    expect(step.done).toBe(false);
    expect(step.resolution.awaiting_continue).toBe(true);
    expect(step.metadata.sequential_pause).toBe(true);
    expect(step.metadata.remaining_weapons).toEqual(['close_combat_weapon']);
    expect(step.flow).toMatchObject({ input: 'CONTINUE_SEQUENCE', player: 1 });
    expect(rules.resolveCalls[0].assignments.map((a) => a.weapon_id)).toEqual(['power_fist']);
  });

  it('waits for the defender to roll saves and hands them to the rules engine', () => {
    rules.woundsByWeapon.power_fist = 3;
    const draft = new StateDraft(state, applier);
    const res = createResolution('a', 1, 'MELEE', [assign('power_fist'), assign('close_combat_weapon')]);

    const paused = pipeline.start(res, draft, 'sequential');
    expect(paused.flow).toMatchObject({ kind: 'AWAITING_INPUT', input: 'SAVES', player: 2 });
    expect(paused.resolution.awaiting_saves).toBe(true);
    expect(paused.resolution.pending_save_data).toHaveLength(1);

    const short = [
      {
        target_unit_id: 'b',
        weapon_id: 'power_fist',
        outcomes: [
          { roll: 5, passed: true },
          { roll: 1, passed: false },
        ],
      },
    ];
    expect(pipeline.validateSaves(paused.resolution, short)).toEqual([
      'Expected 3 save outcomes for power_fist against b, got 2',
    ]);

    const saves = [
      {
        target_unit_id: 'b',
        weapon_id: 'power_fist',
        outcomes: [
          { roll: 5, passed: true },
          { roll: 1, passed: false },
          { roll: 2, passed: false },
        ],
      },
    ];
    expect(pipeline.validateSaves(paused.resolution, saves)).toEqual([]);
    const after = pipeline.applySaves(paused.resolution, draft, saves);

    expect(rules.saveCalls).toHaveLength(1);
    expect(after.resolution.completed_weapons).toEqual([
      {
        weapon_ids: ['power_fist'],
        target_unit_ids: ['b'],
        hits: 3,
        wounds: 3,
        saves_failed: 2,
        casualties: 2,
      },
    ]);
    expect(after.metadata.kills).toEqual([
      { unit_id: 'b', owner: 2, destroyed_by: 1, cause: 'ATTACK' },
    ]);
    expect(draft.state.units.b.status).toBe('DESTROYED');
    expect(after.resolution.awaiting_saves).toBe(false);
    expect(after.resolution.awaiting_continue).toBe(true);
    expect(after.metadata.remaining_weapons).toEqual(['close_combat_weapon']);

    const done = pipeline.continue(after.resolution, draft);
    expect(done.done).toBe(true);
    expect(done.resolution.completed_weapons).toHaveLength(2);
  });

  it('rejects saves when none are pending', () => {
    const res = createResolution('a', 1, 'MELEE', [assign('power_fist')]);
    expect(pipeline.validateSaves(res, [])).toEqual(['No saves are pending']);
  });

  it('refuses to apply saves before any are requested, rolling nothing', () => {
    const draft = new StateDraft(state, applier);
    const ordering = pipeline.confirm(
      createResolution('a', 1, 'MELEE', [assign('close_combat_weapon'), assign('power_fist')]),
      draft,
    );

    const step = pipeline.applySaves(ordering.resolution, draft, []);

    expect(step.rejected).toEqual(['No saves are pending']);
    expect(step.resolution).toBe(ordering.resolution);
    expect(step.resolution.completed_weapons).toEqual([]);
    expect(step.resolution.dice_rolled).toBe(false);
    expect(rules.resolveCalls).toEqual([]);
    expect(draft.changes).toEqual([]);
  });

  it('refuses to continue or pick an order outside their pause', () => {
    const draft = new StateDraft(state, applier);
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon'), assign('power_fist')]);

    expect(pipeline.continue(res, draft).rejected).toEqual(['Resolution is not paused between weapons']);

    const paused = pipeline.start(res, draft, 'sequential');
    expect(pipeline.start(paused.resolution, draft, 'fast').rejected).toEqual([
      'The weapon order has already been chosen',
    ]);
    expect(rules.resolveCalls).toHaveLength(1);
  });

  it('stops resolving once the attacker has been destroyed', () => {
    const draft = new StateDraft(state, applier);
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon'), assign('power_fist')]);
    const paused = pipeline.start(res, draft, 'sequential');
    draft.push([{ op: 'set', path: 'units.a.status', value: 'DESTROYED' }]);

    const step = pipeline.continue(paused.resolution, draft);

    expect(step.done).toBe(true);
    expect(step.resolution.completed_weapons).toHaveLength(1);
    expect(rules.resolveCalls).toHaveLength(1);
  });

  it('lets CONTINUE_SEQUENCE reorder only the unresolved weapons', () => {
    const draft = new StateDraft(state, applier);
    const res = createResolution('a', 1, 'SHOOTING', [
      assign('bolt_rifle'),
      assign('plasma_gun'),
      assign('power_fist'),
    ]);
    const paused = pipeline.start(res, draft, 'sequential');

    expect(pipeline.validateContinue(paused.resolution, ['bolt_rifle', 'power_fist'])).toEqual([
      'Weapon bolt_rifle is not awaiting resolution',
      'Weapon order is missing plasma_gun',
    ]);

    const next = pipeline.continue(paused.resolution, draft, ['power_fist', 'plasma_gun']);
    expect(next.resolution.weapon_order).toEqual(['bolt_rifle', 'power_fist', 'plasma_gun']);
    expect(rules.resolveCalls[1].assignments.map((a) => a.weapon_id)).toEqual(['power_fist']);
  });

  it('passes activation modifiers to the rules engine', () => {
    state = world({ stance: 'AGGRESSIVE', precision: true });
    const res = createResolution('a', 1, 'MELEE', [assign('close_combat_weapon')]);
    pipeline.confirm(res, new StateDraft(state, applier));
    expect(rules.resolveCalls[0].modifiers).toEqual({ hit: 1, wound: 1 });
  });
});
