import { EngagementService } from './engagement.service.js';
import { MeasurementService } from './measurement.service.js';
import { makeUnit, makeWorld, testConfig } from '../testing/fixtures.js';

describe('EngagementService', () => {
  let service: EngagementService;

  beforeEach(() => {
    service = new EngagementService(new MeasurementService(testConfig()));
  });

  it('finds engaged enemies and ignores friendly or undeployed units', () => {
    const a = makeUnit('a', 1, [{ x: 10, y: 10 }]);
    const b = makeUnit('b', 2, [{ x: 12, y: 10 }]);
    const friend = makeUnit('f', 1, [{ x: 10, y: 12 }]);
    const reserve = makeUnit('r', 2, [{ x: 8, y: 10 }], { status: 'IN_RESERVES' });
    const state = makeWorld([a, b, friend, reserve]);

    expect(service.engagedEnemies(a, state)).toEqual(['b']);
    expect(service.isInCombat(friend, state)).toBe(false);
    expect(service.isInCombat(reserve, state)).toBe(false);
  });

  it('ignores dead models', () => {
    const a = makeUnit('a', 1, [{ x: 10, y: 10 }]);
    const b = makeUnit('b', 2, [{ x: 12, y: 10 }, { x: 20, y: 10 }]);
    b.models[0].alive = false;
    const state = makeWorld([a, b]);
    expect(service.isInCombat(a, state)).toBe(false);
  });

  describe('scanNewlyEngaged', () => {
    it('uses the proposed positions rather than the snapshot', () => {
      const mover = makeUnit('m', 1, [{ x: 10, y: 10 }]);
      const candidate = makeUnit('c', 2, [{ x: 14, y: 10 }]);
      const bystander = makeUnit('x', 1, [{ x: 10, y: 30 }]);
      const state = makeWorld([mover, candidate, bystander]);

      expect(service.scanNewlyEngaged([candidate, bystander], {}, state)).toEqual([]);
      expect(
        service.scanNewlyEngaged(
          [candidate, bystander],
          { m: { 'm-m0': { x: 12, y: 10 } } },
          state,
        ),
      ).toEqual(['c']);
      expect(state.units.m.models[0].position).toEqual({ x: 10, y: 10 });
    });
  });
});
