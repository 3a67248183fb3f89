import {
  attackModifiers,
  distinctWeaponIds,
  mergeAssignments,
  toAssignment,
  weaponChoices,
} from './attack-assignments.js';
import { makeUnit, TEST_WEAPONS } from '../testing/fixtures.js';

describe('attack assignments', () => {
  it('defaults the carrying models to every alive model', () => {
    const unit = makeUnit('a', 1, [{ x: 1, y: 1 }, { x: 2.5, y: 1 }, { x: 4, y: 1 }]);
    unit.models[1].alive = false;
    expect(toAssignment(unit, { weapon_id: 'power_fist', target_unit_id: 'b' })).toEqual({
      weapon_id: 'power_fist',
      target_unit_id: 'b',
      model_ids: ['a-m0', 'a-m2'],
    });
  });

  it('merges the same weapon and target and unions model ids', () => {
    const merged = mergeAssignments(
      [{ weapon_id: 'power_fist', target_unit_id: 'b', model_ids: ['a-m0'] }],
      [
        { weapon_id: 'power_fist', target_unit_id: 'b', model_ids: ['a-m1', 'a-m0'] },
        { weapon_id: 'power_fist', target_unit_id: 'c', model_ids: ['a-m2'] },
      ],
    );
    expect(merged).toEqual([
      { weapon_id: 'power_fist', target_unit_id: 'b', model_ids: ['a-m0', 'a-m1'] },
      { weapon_id: 'power_fist', target_unit_id: 'c', model_ids: ['a-m2'] },
    ]);
  });

  it('lists one weapon choice per distinct weapon', () => {
    const assignments = [
      { weapon_id: 'power_fist', target_unit_id: 'b', model_ids: ['a-m0'] },
      { weapon_id: 'close_combat_weapon', target_unit_id: 'b', model_ids: ['a-m1'] },
      { weapon_id: 'power_fist', target_unit_id: 'c', model_ids: ['a-m0'] },
    ];
    const profiles = new Map(TEST_WEAPONS.map((w) => [w.id, w]));
    expect(distinctWeaponIds(assignments)).toEqual(['power_fist', 'close_combat_weapon']);
    expect(weaponChoices(assignments, (id) => profiles.get(id))).toEqual([
      { weapon_id: 'power_fist', weapon_name: 'Power fist', target_unit_ids: ['b', 'c'] },
      {
        weapon_id: 'close_combat_weapon',
        weapon_name: 'Close combat weapon',
        target_unit_ids: ['b'],
      },
    ]);
  });

  it('derives modifiers from activation effects', () => {
    const unit = makeUnit('a', 1, [{ x: 1, y: 1 }], {
      effects: { stance: 'PRECISE', challenge_declined: true },
    });
    expect(attackModifiers(unit)).toEqual({ hit: 1, wound: 1 });
  });
});
