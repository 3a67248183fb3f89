import type {
  AttackKind,
  AttackRequest,
  DamageOutcome,
  DiceSource,
  RulesEngine,
  SaveRequest,
  SaveResultInput,
  StateDiff,
  WeaponProfile,
  WorldState,
  WoundsOutcome,
} from '../../types/index.js';
import { TEST_WEAPONS } from './fixtures.js';

/**
 * Rules collaborator for orchestration specs: wounds per weapon are scripted and
 * every unsaved wound (or mortal wound) removes one model.
 */
export class FakeRulesEngine implements RulesEngine {
  readonly profiles = new Map<string, WeaponProfile>(TEST_WEAPONS.map((w) => [w.id, w]));
  /** weapon id → wounds caused per assignment */
  woundsByWeapon: Record<string, number> = {};
  readonly resolveCalls: AttackRequest[] = [];
  readonly saveCalls: Array<{ result: SaveResultInput; request: SaveRequest }> = [];
  readonly mortalCalls: Array<{ unitId: string; amount: number }> = [];

  getWeaponProfile(weaponId: string): WeaponProfile | undefined {
    return this.profiles.get(weaponId);
  }

  resolveAttacksUntilWounds(
    request: AttackRequest,
    _state: WorldState,
    _dice: DiceSource,
  ): WoundsOutcome {
    this.resolveCalls.push(structuredClone(request));
    let wounds = 0;
    const saveRequests: SaveRequest[] = [];
    for (const a of request.assignments) {
      const w = this.woundsByWeapon[a.weapon_id] ?? 0;
      const profile = this.profiles.get(a.weapon_id);
      wounds += w;
      if (w > 0 && profile) {
        saveRequests.push({
          target_unit_id: a.target_unit_id,
          attacker_unit_id: request.attacker_unit_id,
          weapon_id: a.weapon_id,
          weapon_name: profile.name,
          wounds: w,
          ap: profile.ap,
          damage: profile.damage,
          save_target: 3 - profile.ap,
          invuln_save: null,
        });
      }
    }
    return { dice: [], hits: wounds, wounds, save_requests: saveRequests, log: [] };
  }

  applySaveDamage(
    result: SaveResultInput,
    request: SaveRequest,
    state: WorldState,
  ): DamageOutcome {
    this.saveCalls.push({ result: structuredClone(result), request: structuredClone(request) });
    const failed = result.outcomes.filter((o) => !o.passed).length;
    return this.removeModels(request.target_unit_id, failed, state);
  }

  applyMortalWounds(unitId: string, amount: number, state: WorldState): DamageOutcome {
    this.mortalCalls.push({ unitId, amount });
    return this.removeModels(unitId, amount, state);
  }

  getEligibleTargets(unitId: string, state: WorldState, _kind: AttackKind): string[] {
    const unit = state.units[unitId];
    if (!unit) return [];
    return Object.values(state.units)
      .filter((u) => u.owner !== unit.owner && u.status === 'DEPLOYED')
      .filter((u) => u.models.some((m) => m.alive))
      .map((u) => u.id);
  }

  private removeModels(unitId: string, count: number, state: WorldState): DamageOutcome {
    const unit = state.units[unitId];
    const diffs: StateDiff[] = [];
    const destroyed: string[] = [];
    if (unit) {
      unit.models.forEach((m, i) => {
        if (!m.alive || destroyed.length >= count) return;
        destroyed.push(m.id);
        diffs.push(
          { op: 'set', path: `units.${unitId}.models.${i}.current_wounds`, value: 0 },
          { op: 'set', path: `units.${unitId}.models.${i}.alive`, value: false },
        );
      });
    }
    return { diffs, casualties: destroyed.length, destroyed_model_ids: destroyed, log: [] };
  }
}
