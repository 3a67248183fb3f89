// Reference RulesEngine: hit and wound rolls, save allocation, mortal wounds and
// target eligibility over the loaded weapon catalog.

import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  AttackKind,
  AttackRequest,
  DamageOutcome,
  DiceSource,
  Measurement,
  Model,
  RulesEngine,
  SaveRequest,
  SaveResultInput,
  StateDiff,
  Unit,
  WeaponProfile,
  WorldState,
  WoundsOutcome,
} from '../../types/index.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { EngagementService } from '../geometry/engagement.service.js';
import {
  enemyUnitsOnBoard,
  getUnit,
  isOnBoard,
  paths,
  placedModels,
} from '../state/world-queries.js';
import { rollPool, saveTarget, woundTarget } from './dice-math.js';
import { MEASUREMENT } from './rules.tokens.js';

@Injectable()
export class StandardRulesEngine implements RulesEngine {
  private readonly logger = new Logger(StandardRulesEngine.name);

  constructor(
    private readonly content: ContentLoaderService,
    private readonly engagement: EngagementService,
    @Inject(MEASUREMENT) private readonly measurement: Measurement,
  ) {}

  getWeaponProfile(weaponId: string): WeaponProfile | undefined {
    return this.content.getWeapon(weaponId);
  }

  resolveAttacksUntilWounds(
    request: AttackRequest,
    state: WorldState,
    dice: DiceSource,
  ): WoundsOutcome {
    const attacker = getUnit(state, request.attacker_unit_id);
    const out: WoundsOutcome = { dice: [], hits: 0, wounds: 0, save_requests: [], log: [] };
    if (!attacker) return out;

    for (const assignment of request.assignments) {
      const profile = this.getWeaponProfile(assignment.weapon_id);
      const target = getUnit(state, assignment.target_unit_id);
      if (!profile || !target) {
        this.logger.warn(
          `Skipping assignment ${assignment.weapon_id} -> ${assignment.target_unit_id}: unknown weapon or target`,
        );
        continue;
      }

      const carriers = attacker.models.filter(
        (m) => m.alive && assignment.model_ids.includes(m.id),
      ).length;
      const attacks = profile.attacks * carriers;
      const hitRoll = rollPool(
        dice,
        attacks,
        profile.skill,
        request.modifiers.hit,
        `${profile.name} hit rolls`,
      );
      const toWound = woundTarget(profile.strength, target.meta.stats.toughness);
      const woundRoll = rollPool(
        dice,
        hitRoll.successes,
        toWound,
        request.modifiers.wound,
        `${profile.name} wound rolls`,
      );
      out.dice.push(hitRoll, woundRoll);
      out.hits += hitRoll.successes;
      out.wounds += woundRoll.successes;
      out.log.push(
        `${attacker.meta.name} ${profile.name} -> ${target.meta.name}: ${attacks} attacks, ${hitRoll.successes} hits, ${woundRoll.successes} wounds`,
      );

      if (woundRoll.successes > 0) {
        const { save, invuln_save } = target.meta.stats;
        out.save_requests.push({
          target_unit_id: target.id,
          attacker_unit_id: attacker.id,
          weapon_id: profile.id,
          weapon_name: profile.name,
          wounds: woundRoll.successes,
          ap: profile.ap,
          damage: profile.damage,
          save_target: saveTarget(save, profile.ap, invuln_save),
          invuln_save,
        });
      }
    }
    return out;
  }

  /**
   * Each failed save deals the weapon's damage to one model, a wounded model
   * first. Damage beyond what kills the model is lost.
   */
  applySaveDamage(
    result: SaveResultInput,
    request: SaveRequest,
    state: WorldState,
  ): DamageOutcome {
    const unit = getUnit(state, request.target_unit_id);
    if (!unit) return emptyDamage();
    const failed = result.outcomes.filter((o) => !o.passed).length;
    const tracker = new WoundTracker(unit);
    for (let i = 0; i < failed; i++) {
      const index = tracker.nextTarget();
      if (index === -1) break;
      tracker.damage(index, request.damage);
    }
    const outcome = tracker.outcome();
    outcome.log.unshift(
      `${unit.meta.name} failed ${failed} of ${result.outcomes.length} saves against ${request.weapon_name}`,
    );
    return outcome;
  }

  /** One damage per mortal wound; excess carries over to the next model. */
  applyMortalWounds(unitId: string, amount: number, state: WorldState): DamageOutcome {
    const unit = getUnit(state, unitId);
    if (!unit) return emptyDamage();
    const tracker = new WoundTracker(unit);
    for (let i = 0; i < amount; i++) {
      const index = tracker.nextTarget();
      if (index === -1) break;
      tracker.damage(index, 1);
    }
    const outcome = tracker.outcome();
    outcome.log.unshift(`${unit.meta.name} suffers ${amount} mortal wounds`);
    return outcome;
  }

  getEligibleTargets(unitId: string, state: WorldState, kind: AttackKind): string[] {
    const unit = getUnit(state, unitId);
    if (!unit || !isOnBoard(unit)) return [];
    if (kind === 'MELEE') return this.engagement.engagedEnemies(unit, state);

    const ranges = unit.meta.weapons
      .map((id) => this.getWeaponProfile(id))
      .filter((w): w is WeaponProfile => w !== undefined && w.type === 'RANGED')
      .map((w) => w.range);
    if (ranges.length === 0) return [];
    const maxRange = Math.max(...ranges);
    const shooters = placedModels(unit);
    return enemyUnitsOnBoard(state, unit.owner)
      .filter((enemy) => !this.engagement.unitsEngaged(unit, enemy, state))
      .filter((enemy) => withinRange(shooters, placedModels(enemy), maxRange, this.measurement))
      .map((enemy) => enemy.id);
  }
}

function withinRange(
  shooters: Model[],
  targets: Model[],
  range: number,
  measurement: Measurement,
): boolean {
  return shooters.some((s) => targets.some((t) => measurement.distance(s, t) <= range));
}

function emptyDamage(): DamageOutcome {
  return { diffs: [], casualties: 0, destroyed_model_ids: [], log: [] };
}

/** Wound bookkeeping for one unit during a single allocation pass. */
class WoundTracker {
  private readonly wounds: number[];
  private readonly alive: boolean[];
  private readonly touched = new Set<number>();
  private readonly destroyed: string[] = [];

  constructor(private readonly unit: Unit) {
    this.wounds = unit.models.map((m) => m.current_wounds);
    this.alive = unit.models.map((m) => m.alive);
  }

  /** A wounded alive model, else the first alive one; -1 when none is left. */
  nextTarget(): number {
    const max = this.unit.meta.stats.wounds;
    const wounded = this.alive.findIndex((a, i) => a && this.wounds[i] < max);
    return wounded !== -1 ? wounded : this.alive.indexOf(true);
  }

  damage(index: number, amount: number): void {
    this.touched.add(index);
    this.wounds[index] = Math.max(0, this.wounds[index] - amount);
    if (this.wounds[index] === 0) {
      this.alive[index] = false;
      this.destroyed.push(this.unit.models[index].id);
    }
  }

  outcome(): DamageOutcome {
    const diffs: StateDiff[] = [];
    for (const index of [...this.touched].sort((a, b) => a - b)) {
      diffs.push({
        op: 'set',
        path: paths.modelField(this.unit.id, index, 'current_wounds'),
        value: this.wounds[index],
      });
      if (!this.alive[index]) {
        diffs.push({
          op: 'set',
          path: paths.modelField(this.unit.id, index, 'alive'),
          value: false,
        });
      }
    }
    const log = this.destroyed.length > 0 ? [`${this.destroyed.length} models slain`] : [];
    return {
      diffs,
      casualties: this.destroyed.length,
      destroyed_model_ids: [...this.destroyed],
      log,
    };
  }
}
