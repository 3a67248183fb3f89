import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  DiceRoll,
  DiceSource,
  KillCause,
  KillEvent,
  Measurement,
  RulesEngine,
  Unit,
} from '../../types/index.js';
import { EngineConfigService } from '../engine-config.service.js';
import { MEASUREMENT, RULES_ENGINE } from '../rules/rules.tokens.js';
import type { StateDraft } from '../state/state-draft.js';
import {
  aliveModels,
  findAbility,
  getUnit,
  isOnBoard,
  otherPlayer,
  paths,
  placedModels,
  playerKey,
} from '../state/world-queries.js';

export interface KillResult {
  kills: KillEvent[];
  dice: DiceRoll[];
  log: string[];
}

@Injectable()
export class KillHandlerService {
  private readonly logger = new Logger(KillHandlerService.name);

  constructor(
    @Inject(RULES_ENGINE) private readonly rules: RulesEngine,
    @Inject(MEASUREMENT) private readonly measurement: Measurement,
    private readonly configService: EngineConfigService,
  ) {}

  /**
   * Marks every candidate reduced to zero alive models as destroyed and credits
   * the opponent. Deadly demise explosions feed their victims back into the
   * same loop, so a chain resolves fully before this returns.
   */
  processKills(
    draft: StateDraft,
    candidates: string[],
    cause: KillCause,
    dice: DiceSource,
  ): KillResult {
    const result: KillResult = { kills: [], dice: [], log: [] };
    const queue = candidates.map((unitId) => ({ unitId, cause }));

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const unit = getUnit(draft.state, next.unitId);
      if (!unit || unit.status === 'DESTROYED' || aliveModels(unit).length > 0) continue;

      const destroyedBy = otherPlayer(unit.owner);
      const kills = draft.state.players[playerKey(destroyedBy)].kills;
      draft.push([
        { op: 'set', path: paths.unitStatus(unit.id), value: 'DESTROYED' },
        { op: 'set', path: paths.playerField(destroyedBy, 'kills'), value: kills + 1 },
      ]);
      result.kills.push({
        unit_id: unit.id,
        owner: unit.owner,
        destroyed_by: destroyedBy,
        cause: next.cause,
      });
      result.log.push(`${unit.meta.name} destroyed`);
      this.logger.debug(`Unit ${unit.id} destroyed (${next.cause})`);

      for (const victim of this.deadlyDemise(draft, unit, dice, result)) {
        queue.push({ unitId: victim, cause: 'DEADLY_DEMISE' });
      }
    }
    return result;
  }

  /** Returns the units that took mortal wounds from the explosion. */
  private deadlyDemise(
    draft: StateDraft,
    unit: Unit,
    dice: DiceSource,
    result: KillResult,
  ): string[] {
    const ability = findAbility(unit, 'DEADLY_DEMISE');
    if (!ability) return [];

    const roll = dice.d6();
    result.dice.push({
      context: `${unit.meta.name} deadly demise`,
      rolls: [roll],
      threshold: 6,
      successes: roll === 6 ? 1 : 0,
    });
    if (roll !== 6) return [];

    const range = this.configService.get().deadlyDemiseRangeInches;
    const origin = unit.models.filter((m) => m.position !== null);
    const victims = Object.values(draft.state.units).filter(
      (other) =>
        other.id !== unit.id &&
        isOnBoard(other) &&
        placedModels(other).some((m) =>
          origin.some((o) => this.measurement.distance(o, m) <= range),
        ),
    );
    for (const victim of victims) {
      const outcome = this.rules.applyMortalWounds(victim.id, ability.mortal_wounds, draft.state);
      draft.push(outcome.diffs);
      result.log.push(...outcome.log);
    }
    result.log.push(`${unit.meta.name} explodes, hitting ${victims.length} units`);
    return victims.map((v) => v.id);
  }
}
