// Per-weapon attack resolution shared by Shooting and Fight. Holds no state of
// its own: every call takes the activation's ResolutionState and returns the
// next one, writing world changes into the caller's draft.

import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  AttackAssignment,
  AttackKind,
  DiceRoll,
  FlowSignal,
  KillEvent,
  PlayerId,
  ResolutionMode,
  ResolutionState,
  ResultMetadata,
  RulesEngine,
  SaveResultInput,
  WeaponChoice,
} from '../../types/index.js';
import type { DiceFactory } from '../rng/rng.service.js';
import { DICE_FACTORY, RULES_ENGINE } from '../rules/rules.tokens.js';
import type { StateDraft } from '../state/state-draft.js';
import { getUnit, isDestroyed, otherPlayer } from '../state/world-queries.js';
import { attackModifiers, distinctWeaponIds, weaponChoices } from './attack-assignments.js';
import { KillHandlerService } from './kill-handler.service.js';

export interface PipelineStep {
  resolution: ResolutionState;
  flow: FlowSignal;
  metadata: ResultMetadata;
  /** Every weapon has been resolved. */
  done: boolean;
  /** Set when the resolution was not in a state to take the step; nothing changed. */
  rejected?: string[];
}

export function createResolution(
  unitId: string,
  attacker: PlayerId,
  kind: AttackKind,
  assignments: AttackAssignment[],
): ResolutionState {
  return {
    unit_id: unitId,
    attacker,
    kind,
    mode: null,
    assignments: assignments.map((a) => ({ ...a, model_ids: [...a.model_ids] })),
    weapon_order: distinctWeaponIds(assignments),
    current_index: 0,
    completed_weapons: [],
    awaiting_saves: false,
    pending_save_data: [],
    pending_step: null,
    awaiting_continue: false,
    dice_rolled: false,
  };
}

export function remainingWeapons(res: ResolutionState): string[] {
  return res.weapon_order.slice(res.current_index);
}

@Injectable()
export class ResolutionPipeline {
  private readonly logger = new Logger(ResolutionPipeline.name);

  constructor(
    @Inject(RULES_ENGINE) private readonly rules: RulesEngine,
    @Inject(DICE_FACTORY) private readonly diceFactory: DiceFactory,
    private readonly killHandler: KillHandlerService,
  ) {}

  weaponChoices(res: ResolutionState): WeaponChoice[] {
    return weaponChoices(res.assignments, (id) => this.rules.getWeaponProfile(id));
  }

  /** One distinct weapon resolves immediately; several ask the attacker for an order. */
  confirm(res: ResolutionState, draft: StateDraft): PipelineStep {
    if (res.weapon_order.length <= 1) {
      return this.start(res, draft, 'fast');
    }
    const weapons = this.weaponChoices(res);
    return {
      resolution: { ...res },
      flow: {
        kind: 'AWAITING_INPUT',
        input: 'WEAPON_ORDER',
        player: res.attacker,
        payload: { unit_id: res.unit_id, weapons },
      },
      metadata: { weapon_order_required: true, weapons },
      done: false,
    };
  }

  validateWeaponOrder(res: ResolutionState, order: string[] | undefined): string[] {
    if (order === undefined) return [];
    return validatePermutation(remainingWeapons(res), order);
  }

  start(
    res: ResolutionState,
    draft: StateDraft,
    mode: ResolutionMode,
    order?: string[],
  ): PipelineStep {
    const errors =
      res.mode !== null ? ['The weapon order has already been chosen'] : this.validateWeaponOrder(res, order);
    if (errors.length > 0) return rejected(res, errors);
    const next = structuredClone(res);
    next.mode = mode;
    if (order) next.weapon_order = [...next.weapon_order.slice(0, next.current_index), ...order];
    return this.advance(next, draft);
  }

  /** Exactly one outcome per wound for every pending request, nothing extra. */
  validateSaves(res: ResolutionState, results: SaveResultInput[]): string[] {
    if (!res.awaiting_saves) return ['No saves are pending'];
    const errors: string[] = [];
    const used = new Set<number>();
    for (const request of res.pending_save_data) {
      const index = results.findIndex(
        (r, i) =>
          !used.has(i) &&
          r.target_unit_id === request.target_unit_id &&
          r.weapon_id === request.weapon_id,
      );
      if (index === -1) {
        errors.push(`Missing save results for ${request.weapon_id} against ${request.target_unit_id}`);
        continue;
      }
      used.add(index);
      const given = results[index].outcomes.length;
      if (given !== request.wounds) {
        errors.push(
          `Expected ${request.wounds} save outcomes for ${request.weapon_id} against ${request.target_unit_id}, got ${given}`,
        );
      }
    }
    results.forEach((r, i) => {
      if (!used.has(i)) {
        errors.push(`Unexpected save results for ${r.weapon_id} against ${r.target_unit_id}`);
      }
    });
    return errors;
  }

  applySaves(res: ResolutionState, draft: StateDraft, results: SaveResultInput[]): PipelineStep {
    const errors = this.validateSaves(res, results);
    if (errors.length > 0) return rejected(res, errors);
    const next = structuredClone(res);
    const step = next.pending_step ?? { weapon_ids: [], hits: 0, wounds: 0 };
    const dice = draft.dice(this.diceFactory);
    let failed = 0;
    let casualties = 0;
    const log: string[] = [];
    const remaining = [...results];

    for (const request of next.pending_save_data) {
      const index = remaining.findIndex(
        (r) => r.target_unit_id === request.target_unit_id && r.weapon_id === request.weapon_id,
      );
      if (index === -1) continue;
      const [result] = remaining.splice(index, 1);
      failed += result.outcomes.filter((o) => !o.passed).length;
      const damage = this.rules.applySaveDamage(result, request, draft.state);
      draft.push(damage.diffs);
      casualties += damage.casualties;
      log.push(...damage.log);
    }

    const targets = [...new Set(next.pending_save_data.map((r) => r.target_unit_id))];
    const kills = this.killHandler.processKills(draft, targets, 'ATTACK', dice);
    draft.commitDice(dice);
    log.push(...kills.log);

    next.completed_weapons.push({
      weapon_ids: step.weapon_ids,
      target_unit_ids: targets,
      hits: step.hits,
      wounds: step.wounds,
      saves_failed: failed,
      casualties,
    });
    next.current_index += step.weapon_ids.length;
    next.awaiting_saves = false;
    next.pending_save_data = [];
    next.pending_step = null;

    return this.afterStep(next, draft, {
      dice: kills.dice,
      kills: kills.kills,
      log,
    });
  }

  validateContinue(res: ResolutionState, order: string[] | undefined): string[] {
    if (!res.awaiting_continue) return ['Resolution is not paused between weapons'];
    return this.validateWeaponOrder(res, order);
  }

  /** Resumes a sequential pause; the new order applies to unresolved weapons only. */
  continue(res: ResolutionState, draft: StateDraft, order?: string[]): PipelineStep {
    const errors = this.validateContinue(res, order);
    if (errors.length > 0) return rejected(res, errors);
    const next = structuredClone(res);
    next.awaiting_continue = false;
    if (order) next.weapon_order = [...next.weapon_order.slice(0, next.current_index), ...order];
    return this.advance(next, draft);
  }

  private advance(res: ResolutionState, draft: StateDraft): PipelineStep {
    if (res.current_index >= res.weapon_order.length) return this.finished(res, {});

    const weaponIds =
      res.mode === 'sequential'
        ? [res.weapon_order[res.current_index]]
        : remainingWeapons(res);
    const attacker = getUnit(draft.state, res.unit_id);
    if (!attacker || isDestroyed(attacker)) {
      this.logger.debug(`${res.unit_id} was destroyed; its remaining weapons do not resolve`);
      return this.finished(res, {});
    }
    const assignments = res.assignments.filter((a) => weaponIds.includes(a.weapon_id));

    const dice = draft.dice(this.diceFactory);
    const outcome = this.rules.resolveAttacksUntilWounds(
      {
        attacker_unit_id: res.unit_id,
        kind: res.kind,
        assignments,
        modifiers: attackModifiers(attacker),
      },
      draft.state,
      dice,
    );
    draft.commitDice(dice);
    res.dice_rolled = true;
    this.logger.debug(
      `${res.unit_id} resolved [${weaponIds.join(', ')}]: ${outcome.hits} hits, ${outcome.wounds} wounds`,
    );

    if (outcome.save_requests.length > 0) {
      res.awaiting_saves = true;
      res.pending_save_data = outcome.save_requests;
      res.pending_step = { weapon_ids: weaponIds, hits: outcome.hits, wounds: outcome.wounds };
      return {
        resolution: res,
        flow: {
          kind: 'AWAITING_INPUT',
          input: 'SAVES',
          player: otherPlayer(res.attacker),
          payload: { unit_id: res.unit_id, save_requests: outcome.save_requests },
        },
        metadata: {
          dice: outcome.dice,
          save_requests: outcome.save_requests,
          log: outcome.log,
        },
        done: false,
      };
    }

    res.completed_weapons.push({
      weapon_ids: weaponIds,
      target_unit_ids: [...new Set(assignments.map((a) => a.target_unit_id))],
      hits: outcome.hits,
      wounds: outcome.wounds,
      saves_failed: 0,
      casualties: 0,
    });
    res.current_index += weaponIds.length;
    return this.afterStep(res, draft, { dice: outcome.dice, log: outcome.log });
  }

  /** Sequential mode pauses between weapons, even after a step with no wounds. */
  private afterStep(
    res: ResolutionState,
    draft: StateDraft,
    partial: { dice?: DiceRoll[]; kills?: KillEvent[]; log?: string[] },
  ): PipelineStep {
    if (res.current_index >= res.weapon_order.length) {
      return this.finished(res, partial);
    }
    if (res.mode === 'sequential') {
      res.awaiting_continue = true;
      const remaining = remainingWeapons(res);
      return {
        resolution: res,
        flow: {
          kind: 'AWAITING_INPUT',
          input: 'CONTINUE_SEQUENCE',
          player: res.attacker,
          payload: { unit_id: res.unit_id, remaining_weapons: remaining },
        },
        metadata: {
          ...partial,
          sequential_pause: true,
          remaining_weapons: remaining,
          completed_weapons: res.completed_weapons,
        },
        done: false,
      };
    }
    const step = this.advance(res, draft);
    return {
      ...step,
      metadata: mergeMetadata(partial, step.metadata),
    };
  }

  private finished(
    res: ResolutionState,
    partial: { dice?: DiceRoll[]; kills?: KillEvent[]; log?: string[] },
  ): PipelineStep {
    return {
      resolution: res,
      flow: { kind: 'CONTINUE' },
      metadata: { ...partial, completed_weapons: res.completed_weapons },
      done: true,
    };
  }
}

function rejected(res: ResolutionState, errors: string[]): PipelineStep {
  return { resolution: res, flow: { kind: 'CONTINUE' }, metadata: {}, done: false, rejected: errors };
}

function validatePermutation(expected: string[], given: string[]): string[] {
  const errors: string[] = [];
  if (new Set(given).size !== given.length) errors.push('Weapon order contains duplicates');
  for (const id of given) {
    if (!expected.includes(id)) errors.push(`Weapon ${id} is not awaiting resolution`);
  }
  for (const id of expected) {
    if (!given.includes(id)) errors.push(`Weapon order is missing ${id}`);
  }
  return errors;
}

function mergeMetadata(
  first: { dice?: DiceRoll[]; kills?: KillEvent[]; log?: string[] },
  second: ResultMetadata,
): ResultMetadata {
  return {
    ...second,
    dice: [...(first.dice ?? []), ...(second.dice ?? [])],
    kills: [...(first.kills ?? []), ...(second.kills ?? [])],
    log: [...(first.log ?? []), ...(second.log ?? [])],
  };
}
