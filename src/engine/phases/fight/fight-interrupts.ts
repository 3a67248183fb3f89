// Interrupt points between selecting a fighter and its pile-in: Dread Foe,
// stance choice, Epic Challenge, plus the Counter-Offensive stratagem.

import type {
  DiceRoll,
  KillEvent,
  PlayerId,
  StateDiff,
  Unit,
  WorldState,
} from '../../../types/index.js';
import type { StateDraft } from '../../state/state-draft.js';
import {
  findAbility,
  getUnit,
  hasKeyword,
  paths,
  playerKey,
} from '../../state/world-queries.js';
import type { TurnContext } from '../../turn/turn-context.js';
import type { PhaseDeps } from '../phase.js';

export const EPIC_CHALLENGE_CP = 1;
export const COUNTER_OFFENSIVE_CP = 2;
export const DREAD_FOE_THRESHOLD = 4;

export interface InterruptOutcome {
  dice: DiceRoll[];
  kills: KillEvent[];
  log: string[];
}

export type PerPlayerFlag = { '1': boolean; '2': boolean };

/**
 * Dread Foe resolves on its own as soon as the unit is selected: once per
 * battle round, a 4+ inflicts mortal wounds on an engaged enemy unit.
 */
export function resolveDreadFoe(
  unitId: string,
  draft: StateDraft,
  ctx: TurnContext,
  deps: Pick<PhaseDeps, 'rules' | 'dice' | 'engagement' | 'killHandler'>,
): InterruptOutcome {
  const outcome: InterruptOutcome = { dice: [], kills: [], log: [] };
  const unit = getUnit(draft.state, unitId);
  if (!unit) return outcome;
  const ability = findAbility(unit, 'DREAD_FOE');
  if (!ability || unit.effects.dread_foe_used_round === ctx.battleRound) return outcome;
  const [targetId] = deps.engagement.engagedEnemies(unit, draft.state);
  if (targetId === undefined) return outcome;

  draft.push([
    { op: 'set', path: paths.unitEffect(unit.id, 'dread_foe_used_round'), value: ctx.battleRound },
  ]);
  const dice = draft.dice(deps.dice);
  const roll = dice.d6();
  outcome.dice.push({
    context: `${unit.meta.name} dread foe`,
    rolls: [roll],
    threshold: DREAD_FOE_THRESHOLD,
    successes: roll >= DREAD_FOE_THRESHOLD ? 1 : 0,
  });

  if (roll >= DREAD_FOE_THRESHOLD) {
    const damage = deps.rules.applyMortalWounds(targetId, ability.mortal_wounds, draft.state);
    draft.push(damage.diffs);
    outcome.log.push(...damage.log);
    const kills = deps.killHandler.processKills(draft, [targetId], 'MORTAL_WOUNDS', dice);
    outcome.dice.push(...kills.dice);
    outcome.kills.push(...kills.kills);
    outcome.log.push(...kills.log);
  } else {
    outcome.log.push(`${unit.meta.name} dread foe fails (${roll})`);
  }
  draft.commitDice(dice);
  return outcome;
}

export function needsStance(unit: Unit): boolean {
  return findAbility(unit, 'STANCES') !== undefined;
}

function cpError(state: WorldState, player: PlayerId, cost: number): string | null {
  const cp = state.players[playerKey(player)].cp;
  return cp < cost ? `Not enough CP (need ${cost}, have ${cp})` : null;
}

export function epicChallengeErrors(
  unit: Unit,
  player: PlayerId,
  state: WorldState,
  used: PerPlayerFlag,
): string[] {
  const errors: string[] = [];
  if (!hasKeyword(unit, 'CHARACTER')) errors.push(`Unit ${unit.id} is not a CHARACTER`);
  if (used[playerKey(player)]) errors.push('Epic Challenge has already been used this phase');
  const cp = cpError(state, player, EPIC_CHALLENGE_CP);
  if (cp) errors.push(cp);
  return errors;
}

/** Usable only at the selection point right after an enemy activation. */
export function counterOffensiveErrors(
  player: PlayerId,
  state: WorldState,
  used: PerPlayerFlag,
  lastCompletedBy: PlayerId | null,
): string[] {
  const errors: string[] = [];
  if (lastCompletedBy === null || lastCompletedBy === player) {
    errors.push('Counter-Offensive can only be used right after an enemy unit has fought');
  }
  if (used[playerKey(player)]) errors.push('Counter-Offensive has already been used this phase');
  const cp = cpError(state, player, COUNTER_OFFENSIVE_CP);
  if (cp) errors.push(cp);
  return errors;
}

export function spendCp(state: WorldState, player: PlayerId, cost: number): StateDiff {
  const cp = state.players[playerKey(player)].cp;
  return { op: 'set', path: paths.playerField(player, 'cp'), value: cp - cost };
}
