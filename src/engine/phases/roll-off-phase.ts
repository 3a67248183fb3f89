import type {
  Action,
  ActionResult,
  AvailableAction,
  DiceRoll,
  RollOffRecord,
} from '../../types/index.js';
import { PLAYER_ID } from '../../types/index.js';
import { BasePhase, failed, succeed } from './phase.js';
import type { PhaseCompletion } from './phase.js';

// Re-roll cap for ties.
const MAX_ROLL_OFF_ATTEMPTS = 100;

/** Either player rolls off; ties re-roll; the winner picks who takes the first turn. */
export class RollOffPhase extends BasePhase {
  readonly type = 'ROLL_OFF' as const;
  readonly completion: PhaseCompletion = 'AUTO';

  protected onEnter(): boolean {
    return this.state.meta.first_player !== null;
  }

  shouldCompletePhase(): boolean {
    return this.state.meta.first_player !== null;
  }

  protected validatePhaseAction(action: Action): string[] {
    const { roll_off: rollOff, first_player: firstPlayer } = this.state.meta;
    switch (action.type) {
      case 'ROLL_OFF':
        return rollOff ? ['The roll-off has already been made'] : [];
      case 'CHOOSE_FIRST_TURN':
        if (!rollOff) return ['Roll off before choosing the first player'];
        if (firstPlayer !== null) return ['The first player has already been chosen'];
        return action.player === rollOff.winner
          ? []
          : [`Only the roll-off winner (player ${rollOff.winner}) chooses who goes first`];
      default:
        return [`${action.type} is not allowed in the ROLL_OFF phase`];
    }
  }

  protected processPhaseAction(action: Action): ActionResult {
    const draft = this.draft();
    if (action.type === 'CHOOSE_FIRST_TURN') {
      draft.push([
        { op: 'set', path: 'meta.first_player', value: action.first_player },
        { op: 'set', path: 'meta.active_player', value: action.first_player },
      ]);
      this.logger.log(`Player ${action.first_player} takes the first turn`);
      return succeed(draft.changes, { log: [`Player ${action.first_player} goes first`] });
    }
    if (action.type !== 'ROLL_OFF') {
      return failed(`${action.type} is not allowed in the ROLL_OFF phase`);
    }

    const dice = draft.dice(this.deps.dice);
    const record: RollOffRecord = { rolls: [], winner: 1 };
    const rolls: DiceRoll[] = [];
    for (let attempt = 0; attempt < MAX_ROLL_OFF_ATTEMPTS; attempt++) {
      const p1 = dice.d6();
      const p2 = dice.d6();
      record.rolls.push({ player_1: p1, player_2: p2 });
      rolls.push({ context: 'roll-off', rolls: [p1, p2], successes: p1 === p2 ? 0 : 1 });
      if (p1 !== p2) {
        record.winner = p1 > p2 ? 1 : 2;
        draft.push([{ op: 'set', path: 'meta.roll_off', value: record }]);
        draft.commitDice(dice);
        this.logger.log(`Roll-off won by player ${record.winner} after ${attempt + 1} attempt(s)`);
        return succeed(
          draft.changes,
          { dice: rolls, log: [`Player ${record.winner} wins the roll-off (${p1} vs ${p2})`] },
          {
            kind: 'AWAITING_INPUT',
            input: 'FIRST_TURN_CHOICE',
            player: record.winner,
            payload: { rolls: record.rolls },
          },
        );
      }
    }
    return failed(`Roll-off still tied after ${MAX_ROLL_OFF_ATTEMPTS} attempts`);
  }

  availableActions(): AvailableAction[] {
    const { roll_off: rollOff, first_player: firstPlayer } = this.state.meta;
    if (!rollOff) {
      return PLAYER_ID.map((player): AvailableAction => ({ type: 'ROLL_OFF', player, description: 'Roll off' }));
    }
    if (firstPlayer !== null) return [];
    return [
      {
        type: 'CHOOSE_FIRST_TURN',
        player: rollOff.winner,
        description: 'Choose who takes the first turn',
      },
    ];
  }
}
