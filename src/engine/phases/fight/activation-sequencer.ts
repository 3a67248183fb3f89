import type {
  FightSubphase,
  FightTier,
  PlayerId,
  PlayerKey,
  Unit,
} from '../../../types/index.js';
import { FIGHT_TIER } from '../../../types/index.js';
import { findAbility, otherPlayer, playerKey } from '../../state/world-queries.js';

export type TierLists = Record<PlayerKey, string[]>;

export type ActivationRecord = {
  units_activated: string[];
  fights_first_sequence: TierLists;
  normal_sequence: TierLists;
  fights_last_sequence: TierLists;
  current_subphase: FightSubphase;
  current_selecting_player: PlayerId;
};

/** Unit ids that may still fight now (alive, in combat). */
export type EligibilityCheck = (unitId: string) => boolean;

const TIER_KEY = {
  FIGHTS_FIRST: 'fights_first_sequence',
  NORMAL: 'normal_sequence',
  FIGHTS_LAST: 'fights_last_sequence',
} as const satisfies Record<FightTier, keyof ActivationRecord>;

/** Tier a unit in combat fights in at the start of the phase. */
export function tierFor(unit: Unit): FightTier {
  const { charged_this_turn, charge_from_intervention, fights_last } = unit.effects;
  const first =
    (charged_this_turn === true && charge_from_intervention !== true) ||
    findAbility(unit, 'FIGHTS_FIRST') !== undefined;
  const last = fights_last === true;
  if (first && last) return 'NORMAL';
  if (first) return 'FIGHTS_FIRST';
  if (last) return 'FIGHTS_LAST';
  return 'NORMAL';
}

function emptyTiers(): TierLists {
  return { '1': [], '2': [] };
}

/**
 * Fight-phase turn order. Each tier opens with the defending player; selection
 * alternates after every finished activation, and a player with nothing left
 * in the tier passes without spending a turn.
 */
export class ActivationSequencer {
  private record: ActivationRecord;

  constructor(
    record: ActivationRecord,
    private readonly defender: PlayerId,
  ) {
    this.record = structuredClone(record);
  }

  static build(
    unitsInCombat: Unit[],
    defender: PlayerId,
    eligible: EligibilityCheck,
  ): ActivationSequencer {
    const record: ActivationRecord = {
      units_activated: [],
      fights_first_sequence: emptyTiers(),
      normal_sequence: emptyTiers(),
      fights_last_sequence: emptyTiers(),
      current_subphase: 'FIGHTS_FIRST',
      current_selecting_player: defender,
    };
    for (const unit of unitsInCombat) {
      record[TIER_KEY[tierFor(unit)]][playerKey(unit.owner)].push(unit.id);
    }
    const sequencer = new ActivationSequencer(record, defender);
    sequencer.normalize(eligible);
    return sequencer;
  }

  toRecord(): ActivationRecord {
    return structuredClone(this.record);
  }

  get subphase(): FightSubphase {
    return this.record.current_subphase;
  }

  get selectingPlayer(): PlayerId {
    return this.record.current_selecting_player;
  }

  tierOf(unitId: string): FightTier | null {
    for (const tier of FIGHT_TIER) {
      const lists = this.record[TIER_KEY[tier]];
      if (lists['1'].includes(unitId) || lists['2'].includes(unitId)) return tier;
    }
    return null;
  }

  isActivated(unitId: string): boolean {
    return this.record.units_activated.includes(unitId);
  }

  /** Units of the player still waiting to fight in the current tier. */
  pending(player: PlayerId, eligible: EligibilityCheck): string[] {
    const subphase = this.record.current_subphase;
    if (subphase === 'COMPLETE') return [];
    return this.record[TIER_KEY[subphase]][playerKey(player)].filter(
      (id) => !this.isActivated(id) && eligible(id),
    );
  }

  /** Reason the player may not select this unit now, or null. */
  selectionError(unitId: string, player: PlayerId, eligible: EligibilityCheck): string | null {
    if (this.isActivated(unitId)) return `Unit ${unitId} has already fought this phase`;
    const subphase = this.record.current_subphase;
    if (subphase === 'COMPLETE') return 'Every fight tier is complete';
    if (player !== this.record.current_selecting_player) {
      return `Player ${this.record.current_selecting_player} is selecting`;
    }
    const tier = this.tierOf(unitId);
    if (tier === null) return `Unit ${unitId} is not eligible to fight`;
    if (tier !== subphase) return `Unit ${unitId} fights in ${tier}, current tier is ${subphase}`;
    if (!eligible(unitId)) return `Unit ${unitId} is not in combat`;
    return null;
  }

  /**
   * Records the activation and hands selection to the opponent of whoever
   * fought, which differs from the selecting player after a Counter-Offensive.
   */
  completeActivation(
    unitId: string,
    eligible: EligibilityCheck,
    foughtBy: PlayerId = this.record.current_selecting_player,
  ): void {
    if (!this.isActivated(unitId)) this.record.units_activated.push(unitId);
    this.record.current_selecting_player = otherPlayer(foughtBy);
    this.normalize(eligible);
  }

  /**
   * Appends newly engaged units. They join NORMAL, or FIGHTS_LAST once NORMAL
   * has passed, so they can still be selected.
   */
  addNewlyEligible(units: Unit[], eligible: EligibilityCheck): string[] {
    const added: string[] = [];
    const pastNormal =
      this.record.current_subphase === 'FIGHTS_LAST' ||
      this.record.current_subphase === 'COMPLETE';
    const tier: FightTier = pastNormal ? 'FIGHTS_LAST' : 'NORMAL';
    for (const unit of units) {
      if (this.isActivated(unit.id) || this.tierOf(unit.id) !== null) continue;
      this.record[TIER_KEY[tier]][playerKey(unit.owner)].push(unit.id);
      added.push(unit.id);
    }
    if (added.length > 0 && this.record.current_subphase === 'COMPLETE') {
      this.record.current_subphase = 'FIGHTS_LAST';
      this.record.current_selecting_player = this.defender;
    }
    this.normalize(eligible);
    return added;
  }

  /** Passes for a player with nothing left and advances exhausted tiers. */
  normalize(eligible: EligibilityCheck): void {
    for (;;) {
      const current = this.record.current_subphase;
      if (current === 'COMPLETE') return;
      const selecting = this.record.current_selecting_player;
      if (this.pending(selecting, eligible).length > 0) return;
      const other = otherPlayer(selecting);
      if (this.pending(other, eligible).length > 0) {
        this.record.current_selecting_player = other;
        return;
      }
      this.record.current_subphase = nextSubphase(current);
      this.record.current_selecting_player = this.defender;
    }
  }
}

function nextSubphase(current: FightTier): FightSubphase {
  const index = FIGHT_TIER.indexOf(current);
  return index + 1 < FIGHT_TIER.length ? FIGHT_TIER[index + 1] : 'COMPLETE';
}
