/** Binds the RulesEngine collaborator (types/collaborators.ts). */
export const RULES_ENGINE = Symbol('RULES_ENGINE');

/** Binds the Measurement collaborator. */
export const MEASUREMENT = Symbol('MEASUREMENT');

/** Binds the DiceFactory the combat steps roll with. */
export const DICE_FACTORY = Symbol('DICE_FACTORY');
