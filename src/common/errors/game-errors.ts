import { HttpStatus } from '@nestjs/common';

export type GameErrorCode =
  | 'INVALID_INPUT'
  | 'UNKNOWN_WEAPON'
  | 'GAME_NOT_FOUND'
  | 'SEQ_MISMATCH'
  | 'GAME_OVER'
  | 'CONTENT_INVALID'
  | 'ENGINE_INVARIANT';

export type ErrorBody = {
  code: GameErrorCode | 'HTTP_ERROR' | 'INTERNAL_ERROR';
  message: string;
  details: Record<string, unknown> | null;
};

/**
 * Host-level failures. Rule violations are never thrown: phases report them
 * as a failed `ActionResult` and the request still succeeds.
 */
export abstract class GameError extends Error {
  abstract readonly code: GameErrorCode;
  abstract readonly status: HttpStatus;

  protected constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return { code: this.code, message: this.message, details: this.details ?? null };
  }
}

export class InvalidInputError extends GameError {
  readonly code = 'INVALID_INPUT';
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(readonly issues: string[]) {
    super('Validation failed', { issues });
  }
}

export class UnknownWeaponError extends GameError {
  readonly code = 'UNKNOWN_WEAPON';
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(readonly weapons: string[]) {
    super(`Unknown weapons in roster: ${weapons.join(', ')}`, { weapons });
  }
}

export class GameNotFoundError extends GameError {
  readonly code = 'GAME_NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(gameId: string) {
    super(`Game ${gameId} not found`, { gameId });
  }
}

export class SequenceConflictError extends GameError {
  readonly code = 'SEQ_MISMATCH';
  readonly status = HttpStatus.CONFLICT;

  constructor(
    readonly currentSeq: number,
    expectedSeq: number,
  ) {
    super(`Expected seq ${currentSeq}, got ${expectedSeq}`, { currentSeq });
  }
}

export class GameOverError extends GameError {
  readonly code = 'GAME_OVER';
  readonly status = HttpStatus.CONFLICT;

  constructor(gameId: string) {
    super(`Game ${gameId} is over`, { gameId });
  }
}

export class ContentError extends GameError {
  readonly code = 'CONTENT_INVALID';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

/** A broken engine assumption: bad diff path, phase used before enter. */
export class EngineInvariantError extends GameError {
  readonly code = 'ENGINE_INVARIANT';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}
