import { Logger, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { GameExceptionFilter } from './game-exception.filter.js';
import {
  EngineInvariantError,
  InvalidInputError,
  SequenceConflictError,
} from '../errors/game-errors.js';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe.js';

describe('GameExceptionFilter', () => {
  const filter = new GameExceptionFilter();

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('renders game errors with their own status and details', () => {
    expect(filter.render(new SequenceConflictError(4, 2))).toEqual([
      409,
      { code: 'SEQ_MISMATCH', message: 'Expected seq 4, got 2', details: { currentSeq: 4 } },
    ]);
  });

  it('passes framework http errors through', () => {
    expect(filter.render(new NotFoundException('Cannot GET /v2'))).toEqual([
      404,
      { code: 'HTTP_ERROR', message: 'Cannot GET /v2', details: null },
    ]);
  });

  it('hides unexpected errors behind a 500', () => {
    expect(filter.render(new TypeError('boom'))).toEqual([
      500,
      { code: 'INTERNAL_ERROR', message: 'Internal server error', details: null },
    ]);
    expect(Logger.prototype.error).toHaveBeenCalledTimes(1);
  });

  it('keeps engine invariant messages', () => {
    const [status, body] = filter.render(new EngineInvariantError('Malformed diff path: "units..a"'));

    expect(status).toBe(500);
    expect(body).toEqual({ code: 'ENGINE_INVARIANT', message: 'Malformed diff path: "units..a"', details: null });
  });
});

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(
    z.object({ expectedSeq: z.number().int().min(0), note: z.string().default('none') }),
  );

  it('returns the parsed value with defaults', () => {
    expect(pipe.transform({ expectedSeq: 3 })).toEqual({ expectedSeq: 3, note: 'none' });
  });

  it('throws an invalid input error listing each issue', () => {
    try {
      pipe.transform({ expectedSeq: -1 });
      throw new Error('expected a validation failure');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.issues).toEqual(['expectedSeq: Number must be greater than or equal to 0']);
        expect(err.toBody().code).toBe('INVALID_INPUT');
      }
    }
  });
});
