import { Injectable, type PipeTransform } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

/** `units.0.models.1.position: Required` */
export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/** Parses a request body into the schema's output type, defaults applied. */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) throw new InvalidInputError(formatZodIssues(result.error.issues));
    return result.data;
  }
}
