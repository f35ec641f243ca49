// apps/api/src/common/pipes/zod-validation.pipe.ts
import { Injectable, PipeTransform } from '@nestjs/common';
import { ZodError, ZodTypeAny, z } from 'zod';
import { DomainValidationException } from '../errors/domain-errors';

@Injectable()
export class ZodValidationPipe<S extends ZodTypeAny>
  implements PipeTransform<unknown, z.infer<S>>
{
  constructor(private readonly schema: S) {}

  transform(value: unknown): z.infer<S> {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      throw new DomainValidationException(
        'Validation failed',
        formatZodError(result.error),
      );
    }

    return result.data;
  }
}

export function formatZodError(error: ZodError) {
  return {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}
