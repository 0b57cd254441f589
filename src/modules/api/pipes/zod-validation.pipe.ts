import { type PipeTransform, BadRequestException } from '@nestjs/common';
import { type z } from 'zod';

type ValidationIssue = {
  readonly path: readonly PropertyKey[];
  readonly message: string;
};

const formatIssue = (issue: ValidationIssue): string => {
  if (issue.path.length === 0) {
    return issue.message;
  }

  return `${issue.path.map(String).join('.')}: ${issue.message}`;
};

export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  public constructor(private readonly schema: z.ZodType<T>) {}

  public transform(value: unknown): T {
    const result = this.schema.safeParse(value);

    if (!result.success) {
      const formatted: string = result.error.issues.map(formatIssue).join('; ');
      throw new BadRequestException(`Validation failed: ${formatted}`);
    }

    return result.data;
  }
}
