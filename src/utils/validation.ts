import type { z } from 'zod';
import { AnnotationError } from './annotationError';

export const parseOptions = <S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> => {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new AnnotationError('INVALID_CONFIGURATION', `Invalid ${label}: ${details}`);
  }
  return result.data;
};
