import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { normalizeId, parseEdgeType } from '../storage/types.js';
import type { Question } from './types.js';

const idField = z.string().transform(normalizeId).pipe(z.string().min(1, 'must not be blank'));

export const QuestionSchema = z.object({
  type: z.string().transform((value, ctx) => {
    const type = parseEdgeType(value);
    if (!type) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown question type "${value}" (expected SubclassOf, InstanceOf or HasAttribute)`,
      });
      return z.NEVER;
    }
    return type;
  }),
  subject: idField,
  object: idField,
});

export type QuestionInput = z.input<typeof QuestionSchema>;

/**
 * Validate a structured question and normalize its ids. Throws
 * ValidationError listing every problem found.
 */
export function normalizeQuestion(input: unknown): Question {
  const parsed = QuestionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`Invalid question: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}

/** Readable form for logs: `SubclassOf(dog, animal)` */
export function describeQuestion(question: Question): string {
  return `${question.type}(${question.subject}, ${question.object})`;
}
