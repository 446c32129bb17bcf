import { z } from 'zod';
import { InputSchemaError } from './errors.js';

export const personRecordSchema = z.object({
  name: z.string(),
  salary: z.number().nonnegative(),
  skills: z.array(z.string()),
});

export const taskRecordSchema = z.object({
  name: z.string(),
  skills: z.array(z.string()),
});

export const inputDocumentSchema = z.object({
  Tasks: z.array(taskRecordSchema),
  Peoples: z.array(personRecordSchema),
});

export type PersonInput = z.infer<typeof personRecordSchema>;
export type TaskInput = z.infer<typeof taskRecordSchema>;
export type InputDocument = z.infer<typeof inputDocumentSchema>;

/**
 * Formats a zod issue path like `Peoples[2].salary`
 */
function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === 'number') return `${acc}[${part}]`;
    return acc ? `${acc}.${part}` : part;
  }, '');
}

/**
 * Validates a parsed document against the input schema
 */
export function parseInputDocument(data: unknown): InputDocument {
  const result = inputDocumentSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(
    issue => `${formatPath(issue.path) || '(root)'}: ${issue.message}`
  );
  throw new InputSchemaError(`Invalid input document:\n  ${issues.join('\n  ')}`, issues);
}
