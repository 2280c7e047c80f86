/**
 * Zod schemas for request input.
 */

import {z} from 'zod';

import {NotFoundError, ValidationError} from './errors';

export const createTodoSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
});

export const updateTodoSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().nullable().optional(),
    completed: z.boolean().optional(),
  })
  .refine(patch => Object.values(patch).some(value => value !== undefined), {
    message: 'No JSON data provided',
  });

/**
 * Validates a JSON body against a schema.
 *
 * @throws {ValidationError} With the first issue found
 */
export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    const path = issue.path.join('.');
    throw new ValidationError(path ? `${path}: ${issue.message}` : issue.message);
  }

  return result.data;
}

/**
 * Route ids are positive integers. Anything else cannot name a todo.
 *
 * @throws {NotFoundError} For malformed ids
 */
export function parseTodoId(raw: string): number {
  if (!/^[1-9]\d*$/.test(raw)) {
    throw new NotFoundError();
  }

  return Number(raw);
}
