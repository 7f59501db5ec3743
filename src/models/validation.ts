/**
 * Schema parsing helpers shared by the model modules
 */

import type { z } from 'zod';
import { CreationGuardError, ModelValidationError, type ValidationIssue } from '../lib/errors.js';

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parses input against a schema, raising ModelValidationError with every issue found
 */
export function parseWithSchema<S extends z.ZodTypeAny>(label: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ModelValidationError(label, toValidationIssues(result.error), result.error);
  }
  return result.data;
}

const created = new WeakSet<object>();

/**
 * A New* object may be used to create a VTN object exactly once. A failed creation
 * releases the guard so the same object can be submitted again.
 */
export async function withCreationGuard<T>(model: string, newObject: object, create: () => Promise<T>): Promise<T> {
  if (created.has(newObject)) {
    throw new CreationGuardError(model);
  }
  created.add(newObject);

  try {
    return await create();
  } catch (error) {
    created.delete(newObject);
    throw error;
  }
}

export function hasBeenCreated(newObject: object): boolean {
  return created.has(newObject);
}
