import type { Request } from 'express';
import type { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function parseOrThrow<T>(schema: Schema<T>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, { details: result.error.flatten() });
  }
  return result.data;
}

/**
 * Validate the request body against a Zod schema.
 * Throws a ValidationError (400, flattened issues) when it does not match.
 */
export function validateBody<T>(schema: Schema<T>, req: Request): T {
  return parseOrThrow(schema, req.body ?? {}, 'Validation failed');
}

/**
 * Validate query parameters against a Zod schema. The parsed copy is
 * returned; req.query is a getter in Express 5 and stays untouched.
 */
export function validateQuery<T>(schema: Schema<T>, req: Request): T {
  return parseOrThrow(schema, req.query, 'Invalid query parameters');
}

export function validateParams<T>(schema: Schema<T>, req: Request): T {
  return parseOrThrow(schema, req.params, 'Invalid path parameters');
}
