import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import type { ApiEnv } from './env.js';

function rejected(error: z.ZodError): ValidationError {
  return new ValidationError(
    'invalid_request',
    'Request failed validation',
    error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
  );
}

/** Parse and validate a JSON body. An empty body validates as `{}`. */
export async function readJson<T>(c: Context<ApiEnv>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const text = await c.req.text();
  let raw: unknown = {};
  if (text.trim() !== '') {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ValidationError('invalid_json', 'Request body is not valid JSON');
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw rejected(parsed.error);
  return parsed.data;
}

export function readQuery<T>(c: Context<ApiEnv>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(c.req.query());
  if (!parsed.success) throw rejected(parsed.error);
  return parsed.data;
}

/** Validate a single path parameter. */
export function readParam<T>(value: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw rejected(parsed.error);
  return parsed.data;
}
