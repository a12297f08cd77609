import { z } from 'zod';
import { msg } from '../lib/error-messages.js';
import { parseOrThrow } from '../schemas/job.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function parseBody<T>(schema: Schema<T>, body: unknown): T {
  return parseOrThrow(schema, body, msg('BAD_INPUT_SCHEMA'));
}

export function parseQuery<T>(schema: Schema<T>, query: unknown): T {
  return parseOrThrow(schema, query, msg('BAD_QUERY_PARAMS'));
}

export function parseParams<T>(schema: Schema<T>, params: unknown): T {
  return parseOrThrow(schema, params, msg('BAD_PATH_PARAMS'));
}
