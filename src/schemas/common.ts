/**
 * Shared request pieces and the body/query parsing helpers the routes use.
 * Zod failures become InvalidInputError so they flow through the same error
 * mapping as engine failures.
 */

import { z } from 'zod';
import { InvalidInputError } from '../engine/errors.js';

export const positiveId = z.coerce.number().int().positive();

/** Optional command-line player id: undefined when absent, null when malformed. */
export function parsePlayerIdArgument(arg: string | undefined): number | null | undefined {
  if (arg === undefined) return undefined;
  const parsed = positiveId.safeParse(arg);
  return parsed.success ? parsed.data : null;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function readJson(request: { json(): Promise<unknown> }): Promise<unknown> {
  try {
    return await request.json();
  } catch (err) {
    throw new InvalidInputError('request body must be valid JSON', { cause: err });
  }
}
