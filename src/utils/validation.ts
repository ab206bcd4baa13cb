import { z } from 'zod';

/** One "path: message" line per zod issue. */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(e => `${e.path.length ? e.path.join('.') : '(root)'}: ${e.message}`);
}
