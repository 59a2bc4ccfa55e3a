import type { ZodError } from 'zod';

/**
 * One "path: message" line per zod issue.
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
