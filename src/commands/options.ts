import type { ZodError } from 'zod';

/** One-line rendering of zod issues, e.g. `galaxyUrl: Invalid url`. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
