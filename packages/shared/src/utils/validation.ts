import type { ZodIssue } from 'zod';

/** Render zod issues as human-readable validation errors. */
export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      return `Missing required field: ${path}`;
    }
    if (issue.code === 'custom') {
      return issue.message;
    }
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
