import type { z } from 'zod';

/**
 * One `path: message` entry per issue
 */
export function formatZodIssues(err: z.ZodError): string[] {
  return err.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
