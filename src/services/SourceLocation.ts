/**
 * @file SourceLocation - Source file position shared by both search directions
 * @depends zod
 */

import { z } from 'zod';
import { NotificationParseError } from './errors';

export const SourceLocationSchema = z.object({
  file: z.string().min(1, 'source file path is empty'),
  line: z.number().int().min(1, 'line must be 1 or greater'),
  column: z.number().int().min(1, 'column must be 1 or greater').optional(),
});

/** Position in a source file; line and column are 1-based. */
export type SourceLocation = z.infer<typeof SourceLocationSchema>;

/**
 * Validate a backward-search payload.
 * @throws {NotificationParseError} describing the first problem found
 */
export function parseSourceLocation(payload: unknown): SourceLocation {
  const parsed = SourceLocationSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new NotificationParseError(
      `Malformed backward-search notification (${where}${issue?.message ?? 'invalid'})`,
      payload
    );
  }
  return parsed.data;
}

export function formatSourceLocation(location: SourceLocation): string {
  return location.column !== undefined
    ? `${location.file}:${location.line}:${location.column}`
    : `${location.file}:${location.line}`;
}
