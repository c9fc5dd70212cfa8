/**
 * Record keys (roles, members, groups, constraint names) are taken as
 * written, never trimmed. Two keys of one map that only differ by
 * surrounding whitespace are rejected: they would otherwise collapse into
 * one declaration and lose the other's entries.
 */

import { z } from "zod";

export function nonBlankKey(message: string) {
  return z.string().refine((key) => key.trim().length > 0, message);
}

export function rejectPaddedDuplicates(
  record: Record<string, unknown>,
  ctx: z.RefinementCtx
): void {
  const seen = new Map<string, string>();
  for (const key of Object.keys(record)) {
    const trimmed = key.trim();
    const previous = seen.get(trimmed);
    if (previous !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `Keys "${previous}" and "${key}" differ only by surrounding whitespace`,
      });
      continue;
    }
    seen.set(trimmed, key);
  }
}
