import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import type { FieldRef, FieldSetSpec } from './types.js';

export const FieldSetSchema: z.ZodType<FieldSetSpec> = z.lazy(() =>
  z.array(z.union([z.string().min(1), z.tuple([z.string().min(1), FieldSetSchema])]))
);

/**
 * Validate a field set. Runs on every projection, so a spec changed after
 * its first use is checked again.
 *
 * @throws ConfigurationException listing the offending entries
 */
export function assertFieldSet(spec: FieldSetSpec, owner: string): FieldSetSpec {
  const result = FieldSetSchema.safeParse(spec);
  if (!result.success) {
    throw new ConfigurationException(
      `Invalid field set on ${owner}`,
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return spec;
}

/** Split `author.full` into `{ name: 'author', qualifier: 'full' }`. */
export function parseFieldRef(entry: string, separator: string): FieldRef {
  const index = entry.indexOf(separator);
  if (index === -1) {
    return { name: entry };
  }
  return { name: entry.slice(0, index), qualifier: entry.slice(index + separator.length) };
}
