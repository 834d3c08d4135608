/**
 * Process-wide settings for patching and projection.
 *
 * @example
 * ```ts
 * import { configure } from 'entity-kit';
 *
 * configure({ commentsKey: '__labels', defaultViewMode: 'full' });
 * ```
 */

import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';

export const ViewModeSchema = z.enum(['simple', 'full']);

export const EntityKitConfigSchema = z.object({
  /** Suffix under which a shadowed member stays reachable after a patch. */
  overriddenSuffix: z.string().min(1).default('__overridden'),
  /** Key holding the label mapping when comment mode is on. */
  commentsKey: z.string().min(1).default('_comments'),
  /** View mode of an instance nobody called setSimple/setFull on. */
  defaultViewMode: ViewModeSchema.default('simple'),
  /** Separator between a field name and its qualifier (`author.full`). */
  qualifierSeparator: z.string().length(1).default('.'),
});

export type EntityKitConfig = z.infer<typeof EntityKitConfigSchema>;

let currentConfig: EntityKitConfig = EntityKitConfigSchema.parse({});

/**
 * Merge settings into the current configuration.
 *
 * @throws ConfigurationException when a setting fails validation
 */
export function configure(settings: Partial<EntityKitConfig>): EntityKitConfig {
  const result = EntityKitConfigSchema.safeParse({ ...currentConfig, ...settings });
  if (!result.success) {
    throw new ConfigurationException(
      'Invalid entity-kit configuration',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  currentConfig = result.data;
  return currentConfig;
}

export function getConfig(): EntityKitConfig {
  return currentConfig;
}

export function resetConfig(): void {
  currentConfig = EntityKitConfigSchema.parse({});
}
