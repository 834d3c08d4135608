import type { Field } from '../schema/fields.js';
import { RelatedCollection } from '../schema/related.js';

export type Relation = 'plain' | 'toOne' | 'toMany';

/**
 * Classify a field value. The descriptor's declared kind wins; without a
 * descriptor only a RelatedCollection counts as a to-many relation.
 */
export function classify(value: unknown, field?: Field): Relation {
  if (field?.kind === 'toOne') return 'toOne';
  if (field?.kind === 'toMany') return 'toMany';
  if (!field && value instanceof RelatedCollection) return 'toMany';
  return 'plain';
}

/** Related entities of a to-many value, in order. */
export function relatedItems(value: unknown): unknown[] {
  if (value instanceof RelatedCollection) {
    return value.all();
  }
  if (Array.isArray(value)) {
    return [...value];
  }
  return value === null || value === undefined ? [] : [value];
}
