import type { Field } from '../schema/fields.js';

/**
 * One element of a field set: a field name (optionally qualified, as in
 * `author.full` or `author.name`) or a named group of fields read off the
 * same instance.
 */
export type FieldSetEntry = string | readonly [group: string, fields: FieldSetSpec];

/** Ordered, possibly nested list of fields to include in a projection. */
export type FieldSetSpec = readonly FieldSetEntry[];

export type ViewMode = 'simple' | 'full';

/** Nested key/value tree produced by a projection. */
export type InfoRecord = { [key: string]: unknown };

export interface ProjectOptions {
  /** View mode of the traversal. Defaults to the instance's view mode. */
  mode?: ViewMode;
  /** Emit the label mapping. Defaults to the entity class's `showComments`. */
  comments?: boolean;
}

/** Field name split into its base name and optional qualifier. */
export interface FieldRef {
  name: string;
  qualifier?: string;
}

export interface ResolveContext {
  /** View mode inherited from the traversal. */
  mode: ViewMode;
  /** Projects a related entity in the given mode. */
  projectRelated(related: unknown, mode: ViewMode): unknown;
}

export interface FieldResolution {
  outputName: string;
  value: unknown;
  label: string;
}

/**
 * Resolves one field of an instance. Stored fields and computed members
 * implement the same interface, so the projection does not branch on kind.
 * Returns undefined when the instance has no such attribute.
 */
export interface FieldAccessor {
  readonly ref: FieldRef;
  readonly field: Field | undefined;
  resolve(instance: object, ctx: ResolveContext): FieldResolution | undefined;
}
