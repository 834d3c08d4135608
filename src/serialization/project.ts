import { getConfig } from '../config/index.js';
import { getLogger } from '../core/logger.js';
import { entityClassOf, isEntity, ownSchema, type Entity, type EntityClass } from '../schema/entity.js';
import type { EntitySchema } from '../schema/schema.js';
import { accessorFor } from './accessors.js';
import { assertFieldSet, parseFieldRef } from './field-set.js';
import type {
  FieldResolution,
  FieldSetSpec,
  InfoRecord,
  ProjectOptions,
  ResolveContext,
  ViewMode,
} from './types.js';
import { getViewMode } from './view-state.js';

interface Traversal {
  mode: ViewMode;
  comments: boolean | undefined;
  /** Instances currently being projected, outermost first. */
  path: Set<object>;
}

/** Field set a class uses for a mode; simple falls back to full when empty. */
export function fieldSetFor(entityClass: EntityClass, mode: ViewMode): FieldSetSpec {
  if (mode === 'simple' && entityClass.simpleInfoFields.length > 0) {
    return entityClass.simpleInfoFields;
  }
  return entityClass.fullInfoFields;
}

function resolveEntry(
  instance: Entity,
  schema: EntitySchema | undefined,
  entry: string,
  ctx: ResolveContext
): FieldResolution | undefined {
  const separator = getConfig().qualifierSeparator;
  try {
    return accessorFor(schema, parseFieldRef(entry, separator), separator).resolve(instance, ctx);
  } catch (error) {
    getLogger().error('Failed to resolve field', {
      entity: entityClassOf(instance).name,
      field: entry,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function collect(
  instance: Entity,
  schema: EntitySchema | undefined,
  spec: FieldSetSpec,
  ctx: ResolveContext,
  result: InfoRecord,
  comments: InfoRecord
): void {
  for (const entry of spec) {
    if (typeof entry === 'string') {
      const resolved = resolveEntry(instance, schema, entry, ctx);
      if (!resolved) continue;
      result[resolved.outputName] = resolved.value;
      comments[resolved.outputName] = resolved.label;
    } else {
      const [group, fields] = entry;
      const groupResult: InfoRecord = {};
      const groupComments: InfoRecord = {};
      collect(instance, schema, fields, ctx, groupResult, groupComments);
      result[group] = groupResult;
      comments[group] = groupComments;
    }
  }
}

function projectRelated(related: unknown, mode: ViewMode, traversal: Traversal): unknown {
  if (!isEntity(related)) {
    return related;
  }
  const entityClass = entityClassOf(related);
  if (traversal.path.has(related)) {
    getLogger().warn('Relation cycle detected, emitting null', { entity: entityClass.name });
    return null;
  }
  return projectWith(related, fieldSetFor(entityClass, mode), { ...traversal, mode });
}

function projectWith(instance: Entity, spec: FieldSetSpec, traversal: Traversal): InfoRecord {
  const entityClass = entityClassOf(instance);
  assertFieldSet(spec, entityClass.name);

  const result: InfoRecord = {};
  const comments: InfoRecord = {};
  const ctx: ResolveContext = {
    mode: traversal.mode,
    projectRelated: (related, mode) => projectRelated(related, mode, traversal),
  };

  traversal.path.add(instance);
  try {
    collect(instance, ownSchema(entityClass), spec, ctx, result, comments);
  } finally {
    traversal.path.delete(instance);
  }

  if (traversal.comments ?? entityClass.showComments) {
    result[getConfig().commentsKey] = comments;
  }
  return result;
}

/**
 * Project an instance through a field set.
 *
 * @example
 * ```ts
 * project(book, ['title', ['meta', ['isbn', 'pages']], 'author.full']);
 * // { title: '...', meta: { isbn: '...', pages: 320 }, author: { ... } }
 * ```
 */
export function project(instance: Entity, spec: FieldSetSpec, options: ProjectOptions = {}): InfoRecord {
  return projectWith(instance, spec, {
    mode: options.mode ?? getViewMode(instance),
    comments: options.comments,
    path: new Set(),
  });
}

export function fullInfo(instance: Entity, options: ProjectOptions = {}): InfoRecord {
  return project(instance, fieldSetFor(entityClassOf(instance), 'full'), options);
}

export function simpleInfo(instance: Entity, options: ProjectOptions = {}): InfoRecord {
  return project(instance, fieldSetFor(entityClassOf(instance), 'simple'), options);
}

/** Full or simple projection, following the instance's view mode. */
export function autoInfo(instance: Entity, options: ProjectOptions = {}): InfoRecord {
  const mode = options.mode ?? getViewMode(instance);
  return mode === 'full' ? fullInfo(instance, { ...options, mode }) : simpleInfo(instance, { ...options, mode });
}
