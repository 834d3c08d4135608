import type { FieldSetSpec } from '../serialization/types.js';
import type { Field } from './fields.js';
import { RelatedCollection } from './related.js';
import { EntitySchema } from './schema.js';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function hydrateRelated(descriptor: Field, value: unknown): unknown {
  const Related = descriptor.relatedEntity();
  if (Related && isPlainRecord(value)) {
    return new Related(value);
  }
  return value;
}

function hydrate(descriptor: Field, value: unknown): unknown {
  switch (descriptor.kind) {
    case 'toMany':
      if (Array.isArray(value)) {
        return new RelatedCollection<object>(
          value.map((item: unknown) => hydrateRelated(descriptor, item)).filter(
            (item): item is object => typeof item === 'object' && item !== null
          )
        );
      }
      return value;
    case 'toOne':
      return hydrateRelated(descriptor, value);
    default:
      return value;
  }
}

/**
 * Base class of every entity type.
 *
 * Subclasses own a `schema` and may configure the projection field sets.
 * Attributes are assigned from the constructor's data record, so subclasses
 * declare them with `declare` rather than initializing class fields. Every
 * declared field becomes an attribute: missing values take the field default,
 * an empty RelatedCollection for to-many fields, or null.
 *
 * @example
 * ```ts
 * class Author extends withInfo(Entity) {
 *   static schema = defineSchema('Author', {
 *     id: field({ primaryKey: true }),
 *     name: field({ verboseName: 'Name' }),
 *     books: toMany(() => Book),
 *   });
 *   static fullInfoFields: FieldSetSpec = ['id', 'name', 'books'];
 *   static simpleInfoFields: FieldSetSpec = ['id', 'name'];
 *
 *   declare id: number;
 *   declare name: string;
 *   declare books: RelatedCollection<Book>;
 * }
 * ```
 */
export abstract class Entity {
  static schema: EntitySchema | undefined;
  static fullInfoFields: FieldSetSpec = [];
  static simpleInfoFields: FieldSetSpec = [];
  static showComments = false;

  constructor(data: Record<string, unknown> = {}) {
    const schema = ownSchema(new.target);
    const values: Record<string, unknown> = {};

    if (schema) {
      for (const descriptor of schema.fields) {
        if (descriptor.name in data) continue;
        if (descriptor.hasDefault) {
          values[descriptor.name] = descriptor.getDefault();
        } else if (descriptor.isManyToMany) {
          values[descriptor.name] = new RelatedCollection();
        } else {
          values[descriptor.name] = null;
        }
      }
    }

    for (const [key, value] of Object.entries(data)) {
      const descriptor = schema?.getField(key);
      values[key] = descriptor ? hydrate(descriptor, value) : value;
    }

    Object.assign(this, values);
  }
}

export type EntityClass = typeof Entity;

export function isEntityClass(value: unknown): value is EntityClass {
  return typeof value === 'function' && (value === Entity || value.prototype instanceof Entity);
}

export function isEntity(value: unknown): value is Entity {
  return value instanceof Entity;
}

/**
 * Schema declared by the class itself. Inherited schemas do not count: every
 * entity type owns its metadata.
 */
export function ownSchema(target: object): EntitySchema | undefined {
  if (!Object.prototype.hasOwnProperty.call(target, 'schema')) {
    return undefined;
  }
  if (!isEntityClass(target)) {
    return undefined;
  }
  return target.schema instanceof EntitySchema ? target.schema : undefined;
}

export function entityClassOf(instance: Entity): EntityClass {
  const ctor: unknown = instance.constructor;
  return isEntityClass(ctor) ? ctor : Entity;
}

/** Read an attribute by name, running getters. */
export function readAttribute(instance: object, name: string): unknown {
  return Reflect.get(instance, name);
}
