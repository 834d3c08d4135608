import { getComputedDescription } from '../schema/behaviors.js';
import { readAttribute } from '../schema/entity.js';
import type { Field } from '../schema/fields.js';
import type { EntitySchema } from '../schema/schema.js';
import { classify, relatedItems } from './relations.js';
import type {
  FieldAccessor,
  FieldRef,
  FieldResolution,
  ResolveContext,
  ViewMode,
} from './types.js';

/** Values that short-circuit to null without relation handling. */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === '' || value === 0 || value === 0n) {
    return true;
  }
  if (typeof value === 'number' && Number.isNaN(value)) {
    return true;
  }
  return Array.isArray(value) && value.length === 0;
}

/**
 * Read a dotted attribute path off a value. Missing steps yield null; a
 * function at the end of the path is called on its owner.
 */
export function readPath(target: unknown, path: string, separator: string): unknown {
  let owner: unknown = undefined;
  let current: unknown = target;

  for (const segment of path.split(separator)) {
    if ((typeof current !== 'object' && typeof current !== 'function') || current === null || !(segment in current)) {
      return null;
    }
    owner = current;
    current = readAttribute(current, segment);
  }

  if (typeof current === 'function') {
    return Reflect.apply(current, owner, []);
  }
  return current ?? null;
}

abstract class BaseAccessor implements FieldAccessor {
  constructor(
    readonly ref: FieldRef,
    readonly field: Field | undefined,
    protected readonly separator: string
  ) {}

  resolve(instance: object, ctx: ResolveContext): FieldResolution | undefined {
    const { name } = this.ref;
    if (!(name in instance)) {
      return undefined;
    }

    const label = this.field?.verboseName ?? '';
    const raw = readAttribute(instance, name);

    if (isEmptyValue(raw)) {
      return { outputName: name, value: null, label };
    }

    if (typeof raw === 'function') {
      const description = getComputedDescription(raw);
      return {
        outputName: description?.name ?? name,
        value: Reflect.apply(raw, instance, []),
        label: description?.shortDescription ?? label,
      };
    }

    return { outputName: name, value: this.resolveValue(raw, ctx), label };
  }

  /** Mode forced by a `full`/`simple` qualifier, else the inherited one. */
  protected modeFor(ctx: ResolveContext): ViewMode {
    const { qualifier } = this.ref;
    if (qualifier === 'full' || qualifier === 'simple') {
      return qualifier;
    }
    return ctx.mode;
  }

  /** Qualifier naming an attribute of the related value, if any. */
  protected get attributeQualifier(): string | undefined {
    const { qualifier } = this.ref;
    return qualifier === undefined || qualifier === 'full' || qualifier === 'simple' ? undefined : qualifier;
  }

  protected resolveValue(raw: unknown, ctx: ResolveContext): unknown {
    const attribute = this.attributeQualifier;

    switch (classify(raw, this.field)) {
      case 'toOne':
        return attribute !== undefined
          ? readPath(raw, attribute, this.separator)
          : ctx.projectRelated(raw, this.modeFor(ctx));
      case 'toMany': {
        const items = relatedItems(raw);
        return attribute !== undefined
          ? items.map((item) => readPath(item, attribute, this.separator))
          : items.map((item) => ctx.projectRelated(item, this.modeFor(ctx)));
      }
      default:
        return attribute !== undefined && typeof raw === 'object'
          ? readPath(raw, attribute, this.separator)
          : raw;
    }
  }
}

/** Field declared in the entity schema. */
export class StoredFieldAccessor extends BaseAccessor {
  constructor(ref: FieldRef, field: Field, separator: string) {
    super(ref, field, separator);
  }
}

/** Methods, getters and ad-hoc attributes with no schema descriptor. */
export class AttributeAccessor extends BaseAccessor {
  constructor(ref: FieldRef, separator: string) {
    super(ref, undefined, separator);
  }
}

export function accessorFor(schema: EntitySchema | undefined, ref: FieldRef, separator: string): FieldAccessor {
  const descriptor = schema?.getField(ref.name);
  return descriptor ? new StoredFieldAccessor(ref, descriptor, separator) : new AttributeAccessor(ref, separator);
}
