import { getConfig } from '../config/index.js';
import { PatchSpecError, SchemaShapeError } from '../core/exceptions.js';
import { isBehavior, type AnyFunction, type Behavior } from '../schema/behaviors.js';
import { isEntityClass, ownSchema, readAttribute } from '../schema/entity.js';
import { Field } from '../schema/fields.js';
import type { BehaviorKind, EntitySchema } from '../schema/schema.js';
import { SchemaPatchBuilder } from './builder.js';

/** Instance method merged into an entity; receives the instance as `this`. */
export type Method<T> = (this: T, ...args: never[]) => unknown;

export type PatchMember<T> = Field | Behavior | Method<T>;

export type PatchEntry<T> = readonly [name: string, member: PatchMember<T>];

/**
 * Fields and callables to merge into an entity: a name → member record, or
 * an explicit list of entries.
 */
export type PatchSpec<T> =
  | (Record<string, PatchMember<T>> & ThisType<T>)
  | ReadonlyArray<PatchEntry<T>>;

/** Any class; the entity schema is checked at runtime. */
export type PatchTarget = abstract new (...args: never[]) => object;

type NormalizedMember =
  | { kind: 'field'; name: string; field: Field }
  | { kind: 'method'; name: string; fn: AnyFunction }
  | { kind: 'behavior'; name: string; behavior: Behavior };

function isCallable(value: unknown): value is AnyFunction {
  return typeof value === 'function';
}

function isEntryList<T>(spec: PatchSpec<T>): spec is ReadonlyArray<PatchEntry<T>> {
  return Array.isArray(spec);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function normalizeMember(name: string, member: unknown): NormalizedMember {
  if (name.length === 0) {
    throw new PatchSpecError('Patch member names must not be empty');
  }
  if (member instanceof Field) {
    return { kind: 'field', name, field: member };
  }
  if (isCallable(member)) {
    return { kind: 'method', name, fn: member };
  }
  if (isBehavior(member)) {
    return { kind: 'behavior', name, behavior: member };
  }
  throw new PatchSpecError(`Unsupported patch member '${name}'`, { name, type: describeValue(member) });
}

function findDescriptor(start: object | null, name: string): PropertyDescriptor | undefined {
  for (let current = start; current !== null; current = Object.getPrototypeOf(current)) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) {
      return descriptor;
    }
  }
  return undefined;
}

/**
 * Define `name` on `owner`, first re-exposing any existing (own or inherited)
 * member under `name + suffix`.
 */
function defineShadowing(
  owner: object,
  name: string,
  descriptor: PropertyDescriptor,
  suffix: string
): PropertyDescriptor | undefined {
  const existing = findDescriptor(owner, name);
  if (existing) {
    Object.defineProperty(owner, name + suffix, { ...existing, configurable: true });
  }
  Object.defineProperty(owner, name, { ...descriptor, enumerable: false, configurable: true });
  return existing;
}

interface Installed {
  kind: BehaviorKind;
  /** Kind of the member re-exposed under the overridden alias, if any. */
  shadowed?: BehaviorKind;
}

function shadowedKind(existing: PropertyDescriptor | undefined, side: 'instance' | 'static'): BehaviorKind | undefined {
  if (!existing) return undefined;
  if (existing.get || existing.set) return 'property';
  return side === 'instance' ? 'method' : 'staticMethod';
}

function isGetterOnly(descriptor: PropertyDescriptor | undefined): boolean {
  return descriptor?.get !== undefined && descriptor.set === undefined;
}

/**
 * Stored fields are assigned when an instance is constructed, so after the
 * patch no field may be backed by an accessor without a setter.
 */
function assertAssignableFields(proto: object, schema: EntitySchema, members: readonly NormalizedMember[]): void {
  const fieldNames = new Set(schema.fieldNames);
  const instanceMembers = new Set<string>();

  for (const member of members) {
    if (member.kind === 'field') {
      fieldNames.add(member.name);
    } else if (member.kind === 'method' || member.behavior.kind === 'property') {
      instanceMembers.add(member.name);
    }
  }

  for (const member of members) {
    if (member.kind === 'behavior' && member.behavior.kind === 'property' && !member.behavior.set) {
      if (fieldNames.has(member.name)) {
        throw new PatchSpecError(`Property '${member.name}' has no setter but names a stored field`, {
          name: member.name,
        });
      }
    }
    if (member.kind === 'field' && !instanceMembers.has(member.name)) {
      if (isGetterOnly(findDescriptor(proto, member.name))) {
        throw new PatchSpecError(`Field '${member.name}' is shadowed by a getter without a setter`, {
          name: member.name,
        });
      }
    }
  }
}

function installBehavior(
  target: PatchTarget,
  member: Extract<NormalizedMember, { kind: 'method' | 'behavior' }>,
  suffix: string
): Installed {
  const proto: object = target.prototype;

  if (member.kind === 'method') {
    const existing = defineShadowing(proto, member.name, { value: member.fn, writable: true }, suffix);
    return { kind: 'method', shadowed: shadowedKind(existing, 'instance') };
  }

  const { behavior } = member;
  switch (behavior.kind) {
    case 'property': {
      const existing = defineShadowing(proto, member.name, { get: behavior.get, set: behavior.set }, suffix);
      return { kind: 'property', shadowed: shadowedKind(existing, 'instance') };
    }
    case 'staticMethod': {
      const existing = defineShadowing(target, member.name, { value: behavior.fn, writable: true }, suffix);
      return { kind: 'staticMethod', shadowed: shadowedKind(existing, 'static') };
    }
    case 'classMethod': {
      const { fn } = behavior;
      const bound = (...args: unknown[]): unknown => Reflect.apply(fn, target, args);
      const existing = defineShadowing(target, member.name, { value: bound, writable: true }, suffix);
      return { kind: 'classMethod', shadowed: shadowedKind(existing, 'static') };
    }
  }
}

/**
 * Merge fields and callables into an existing entity.
 *
 * - A field replaces any field of the same name and takes over its
 *   declaration order, so the column keeps its position.
 * - A callable replacing an existing member keeps the old one reachable as
 *   `<name>__overridden`, even when it was inherited.
 *
 * Every member is validated before the entity is touched. The entity receives
 * a new schema; the previous schema object is not modified.
 *
 * @throws SchemaShapeError when the target does not own an entity schema
 * @throws PatchSpecError when a member is not a field, function or behavior,
 *   or when a stored field would be backed by a getter without a setter
 *
 * @example
 * ```ts
 * patchEntity(User, {
 *   email: field({ verboseName: 'E-mail address' }),
 *   nickname: field({ verboseName: 'Nickname', default: '' }),
 *   save(...args: unknown[]) {
 *     callOverridden(this, 'save', ...args);
 *     audit(this);
 *   },
 * });
 * ```
 */
export function patchEntity<C extends PatchTarget>(target: C, spec: PatchSpec<InstanceType<C>>): void {
  if (!isEntityClass(target)) {
    throw new SchemaShapeError(`Cannot patch '${target.name}': not an entity class`);
  }
  const schema = ownSchema(target);
  if (!schema) {
    throw new SchemaShapeError(`Cannot patch '${target.name}': it does not own an entity schema`);
  }

  const entries: ReadonlyArray<readonly [string, unknown]> = isEntryList(spec) ? spec : Object.entries(spec);
  const members = entries.map(([name, member]) => normalizeMember(name, member));
  assertAssignableFields(target.prototype, schema, members);

  const { overriddenSuffix } = getConfig();
  const builder = new SchemaPatchBuilder(schema);

  for (const member of members) {
    if (member.kind === 'field') {
      builder.field(member.name, member.field);
      continue;
    }
    const installed = installBehavior(target, member, overriddenSuffix);
    if (installed.shadowed) {
      builder.behavior(member.name + overriddenSuffix, schema.behaviors.get(member.name) ?? installed.shadowed);
    }
    builder.behavior(member.name, installed.kind);
  }

  target.schema = builder.build();
}

/**
 * Call the member a patch shadowed.
 *
 * @throws PatchSpecError when nothing was shadowed under that name
 */
export function callOverridden(instance: object, name: string, ...args: unknown[]): unknown {
  const alias = name + getConfig().overriddenSuffix;
  const original = readAttribute(instance, alias);
  if (typeof original !== 'function') {
    throw new PatchSpecError(`No overridden member '${alias}'`);
  }
  return Reflect.apply(original, instance, args);
}
