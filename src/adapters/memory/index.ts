import { InputValidationException, NotFoundException } from '../../core/exceptions.js';
import { ownSchema, readAttribute, type Entity, type EntityClass } from '../../schema/entity.js';

type Key = string | number;

/**
 * In-memory entity store keyed by the schema's primary key.
 *
 * Module-level state is per process; use it for tests, fixtures and
 * single-process tools.
 *
 * @example
 * ```ts
 * const books = new MemoryEntityStore<Book>(Book);
 * books.add(new Book({ id: 1, title: 'Dune' }));
 * books.getOrNone(2); // null
 * ```
 */
export class MemoryEntityStore<T extends Entity> {
  private readonly records = new Map<string, T>();
  private readonly primaryKey: string;

  constructor(private readonly entityClass: EntityClass) {
    this.primaryKey = ownSchema(entityClass)?.primaryKey ?? 'id';
  }

  private keyOf(item: T): string {
    const value = readAttribute(item, this.primaryKey);
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new InputValidationException(
        `${this.entityClass.name} is missing its primary key '${this.primaryKey}'`
      );
    }
    return String(value);
  }

  add(...items: T[]): this {
    for (const item of items) {
      this.records.set(this.keyOf(item), item);
    }
    return this;
  }

  all(): T[] {
    return Array.from(this.records.values());
  }

  count(): number {
    return this.records.size;
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.all().filter(predicate);
  }

  /**
   * @throws NotFoundException when no entity has this key
   */
  get(key: Key): T {
    const item = this.records.get(String(key));
    if (!item) {
      throw new NotFoundException(this.entityClass.name);
    }
    return item;
  }

  /** The entity with this key, or null. */
  getOrNone(key: Key): T | null {
    return this.records.get(String(key)) ?? null;
  }

  delete(key: Key): boolean {
    return this.records.delete(String(key));
  }

  clear(): void {
    this.records.clear();
  }

  /**
   * Yield `count` entities drawn uniformly at random, with replacement.
   * Yields nothing when the store is empty.
   */
  *randomObjects(count: number = Number.POSITIVE_INFINITY, random: () => number = Math.random): Generator<T> {
    const items = this.all();
    if (items.length === 0) {
      return;
    }
    for (let drawn = 0; drawn < count; drawn++) {
      const index = Math.min(items.length - 1, Math.floor(random() * items.length));
      yield items[index];
    }
  }
}
