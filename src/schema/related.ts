/**
 * Queryable collection of related entities, the value of a to-many field.
 */
export class RelatedCollection<T extends object> implements Iterable<T> {
  private readonly items: T[];

  constructor(items: Iterable<T> = []) {
    this.items = [...items];
  }

  all(): T[] {
    return [...this.items];
  }

  count(): number {
    return this.items.length;
  }

  add(...items: T[]): this {
    this.items.push(...items);
    return this;
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
