/**
 * Tests for the entity model and the relation helpers used by projections.
 */
import { describe, it, expect } from 'vitest';
import {
  Entity,
  EntitySchema,
  RelatedCollection,
  StoredFieldAccessor,
  AttributeAccessor,
  SchemaShapeError,
  defineSchema,
  field,
  toOne,
  toMany,
  isEntity,
  isEntityClass,
  ownSchema,
  entityClassOf,
  classify,
  relatedItems,
  readPath,
  parseFieldRef,
  accessorFor,
  isEmptyValue,
} from '../src/index.js';

// ============================================================================
// Test Data
// ============================================================================

class Publisher extends Entity {
  static schema = defineSchema('Publisher', {
    code: field({ primaryKey: true }),
    name: field({ verboseName: 'Name' }),
  });

  declare code: string;
  declare name: string;
}

class Shelf extends Entity {
  static schema = defineSchema('Shelf', {
    id: field(),
    label: field({ default: 'unsorted' }),
    tags: field({ default: () => [] }),
    publisher: toOne(() => Publisher),
    items: toMany(() => Publisher),
  });

  declare id: number;
  declare label: string;
  declare tags: string[];
  declare publisher: Publisher | null;
  declare items: RelatedCollection<Publisher>;
}

// ============================================================================
// Tests
// ============================================================================

describe('entity model', () => {
  describe('defineSchema', () => {
    it('should order fields by declaration order', () => {
      expect(Shelf.schema.fieldNames).toEqual(['id', 'label', 'tags', 'publisher', 'items']);
      expect(Shelf.schema.localFields.map((descriptor) => descriptor.name)).toEqual([
        'id',
        'label',
        'tags',
        'publisher',
      ]);
      expect(Shelf.schema.localManyToMany.map((descriptor) => descriptor.name)).toEqual(['items']);
    });

    it('should report the flagged primary key, else id', () => {
      expect(Publisher.schema.primaryKey).toBe('code');
      expect(Shelf.schema.primaryKey).toBe('id');
    });

    it('should not share descriptors with the declaration', () => {
      const declared = field({ verboseName: 'Title' });
      const schema = defineSchema('Doc', { title: declared });

      expect(schema.getField('title')).not.toBe(declared);
      expect(schema.getField('title')?.declarationOrder).toBe(declared.declarationOrder);
      expect(declared.name).toBe('');
    });

    it('should reject duplicate names across both lists', () => {
      const plain = field().clone({ name: 'members' });
      const related = toMany(() => Publisher).clone({ name: 'members' });

      expect(() => new EntitySchema('Club', { localFields: [plain], localManyToMany: [related] })).toThrow(
        SchemaShapeError
      );
    });
  });

  describe('Entity', () => {
    it('should fill defaults for missing fields', () => {
      const shelf = new Shelf({ id: 1 });

      expect(shelf.label).toBe('unsorted');
      expect(shelf.tags).toEqual([]);
      expect(shelf.items).toBeInstanceOf(RelatedCollection);
      expect(shelf.items.count()).toBe(0);
    });

    it('should set declared fields without a value or default to null', () => {
      const shelf = new Shelf({ id: 1 });

      expect('publisher' in shelf).toBe(true);
      expect(shelf.publisher).toBeNull();
      expect(new Publisher({ name: 'North' }).code).toBeNull();
    });

    it('should call function defaults once per instance', () => {
      const first = new Shelf({ id: 1 });
      const second = new Shelf({ id: 2 });

      expect(first.tags).not.toBe(second.tags);
    });

    it('should hydrate plain records given for relations', () => {
      const shelf = new Shelf({
        id: 1,
        publisher: { code: 'p1', name: 'North' },
        items: [{ code: 'p2', name: 'South' }],
      });

      expect(shelf.publisher).toBeInstanceOf(Publisher);
      expect(shelf.publisher?.name).toBe('North');
      expect(shelf.items.all().map((item) => item.code)).toEqual(['p2']);
    });

    it('should keep attributes that have no descriptor', () => {
      const shelf = new Shelf({ id: 1, note: 'extra' });

      expect(Reflect.get(shelf, 'note')).toBe('extra');
    });

    it('should expose type guards', () => {
      const publisher = new Publisher({ code: 'p1' });

      expect(isEntity(publisher)).toBe(true);
      expect(isEntity({ code: 'p1' })).toBe(false);
      expect(isEntityClass(Publisher)).toBe(true);
      expect(isEntityClass(Map)).toBe(false);
      expect(entityClassOf(publisher)).toBe(Publisher);
    });

    it('should only return a schema the class owns', () => {
      class Imprint extends Publisher {}

      expect(ownSchema(Publisher)).toBe(Publisher.schema);
      expect(ownSchema(Imprint)).toBeUndefined();
    });
  });

  describe('RelatedCollection', () => {
    it('should keep insertion order', () => {
      const collection = new RelatedCollection<Publisher>();
      const a = new Publisher({ code: 'a' });
      const b = new Publisher({ code: 'b' });
      collection.add(a).add(b);

      expect(collection.all()).toEqual([a, b]);
      expect([...collection]).toEqual([a, b]);
      expect(collection.filter((item) => item.code === 'b')).toEqual([b]);
    });
  });
});

describe('relation helpers', () => {
  describe('classify', () => {
    it('should follow the descriptor kind', () => {
      expect(classify({ name: 'x' }, toOne(() => Publisher))).toBe('toOne');
      expect(classify([], toMany(() => Publisher))).toBe('toMany');
      expect(classify(new RelatedCollection(), field())).toBe('plain');
    });

    it('should treat a related collection without descriptor as to-many', () => {
      expect(classify(new RelatedCollection())).toBe('toMany');
      expect(classify([new Publisher()])).toBe('plain');
      expect(classify('text')).toBe('plain');
    });
  });

  describe('relatedItems', () => {
    it('should list the entities of a to-many value', () => {
      const a = new Publisher({ code: 'a' });

      expect(relatedItems(new RelatedCollection([a]))).toEqual([a]);
      expect(relatedItems([a])).toEqual([a]);
      expect(relatedItems(a)).toEqual([a]);
      expect(relatedItems(null)).toEqual([]);
    });
  });

  describe('readPath', () => {
    it('should walk nested attributes', () => {
      expect(readPath({ a: { b: 2 } }, 'a.b', '.')).toBe(2);
      expect(readPath({ a: null }, 'a.b', '.')).toBeNull();
      expect(readPath({ a: 1 }, 'z', '.')).toBeNull();
    });

    it('should call a method at the end of the path', () => {
      const target = {
        n: 2,
        double() {
          return this.n * 2;
        },
      };

      expect(readPath(target, 'double', '.')).toBe(4);
    });
  });

  describe('parseFieldRef', () => {
    it('should split on the first separator', () => {
      expect(parseFieldRef('title', '.')).toEqual({ name: 'title' });
      expect(parseFieldRef('author.full', '.')).toEqual({ name: 'author', qualifier: 'full' });
      expect(parseFieldRef('author.address.city', '.')).toEqual({ name: 'author', qualifier: 'address.city' });
    });
  });

  describe('accessorFor', () => {
    it('should pick the accessor by descriptor', () => {
      expect(accessorFor(Publisher.schema, { name: 'name' }, '.')).toBeInstanceOf(StoredFieldAccessor);
      expect(accessorFor(Publisher.schema, { name: 'display' }, '.')).toBeInstanceOf(AttributeAccessor);
      expect(accessorFor(undefined, { name: 'name' }, '.')).toBeInstanceOf(AttributeAccessor);
    });
  });

  describe('isEmptyValue', () => {
    it('should match the falsy values and empty arrays', () => {
      expect([null, undefined, false, 0, '', Number.NaN, []].map(isEmptyValue)).toEqual([
        true,
        true,
        true,
        true,
        true,
        true,
        true,
      ]);
      expect([1, 'x', true, [0], {}, new RelatedCollection()].map(isEmptyValue)).toEqual([
        false,
        false,
        false,
        false,
        false,
        false,
      ]);
    });
  });
});
