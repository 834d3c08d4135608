/**
 * Entity schemas derived from Drizzle table definitions.
 *
 * @example
 * ```ts
 * import { pgTable, serial, text } from 'drizzle-orm/pg-core';
 * import { schemaFromTable } from 'entity-kit/adapters/drizzle';
 *
 * const books = pgTable('books', {
 *   id: serial('id').primaryKey(),
 *   title: text('title').notNull(),
 * });
 *
 * class Book extends withInfo(Entity) {
 *   static schema = schemaFromTable(books, {
 *     verboseNames: { title: 'Title' },
 *     relations: { author: toOne(() => Author) },
 *   });
 * }
 * ```
 */

import { getTableColumns, getTableName, type Table } from 'drizzle-orm';
import { field, type Field } from '../../schema/fields.js';
import { defineSchema, type EntitySchema } from '../../schema/schema.js';

export interface TableFieldOptions {
  /** Labels keyed by the table's column keys. */
  verboseNames?: Record<string, string>;
  /** Instance defaults keyed by the table's column keys. */
  defaults?: Record<string, unknown>;
}

export interface TableSchemaOptions extends TableFieldOptions {
  /** Schema name; defaults to the table name. */
  name?: string;
  /** Relation fields, declared after the columns. */
  relations?: Record<string, Field>;
}

/**
 * One plain field per column, in column order, keyed like the table's
 * columns (the TypeScript keys, not the database names).
 */
export function fieldsFromTable(table: Table, options: TableFieldOptions = {}): Record<string, Field> {
  const fields: Record<string, Field> = {};

  for (const [key, column] of Object.entries(getTableColumns(table))) {
    fields[key] = field({
      verboseName: options.verboseNames?.[key],
      primaryKey: column.primary,
      default: options.defaults?.[key],
    });
  }

  return fields;
}

export function schemaFromTable(table: Table, options: TableSchemaOptions = {}): EntitySchema {
  const fields = fieldsFromTable(table, options);

  for (const [name, relation] of Object.entries(options.relations ?? {})) {
    fields[name] = relation.redeclare();
  }

  return defineSchema(options.name ?? getTableName(table), fields);
}
