/**
 * Example: entities backed by Drizzle tables
 *
 * Rows are loaded with Drizzle and wrapped in entities whose schemas are
 * derived from the table definitions.
 *
 * Usage:
 * 1. Start PostgreSQL and create the tables from ./schema.ts
 * 2. Run with: npx tsx examples/drizzle/catalog.ts
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import {
  Entity,
  withInfo,
  toOne,
  createErrorHandler,
  createInfoHandler,
  type FieldSetSpec,
} from '../../src/index.js';
import { schemaFromTable } from '../../src/adapters/drizzle/index.js';
import * as tables from './schema.js';

const { Pool } = pg;

const pool = new Pool({
  host: process.env.DB_HOST || 'localhost',
  port: Number(process.env.DB_PORT) || 5432,
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'catalog',
});

const db = drizzle(pool, { schema: tables });

// ============================================================================
// Entities
// ============================================================================

class Publisher extends withInfo(Entity) {
  static schema = schemaFromTable(tables.publishers, {
    name: 'Publisher',
    verboseNames: { name: 'Name', city: 'City' },
  });
  static fullInfoFields: FieldSetSpec = ['id', 'name', 'city'];
  static simpleInfoFields: FieldSetSpec = ['name'];
}

class Title extends withInfo(Entity) {
  static schema = schemaFromTable(tables.titles, {
    name: 'Title',
    verboseNames: { name: 'Name', releasedAt: 'Released' },
    relations: { publisher: toOne(() => Publisher, { verboseName: 'Publisher' }) },
  });
  static fullInfoFields: FieldSetSpec = ['id', 'name', 'releasedAt', 'publisher'];
  static simpleInfoFields: FieldSetSpec = ['id', 'name', 'publisher.name'];
}

async function loadTitle(id: number): Promise<Title | null> {
  const [row] = await db
    .select()
    .from(tables.titles)
    .leftJoin(tables.publishers, eq(tables.titles.publisherId, tables.publishers.id))
    .where(eq(tables.titles.id, id));
  if (!row) {
    return null;
  }
  return new Title({ ...row.titles, publisher: row.publishers });
}

// ============================================================================
// App
// ============================================================================

const app = new Hono();
app.onError(createErrorHandler());

app.get('/titles/:id', createInfoHandler((c) => loadTitle(Number(c.req.param('id'))), { resource: 'Title' }));

const port = 3001;
console.log(`Catalog example running at http://localhost:${port}`);
console.log(`  curl http://localhost:${port}/titles/1?view=full | jq`);

serve({ fetch: app.fetch, port });
