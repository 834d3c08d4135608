/**
 * Tests for the Hono helpers serving projections.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import {
  Entity,
  withInfo,
  defineSchema,
  field,
  toOne,
  MemoryEntityStore,
  createErrorHandler,
  createInfoHandler,
  createInfoListHandler,
  jsonSuccess,
  jsonFail,
  type FieldSetSpec,
} from '../src/index.js';

// ============================================================================
// Test Data
// ============================================================================

class Novelist extends withInfo(Entity) {
  static schema = defineSchema('Novelist', {
    id: field({ primaryKey: true }),
    name: field({ verboseName: 'Name' }),
  });
  static fullInfoFields: FieldSetSpec = ['id', 'name'];

  declare id: number;
  declare name: string;
}

class Novel extends withInfo(Entity) {
  static schema = defineSchema('Novel', {
    id: field({ primaryKey: true }),
    title: field({ verboseName: 'Title' }),
    pages: field({ verboseName: 'Pages' }),
    novelist: toOne(() => Novelist, { verboseName: 'Novelist' }),
  });
  static fullInfoFields: FieldSetSpec = ['id', 'title', 'pages', 'novelist'];
  static simpleInfoFields: FieldSetSpec = ['id', 'title'];

  declare id: number;
  declare title: string;
  declare pages: number;
  declare novelist: Novelist | null;
}

let novels: MemoryEntityStore<Novel>;

function createApp() {
  const app = new Hono();
  app.onError(createErrorHandler());
  app.get('/novels', createInfoListHandler(() => novels.all()));
  app.get(
    '/novels/:id',
    createInfoHandler((c) => novels.getOrNone(c.req.param('id') ?? ''), { resource: 'Novel' })
  );
  app.get('/conflict', (c) => jsonFail(c, 'Already exists', 409, 'CONFLICT'));
  app.get('/created', (c) => jsonSuccess(c, { id: 3 }, 201));
  return app;
}

beforeEach(() => {
  const frank = new Novelist({ id: 7, name: 'Frank' });
  novels = new MemoryEntityStore<Novel>(Novel).add(
    new Novel({ id: 1, title: 'Dune', pages: 412, novelist: frank }),
    new Novel({ id: 2, title: 'Children', pages: 0, novelist: frank })
  );
});

// ============================================================================
// Tests
// ============================================================================

describe('HTTP helpers', () => {
  describe('createInfoHandler', () => {
    it('should respond with the instance view by default', async () => {
      const res = await createApp().request('/novels/1');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, result: { id: 1, title: 'Dune' } });
    });

    it('should follow the view mode set on the instance', async () => {
      novels.get(1).setFull();
      const res = await createApp().request('/novels/1');

      expect(await res.json()).toEqual({
        success: true,
        result: { id: 1, title: 'Dune', pages: 412, novelist: { id: 7, name: 'Frank' } },
      });
    });

    it('should render the full view on request', async () => {
      const res = await createApp().request('/novels/1?view=full');

      expect(await res.json()).toEqual({
        success: true,
        result: { id: 1, title: 'Dune', pages: 412, novelist: { id: 7, name: 'Frank' } },
      });
    });

    it('should add labels when comments are requested', async () => {
      const res = await createApp().request('/novels/1?view=simple&comments=1');

      expect(await res.json()).toEqual({
        success: true,
        result: { id: 1, title: 'Dune', _comments: { id: '', title: 'Title' } },
      });
    });

    it('should respond 404 when the loader finds nothing', async () => {
      const res = await createApp().request('/novels/99');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Novel not found' },
      });
    });

    it('should respond 400 for an unknown view', async () => {
      const res = await createApp().request('/novels/1?view=everything');
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Validation failed');
      expect(body.error.details[0].path).toBe('view');
    });

    it('should respond 400 for an unknown comments flag', async () => {
      const res = await createApp().request('/novels/1?comments=yes');
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.details[0].path).toBe('comments');
    });
  });

  describe('createInfoListHandler', () => {
    it('should project every loaded entity', async () => {
      const res = await createApp().request('/novels?view=full');

      expect(await res.json()).toEqual({
        success: true,
        result: [
          { id: 1, title: 'Dune', pages: 412, novelist: { id: 7, name: 'Frank' } },
          { id: 2, title: 'Children', pages: null, novelist: { id: 7, name: 'Frank' } },
        ],
      });
    });
  });

  describe('response helpers', () => {
    it('should wrap results in the success envelope', async () => {
      const res = await createApp().request('/created');

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ success: true, result: { id: 3 } });
    });

    it('should wrap failures in the error envelope', async () => {
      const res = await createApp().request('/conflict');

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'CONFLICT', message: 'Already exists' },
      });
    });
  });
});
