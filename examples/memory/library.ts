/**
 * Example: projections of an in-memory library
 *
 * Demonstrates simple/full views, qualifiers, comment mode and a patch that
 * extends an entity after it was declared.
 *
 * Run with: npx tsx examples/memory/library.ts
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import {
  Entity,
  withInfo,
  defineSchema,
  field,
  toOne,
  toMany,
  patchEntity,
  callOverridden,
  computed,
  MemoryEntityStore,
  RelatedCollection,
  createErrorHandler,
  createInfoHandler,
  createInfoListHandler,
  jsonSuccess,
  project,
  type FieldSetSpec,
} from '../../src/index.js';

// ============================================================================
// Entities
// ============================================================================

class Author extends withInfo(Entity) {
  static schema = defineSchema('Author', {
    id: field({ primaryKey: true }),
    name: field({ verboseName: 'Name' }),
    born: field({ verboseName: 'Year of birth' }),
    books: toMany(() => Book, { verboseName: 'Books' }),
  });
  static fullInfoFields: FieldSetSpec = ['id', 'name', 'born', 'books'];
  static simpleInfoFields: FieldSetSpec = ['id', 'name'];

  declare id: number;
  declare name: string;
  declare born: number;
  declare books: RelatedCollection<Book>;

  label(): string {
    return this.name;
  }
}

class Book extends withInfo(Entity) {
  static schema = defineSchema('Book', {
    id: field({ primaryKey: true }),
    title: field({ verboseName: 'Title' }),
    isbn: field({ verboseName: 'ISBN' }),
    pages: field({ verboseName: 'Pages' }),
    author: toOne(() => Author, { verboseName: 'Author' }),
  });
  static fullInfoFields: FieldSetSpec = ['id', 'title', ['details', ['isbn', 'pages']], 'author'];
  static simpleInfoFields: FieldSetSpec = ['id', 'title', 'author.name'];
  static showComments = true;

  declare id: number;
  declare title: string;
  declare isbn: string;
  declare pages: number;
  declare author: Author | null;
}

// Later, possibly in another module: extend Author without touching its class.
patchEntity(Author, {
  born: field({ verboseName: 'Born' }),
  label() {
    return `${String(callOverridden(this, 'label'))} (${this.born})`;
  },
  bookCount: computed(
    function (this: Author) {
      return this.books.count();
    },
    { name: 'book_count', shortDescription: 'Number of books' }
  ),
});
Author.fullInfoFields = ['id', 'label', 'bookCount', 'books'];

// ============================================================================
// Sample Data
// ============================================================================

const authors = new MemoryEntityStore<Author>(Author);
const books = new MemoryEntityStore<Book>(Book);

function addSampleData() {
  const ada = new Author({ id: 1, name: 'Ada Example', born: 1950 });
  const sam = new Author({ id: 2, name: 'Sam Sample', born: 1972 });
  const first = new Book({ id: 1, title: 'First Light', isbn: '000-1', pages: 320, author: ada });
  const second = new Book({ id: 2, title: 'Second Wind', isbn: '000-2', pages: 0, author: ada });
  const third = new Book({ id: 3, title: 'Third Shore', isbn: '000-3', pages: 210, author: sam });

  ada.books.add(first, second);
  sam.books.add(third);
  authors.add(ada, sam);
  books.add(first, second, third);
}

addSampleData();

// ============================================================================
// App
// ============================================================================

const app = new Hono();
app.onError(createErrorHandler());

app.get('/authors', createInfoListHandler(() => authors.all()));
app.get('/authors/:id', createInfoHandler((c) => authors.getOrNone(c.req.param('id') ?? ''), { resource: 'Author' }));
app.get('/books', createInfoListHandler(() => books.all()));
app.get('/books/:id', createInfoHandler((c) => books.getOrNone(c.req.param('id') ?? ''), { resource: 'Book' }));
app.get('/books/random/pick', (c) => {
  const picks = [...books.randomObjects(2)].map((book) => project(book, ['title', 'author.full']));
  return jsonSuccess(c, picks);
});

const port = 3000;
console.log(`Library example running at http://localhost:${port}`);
console.log('\nTry:');
console.log(`  curl http://localhost:${port}/authors/1?view=full | jq`);
console.log(`  curl http://localhost:${port}/books/1 | jq`);
console.log(`  curl "http://localhost:${port}/books?view=full&comments=false" | jq`);
console.log(`  curl http://localhost:${port}/books/random/pick | jq`);

serve({ fetch: app.fetch, port });
