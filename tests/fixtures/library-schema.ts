import { col } from '../../src/schema/column-types.js';
import { defineTable, defineView, type TableDef } from '../../src/schema/table.js';

export const Category = defineTable('category', {
  id: col.primaryKey(col.bigint()),
  name: col.notNull(col.varchar(255))
});

export const Author = defineTable('author', {
  id: col.primaryKey(col.int()),
  name: col.notNull(col.text())
});

export const Book = defineTable('book', {
  id: col.primaryKey(col.int()),
  title: col.notNull(col.text()),
  category_id: col.references(col.bigint(), Category),
  author_id: col.references(col.int(), Author, { onDelete: 'CASCADE' })
});

export const Review = defineTable('review', {
  id: col.primaryKey(col.int()),
  book_id: col.references(col.int(), Book),
  rating: col.int()
});

export const Account = defineTable('account', {
  id: col.primaryKey(col.int()),
  owner: col.text()
});

export const Transfer = defineTable('transfer', {
  id: col.primaryKey(col.int()),
  from_account_id: col.references(col.int(), Account),
  to_account_id: col.references(col.int(), Account),
  amount: col.decimal(12, 2)
});

export const Employee: TableDef = defineTable('employee', {
  id: col.primaryKey(col.int()),
  name: col.text(),
  manager_id: col.references(col.int(), () => Employee)
});

export const BookListing = defineView(
  'book_listing',
  {
    book_id: col.int(),
    title: col.text(),
    category_id: col.references(col.bigint(), Category)
  },
  { query: 'SELECT id AS book_id, title, category_id FROM book' }
);

export const ArchivedBook = defineTable(
  'book',
  {
    id: col.primaryKey(col.int()),
    title: col.text()
  },
  { schema: 'archive' }
);
