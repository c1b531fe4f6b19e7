import { afterEach, describe, expect, it, vi } from 'vitest';
import { ChildToParentJoin, tableNode } from '../../src/core/ast/relation-node.js';
import { and, eq, inList, isNotNull, isNull, like, neq, not, or, sql } from '../../src/core/ast/expression-builders.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { DialectError, InvalidQueryError } from '../../src/core/errors.js';
import { Criteria, criteria } from '../../src/query-builder/criteria.js';
import { createConsoleQueryLogger, type QueryLogEntry } from '../../src/query-builder/query-logger.js';
import { Author, Book, Category } from '../fixtures/library-schema.js';

describe('Criteria', () => {
  it('compiles a joined select with restrictions, ordering and paging', () => {
    const book = tableNode(Book).as('b');
    const category = tableNode(Category).as('c');
    const compiled = new Criteria(book.join(category))
      .select(book.projection('title'), category.projection('name', 'category'))
      .add(eq(book.field('id'), 7))
      .orderBy(book.field('title'), 'DESC')
      .limit(10)
      .offset(20)
      .compile('postgres');

    expect(compiled.sql).toBe(
      'SELECT "b"."title" AS "b__title", "c"."name" AS "category" ' +
        'FROM "book" AS "b" LEFT JOIN "category" AS "c" ON ("b"."category_id" = "c"."id") ' +
        'WHERE "b"."id" = $1 ORDER BY "b"."title" DESC LIMIT 10 OFFSET 20;'
    );
    expect(compiled.params).toEqual([7]);
  });

  it('uses the tree projections when nothing is selected', () => {
    const category = tableNode(Category).as('c');
    expect(new Criteria(category).toSql('sqlite')).toBe(
      'SELECT "c"."id" AS "c__id", "c"."name" AS "c__name" FROM "category" AS "c";'
    );
  });

  it('joins through the same builders as relation nodes', () => {
    const query = criteria(tableNode(Book).as('b')).join(tableNode(Category).as('c'), 'INNER');
    expect(query.tree).toBeInstanceOf(ChildToParentJoin);
    expect(query.relation).toBe(Book);
    expect(query.relationNodes().map(n => n.type)).toEqual(['Join', 'Table', 'Table']);
    expect(query.toSql(new SqliteDialect())).toBe(
      'SELECT "b"."id" AS "b__id", "b"."title" AS "b__title", "b"."category_id" AS "b__category_id", ' +
        '"b"."author_id" AS "b__author_id", "c"."id" AS "c__id", "c"."name" AS "c__name" ' +
        'FROM "book" AS "b" INNER JOIN "category" AS "c" ON ("b"."category_id" = "c"."id");'
    );
  });

  it('joins with an explicit condition', () => {
    const query = new Criteria(tableNode(Book).as('b')).join(tableNode(Author).as('a'), 'a.id = b.author_id', 'RIGHT');
    expect(query.tree.toString()).toBe('book AS b RIGHT JOIN author AS a ON a.id = b.author_id');
  });

  it('lists every column of every node', () => {
    const query = new Criteria(tableNode(Book).join(tableNode(Author)));
    expect(query.columns().map(ref => ref.column.name)).toEqual(['id', 'title', 'category_id', 'author_id', 'id', 'name']);
  });

  it('gives a repeated node its own correlation name', () => {
    const book = tableNode(Book);
    const query = new Criteria(book).join(book, 'true').select(book.projection('id'));
    const [, left, right] = query.relationNodes();
    expect(left).toBe(book);
    expect(right).not.toBe(book);
    expect(query.toSql('sqlite')).toBe(
      'SELECT "book"."id" AS "book__id" FROM "book" AS "book" LEFT JOIN "book" AS "book_2" ON (true);'
    );
  });

  it('returns a new criteria from every builder call', () => {
    const base = new Criteria(tableNode(Category).as('c'));
    const limited = base.limit(5);
    expect(limited).not.toBe(base);
    expect(base.toAst().limit).toBeUndefined();
    expect(limited.toAst().limit).toBe(5);
  });

  it('rejects invalid paging values', () => {
    const base = new Criteria(tableNode(Category));
    expect(() => base.limit(-1)).toThrow(InvalidQueryError);
    expect(() => base.offset(1.5)).toThrow('offset must be a non-negative integer, got 1.5');
  });

  it('rejects projections of nodes outside the tree', () => {
    const query = new Criteria(tableNode(Book).as('b')).select(tableNode(Author).as('a').all());
    expect(() => query.toAst()).toThrow('Node author AS a is not part of this criteria');
  });

  it('rejects restrictions on nodes outside the tree', () => {
    const book = tableNode(Book).as('b');
    const author = tableNode(Author).as('a');
    const base = new Criteria(book).select(book.projection('title'));

    expect(() => base.add(eq(author.field('name'), 'Ada')).toSql('sqlite')).toThrow(
      'Node author AS a is not part of this criteria'
    );
    expect(() => base.add(not(or(isNull(book.field('title')), eq(book.field('author_id'), author.field('id'))))).toAst())
      .toThrow(InvalidQueryError);
    expect(base.add(eq(book.field('title'), 'Dune')).toAst().where).toEqual(eq(book.field('title'), 'Dune'));
  });
});

describe('restrictions', () => {
  const book = tableNode(Book).as('b');
  const compileWhere = (...restrictions: Parameters<Criteria['add']>) =>
    new Criteria(book).select(book.projection('id')).add(...restrictions).compile('sqlite');

  it('AND together successive restrictions and parenthesize nested groups', () => {
    const compiled = new Criteria(book)
      .select(book.projection('id'))
      .add(eq(book.field('id'), 1))
      .add(or(like(book.field('title'), 'A%'), isNull(book.field('category_id'))))
      .compile('sqlite');
    expect(compiled.sql).toBe(
      'SELECT "b"."id" AS "b__id" FROM "book" AS "b" ' +
        'WHERE "b"."id" = ? AND ("b"."title" LIKE ? OR "b"."category_id" IS NULL);'
    );
    expect(compiled.params).toEqual([1, 'A%']);
  });

  it('bind list members and compare columns with columns', () => {
    const compiled = compileWhere(
      and(inList(book.field('id'), [1, 2, 3]), neq(book.field('category_id'), book.field('author_id')))
    );
    expect(compiled.sql).toBe(
      'SELECT "b"."id" AS "b__id" FROM "book" AS "b" ' +
        'WHERE "b"."id" IN (?, ?, ?) AND "b"."category_id" <> "b"."author_id";'
    );
    expect(compiled.params).toEqual([1, 2, 3]);
  });

  it('render an empty list as a false predicate', () => {
    expect(compileWhere(inList(book.field('id'), [])).sql).toBe(
      'SELECT "b"."id" AS "b__id" FROM "book" AS "b" WHERE 1 = 0;'
    );
  });

  it('negate and null-check', () => {
    expect(compileWhere(not(isNotNull(book.field('author_id')))).sql).toBe(
      'SELECT "b"."id" AS "b__id" FROM "book" AS "b" WHERE NOT ("b"."author_id" IS NOT NULL);'
    );
  });

  it('bind raw fragment parameters in dialect placeholders', () => {
    const compiled = new Criteria(book)
      .select(book.projection('id'))
      .add(eq(book.field('id'), 4), sql('length(b.title) > ?', 3))
      .compile(new PostgresDialect());
    expect(compiled.sql).toBe(
      'SELECT "b"."id" AS "b__id" FROM "book" AS "b" WHERE "b"."id" = $1 AND length(b.title) > $2;'
    );
    expect(compiled.params).toEqual([4, 3]);
  });

  it('reject raw fragments with a wrong parameter count', () => {
    expect(() => compileWhere(sql('b.id = ? OR b.id = ?', 1))).toThrow(DialectError);
  });
});

describe('query logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports every compiled statement', () => {
    const entries: QueryLogEntry[] = [];
    const category = tableNode(Category).as('c');
    const query = new Criteria(category, { logger: entry => entries.push(entry) }).add(eq(category.field('name'), 'Poetry'));

    query.compile('sqlite');
    query.toSql('sqlite');

    expect(entries).toHaveLength(2);
    expect(entries[0]).toEqual({
      sql: 'SELECT "c"."id" AS "c__id", "c"."name" AS "c__name" FROM "category" AS "c" WHERE "c"."name" = ?;',
      params: ['Poetry'],
      relation: 'category'
    });
  });

  it('keeps the logger on derived criteria', () => {
    const logger = vi.fn();
    new Criteria(tableNode(Category), { logger }).limit(1).compile('sqlite');
    expect(logger).toHaveBeenCalledTimes(1);
  });

  it('writes through console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    createConsoleQueryLogger()({ sql: 'SELECT 1;', params: [], relation: 'book' });
    createConsoleQueryLogger('[sql]')({ sql: 'SELECT 2;', params: [1], relation: 'author' });
    expect(debug).toHaveBeenNthCalledWith(1, '[relnode] book: SELECT 1;', []);
    expect(debug).toHaveBeenNthCalledWith(2, '[sql] author: SELECT 2;', [1]);
  });
});
