import { afterEach, describe, expect, it } from 'vitest';
import { tableNode } from '../../src/core/ast/relation-node.js';
import { eq } from '../../src/core/ast/expression-builders.js';
import {
  knownDialects,
  registerDialect,
  resolveDialectInput,
  unregisterDialect
} from '../../src/core/dialect/dialect-factory.js';
import { MySqlDialect } from '../../src/core/dialect/mysql/index.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SqlServerDialect } from '../../src/core/dialect/mssql/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { DialectError } from '../../src/core/errors.js';
import { Criteria } from '../../src/query-builder/criteria.js';
import { Book, Category } from '../fixtures/library-schema.js';

const titlesOfCategory = () => {
  const book = tableNode(Book).as('b');
  const category = tableNode(Category).as('c');
  return new Criteria(book.innerJoin(category))
    .select(book.projection('title'))
    .add(eq(category.field('name'), 'Poetry'));
};

describe('SELECT compilation', () => {
  it('uses backticks and question marks on MySQL', () => {
    const compiled = titlesOfCategory().limit(5).compile(new MySqlDialect());
    expect(compiled.sql).toBe(
      'SELECT `b`.`title` AS `b__title` FROM `book` AS `b` INNER JOIN `category` AS `c` ' +
        'ON (`b`.`category_id` = `c`.`id`) WHERE `c`.`name` = ? LIMIT 5;'
    );
    expect(compiled.params).toEqual(['Poetry']);
  });

  it('gives an offset without a limit the engine-specific unbounded LIMIT', () => {
    const category = tableNode(Category).as('c');
    const skipOne = new Criteria(category).select(category.projection('name')).offset(1);

    expect(skipOne.toSql('sqlite')).toBe('SELECT "c"."name" AS "c__name" FROM "category" AS "c" LIMIT -1 OFFSET 1;');
    expect(skipOne.toSql('mysql')).toBe(
      'SELECT `c`.`name` AS `c__name` FROM `category` AS `c` LIMIT 18446744073709551615 OFFSET 1;'
    );
    expect(skipOne.toSql('postgres')).toBe('SELECT "c"."name" AS "c__name" FROM "category" AS "c" OFFSET 1;');
    expect(skipOne.toSql('mssql')).toBe(
      'SELECT [c].[name] AS [c__name] FROM [category] AS [c] ORDER BY (SELECT NULL) OFFSET 1 ROWS;'
    );
    expect(skipOne.limit(2).toSql('sqlite')).toBe(
      'SELECT "c"."name" AS "c__name" FROM "category" AS "c" LIMIT 2 OFFSET 1;'
    );
  });

  it('uses named parameters and OFFSET ... FETCH on SQL Server', () => {
    const book = tableNode(Book).as('b');
    const compiled = new Criteria(book)
      .select(book.projection('title'))
      .add(eq(book.field('id'), 3))
      .orderBy(book.field('title'))
      .limit(10)
      .offset(20)
      .compile(new SqlServerDialect());
    expect(compiled.sql).toBe(
      'SELECT [b].[title] AS [b__title] FROM [book] AS [b] WHERE [b].[id] = @p1 ' +
        'ORDER BY [b].[title] ASC OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY;'
    );
    expect(compiled.params).toEqual([3]);
  });

  it('adds a neutral ordering when SQL Server pages an unordered query', () => {
    expect(titlesOfCategory().limit(5).toSql('mssql')).toBe(
      'SELECT [b].[title] AS [b__title] FROM [book] AS [b] INNER JOIN [category] AS [c] ' +
        'ON ([b].[category_id] = [c].[id]) WHERE [c].[name] = @p1 ORDER BY (SELECT NULL) OFFSET 0 ROWS FETCH NEXT 5 ROWS ONLY;'
    );
  });

  it('numbers PostgreSQL placeholders', () => {
    expect(titlesOfCategory().compile(new PostgresDialect()).sql).toBe(
      'SELECT "b"."title" AS "b__title" FROM "book" AS "b" INNER JOIN "category" AS "c" ' +
        'ON ("b"."category_id" = "c"."id") WHERE "c"."name" = $1;'
    );
  });

  it('refuses an empty SELECT list', () => {
    const query = new Criteria(tableNode(Book)).select();
    expect(() => query.compile('sqlite')).toThrow('Cannot compile a SELECT without projections');
  });
});

describe('resolveDialectInput', () => {
  afterEach(() => {
    unregisterDialect('warehouse');
    unregisterDialect('sqlite');
  });

  it('creates the built-in dialects by name', () => {
    expect(resolveDialectInput('postgres')).toBeInstanceOf(PostgresDialect);
    expect(resolveDialectInput('mysql')).toBeInstanceOf(MySqlDialect);
    expect(resolveDialectInput('sqlite')).toBeInstanceOf(SqliteDialect);
    expect(resolveDialectInput('mssql').name).toBe('mssql');
  });

  it('rejects unknown names and lists the known ones', () => {
    expect(() => resolveDialectInput('oracle')).toThrow(DialectError);
    expect(() => resolveDialectInput('oracle')).toThrow(
      'Unknown dialect "oracle" (known: postgres, mysql, sqlite, mssql)'
    );
  });

  it('prefers registered dialects and restores built-ins on unregister', () => {
    registerDialect('warehouse', () => new PostgresDialect());
    registerDialect('sqlite', () => new MySqlDialect());
    expect(knownDialects()).toEqual(['postgres', 'mysql', 'sqlite', 'mssql', 'warehouse']);
    expect(resolveDialectInput('warehouse')).toBeInstanceOf(PostgresDialect);
    expect(resolveDialectInput('sqlite')).toBeInstanceOf(MySqlDialect);

    expect(unregisterDialect('sqlite')).toBe(true);
    expect(resolveDialectInput('sqlite')).toBeInstanceOf(SqliteDialect);
  });

  it('compiles a criteria for a registered name', () => {
    registerDialect('warehouse', () => new SqlServerDialect());
    const book = tableNode(Book).as('b');
    expect(new Criteria(book).select(book.projection('title')).toSql('warehouse')).toBe(
      'SELECT [b].[title] AS [b__title] FROM [book] AS [b];'
    );
  });

  it('passes dialect instances through', () => {
    const dialect = new SqliteDialect();
    expect(resolveDialectInput(dialect)).toBe(dialect);
  });
});
