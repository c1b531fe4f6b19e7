import { PGlite } from '@electric-sql/pglite';

export type Row = Record<string, unknown>;

export const createMemoryDb = async (schemaSql: string): Promise<PGlite> => {
  const db = new PGlite();
  await db.exec(schemaSql);
  return db;
};

export const queryAll = async (db: PGlite, sql: string, params: unknown[] = []): Promise<Row[]> => {
  const result = await db.query<Row>(sql, params);
  return result.rows;
};
