import type { EntityManager } from 'typeorm';

/** Suffix for LIKE clauses built with {@link containsPattern}. */
export const LIKE_ESCAPE = "ESCAPE '\\'";

/** `%term%` with LIKE wildcards in the term taken literally. */
export function containsPattern(term: string): string {
  return `%${term.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

const ROW_LOCK_DRIVERS = new Set([
  'postgres',
  'cockroachdb',
  'mysql',
  'mariadb',
  'oracle',
  'mssql',
]);

// SQLite serialises writers per database and rejects FOR UPDATE.
export function supportsRowLocks(manager: EntityManager): boolean {
  return ROW_LOCK_DRIVERS.has(manager.connection.options.type);
}
