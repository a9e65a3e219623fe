/**
 * Synchronous SQLite driver interface.
 * Implemented by BetterSqlite3Driver, which wraps both plain and encrypted connections.
 */
export interface RunResult {
  changes: number;
  lastInsertRowid: number;
}

export type SqlParam = string | number | bigint | Buffer | null;

export interface SQLiteDriver {
  readonly inTransaction: boolean;
  run(sql: string, params?: SqlParam[]): RunResult;
  get<T>(sql: string, params?: SqlParam[]): T | undefined;
  all<T>(sql: string, params?: SqlParam[]): T[];
  exec(sql: string): void;
  transaction<T>(fn: () => T): T;
  close(): void;
}

export interface SqliteStatement {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

/**
 * The part of a better-sqlite3 `Database` the driver uses. Both better-sqlite3
 * and better-sqlite3-multiple-ciphers connections satisfy it.
 */
export interface SqliteConnection {
  readonly open: boolean;
  readonly inTransaction: boolean;
  prepare(source: string): SqliteStatement;
  exec(source: string): unknown;
  pragma(source: string): unknown;
  transaction<T>(fn: () => T): () => T;
  close(): unknown;
}
