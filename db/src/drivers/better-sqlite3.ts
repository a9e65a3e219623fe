import { SQLiteDriver, RunResult, SqlParam, SqliteConnection } from '../driver';

export class BetterSqlite3Driver implements SQLiteDriver {
  private db: SqliteConnection;

  constructor(db: SqliteConnection) {
    this.db = db;
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  run(sql: string, params?: SqlParam[]): RunResult {
    const result = this.db.prepare(sql).run(...(params ?? []));
    return {
      changes: result.changes,
      lastInsertRowid: Number(result.lastInsertRowid),
    };
  }

  get<T>(sql: string, params?: SqlParam[]): T | undefined {
    return this.db.prepare(sql).get(...(params ?? [])) as T | undefined;
  }

  all<T>(sql: string, params?: SqlParam[]): T[] {
    return this.db.prepare(sql).all(...(params ?? [])) as T[];
  }

  /** Applies a `name = value` pragma, e.g. `key='...'`. */
  pragma(statement: string): void {
    this.db.pragma(statement);
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
