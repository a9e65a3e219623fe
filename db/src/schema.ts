import { SchemaError } from './errors';
import { Logger } from './logger';
import { ColumnInfoRow } from './row-types';
import { StorageHandle } from './storage-handle';
import { CategoryTaxonomy } from './taxonomy';
import { CATEGORY_TABLE, DEFAULT_CATEGORY, RULES_TABLE, TXN_TABLE, TableName } from './types';

export type MigrationKind = 'unique-constraint' | 'id-type' | 'auto-id';

/** Order in which migrations are applied on open. */
export const MIGRATION_ORDER: readonly MigrationKind[] = ['unique-constraint', 'id-type', 'auto-id'];

export type MigrationOutcome = 'migrated' | 'current' | 'new-table';

/** Rows sharing a bank id and account, found while replacing the legacy unique index. */
export interface LegacyDuplicate {
  bankId: string | number | null;
  account: string;
  count: number;
}

export interface MigrationResult {
  kind: MigrationKind;
  outcome: MigrationOutcome;
  rowsCopied?: number;
  duplicates?: LegacyDuplicate[];
}

export interface SchemaReport {
  created: TableName[];
  migrations: MigrationResult[];
}

export const CONTENT_INDEX = 'content_lookup';
export const CATEGORY_INDEX = 'category_full';
export const LEGACY_UNIQUE_INDEX = 'acct_fitid';
export const UNIQUE_INDEX = 'acct_fitid_posted';

// Stores written before the id column was renamed call it fitid
const ID_COLUMN_NAMES = ['id', 'fitid'];
const DATA_COLUMNS = ['account', 'type', 'posted', 'amount', 'name', 'memo', 'category', 'checknum'];
const REBUILD_TABLE = `${TXN_TABLE}_new`;
// Legacy ledgers had no foreign key and may hold '' or ids with no category row
const ORPHAN_CATEGORY = `(category IS NULL OR category NOT IN (SELECT id FROM ${CATEGORY_TABLE}))`;

const LEDGER_DATA_DDL = `
  account TEXT,
  type TEXT,
  posted TEXT,
  amount REAL,
  name TEXT,
  memo TEXT,
  category INTEGER REFERENCES ${CATEGORY_TABLE}(id),
  checknum TEXT`;

function ledgerDdl(table: string, idDdl: string): string {
  return `CREATE TABLE ${table} (${idDdl},${LEDGER_DATA_DDL}\n)`;
}

const CONTENT_INDEX_DDL = `CREATE INDEX ${CONTENT_INDEX} ON ${TXN_TABLE} (account, posted, amount, name, memo, type)`;

function isIntegerFamily(declaredType: string): boolean {
  // SQLite gives INTEGER affinity to any declared type containing "INT"
  return declaredType.toUpperCase().includes('INT');
}

/**
 * Brings a missing or down-level schema to the current layout. Which
 * migrations apply is decided from live table and index metadata, so stores
 * edited outside this code are handled the same as old ones.
 */
export class SchemaManager {
  private readonly taxonomy: CategoryTaxonomy;

  constructor(
    private readonly handle: StorageHandle,
    private readonly logger: Logger = console
  ) {
    this.taxonomy = new CategoryTaxonomy(handle, logger);
  }

  bringCurrent(): SchemaReport {
    const created = this.ensureSchema();
    const pending = this.detectRequiredMigrations();
    if (pending.length > 0) {
      this.logger.info(`[Schema] Pending migrations: ${pending.join(', ')}`);
    }

    const migrations = MIGRATION_ORDER.map(kind => this.runMigration(kind, created.includes(TXN_TABLE)));
    return { created, migrations };
  }

  runMigration(kind: MigrationKind, createdThisOpen = false): MigrationResult {
    switch (kind) {
      case 'unique-constraint':
        return this.migrateUniqueConstraint();
      case 'id-type':
        return this.migrateIdToText();
      case 'auto-id':
        return this.migrateAutoId(createdThisOpen);
    }
  }

  ensureSchema(): TableName[] {
    const created: TableName[] = [];

    if (!this.tableExists(TXN_TABLE)) {
      this.logger.info(`[Schema] Creating table: ${TXN_TABLE}`);
      this.handle.transaction(() => {
        this.handle.exec(ledgerDdl(TXN_TABLE, 'id INTEGER PRIMARY KEY AUTOINCREMENT'));
        this.handle.exec(CONTENT_INDEX_DDL);
      });
      created.push(TXN_TABLE);
    }

    if (!this.tableExists(CATEGORY_TABLE)) {
      this.logger.info(`[Schema] Creating table: ${CATEGORY_TABLE}`);
      this.handle.transaction(() => {
        this.handle.exec(`
          CREATE TABLE ${CATEGORY_TABLE} (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL,
            subcategory TEXT NOT NULL DEFAULT '',
            expense_type INTEGER NOT NULL DEFAULT 0
          )
        `);
        this.handle.exec(`CREATE UNIQUE INDEX ${CATEGORY_INDEX} ON ${CATEGORY_TABLE} (name, subcategory)`);
        // Only a freshly created table is seeded, so later edits are never overwritten
        this.taxonomy.seedIfMissing();
      });
      created.push(CATEGORY_TABLE);
    }

    if (!this.tableExists(RULES_TABLE)) {
      this.logger.info(`[Schema] Creating table: ${RULES_TABLE}`);
      this.handle.exec(`
        CREATE TABLE ${RULES_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          pattern TEXT NOT NULL,
          category TEXT NOT NULL,
          subcategory TEXT NOT NULL DEFAULT ''
        )
      `);
      created.push(RULES_TABLE);
    }

    return created;
  }

  detectRequiredMigrations(): MigrationKind[] {
    const columns = this.ledgerColumns();
    const idColumn = this.findIdColumn(columns);
    const kinds: MigrationKind[] = [];

    if (this.indexExists(LEGACY_UNIQUE_INDEX) && !this.indexExists(UNIQUE_INDEX)) {
      kinds.push('unique-constraint');
    }
    if (idColumn && isIntegerFamily(idColumn.type) && idColumn.pk === 0) {
      kinds.push('id-type');
    }
    if (!idColumn || idColumn.name !== 'id' || !this.hasAutoIncrementId(idColumn)) {
      kinds.push('auto-id');
    }
    return kinds;
  }

  /** Replaces the legacy (bank id, account) unique index with (bank id, account, posted). */
  migrateUniqueConstraint(): MigrationResult {
    const kind: MigrationKind = 'unique-constraint';

    if (this.indexExists(UNIQUE_INDEX)) {
      this.logger.info('[Schema] Unique constraint already includes posted date');
      return { kind, outcome: 'current' };
    }
    if (!this.indexExists(LEGACY_UNIQUE_INDEX)) {
      this.logger.debug('[Schema] No legacy unique constraint present');
      return { kind, outcome: 'current' };
    }

    const idColumn = this.requireIdColumn(this.ledgerColumns());
    this.logger.info('[Schema] Updating unique constraint to include posted date');

    const duplicates = this.handle.query<LegacyDuplicate>(`
      SELECT ${idColumn.name} AS bankId, account, COUNT(*) AS count
      FROM ${TXN_TABLE}
      GROUP BY ${idColumn.name}, account
      HAVING COUNT(*) > 1
    `);
    if (duplicates.length > 0) {
      this.logger.warn(`[Schema] Found ${duplicates.length} bank id/account combinations with multiple records`);
      for (const dup of duplicates) {
        this.logger.warn(`[Schema]   bankId=${String(dup.bankId)}, account=${dup.account}, count=${dup.count}`);
      }
      this.logger.info('[Schema] These are allowed under the new constraint (different posted dates)');
    }

    this.handle.transaction(() => {
      this.handle.exec(`DROP INDEX IF EXISTS ${LEGACY_UNIQUE_INDEX}`);
      this.handle.exec(`CREATE UNIQUE INDEX ${UNIQUE_INDEX} ON ${TXN_TABLE} (${idColumn.name}, account, posted)`);
    });
    this.logger.info('[Schema] Unique constraint migration complete');
    return { kind, outcome: 'migrated', duplicates };
  }

  /** Rebuilds a ledger whose bank-supplied id column was declared as an integer with a text id. */
  migrateIdToText(): MigrationResult {
    const kind: MigrationKind = 'id-type';
    const columns = this.ledgerColumns();
    const idColumn = this.findIdColumn(columns);

    if (!idColumn || !isIntegerFamily(idColumn.type) || idColumn.pk !== 0) {
      this.logger.debug('[Schema] Id column needs no type change');
      return { kind, outcome: 'current' };
    }

    this.requireDataColumns(columns);
    this.logger.info(`[Schema] Migrating ${idColumn.name} column from ${idColumn.type} to TEXT`);

    const rowsCopied = this.rebuildLedger({
      idDdl: 'id TEXT',
      insertColumns: ['id', ...DATA_COLUMNS],
      selectColumns: [`CAST(${idColumn.name} AS TEXT)`, ...DATA_COLUMNS],
      indexDdl: `CREATE UNIQUE INDEX ${UNIQUE_INDEX} ON ${TXN_TABLE} (id, account, posted)`,
    });
    this.logger.info(`[Schema] Id type migration complete: ${rowsCopied} rows copied`);
    return { kind, outcome: 'migrated', rowsCopied };
  }

  /**
   * Rebuilds the ledger with an auto-incrementing integer id. Existing id
   * values are discarded; rows keep their original order. An auto-increment
   * column that still carries the legacy name is renamed in place instead,
   * so its ids survive.
   */
  migrateAutoId(createdThisOpen = false): MigrationResult {
    const kind: MigrationKind = 'auto-id';
    const columns = this.ledgerColumns();
    const idColumn = this.findIdColumn(columns);

    if (idColumn && idColumn.name !== 'id' && this.hasAutoIncrementId(idColumn)) {
      this.logger.info(`[Schema] Renaming auto-increment column ${idColumn.name} to id`);
      this.handle.exec(`ALTER TABLE ${TXN_TABLE} RENAME COLUMN ${idColumn.name} TO id`);
      return { kind, outcome: 'migrated' };
    }

    if (this.hasAutoIncrementId(idColumn)) {
      if (createdThisOpen) {
        this.logger.info('[Schema] New ledger table, no id migration needed');
        return { kind, outcome: 'new-table' };
      }
      this.logger.info('[Schema] Ledger already uses auto-generated ids');
      return { kind, outcome: 'current' };
    }

    this.requireDataColumns(columns);
    this.logger.info('[Schema] Migrating ledger to auto-generated ids');

    const rowsCopied = this.rebuildLedger({
      idDdl: 'id INTEGER PRIMARY KEY AUTOINCREMENT',
      insertColumns: DATA_COLUMNS,
      selectColumns: DATA_COLUMNS,
      indexDdl: CONTENT_INDEX_DDL,
    });
    this.logger.info(`[Schema] Auto id migration complete: ${rowsCopied} rows copied`);
    return { kind, outcome: 'migrated', rowsCopied };
  }

  tableExists(table: string): boolean {
    return this.handle.get("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?", [table]) !== undefined;
  }

  indexExists(index: string): boolean {
    return this.handle.get("SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?", [index]) !== undefined;
  }

  /**
   * create-new, copy, drop-old, rename and reindex as one transaction. Rows
   * whose category is missing or unknown move to the default category, since
   * the rebuilt table enforces the foreign key.
   */
  private rebuildLedger(plan: {
    idDdl: string;
    insertColumns: string[];
    selectColumns: string[];
    indexDdl: string;
  }): number {
    const defaultId = this.taxonomy.defaultCategoryId();
    const orphans = this.handle.get<{ count: number }>(
      `SELECT COUNT(*) AS count FROM ${TXN_TABLE} WHERE ${ORPHAN_CATEGORY}`
    );
    if (orphans && orphans.count > 0) {
      this.logger.warn(`[Schema] Moving ${orphans.count} rows with an unknown category to ${DEFAULT_CATEGORY}`);
    }
    const selectColumns = plan.selectColumns.map(c =>
      c === 'category' ? `CASE WHEN ${ORPHAN_CATEGORY} THEN ? ELSE category END` : c
    );

    return this.handle.transaction(() => {
      this.handle.exec(`DROP TABLE IF EXISTS ${REBUILD_TABLE}`);
      this.handle.exec(ledgerDdl(REBUILD_TABLE, plan.idDdl));
      const copied = this.handle.execute(
        `INSERT INTO ${REBUILD_TABLE} (${plan.insertColumns.join(', ')})
         SELECT ${selectColumns.join(', ')} FROM ${TXN_TABLE} ORDER BY rowid`,
        [defaultId]
      );
      this.handle.exec(`DROP TABLE ${TXN_TABLE}`);
      this.handle.exec(`ALTER TABLE ${REBUILD_TABLE} RENAME TO ${TXN_TABLE}`);
      this.handle.exec(plan.indexDdl);
      return copied.changes;
    });
  }

  private ledgerColumns(): ColumnInfoRow[] {
    const columns = this.handle.query<ColumnInfoRow>(`PRAGMA table_info(${TXN_TABLE})`);
    if (columns.length === 0) {
      throw new SchemaError(TXN_TABLE, null, 'table does not exist');
    }
    return columns;
  }

  private findIdColumn(columns: ColumnInfoRow[]): ColumnInfoRow | undefined {
    for (const name of ID_COLUMN_NAMES) {
      const column = columns.find(c => c.name === name);
      if (column) return column;
    }
    return undefined;
  }

  private requireIdColumn(columns: ColumnInfoRow[]): ColumnInfoRow {
    const column = this.findIdColumn(columns);
    if (!column) {
      throw new SchemaError(TXN_TABLE, 'id', 'no id column found');
    }
    return column;
  }

  private requireDataColumns(columns: ColumnInfoRow[]): void {
    const names = new Set(columns.map(c => c.name));
    const missing = DATA_COLUMNS.find(name => !names.has(name));
    if (missing) {
      throw new SchemaError(TXN_TABLE, missing, 'column is missing');
    }
  }

  private hasAutoIncrementId(column: ColumnInfoRow | undefined): boolean {
    if (!column || column.type.toUpperCase() !== 'INTEGER' || column.pk !== 1) {
      return false;
    }
    const table = this.handle.get<{ sql: string }>(
      "SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?",
      [TXN_TABLE]
    );
    return table !== undefined && /AUTOINCREMENT/i.test(table.sql);
  }
}
