// Types
export * from './types';
export * from './row-types';

// Errors and logging
export * from './errors';
export { Logger, silentLogger } from './logger';

// Storage
export { RunResult, SQLiteDriver, SqlParam, SqliteConnection, SqliteStatement } from './driver';
export { BetterSqlite3Driver } from './drivers/better-sqlite3';
export {
  CipherScheme,
  Connector,
  KeyProvider,
  StorageHandle,
  StorageOptions,
  StoreKey,
} from './storage-handle';

// Schema, taxonomy and ledger
export {
  CATEGORY_INDEX,
  CONTENT_INDEX,
  LEGACY_UNIQUE_INDEX,
  LegacyDuplicate,
  MIGRATION_ORDER,
  MigrationKind,
  MigrationOutcome,
  MigrationResult,
  SchemaManager,
  SchemaReport,
  UNIQUE_INDEX,
} from './schema';
export { CategoryTaxonomy, DEFAULT_CATEGORIES, toExpenseType } from './taxonomy';
export { MergeSummary, TransactionLedger } from './ledger';
export { buildExpenseReport } from './report';
export { formatPosted, normalizeRecord, normalizeSubcategory, parsePosted } from './normalize';
export { CofferStore, StoreOptions, openStore } from './database';
