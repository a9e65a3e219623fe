import { TransactionLedger } from './ledger';
import { Logger } from './logger';
import { SchemaManager, SchemaReport } from './schema';
import { StorageHandle, StorageOptions } from './storage-handle';
import { CategoryTaxonomy } from './taxonomy';

export type StoreOptions = StorageOptions;

/**
 * An open store: the storage handle plus the services that operate through
 * it. The services keep no state of their own.
 */
export class CofferStore {
  readonly schema: SchemaManager;
  readonly categories: CategoryTaxonomy;
  readonly ledger: TransactionLedger;
  private schemaReport: SchemaReport | null = null;

  constructor(readonly handle: StorageHandle, logger: Logger = console) {
    this.schema = new SchemaManager(handle, logger);
    this.categories = new CategoryTaxonomy(handle, logger);
    this.ledger = new TransactionLedger(handle, this.categories, logger);
  }

  /** Opens the connection and brings the schema current. Safe to call again. */
  initialize(): SchemaReport {
    if (this.schemaReport && this.handle.isOpen) {
      return this.schemaReport;
    }
    this.handle.open();
    this.schemaReport = this.schema.bringCurrent();
    return this.schemaReport;
  }

  close(): void {
    this.handle.close();
    this.schemaReport = null;
  }
}

export function openStore(options: StoreOptions): CofferStore {
  const store = new CofferStore(new StorageHandle(options), options.logger ?? console);
  store.initialize();
  return store;
}
