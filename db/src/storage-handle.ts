import CipherDatabase = require('better-sqlite3-multiple-ciphers');
import { RunResult, SQLiteDriver, SqlParam, SqliteConnection } from './driver';
import { BetterSqlite3Driver } from './drivers/better-sqlite3';
import { AuthenticationError } from './errors';
import { Logger } from './logger';

export type StoreKey = string | Buffer;

/** Supplies the key when the caller has not derived one, e.g. an interactive setup flow. */
export interface KeyProvider {
  getKey(path: string): StoreKey;
}

export type CipherScheme = 'sqlcipher' | 'chacha20' | 'aes256cbc' | 'aes128cbc' | 'rc4' | 'ascon128' | 'aegis';

export type Connector = (path: string) => SqliteConnection;

interface BaseStorageOptions {
  path: string;
  /** Defaults to 'sqlcipher'. */
  cipher?: CipherScheme;
  /** SQLCipher compatibility version; defaults to 4 when the cipher is 'sqlcipher'. */
  legacy?: number;
  connect?: Connector;
  logger?: Logger;
}

export type StorageOptions = BaseStorageOptions &
  ({ key: StoreKey; keyProvider?: undefined } | { keyProvider: KeyProvider; key?: undefined });

const openEncrypted: Connector = (path) => new CipherDatabase(path);

function keyText(key: StoreKey): string {
  return typeof key === 'string' ? key : key.toString('hex');
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Owns the single connection to an encrypted store. The connection is opened
 * on first use and reused until `close()`.
 */
export class StorageHandle {
  private driver: SQLiteDriver | null = null;
  private readonly connect: Connector;
  private readonly logger: Logger;

  constructor(private readonly options: StorageOptions) {
    this.connect = options.connect ?? openEncrypted;
    this.logger = options.logger ?? console;
  }

  get path(): string {
    return this.options.path;
  }

  get isOpen(): boolean {
    return this.driver !== null;
  }

  open(): SQLiteDriver {
    if (this.driver) {
      return this.driver;
    }

    const { options } = this;
    const { path } = options;
    const cipher = options.cipher ?? 'sqlcipher';
    const legacy = options.legacy ?? (cipher === 'sqlcipher' ? 4 : undefined);
    const key = options.key !== undefined ? options.key : options.keyProvider.getKey(path);

    this.logger.debug(`[Store] Opening encrypted store: ${path}`);
    const driver = new BetterSqlite3Driver(this.connect(path));

    try {
      driver.pragma(`cipher=${quote(cipher)}`);
      if (legacy !== undefined) {
        driver.pragma(`legacy=${legacy}`);
      }
      driver.pragma(`key=${quote(keyText(key))}`);
      // The key is only checked once a page is read
      driver.all("SELECT name FROM sqlite_master WHERE type='table'");
    } catch (err) {
      driver.close();
      throw new AuthenticationError(path, { cause: err });
    }

    driver.exec('PRAGMA foreign_keys = ON');
    this.driver = driver;
    return driver;
  }

  execute(sql: string, params?: SqlParam[]): RunResult {
    return this.open().run(sql, params);
  }

  query<T>(sql: string, params?: SqlParam[]): T[] {
    return this.open().all<T>(sql, params);
  }

  get<T>(sql: string, params?: SqlParam[]): T | undefined {
    return this.open().get<T>(sql, params);
  }

  exec(sql: string): void {
    this.open().exec(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.open().transaction(fn);
  }

  /** Statements autocommit; this only ends a transaction begun explicitly with BEGIN. */
  commit(): void {
    const driver = this.open();
    if (driver.inTransaction) {
      driver.exec('COMMIT');
    }
  }

  close(): void {
    if (this.driver) {
      this.driver.close();
      this.driver = null;
    }
  }
}
