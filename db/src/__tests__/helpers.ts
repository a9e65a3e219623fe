import BetterSqlite3 = require('better-sqlite3');
import { CofferStore } from '../database';
import { Logger } from '../logger';
import { StorageHandle } from '../storage-handle';
import { InputRecord } from '../types';

export function makeLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** Unencrypted in-memory database behind a storage handle. */
export function memoryHandle(setup?: (db: BetterSqlite3.Database) => void, logger: Logger = makeLogger()): StorageHandle {
  const db = new BetterSqlite3(':memory:');
  setup?.(db);
  return new StorageHandle({ path: ':memory:', key: 'test-secret', connect: () => db, logger });
}

export function memoryStore(setup?: (db: BetterSqlite3.Database) => void, logger: Logger = makeLogger()): CofferStore {
  const store = new CofferStore(memoryHandle(setup, logger), logger);
  store.initialize();
  return store;
}

export function makeRecord(overrides: Partial<InputRecord> = {}): InputRecord {
  return {
    account: '000111222',
    type: 'DEBIT',
    posted: '2024-03-15 12:00:00+00:00',
    amount: -42.5,
    name: 'CORNER GROCERY',
    memo: 'POS PURCHASE',
    checknum: '',
    ...overrides,
  };
}

/** Legacy ledger with bank-supplied integer ids and the older (id, account) unique index. */
export function createLegacyIntIdLedger(db: BetterSqlite3.Database, uniqueLegacyIndex = true): void {
  db.exec(`
    CREATE TABLE transactions (
      fitid INT,
      account TEXT,
      type TEXT,
      posted TEXT,
      amount FLOAT,
      name TEXT,
      memo TEXT,
      category INT DEFAULT 1,
      checknum TEXT
    );
    CREATE ${uniqueLegacyIndex ? 'UNIQUE ' : ''}INDEX acct_fitid ON transactions (fitid, account);
  `);
  const insert = db.prepare(
    'INSERT INTO transactions (fitid, account, type, posted, amount, name, memo, category, checknum) VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?)'
  );
  insert.run(9001, 'acct-a', 'DEBIT', '2023-11-02 00:00:00+00:00', -20, 'HARDWARE STORE', '', null);
  insert.run(9002, 'acct-a', 'CREDIT', '2023-11-05 00:00:00+00:00', 1500, 'PAYROLL', 'DIRECT DEP', '');
  insert.run(9003, 'acct-b', 'CHECK', '2023-12-01 00:00:00+00:00', -300, 'CHECK 1042', '', '1042');
}
