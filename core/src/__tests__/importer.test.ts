import * as fs from 'fs';
import * as path from 'path';
import BetterSqlite3 = require('better-sqlite3');
import { CofferStore, ImportError, Logger, StorageHandle } from '@coffer/db';
import { importStatementFiles } from '../importer';

function makeLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function makeStore(logger: Logger): CofferStore {
  const handle = new StorageHandle({
    path: ':memory:',
    key: 'test-secret',
    connect: () => new BetterSqlite3(':memory:'),
    logger,
  });
  const store = new CofferStore(handle, logger);
  store.initialize();
  return store;
}

const march = fs.readFileSync(path.join(__dirname, 'fixtures', 'checking-march.ofx'), 'utf8');
const april = fs.readFileSync(path.join(__dirname, 'fixtures', 'card-april.ofx'), 'utf8');

// Same check as the March file, exported with a different FITID and no CHECKNUM
const marchReexport = march
  .replace('<FITID>20240305001', '<FITID>A-77')
  .replace('<CHECKNUM>1042\n', '');

const files: Record<string, string> = {
  'march.ofx': march,
  'april.ofx': april,
  'march-reexport.ofx': marchReexport,
  'empty.ofx': '',
};

function readFake(file: string): string {
  const content = files[file];
  if (content === undefined) {
    throw new Error(`ENOENT: no such file, open '${file}'`);
  }
  return content;
}

describe('importStatementFiles', () => {
  it('should import every readable file and report the totals', () => {
    const logger = makeLogger();
    const { ledger } = makeStore(logger);

    const summary = importStatementFiles(ledger, ['march.ofx', 'april.ofx'], { logger, readFile: readFake });

    expect(summary.before).toBe(0);
    expect(summary.after).toBe(4);
    expect(summary.added).toBe(4);
    expect(summary.files).toEqual([
      { file: 'march.ofx', status: 'imported', parsed: 2, skipped: 1, inserted: 2, duplicates: 0, failed: [] },
      { file: 'april.ofx', status: 'imported', parsed: 2, skipped: 0, inserted: 2, duplicates: 0, failed: [] },
    ]);
    expect(logger.info).toHaveBeenCalledWith('[Import]  - Added 4 records');
  });

  it('should not add records that were already imported', () => {
    const logger = makeLogger();
    const { ledger } = makeStore(logger);
    importStatementFiles(ledger, ['march.ofx'], { logger, readFile: readFake });

    const summary = importStatementFiles(ledger, ['march.ofx'], { logger, readFile: readFake });

    expect(summary.added).toBe(0);
    expect(summary.files[0]).toMatchObject({ inserted: 0, duplicates: 2 });
    expect(logger.info).toHaveBeenCalledWith('[Import] Database already contains 2 records');
    expect(logger.info).toHaveBeenCalledWith('[Import]  - No new records added.');
  });

  it('should treat a re-export with new bank ids and no check number as duplicates', () => {
    const logger = makeLogger();
    const { ledger } = makeStore(logger);

    const summary = importStatementFiles(ledger, ['march.ofx', 'march-reexport.ofx'], { logger, readFile: readFake });

    expect(summary.after).toBe(2);
    expect(summary.files[1]).toMatchObject({ status: 'imported', inserted: 0, duplicates: 2 });
    expect(ledger.all(2024, 3).map(t => t.checknum)).toEqual(['1042', '']);
  });

  it('should log and skip files that cannot be read or parsed', () => {
    const logger = makeLogger();
    const { ledger } = makeStore(logger);

    const summary = importStatementFiles(ledger, ['missing.ofx', 'empty.ofx', 'april.ofx'], {
      logger,
      readFile: readFake,
    });

    expect(summary.added).toBe(2);
    expect(summary.files.map(f => f.status)).toEqual(['failed', 'failed', 'imported']);
    const [missing, empty] = summary.files;
    expect(missing.status === 'failed' && missing.error).toBeInstanceOf(ImportError);
    expect(missing.status === 'failed' && missing.error.file).toBe('missing.ofx');
    expect(logger.error).toHaveBeenCalledWith('[Import] Unable to read missing.ofx');
    expect(empty.status === 'failed' && empty.error.message).toBe('Unable to parse empty.ofx: Content is empty');
  });
});
