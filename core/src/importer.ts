import { readFileSync } from 'fs';
import { ImportError, Logger, MergeSummary, TransactionLedger } from '@coffer/db';
import { ParseResult, parseOFXContent } from './parsers/ofx-parser';

export interface ImportOptions {
  logger?: Logger;
  readFile?: (path: string) => string;
}

export type FileImportResult =
  | ({ file: string; status: 'imported'; parsed: number; skipped: number } & MergeSummary)
  | { file: string; status: 'failed'; error: ImportError };

export interface ImportSummary {
  before: number;
  after: number;
  added: number;
  files: FileImportResult[];
}

const readUtf8 = (path: string): string => readFileSync(path, 'utf8');

function loadStatement(file: string, readFile: (path: string) => string): ParseResult {
  let content: string;
  try {
    content = readFile(file);
  } catch (err) {
    throw new ImportError(`Unable to read ${file}`, { file }, { cause: err });
  }

  const result = parseOFXContent(content);
  if (!result.success) {
    throw new ImportError(`Unable to parse ${file}: ${result.error ?? 'unknown error'}`, { file });
  }
  return result;
}

/**
 * Imports OFX statement files into the ledger, in order. A file that cannot
 * be read or parsed is logged and skipped; the remaining files still import.
 */
export function importStatementFiles(
  ledger: TransactionLedger,
  files: string[],
  options: ImportOptions = {}
): ImportSummary {
  const logger = options.logger ?? console;
  const readFile = options.readFile ?? readUtf8;

  const before = ledger.count();
  if (before > 0) {
    logger.info(`[Import] Database already contains ${before} records`);
  }

  const results: FileImportResult[] = [];
  for (const file of files) {
    logger.info(`[Import] Importing ${file}...`);
    try {
      const statement = loadStatement(file, readFile);
      const merged = ledger.mergeBatch(statement.records);
      results.push({ file, status: 'imported', parsed: statement.records.length, skipped: statement.skipped, ...merged });
    } catch (err) {
      if (!(err instanceof ImportError)) {
        throw err;
      }
      logger.error(`[Import] ${err.message}`);
      results.push({ file, status: 'failed', error: err });
    }
  }

  const after = ledger.count();
  const added = after - before;
  logger.info(`[Import] Database now contains ${after} records`);
  logger.info(added > 0 ? `[Import]  - Added ${added} records` : '[Import]  - No new records added.');

  return { before, after, added, files: results };
}
