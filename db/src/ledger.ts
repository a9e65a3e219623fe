import { ImportError, IntegrityError, NotFoundError } from './errors';
import { Logger } from './logger';
import { normalizeRecord, normalizeSubcategory, parsePosted } from './normalize';
import { buildExpenseReport } from './report';
import { MonthlyOutflowRow, TransactionRow } from './row-types';
import { StorageHandle } from './storage-handle';
import { CategoryTaxonomy } from './taxonomy';
import {
  CATEGORY_TABLE,
  EMPTY_SUBCATEGORY,
  ExpenseReport,
  ExpenseType,
  InputRecord,
  MergeOutcome,
  NormalizedRecord,
  TXN_TABLE,
  Transaction,
  YearMonth,
} from './types';

export interface MergeSummary {
  inserted: number;
  duplicates: number;
  failed: ImportError[];
}

/**
 * Transaction storage with content-based deduplication. Identity for dedup
 * is (account, posted, amount, name, memo, type); bank ids and check numbers
 * differ between export formats and are never compared.
 */
export class TransactionLedger {
  constructor(
    private readonly handle: StorageHandle,
    private readonly taxonomy: CategoryTaxonomy,
    private readonly logger: Logger = console
  ) {}

  /** Inserts without a duplicate check; `merge` is the deduplicating entry point. */
  insert(record: InputRecord): number {
    const r = normalizeRecord(record);
    const result = this.handle.execute(
      `INSERT INTO ${TXN_TABLE} (account, type, posted, amount, name, memo, checknum, category)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [r.account, r.type, r.posted, r.amount, r.name, r.memo, r.checknum, this.taxonomy.defaultCategoryId()]
    );
    return result.lastInsertRowid;
  }

  findDuplicate(record: InputRecord): Transaction | null {
    const r = normalizeRecord(record);
    return this.findByContent(r);
  }

  merge(record: InputRecord): MergeOutcome {
    const r = normalizeRecord(record);
    const existing = this.findByContent(r);

    if (existing) {
      this.logger.info(
        `[Ledger] Skipped duplicate: existing id=${existing.id} | ${r.posted} | ${r.amount} | ${r.name.slice(0, 50)}`
      );
      this.logger.debug(`[Ledger]   new checknum="${r.checknum}", existing checknum="${existing.checknum}"`);
      return { status: 'duplicate', existingId: existing.id };
    }

    this.logger.debug(`[Ledger] New record, inserting: ${r.account}|${r.posted}`);
    return { status: 'inserted', id: this.insert(r) };
  }

  /** Merges each record in order. Records that fail to normalize are logged and skipped. */
  mergeBatch(records: InputRecord[]): MergeSummary {
    const summary: MergeSummary = { inserted: 0, duplicates: 0, failed: [] };
    this.logger.info(`[Ledger] Merging ${records.length} records`);

    records.forEach((record, index) => {
      try {
        const outcome = this.merge(record);
        if (outcome.status === 'inserted') {
          summary.inserted++;
        } else {
          summary.duplicates++;
        }
      } catch (err) {
        if (!(err instanceof ImportError)) {
          throw err;
        }
        this.logger.warn(`[Ledger] Skipping record ${index}: ${err.message}`);
        summary.failed.push(err);
      }
    });

    return summary;
  }

  getById(id: number): Transaction | null {
    const row = this.handle.get<TransactionRow>(`SELECT * FROM ${TXN_TABLE} WHERE id = ?`, [id]);
    return row ? this.mapTransaction(row) : null;
  }

  setCategory(id: number, category: string, subcategory: string = EMPTY_SUBCATEGORY): void {
    const categoryId = this.taxonomy.categoryId(category, normalizeSubcategory(subcategory));

    this.handle.transaction(() => {
      const result = this.handle.execute(`UPDATE ${TXN_TABLE} SET category = ? WHERE id = ?`, [categoryId, id]);
      if (result.changes === 0) {
        throw new NotFoundError({ entity: 'transaction', id });
      }
      if (result.changes > 1) {
        throw new IntegrityError(TXN_TABLE, id, result.changes);
      }
    });
  }

  /**
   * Assigns a category to every transaction whose name matches a LIKE
   * pattern (`%` and `_` wildcards, case-insensitive for ASCII). Unless
   * `includeAlreadyCategorized` is set, only transactions still on the
   * default category change.
   */
  bulkCategorize(
    namePattern: string,
    category: string,
    subcategory: string = EMPTY_SUBCATEGORY,
    includeAlreadyCategorized: boolean = false
  ): number {
    const categoryId = this.taxonomy.categoryId(category, normalizeSubcategory(subcategory));

    const result = includeAlreadyCategorized
      ? this.handle.execute(`UPDATE ${TXN_TABLE} SET category = ? WHERE name LIKE ?`, [categoryId, namePattern])
      : this.handle.execute(
          `UPDATE ${TXN_TABLE} SET category = ? WHERE name LIKE ? AND category = ?`,
          [categoryId, namePattern, this.taxonomy.defaultCategoryId()]
        );

    this.logger.info(`[Ledger] Categorized ${result.changes} transactions matching "${namePattern}" as ${category}/${subcategory}`);
    return result.changes;
  }

  /**
   * Transactions ordered by posted, optionally limited to a calendar year
   * and/or month. Year and month are read from the stored text in its own
   * offset, not shifted to UTC first: `2024-01-31 23:30:00-05:00` is a January
   * record here although the same instant is in February in UTC. Statement
   * imports store UTC, so this only differs for records merged with another
   * offset. `mostRecentMonthWithData` and `report` read months the same way.
   */
  all(year?: string | number, month?: string | number): Transaction[] {
    const conditions: string[] = [];
    const params: string[] = [];

    if (year !== undefined) {
      conditions.push('substr(posted, 1, 4) = ?');
      params.push(String(year));
    }
    if (month !== undefined) {
      conditions.push('substr(posted, 6, 2) = ?');
      params.push(String(month).padStart(2, '0'));
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.handle.query<TransactionRow>(`SELECT * FROM ${TXN_TABLE}${where} ORDER BY posted, id`, params);
    return rows.map(r => this.mapTransaction(r));
  }

  dateRange(): [Date, Date] | [null, null] {
    const row = this.handle.get<{ start: string | null; end: string | null }>(
      `SELECT MIN(posted) AS start, MAX(posted) AS end FROM ${TXN_TABLE}`
    );
    if (!row || row.start === null || row.end === null) {
      return [null, null];
    }
    return [parsePosted(row.start), parsePosted(row.end)];
  }

  count(): number {
    const row = this.handle.get<{ count: number }>(`SELECT COUNT(*) AS count FROM ${TXN_TABLE}`);
    return row ? row.count : 0;
  }

  hasRecords(): boolean {
    return this.count() > 0;
  }

  mostRecentMonthWithData(): YearMonth | null {
    const row = this.handle.get<YearMonth>(
      `SELECT substr(posted, 1, 4) AS year, substr(posted, 6, 2) AS month
       FROM ${TXN_TABLE} ORDER BY posted DESC LIMIT 1`
    );
    return row ?? null;
  }

  /** Monthly outflows per year, with non-expense categories taken back out. */
  report(): ExpenseReport {
    const rows = this.handle.query<MonthlyOutflowRow>(
      `SELECT substr(t.posted, 1, 4) AS year,
              substr(t.posted, 6, 2) AS month,
              SUM(ABS(t.amount)) AS outflow,
              SUM(CASE WHEN c.expense_type = ? THEN ABS(t.amount) ELSE 0 END) AS nonExpense
       FROM ${TXN_TABLE} AS t
       LEFT JOIN ${CATEGORY_TABLE} AS c ON t.category = c.id
       WHERE t.amount < 0
       GROUP BY year, month
       ORDER BY year, month`,
      [ExpenseType.NonExpense]
    );
    return buildExpenseReport(rows);
  }

  deleteAll(): number {
    const result = this.handle.execute(`DELETE FROM ${TXN_TABLE}`);
    this.logger.info(`[Ledger] Deleted ${result.changes} records`);
    return result.changes;
  }

  private findByContent(r: NormalizedRecord): Transaction | null {
    const row = this.handle.get<TransactionRow>(
      `SELECT * FROM ${TXN_TABLE}
       WHERE account = ? AND posted = ? AND amount = ? AND name = ? AND memo = ? AND type = ?
       ORDER BY id LIMIT 1`,
      [r.account, r.posted, r.amount, r.name, r.memo, r.type]
    );
    return row ? this.mapTransaction(row) : null;
  }

  private mapTransaction(row: TransactionRow): Transaction {
    return {
      id: row.id,
      account: row.account,
      type: row.type,
      posted: row.posted,
      amount: row.amount,
      name: row.name,
      memo: row.memo ?? '',
      checknum: row.checknum ?? '',
      category: row.category ?? this.taxonomy.defaultCategoryId(),
    };
  }
}
