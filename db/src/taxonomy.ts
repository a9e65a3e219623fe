import defaultCategories from './default-categories.json';
import { NotFoundError, SchemaError } from './errors';
import { Logger } from './logger';
import { normalizeSubcategory } from './normalize';
import { CategoryRow, CategoryRuleRow } from './row-types';
import { StorageHandle } from './storage-handle';
import {
  CATEGORY_TABLE,
  Category,
  CategoryAssignment,
  CategoryDict,
  CategoryRule,
  DEFAULT_CATEGORY,
  EMPTY_SUBCATEGORY,
  ExpenseType,
  RULES_TABLE,
  TXN_TABLE,
} from './types';

export function toExpenseType(value: number): ExpenseType {
  switch (value) {
    case ExpenseType.NonExpense:
      return ExpenseType.NonExpense;
    case ExpenseType.OneTimeExpense:
      return ExpenseType.OneTimeExpense;
    case ExpenseType.RecurringExpense:
      return ExpenseType.RecurringExpense;
    default:
      throw new SchemaError(CATEGORY_TABLE, 'expense_type', `unknown expense type ${value}`);
  }
}

export const DEFAULT_CATEGORIES: ReadonlyArray<Omit<Category, 'id'>> = defaultCategories.map(c => ({
  name: c.name,
  subcategory: c.subcategory,
  expenseType: toExpenseType(c.expenseType),
}));

const DEFAULT_ASSIGNMENT: CategoryAssignment = {
  name: DEFAULT_CATEGORY,
  subcategory: EMPTY_SUBCATEGORY,
  expenseType: ExpenseType.NonExpense,
};

export class CategoryTaxonomy {
  constructor(
    private readonly handle: StorageHandle,
    private readonly logger: Logger = console
  ) {}

  /**
   * Loads the built-in category list when the table is empty. Rows are
   * upserted on (name, subcategory), so a repeated load cannot duplicate them
   * and existing ids are kept.
   */
  seedIfMissing(): number {
    const existing = this.handle.get<{ count: number }>(`SELECT COUNT(*) AS count FROM ${CATEGORY_TABLE}`);
    if (existing && existing.count > 0) {
      return 0;
    }
    return this.seed();
  }

  seed(): number {
    this.logger.info(`[Schema] Loading ${DEFAULT_CATEGORIES.length} default categories`);
    return this.handle.transaction(() => {
      for (const category of DEFAULT_CATEGORIES) {
        this.handle.execute(
          `INSERT INTO ${CATEGORY_TABLE} (name, subcategory, expense_type) VALUES (?, ?, ?)
           ON CONFLICT (name, subcategory) DO UPDATE SET expense_type = excluded.expense_type`,
          [category.name, category.subcategory, category.expenseType]
        );
      }
      return DEFAULT_CATEGORIES.length;
    });
  }

  categoryId(name: string, subcategory: string = EMPTY_SUBCATEGORY): number {
    const sub = normalizeSubcategory(subcategory);
    const row = this.handle.get<{ id: number }>(
      `SELECT id FROM ${CATEGORY_TABLE} WHERE name = ? AND subcategory = ?`,
      [name, sub]
    );
    if (!row) {
      throw new NotFoundError({ entity: 'category', name, subcategory: sub });
    }
    return row.id;
  }

  defaultCategoryId(): number {
    return this.categoryId(DEFAULT_CATEGORY, EMPTY_SUBCATEGORY);
  }

  getCategories(): Category[] {
    const rows = this.handle.query<CategoryRow>(`SELECT * FROM ${CATEGORY_TABLE} ORDER BY name, subcategory`);
    return rows.map(r => this.mapCategory(r));
  }

  categoryDict(): CategoryDict {
    const dict: CategoryDict = {};
    for (const category of this.getCategories()) {
      dict[category.name] ??= {};
      dict[category.name][category.subcategory] = { expenseType: category.expenseType, id: category.id };
    }
    return dict;
  }

  /** Distinct category names, alphabetical, with the default category first. */
  categoryList(): string[] {
    const rows = this.handle.query<{ name: string }>(`SELECT DISTINCT name FROM ${CATEGORY_TABLE} ORDER BY name`);
    const names = rows.map(r => r.name).filter(name => name !== DEFAULT_CATEGORY);
    return rows.some(r => r.name === DEFAULT_CATEGORY) ? [DEFAULT_CATEGORY, ...names] : names;
  }

  categoryForTransaction(transactionId: number | null): CategoryAssignment {
    if (transactionId === null) {
      return { ...DEFAULT_ASSIGNMENT };
    }
    const row = this.handle.get<Pick<CategoryRow, 'name' | 'subcategory' | 'expense_type'>>(
      `SELECT c.name, c.subcategory, c.expense_type
       FROM ${TXN_TABLE} AS t JOIN ${CATEGORY_TABLE} AS c ON t.category = c.id
       WHERE t.id = ?`,
      [transactionId]
    );
    if (!row) {
      return { ...DEFAULT_ASSIGNMENT };
    }
    return { name: row.name, subcategory: row.subcategory, expenseType: toExpenseType(row.expense_type) };
  }

  // Category rules are stored for later use; nothing applies them automatically
  addRule(pattern: string, category: string, subcategory: string = EMPTY_SUBCATEGORY): CategoryRule {
    const sub = normalizeSubcategory(subcategory);
    this.categoryId(category, sub);
    const result = this.handle.execute(
      `INSERT INTO ${RULES_TABLE} (pattern, category, subcategory) VALUES (?, ?, ?)`,
      [pattern, category, sub]
    );
    return { id: result.lastInsertRowid, pattern, category, subcategory: sub };
  }

  listRules(): CategoryRule[] {
    const rows = this.handle.query<CategoryRuleRow>(`SELECT * FROM ${RULES_TABLE} ORDER BY id`);
    return rows.map(r => ({
      id: r.id,
      pattern: r.pattern,
      category: r.category,
      subcategory: normalizeSubcategory(r.subcategory),
    }));
  }

  deleteRule(id: number): boolean {
    const result = this.handle.execute(`DELETE FROM ${RULES_TABLE} WHERE id = ?`, [id]);
    return result.changes > 0;
  }

  private mapCategory(row: CategoryRow): Category {
    return {
      id: row.id,
      name: row.name,
      subcategory: row.subcategory,
      expenseType: toExpenseType(row.expense_type),
    };
  }
}
