// Core data types for the Coffer store

export enum ExpenseType {
  NonExpense = 0,
  OneTimeExpense = 1,
  RecurringExpense = 2,
}

export const DEFAULT_CATEGORY = 'No Category';
export const EMPTY_SUBCATEGORY = '';

export const TXN_TABLE = 'transactions';
export const CATEGORY_TABLE = 'categories';
export const RULES_TABLE = 'cat_rules';

export type TableName = typeof TXN_TABLE | typeof CATEGORY_TABLE | typeof RULES_TABLE;

/** Record as handed over by a statement parser, before normalization. */
export interface InputRecord {
  account: string;
  type: string;
  posted: string | Date;
  amount: number;
  name: string;
  memo?: string | null;
  checknum?: string | null;
}

export interface NormalizedRecord {
  account: string;
  type: string;
  posted: string;
  amount: number;
  name: string;
  memo: string;
  checknum: string;
}

export interface Transaction extends NormalizedRecord {
  id: number;
  category: number;
}

export interface Category {
  id: number;
  name: string;
  subcategory: string;
  expenseType: ExpenseType;
}

export interface CategoryAssignment {
  name: string;
  subcategory: string;
  expenseType: ExpenseType;
}

export type CategoryDict = Record<string, Record<string, { expenseType: ExpenseType; id: number }>>;

export interface CategoryRule {
  id: number;
  pattern: string;
  category: string;
  subcategory: string;
}

export type MergeOutcome =
  | { status: 'inserted'; id: number }
  | { status: 'duplicate'; existingId: number };

export interface YearMonth {
  year: string;
  month: string;
}

export interface YearlyExpenses {
  /** Zero-based by month; null where the month has no outflows. */
  months: (number | null)[];
  minimum: number | null;
  maximum: number | null;
  average: number | null;
}

export type ExpenseReport = Record<string, YearlyExpenses>;
