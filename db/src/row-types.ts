export interface TransactionRow {
  id: number;
  account: string;
  type: string;
  posted: string;
  amount: number;
  name: string;
  memo: string | null;
  category: number | null;
  checknum: string | null;
}

export interface CategoryRow {
  id: number;
  name: string;
  subcategory: string;
  expense_type: number;
}

export interface CategoryRuleRow {
  id: number;
  pattern: string;
  category: string;
  subcategory: string | null;
}

export interface ColumnInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

export interface MonthlyOutflowRow {
  year: string;
  month: string;
  outflow: number;
  nonExpense: number;
}
