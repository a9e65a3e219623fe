import { MonthlyOutflowRow } from './row-types';
import { ExpenseReport, YearlyExpenses } from './types';

/**
 * Builds the yearly expense report from per-month outflow totals. Non-expense
 * outflows (transfers, savings) are subtracted from each month, so a month
 * whose outflows were all non-expense reports 0 rather than being absent.
 */
export function buildExpenseReport(rows: MonthlyOutflowRow[]): ExpenseReport {
  const report: ExpenseReport = {};

  for (const row of rows) {
    const monthIndex = parseInt(row.month, 10) - 1;
    if (isNaN(monthIndex) || monthIndex < 0 || monthIndex > 11) {
      continue;
    }
    report[row.year] ??= emptyYear();
    report[row.year].months[monthIndex] = row.outflow - row.nonExpense;
  }

  for (const year of Object.keys(report)) {
    Object.assign(report[year], summarizeMonths(report[year].months));
  }

  return report;
}

function emptyYear(): YearlyExpenses {
  return {
    months: Array.from({ length: 12 }, () => null),
    minimum: null,
    maximum: null,
    average: null,
  };
}

function summarizeMonths(months: (number | null)[]): Pick<YearlyExpenses, 'minimum' | 'maximum' | 'average'> {
  const withData = months.filter((m): m is number => m !== null);
  if (withData.length === 0) {
    return { minimum: null, maximum: null, average: null };
  }
  const total = withData.reduce((sum, m) => sum + m, 0);
  return {
    minimum: Math.min(...withData),
    maximum: Math.max(...withData),
    average: total / withData.length,
  };
}
