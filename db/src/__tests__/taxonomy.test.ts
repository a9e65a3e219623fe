import { NotFoundError, SchemaError } from '../errors';
import { DEFAULT_CATEGORIES, toExpenseType } from '../taxonomy';
import { ExpenseType } from '../types';
import { makeRecord, memoryStore } from './helpers';

describe('CategoryTaxonomy', () => {
  describe('seeding', () => {
    it('should load the 80 built-in categories into a new store', () => {
      const { categories } = memoryStore();

      expect(DEFAULT_CATEGORIES).toHaveLength(80);
      expect(categories.getCategories()).toHaveLength(80);
    });

    it('should give the default category the first id', () => {
      const { categories } = memoryStore();

      expect(categories.defaultCategoryId()).toBe(1);
    });

    it('should not duplicate or renumber rows when seeded again', () => {
      const { categories } = memoryStore();
      const coffeeId = categories.categoryId('Entertainment', 'Coffee');

      expect(categories.seed()).toBe(80);
      expect(categories.getCategories()).toHaveLength(80);
      expect(categories.categoryId('Entertainment', 'Coffee')).toBe(coffeeId);
    });

    it('should leave a populated table alone in seedIfMissing', () => {
      const { categories } = memoryStore();

      expect(categories.seedIfMissing()).toBe(0);
    });

    it('should succeed when seeding while transactions reference categories', () => {
      const { categories, ledger } = memoryStore();
      const outcome = ledger.merge(makeRecord());
      if (outcome.status !== 'inserted') throw new Error('expected an insert');
      ledger.setCategory(outcome.id, 'Groceries / Food');

      expect(() => categories.seed()).not.toThrow();
      expect(categories.categoryForTransaction(outcome.id).name).toBe('Groceries / Food');
    });
  });

  describe('categoryId', () => {
    it('should resolve a category with a subcategory', () => {
      const { categories } = memoryStore();

      expect(categories.categoryId('Entertainment', 'Coffee')).toBe(21);
    });

    it('should default to the empty subcategory', () => {
      const { categories } = memoryStore();

      expect(categories.categoryId('Transfer')).toBe(70);
    });

    it('should throw NotFoundError for an unknown pair', () => {
      const { categories } = memoryStore();

      expect(() => categories.categoryId('Entertainment', 'Skydiving')).toThrow(NotFoundError);
      expect(() => categories.categoryId('Entertainment', 'Skydiving')).toThrow(
        'Category not found: "Entertainment" / "Skydiving"'
      );
    });
  });

  describe('categoryDict', () => {
    it('should nest subcategories under their category with expense type and id', () => {
      const { categories } = memoryStore();

      const dict = categories.categoryDict();

      expect(Object.keys(dict)).toHaveLength(25);
      expect(dict['Entertainment']['Coffee']).toEqual({ expenseType: ExpenseType.RecurringExpense, id: 21 });
      expect(dict['Savings']['']).toEqual({ expenseType: ExpenseType.NonExpense, id: 63 });
    });
  });

  describe('categoryList', () => {
    it('should put the default category first and sort the rest', () => {
      const { categories } = memoryStore();

      const list = categories.categoryList();

      expect(list).toHaveLength(25);
      expect(list.slice(0, 4)).toEqual(['No Category', 'Auto', 'Cash Withdrawal', 'Clothing']);
      expect(list[list.length - 1]).toBe('Work Expense');
    });
  });

  describe('categoryForTransaction', () => {
    it('should return the default assignment for a null id', () => {
      const { categories } = memoryStore();

      expect(categories.categoryForTransaction(null)).toEqual({
        name: 'No Category',
        subcategory: '',
        expenseType: ExpenseType.NonExpense,
      });
    });

    it('should return the default assignment for an unknown transaction', () => {
      const { categories } = memoryStore();

      expect(categories.categoryForTransaction(999).name).toBe('No Category');
    });

    it('should return the assigned category with its expense type', () => {
      const { categories, ledger } = memoryStore();
      const outcome = ledger.merge(makeRecord({ name: 'BEAN THERE' }));
      if (outcome.status !== 'inserted') throw new Error('expected an insert');
      ledger.setCategory(outcome.id, 'Entertainment', 'Coffee');

      expect(categories.categoryForTransaction(outcome.id)).toEqual({
        name: 'Entertainment',
        subcategory: 'Coffee',
        expenseType: ExpenseType.RecurringExpense,
      });
    });
  });

  describe('rules', () => {
    it('should add, list and delete rules', () => {
      const { categories } = memoryStore();

      const first = categories.addRule('STARBUCKS%', 'Entertainment', 'Coffee');
      const second = categories.addRule('%PAYROLL%', 'Income');

      expect(categories.listRules()).toEqual([
        { id: first.id, pattern: 'STARBUCKS%', category: 'Entertainment', subcategory: 'Coffee' },
        { id: second.id, pattern: '%PAYROLL%', category: 'Income', subcategory: '' },
      ]);
      expect(categories.deleteRule(first.id)).toBe(true);
      expect(categories.deleteRule(first.id)).toBe(false);
      expect(categories.listRules().map(r => r.pattern)).toEqual(['%PAYROLL%']);
    });

    it('should reject a rule for an unknown category', () => {
      const { categories } = memoryStore();

      expect(() => categories.addRule('ACME%', 'Gadgets')).toThrow(NotFoundError);
      expect(categories.listRules()).toEqual([]);
    });
  });
});

describe('toExpenseType', () => {
  it('should map stored values to expense types', () => {
    expect(toExpenseType(0)).toBe(ExpenseType.NonExpense);
    expect(toExpenseType(1)).toBe(ExpenseType.OneTimeExpense);
    expect(toExpenseType(2)).toBe(ExpenseType.RecurringExpense);
  });

  it('should reject unknown values', () => {
    expect(() => toExpenseType(7)).toThrow(SchemaError);
  });
});
