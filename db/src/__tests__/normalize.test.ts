import { ImportError, SchemaError } from '../errors';
import { formatPosted, normalizeRecord, normalizeSubcategory, parsePosted } from '../normalize';
import { InputRecord } from '../types';
import { makeRecord } from './helpers';

describe('formatPosted', () => {
  it('should keep a canonical timestamp as written', () => {
    expect(formatPosted('2024-03-15 08:30:00-05:00')).toBe('2024-03-15 08:30:00-05:00');
  });

  it.each([
    ['2024-03-15T08:30:00-05:00', '2024-03-15 08:30:00-05:00'],
    ['2024-03-15 08:30:00.250+01:00', '2024-03-15 08:30:00+01:00'],
    ['2024-03-15T13:30:00Z', '2024-03-15 13:30:00+00:00'],
    ['2024-03-15 08:30:00+0530', '2024-03-15 08:30:00+05:30'],
    ['  2024-03-15 08:30:00+00:00 ', '2024-03-15 08:30:00+00:00'],
  ])('should normalize %s', (input, expected) => {
    expect(formatPosted(input)).toBe(expected);
  });

  it('should write a Date in UTC', () => {
    expect(formatPosted(new Date('2024-03-15T08:30:00-05:00'))).toBe('2024-03-15 13:30:00+00:00');
  });

  it('should reject a timestamp without an offset', () => {
    expect(() => formatPosted('2024-03-15 08:30:00')).toThrow(ImportError);
  });

  it('should reject an invalid Date', () => {
    expect(() => formatPosted(new Date('not a date'))).toThrow('Posted date is invalid');
  });
});

describe('parsePosted', () => {
  it('should read a stored timestamp back as an instant', () => {
    expect(parsePosted('2024-03-15 08:30:00-05:00').toISOString()).toBe('2024-03-15T13:30:00.000Z');
  });

  it('should throw SchemaError for an unreadable stored value', () => {
    expect(() => parsePosted('yesterday')).toThrow(SchemaError);
  });
});

describe('normalizeSubcategory', () => {
  it('should map absent subcategories to the empty string', () => {
    expect(normalizeSubcategory(null)).toBe('');
    expect(normalizeSubcategory(undefined)).toBe('');
    expect(normalizeSubcategory('Coffee')).toBe('Coffee');
  });
});

describe('normalizeRecord', () => {
  it('should fill absent memo and check number with empty strings', () => {
    const record: InputRecord = {
      account: 'acct-1',
      type: 'DEBIT',
      posted: '2024-01-02T00:00:00Z',
      amount: -3.25,
      name: 'VENDING',
    };

    expect(normalizeRecord(record)).toEqual({
      account: 'acct-1',
      type: 'DEBIT',
      posted: '2024-01-02 00:00:00+00:00',
      amount: -3.25,
      name: 'VENDING',
      memo: '',
      checknum: '',
    });
  });

  it('should reject a non-finite amount', () => {
    expect(() => normalizeRecord(makeRecord({ amount: Number.POSITIVE_INFINITY }))).toThrow(ImportError);
  });

  it('should name the field that failed', () => {
    let caught: unknown;
    try {
      normalizeRecord(makeRecord({ posted: 'soon' }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ImportError);
    expect(caught instanceof ImportError && caught.field).toBe('posted');
  });
});
