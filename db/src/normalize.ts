import { ImportError, SchemaError } from './errors';
import { EMPTY_SUBCATEGORY, InputRecord, NormalizedRecord, TXN_TABLE } from './types';

// YYYY-MM-DD HH:MM:SS followed by an offset; 'T', fractional seconds, 'Z' and +HHMM are accepted on input
const POSTED_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})$/;

function formatOffset(offset: string): string {
  if (offset === 'Z') return '+00:00';
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/**
 * Canonical posted text: `YYYY-MM-DD HH:MM:SS±HH:MM`.
 * Dates are written in UTC.
 */
export function formatPosted(posted: string | Date): string {
  if (posted instanceof Date) {
    if (isNaN(posted.getTime())) {
      throw new ImportError('Posted date is invalid', { field: 'posted' });
    }
    const iso = posted.toISOString();
    return `${iso.slice(0, 10)} ${iso.slice(11, 19)}+00:00`;
  }

  if (typeof posted !== 'string') {
    throw new ImportError('Posted timestamp is missing', { field: 'posted' });
  }
  const match = POSTED_PATTERN.exec(posted.trim());
  if (!match) {
    throw new ImportError(`Posted timestamp not recognised: "${posted}"`, { field: 'posted' });
  }
  return `${match[1]} ${match[2]}${formatOffset(match[3])}`;
}

export function parsePosted(posted: string): Date {
  const date = new Date(posted.replace(' ', 'T'));
  if (isNaN(date.getTime())) {
    throw new SchemaError(TXN_TABLE, 'posted', `unparseable timestamp "${posted}"`);
  }
  return date;
}

export function normalizeSubcategory(subcategory: string | null | undefined): string {
  return subcategory ?? EMPTY_SUBCATEGORY;
}

function requireText(value: unknown, field: keyof InputRecord): string {
  if (typeof value !== 'string') {
    throw new ImportError(`Record field "${field}" must be text`, { field });
  }
  return value;
}

/**
 * Ingestion boundary: every record is passed through here before it is stored
 * or compared, so empty memo and checknum are always '' and never null.
 */
export function normalizeRecord(record: InputRecord): NormalizedRecord {
  if (typeof record.amount !== 'number' || !Number.isFinite(record.amount)) {
    throw new ImportError(`Record amount is not a finite number: ${String(record.amount)}`, { field: 'amount' });
  }

  return {
    account: requireText(record.account, 'account'),
    type: requireText(record.type, 'type'),
    posted: formatPosted(record.posted),
    amount: record.amount,
    name: requireText(record.name, 'name'),
    memo: record.memo ?? '',
    checknum: record.checknum ?? '',
  };
}
