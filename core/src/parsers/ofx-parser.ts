import { InputRecord, formatPosted } from '@coffer/db';

export interface ParseResult {
  success: boolean;
  records: InputRecord[];
  skipped: number;
  error?: string;
}

interface OFXTransaction {
  trntype?: string;
  dtposted?: string;
  trnamt?: string;
  fitid?: string;
  checknum?: string;
  name?: string;
  memo?: string;
}

interface OFXStatement {
  account: string;
  isBank: boolean;
  transactions: OFXTransaction[];
}

function decodeEntities(value: string): string {
  return value
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&apos;/gi, "'")
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&');
}

/**
 * Value of a leaf element. Works for SGML (`<TAG>value`, no closing tag) and
 * XML (`<TAG>value</TAG>`): the value runs to the next tag or line end.
 */
function extractTag(content: string, tagName: string): string | undefined {
  const pattern = new RegExp(`<${tagName}>([^<\\n]*)`, 'i');
  const match = content.match(pattern);
  if (!match) return undefined;
  const value = decodeEntities(match[1].trim());
  return value.length > 0 ? value : undefined;
}

function parseTransaction(content: string): OFXTransaction {
  return {
    trntype: extractTag(content, 'TRNTYPE'),
    dtposted: extractTag(content, 'DTPOSTED'),
    trnamt: extractTag(content, 'TRNAMT'),
    fitid: extractTag(content, 'FITID'),
    checknum: extractTag(content, 'CHECKNUM'),
    name: extractTag(content, 'NAME'),
    memo: extractTag(content, 'MEMO'),
  };
}

function parseStatements(content: string): OFXStatement[] {
  const statements: OFXStatement[] = [];

  // Normalize line endings
  const normalizedContent = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  // Bank statements are STMTRS, credit card statements CCSTMTRS
  const statementPattern = /<(CC)?STMTRS>([\s\S]*?)<\/(?:CC)?STMTRS>/gi;

  for (const statementMatch of normalizedContent.matchAll(statementPattern)) {
    const isBank = statementMatch[1] === undefined;
    const statementContent = statementMatch[2];

    const acctFromPattern = isBank
      ? /<BANKACCTFROM>([\s\S]*?)<\/BANKACCTFROM>/i
      : /<CCACCTFROM>([\s\S]*?)<\/CCACCTFROM>/i;
    const acctFrom = statementContent.match(acctFromPattern);
    const account = acctFrom ? extractTag(acctFrom[1], 'ACCTID') : undefined;

    const transactions: OFXTransaction[] = [];
    const stmtTrnPattern = /<STMTTRN>([\s\S]*?)<\/STMTTRN>/gi;
    for (const trnMatch of statementContent.matchAll(stmtTrnPattern)) {
      transactions.push(parseTransaction(trnMatch[1]));
    }

    statements.push({ account: account ?? '', isBank, transactions });
  }

  return statements;
}

/**
 * OFX date: YYYYMMDD[HHMMSS[.XXX]][[offset:TZ]]. The offset is in hours
 * (may be fractional) and defaults to GMT. Returns the UTC instant.
 */
function parseOFXDate(dateStr: string): Date | null {
  if (!dateStr) return null;

  const match = /^(\d{4})(\d{2})(\d{2})(?:(\d{2})(\d{2})(\d{2})?(?:\.\d+)?)?\s*(?:\[\s*([+-]?\d+(?:\.\d+)?)(?::[^\]]*)?\])?$/.exec(dateStr.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', offset = '0'] = match;
  const offsetMinutes = Math.round(parseFloat(offset) * 60);

  const utc = Date.UTC(
    parseInt(year, 10),
    parseInt(month, 10) - 1,
    parseInt(day, 10),
    parseInt(hour, 10),
    parseInt(minute, 10),
    parseInt(second, 10)
  ) - offsetMinutes * 60000;

  const date = new Date(utc);
  // Rejects dates such as 20240231 that Date.UTC would roll over
  const local = new Date(utc + offsetMinutes * 60000);
  if (
    isNaN(date.getTime()) ||
    local.getUTCMonth() !== parseInt(month, 10) - 1 ||
    local.getUTCDate() !== parseInt(day, 10)
  ) {
    return null;
  }

  return date;
}

function convertOFXTransaction(ofxTrx: OFXTransaction, statement: OFXStatement): InputRecord | null {
  // Validate required fields
  if (!ofxTrx.dtposted || !ofxTrx.trnamt || !ofxTrx.name || !ofxTrx.trntype) {
    return null;
  }

  const date = parseOFXDate(ofxTrx.dtposted);
  if (!date) {
    return null;
  }

  // Some institutions write a decimal comma
  const amount = parseFloat(ofxTrx.trnamt.replace(',', '.'));
  if (isNaN(amount)) {
    return null;
  }

  return {
    account: statement.account,
    type: ofxTrx.trntype,
    posted: formatPosted(date),
    amount,
    name: ofxTrx.name,
    memo: ofxTrx.memo ?? '',
    // Check numbers only exist on bank statements
    checknum: statement.isBank ? ofxTrx.checknum ?? '' : '',
  };
}

/**
 * Parse OFX content string (v1 SGML or v2 XML) into normalized records
 * @param content OFX file content as string
 * @returns ParseResult with records or error
 */
export function parseOFXContent(content: string): ParseResult {
  if (!content || content.trim().length === 0) {
    return {
      success: false,
      records: [],
      skipped: 0,
      error: 'Content is empty',
    };
  }

  const statements = parseStatements(content);
  const total = statements.reduce((n, s) => n + s.transactions.length, 0);

  if (total === 0) {
    return {
      success: false,
      records: [],
      skipped: 0,
      error: 'No transactions found in OFX content',
    };
  }

  const records: InputRecord[] = [];
  let skipped = 0;

  for (const statement of statements) {
    for (const ofxTrx of statement.transactions) {
      const record = convertOFXTransaction(ofxTrx, statement);
      if (record) {
        records.push(record);
      } else {
        skipped++;
      }
    }
  }

  return {
    success: true,
    records,
    skipped,
  };
}

// Export utility functions
export { parseOFXDate };
