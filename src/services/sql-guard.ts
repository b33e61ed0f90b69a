/**
 * Read-only guard for model-written SQL, plus result formatting for replies.
 */

export interface SqlValidation {
  isValid: boolean;
  reason: string;
}

const FORBIDDEN_WORDS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'CREATE',
  'EXEC',
  'TRUNCATE',
  'INTO',
  'GRANT',
  'COPY',
];
const FORBIDDEN_SEQUENCES = ['--', ';--', '/*'];
// Functions with side effects or that hold a connection
const FORBIDDEN_FUNCTIONS = [
  'SETVAL',
  'NEXTVAL',
  'PG_SLEEP',
  'PG_SLEEP_FOR',
  'PG_SLEEP_UNTIL',
  'PG_TERMINATE_BACKEND',
  'PG_CANCEL_BACKEND',
  'PG_READ_FILE',
  'PG_READ_BINARY_FILE',
  'LO_IMPORT',
  'LO_EXPORT',
  'SET_CONFIG',
  'DBLINK',
  'DBLINK_EXEC',
];

export const DEFAULT_ROW_LIMIT = 50;

export function validateSelectSql(sql: string): SqlValidation {
  const upper = sql.trim().toUpperCase();

  if (!upper.startsWith('SELECT')) {
    return { isValid: false, reason: 'Only SELECT queries are allowed' };
  }

  // Whole words only, so columns such as created_at stay queryable
  for (const keyword of FORBIDDEN_WORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(upper)) {
      return { isValid: false, reason: `Forbidden keyword: ${keyword}` };
    }
  }
  for (const fn of FORBIDDEN_FUNCTIONS) {
    if (new RegExp(`\\b${fn}\\s*\\(`).test(upper)) {
      return { isValid: false, reason: `Forbidden function: ${fn.toLowerCase()}` };
    }
  }
  for (const sequence of FORBIDDEN_SEQUENCES) {
    if (upper.includes(sequence)) {
      return { isValid: false, reason: `Forbidden keyword: ${sequence}` };
    }
  }

  if (upper.replace(/;\s*$/, '').includes(';')) {
    return { isValid: false, reason: 'Multiple statements are not allowed' };
  }

  return { isValid: true, reason: 'Query passed validation' };
}

/** Append a LIMIT when the statement has none, dropping a trailing semicolon. */
export function ensureLimit(sql: string, limit: number = DEFAULT_ROW_LIMIT): string {
  const trimmed = sql.trim().replace(/;\s*$/, '');
  if (/\blimit\s+\d+/i.test(trimmed)) return trimmed;
  return `${trimmed} LIMIT ${limit}`;
}

export type ResultFormat = 'table' | 'list' | 'summary';

export interface FormattedResults {
  formatted: string;
  count: number;
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function formatResults(rows: Record<string, unknown>[], format: ResultFormat = 'table'): FormattedResults {
  if (rows.length === 0) {
    return { formatted: 'No results found.', count: 0 };
  }

  if (format === 'summary') {
    return { formatted: `Found ${rows.length} results.`, count: rows.length };
  }

  const headers = Object.keys(rows[0]);

  if (format === 'list') {
    const lines = rows.map((row) => `- ${headers.map((h) => `${h}: ${cell(row[h])}`).join(', ')}`);
    return { formatted: lines.join('\n'), count: rows.length };
  }

  const headerRow = `| ${headers.join(' | ')} |`;
  const separator = `| ${headers.map(() => '---').join(' | ')} |`;
  const dataRows = rows.map((row) => `| ${headers.map((h) => cell(row[h])).join(' | ')} |`);

  return {
    formatted: [headerRow, separator, ...dataRows].join('\n'),
    count: rows.length,
  };
}
