/**
 * Guards applied to model-generated SQL before it reaches BigQuery
 */

export const DESTRUCTIVE_KEYWORDS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'MERGE'
] as const;

export type DestructiveKeyword = (typeof DESTRUCTIVE_KEYWORDS)[number];

const DESTRUCTIVE_PATTERN = new RegExp(`\\b(${DESTRUCTIVE_KEYWORDS.join('|')})\\b`, 'i');

export class DestructiveSqlError extends Error {
  constructor(readonly keyword: DestructiveKeyword) {
    super(`Destructive operation '${keyword}' not allowed`);
    this.name = 'DestructiveSqlError';
  }
}

/**
 * Remove markdown code fences the model wraps around SQL
 */
export function stripSqlFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:sql|googlesql|bigquery)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

/**
 * Append a row limit to SELECT statements that have none
 */
export function ensureLimit(sql: string, maxRows: number): string {
  const statement = sql.trim().replace(/;\s*$/, '');
  if (/^SELECT\b/i.test(statement) && !/\bLIMIT\b/i.test(statement)) {
    return `${statement} LIMIT ${maxRows}`;
  }
  return statement;
}

/**
 * Blank out quoted literals and identifiers so their contents are not read as keywords
 */
function withoutQuotedText(sql: string): string {
  return sql
    .replace(/'(?:[^'\\]|\\.)*'/g, "''")
    .replace(/"(?:[^"\\]|\\.)*"/g, '""')
    .replace(/`[^`]*`/g, '``')
    .replace(/--.*$/gm, '')
    .replace(/\/\*[\s\S]*?\*\//g, '');
}

/**
 * First destructive keyword used as a whole word, or null
 */
export function findDestructiveKeyword(sql: string): DestructiveKeyword | null {
  const match = DESTRUCTIVE_PATTERN.exec(withoutQuotedText(sql));
  if (!match) {
    return null;
  }
  const keyword = match[1].toUpperCase();
  return DESTRUCTIVE_KEYWORDS.find(candidate => candidate === keyword) ?? null;
}

/**
 * Fence stripping, limit and keyword check in one pass.
 * Throws when the statement would modify data.
 */
export function prepareSql(raw: string, maxRows: number): string {
  const sql = ensureLimit(stripSqlFences(raw), maxRows);
  const keyword = findDestructiveKeyword(sql);
  if (keyword) {
    throw new DestructiveSqlError(keyword);
  }
  return sql;
}
