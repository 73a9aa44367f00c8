/**
 * Text helpers shared by the parsers and the SQL export
 */

const NON_SLUG_CHARS_RE = /[^\p{L}\p{M}\p{N}_\s-]/gu;
const SLUG_SEPARATOR_RE = /[\s_]+/gu;
const DASH_RUN_RE = /-+/g;
const EDGE_DASH_RE = /^-+|-+$/g;

const SQL_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\0': '\\0',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\x1a': '\\Z',
  "'": "\\'",
};
const SQL_SPECIAL_RE = /[\\\0\n\r\t\x1a']/g;

export const DEFAULT_TABLE_PREFIX = 'typecho_';

/**
 * Generate URL-friendly slug from a title or term name
 */
export function slugify(text: string): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(NON_SLUG_CHARS_RE, '')
    .replace(SLUG_SEPARATOR_RE, '-')
    .replace(DASH_RUN_RE, '-')
    .replace(EDGE_DASH_RE, '');

  return slug || 'item';
}

/**
 * Trim items and drop empty or repeated ones, keeping first-seen order
 */
export function dedupe(items: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const item of items) {
    const value = item.trim();
    if (!value || seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }

  return out;
}

/**
 * Quote a string literal for MySQL/MariaDB
 */
export function sqlQuote(value: string | null): string {
  if (value === null) return 'NULL';
  return `'${value.replace(SQL_SPECIAL_RE, (ch) => SQL_ESCAPES[ch] ?? ch)}'`;
}

/**
 * Table prefix always ends with "_"
 */
export function normalizeTablePrefix(prefix: string): string {
  const cleaned = prefix.trim();
  if (!cleaned) return DEFAULT_TABLE_PREFIX;
  return cleaned.endsWith('_') ? cleaned : `${cleaned}_`;
}
