/** Number of code points of free text that take part in a cache key. */
export const FREE_TEXT_KEY_LENGTH = 50;

const SEGMENT_SEPARATOR = ':';
const SET_SEPARATOR = ',';

/** A single identifier, or a set of identifiers whose order must not matter. */
export type CacheKeyPrimary = string | readonly string[];

/**
 * Build a deterministic cache key from query parameters.
 *
 * Every segment is URI-encoded before joining, so separators inside a value
 * cannot make two distinct (op, primary, secondary) triples collide. Set-valued
 * primaries are de-duplicated and sorted. Free text is cut to its first
 * {@link FREE_TEXT_KEY_LENGTH} code points: long queries sharing that prefix
 * share a slot.
 */
export function buildCacheKey(
  op: string,
  primary: CacheKeyPrimary,
  secondary?: string,
  freeText?: string,
): string {
  const segments = [encodeSegment(op), encodePrimary(primary)];

  segments.push(secondary ? encodeSegment(secondary) : '');
  segments.push(freeText ? encodeSegment(truncateFreeText(freeText)) : '');

  return segments.join(SEGMENT_SEPARATOR);
}

/**
 * Key for a daily insight. The local calendar date is the primary identifier,
 * so the slot changes at midnight regardless of the cache TTL.
 */
export function buildDailyInsightKey(date: Date, tradition?: string, theme?: string): string {
  return buildCacheKey('daily-insight', formatLocalDate(date), tradition, theme);
}

/** Format a date as `YYYY-MM-DD` in the process's local time zone. */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function truncateFreeText(text: string): string {
  return Array.from(text).slice(0, FREE_TEXT_KEY_LENGTH).join('');
}

function encodePrimary(primary: CacheKeyPrimary): string {
  if (typeof primary === 'string') {
    return encodeSegment(primary);
  }

  const unique = [...new Set(primary)].sort();
  return unique.map(encodeSegment).join(SET_SEPARATOR);
}

function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}
