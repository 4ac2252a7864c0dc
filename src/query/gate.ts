/**
 * Read-only gate for ad-hoc SQL
 *
 * A case-insensitive substring check, so identifiers that merely contain a
 * keyword (created_at, updated_by) are rejected too.
 */

export const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'REPLACE',
  'PRAGMA',
  'ATTACH',
  'DETACH',
  'VACUUM',
] as const;

export type BlockedKeyword = (typeof BLOCKED_KEYWORDS)[number];

/** The first blocked keyword found in the statement, or null */
export function blockedKeyword(sql: string): BlockedKeyword | null {
  const upper = sql.toUpperCase();
  return BLOCKED_KEYWORDS.find((keyword) => upper.includes(keyword)) ?? null;
}
