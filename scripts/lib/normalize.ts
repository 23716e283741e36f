/**
 * Shared region name normalization used by the record parser, the boundary catalog and the API.
 * This is the single source of truth for generating region join keys.
 *
 * Only case and surrounding whitespace are folded. Spelling differences are left alone
 * and surface as unmatched regions in the join diagnostics.
 */

export function normalizeRegionName(s: string): string {
  if (!s || typeof s !== 'string') return '';
  return s.toUpperCase().trim();
}

/** Looser folding for vocabulary lookups (status values, yes/no flags), not for join keys. */
export function normalizeToken(s: string): string {
  return s.toLowerCase().replace(/[-_\s]+/g, ' ').trim();
}
