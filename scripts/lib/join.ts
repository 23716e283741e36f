/**
 * Joins region statistics onto the boundary catalog.
 *
 * Output features are new objects with their own copy of the geometry; the
 * catalog is only read, so one catalog serves every re-join after a filter change. Every catalog key appears
 * exactly once. Stats without a boundary are left out of the features and
 * reported instead.
 */

import Fuse from 'fuse.js';
import { emptyStats } from './aggregate';
import type { RegionCatalog } from './regionCatalog';
import { classifyRisk, NO_DATA } from './risk';
import { toTableRow } from './summary';
import type { Diagnostics, JoinedFeature, RegionStatsMap } from './types';

const BLANK_NAME = '(blank)';

export interface JoinResult {
  joined: JoinedFeature[];
  unmatchedStatsKeys: Set<string>;
  unmatchedFeatureKeys: Set<string>;
}

export function joinStats(catalog: RegionCatalog, stats: RegionStatsMap): JoinResult {
  const joined: JoinedFeature[] = [];
  const unmatchedFeatureKeys = new Set<string>();

  for (const entry of catalog.entries) {
    // the empty key marks a nameless boundary and never matches records
    const s = entry.key ? stats.get(entry.key) : undefined;
    if (!s) unmatchedFeatureKeys.add(entry.key);
    const row = s
      ? toTableRow(s, classifyRisk(s.percentage))
      : toTableRow(emptyStats(entry.key, entry.rawName), NO_DATA);
    const { properties, geometry } = entry.feature;
    joined.push({
      type: 'Feature',
      id: entry.key,
      geometry: structuredClone(geometry),
      properties: {
        ...row,
        hasData: Boolean(s),
        labelPoint: entry.labelPoint ? [entry.labelPoint[0], entry.labelPoint[1]] : null,
        source: properties ? structuredClone(properties) : null,
      },
    });
  }

  const catalogKeys = catalog.allKeys();
  const unmatchedStatsKeys = new Set([...stats.keys()].filter((k) => !k || !catalogKeys.has(k)));
  return { joined, unmatchedStatsKeys, unmatchedFeatureKeys };
}

const SUGGESTION_LIMIT = 3;

export function buildDiagnostics(catalog: RegionCatalog, result: JoinResult, stats: RegionStatsMap): Diagnostics {
  const sorted = (keys: Iterable<string>) => [...keys].sort();
  const unmatchedStatsKeys = sorted(result.unmatchedStatsKeys);
  const unmatchedStatsNames = unmatchedStatsKeys.map((k) => stats.get(k)?.displayName.trim() || k || BLANK_NAME);
  const suggestions: Record<string, string[]> = {};
  if (unmatchedStatsKeys.length) {
    const fuse = new Fuse(sorted(catalog.allKeys()), { threshold: 0.4 });
    for (const key of unmatchedStatsKeys) {
      suggestions[key] = key ? fuse.search(key, { limit: SUGGESTION_LIMIT }).map((r) => r.item) : [];
    }
  }
  return {
    unmatchedStatsKeys,
    unmatchedStatsNames,
    unmatchedFeatureKeys: sorted(result.unmatchedFeatureKeys),
    duplicateFeatureKeys: sorted(catalog.duplicateKeys),
    suggestions,
  };
}

export function formatMismatchWarning(diagnostics: Diagnostics): string | null {
  if (!diagnostics.unmatchedStatsNames.length) return null;
  return `Regions missing from boundary catalog: ${diagnostics.unmatchedStatsNames.join(', ')}`;
}
