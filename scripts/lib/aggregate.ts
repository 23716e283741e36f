import { normalizeRegionName } from './normalize';
import type { RegionStats, RegionStatsMap, ScreeningRecord } from './types';

/** Share of `part` in `total` as a percentage rounded to 2 decimals; 0 when total is 0. */
export function percentage(part: number, total: number): number {
  if (!(total > 0)) return 0;
  return Math.round((part / total) * 100 * 100) / 100;
}

export function emptyStats(key: string, displayName: string): RegionStats {
  return {
    key,
    displayName,
    total: 0,
    stunting: 0,
    percentage: 0,
    gender: { Male: 0, Female: 0 },
    heightForAge: { 'Severely-Short': 0, Short: 0, Normal: 0, Tall: 0 },
    weightForHeight: { 'Severely-Wasted': 0, Wasted: 0, Normal: 0, 'Overweight-Risk': 0, Overweight: 0, Obese: 0 },
    weightForAge: { 'Severely-Underweight': 0, Underweight: 0, Normal: 0, 'Overweight-Risk': 0 },
    facilityCount: 0,
  };
}

/**
 * Group records by normalized region name in a single pass.
 * Map order follows the first appearance of each key in `records`.
 */
export function aggregateRecords(records: readonly ScreeningRecord[]): RegionStatsMap {
  const stats: RegionStatsMap = new Map();
  const facilities = new Map<string, Set<string>>();

  for (const r of records) {
    const key = normalizeRegionName(r.regionName);
    let s = stats.get(key);
    let seen = facilities.get(key);
    if (!s || !seen) {
      s = emptyStats(key, r.regionName.trim());
      seen = new Set();
      stats.set(key, s);
      facilities.set(key, seen);
    }
    s.total++;
    if (r.stunting) s.stunting++;
    s.gender[r.gender]++;
    s.heightForAge[r.heightForAge]++;
    s.weightForHeight[r.weightForHeight]++;
    s.weightForAge[r.weightForAge]++;
    const facility = r.facilityName.trim();
    if (facility) seen.add(facility);
  }

  for (const s of stats.values()) {
    s.percentage = percentage(s.stunting, s.total);
    s.facilityCount = facilities.get(s.key)?.size ?? 0;
  }
  return stats;
}
