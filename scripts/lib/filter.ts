import { normalizeRegionName } from './normalize';
import type { ScreeningRecord } from './types';

/** `'all'`, an empty list or an omitted selection means no restriction. */
export type Selection = 'all' | readonly string[] | ReadonlySet<string>;

export interface RecordFilter {
  regions?: Selection;
  facilities?: Selection;
}

function selectionSet(selection: Selection | undefined, toKey: (s: string) => string): Set<string> | null {
  if (selection === undefined || selection === 'all') return null;
  const keys = new Set(Array.from(selection, toKey));
  return keys.size ? keys : null;
}

const facilityKey = (s: string) => s.trim();

/** Regions match by normalized key, facilities by trimmed name. Always returns a new array. */
export function filterRecords(records: readonly ScreeningRecord[], filter: RecordFilter = {}): ScreeningRecord[] {
  const regions = selectionSet(filter.regions, normalizeRegionName);
  const facilities = selectionSet(filter.facilities, facilityKey);
  return records.filter(
    (r) =>
      (!regions || regions.has(normalizeRegionName(r.regionName))) &&
      (!facilities || facilities.has(facilityKey(r.facilityName))),
  );
}

/** Parse a comma-separated query value (`?region=Kec A,Kec B`) into a selection. */
export function parseSelectionParam(value: unknown): Selection {
  const parts = (Array.isArray(value) ? value : [value])
    .filter((v): v is string => typeof v === 'string')
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter(Boolean);
  if (!parts.length || parts.some((p) => p.toLowerCase() === 'all')) return 'all';
  return parts;
}

export interface FilterOptions {
  regions: string[];
  facilities: string[];
}

/**
 * Choices for the region and facility pickers. Regions are listed once per key under
 * their first-seen name; facilities are narrowed to the selected regions.
 */
export function listFilterOptions(records: readonly ScreeningRecord[], regions: Selection = 'all'): FilterOptions {
  const regionNames = new Map<string, string>();
  for (const r of records) {
    const key = normalizeRegionName(r.regionName);
    if (!regionNames.has(key)) regionNames.set(key, r.regionName.trim());
  }
  const facilities = new Set<string>();
  for (const r of filterRecords(records, { regions })) {
    const name = facilityKey(r.facilityName);
    if (name) facilities.add(name);
  }
  const byName = (a: string, b: string) => a.localeCompare(b);
  return {
    regions: [...regionNames.values()].sort(byName),
    facilities: [...facilities].sort(byName),
  };
}
