import type { FeatureCollection, Geometry } from 'geojson';
import { aggregateRecords } from './aggregate';
import { filterRecords, type RecordFilter } from './filter';
import { buildDiagnostics, joinStats } from './join';
import type { RegionCatalog } from './regionCatalog';
import { summarize, toStatsTable } from './summary';
import type {
  DashboardSummary,
  Diagnostics,
  JoinedFeature,
  JoinedProperties,
  RegionStatsMap,
  ScreeningRecord,
  StatsTableRow,
} from './types';

export interface JoinedFeatureCollection extends FeatureCollection<Geometry, JoinedProperties> {
  features: JoinedFeature[];
}

export interface PipelineResult {
  stats: RegionStatsMap;
  table: StatsTableRow[];
  joined: JoinedFeatureCollection;
  diagnostics: Diagnostics;
  summary: DashboardSummary;
}

/** filter -> aggregate -> classify -> join. Every call allocates its own output. */
export function runPipeline(
  records: readonly ScreeningRecord[],
  catalog: RegionCatalog,
  filter?: RecordFilter,
): PipelineResult {
  const selected = filter ? filterRecords(records, filter) : records;
  const stats = aggregateRecords(selected);
  const result = joinStats(catalog, stats);
  return {
    stats,
    table: toStatsTable(stats),
    joined: { type: 'FeatureCollection', features: result.joined },
    diagnostics: buildDiagnostics(catalog, result, stats),
    summary: summarize(stats, result.joined),
  };
}
