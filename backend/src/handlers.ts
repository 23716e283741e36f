/**
 * Route logic for the statistics API, kept free of Express so it can be called directly.
 */

import {
  listFilterOptions,
  parseSelectionParam,
  type FilterOptions,
  type RecordFilter,
} from '../../scripts/lib/filter';
import { formatMismatchWarning } from '../../scripts/lib/join';
import type { DatasetSource } from '../../scripts/lib/loader';
import { runPipeline, type JoinedFeatureCollection } from '../../scripts/lib/pipeline';
import type { DashboardSummary, Diagnostics, StatsTableRow } from '../../scripts/lib/types';

export type ApiResult<T> = { status: 200; body: T } | { status: 500; body: { error: string } };

export type Query = Record<string, unknown>;

export interface StatsBody {
  rows: StatsTableRow[];
  summary: DashboardSummary;
}

export interface MapBody extends JoinedFeatureCollection {
  diagnostics: Diagnostics;
}

export interface DiagnosticsBody extends Diagnostics {
  warning: string | null;
}

export interface StatsHandlers {
  stats(query: Query): Promise<ApiResult<StatsBody>>;
  map(query: Query): Promise<ApiResult<MapBody>>;
  diagnostics(): Promise<ApiResult<DiagnosticsBody>>;
  options(query: Query): Promise<ApiResult<FilterOptions>>;
}

function readFilter(query: Query): RecordFilter {
  return {
    regions: parseSelectionParam(query.region),
    facilities: parseSelectionParam(query.facility),
  };
}

async function respond<T>(fn: () => Promise<T>): Promise<ApiResult<T>> {
  try {
    return { status: 200, body: await fn() };
  } catch (e) {
    return { status: 500, body: { error: String(e) } };
  }
}

export function createHandlers(source: DatasetSource): StatsHandlers {
  const pipeline = async (filter?: RecordFilter) => runPipeline(source.records(), await source.catalog(), filter);

  return {
    stats: (query) =>
      respond(async () => {
        const { table, summary } = await pipeline(readFilter(query));
        return { rows: table, summary };
      }),
    map: (query) =>
      respond(async () => {
        const { joined, diagnostics } = await pipeline(readFilter(query));
        return { ...joined, diagnostics };
      }),
    diagnostics: () =>
      respond(async () => {
        const { diagnostics } = await pipeline();
        return { ...diagnostics, warning: formatMismatchWarning(diagnostics) };
      }),
    options: (query) => respond(async () => listFilterOptions(source.records(), parseSelectionParam(query.region))),
  };
}
