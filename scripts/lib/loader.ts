/**
 * Session-scoped input loading.
 *
 * A DatasetLoader is built once with its source paths. Parsed inputs are cached
 * per source identity (path, size, mtime) and re-read when the file changes.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as shapefile from 'shapefile';
import { DEFAULT_REGION_NAME_KEYS } from './config';
import { LoadError } from './errors';
import { parseScreeningCsv } from './records';
import { RegionCatalog } from './regionCatalog';
import type { ScreeningRecord } from './types';

/** What the API and build script need from a data source. */
export interface DatasetSource {
  records(): ScreeningRecord[];
  catalog(): Promise<RegionCatalog>;
}

export interface DatasetLoaderOptions {
  screeningCsv: string;
  regionsPath: string;
  regionNameKeys?: readonly string[];
}

interface CacheSlot<T> {
  identity: string;
  value: T;
}

export function sourceIdentity(p: string): string {
  let st: fs.Stats;
  try {
    st = fs.statSync(p);
  } catch {
    throw new LoadError('File not found', p);
  }
  if (!st.isFile()) throw new LoadError('Not a file', p);
  return `${path.resolve(p)}:${st.size}:${st.mtimeMs}`;
}

export function readScreeningCsv(p: string): ScreeningRecord[] {
  let text: string;
  try {
    text = fs.readFileSync(p, 'utf-8');
  } catch (e) {
    throw new LoadError(`Could not read screening CSV: ${e instanceof Error ? e.message : String(e)}`, p);
  }
  return parseScreeningCsv(text, p);
}

/** Raw boundary data: GeoJSON text, or a shapefile with its .dbf alongside. */
export async function readCatalogSource(p: string): Promise<unknown> {
  const ext = path.extname(p).toLowerCase();
  if (ext === '.geojson' || ext === '.json') {
    let text: string;
    try {
      text = fs.readFileSync(p, 'utf-8');
    } catch (e) {
      throw new LoadError(`Could not read boundary file: ${e instanceof Error ? e.message : String(e)}`, p);
    }
    try {
      return JSON.parse(text);
    } catch (e) {
      throw new LoadError(`Boundary file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, p);
    }
  }
  if (ext === '.shp') {
    // region names live in the attribute table; without it every feature would be nameless
    const dbf = `${p.slice(0, -ext.length)}.dbf`;
    if (!fs.existsSync(dbf)) throw new LoadError(`Shapefile attribute table not found: ${dbf}`, p);
    try {
      return await shapefile.read(p, dbf);
    } catch (e) {
      throw new LoadError(`Could not read shapefile: ${e instanceof Error ? e.message : String(e)}`, p);
    }
  }
  throw new LoadError(`Unsupported boundary format "${ext || '(none)'}"; expected .geojson, .json or .shp`, p);
}

export class DatasetLoader implements DatasetSource {
  private recordCache: CacheSlot<ScreeningRecord[]> | null = null;
  private catalogCache: CacheSlot<Promise<RegionCatalog>> | null = null;
  private readonly nameKeys: readonly string[];

  constructor(private readonly options: DatasetLoaderOptions) {
    this.nameKeys = options.regionNameKeys ?? DEFAULT_REGION_NAME_KEYS;
  }

  records(): ScreeningRecord[] {
    const identity = sourceIdentity(this.options.screeningCsv);
    if (this.recordCache?.identity === identity) return this.recordCache.value;
    const value = readScreeningCsv(this.options.screeningCsv);
    this.recordCache = { identity, value };
    return value;
  }

  catalog(): Promise<RegionCatalog> {
    const p = this.options.regionsPath;
    let identity: string;
    try {
      identity = sourceIdentity(p);
    } catch (e) {
      return Promise.reject(e);
    }
    if (this.catalogCache?.identity === identity) return this.catalogCache.value;
    const load = async (): Promise<RegionCatalog> => {
      try {
        return RegionCatalog.load(await readCatalogSource(p), this.nameKeys, p);
      } catch (e) {
        // a failed load must not stick in the cache
        if (this.catalogCache?.identity === identity) this.catalogCache = null;
        throw e;
      }
    };
    this.catalogCache = { identity, value: load() };
    return this.catalogCache.value;
  }

  invalidate(): void {
    this.recordCache = null;
    this.catalogCache = null;
  }
}
