/**
 * Region boundary catalog.
 *
 * Wraps a loaded feature collection without modifying it: geometries are copied
 * on load, so the catalog owns its data. One entry per normalized key holds the
 * resolved raw name, label point and the feature; boundaries split across several
 * features with the same name are merged into one geometry. Name properties are
 * checked in the configured priority order.
 */

import type { Feature, GeoJsonProperties, Geometry, Position } from 'geojson';
import pointOnFeature from '@turf/point-on-feature';
import centroid from '@turf/centroid';
import { DEFAULT_REGION_NAME_KEYS } from './config';
import { LoadError } from './errors';
import { normalizeRegionName } from './normalize';
import type { LonLat } from './types';

/** Entries are deep-frozen; consumers that need a mutable copy clone it. */
export interface CatalogEntry {
  readonly key: string;
  readonly rawName: string;
  readonly feature: Readonly<Feature<Geometry, GeoJsonProperties>>;
  readonly labelPoint: Readonly<LonLat> | null;
  /** Number of input features merged into this entry. */
  readonly parts: number;
}

interface PendingEntry {
  rawName: string;
  properties: GeoJsonProperties;
  id?: string | number;
  geometries: Geometry[];
}

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isGeometry(v: unknown): v is Geometry {
  if (!isRecord(v)) return false;
  const type = v.type;
  if (typeof type !== 'string' || !GEOMETRY_TYPES.has(type)) return false;
  return type === 'GeometryCollection' ? Array.isArray(v.geometries) : Array.isArray(v.coordinates);
}

export function resolveRawName(properties: GeoJsonProperties, nameKeys: readonly string[]): string {
  if (!properties) return '';
  for (const k of nameKeys) {
    const v: unknown = properties[k];
    if (v != null && String(v).trim()) return String(v).trim();
  }
  return '';
}

function computeLabelPoint(feature: Feature<Geometry, GeoJsonProperties>): LonLat | null {
  const round = (n: number) => Math.round(n * 1e6) / 1e6;
  const valid = (c: number[]) => c.length >= 2 && Number.isFinite(c[0]) && Number.isFinite(c[1]);
  try {
    const coords = pointOnFeature(feature).geometry.coordinates;
    if (!valid(coords)) throw new Error('Invalid coordinates from pointOnFeature');
    return [round(coords[0]), round(coords[1])];
  } catch {
    try {
      const coords = centroid(feature).geometry.coordinates;
      return valid(coords) ? [round(coords[0]), round(coords[1])] : null;
    } catch {
      return null;
    }
  }
}

/** Polygon parts become one MultiPolygon; anything else is kept as a GeometryCollection. */
export function mergeGeometries(parts: readonly Geometry[]): Geometry {
  if (parts.length === 1) return parts[0];
  const polygons: Position[][][] = [];
  for (const g of parts) {
    if (g.type === 'Polygon') polygons.push(g.coordinates);
    else if (g.type === 'MultiPolygon') polygons.push(...g.coordinates);
    else return { type: 'GeometryCollection', geometries: [...parts] };
  }
  return { type: 'MultiPolygon', coordinates: polygons };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class RegionCatalog {
  private readonly byKey = new Map<string, CatalogEntry>();

  private constructor(
    readonly entries: readonly CatalogEntry[],
    /** Input features with a usable geometry, before merging. */
    readonly featureCount: number,
    /** Input features dropped for having no usable geometry. */
    readonly skipped: number,
    private readonly duplicates: readonly string[],
  ) {
    for (const entry of entries) this.byKey.set(entry.key, entry);
  }

  static load(
    input: unknown,
    nameKeys: readonly string[] = DEFAULT_REGION_NAME_KEYS,
    source?: string,
  ): RegionCatalog {
    const features: unknown = isRecord(input) ? input.features : undefined;
    if (!Array.isArray(features)) {
      throw new LoadError('Not a valid feature collection: missing "features" array', source);
    }
    const pending = new Map<string, PendingEntry>();
    const duplicates: string[] = [];
    let featureCount = 0;
    let skipped = 0;
    for (const f of features) {
      const geometry: unknown = isRecord(f) ? f.geometry : undefined;
      if (!isRecord(f) || !isGeometry(geometry)) {
        skipped++;
        continue;
      }
      featureCount++;
      const props: unknown = f.properties;
      const properties: GeoJsonProperties = isRecord(props) ? structuredClone(props) : null;
      const rawName = resolveRawName(properties, nameKeys);
      const key = normalizeRegionName(rawName);
      const existing = pending.get(key);
      if (existing) {
        if (!duplicates.includes(key)) duplicates.push(key);
        existing.geometries.push(structuredClone(geometry));
        continue;
      }
      const id: unknown = f.id;
      pending.set(key, {
        rawName,
        properties,
        id: typeof id === 'string' || typeof id === 'number' ? id : undefined,
        geometries: [structuredClone(geometry)],
      });
    }

    const entries: CatalogEntry[] = [];
    for (const [key, p] of pending) {
      const feature: Feature<Geometry, GeoJsonProperties> = {
        type: 'Feature',
        geometry: mergeGeometries(p.geometries),
        properties: p.properties,
      };
      if (p.id !== undefined) feature.id = p.id;
      entries.push(
        deepFreeze({
          key,
          rawName: p.rawName,
          feature,
          labelPoint: computeLabelPoint(feature),
          parts: p.geometries.length,
        }),
      );
    }
    return new RegionCatalog(entries, featureCount, skipped, duplicates);
  }

  get size(): number {
    return this.byKey.size;
  }

  /** Keys claimed by more than one feature; their geometries are merged, the first feature's properties kept. */
  get duplicateKeys(): readonly string[] {
    return this.duplicates;
  }

  lookup(key: string): CatalogEntry | undefined {
    return this.byKey.get(key);
  }

  allKeys(): Set<string> {
    return new Set(this.byKey.keys());
  }
}
