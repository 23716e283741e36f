import type { Polygon } from 'geojson';
import { describe, expect, it } from 'vitest';
import { LoadError } from './errors';
import { mergeGeometries, RegionCatalog, resolveRawName } from './regionCatalog';

const square = (x: number): Polygon => ({
  type: 'Polygon',
  coordinates: [[[x, 0], [x + 2, 0], [x + 2, 2], [x, 2], [x, 0]]],
});

const feature = (properties: Record<string, unknown> | null, x = 0) => ({
  type: 'Feature',
  properties,
  geometry: square(x),
});

const collection = (...features: unknown[]) => ({ type: 'FeatureCollection', features });

describe('resolveRawName', () => {
  const keys = ['WADMKC', 'WADMKEC', 'kecamatan'];

  it('takes the first present key in priority order', () => {
    expect(resolveRawName({ WADMKC: ' Kec A ', kecamatan: 'Other' }, keys)).toBe('Kec A');
    expect(resolveRawName({ WADMKEC: 'Kec B', kecamatan: 'Other' }, keys)).toBe('Kec B');
    expect(resolveRawName({ kecamatan: 'Kec C' }, keys)).toBe('Kec C');
  });

  it('skips empty values', () => {
    expect(resolveRawName({ WADMKC: '', WADMKEC: '  ', kecamatan: 'Kec C' }, keys)).toBe('Kec C');
  });

  it('falls back to an empty name', () => {
    expect(resolveRawName({ NAME: 'Kec D' }, keys)).toBe('');
    expect(resolveRawName(null, keys)).toBe('');
  });
});

describe('RegionCatalog.load', () => {
  it('stores a normalized key per feature', () => {
    const catalog = RegionCatalog.load(collection(feature({ WADMKC: 'Kec A' }), feature({ kecamatan: 'kec c ' }, 2)));
    expect(catalog.entries.map((e) => e.key)).toEqual(['KEC A', 'KEC C']);
    expect(catalog.entries[1].rawName).toBe('kec c');
    expect(catalog.allKeys()).toEqual(new Set(['KEC A', 'KEC C']));
    expect(catalog.size).toBe(2);
  });

  it('uses the configured name keys', () => {
    const catalog = RegionCatalog.load(collection(feature({ WADMKC: 'Kec A', NAMOBJ: 'Kec Z' })), ['NAMOBJ']);
    expect(catalog.lookup('KEC Z')?.rawName).toBe('Kec Z');
    expect(catalog.lookup('KEC A')).toBeUndefined();
  });

  it('keeps nameless features under the empty key', () => {
    const catalog = RegionCatalog.load(collection(feature({ NAME: 'x' })));
    expect(catalog.allKeys()).toEqual(new Set(['']));
  });

  it('computes a label point inside the polygon', () => {
    const catalog = RegionCatalog.load(collection(feature({ WADMKC: 'Kec A' })));
    expect(catalog.lookup('KEC A')?.labelPoint).toEqual([1, 1]);
  });

  it('skips entries without a geometry', () => {
    const catalog = RegionCatalog.load(
      collection(feature({ WADMKC: 'Kec A' }), { type: 'Feature', properties: { WADMKC: 'Kec B' }, geometry: null }, 'junk'),
    );
    expect(catalog.skipped).toBe(2);
    expect(catalog.allKeys()).toEqual(new Set(['KEC A']));
  });

  it('merges features that share a key', () => {
    const first = feature({ WADMKC: 'Kec A', id: 1 });
    const catalog = RegionCatalog.load(collection(first, feature({ WADMKEC: 'KEC A', id: 2 }, 2)));
    expect(catalog.duplicateKeys).toEqual(['KEC A']);
    expect(catalog.entries).toHaveLength(1);
    expect(catalog.featureCount).toBe(2);
    expect(catalog.size).toBe(1);
    const entry = catalog.lookup('KEC A');
    expect(entry?.parts).toBe(2);
    expect(entry?.feature.properties).toEqual({ WADMKC: 'Kec A', id: 1 });
    expect(entry?.feature.geometry).toEqual({
      type: 'MultiPolygon',
      coordinates: [square(0).coordinates, square(2).coordinates],
    });
  });

  it('copies and freezes the input it keeps', () => {
    const raw = feature({ WADMKC: 'Kec A' });
    const catalog = RegionCatalog.load(collection(raw));
    raw.geometry.coordinates[0][0][0] = 99;
    const entry = catalog.lookup('KEC A');
    expect(entry?.feature.geometry).toEqual(square(0));
    expect(Object.isFrozen(entry?.feature.geometry)).toBe(true);
    expect(Object.isFrozen(entry?.labelPoint)).toBe(true);
  });

  it('returns a fresh key set on every call', () => {
    const catalog = RegionCatalog.load(collection(feature({ WADMKC: 'Kec A' })));
    catalog.allKeys().add('KEC Z');
    expect(catalog.allKeys()).toEqual(new Set(['KEC A']));
  });

  it('rejects input without a feature list', () => {
    expect(() => RegionCatalog.load({ type: 'FeatureCollection' })).toThrow(LoadError);
    expect(() => RegionCatalog.load(null)).toThrow('missing "features" array');
    expect(() => RegionCatalog.load([feature({})], undefined, 'regions.geojson')).toThrow(
      'Not a valid feature collection: missing "features" array (regions.geojson)',
    );
  });
});

describe('mergeGeometries', () => {
  it('keeps a single part as it is', () => {
    const only = square(0);
    expect(mergeGeometries([only])).toBe(only);
  });

  it('flattens polygons and multipolygons into one multipolygon', () => {
    const multi = { type: 'MultiPolygon' as const, coordinates: [square(2).coordinates, square(4).coordinates] };
    expect(mergeGeometries([square(0), multi])).toEqual({
      type: 'MultiPolygon',
      coordinates: [square(0).coordinates, square(2).coordinates, square(4).coordinates],
    });
  });

  it('falls back to a geometry collection for other types', () => {
    const point = { type: 'Point' as const, coordinates: [5, 5] };
    expect(mergeGeometries([square(0), point])).toEqual({
      type: 'GeometryCollection',
      geometries: [square(0), point],
    });
  });
});
