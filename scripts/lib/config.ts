import * as path from 'path';

/** Boundary property keys checked in order for a region name (kecamatan boundary exports). */
export const DEFAULT_REGION_NAME_KEYS = ['WADMKC', 'WADMKEC', 'kecamatan'] as const;
export const DEFAULT_PORT = 3001;

export interface AppConfig {
  screeningCsv: string;
  regionsPath: string;
  outDir: string;
  regionNameKeys: string[];
  port: number;
  cacheMaxAge: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, root: string = process.cwd()): AppConfig {
  const fromRoot = (value: string | undefined, fallback: string) => path.resolve(root, value?.trim() || fallback);
  const keys = (env.REGION_NAME_KEYS ?? '')
    .split(',')
    .map((k) => k.trim())
    .filter(Boolean);
  const port = Number(env.PORT);
  return {
    screeningCsv: fromRoot(env.SCREENING_CSV, path.join('data', 'screening.csv')),
    regionsPath: fromRoot(env.REGIONS_GEOJSON, path.join('data', 'regions.geojson')),
    outDir: fromRoot(env.OUT_DIR, path.join('data', 'out')),
    regionNameKeys: keys.length ? keys : [...DEFAULT_REGION_NAME_KEYS],
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    cacheMaxAge: env.NODE_ENV === 'production' ? 3600 : 60,
  };
}
