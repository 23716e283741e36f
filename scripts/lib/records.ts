/**
 * Screening CSV parsing. Accepts the canonical English headers or the
 * Indonesian field names used by puskesmas exports, and maps status
 * values from either vocabulary onto the typed enums in ./types.
 */

import { parse } from 'csv-parse/sync';
import { LoadError } from './errors';
import { normalizeToken } from './normalize';
import type {
  Gender,
  HeightForAgeStatus,
  ScreeningRecord,
  WeightForAgeStatus,
  WeightForHeightStatus,
} from './types';

type ColumnMap = Record<keyof ScreeningRecord, string>;

/** First entry is the canonical header, reported when the column is missing. */
export const COLUMN_ALIASES: Record<keyof ScreeningRecord, readonly string[]> = {
  regionName: ['region_name', 'kecamatan'],
  facilityName: ['facility_name', 'puskesmas', 'posyandu'],
  gender: ['gender', 'jenis_kelamin', 'jk'],
  stunting: ['stunting_flag', 'stunting'],
  heightForAge: ['height_for_age_status', 'tb_u', 'status_tb_u'],
  weightForHeight: ['weight_for_height_status', 'bb_tb', 'status_bb_tb'],
  weightForAge: ['weight_for_age_status', 'bb_u', 'status_bb_u'],
};

function vocabulary<T extends string>(entries: ReadonlyArray<readonly [T, readonly string[]]>): Map<string, T> {
  const out = new Map<string, T>();
  for (const [value, aliases] of entries) {
    out.set(normalizeToken(value), value);
    for (const a of aliases) out.set(normalizeToken(a), value);
  }
  return out;
}

const STUNTING_VALUES = new Map<string, boolean>([
  ...['yes', 'ya', 'y', 'true', '1', 'stunting'].map((v): [string, boolean] => [v, true]),
  ...['no', 'tidak', 'n', 'false', '0', 'tidak stunting', 'normal'].map((v): [string, boolean] => [v, false]),
]);

const GENDER_VALUES = vocabulary<Gender>([
  ['Male', ['m', 'l', 'laki laki']],
  ['Female', ['f', 'p', 'perempuan']],
]);

const HEIGHT_FOR_AGE_VALUES = vocabulary<HeightForAgeStatus>([
  ['Severely-Short', ['sangat pendek', 'severely stunted']],
  ['Short', ['pendek', 'stunted']],
  ['Normal', []],
  ['Tall', ['tinggi']],
]);

const WEIGHT_FOR_HEIGHT_VALUES = vocabulary<WeightForHeightStatus>([
  ['Severely-Wasted', ['gizi buruk']],
  ['Wasted', ['gizi kurang']],
  ['Normal', ['gizi baik']],
  ['Overweight-Risk', ['berisiko gizi lebih', 'possible risk of overweight']],
  ['Overweight', ['gizi lebih']],
  ['Obese', ['obesitas']],
]);

const WEIGHT_FOR_AGE_VALUES = vocabulary<WeightForAgeStatus>([
  ['Severely-Underweight', ['berat badan sangat kurang']],
  ['Underweight', ['berat badan kurang']],
  ['Normal', ['berat badan normal']],
  ['Overweight-Risk', ['risiko berat badan lebih']],
]);

function resolveColumns(headers: readonly string[], source?: string): ColumnMap {
  const byLower = new Map(headers.map((h) => [h.trim().toLowerCase(), h]));
  const missing: string[] = [];
  const find = (names: readonly string[]): string => {
    for (const n of names) {
      const h = byLower.get(n);
      if (h !== undefined) return h;
    }
    missing.push(names[0]);
    return '';
  };
  const columns: ColumnMap = {
    regionName: find(COLUMN_ALIASES.regionName),
    facilityName: find(COLUMN_ALIASES.facilityName),
    gender: find(COLUMN_ALIASES.gender),
    stunting: find(COLUMN_ALIASES.stunting),
    heightForAge: find(COLUMN_ALIASES.heightForAge),
    weightForHeight: find(COLUMN_ALIASES.weightForHeight),
    weightForAge: find(COLUMN_ALIASES.weightForAge),
  };
  if (missing.length) {
    throw new LoadError(`Missing required column(s): ${missing.join(', ')}`, source);
  }
  return columns;
}

function isRow(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function detectDelimiter(text: string): string {
  const header = text.split(/\r?\n/, 1)[0] ?? '';
  return header.includes(';') && !header.includes(',') ? ';' : ',';
}

export function parseScreeningCsv(text: string, source?: string): ScreeningRecord[] {
  const seen: { headers?: string[] } = {};
  let rows: unknown;
  try {
    rows = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      delimiter: detectDelimiter(text),
      columns: (header: string[]) => {
        seen.headers = header;
        return header;
      },
    });
  } catch (e) {
    throw new LoadError(`Malformed CSV: ${e instanceof Error ? e.message : String(e)}`, source);
  }
  const headers = seen.headers;
  if (!headers) throw new LoadError('CSV has no header row', source);
  if (!Array.isArray(rows)) throw new LoadError('CSV did not parse into rows', source);

  const columns = resolveColumns(headers, source);
  const records: ScreeningRecord[] = [];

  rows.forEach((row: unknown, i) => {
    if (!isRow(row)) throw new LoadError(`Row ${i + 1} is not a record`, source);
    const cell = (field: keyof ScreeningRecord) => String(row[columns[field]] ?? '').trim();
    const lookup = <T>(vocab: Map<string, T>, field: keyof ScreeningRecord): T => {
      const raw = cell(field);
      const value = vocab.get(normalizeToken(raw));
      if (value === undefined) {
        throw new LoadError(`Unrecognised value "${raw}" in column "${columns[field]}" at row ${i + 1}`, source);
      }
      return value;
    };
    const regionName = cell('regionName');
    if (!regionName) throw new LoadError(`Blank region name in column "${columns.regionName}" at row ${i + 1}`, source);
    records.push({
      regionName,
      facilityName: cell('facilityName'),
      gender: lookup(GENDER_VALUES, 'gender'),
      stunting: lookup(STUNTING_VALUES, 'stunting'),
      heightForAge: lookup(HEIGHT_FOR_AGE_VALUES, 'heightForAge'),
      weightForHeight: lookup(WEIGHT_FOR_HEIGHT_VALUES, 'weightForHeight'),
      weightForAge: lookup(WEIGHT_FOR_AGE_VALUES, 'weightForAge'),
    });
  });

  return records;
}
