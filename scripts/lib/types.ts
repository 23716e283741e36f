import type { Feature, GeoJsonProperties, Geometry } from 'geojson';

export const GENDERS = ['Male', 'Female'] as const;
export const HEIGHT_FOR_AGE = ['Severely-Short', 'Short', 'Normal', 'Tall'] as const;
export const WEIGHT_FOR_HEIGHT = ['Severely-Wasted', 'Wasted', 'Normal', 'Overweight-Risk', 'Overweight', 'Obese'] as const;
export const WEIGHT_FOR_AGE = ['Severely-Underweight', 'Underweight', 'Normal', 'Overweight-Risk'] as const;

export type Gender = (typeof GENDERS)[number];
export type HeightForAgeStatus = (typeof HEIGHT_FOR_AGE)[number];
export type WeightForHeightStatus = (typeof WEIGHT_FOR_HEIGHT)[number];
export type WeightForAgeStatus = (typeof WEIGHT_FOR_AGE)[number];

/** One measured child, as read from the screening CSV. */
export interface ScreeningRecord {
  readonly regionName: string;
  readonly facilityName: string;
  readonly gender: Gender;
  readonly stunting: boolean;
  readonly heightForAge: HeightForAgeStatus;
  readonly weightForHeight: WeightForHeightStatus;
  readonly weightForAge: WeightForAgeStatus;
}

export interface RegionStats {
  key: string;
  /** First-seen raw region name for the key, trimmed. */
  displayName: string;
  total: number;
  stunting: number;
  percentage: number;
  gender: Record<Gender, number>;
  heightForAge: Record<HeightForAgeStatus, number>;
  weightForHeight: Record<WeightForHeightStatus, number>;
  weightForAge: Record<WeightForAgeStatus, number>;
  facilityCount: number;
}

/** Keyed by normalized region name; iteration follows first-seen order in the input. */
export type RegionStatsMap = Map<string, RegionStats>;

export type RiskCategory = 'High' | 'Medium' | 'Low' | 'No Data';
export type Prediction = 'Needs Attention' | 'Needs Monitoring' | 'Stable' | 'No Data';

export interface RiskAssessment {
  category: RiskCategory;
  prediction: Prediction;
}

/** Flat per-region row for summary tables. */
export interface StatsTableRow {
  key: string;
  displayName: string;
  total: number;
  stunting: number;
  percentage: number;
  category: RiskCategory;
  prediction: Prediction;
  male: number;
  female: number;
  short: number;
  severelyShort: number;
  wasted: number;
  severelyWasted: number;
  underweight: number;
  severelyUnderweight: number;
  /** Overweight + Obese (weight-for-height). */
  overweight: number;
  facilityCount: number;
}

export type LonLat = [number, number];

export interface JoinedProperties extends StatsTableRow {
  hasData: boolean;
  labelPoint: LonLat | null;
  /** Copy of the boundary feature's original properties. */
  source: GeoJsonProperties;
}

export type JoinedFeature = Feature<Geometry, JoinedProperties> & { id: string };

export interface Diagnostics {
  unmatchedStatsKeys: string[];
  /** Raw record names for `unmatchedStatsKeys`, same order; a blank name reads "(blank)". */
  unmatchedStatsNames: string[];
  unmatchedFeatureKeys: string[];
  duplicateFeatureKeys: string[];
  /** Closest catalog keys per unmatched stats key. Hints only; never applied. */
  suggestions: Record<string, string[]>;
}

export interface DashboardSummary {
  totalRecords: number;
  totalStunting: number;
  percentage: number;
  regionCount: number;
  categoryCounts: Record<RiskCategory, number>;
  highest: { key: string; displayName: string; percentage: number } | null;
}
