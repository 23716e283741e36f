/**
 * Table and headline figures for the dashboard. Rows are flat so the
 * rendering layer can show them without knowing the stats shape.
 */

import { percentage } from './aggregate';
import { classifyRisk } from './risk';
import type {
  DashboardSummary,
  JoinedFeature,
  RegionStats,
  RegionStatsMap,
  RiskAssessment,
  RiskCategory,
  StatsTableRow,
} from './types';

export function toTableRow(s: RegionStats, risk: RiskAssessment): StatsTableRow {
  return {
    key: s.key,
    displayName: s.displayName,
    total: s.total,
    stunting: s.stunting,
    percentage: s.percentage,
    category: risk.category,
    prediction: risk.prediction,
    male: s.gender.Male,
    female: s.gender.Female,
    short: s.heightForAge.Short,
    severelyShort: s.heightForAge['Severely-Short'],
    wasted: s.weightForHeight.Wasted,
    severelyWasted: s.weightForHeight['Severely-Wasted'],
    underweight: s.weightForAge.Underweight,
    severelyUnderweight: s.weightForAge['Severely-Underweight'],
    overweight: s.weightForHeight.Overweight + s.weightForHeight.Obese,
    facilityCount: s.facilityCount,
  };
}

export function toStatsTable(stats: RegionStatsMap): StatsTableRow[] {
  return Array.from(stats.values(), (s) => toTableRow(s, classifyRisk(s.percentage)));
}

export function summarize(stats: RegionStatsMap, joined: readonly JoinedFeature[]): DashboardSummary {
  let totalRecords = 0;
  let totalStunting = 0;
  let highest: DashboardSummary['highest'] = null;
  for (const s of stats.values()) {
    totalRecords += s.total;
    totalStunting += s.stunting;
    if (!highest || s.percentage > highest.percentage) {
      highest = { key: s.key, displayName: s.displayName, percentage: s.percentage };
    }
  }

  const categoryCounts: Record<RiskCategory, number> = { High: 0, Medium: 0, Low: 0, 'No Data': 0 };
  for (const f of joined) categoryCounts[f.properties.category]++;

  return {
    totalRecords,
    totalStunting,
    percentage: percentage(totalStunting, totalRecords),
    regionCount: stats.size,
    categoryCounts,
    highest,
  };
}
