import type { RiskAssessment } from './types';

/** Stunting percentage above which a region needs attention (exclusive). */
export const HIGH_RISK_THRESHOLD = 20;
/** Stunting percentage above which a region needs monitoring (exclusive). */
export const MEDIUM_RISK_THRESHOLD = 10;

export const NO_DATA: RiskAssessment = { category: 'No Data', prediction: 'No Data' };

/**
 * Thresholds are exclusive-lower / inclusive-upper: 20 is Medium, 10 is Low.
 * Downstream alerting keys off the High band, so keep the comparisons strict.
 */
export function classifyRisk(percentage: number): RiskAssessment {
  if (percentage > HIGH_RISK_THRESHOLD) return { category: 'High', prediction: 'Needs Attention' };
  if (percentage > MEDIUM_RISK_THRESHOLD) return { category: 'Medium', prediction: 'Needs Monitoring' };
  return { category: 'Low', prediction: 'Stable' };
}
