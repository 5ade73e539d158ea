import type { FailedRule, ScoreResult } from './types.js';

export const DEFAULT_PASSING_SCORE = 80;

export interface ScoreSummary {
  overallScorePercent: number | undefined;
  servicesAnalyzed: number;
  servicesScored: number;
  servicesMeetingThreshold: number;
  threshold: number;
  rulesEvaluated: number;
  rulesPassed: number;
  rulesFailed: number;
  rulesCompensated: number;
  dataQuality: {
    totalEntries: number;
    skippedEntries: number;
    evaluationRatePercent: number;
  };
}

export interface SeverityBand {
  name: string;
  minWeight: number;
}

export const DEFAULT_SEVERITY_BANDS: readonly SeverityBand[] = [
  { name: 'Critical', minWeight: 5 },
  { name: 'High', minWeight: 3 },
  { name: 'Medium', minWeight: 2 },
  { name: 'Low', minWeight: 0 },
];

export function summarize(result: ScoreResult, threshold: number = DEFAULT_PASSING_SCORE): ScoreSummary {
  const services = Object.values(result.perService);

  let rulesPassed = 0;
  let rulesFailed = 0;
  let rulesCompensated = 0;
  for (const service of services) {
    rulesPassed += service.passedCount;
    rulesFailed += service.failedRules.length;
    rulesCompensated += service.failedRules.filter(rule => rule.creditFraction > 0).length;
  }

  const { ruleCount, excludedCount, notApplicableCount, unknownCount } = result.totals;
  const rulesEvaluated = rulesPassed + rulesFailed;
  const totalEntries = ruleCount + excludedCount;

  return {
    overallScorePercent: result.overallScorePercent,
    servicesAnalyzed: services.length,
    servicesScored: services.filter(s => s.scorePercent !== undefined).length,
    servicesMeetingThreshold: services.filter(
      s => s.scorePercent !== undefined && s.scorePercent >= threshold
    ).length,
    threshold,
    rulesEvaluated,
    rulesPassed,
    rulesFailed,
    rulesCompensated,
    dataQuality: {
      totalEntries,
      skippedEntries: notApplicableCount + unknownCount + excludedCount,
      evaluationRatePercent: totalEntries > 0 ? (100 * rulesEvaluated) / totalEntries : 0,
    },
  };
}

/**
 * Group failures that received no compensating credit into severity
 * bands by rule weight. Bands are checked from the highest minWeight
 * down; the first one the weight reaches wins.
 */
export function groupFailuresBySeverity(
  result: ScoreResult,
  bands: readonly SeverityBand[] = DEFAULT_SEVERITY_BANDS
): Record<string, FailedRule[]> {
  const ordered = [...bands].sort((a, b) => b.minWeight - a.minWeight);
  const groups: Record<string, FailedRule[]> = {};

  for (const service of Object.values(result.perService)) {
    for (const rule of service.failedRules) {
      if (rule.creditFraction > 0) continue;

      const band = ordered.find(candidate => rule.weight >= candidate.minWeight);
      const name = band?.name ?? 'Unclassified';
      (groups[name] ??= []).push(rule);
    }
  }

  return groups;
}
