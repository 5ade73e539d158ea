import type { ParseWarning } from './scoring/results.js';
import { summarize, type ScoreSummary } from './scoring/summary.js';
import type { FailedRule, ScoreResult } from './scoring/types.js';

export interface ReportSources {
  input?: string;
  weightsFile?: string;
  serviceWeightsFile?: string;
  compensatingFile?: string;
  shape?: string;
}

export interface ServiceReport {
  score: number | null;
  evaluatedWeight: number;
  passedWeight: number;
  ruleCount: number;
  passedCount: number;
  failedCount: number;
  notApplicableCount: number;
  unknownCount: number;
  failedRules: FailedRule[];
}

// JSON-safe view: undefined scores become null instead of vanishing
export interface ScoreReport {
  generatedAt: string;
  asOf: string;
  overallScore: number | null;
  perService: Record<string, ServiceReport>;
  totals: ScoreResult['totals'];
  summary: Omit<ScoreSummary, 'overallScorePercent'>;
  warnings: ParseWarning[];
  sources: ReportSources;
}

export interface ReportOptions {
  asOf: Date;
  generatedAt?: Date;
  threshold?: number;
  warnings?: ParseWarning[];
  sources?: ReportSources;
}

export function toReport(result: ScoreResult, options: ReportOptions): ScoreReport {
  const perService: Record<string, ServiceReport> = Object.fromEntries(
    Object.entries(result.perService).map(([name, service]): [string, ServiceReport] => [
      name,
      {
        score: service.scorePercent ?? null,
        evaluatedWeight: service.evaluatedWeight,
        passedWeight: service.passedWeight,
        ruleCount: service.ruleCount,
        passedCount: service.passedCount,
        failedCount: service.failedRules.length,
        notApplicableCount: service.notApplicableCount,
        unknownCount: service.unknownCount,
        failedRules: service.failedRules,
      },
    ])
  );

  const { overallScorePercent: _overall, ...summary } = summarize(result, options.threshold);

  return {
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    asOf: options.asOf.toISOString(),
    overallScore: result.overallScorePercent ?? null,
    perService,
    totals: result.totals,
    summary,
    warnings: options.warnings ?? [],
    sources: options.sources ?? {},
  };
}

export function formatPercent(value: number | undefined): string {
  return value === undefined ? 'n/a' : `${value.toFixed(2)}%`;
}
