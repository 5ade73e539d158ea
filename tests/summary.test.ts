import { describe, it, expect } from 'vitest';
import { computeScores } from '../src/scoring/aggregate.js';
import { inferService } from '../src/scoring/service.js';
import { DEFAULT_PASSING_SCORE, groupFailuresBySeverity, summarize } from '../src/scoring/summary.js';
import { DEFAULT_SERVICE_WEIGHTS } from '../src/config/defaults.js';
import { formatPercent, toReport } from '../src/report.js';
import type { Rule, ScoreResult, Verdict } from '../src/scoring/types.js';

const AS_OF = new Date('2026-06-01T00:00:00Z');

function rule(id: string, verdict: Verdict): Rule {
  return { id, verdict, service: inferService(id), details: {}, raw: {} };
}

// gmail 1.5/7, drive 1/4, chat 0/3
function sampleResult(): ScoreResult {
  return computeScores(
    [
      rule('svc.gmail.1', 'Pass'),
      rule('svc.gmail.2', 'Fail'),
      rule('svc.gmail.3', 'Fail'),
      rule('svc.drive.1', 'Pass'),
      rule('svc.drive.2', 'Fail'),
      rule('svc.drive.3', 'NotApplicable'),
      rule('svc.chat.1', 'Unknown'),
      rule('svc.chat.2', 'Fail'),
      rule('svc.chat.3', 'Fail'),
    ],
    {
      weights: { 'svc.gmail.2': 5, 'svc.drive.2': 3, 'svc.chat.2': 2 },
      serviceWeights: DEFAULT_SERVICE_WEIGHTS,
      compensating: { 'svc.gmail.3': { rationale: 'Mail gateway', creditFraction: 0.5 } },
    },
    { asOf: AS_OF, excludedCount: 1 }
  );
}

describe('summarize', () => {
  it('should count rules, services and data quality', () => {
    const summary = summarize(sampleResult(), 20);

    expect(summary.overallScorePercent).toBeCloseTo(18.5714285714, 8);
    expect(summary).toMatchObject({
      servicesAnalyzed: 3,
      servicesScored: 3,
      servicesMeetingThreshold: 2,
      threshold: 20,
      rulesEvaluated: 7,
      rulesPassed: 2,
      rulesFailed: 5,
      rulesCompensated: 1,
      dataQuality: {
        totalEntries: 10,
        skippedEntries: 3,
        evaluationRatePercent: 70,
      },
    });
  });

  it('should default to the passing score threshold', () => {
    const summary = summarize(sampleResult());
    expect(DEFAULT_PASSING_SCORE).toBe(80);
    expect(summary.threshold).toBe(80);
    expect(summary.servicesMeetingThreshold).toBe(0);
  });

  it('should report zero evaluation rate for empty input', () => {
    const empty = computeScores([], { weights: {}, serviceWeights: {}, compensating: {} }, { asOf: AS_OF });
    expect(summarize(empty).dataQuality).toEqual({
      totalEntries: 0,
      skippedEntries: 0,
      evaluationRatePercent: 0,
    });
  });
});

describe('groupFailuresBySeverity', () => {
  it('should band uncompensated failures by weight', () => {
    const groups = groupFailuresBySeverity(sampleResult());
    const ids = Object.fromEntries(
      Object.entries(groups).map(([band, rules]) => [band, rules.map(failed => failed.id)])
    );

    expect(ids).toEqual({
      Critical: ['svc.gmail.2'],
      High: ['svc.drive.2'],
      Medium: ['svc.chat.2'],
      Low: ['svc.chat.3'],
    });
  });

  it('should put weights below every band under Unclassified', () => {
    const groups = groupFailuresBySeverity(sampleResult(), [{ name: 'Major', minWeight: 3 }]);

    expect(groups['Major']?.map(failed => failed.id)).toEqual(['svc.drive.2', 'svc.gmail.2']);
    expect(groups['Unclassified']?.map(failed => failed.id)).toEqual(['svc.chat.2', 'svc.chat.3']);
  });
});

describe('toReport', () => {
  it('should build a JSON-safe report', () => {
    const report = toReport(sampleResult(), {
      asOf: AS_OF,
      generatedAt: new Date('2026-06-02T12:00:00Z'),
      threshold: 20,
      sources: { input: 'results.json', shape: 'rules-array' },
    });

    expect(report.generatedAt).toBe('2026-06-02T12:00:00.000Z');
    expect(report.asOf).toBe('2026-06-01T00:00:00.000Z');
    expect(report.overallScore).toBeCloseTo(18.5714285714, 8);
    expect(report.perService['chat']).toEqual({
      score: 0,
      evaluatedWeight: 3,
      passedWeight: 0,
      ruleCount: 3,
      passedCount: 0,
      failedCount: 2,
      notApplicableCount: 0,
      unknownCount: 1,
      failedRules: [
        { id: 'svc.chat.2', weight: 2, verdict: 'Fail', creditFraction: 0 },
        { id: 'svc.chat.3', weight: 1, verdict: 'Fail', creditFraction: 0 },
      ],
    });
    expect(report.summary.servicesMeetingThreshold).toBe(2);
    expect('overallScorePercent' in report.summary).toBe(false);
    expect(report.warnings).toEqual([]);
    expect(report.sources).toEqual({ input: 'results.json', shape: 'rules-array' });
  });

  it('should write unscored services as null', () => {
    const result = computeScores([rule('svc.meet.1', 'NotApplicable')], {
      weights: {},
      serviceWeights: DEFAULT_SERVICE_WEIGHTS,
      compensating: {},
    }, { asOf: AS_OF });
    const report = toReport(result, { asOf: AS_OF });

    expect(report.overallScore).toBeNull();
    expect(report.perService['meet']?.score).toBeNull();
    expect(JSON.parse(JSON.stringify(report)).overallScore).toBeNull();
  });

  it('should keep services whose names collide with object built-ins', () => {
    const result = computeScores([rule('svc.__proto__.1', 'Pass'), rule('svc.constructor.1', 'Fail')], {
      weights: {},
      serviceWeights: DEFAULT_SERVICE_WEIGHTS,
      compensating: {},
    }, { asOf: AS_OF });
    const report = toReport(result, { asOf: AS_OF });

    expect(Object.entries(report.perService).map(([name, service]) => [name, service.score])).toEqual([
      ['__proto__', 100],
      ['constructor', 0],
    ]);
    expect(Object.getPrototypeOf(report.perService)).toBe(Object.prototype);
  });
});

describe('formatPercent', () => {
  it('should format with two decimals', () => {
    expect(formatPercent(75)).toBe('75.00%');
    expect(formatPercent(100 / 7)).toBe('14.29%');
    expect(formatPercent(undefined)).toBe('n/a');
  });
});
