import { ScoringError } from '../errors.js';
import { findCompensatingControl, creditFor } from './compensating.js';
import { isParsedResults } from './results.js';
import { createWeightResolver } from './weights.js';
import type {
  Rule,
  ScoreResult,
  ScoreTotals,
  ScoringTables,
  ServiceScore,
  ServiceWeightTable,
} from './types.js';

export interface ComputeOptions {
  asOf?: Date;
  excludedCount?: number; // taken from ParsedResults when omitted
}

function emptyServiceScore(service: string): ServiceScore {
  return {
    service,
    evaluatedWeight: 0,
    passedWeight: 0,
    scorePercent: undefined,
    ruleCount: 0,
    passedCount: 0,
    notApplicableCount: 0,
    unknownCount: 0,
    failedRules: [],
  };
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Exact key first; `GMAIL` inferred from `GWS.GMAIL.1.1v0.5` still finds `gmail`
export function serviceImportance(service: string, serviceWeights: ServiceWeightTable): number {
  if (Object.hasOwn(serviceWeights, service)) {
    return serviceWeights[service] ?? 0;
  }

  const folded = service.toLowerCase();
  for (const [name, importance] of Object.entries(serviceWeights)) {
    if (name.toLowerCase() === folded) return importance;
  }
  return 0;
}

/**
 * Weighted mean of the scored services, renormalized over the services
 * that produced a score. Services without a score, or without
 * importance, drop out of both sides. Undefined when nothing with a
 * positive importance was scored.
 */
export function computeOverallScore(
  services: readonly ServiceScore[],
  serviceWeights: ServiceWeightTable
): number | undefined {
  let totalWeight = 0;
  let weightedSum = 0;

  for (const service of services) {
    if (service.scorePercent === undefined) continue;

    const importance = serviceImportance(service.service, serviceWeights);
    if (!Number.isFinite(importance) || importance <= 0) continue;

    totalWeight += importance;
    weightedSum += importance * service.scorePercent;
  }

  return totalWeight > 0 ? weightedSum / totalWeight : undefined;
}

/**
 * Score a run.
 *
 * Pass adds the rule weight to both sides of its service; Fail adds it to
 * the evaluated side and `creditFraction * weight` to the passed side
 * when an unexpired compensating control exists. NotApplicable and
 * Unknown rules are counted but never weighed.
 */
export function computeScores(
  rules: Iterable<Rule>,
  tables: ScoringTables,
  options: ComputeOptions = {}
): ScoreResult {
  const asOf = options.asOf ?? new Date();
  const weights = createWeightResolver(tables.weights);
  const services = new Map<string, ServiceScore>();

  for (const rule of rules) {
    let score = services.get(rule.service);
    if (!score) {
      score = emptyServiceScore(rule.service);
      services.set(rule.service, score);
    }
    score.ruleCount++;

    switch (rule.verdict) {
      case 'Pass': {
        const weight = weights.resolve(rule.id);
        score.evaluatedWeight += weight;
        score.passedWeight += weight;
        score.passedCount++;
        break;
      }
      case 'Fail': {
        const weight = weights.resolve(rule.id);
        const creditFraction = creditFor(rule.id, tables.compensating, asOf);
        score.evaluatedWeight += weight;
        score.passedWeight += creditFraction * weight;

        const control = creditFraction > 0
          ? findCompensatingControl(rule.id, tables.compensating, asOf)
          : undefined;
        score.failedRules.push(
          control
            ? { id: rule.id, weight, verdict: 'Fail', creditFraction, rationale: control.rationale }
            : { id: rule.id, weight, verdict: 'Fail', creditFraction }
        );
        break;
      }
      case 'NotApplicable':
        score.notApplicableCount++;
        break;
      case 'Unknown':
        score.unknownCount++;
        break;
    }
  }

  const ordered = [...services.values()].sort((a, b) => byName(a.service, b.service));

  const totals: ScoreTotals = {
    passedWeight: 0,
    evaluatedWeight: 0,
    excludedCount: options.excludedCount ?? (isParsedResults(rules) ? rules.droppedCount : 0),
    ruleCount: 0,
    notApplicableCount: 0,
    unknownCount: 0,
  };

  for (const score of ordered) {
    if (score.evaluatedWeight > 0) {
      score.scorePercent = (100 * score.passedWeight) / score.evaluatedWeight;
    }
    totals.passedWeight += score.passedWeight;
    totals.evaluatedWeight += score.evaluatedWeight;
    totals.ruleCount += score.ruleCount;
    totals.notApplicableCount += score.notApplicableCount;
    totals.unknownCount += score.unknownCount;
  }

  return {
    overallScorePercent: computeOverallScore(ordered, tables.serviceWeights),
    perService: Object.fromEntries(ordered.map(score => [score.service, score])),
    totals,
  };
}

// Throws when no rule contributed evaluated weight
export function assertScorable(result: ScoreResult): void {
  if (result.totals.evaluatedWeight > 0) return;

  const { ruleCount, notApplicableCount, unknownCount, excludedCount } = result.totals;
  throw new ScoringError(
    `No scorable rules: ${ruleCount} parsed (${notApplicableCount} not applicable, ` +
      `${unknownCount} unknown), ${excludedCount} dropped`
  );
}
