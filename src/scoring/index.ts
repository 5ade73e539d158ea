// Re-export the scoring engine
export {
  UNKNOWN_SERVICE,
  type Verdict,
  type Rule,
  type RuleDetails,
  type WeightTable,
  type ServiceWeightTable,
  type CompensatingControl,
  type CompensatingControlTable,
  type ScoringTables,
  type FailedRule,
  type ServiceScore,
  type ScoreTotals,
  type ScoreResult,
} from './types.js';

export {
  normalizeVerdict,
  isRecognizedVerdict,
  isEvaluated,
} from './verdict.js';

export { inferService } from './service.js';

export {
  DEFAULT_RULE_WEIGHT,
  createWeightResolver,
  resolveWeight,
  type WeightResolver,
} from './weights.js';

export {
  DEFAULT_CREDIT_FRACTION,
  creditFor,
  findCompensatingControl,
} from './compensating.js';

export {
  ParsedResults,
  parseResults,
  parseResultsJson,
  isParsedResults,
  type ParseWarning,
  type ParseWarningCode,
} from './results.js';

export {
  computeScores,
  computeOverallScore,
  serviceImportance,
  assertScorable,
  type ComputeOptions,
} from './aggregate.js';

export {
  summarize,
  groupFailuresBySeverity,
  DEFAULT_PASSING_SCORE,
  DEFAULT_SEVERITY_BANDS,
  type ScoreSummary,
  type SeverityBand,
} from './summary.js';

export { allShapes, type ShapeMatcher, type RawRecord } from './shapes/index.js';
