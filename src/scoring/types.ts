export type Verdict = 'Pass' | 'Fail' | 'NotApplicable' | 'Unknown';

export const UNKNOWN_SERVICE = 'Unknown';

export interface RuleDetails {
  requirement?: string;
  criticality?: string;
  documentationUrl?: string;
}

export interface Rule {
  id: string;
  verdict: Verdict;
  service: string;
  details: RuleDetails;
  raw: Readonly<Record<string, unknown>>;
}

// pattern (exact id or prefix) -> weight
export type WeightTable = Readonly<Record<string, number>>;

// service -> importance
export type ServiceWeightTable = Readonly<Record<string, number>>;

export interface CompensatingControl {
  rationale: string;
  creditFraction: number; // (0, 1]
  expiry?: Date;
}

export type CompensatingControlTable = Readonly<Record<string, CompensatingControl>>;

export interface ScoringTables {
  weights: WeightTable;
  serviceWeights: ServiceWeightTable;
  compensating: CompensatingControlTable;
}

export interface FailedRule {
  id: string;
  weight: number;
  verdict: 'Fail';
  creditFraction: number;
  rationale?: string;
}

export interface ServiceScore {
  service: string;
  evaluatedWeight: number;
  passedWeight: number;
  scorePercent: number | undefined;
  ruleCount: number;
  passedCount: number;
  notApplicableCount: number;
  unknownCount: number;
  failedRules: FailedRule[];
}

export interface ScoreTotals {
  passedWeight: number;
  evaluatedWeight: number;
  excludedCount: number; // records dropped by the parser
  ruleCount: number;
  notApplicableCount: number;
  unknownCount: number;
}

export interface ScoreResult {
  overallScorePercent: number | undefined;
  perService: Record<string, ServiceScore>;
  totals: ScoreTotals;
}
