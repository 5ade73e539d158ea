export const VERSION = '1.0.0';

export * from './scoring/index.js';
export {
  ControlScoreError,
  ParsingError,
  ConfigurationError,
  ScoringError,
  isControlScoreError,
  type ErrorCode,
} from './errors.js';
export {
  loadScoringTables,
  loadWeightTable,
  loadServiceWeightTable,
  loadCompensatingTable,
  parseWeightTable,
  parseServiceWeightTable,
  parseCompensatingTable,
  type TableFiles,
} from './config/tables.js';
export { DEFAULT_SERVICE_WEIGHTS } from './config/defaults.js';
export { loadConfig, type LoadConfigOptions } from './config/loader.js';
export type { ControlScoreConfig, PartialConfig } from './config/schema.js';
export { runScoring, type ScoringRun, type ScoringRunOptions } from './pipeline.js';
export { toReport, formatPercent, type ScoreReport, type ServiceReport, type ReportOptions } from './report.js';
export { createLogger, getLogger, type LogLevel, type LoggerOptions } from './observability/logger.js';
