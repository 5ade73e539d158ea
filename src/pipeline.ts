import * as fs from 'node:fs';
import { ParsingError, errorMessage } from './errors.js';
import { loadScoringTables, type TableFiles } from './config/tables.js';
import { getLogger } from './observability/logger.js';
import { computeScores } from './scoring/aggregate.js';
import { parseResultsJson, type ParseWarning } from './scoring/results.js';
import type { ScoreResult, ScoringTables } from './scoring/types.js';

export interface ScoringRunOptions {
  inputPath: string;
  tables?: TableFiles;
  asOf?: Date;
}

export interface ScoringRun {
  result: ScoreResult;
  tables: ScoringTables;
  shape: string;
  warnings: ParseWarning[];
  droppedCount: number;
  asOf: Date;
}

export async function readResultsFile(inputPath: string): Promise<string> {
  try {
    return await fs.promises.readFile(inputPath, 'utf-8');
  } catch (error) {
    throw new ParsingError(`Cannot read ${inputPath}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Read, parse and score one results file. The tables are loaded once
 * and handed to the engine as a frozen snapshot.
 */
export async function runScoring(options: ScoringRunOptions): Promise<ScoringRun> {
  const logger = getLogger().child('pipeline');
  const asOf = options.asOf ?? new Date();

  logger.debug('Loading scoring tables', { ...options.tables });
  const tablesLoaded = logger.time('Loading scoring tables');
  const tables = await loadScoringTables(options.tables);
  tablesLoaded();

  logger.info('Reading results', { input: options.inputPath });
  const parsed = parseResultsJson(await readResultsFile(options.inputPath));
  if (parsed.error || parsed.shape === undefined) {
    throw parsed.error ?? new ParsingError(`Unrecognized results layout in ${options.inputPath}`);
  }
  logger.debug('Detected results layout', { shape: parsed.shape });

  // Records are parsed lazily, so this covers parsing as well
  const scored = logger.time('Parsing and scoring');
  const result = computeScores(parsed, tables, { asOf });
  scored();

  for (const warning of parsed.warnings) {
    logger.warn(warning.message, { code: warning.code });
  }
  logger.info('Scored results', {
    services: Object.keys(result.perService).length,
    rules: result.totals.ruleCount,
    dropped: parsed.droppedCount,
  });

  return {
    result,
    tables,
    shape: parsed.shape,
    warnings: parsed.warnings,
    droppedCount: parsed.droppedCount,
    asOf,
  };
}
