import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import {
  formatWeight,
  resolveAsOf,
  resolveInputPath,
  resolveStrict,
  resolveTableFiles,
  resolveThreshold,
} from './shared.js';
import { stringFlag } from '../parser.js';
import type { Output } from '../output.js';
import { errorMessage, ScoringError } from '../../errors.js';
import { getLogger } from '../../observability/logger.js';
import { runScoring } from '../../pipeline.js';
import { toReport, type ScoreReport } from '../../report.js';
import { assertScorable } from '../../scoring/aggregate.js';
import { groupFailuresBySeverity } from '../../scoring/summary.js';
import type { ScoreResult } from '../../scoring/types.js';
import { ensureParentDir } from '../../utils/paths.js';

const scoreCommand: Command = {
  name: 'score',
  description: 'Score assessment results per service and overall',
  usage: 'score <results.json> [--weights f] [--service-weights f] [--compensating f] ' +
    '[--out report.json] [--threshold n] [--as-of date] [--strict] [--dry-run]',

  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child('score');

    try {
      const inputPath = resolveInputPath(ctx);
      const tableFiles = resolveTableFiles(ctx);
      const threshold = resolveThreshold(ctx);
      const strict = resolveStrict(ctx);
      const asOf = resolveAsOf(ctx);
      const outPath = stringFlag(ctx.args, 'out');
      const dryRun = ctx.args.flags['dry-run'] === true;

      const run = await runScoring({ inputPath, tables: tableFiles, asOf });
      const { result } = run;

      if (strict && run.droppedCount > 0) {
        ctx.output.error(`${run.droppedCount} record(s) could not be parsed (strict mode)`);
        return 1;
      }

      try {
        assertScorable(result);
      } catch (error) {
        if (strict || !(error instanceof ScoringError)) throw error;
        logger.warn(error.message);
      }

      const report = toReport(result, {
        asOf,
        threshold: threshold > 0 ? threshold : undefined,
        warnings: run.warnings,
        sources: { input: inputPath, ...tableFiles, shape: run.shape },
      });

      if (outPath && !dryRun) {
        const target = path.resolve(ctx.cwd, outPath);
        ensureParentDir(target);
        await fs.promises.writeFile(target, JSON.stringify(report, null, 2) + '\n', 'utf-8');
        logger.info('Wrote score report', { path: target });
      }

      if (ctx.output.isJson) {
        ctx.output.json(report);
      } else {
        printResult(result, report, threshold, ctx.output);
        if (outPath && !dryRun) {
          ctx.output.log(`Report written to ${path.resolve(ctx.cwd, outPath)}`);
        } else if (dryRun) {
          ctx.output.log('Dry run: no report written');
        }
      }

      // Exit code based on threshold
      if (threshold > 0) {
        const overall = result.overallScorePercent;
        if (overall === undefined || overall < threshold) {
          logger.warn('Overall score below threshold', { score: overall ?? null, threshold });
          return 1;
        }
      }

      return 0;
    } catch (error) {
      logger.error('Scoring failed', { error: errorMessage(error) });
      ctx.output.error(errorMessage(error));
      return 1;
    }
  },
};

function printResult(result: ScoreResult, report: ScoreReport, threshold: number, output: Output): void {
  output.log('');
  output.log(output.score('Overall Score', result.overallScorePercent, threshold > 0 ? threshold : report.summary.threshold));
  output.log('');

  const rows = Object.values(result.perService).map(service => [
    service.service,
    service.scorePercent === undefined ? 'n/a' : `${service.scorePercent.toFixed(2)}%`,
    formatWeight(service.passedWeight),
    formatWeight(service.evaluatedWeight),
    String(service.ruleCount),
    String(service.failedRules.length),
  ]);

  if (rows.length === 0) {
    output.log('No rules found.');
  } else {
    output.log(output.table(['Service', 'Score', 'Passed', 'Evaluated', 'Rules', 'Failed'], rows));
  }
  output.log('');

  const failures = groupFailuresBySeverity(result);
  for (const [severity, rules] of Object.entries(failures)) {
    output.log(`${severity.toUpperCase()} (${rules.length}):`);
    rules.forEach(rule => output.log(`  - ${rule.id} (weight ${formatWeight(rule.weight)})`));
    output.log('');
  }

  const { summary } = report;
  if (summary.rulesCompensated > 0) {
    output.log(`Compensated failures: ${summary.rulesCompensated}`);
  }
  output.log(
    `Data quality: ${summary.dataQuality.totalEntries} entries, ` +
      `${summary.dataQuality.skippedEntries} skipped, ` +
      `${summary.dataQuality.evaluationRatePercent.toFixed(2)}% evaluated`
  );
}

registerCommand(scoreCommand);

export default scoreCommand;
