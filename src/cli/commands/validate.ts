import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { resolveInputPath, resolveStrict, resolveTableFiles } from './shared.js';
import { errorMessage } from '../../errors.js';
import { loadScoringTables } from '../../config/tables.js';
import { getLogger } from '../../observability/logger.js';
import { readResultsFile } from '../../pipeline.js';
import { parseResultsJson } from '../../scoring/results.js';
import type { Verdict } from '../../scoring/types.js';

const validateCommand: Command = {
  name: 'validate',
  description: 'Check a results file and scoring tables without scoring',
  usage: 'validate <results.json> [--weights f] [--service-weights f] [--compensating f] [--strict]',

  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child('validate');

    try {
      const inputPath = resolveInputPath(ctx);
      const strict = resolveStrict(ctx);
      const tables = await loadScoringTables(resolveTableFiles(ctx));

      const parsed = parseResultsJson(await readResultsFile(inputPath));
      if (parsed.error) throw parsed.error;

      const verdicts: Record<Verdict, number> = { Pass: 0, Fail: 0, NotApplicable: 0, Unknown: 0 };
      const services = new Set<string>();
      for (const rule of parsed) {
        verdicts[rule.verdict]++;
        services.add(rule.service);
      }
      const ruleCount = verdicts.Pass + verdicts.Fail + verdicts.NotApplicable + verdicts.Unknown;

      const summary = {
        valid: !(strict && parsed.warnings.length > 0),
        shape: parsed.shape,
        rules: ruleCount,
        dropped: parsed.droppedCount,
        services: [...services].sort(),
        verdicts,
        tables: {
          weights: Object.keys(tables.weights).length,
          serviceWeights: Object.keys(tables.serviceWeights).length,
          compensating: Object.keys(tables.compensating).length,
        },
        warnings: parsed.warnings,
      };

      if (ctx.output.isJson) {
        ctx.output.json(summary);
      } else {
        ctx.output.log(`Layout: ${parsed.shape}`);
        ctx.output.log(`Rules: ${ruleCount} (${parsed.droppedCount} dropped)`);
        ctx.output.log(
          `Verdicts: ${verdicts.Pass} pass, ${verdicts.Fail} fail, ` +
            `${verdicts.NotApplicable} n/a, ${verdicts.Unknown} unknown`
        );
        ctx.output.log(`Services: ${summary.services.join(', ') || 'none'}`);
        for (const warning of parsed.warnings) {
          ctx.output.warn(`[${warning.code}] ${warning.message}`);
        }
        if (summary.valid) {
          ctx.output.success('Input and tables are valid');
        }
      }

      if (!summary.valid) {
        logger.warn('Validation warnings in strict mode', { count: parsed.warnings.length });
        ctx.output.error(`${parsed.warnings.length} warning(s) in strict mode`);
        return 1;
      }
      return 0;
    } catch (error) {
      logger.error('Validation failed', { error: errorMessage(error) });
      ctx.output.error(errorMessage(error));
      return 1;
    }
  },
};

registerCommand(validateCommand);

export default validateCommand;
