import { booleanFlag, CLI_PARSE_OPTIONS, parseArgs, stringFlag } from './cli/parser.js';
import { createOutput, Output } from './cli/output.js';
import { getCommand, commands } from './cli/commands/index.js';
import { loadConfig } from './config/loader.js';
import type { ControlScoreConfig, PartialConfig } from './config/schema.js';
import { errorMessage } from './errors.js';
import { VERSION } from './index.js';
import { createLogger, isLogLevel, resolveLogLevel, type LogLevel } from './observability/logger.js';

// Import commands to register them
import './cli/commands/score.js';
import './cli/commands/validate.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), CLI_PARSE_OPTIONS);
  const output = createOutput({ json: args.flags['json'] === true });

  if (args.flags['version']) {
    output.log(`controlscore v${VERSION}`);
    return 0;
  }

  // Handle --help or no command
  if (args.flags['help'] || !args.command) {
    printHelp(output);
    return 0;
  }

  // Route to command
  const cmd = getCommand(args.command);
  if (!cmd) {
    output.error(`Unknown command: ${args.command}`);
    output.log(`Run 'controlscore --help' for usage.`);
    return 1;
  }

  const cliFlags: PartialConfig = {
    json: booleanFlag(args, 'json'),
    strict: booleanFlag(args, 'strict'),
  };
  const logLevel = stringFlag(args, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      output.error(`Invalid --log-level: ${logLevel}`);
      return 1;
    }
    cliFlags.logLevel = logLevel;
  }

  let config: ControlScoreConfig;
  try {
    config = await loadConfig({ cliFlags, configPath: stringFlag(args, 'config') });
  } catch (error) {
    output.error(errorMessage(error));
    return 1;
  }

  const level: LogLevel = resolveLogLevel(config.logLevel, {
    verbose: args.flags['verbose'] === true,
    quiet: args.flags['quiet'] === true,
  });
  createLogger({ level, json: config.json });

  // A config file may switch JSON output on
  const commandOutput = config.json === output.isJson ? output : createOutput({ json: config.json });
  return cmd.run({ args, output: commandOutput, config, cwd: process.cwd() });
}

function printHelp(output: Output): void {
  output.log(`controlscore v${VERSION} - Weighted compliance scoring for security control assessments`);
  output.log('');
  output.log('Usage: controlscore <command> [options]');
  output.log('');
  output.log('Commands:');
  for (const [name, cmd] of commands) {
    output.log(`  ${name.padEnd(12)} ${cmd.description}`);
    output.log(`  ${''.padEnd(12)} controlscore ${cmd.usage}`);
  }
  output.log('');
  output.log('Global Options:');
  output.log('  --help, -h       Show this help message');
  output.log('  --version        Show version');
  output.log('  --json           Output as JSON');
  output.log('  --log-level      Set log level (debug, info, warn, error, silent)');
  output.log('  --verbose, -v    Debug logging');
  output.log('  --quiet, -q      Errors only');
  output.log('  --config         Path to config file');
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
