import * as path from 'node:path';
import { ConfigurationError } from '../../errors.js';
import type { TableFiles } from '../../config/tables.js';
import { stringFlag } from '../parser.js';
import type { CommandContext } from './index.js';

export function resolveInputPath(ctx: CommandContext): string {
  const input = ctx.args.positionals[0] ?? stringFlag(ctx.args, 'input');
  if (!input) {
    throw new ConfigurationError('Missing results file. Pass it as the first argument or with --input');
  }
  return path.resolve(ctx.cwd, input);
}

// Flags override the configured table files
export function resolveTableFiles(ctx: CommandContext): TableFiles {
  const pick = (flag: string, configured: string | undefined): string | undefined => {
    const value = stringFlag(ctx.args, flag) ?? configured;
    return value ? path.resolve(ctx.cwd, value) : undefined;
  };

  const files: TableFiles = {};
  const weightsFile = pick('weights', ctx.config.weightsFile);
  const serviceWeightsFile = pick('service-weights', ctx.config.serviceWeightsFile);
  const compensatingFile = pick('compensating', ctx.config.compensatingFile);
  if (weightsFile) files.weightsFile = weightsFile;
  if (serviceWeightsFile) files.serviceWeightsFile = serviceWeightsFile;
  if (compensatingFile) files.compensatingFile = compensatingFile;
  return files;
}

export function resolveAsOf(ctx: CommandContext): Date {
  const raw = stringFlag(ctx.args, 'as-of');
  if (raw === undefined) return ctx.now ?? new Date();

  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`--as-of must be a date, got '${raw}'`);
  }
  return date;
}

export function resolveThreshold(ctx: CommandContext): number {
  const raw = stringFlag(ctx.args, 'threshold');
  if (raw === undefined) return ctx.config.threshold;

  const threshold = Number(raw);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
    throw new ConfigurationError(`--threshold must be a number between 0 and 100, got '${raw}'`);
  }
  return threshold;
}

export function resolveStrict(ctx: CommandContext): boolean {
  return ctx.args.flags['strict'] === true || ctx.config.strict;
}

// Trim float noise for display: 7.500000001 -> "7.5"
export function formatWeight(value: number): string {
  return String(Number(value.toFixed(2)));
}
