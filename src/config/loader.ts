import { type ControlScoreConfig, type PartialConfig, isValidConfig, validateConfig } from './schema.js';
import { getDefaultConfig } from './defaults.js';
import { readStructuredFile } from './tables.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { getConfigRoot } from '../utils/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const FILE_KEYS = ['weightsFile', 'serviceWeightsFile', 'compensatingFile'] as const;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ControlScoreConfig> {
  const defaults = getDefaultConfig();
  const env = options.env ?? process.env;
  const envConfig = loadEnvConfig(env);
  const fileConfig = await loadFileConfig(env, options.configPath, options.cwd);

  // Merge in precedence order; defaults fill whatever is left
  const merged: Record<string, unknown> = {
    ...fileConfig,
    ...envConfig,
    ...stripUndefined(options.cliFlags ?? {}),
  };

  // Validate final config
  const errors = validateConfig(merged);
  if (errors.length > 0 || !isValidConfig(merged)) {
    throw new ConfigurationError(`Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }

  const overrides: PartialConfig = merged;
  return { ...defaults, ...overrides };
}

function stripUndefined(config: PartialConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([, value]) => value !== undefined));
}

// Values are passed through as-is; validateConfig reports bad ones
export function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env['CONTROLSCORE_LOG_LEVEL']) {
    config['logLevel'] = env['CONTROLSCORE_LOG_LEVEL'];
  }
  if (env['CONTROLSCORE_THRESHOLD']) {
    config['threshold'] = Number(env['CONTROLSCORE_THRESHOLD']);
  }
  if (env['CONTROLSCORE_STRICT']) {
    config['strict'] = env['CONTROLSCORE_STRICT'] === 'true';
  }
  if (env['CONTROLSCORE_WEIGHTS']) {
    config['weightsFile'] = env['CONTROLSCORE_WEIGHTS'];
  }
  if (env['CONTROLSCORE_SERVICE_WEIGHTS']) {
    config['serviceWeightsFile'] = env['CONTROLSCORE_SERVICE_WEIGHTS'];
  }
  if (env['CONTROLSCORE_COMPENSATING']) {
    config['compensatingFile'] = env['CONTROLSCORE_COMPENSATING'];
  }

  return config;
}

// Load from config file
// Search: controlscore.config.json, .controlscorerc, .controlscorerc.{json,yaml,yml},
// package.json#controlscore, then config.json in the user config directory
async function loadFileConfig(
  env: NodeJS.ProcessEnv,
  configPath?: string,
  cwd?: string
): Promise<Record<string, unknown>> {
  const searchDir = cwd ?? process.cwd();

  // If explicit path provided, use it
  if (configPath) {
    return loadConfigFile(path.resolve(searchDir, configPath));
  }

  const candidates = [
    'controlscore.config.json',
    '.controlscorerc',
    '.controlscorerc.json',
    '.controlscorerc.yaml',
    '.controlscorerc.yml',
  ];

  for (const candidate of candidates) {
    const fullPath = path.join(searchDir, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  const pkgPath = path.join(searchDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const pkg = await readPackageJson(pkgPath);
    if (isRecord(pkg) && isRecord(pkg['controlscore'])) {
      return resolveFilePaths(pkg['controlscore'], searchDir);
    }
  }

  const userConfig = path.join(getConfigRoot(env), 'config.json');
  if (fs.existsSync(userConfig)) {
    return loadConfigFile(userConfig);
  }

  return {};
}

// A broken package.json is not ours to report
async function readPackageJson(pkgPath: string): Promise<unknown> {
  try {
    return await readStructuredFile(pkgPath);
  } catch (error) {
    getLogger().debug('Ignoring unreadable package.json', { path: pkgPath, error: errorMessage(error) });
    return undefined;
  }
}

async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const data = await readStructuredFile(filePath);
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) {
    throw new ConfigurationError(`Config file ${filePath} must contain an object`);
  }
  return resolveFilePaths(data, path.dirname(filePath));
}

// Table paths in a config file are relative to that file
function resolveFilePaths(config: Record<string, unknown>, baseDir: string): Record<string, unknown> {
  const resolved = { ...config };
  for (const key of FILE_KEYS) {
    const value = resolved[key];
    if (typeof value === 'string' && value.trim() !== '') {
      resolved[key] = path.resolve(baseDir, value);
    }
  }
  return resolved;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
