import type { LogLevel } from '../observability/logger.js';

export interface ControlScoreConfig {
  logLevel: LogLevel;
  json: boolean;
  strict: boolean; // fail on dropped records or nothing to score
  threshold: number; // 0-100, minimum overall score for exit code 0
  weightsFile?: string;
  serviceWeightsFile?: string;
  compensatingFile?: string;
}

export type PartialConfig = Partial<ControlScoreConfig>;

// Validation errors
export interface ValidationError {
  path: string;
  message: string;
}

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error', 'silent'];
const BOOLEAN_KEYS = ['json', 'strict'] as const;
const FILE_KEYS = ['weightsFile', 'serviceWeightsFile', 'compensatingFile'] as const;
const KNOWN_KEYS: readonly string[] = ['logLevel', 'threshold', ...BOOLEAN_KEYS, ...FILE_KEYS];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    errors.push({ path: 'root', message: 'Config must be an object' });
    return errors;
  }

  if ('logLevel' in config) {
    const level = config['logLevel'];
    if (typeof level !== 'string' || !LOG_LEVELS.includes(level)) {
      errors.push({
        path: 'logLevel',
        message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
      });
    }
  }

  if ('threshold' in config) {
    const threshold = config['threshold'];
    if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
      errors.push({
        path: 'threshold',
        message: 'Must be a number between 0 and 100',
      });
    }
  }

  for (const key of BOOLEAN_KEYS) {
    if (key in config && typeof config[key] !== 'boolean') {
      errors.push({ path: key, message: 'Must be a boolean' });
    }
  }

  for (const key of FILE_KEYS) {
    if (key in config && config[key] !== undefined) {
      const value = config[key];
      if (typeof value !== 'string' || value.trim() === '') {
        errors.push({ path: key, message: 'Must be a non-empty string' });
      }
    }
  }

  // Check for unknown keys
  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({
        path: key,
        message: 'Unknown configuration key',
      });
    }
  }

  return errors;
}

// Type guard
export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}
