import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { DEFAULT_CREDIT_FRACTION } from '../scoring/compensating.js';
import type {
  CompensatingControl,
  CompensatingControlTable,
  ScoringTables,
  ServiceWeightTable,
  WeightTable,
} from '../scoring/types.js';
import { DEFAULT_SERVICE_WEIGHTS } from './defaults.js';

export interface TableFiles {
  weightsFile?: string;
  serviceWeightsFile?: string;
  compensatingFile?: string;
}

const EMPTY_WEIGHTS: WeightTable = Object.freeze<Record<string, number>>({});
const EMPTY_CONTROLS: CompensatingControlTable = Object.freeze<Record<string, CompensatingControl>>({});

// Weights above this are accepted but usually a typo
const HIGH_WEIGHT_WARNING = 10;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML (.yaml, .yml) or JSON (anything else) text. An empty
 * document yields undefined.
 */
export function parseStructuredText(content: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    if (ext === '.yaml' || ext === '.yml') {
      return yaml.load(content, { filename: filePath });
    }
    return content.trim() === '' ? undefined : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${ext === '.yaml' || ext === '.yml' ? 'YAML' : 'JSON'} in ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export async function readStructuredFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseStructuredText(content, filePath);
}

// Accept both { weights: {...} } and a bare mapping
function unwrap(data: unknown, key: string, label: string): Record<string, unknown> {
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) {
    throw new ConfigurationError(`${label} must be a mapping, got ${Array.isArray(data) ? 'array' : typeof data}`);
  }

  const inner = data[key];
  if (inner === undefined) return data;
  if (inner === null) return {};
  if (!isRecord(inner)) {
    throw new ConfigurationError(`${label} under '${key}' must be a mapping`);
  }
  return inner;
}

export function parseWeightTable(data: unknown): WeightTable {
  const logger = getLogger();
  const entries = unwrap(data, 'weights', 'Weight table');
  const table: Record<string, number> = {};

  for (const [pattern, value] of Object.entries(entries)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigurationError(`Weight for '${pattern}' must be a number, got ${JSON.stringify(value)}`);
    }
    if (value <= 0) {
      throw new ConfigurationError(`Weight for '${pattern}' must be positive, got ${value}`);
    }
    if (value > HIGH_WEIGHT_WARNING) {
      logger.warn('Unusually high rule weight', { pattern, weight: value });
    }
    table[pattern] = value;
  }

  return Object.freeze(table);
}

export function parseServiceWeightTable(data: unknown): ServiceWeightTable {
  const logger = getLogger();
  const entries = unwrap(data, 'service_weights', 'Service weight table');
  const table: Record<string, number> = {};
  let total = 0;

  for (const [service, value] of Object.entries(entries)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigurationError(`Weight for service '${service}' must be a number, got ${JSON.stringify(value)}`);
    }
    if (value < 0) {
      throw new ConfigurationError(`Weight for service '${service}' must be non-negative, got ${value}`);
    }
    table[service] = value;
    total += value;
  }

  if (Object.keys(table).length === 0) {
    logger.debug('Service weight table is empty, using built-in service weights');
    return DEFAULT_SERVICE_WEIGHTS;
  }

  // Weights are renormalized per run; this is only a hint
  if (total > 0 && Math.abs(total - 1) > 0.01) {
    logger.debug('Service weights do not sum to 1', { total: Number(total.toFixed(4)) });
  }

  return Object.freeze(table);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function parseExpiry(ruleId: string, value: unknown): Date | undefined {
  if (value === undefined || value === null || value === '') return undefined;

  // js-yaml turns unquoted dates into Date objects at UTC midnight
  const date = value instanceof Date
    ? value
    : typeof value === 'string' ? new Date(value.trim()) : undefined;

  if (!date || Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Expiry for compensating control '${ruleId}' is not a valid date: ${JSON.stringify(value)}`);
  }

  // A bare calendar date stays valid through the end of that UTC day
  const dateOnly = typeof value === 'string'
    ? DATE_ONLY.test(value.trim())
    : date.getTime() % DAY_MS === 0;
  return dateOnly ? new Date(date.getTime() + DAY_MS - 1) : date;
}

function parseControl(ruleId: string, value: unknown): CompensatingControl {
  if (typeof value === 'string') {
    if (value.trim() === '') {
      throw new ConfigurationError(`Compensating control for '${ruleId}' has an empty rationale`);
    }
    return Object.freeze({ rationale: value, creditFraction: DEFAULT_CREDIT_FRACTION });
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(
      `Compensating control for '${ruleId}' must be a string or a mapping, got ${value === null ? 'null' : typeof value}`
    );
  }

  const rawRationale = value['rationale'] ?? value['description'];
  let rationale = '';
  if (typeof rawRationale === 'string') {
    rationale = rawRationale;
  } else if (rawRationale === undefined || rawRationale === null) {
    getLogger().warn('Compensating control has no rationale', { ruleId });
  } else {
    throw new ConfigurationError(`Rationale for compensating control '${ruleId}' must be a string`);
  }

  const fraction = value['credit_fraction'] ?? value['creditFraction'] ?? DEFAULT_CREDIT_FRACTION;
  if (typeof fraction !== 'number' || !Number.isFinite(fraction) || fraction <= 0 || fraction > 1) {
    throw new ConfigurationError(
      `Credit fraction for compensating control '${ruleId}' must be in (0, 1], got ${JSON.stringify(fraction)}`
    );
  }

  const expiry = parseExpiry(ruleId, value['expiry']);
  const control: CompensatingControl = expiry
    ? { rationale, creditFraction: fraction, expiry }
    : { rationale, creditFraction: fraction };
  return Object.freeze(control);
}

export function parseCompensatingTable(data: unknown): CompensatingControlTable {
  const entries = unwrap(data, 'compensating', 'Compensating control table');
  const table: Record<string, CompensatingControl> = {};

  for (const [ruleId, value] of Object.entries(entries)) {
    table[ruleId] = parseControl(ruleId, value);
  }

  return Object.freeze(table);
}

async function loadTable<T>(
  filePath: string | undefined,
  parse: (data: unknown) => T,
  fallback: T
): Promise<T> {
  if (!filePath) return fallback;
  const data = await readStructuredFile(filePath);
  try {
    return parse(data);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${filePath}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export function loadWeightTable(filePath?: string): Promise<WeightTable> {
  return loadTable(filePath, parseWeightTable, EMPTY_WEIGHTS);
}

export function loadServiceWeightTable(filePath?: string): Promise<ServiceWeightTable> {
  return loadTable(filePath, parseServiceWeightTable, DEFAULT_SERVICE_WEIGHTS);
}

export function loadCompensatingTable(filePath?: string): Promise<CompensatingControlTable> {
  return loadTable(filePath, parseCompensatingTable, EMPTY_CONTROLS);
}

/**
 * Load all three tables as one frozen snapshot. A missing file path
 * means an empty weight table, the built-in service weights, and no
 * compensating controls.
 */
export async function loadScoringTables(files: TableFiles = {}): Promise<ScoringTables> {
  const [weights, serviceWeights, compensating] = await Promise.all([
    loadWeightTable(files.weightsFile),
    loadServiceWeightTable(files.serviceWeightsFile),
    loadCompensatingTable(files.compensatingFile),
  ]);

  return Object.freeze({ weights, serviceWeights, compensating });
}
